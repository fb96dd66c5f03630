import type { Logger } from "../logger";

export type InferencePurpose = "intent_extraction" | "answer_synthesis";

export type InferenceRequest = {
  purpose: InferencePurpose;
  promptText: string;
  schemaName: string;
  schema: Record<string, unknown>;
  temperature: number;
  maxOutputTokens?: number;
  logger?: Logger;
};

export type InferenceResponse = {
  rawText: string;
  model: string;
};

/** Single-turn, near-deterministic text completion. */
export interface InferenceProvider {
  readonly name: string;
  complete(request: InferenceRequest): Promise<InferenceResponse>;
}

export class InferenceProviderError extends Error {
  statusCode: number;
  retryable: boolean;
  errorType?: string;
  errorCode?: string;
  retryAfterMs?: number;

  constructor(
    message: string,
    args: {
      statusCode?: number;
      retryable?: boolean;
      errorType?: string;
      errorCode?: string;
      retryAfterMs?: number;
    } = {}
  ) {
    super(message);
    this.name = "InferenceProviderError";
    this.statusCode = args.statusCode ?? 502;
    this.retryable = args.retryable ?? true;
    this.errorType = args.errorType;
    this.errorCode = args.errorCode;
    this.retryAfterMs = args.retryAfterMs;
  }

  toJSON() {
    return {
      error: "inference_error",
      statusCode: this.statusCode,
      retryable: this.retryable,
      ...(this.errorType ? { errorType: this.errorType } : {}),
      ...(this.errorCode ? { errorCode: this.errorCode } : {}),
      message: this.message,
    };
  }
}
