import {
  InferenceProviderError,
  type InferencePurpose,
  type InferenceProvider,
  type InferenceRequest,
  type InferenceResponse,
} from "./inference_provider";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseRetryAfterMs(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) {
    return Math.max(0, retryDate - now);
  }
  return undefined;
}

/** First text part of a Responses API payload, falling back to `output_text`. */
export function extractOutputText(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;
  const output = Array.isArray(data.output) ? data.output : [];
  for (const item of output) {
    const contentItems = isRecord(item) && Array.isArray(item.content) ? item.content : [];
    for (const part of contentItems) {
      if (isRecord(part) && typeof part.text === "string" && part.text) {
        return part.text;
      }
    }
  }
  return typeof data.output_text === "string" && data.output_text ? data.output_text : undefined;
}

function readErrorField(parsed: unknown, field: "type" | "code" | "message"): string | undefined {
  if (!isRecord(parsed) || !isRecord(parsed.error)) return undefined;
  const value = parsed.error[field];
  return typeof value === "string" ? value : undefined;
}

export class OpenAIInferenceProvider implements InferenceProvider {
  readonly name = "openai";

  constructor(
    private readonly opts: {
      apiKey: string;
      /** Model per call purpose; extraction and synthesis may run on different tiers. */
      modelFor: (purpose: InferencePurpose) => string;
      baseUrl?: string;
      fetchImpl?: typeof fetch;
      timeoutMs?: number;
    }
  ) {}

  async complete(input: InferenceRequest): Promise<InferenceResponse> {
    const baseUrl = this.opts.baseUrl ?? "https://api.openai.com/v1";
    const fetchImpl = this.opts.fetchImpl ?? fetch;

    if (!this.opts.apiKey) {
      throw new InferenceProviderError("OPENAI_API_KEY missing", {
        statusCode: 500,
        retryable: false,
      });
    }

    const model = this.opts.modelFor(input.purpose);
    const body: Record<string, unknown> = {
      model,
      store: false,
      stream: false,
      input: input.promptText,
      temperature: input.temperature,
      text: {
        format: {
          type: "json_schema",
          name: input.schemaName,
          strict: false,
          schema: input.schema,
        },
      },
    };
    if (typeof input.maxOutputTokens === "number") {
      body.max_output_tokens = input.maxOutputTokens;
    }

    let res: Response;
    try {
      res = await fetchImpl(`${baseUrl}/responses`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.opts.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 30_000),
      });
    } catch (err) {
      throw new InferenceProviderError(
        `OpenAI transport error: ${err instanceof Error ? err.message : String(err)}`,
        { statusCode: 504, retryable: true }
      );
    }

    if (!res.ok) {
      const text = await res.text();
      let parsed: unknown = null;
      try {
        parsed = JSON.parse(text);
      } catch {
        parsed = null;
      }
      const errorType = readErrorField(parsed, "type");
      const errorCode = readErrorField(parsed, "code");
      const errorMessage = readErrorField(parsed, "message");
      const requestId = res.headers.get("x-request-id") ?? undefined;
      const bodySnippet = (errorMessage ?? text).slice(0, 500);
      const isInvalidSchema = errorType === "invalid_request_error" && errorCode === "invalid_json_schema";
      const retryable = errorType !== "invalid_request_error";
      const statusCode = res.status;
      input.logger?.error(
        { evt: "inference.request_failed", purpose: input.purpose, statusCode, requestId, bodySnippet, errorType, errorCode },
        "inference.request_failed"
      );
      throw new InferenceProviderError(`OpenAI error ${statusCode}: ${bodySnippet}`, {
        statusCode,
        retryable,
        errorType,
        errorCode,
        retryAfterMs: isInvalidSchema ? undefined : parseRetryAfterMs(res.headers.get("retry-after")),
      });
    }

    const data: unknown = await res.json();
    const content = extractOutputText(data);
    if (!content) {
      throw new InferenceProviderError("OpenAI response missing content", {
        statusCode: 502,
        retryable: true,
      });
    }

    return { rawText: content, model };
  }
}
