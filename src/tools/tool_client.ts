import { setTimeout as sleep } from "node:timers/promises";

import type { ToolErrorKind } from "../contracts/tool_outputs";
import type { Logger } from "../logger";

export type ToolCallContext = {
  traceId: string;
  userToken?: string;
  signal?: AbortSignal;
};

/** Anything that can run a named tool and hand back its JSON result. */
export interface ToolInvoker {
  call(name: string, args: Record<string, unknown>, ctx: ToolCallContext): Promise<unknown>;
  listTools(ctx: ToolCallContext): Promise<string[]>;
}

export class ToolCallError extends Error {
  readonly kind: ToolErrorKind;
  readonly retryable: boolean;
  readonly statusCode?: number;
  readonly tool: string;

  constructor(
    message: string,
    args: { kind: ToolErrorKind; tool: string; retryable?: boolean; statusCode?: number }
  ) {
    super(message);
    this.name = "ToolCallError";
    this.kind = args.kind;
    this.tool = args.tool;
    this.retryable = args.retryable ?? false;
    this.statusCode = args.statusCode;
  }

  toJSON() {
    return {
      error: "tool_error",
      tool: this.tool,
      error_kind: this.kind,
      retryable: this.retryable,
      ...(this.statusCode ? { statusCode: this.statusCode } : {}),
      message: this.message,
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Text items may carry a label before the JSON, e.g. `Sources: [...]`. */
function parseContentText(text: string): unknown {
  const direct = parseJsonText(text);
  if (direct !== undefined) return direct;
  const labelled = text.match(/^\s*[A-Za-z][A-Za-z _-]{0,40}:\s*([[{][\s\S]*)$/);
  return labelled ? parseJsonText(labelled[1]) : undefined;
}

/**
 * Pull the tool payload out of a `tools/call` result: structured content
 * first, then the first text item that parses as JSON.
 */
export function unwrapToolResult(tool: string, result: unknown): unknown {
  if (!isRecord(result)) {
    throw new ToolCallError("tool returned no result object", { kind: "invalid_output", tool });
  }
  if (result.isError === true) {
    const detail = Array.isArray(result.content)
      ? result.content.map((item) => (isRecord(item) && typeof item.text === "string" ? item.text : "")).join(" ")
      : "";
    throw new ToolCallError(`tool reported an error: ${detail.slice(0, 200)}`.trim(), { kind: "rpc_error", tool });
  }
  if (isRecord(result.structuredContent)) return result.structuredContent;
  if (Array.isArray(result.content)) {
    for (const item of result.content) {
      if (!isRecord(item) || typeof item.text !== "string") continue;
      const parsed = parseContentText(item.text);
      if (parsed !== undefined) return parsed;
    }
    throw new ToolCallError("tool content is not JSON", { kind: "invalid_output", tool });
  }
  return result;
}

/** Per-call abort: fires on the call timeout or when the caller's signal aborts. */
function linkedSignal(timeoutMs: number, parent?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error("tool call timed out")), timeoutMs);
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) controller.abort(parent.reason);
    else parent.addEventListener("abort", onParentAbort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

export type JsonRpcToolClientOptions = {
  endpoint: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  log: Logger;
  fetchImpl?: typeof fetch;
  sleepImpl?: (ms: number) => Promise<unknown>;
};

/**
 * JSON-RPC 2.0 client for the analytics tool gateway. Transport errors and
 * 5xx responses are retried with exponential backoff; 4xx, RPC errors and
 * timeouts are not.
 */
export class JsonRpcToolClient implements ToolInvoker {
  private nextId = 1;

  constructor(private readonly opts: JsonRpcToolClientOptions) {}

  async call(name: string, args: Record<string, unknown>, ctx: ToolCallContext): Promise<unknown> {
    const result = await this.rpc(name, "tools/call", { name, arguments: args }, ctx);
    return unwrapToolResult(name, result);
  }

  async listTools(ctx: ToolCallContext): Promise<string[]> {
    const result = await this.rpc("tools/list", "tools/list", {}, ctx);
    if (!isRecord(result) || !Array.isArray(result.tools)) return [];
    return result.tools
      .map((tool) => (isRecord(tool) && typeof tool.name === "string" ? tool.name : ""))
      .filter(Boolean);
  }

  private async rpc(
    label: string,
    method: string,
    params: Record<string, unknown>,
    ctx: ToolCallContext
  ): Promise<unknown> {
    const sleepImpl = this.opts.sleepImpl ?? sleep;
    let lastError: ToolCallError | undefined;

    for (let attempt = 0; attempt <= this.opts.maxRetries; attempt++) {
      if (attempt > 0) {
        const delayMs = this.opts.retryBaseMs * 2 ** (attempt - 1);
        this.opts.log.debug({ evt: "tool.retry", tool: label, attempt, delayMs }, "tool.retry");
        await sleepImpl(delayMs);
      }
      try {
        return await this.once(label, method, params, ctx);
      } catch (err) {
        if (!(err instanceof ToolCallError)) throw err;
        lastError = err;
        if (!err.retryable || ctx.signal?.aborted) throw err;
      }
    }
    throw lastError ?? new ToolCallError("tool call failed", { kind: "transport", tool: label });
  }

  private async once(
    label: string,
    method: string,
    params: Record<string, unknown>,
    ctx: ToolCallContext
  ): Promise<unknown> {
    if (!this.opts.endpoint) {
      throw new ToolCallError("tool gateway endpoint is not configured", { kind: "transport", tool: label });
    }
    const fetchImpl = this.opts.fetchImpl ?? fetch;
    const { signal, dispose } = linkedSignal(this.opts.timeoutMs, ctx.signal);
    const id = this.nextId++;

    let res: Response;
    try {
      res = await fetchImpl(this.opts.endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          "x-trace-id": ctx.traceId,
          ...(ctx.userToken ? { authorization: `Bearer ${ctx.userToken}` } : {}),
        },
        body: JSON.stringify({ jsonrpc: "2.0", id, method, params }),
        signal,
      });
    } catch (err) {
      dispose();
      if (signal.aborted) {
        throw new ToolCallError(`${label} timed out`, { kind: "timeout", tool: label });
      }
      throw new ToolCallError(`${label} transport error: ${err instanceof Error ? err.message : String(err)}`, {
        kind: "transport",
        tool: label,
        retryable: true,
      });
    }

    try {
      if (res.status >= 500) {
        throw new ToolCallError(`${label} gateway error ${res.status}`, {
          kind: "http_5xx",
          tool: label,
          retryable: true,
          statusCode: res.status,
        });
      }
      if (!res.ok) {
        throw new ToolCallError(`${label} rejected with ${res.status}`, {
          kind: "http_4xx",
          tool: label,
          statusCode: res.status,
        });
      }
      const text = await res.text();
      const body = parseJsonText(text);
      if (!isRecord(body)) {
        throw new ToolCallError(`${label} returned a non-JSON body`, { kind: "invalid_output", tool: label });
      }
      if (isRecord(body.error)) {
        const message = typeof body.error.message === "string" ? body.error.message : "rpc error";
        throw new ToolCallError(`${label}: ${message}`, { kind: "rpc_error", tool: label });
      }
      return body.result;
    } catch (err) {
      if (err instanceof ToolCallError) throw err;
      if (signal.aborted) {
        throw new ToolCallError(`${label} timed out`, { kind: "timeout", tool: label });
      }
      throw new ToolCallError(`${label} read error: ${err instanceof Error ? err.message : String(err)}`, {
        kind: "transport",
        tool: label,
        retryable: true,
      });
    } finally {
      dispose();
    }
  }
}
