import { describe, it, expect } from "vitest";

import { silentLogger } from "../src/logger";
import { JsonRpcToolClient, ToolCallError, unwrapToolResult } from "../src/tools/tool_client";

type Captured = { url: string; headers: Headers; body: unknown };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function scriptedFetch(responses: Array<Response | Error>) {
  const captured: Captured[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    captured.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: JSON.parse(String(init?.body)),
    });
    const next = responses.shift();
    if (!next) throw new Error("no scripted response left");
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetchImpl, captured };
}

function client(fetchImpl: typeof fetch, sleeps: number[] = [], overrides: { maxRetries?: number; timeoutMs?: number } = {}) {
  return new JsonRpcToolClient({
    endpoint: "http://tools.internal/rpc",
    timeoutMs: overrides.timeoutMs ?? 1000,
    maxRetries: overrides.maxRetries ?? 1,
    retryBaseMs: 100,
    log: silentLogger,
    fetchImpl,
    sleepImpl: async (ms) => {
      sleeps.push(ms);
    },
  });
}

async function toolError(promise: Promise<unknown>): Promise<ToolCallError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(err instanceof ToolCallError)) throw new Error(`expected ToolCallError, got ${String(err)}`);
  return err;
}

const ctx = { traceId: "trace-1", userToken: "test-token" };

describe("JsonRpcToolClient.call", () => {
  it("posts a tools/call request and returns structured content", async () => {
    const { fetchImpl, captured } = scriptedFetch([
      jsonResponse({ jsonrpc: "2.0", id: 1, result: { structuredContent: { total_income: 1000 } } }),
    ]);

    const result = await client(fetchImpl).call("spend-analytics", { user_id: "u1", range: "30d" }, ctx);

    expect(result).toEqual({ total_income: 1000 });
    expect(captured).toHaveLength(1);
    expect(captured[0]?.url).toBe("http://tools.internal/rpc");
    expect(captured[0]?.body).toEqual({
      jsonrpc: "2.0",
      id: 1,
      method: "tools/call",
      params: { name: "spend-analytics", arguments: { user_id: "u1", range: "30d" } },
    });
    expect(captured[0]?.headers.get("x-trace-id")).toBe("trace-1");
    expect(captured[0]?.headers.get("authorization")).toBe("Bearer test-token");
  });

  it("parses labelled JSON from text content", async () => {
    const { fetchImpl } = scriptedFetch([
      jsonResponse({
        jsonrpc: "2.0",
        id: 1,
        result: { content: [{ type: "text", text: 'Sources: [{"id":"doc-1","text":"Budget basics"}]' }] },
      }),
    ]);

    const result = await client(fetchImpl).call("retrieve_from_aws_kb", { query: "budget" }, ctx);

    expect(result).toEqual([{ id: "doc-1", text: "Budget basics" }]);
  });

  it("retries a 5xx response with backoff", async () => {
    const sleeps: number[] = [];
    const { fetchImpl, captured } = scriptedFetch([
      jsonResponse({ message: "unavailable" }, 503),
      jsonResponse({ jsonrpc: "2.0", id: 2, result: { structuredContent: { ok: true } } }),
    ]);

    const result = await client(fetchImpl, sleeps).call("anomaly-signals", {}, ctx);

    expect(result).toEqual({ ok: true });
    expect(captured).toHaveLength(2);
    expect(sleeps).toEqual([100]);
  });

  it("gives up after the retry budget on transport errors", async () => {
    const sleeps: number[] = [];
    const { fetchImpl, captured } = scriptedFetch([
      new TypeError("fetch failed"),
      new TypeError("fetch failed"),
      new TypeError("fetch failed"),
    ]);

    const err = await toolError(client(fetchImpl, sleeps, { maxRetries: 2 }).call("anomaly-signals", {}, ctx));

    expect(err.kind).toBe("transport");
    expect(err.retryable).toBe(true);
    expect(err.message).toBe("anomaly-signals transport error: fetch failed");
    expect(captured).toHaveLength(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it("does not retry a 4xx response", async () => {
    const sleeps: number[] = [];
    const { fetchImpl, captured } = scriptedFetch([jsonResponse({ message: "forbidden" }, 403)]);

    const err = await toolError(client(fetchImpl, sleeps).call("risk-profile-non-investment", {}, ctx));

    expect(err.kind).toBe("http_4xx");
    expect(err.statusCode).toBe(403);
    expect(err.message).toBe("risk-profile-non-investment rejected with 403");
    expect(captured).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it("surfaces JSON-RPC errors", async () => {
    const { fetchImpl } = scriptedFetch([
      jsonResponse({ jsonrpc: "2.0", id: 1, error: { code: -32601, message: "method not found" } }),
    ]);

    const err = await toolError(client(fetchImpl).call("goal-feasibility", {}, ctx));

    expect(err.kind).toBe("rpc_error");
    expect(err.message).toBe("goal-feasibility: method not found");
    expect(err.toJSON()).toEqual({
      error: "tool_error",
      tool: "goal-feasibility",
      error_kind: "rpc_error",
      retryable: false,
      message: "goal-feasibility: method not found",
    });
  });

  it("reports a timeout when the call outlives its budget", async () => {
    const fetchImpl: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });

    const err = await toolError(client(fetchImpl, [], { timeoutMs: 20 }).call("cashflow-forecast", {}, ctx));

    expect(err.kind).toBe("timeout");
    expect(err.message).toBe("cashflow-forecast timed out");
  });

  it("fails without an endpoint", async () => {
    const noEndpoint = new JsonRpcToolClient({
      endpoint: "",
      timeoutMs: 1000,
      maxRetries: 0,
      retryBaseMs: 100,
      log: silentLogger,
    });

    const err = await toolError(noEndpoint.call("spend-analytics", {}, ctx));

    expect(err.kind).toBe("transport");
    expect(err.message).toBe("tool gateway endpoint is not configured");
  });
});

describe("JsonRpcToolClient.listTools", () => {
  it("returns only named tools", async () => {
    const { fetchImpl, captured } = scriptedFetch([
      jsonResponse({ jsonrpc: "2.0", id: 1, result: { tools: [{ name: "spend-analytics" }, { title: "x" }, { name: "gw___retrieve-from-kb" }] } }),
    ]);

    const names = await client(fetchImpl).listTools(ctx);

    expect(names).toEqual(["spend-analytics", "gw___retrieve-from-kb"]);
    expect(captured[0]?.body).toMatchObject({ method: "tools/list", params: {} });
  });
});

describe("unwrapToolResult", () => {
  it("turns an isError result into an rpc error", () => {
    expect(() =>
      unwrapToolResult("spend-analytics", { isError: true, content: [{ type: "text", text: "boom" }] })
    ).toThrow("tool reported an error: boom");
  });

  it("rejects text content that is not JSON", () => {
    expect(() => unwrapToolResult("spend-analytics", { content: [{ type: "text", text: "hello" }] })).toThrow(
      "tool content is not JSON"
    );
  });

  it("passes a plain object result through", () => {
    expect(unwrapToolResult("spend-analytics", { total_spend: 5 })).toEqual({ total_spend: 5 });
  });
});
