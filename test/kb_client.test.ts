import { describe, it, expect } from "vitest";

import { silentLogger } from "../src/logger";
import { DEFAULT_KB_TOOL_NAME, KbClient, parseKbMatches, uniqueCitations } from "../src/tools/kb_client";
import { ScriptedToolInvoker, fails, returns } from "./helpers";

const ctx = { traceId: "trace-1" };

class FlakyListInvoker extends ScriptedToolInvoker {
  listTools(): Promise<string[]> {
    if (this.listCalls === 0) {
      this.listCalls += 1;
      throw new Error("gateway restarting");
    }
    return super.listTools();
  }
}

describe("parseKbMatches", () => {
  it("reads bare lists, matches and sources", () => {
    expect(parseKbMatches([{ id: "a", snippet: "Emergency funds", citation: "guide.pdf", score: 0.8 }])).toEqual([
      { id: "a", snippet: "Emergency funds", citation: "guide.pdf", score: 0.8 },
    ]);
    expect(parseKbMatches({ matches: [{ id: "b", text: "Budgeting 101" }] })).toEqual([
      { id: "b", snippet: "Budgeting 101", citation: "b", score: 0 },
    ]);
    expect(parseKbMatches({ sources: [{ text: "Saving tips", fileName: "tips.md" }, "noise", {}] })).toEqual([
      { id: "", snippet: "Saving tips", citation: "tips.md", score: 0 },
    ]);
    expect(parseKbMatches({ other: [] })).toEqual([]);
  });

  it("keeps citations unique in first-seen order", () => {
    expect(
      uniqueCitations([
        { id: "1", snippet: "x", citation: "a.pdf", score: 0 },
        { id: "2", snippet: "y", citation: "b.pdf", score: 0 },
        { id: "3", snippet: "z", citation: "a.pdf", score: 0 },
      ])
    ).toEqual(["a.pdf", "b.pdf"]);
  });
});

describe("KbClient", () => {
  it("skips retrieval without a knowledge base id", async () => {
    const invoker = new ScriptedToolInvoker();
    const kb = new KbClient({ invoker, knowledgeBaseId: "", log: silentLogger });

    const result = await kb.retrieve("budget", { intent: "summary" }, ctx);

    expect(result).toEqual({ matches: [], citations: [], filters: { intent: "summary" }, reasonCodes: ["kb_disabled"] });
    expect(invoker.listCalls).toBe(0);
  });

  it("resolves a prefixed tool name once and reuses it", async () => {
    const invoker = new ScriptedToolInvoker(
      {
        "gateway___retrieve-from-kb": returns({ sources: [{ id: "doc-1", text: "Keep three months of spending aside.", citation: "safety.md", score: 0.9 }] }),
      },
      ["spend-analytics", "gateway___retrieve-from-kb"]
    );
    const kb = new KbClient({ invoker, knowledgeBaseId: "kb-test", log: silentLogger });

    const first = await kb.retrieve("emergency fund", {}, ctx);
    await kb.retrieve("emergency fund", {}, ctx);

    expect(invoker.listCalls).toBe(1);
    expect(invoker.calls[0]?.name).toBe("gateway___retrieve-from-kb");
    expect(invoker.calls[0]?.args).toEqual({ query: "emergency fund", knowledgeBaseId: "kb-test", n: 3 });
    expect(first.citations).toEqual(["safety.md"]);
    expect(first.matches[0]?.snippet).toBe("Keep three months of spending aside.");
    expect(first.reasonCodes).toEqual([]);
  });

  it("looks the tool name up again after a listing that threw synchronously", async () => {
    const invoker = new FlakyListInvoker(
      { "gateway___retrieve-from-kb": returns([{ id: "doc-2", text: "Pay down high-interest debt first." }]) },
      ["gateway___retrieve-from-kb"]
    );
    const kb = new KbClient({ invoker, knowledgeBaseId: "kb-test", log: silentLogger });

    const first = await kb.retrieve("debt", {}, ctx);
    const second = await kb.retrieve("debt", {}, ctx);

    expect(first.reasonCodes).toEqual(["kb_unavailable"]);
    expect(second.reasonCodes).toEqual([]);
    expect(second.citations).toEqual(["doc-2"]);
    expect(invoker.listCalls).toBe(2);
    expect(invoker.calledTools()).toEqual([DEFAULT_KB_TOOL_NAME, "gateway___retrieve-from-kb"]);
  });

  it("falls back to the default tool name when none matches", async () => {
    const invoker = new ScriptedToolInvoker({ [DEFAULT_KB_TOOL_NAME]: returns([]) }, ["spend-analytics"]);
    const kb = new KbClient({ invoker, knowledgeBaseId: "kb-test", log: silentLogger });

    const result = await kb.retrieve("x", {}, ctx);

    expect(invoker.calledTools()).toEqual(["retrieve_from_aws_kb"]);
    expect(result.matches).toEqual([]);
  });

  it("marks the knowledge base unavailable when the call fails", async () => {
    const invoker = new ScriptedToolInvoker({ kb_search: fails(new Error("gateway down")) });
    const kb = new KbClient({ invoker, knowledgeBaseId: "kb-test", toolName: "kb_search", log: silentLogger });

    const result = await kb.retrieve("x", {}, ctx);

    expect(result.reasonCodes).toEqual(["kb_unavailable"]);
    expect(invoker.listCalls).toBe(0);
  });
});
