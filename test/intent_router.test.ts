import { describe, it, expect } from "vitest";

import type { ClarifyingQuestion } from "../src/contracts/intent";
import { loadAdvisorConfig } from "../src/control-plane/advisor_config";
import { silentLogger } from "../src/logger";
import { FakeInferenceProvider } from "../src/providers/fake_model";
import { buildExtractionPrompt, extractIntent, sanitizeExtractionPayload } from "../src/router/extractor";
import { routeIntent } from "../src/router/intent_router";
import { MemoryClarificationStore } from "../src/store/clarification_store";

const routerConfig = loadAdvisorConfig({}).router;

const planningOrScenario: ClarifyingQuestion = {
  question_id: "planning_vs_scenario",
  question_text: "Do you want to build a savings plan or compare what-if scenarios?",
  options: ["Build a savings plan", "Compare what-if scenarios"],
  max_questions: 2,
};

describe("sanitizeExtractionPayload", () => {
  it("coerces numeric slots and drops unusable ones", () => {
    const payload = sanitizeExtractionPayload({
      intent: "planning",
      confidence: 0.8,
      top2: [
        { intent: "planning", score: 0.8 },
        { intent: "out_of_scope", score: 0.3 },
      ],
      slots: {
        horizon_months: "6.4",
        target_amount: "-5",
        risk_appetite: "Aggressive",
        lookback_days: "abc",
        note: null,
        city: "Hanoi",
      },
    });

    expect(payload.slots).toEqual({ horizon_months: 6, risk_appetite: "aggressive", city: "Hanoi" });
    expect(payload.domain_relevance).toBe(0.7);
    expect(payload.sub_intent).toBe("");
    expect(payload.schema_version).toBe("intent_extraction_v1");
  });

  it("derives domain relevance from the intent when nothing else is given", () => {
    expect(sanitizeExtractionPayload({ intent: "out_of_scope" }).domain_relevance).toBe(0.2);
    expect(sanitizeExtractionPayload({ intent: "risk", confidence: 0.65 }).domain_relevance).toBe(0.65);
    expect(sanitizeExtractionPayload({ intent: "risk" }).domain_relevance).toBe(0.5);
    expect(sanitizeExtractionPayload({ intent: "risk", domain_relevance: 1.7 }).domain_relevance).toBe(1);
  });
});

describe("extractIntent", () => {
  it("retries once and reports every failed attempt", async () => {
    const provider = new FakeInferenceProvider({
      replies: { intent_extraction: ["not json at all", '{"intent":"summary"}'] },
    });

    const outcome = await extractIntent({ provider, prompt: "hello", retryAttempts: 1, log: silentLogger });

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(2);
    expect(outcome.errors.slice(0, 2)).toEqual(["invalid_json", "invalid_schema"]);
    expect(outcome.errors.slice(2).every((code) => code.startsWith("schema:"))).toBe(true);
  });

  it("records provider failures by error name", async () => {
    const provider = new FakeInferenceProvider({
      replies: { intent_extraction: [new TypeError("socket hang up")] },
    });

    const outcome = await extractIntent({ provider, prompt: "Summarize my spending", retryAttempts: 1, log: silentLogger });

    expect(outcome.ok).toBe(true);
    expect(outcome.errors).toEqual(["invoke_error:TypeError"]);
    expect(outcome.attempts).toBe(2);
  });

  it("includes the earlier question when the prompt answers it", () => {
    const text = buildExtractionPrompt("the first one", {
      question: planningOrScenario,
      previousPrompt: "I want to save money",
    });
    const lines = text.split("\n");

    expect(lines.slice(-4)).toEqual([
      "Earlier the user asked: I want to save money",
      "We asked: Do you want to build a savings plan or compare what-if scenarios? Options: Build a savings plan | Compare what-if scenarios",
      "Treat the prompt below as the answer to that question.",
      "User prompt: the first one",
    ]);
  });
});

describe("routeIntent", () => {
  it("applies the anomaly override on top of the extraction", async () => {
    const provider = new FakeInferenceProvider();

    const outcome = await routeIntent({
      prompt: "Show me any fraud on my spending",
      config: routerConfig,
      provider,
      pending: { round: 0 },
      log: silentLogger,
    });

    expect(outcome.extraction?.intent).toBe("risk");
    expect(outcome.decision.final_intent).toBe("risk");
    expect(outcome.decision.reason_codes).toEqual(["intent_override:anomaly_to_risk"]);
    expect(outcome.decision.tool_bundle).toEqual(["spend-analytics", "anomaly-signals", "risk-profile-non-investment"]);
    expect(outcome.clarification).toEqual({ pending: false, round: 0, max_questions: 2 });
    expect(outcome.extractionAttempts).toBe(1);
  });

  it("asks the generic question when extraction keeps failing", async () => {
    const provider = new FakeInferenceProvider({
      replies: { intent_extraction: ["nope", "still nope"] },
    });

    const outcome = await routeIntent({
      prompt: "hmm",
      config: routerConfig,
      provider,
      pending: { round: 0 },
      log: silentLogger,
    });

    expect(outcome.decision.clarify_needed).toBe(true);
    expect(outcome.decision.final_intent).toBe("out_of_scope");
    expect(outcome.decision.fallback_used).toBe("extraction_failed");
    expect(outcome.decision.reason_codes).toEqual(["extraction_failed", "invalid_json", "invalid_json"]);
    expect(outcome.decision.clarifying_question?.question_id).toBe("generic_intent");
    expect(outcome.clarification.pending).toBe(true);
    expect(outcome.clarification.round).toBe(1);
    expect(outcome.extraction).toBeUndefined();
  });

  it("settles an exact option reply without another model call", async () => {
    const provider = new FakeInferenceProvider();

    const outcome = await routeIntent({
      prompt: "Build a savings plan",
      config: routerConfig,
      provider,
      pending: { round: 1, question: planningOrScenario, previousPrompt: "I want to save money" },
      log: silentLogger,
    });

    expect(provider.calls).toHaveLength(0);
    expect(outcome.decision.final_intent).toBe("planning");
    expect(outcome.decision.clarify_needed).toBe(false);
    expect(outcome.extraction?.reason).toBe("clarification_answer");
    expect(outcome.clarification).toEqual({ pending: false, round: 1, max_questions: 2 });
  });

  it("uses keyword routing in rule mode", async () => {
    const provider = new FakeInferenceProvider();

    const outcome = await routeIntent({
      prompt: "Give me a cashflow overview",
      config: { ...routerConfig, mode: "rule" },
      provider,
      pending: { round: 0 },
      log: silentLogger,
    });

    expect(provider.calls).toHaveLength(0);
    expect(outcome.decision.source).toBe("rule");
    expect(outcome.decision.final_intent).toBe("summary");
    expect(outcome.decision.reason_codes).toEqual(["rule_router"]);
    expect(outcome.extractionAttempts).toBe(0);
  });

  it("serves the rule decision and keeps the semantic one as shadow", async () => {
    const provider = new FakeInferenceProvider({
      replies: {
        intent_extraction: [
          JSON.stringify({
            intent: "planning",
            confidence: 0.9,
            top2: [
              { intent: "planning", score: 0.9 },
              { intent: "summary", score: 0.2 },
            ],
          }),
        ],
      },
    });

    const outcome = await routeIntent({
      prompt: "Give me a cashflow overview",
      config: { ...routerConfig, mode: "semantic_shadow" },
      provider,
      pending: { round: 0 },
      log: silentLogger,
    });

    expect(outcome.decision.final_intent).toBe("summary");
    expect(outcome.decision.source).toBe("rule");
    expect(outcome.shadowDecision?.final_intent).toBe("planning");
    expect(outcome.shadowDecision?.source).toBe("semantic");
  });
});

describe("MemoryClarificationStore", () => {
  it("counts rounds per conversation and clears on resolve", async () => {
    const store = new MemoryClarificationStore();

    await store.recordQuestion({ conversationId: "c1", question: planningOrScenario, prompt: "save money", intent: "planning" });
    const second = await store.recordQuestion({ conversationId: "c1", question: planningOrScenario, prompt: "save money", intent: "planning" });

    expect(second.round).toBe(2);
    expect(second.pending).toBe(true);
    expect(await store.get("c2")).toBeNull();

    await store.resolve("c1");
    expect(await store.get("c1")).toBeNull();
  });

  it("expires records after the ttl", async () => {
    let now = Date.parse("2026-01-01T00:00:00.000Z");
    const store = new MemoryClarificationStore({ ttlMs: 1000, now: () => now });

    await store.recordQuestion({ conversationId: "c1", question: planningOrScenario, prompt: "x", intent: "summary" });
    now += 1000;
    expect((await store.get("c1"))?.round).toBe(1);
    now += 1;
    expect(await store.get("c1")).toBeNull();
  });

  it("drops abandoned conversations when new questions are recorded", async () => {
    let now = Date.parse("2026-01-01T00:00:00.000Z");
    const store = new MemoryClarificationStore({ ttlMs: 1000, now: () => now });

    for (let i = 0; i < 50; i++) {
      await store.recordQuestion({ conversationId: `old-${i}`, question: planningOrScenario, prompt: "x", intent: "planning" });
    }
    expect(store.size).toBe(50);

    now += 1001;
    await store.recordQuestion({ conversationId: "fresh", question: planningOrScenario, prompt: "y", intent: "planning" });

    expect(store.size).toBe(1);
    expect((await store.get("fresh"))?.round).toBe(1);
  });
});
