import { describe, it, expect } from "vitest";

import { buildAdvisorDeps } from "../src/app";
import { loadAdvisorConfig } from "../src/control-plane/advisor_config";
import { runAdvisoryPipeline, type AdvisorDeps } from "../src/control-plane/orchestrator";
import { extractNumericTokens } from "../src/gates/grounding_validator";
import { silentLogger } from "../src/logger";
import { FakeInferenceProvider } from "../src/providers/fake_model";
import { MemoryClarificationStore, type ClarificationStore } from "../src/store/clarification_store";
import { ADMISSION_FAIL_FAST_MESSAGE, EMPTY_PROMPT_MESSAGE, INTERNAL_ERROR_MESSAGE } from "../src/synthesis/renderer";
import { MemoryAuditSink, type AuditSink } from "../src/tools/audit_sink";
import { ToolCallError } from "../src/tools/tool_client";
import { ANOMALY_90D, RISK_PROFILE_180D, ScriptedToolInvoker, fails, returns, summaryHandlers } from "./helpers";

type Env = Record<string, string | undefined>;

function deps(env: Env, overrides: Partial<AdvisorDeps> = {}): AdvisorDeps {
  return buildAdvisorDeps(loadAdvisorConfig(env), {
    log: silentLogger,
    provider: new FakeInferenceProvider(),
    invoker: new ScriptedToolInvoker(summaryHandlers()),
    audit: new MemoryAuditSink(),
    clarifications: new MemoryClarificationStore(),
    ...overrides,
  });
}

const SUMMARY_FACTS_ONLY = [
  "Here is what your verified data shows:",
  "- Total income (30d): 20,000,000 VND",
  "- Total spending (30d): 24,500,000 VND",
  "- Net cashflow (30d): -4,500,000 VND",
  "- Forecast average income per period (weekly_12): 5,000,000 VND",
  "- Forecast average spending per period (weekly_12): 5,500,000 VND",
  "",
  "Suggested next steps:",
  "1. Stabilise cashflow over the next two weeks",
  "2. Rebalance the priority allocation jar",
  "",
  "Educational guidance only. We do not provide investment advice.",
].join("\n");

function ambiguousPlanning(): string {
  return JSON.stringify({
    intent: "planning",
    confidence: 0.6,
    domain_relevance: 0.9,
    top2: [
      { intent: "planning", score: 0.6 },
      { intent: "scenario", score: 0.55 },
    ],
  });
}

describe("runAdvisoryPipeline", () => {
  it("answers a cashflow overview from a validated plan", async () => {
    const invoker = new ScriptedToolInvoker(summaryHandlers());
    const d = deps({}, { invoker });

    const res = await runAdvisoryPipeline({ prompt: "Give me a cashflow overview", userId: "user-1", traceId: "trace-1" }, d);

    expect(res.response_meta.kind).toBe("answer");
    expect(res.response).toBe(
      [
        "Total income: 20,000,000 VND.",
        "Total spending: 24,500,000 VND.",
        "Net cashflow: -4,500,000 VND.",
        "",
        "Key metrics:",
        "- Total income: 20,000,000 VND",
        "",
        "Recommended actions:",
        "1. Stabilise cashflow over the next two weeks.",
        "2. Rebalance the priority allocation jar.",
        "",
        "Educational guidance only. We do not provide investment advice.",
      ].join("\n")
    );
    expect(res.trace_id).toBe("trace-1");
    expect(res.tool_calls).toEqual(["spend-analytics", "cashflow-forecast", "jar-allocation-suggest"]);
    expect(res.routing_meta.final_intent).toBe("summary");
    expect(res.routing_meta.source).toBe("semantic");
    expect(res.response_meta.synthesis_attempts).toBe(1);
    expect(res.response_meta.synthesis_valid).toBe(true);
    expect(res.response_meta.fallback_used).toBe(false);
    expect(res.response_meta.reason_codes).toEqual(["kb_disabled"]);
    expect(invoker.calls.every((call) => call.ctx.traceId === "trace-1")).toBe(true);
  });

  it("renders facts only in template mode without calling the model for synthesis", async () => {
    const provider = new FakeInferenceProvider();
    const d = deps({ RESPONSE_MODE: "template" }, { provider });

    const res = await runAdvisoryPipeline({ prompt: "Give me a cashflow overview", userId: "user-1" }, d);

    expect(res.response_meta.kind).toBe("facts_only");
    expect(res.response).toBe(SUMMARY_FACTS_ONLY);
    expect(res.response_meta.fallback_used).toBe(false);
    expect(res.response_meta.synthesis_attempts).toBe(0);
    expect(res.response_meta.synthesis_valid).toBeUndefined();
    expect(provider.callsFor("answer_synthesis")).toHaveLength(0);
  });

  it("runs synthesis in shadow mode but serves facts only", async () => {
    const provider = new FakeInferenceProvider();
    const d = deps({ RESPONSE_MODE: "llm_shadow" }, { provider });

    const res = await runAdvisoryPipeline({ prompt: "Give me a cashflow overview", userId: "user-1" }, d);

    expect(res.response_meta.kind).toBe("facts_only");
    expect(res.response).toBe(SUMMARY_FACTS_ONLY);
    expect(res.response_meta.synthesis_valid).toBe(true);
    expect(res.response_meta.fallback_used).toBe(false);
    expect(provider.callsFor("answer_synthesis")).toHaveLength(1);
  });

  it("falls back to facts only when every synthesis attempt fails validation", async () => {
    const provider = new FakeInferenceProvider({
      replies: { answer_synthesis: ["not json", "still not json", "nope"] },
    });
    const d = deps({}, { provider });

    const res = await runAdvisoryPipeline({ prompt: "Give me a cashflow overview", userId: "user-1" }, d);

    expect(res.response_meta.kind).toBe("facts_only");
    expect(res.response).toBe(SUMMARY_FACTS_ONLY);
    expect(res.response_meta.synthesis_valid).toBe(false);
    expect(res.response_meta.fallback_used).toBe(true);
  });

  it("routes fraud questions to risk and keeps going when one tool fails", async () => {
    const invoker = new ScriptedToolInvoker({
      "spend-analytics": fails(
        new ToolCallError("spend-analytics gateway error 503", { kind: "http_5xx", tool: "spend-analytics", retryable: true })
      ),
      "anomaly-signals": returns(ANOMALY_90D),
      "risk-profile-non-investment": returns(RISK_PROFILE_180D),
    });
    const d = deps({ RESPONSE_MODE: "template" }, { invoker });

    const res = await runAdvisoryPipeline({ prompt: "Show me any fraud on my spending", userId: "user-1" }, d);

    expect(res.routing_meta.final_intent).toBe("risk");
    expect(res.routing_meta.tool_bundle).toEqual(["spend-analytics", "anomaly-signals", "risk-profile-non-investment"]);
    expect(res.response_meta.kind).toBe("facts_only");
    expect(res.response.split("\n")[1]).toBe("- Anomaly flag count (90d): 2");
    expect(res.response_meta.tool_errors).toEqual({
      "spend-analytics": { error_kind: "http_5xx", message: "spend-analytics gateway error 503" },
    });
    expect(res.response_meta.reason_codes).toEqual([
      "intent_override:anomaly_to_risk",
      "tool_error:spend-analytics",
      "kb_disabled",
    ]);
  });

  it("answers a flagged anomaly from anomaly facts alone without raw numbers", async () => {
    const invoker = new ScriptedToolInvoker({
      "anomaly-signals": returns({ flags: ["abnormal_spend"], lookback_days: 90 }),
    });
    const d = deps({}, { invoker });

    const res = await runAdvisoryPipeline({ prompt: "anomaly flagged", userId: "user-1" }, d);

    expect(res.routing_meta.final_intent).toBe("risk");
    expect(Object.keys(res.response_meta.tool_errors).sort()).toEqual(["risk-profile-non-investment", "spend-analytics"]);
    expect(res.response_meta.kind).toBe("answer");
    expect(res.response_meta.synthesis_valid).toBe(true);
    expect(res.response_meta.validation_errors).toEqual([]);
    expect(res.response.split("\n").slice(0, 3)).toEqual([
      "Anomaly flag count: 1.",
      "Main anomaly flag: abnormal_spend.",
      "Highlighted anomaly flags: abnormal_spend.",
    ]);
    expect([...extractNumericTokens(res.response)]).toEqual(["1"]);
  });

  it("refuses a buy request after the suitability guard and calls nothing else", async () => {
    const invoker = new ScriptedToolInvoker({
      "suitability-guard": returns({
        allow: false,
        decision: "deny_recommendation",
        required_disclaimer: "Education only. Not investment advice.",
      }),
      "risk-profile-non-investment": returns(RISK_PROFILE_180D),
    });
    const d = deps({}, { invoker });

    const res = await runAdvisoryPipeline({ prompt: "Should I buy Tesla stock now?", userId: "user-1" }, d);

    expect(res.response_meta.kind).toBe("refusal");
    expect(res.response).toBe(
      [
        "We can't help with buying, selling or trading specific investments.",
        "We can review your cashflow, risks and savings goals instead.",
        "Policy decision: deny_recommendation.",
        "",
        "Education only. Not investment advice.",
      ].join("\n")
    );
    expect(res.disclaimer).toBe("Education only. Not investment advice.");
    expect(res.tool_calls).toEqual(["suitability-guard"]);
    expect(invoker.calls[0]?.args).toMatchObject({ requested_action: "recommend_buy", intent: "invest" });
    expect(res.response_meta.reason_codes).toEqual(["policy_refusal:deny_recommendation"]);
    expect(res.response_meta.fallback_used).toBe(false);
  });

  it("asks at most twice and then proceeds with the extracted intent", async () => {
    const provider = new FakeInferenceProvider({
      replies: { intent_extraction: [ambiguousPlanning(), ambiguousPlanning(), ambiguousPlanning()] },
    });
    const clarifications = new MemoryClarificationStore();
    const d = deps(
      { RESPONSE_MODE: "template" },
      { provider, clarifications, invoker: new ScriptedToolInvoker({}) }
    );
    const input = { userId: "user-1", conversationId: "conv-1" };

    const first = await runAdvisoryPipeline({ ...input, prompt: "Help me think about next year" }, d);
    expect(first.response_meta.kind).toBe("clarification");
    expect(first.routing_meta.clarification_question_id).toBe("planning_vs_scenario");
    expect(first.routing_meta.clarification_round).toBe(1);
    expect(first.response).toBe(
      [
        "Do you want to build a savings plan or compare what-if scenarios?",
        "- Build a savings plan",
        "- Compare what-if scenarios",
      ].join("\n")
    );
    expect(first.tool_calls).toEqual([]);

    const second = await runAdvisoryPipeline({ ...input, prompt: "not sure yet" }, d);
    expect(second.response_meta.kind).toBe("clarification");
    expect(second.routing_meta.clarification_round).toBe(2);

    const third = await runAdvisoryPipeline({ ...input, prompt: "still not sure" }, d);
    expect(third.response_meta.kind).toBe("facts_only");
    expect(third.routing_meta.final_intent).toBe("planning");
    expect(third.routing_meta.fallback_used).toBe("clarify_exhausted");
    expect(third.response.split("\n")[1]).toBe("- No verified data is available for this request yet.");
    expect(await clarifications.get("conv-1")).toBeNull();
  });

  it("asks which intent is meant when the top two tie", async () => {
    const provider = new FakeInferenceProvider({
      replies: {
        intent_extraction: [
          JSON.stringify({
            intent: "summary",
            confidence: 0.5,
            domain_relevance: 0.9,
            top2: [
              { intent: "summary", score: 0.5 },
              { intent: "invest", score: 0.5 },
            ],
          }),
        ],
      },
    });
    const invoker = new ScriptedToolInvoker(summaryHandlers());
    const d = deps({}, { provider, invoker });

    const res = await runAdvisoryPipeline({ prompt: "Tell me about my money", userId: "user-1" }, d);

    expect(res.response_meta.kind).toBe("clarification");
    expect(res.routing_meta.clarification_question_id).toBe("intent_pair:summary_vs_invest");
    expect(res.tool_calls).toEqual([]);
    expect(invoker.calls).toHaveLength(0);
  });

  it("turns a stage failure into an internal error and still audits it", async () => {
    const broken: ClarificationStore = {
      get: async () => {
        throw new Error("store offline");
      },
      recordQuestion: async () => {
        throw new Error("store offline");
      },
      resolve: async () => undefined,
    };
    const audit = new MemoryAuditSink();
    const d = deps({}, { clarifications: broken, audit });

    const res = await runAdvisoryPipeline(
      { prompt: "Give me a cashflow overview", userId: "user-1", conversationId: "conv-9", traceId: "trace-9" },
      d
    );

    expect(res.response_meta.kind).toBe("internal_error");
    expect(res.response_meta.error_bucket).toBe("extraction");
    expect(res.response).toBe(INTERNAL_ERROR_MESSAGE);
    expect(res.tool_calls).toEqual([]);
    expect(audit.records).toHaveLength(1);
    expect(audit.records[0]?.payload.error).toMatchObject({ stage: "routing" });
  });

  it("fails fast on unreadable input without calling the model", async () => {
    const provider = new FakeInferenceProvider();
    const d = deps({}, { provider });

    const res = await runAdvisoryPipeline({ prompt: "����", userId: "user-1" }, d);

    expect(res.response_meta.kind).toBe("admission_fail_fast");
    expect(res.response_meta.reason_codes).toEqual(["admission_fail_fast"]);
    expect(res.response).toBe(ADMISSION_FAIL_FAST_MESSAGE);
    expect(provider.calls).toHaveLength(0);
  });

  it("asks for a message when the prompt is only whitespace", async () => {
    const provider = new FakeInferenceProvider();
    const d = deps({}, { provider });

    const res = await runAdvisoryPipeline({ prompt: " \n\t ", userId: "user-1" }, d);

    expect(res.response_meta.kind).toBe("admission_fail_fast");
    expect(res.response_meta.reason_codes).toEqual(["empty_prompt"]);
    expect(res.response).toBe(EMPTY_PROMPT_MESSAGE);
    expect(provider.calls).toHaveLength(0);
  });

  it("writes one audit record per request", async () => {
    const audit = new MemoryAuditSink();
    const d = deps({ RESPONSE_MODE: "template" }, { audit });

    await runAdvisoryPipeline({ prompt: "Give me a cashflow overview", userId: "user-7", traceId: "trace-7" }, d);

    expect(audit.records).toHaveLength(1);
    expect(audit.records[0]).toMatchObject({
      user_id: "user-7",
      trace_id: "trace-7",
      payload: { intent: "summary", kind: "facts_only", response_mode: "template" },
    });
  });

  it("answers even when the audit sink is down", async () => {
    const audit: AuditSink = {
      write: async () => {
        throw new Error("audit offline");
      },
    };
    const d = deps({ RESPONSE_MODE: "template" }, { audit });

    const res = await runAdvisoryPipeline({ prompt: "Give me a cashflow overview", userId: "user-1" }, d);

    expect(res.response).toBe(SUMMARY_FACTS_ONLY);
  });
});
