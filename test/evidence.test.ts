import { describe, it, expect } from "vitest";

import type { Citation } from "../src/contracts/evidence";
import { parseToolOutput, type ToolOutputMap } from "../src/contracts/tool_outputs";
import { loadAdvisorConfig } from "../src/control-plane/advisor_config";
import { buildActionCandidates } from "../src/evidence/actions";
import { buildAdvisoryContext } from "../src/evidence/advisory_context";
import { buildEvidencePack, prioritizeAnomalyFlags } from "../src/evidence/facts";
import { average, fmtMoney, fmtPct, fmtSignedMoney, parseIntFromValue, safeFloat, sanitizeTimeframe } from "../src/evidence/format";
import { buildInsightContext, deriveInsights } from "../src/evidence/insights";
import { extractServiceSignals } from "../src/evidence/service_signals";
import { ANOMALY_90D, FORECAST_WEEKLY, JAR_ESSENTIALS, RISK_PROFILE_180D, SPEND_30D } from "./helpers";

const thresholds = loadAdvisorConfig({}).signals;
const unknownAppetite = { risk_appetite: "unknown" };

function evidence(intent: Parameters<typeof buildEvidencePack>[0]["intent"], toolOutputs: ToolOutputMap, kbMatches: Citation[] = []) {
  return buildEvidencePack({
    intent,
    toolOutputs,
    slots: {},
    kbMatches,
    citations: kbMatches.map((match) => match.citation),
    policyFlags: unknownAppetite,
    thresholds,
  });
}

describe("format helpers", () => {
  it("groups thousands and keeps cents only when present", () => {
    expect(fmtMoney(20_000_000)).toBe("20,000,000");
    expect(fmtMoney(1_234_567.891)).toBe("1,234,567.89");
    expect(fmtMoney(999.999)).toBe("1,000");
    expect(fmtMoney(-4_500_000)).toBe("-4,500,000");
    expect(fmtSignedMoney(250_000)).toBe("+250,000");
    expect(fmtSignedMoney(0)).toBe("+0");
  });

  it("renders ratios and whole percentages alike", () => {
    expect(fmtPct(0.1234)).toBe("12.34%");
    expect(fmtPct(27.5)).toBe("27.50%");
    expect(fmtPct(1)).toBe("100.00%");
  });

  it("coerces loose tool values", () => {
    expect(safeFloat("1,250,000")).toBe(1_250_000);
    expect(safeFloat(true)).toBeUndefined();
    expect(safeFloat(" ")).toBeUndefined();
    expect(parseIntFromValue("180d", 30)).toBe(180);
    expect(parseIntFromValue(undefined, 30)).toBe(30);
    expect(sanitizeTimeframe(" 30D ", "x")).toBe("30d");
    expect(sanitizeTimeframe("!!", "30d")).toBe("30d");
    expect(average([])).toBe(0);
  });
});

describe("buildEvidencePack", () => {
  it("extracts summary facts in tool order followed by service signals", () => {
    const pack = evidence("summary", {
      "spend-analytics": SPEND_30D,
      "cashflow-forecast": FORECAST_WEEKLY,
      "jar-allocation-suggest": JAR_ESSENTIALS,
    });

    expect(pack.facts.map((fact) => [fact.fact_id, fact.value_text])).toEqual([
      ["spend.total_income.30d", "20,000,000"],
      ["spend.total_spend.30d", "24,500,000"],
      ["spend.net_cashflow.30d", "-4,500,000"],
      ["forecast.avg_income.weekly_12", "5,000,000"],
      ["forecast.avg_spend.weekly_12", "5,500,000"],
      ["forecast.avg_net_p50.weekly_12", "-500,000"],
      ["jar.top.name", "Essentials"],
      ["jar.top.ratio", "55.00%"],
      ["jar.top.amount", "11,000,000"],
      ["service.signal.cashflow_negative", "cashflow_negative"],
      ["service.signal.cashflow_negative.sources", "spend.net_cashflow.30d"],
      ["service.signal.risk_unknown", "risk_unknown"],
      ["service.signal.count", "2"],
    ]);
    expect(pack.facts[2]).toEqual({
      fact_id: "spend.net_cashflow.30d",
      label: "Net cashflow",
      value: -4_500_000,
      value_text: "-4,500,000",
      unit: "VND",
      timeframe: "30d",
      source_tool: "spend-analytics",
      source_path: "net_cashflow",
    });
    expect(pack.reason_codes).toEqual([]);
  });

  it("derives net cashflow when the tool omits it", () => {
    const pack = evidence("summary", { "spend-analytics": { range: "60d", total_income: "3,000", total_spend: 1000 } });
    const net = pack.facts.find((fact) => fact.fact_id === "spend.net_cashflow.60d");

    expect(net?.value_text).toBe("+2,000");
    expect(net?.source_path).toBe("total_income-total_spend");
  });

  it("explains anomaly flags in priority order", () => {
    const pack = evidence("risk", {
      "anomaly-signals": ANOMALY_90D,
      "risk-profile-non-investment": RISK_PROFILE_180D,
    });

    expect(pack.facts.slice(0, 9).map((fact) => [fact.fact_id, fact.value_text])).toEqual([
      ["anomaly.flags_count.90d", "2"],
      ["anomaly.top_flag.90d", "change_point"],
      ["anomaly.top_flags.90d", "change_point, income_drop"],
      ["anomaly.flag_reason.1.90d", "Spending regime changed; the latest change point is 2026-09-14."],
      ["anomaly.flag_reason.2.90d", "Average income dropped 20.00% against the baseline period."],
      ["anomaly.change_points.90d", "2026-09-14"],
      ["anomaly.latest_change_point.90d", "2026-09-14"],
      ["risk.risk_band.180d", "medium"],
      ["risk.runway_months.180d", "2.50"],
    ]);
    expect(pack.facts.filter((fact) => fact.fact_id.startsWith("service.signal.") && !fact.fact_id.endsWith(".sources")).map((fact) => fact.value_text)).toEqual([
      "anomaly_recent",
      "risk_moderate",
      "runway_low",
      "volatility_high",
      "4",
    ]);
  });

  it("dedupes and ranks anomaly flags", () => {
    expect(prioritizeAnomalyFlags(["Income_Drop", null, "zeta", "change_point", "income_drop", "alpha"])).toEqual([
      "change_point",
      "income_drop",
      "alpha",
      "zeta",
    ]);
  });

  it("records status facts when goal data is insufficient", () => {
    const pack = evidence("planning", {
      "goal-feasibility": { status: "Insufficient_History", reason_codes: [" too_few_months ", ""] },
    });

    expect(pack.facts.slice(0, 2).map((fact) => [fact.fact_id, fact.value, fact.value_text])).toEqual([
      ["goal.status", "insufficient_history", "insufficient_history"],
      ["goal.reason_codes", ["too_few_months"], "too_few_months"],
    ]);
    expect(pack.facts.find((fact) => fact.fact_id === "service.signal.goal_input_missing.sources")?.value).toEqual(["goal.status"]);
    expect(pack.reason_codes).toEqual([]);
  });

  it("lifts a wrapped scenario result", () => {
    const parsed = parseToolOutput("what-if-scenario", {
      result: {
        base_total_net_p50: 1_000_000,
        best_variant_by_goal: "cut_spend",
        scenario_comparison: [
          { name: "raise_income", delta_vs_base: 100_000 },
          { name: "cut_spend", delta_vs_base: 250_000 },
        ],
      },
    });
    if (!parsed.ok) throw new Error(parsed.message);

    const pack = evidence("scenario", { "what-if-scenario": parsed.output });

    expect(pack.facts.slice(0, 3).map((fact) => [fact.fact_id, fact.value_text])).toEqual([
      ["scenario.base_total_net_p50", "1,000,000"],
      ["scenario.best_variant.name", "cut_spend"],
      ["scenario.best_variant.delta", "+250,000"],
    ]);
  });

  it("turns request slots into facts", () => {
    const pack = buildEvidencePack({
      intent: "scenario",
      toolOutputs: {},
      slots: { horizon_months: 6, income_delta_pct: -10, risk_appetite: "moderate" },
      kbMatches: [],
      citations: [],
      policyFlags: unknownAppetite,
      thresholds,
    });

    expect(pack.facts.slice(0, 3).map((fact) => [fact.fact_id, fact.value_text])).toEqual([
      ["slot.horizon_months", "6"],
      ["slot.risk_appetite", "balanced"],
      ["slot.income_delta_pct", "-10.00%"],
    ]);
    expect(pack.reason_codes).toEqual(["insufficient_facts"]);
  });

  it("maps knowledge-base snippets to service categories", () => {
    const pack = evidence("summary", {}, [
      { id: "k1", snippet: "Term deposit and recurring savings products", citation: "savings.md", score: 0.5 },
    ]);

    expect(pack.facts.slice(0, 2).map((fact) => [fact.fact_id, fact.value_text])).toEqual([
      ["kb.service_category.savings_deposit", "available"],
      ["kb.service_category.count", "1"],
    ]);
    expect(pack.citations).toEqual(["savings.md"]);
    expect(pack.reason_codes).toEqual(["insufficient_facts"]);
  });
});

describe("service signals", () => {
  it("prefers the declared appetite over the risk band", () => {
    const facts = evidence("risk", { "risk-profile-non-investment": RISK_PROFILE_180D }).facts;

    expect(extractServiceSignals(facts, { risk_appetite: "aggressive" }, thresholds).signals).toEqual([
      "risk_aggressive",
      "runway_low",
      "volatility_high",
    ]);
  });
});

describe("insights and actions", () => {
  it("flags cashflow pressure when runway is short", () => {
    const facts = evidence("summary", {
      "spend-analytics": SPEND_30D,
      "risk-profile-non-investment": RISK_PROFILE_180D,
    }).facts;
    const insights = deriveInsights(buildInsightContext("summary", facts, { risk_appetite: "unknown", education_only: false }));

    expect(insights.map((insight) => [insight.insight_id, insight.severity])).toEqual([
      ["insight.cashflow_pressure", "high"],
      ["insight.spend_anomaly", "medium"],
    ]);
    expect(insights[0]?.supporting_fact_ids).toEqual(["spend.net_cashflow.30d", "risk.runway_months.180d"]);
    expect(insights[1]?.supporting_fact_ids).toEqual(["risk.cashflow_volatility.180d"]);
  });

  it("pads a single action with the generic fillers", () => {
    const actions = buildActionCandidates(
      "risk",
      [{ insight_id: "insight.spend_anomaly", kind: "risk", severity: "high", message_seed: "x", supporting_fact_ids: [] }],
      "unknown"
    );

    expect(actions.map((action) => [action.action_id, action.priority])).toEqual([
      ["review_anomaly", 20],
      ["review_budget_weekly", 60],
      ["refresh_data_2w", 65],
    ]);
  });

  it("prices service suggestions by risk appetite", () => {
    const insight = { insight_id: "insight.service_loan_support", kind: "service", severity: "medium" as const, message_seed: "x", supporting_fact_ids: [] };

    const [aggressive] = buildActionCandidates("summary", [insight], "aggressive");
    const [conservative] = buildActionCandidates("summary", [insight], "conservative");

    expect(aggressive).toMatchObject({ action_id: "service_loan_healthcheck", priority: 15 });
    expect(aggressive?.params.risk_appetite).toBe("aggressive");
    expect(conservative).toMatchObject({ action_id: "service_loan_healthcheck", priority: 24 });
  });
});

describe("buildAdvisoryContext", () => {
  it("builds and freezes the summary context", () => {
    const pack = evidence(
      "summary",
      {
        "spend-analytics": SPEND_30D,
        "cashflow-forecast": FORECAST_WEEKLY,
        "jar-allocation-suggest": JAR_ESSENTIALS,
      },
      [{ id: "k1", snippet: "Term deposit and recurring savings products", citation: "savings.md", score: 0.5 }]
    );

    const { context, reasonCodes } = buildAdvisoryContext({
      intent: "summary",
      evidence: pack,
      policyFlags: { education_only: false, risk_appetite: "unknown" },
      policyVersion: "advice_policy_v1",
    });

    expect(reasonCodes).toEqual([]);
    expect(context.insights.map((insight) => [insight.insight_id, insight.severity])).toEqual([
      ["insight.cashflow_negative", "high"],
      ["insight.jar_focus", "low"],
      ["insight.service_catalog_available", "low"],
    ]);
    expect(context.actions.map((action) => [action.action_id, action.priority])).toEqual([
      ["stabilize_cashflow", 10],
      ["jar_optimize", 30],
      ["service_needs_consult", 46],
    ]);
    expect(context.actions[2]?.params).toEqual({ service_family: "catalog", cadence_days: 7, risk_appetite: "unknown" });
    expect(context.policy_flags).toEqual({ education_only: false, risk_appetite: "unknown", policy_version: "advice_policy_v1" });
    expect(context.citations).toEqual(["savings.md"]);
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.facts)).toBe(true);
    expect(Object.isFrozen(context.facts[0])).toBe(true);
    expect(Object.isFrozen(context.actions[0]?.params)).toBe(true);
  });

  it("asks for risk appetite on a scenario request", () => {
    const parsed = parseToolOutput("what-if-scenario", {
      base_total_net_p50: 1_000_000,
      best_variant_by_goal: "cut_spend",
      scenario_comparison: [{ name: "cut_spend", delta_vs_base: 250_000 }],
    });
    if (!parsed.ok) throw new Error(parsed.message);

    const { context } = buildAdvisoryContext({
      intent: "scenario",
      evidence: evidence("scenario", { "what-if-scenario": parsed.output }),
      policyFlags: { education_only: false, risk_appetite: "unknown" },
      policyVersion: "advice_policy_v1",
    });

    expect(context.insights.map((insight) => insight.insight_id)).toEqual([
      "insight.risk_preference_unknown",
      "insight.scenario_upside",
    ]);
    expect(context.actions.map((action) => action.action_id)).toEqual(["capture_risk_appetite", "scenario_monitor"]);
  });

  it("adds the education guard for investment questions", () => {
    const parsed = parseToolOutput("suitability-guard", { allow: true, decision: "education_only" });
    if (!parsed.ok) throw new Error(parsed.message);

    const { context } = buildAdvisoryContext({
      intent: "invest",
      evidence: evidence("invest", { "suitability-guard": parsed.output }),
      policyFlags: { education_only: true, risk_appetite: "unknown", suitability_decision: "education_only" },
      policyVersion: "advice_policy_v1",
    });

    expect(context.facts.slice(0, 2).map((fact) => [fact.fact_id, fact.value_text])).toEqual([
      ["policy.suitability.allow", "allow"],
      ["policy.suitability.decision", "education_only"],
    ]);
    expect(context.insights.map((insight) => [insight.insight_id, insight.severity])).toEqual([
      ["insight.education_only", "high"],
      ["insight.risk_preference_unknown", "medium"],
    ]);
    expect(context.actions.map((action) => [action.action_id, action.priority])).toEqual([
      ["education_only_guard", 5],
      ["capture_risk_appetite", 8],
    ]);
  });

  it("reports empty derivations", () => {
    const { context, reasonCodes } = buildAdvisoryContext({
      intent: "summary",
      evidence: { facts: [], citations: [], reason_codes: ["insufficient_facts"] },
      policyFlags: { education_only: false, risk_appetite: "unknown" },
      policyVersion: "advice_policy_v1",
    });

    expect(reasonCodes).toEqual(["insights_empty"]);
    expect(context.actions.map((action) => action.action_id)).toEqual(["review_budget_weekly", "refresh_data_2w"]);
    expect(context.reason_codes).toEqual(["insufficient_facts", "insights_empty"]);
  });
});
