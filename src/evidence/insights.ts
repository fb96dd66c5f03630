import type { Fact, Insight, PolicyFlags, Severity } from "../contracts/evidence";
import type { IntentName } from "../contracts/intent";
import { compareText, safeFloat } from "./format";
import { findFact, findFactByPrefix } from "./service_signals";

const SEVERITY_ORDER: Record<Severity, number> = { high: 0, medium: 1, low: 2 };

const ANOMALY_VOLATILITY_MIN = 0.35;
const OVERSPEND_MIN = 0.3;
const RUNWAY_PRESSURE_MONTHS = 3;

export type RiskAppetite = "conservative" | "moderate" | "aggressive" | "unknown";

/** Facts and derived values the insight rules read. Built once per request. */
export type InsightContext = {
  intent: IntentName;
  educationOnly: boolean;
  riskAppetite: RiskAppetite;
  net?: Fact;
  runway?: Fact;
  anomalyCount?: Fact;
  volatility?: Fact;
  overspend?: Fact;
  goalGap?: Fact;
  goalFeasible?: Fact;
  jarRatio?: Fact;
  scenarioDelta?: Fact;
  scenarioBest?: Fact;
  riskAppetiteSlot?: Fact;
  kbSavings?: Fact;
  kbLoans?: Fact;
  kbCards?: Fact;
  kbPlaybook?: Fact;
  netValue: number;
  runwayValue: number;
  anomalyCountValue: number;
  overspendValue: number;
  goalGapValue: number;
  scenarioDeltaValue: number;
  anomalySupport: string[];
};

type InsightDraft = { severity: Severity; supporting_fact_ids: Array<string | undefined> };

/**
 * One row of the insight table. Rules sharing a `group` are exclusive:
 * the first one that fires wins.
 */
export type InsightRule = {
  insight_id: string;
  kind: string;
  message_seed: string;
  group?: string;
  when: (ctx: InsightContext) => InsightDraft | null;
};

function valueOf(fact: Fact | undefined): number {
  return (fact && safeFloat(fact.value)) ?? 0;
}

export function resolveRiskAppetite(
  policyFlags: Pick<PolicyFlags, "risk_appetite">,
  slotFact?: Fact
): RiskAppetite {
  for (const candidate of [policyFlags.risk_appetite, slotFact?.value]) {
    const value = typeof candidate === "string" ? candidate.trim().toLowerCase() : "";
    if (value === "conservative" || value === "moderate" || value === "aggressive") return value;
  }
  return "unknown";
}

export function buildInsightContext(
  intent: IntentName,
  facts: readonly Fact[],
  policyFlags: Pick<PolicyFlags, "risk_appetite" | "education_only">
): InsightContext {
  const net = findFactByPrefix(facts, "spend.net_cashflow.");
  const anomalyCount = findFactByPrefix(facts, "anomaly.flags_count.");
  const volatility = findFactByPrefix(facts, "risk.cashflow_volatility.");
  const overspend = findFactByPrefix(facts, "risk.overspend_propensity.");
  const riskAppetiteSlot = findFact(facts, "slot.risk_appetite");

  const anomalySupport: string[] = [];
  if (anomalyCount && valueOf(anomalyCount) >= 1) anomalySupport.push(anomalyCount.fact_id);
  if (volatility && Math.abs(valueOf(volatility)) >= ANOMALY_VOLATILITY_MIN) anomalySupport.push(volatility.fact_id);
  if (overspend && Math.abs(valueOf(overspend)) >= OVERSPEND_MIN) anomalySupport.push(overspend.fact_id);

  const runway = findFactByPrefix(facts, "risk.runway_months.");
  const goalGap = findFact(facts, "goal.gap_amount");
  const scenarioDelta = findFact(facts, "scenario.best_variant.delta");
  return {
    intent,
    educationOnly: policyFlags.education_only,
    riskAppetite: resolveRiskAppetite(policyFlags, riskAppetiteSlot),
    net,
    runway,
    anomalyCount,
    volatility,
    overspend,
    goalGap,
    goalFeasible: findFact(facts, "goal.feasible"),
    jarRatio: findFact(facts, "jar.top.ratio"),
    scenarioDelta,
    scenarioBest: findFact(facts, "scenario.best_variant.name"),
    riskAppetiteSlot,
    kbSavings: findFact(facts, "kb.service_category.savings_deposit"),
    kbLoans: findFact(facts, "kb.service_category.loans_credit"),
    kbCards: findFact(facts, "kb.service_category.cards_payments"),
    kbPlaybook: findFact(facts, "kb.service_category.service_playbook"),
    netValue: valueOf(net),
    runwayValue: valueOf(runway),
    anomalyCountValue: valueOf(anomalyCount),
    overspendValue: valueOf(overspend),
    goalGapValue: valueOf(goalGap),
    scenarioDeltaValue: valueOf(scenarioDelta),
    anomalySupport,
  };
}

const id = (fact: Fact | undefined) => fact?.fact_id;

function riskPreferenceRule(appetite: RiskAppetite, severity: Severity, seed: string): InsightRule {
  return {
    insight_id: `insight.risk_preference_${appetite}`,
    kind: "profile",
    group: "risk_preference",
    message_seed: seed,
    when: (ctx) => {
      if (ctx.riskAppetite !== appetite) return null;
      if (appetite === "unknown" && !["planning", "scenario", "invest"].includes(ctx.intent)) return null;
      return { severity, supporting_fact_ids: [id(ctx.riskAppetiteSlot)] };
    },
  };
}

export const INSIGHT_RULES: readonly InsightRule[] = [
  {
    insight_id: "insight.cashflow_pressure",
    kind: "cashflow",
    group: "cashflow",
    message_seed: "Net cashflow is negative and the emergency runway is short.",
    when: (ctx) =>
      ctx.net && ctx.netValue < 0 && ctx.runway && ctx.runwayValue > 0 && ctx.runwayValue < RUNWAY_PRESSURE_MONTHS
        ? { severity: "high", supporting_fact_ids: [id(ctx.net), id(ctx.runway)] }
        : null,
  },
  {
    insight_id: "insight.cashflow_negative",
    kind: "cashflow",
    group: "cashflow",
    message_seed: "Net cashflow is negative.",
    when: (ctx) => (ctx.net && ctx.netValue < 0 ? { severity: "high", supporting_fact_ids: [id(ctx.net)] } : null),
  },
  {
    insight_id: "insight.savings_capacity",
    kind: "planning",
    group: "cashflow",
    message_seed: "Positive net cashflow leaves room to save.",
    when: (ctx) => (ctx.net && ctx.netValue > 0 ? { severity: "medium", supporting_fact_ids: [id(ctx.net)] } : null),
  },
  {
    insight_id: "insight.spend_anomaly",
    kind: "risk",
    message_seed: "Spending shows unusual movement.",
    when: (ctx) =>
      ctx.anomalySupport.length > 0
        ? { severity: ctx.anomalyCountValue >= 2 ? "high" : "medium", supporting_fact_ids: ctx.anomalySupport }
        : null,
  },
  {
    insight_id: "insight.goal_gap",
    kind: "planning",
    group: "goal",
    message_seed: "The goal is not reachable with the current parameters.",
    when: (ctx) =>
      ctx.goalFeasible && ctx.goalFeasible.value === false
        ? { severity: "high", supporting_fact_ids: [id(ctx.goalFeasible), id(ctx.goalGap)] }
        : null,
  },
  {
    insight_id: "insight.goal_gap",
    kind: "planning",
    group: "goal",
    message_seed: "There is still a shortfall against the financial goal.",
    when: (ctx) =>
      ctx.goalGap && ctx.goalGapValue > 0 ? { severity: "medium", supporting_fact_ids: [id(ctx.goalGap)] } : null,
  },
  {
    insight_id: "insight.scenario_upside",
    kind: "scenario",
    group: "scenario",
    message_seed: "The best scenario improves on the baseline.",
    when: (ctx) =>
      ctx.scenarioDelta && ctx.scenarioDeltaValue > 0
        ? { severity: "medium", supporting_fact_ids: [id(ctx.scenarioDelta)] }
        : null,
  },
  {
    insight_id: "insight.scenario_no_upside",
    kind: "scenario",
    group: "scenario",
    message_seed: "The current scenarios show no clear upside over the baseline.",
    when: (ctx) =>
      ctx.scenarioBest ? { severity: "high", supporting_fact_ids: [id(ctx.scenarioBest), id(ctx.scenarioDelta)] } : null,
  },
  {
    insight_id: "insight.jar_focus",
    kind: "planning",
    message_seed: "A priority allocation jar is available to tune the budget.",
    when: (ctx) => (ctx.jarRatio ? { severity: "low", supporting_fact_ids: [id(ctx.jarRatio)] } : null),
  },
  riskPreferenceRule("conservative", "medium", "The user prefers safety and stable cashflow."),
  riskPreferenceRule("moderate", "low", "The user balances safety against reaching goals faster."),
  riskPreferenceRule("aggressive", "low", "The user accepts more risk to reach financial goals."),
  riskPreferenceRule("unknown", "medium", "Risk appetite is unknown; ask before personalising advice."),
  {
    insight_id: "insight.service_catalog_available",
    kind: "service",
    message_seed: "Bank service catalog data is available for situational suggestions.",
    when: (ctx) => {
      const support = [ctx.kbSavings, ctx.kbLoans, ctx.kbCards, ctx.kbPlaybook].map(id).filter(Boolean);
      return support.length > 0 ? { severity: "low", supporting_fact_ids: support } : null;
    },
  },
  {
    insight_id: "insight.service_savings_option",
    kind: "service",
    message_seed: "A recurring or term savings product could build saving discipline.",
    when: (ctx) =>
      ctx.kbSavings && (ctx.netValue > 0 || ctx.intent === "planning" || ctx.intent === "scenario")
        ? { severity: "medium", supporting_fact_ids: [id(ctx.kbSavings), ctx.netValue > 0 ? id(ctx.net) : undefined] }
        : null,
  },
  {
    insight_id: "insight.service_loan_support",
    kind: "service",
    message_seed: "Review loan restructuring or a goal loan to ease cashflow pressure.",
    when: (ctx) =>
      ctx.kbLoans && (ctx.netValue < 0 || ctx.goalGapValue > 0 || ctx.overspendValue >= OVERSPEND_MIN)
        ? {
            severity: "medium",
            supporting_fact_ids: [
              id(ctx.kbLoans),
              ctx.netValue < 0 ? id(ctx.net) : undefined,
              ctx.goalGapValue > 0 ? id(ctx.goalGap) : undefined,
            ],
          }
        : null,
  },
  {
    insight_id: "insight.service_spend_control",
    kind: "service",
    message_seed: "Card spend caps and transaction alerts can contain large spending groups.",
    when: (ctx) =>
      ctx.kbCards && (ctx.anomalySupport.length > 0 || ctx.netValue < 0 || ctx.overspendValue >= OVERSPEND_MIN)
        ? {
            severity: "medium",
            supporting_fact_ids: [
              id(ctx.kbCards),
              ...ctx.anomalySupport,
              ctx.overspendValue >= OVERSPEND_MIN ? id(ctx.overspend) : undefined,
            ],
          }
        : null,
  },
  {
    insight_id: "insight.education_only",
    kind: "compliance",
    message_seed: "Guidance is limited to financial education; no trading instructions.",
    when: (ctx) => (ctx.intent === "invest" || ctx.educationOnly ? { severity: "high", supporting_fact_ids: [] } : null),
  },
];

/** Evaluate the rule table in order. Output is sorted high→low severity, then by id. */
export function deriveInsights(ctx: InsightContext, rules: readonly InsightRule[] = INSIGHT_RULES): Insight[] {
  const insights: Insight[] = [];
  const seen = new Set<string>();
  const firedGroups = new Set<string>();

  for (const rule of rules) {
    if (seen.has(rule.insight_id)) continue;
    if (rule.group && firedGroups.has(rule.group)) continue;
    const draft = rule.when(ctx);
    if (!draft) continue;
    if (rule.group) firedGroups.add(rule.group);
    seen.add(rule.insight_id);
    insights.push({
      insight_id: rule.insight_id,
      kind: rule.kind,
      severity: draft.severity,
      message_seed: rule.message_seed,
      supporting_fact_ids: [...new Set(draft.supporting_fact_ids.filter((item): item is string => Boolean(item)))],
    });
  }

  return insights.sort(
    (a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity] || compareText(a.insight_id, b.insight_id)
  );
}
