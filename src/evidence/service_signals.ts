import type { Fact, PolicyFlags } from "../contracts/evidence";
import type { ServiceSignalThresholds } from "../control-plane/advisor_config";
import { safeFloat } from "./format";

export type ServiceSignalSet = {
  signals: string[];
  sourceFactIds: Record<string, string[]>;
};

const KNOWN_APPETITES = new Set(["conservative", "moderate", "aggressive"]);

const RISK_BAND_SIGNALS: Record<string, string> = {
  low: "risk_conservative",
  conservative: "risk_conservative",
  medium: "risk_moderate",
  moderate: "risk_moderate",
  high: "risk_aggressive",
  aggressive: "risk_aggressive",
};

export function findFactByPrefix(facts: readonly Fact[], prefix: string): Fact | undefined {
  return facts.find((fact) => fact.fact_id.startsWith(prefix));
}

export function findFact(facts: readonly Fact[], factId: string): Fact | undefined {
  return facts.find((fact) => fact.fact_id === factId);
}

function numeric(fact: Fact | undefined): number | undefined {
  return fact ? safeFloat(fact.value) : undefined;
}

function riskSignal(policyFlags: Pick<PolicyFlags, "risk_appetite">, facts: readonly Fact[]): string {
  const appetite = policyFlags.risk_appetite.trim().toLowerCase();
  if (KNOWN_APPETITES.has(appetite)) return `risk_${appetite}`;

  const slot = findFact(facts, "slot.risk_appetite");
  const slotValue = typeof slot?.value === "string" ? slot.value.toLowerCase() : "";
  if (KNOWN_APPETITES.has(slotValue)) return `risk_${slotValue}`;

  const band = findFactByPrefix(facts, "risk.risk_band.");
  const bandValue = typeof band?.value === "string" ? band.value.toLowerCase() : "";
  return RISK_BAND_SIGNALS[bandValue] ?? "risk_unknown";
}

type SignalRule = {
  signal: string;
  find: (facts: readonly Fact[]) => Fact | undefined;
  when: (fact: Fact, thresholds: ServiceSignalThresholds) => boolean;
};

const SIGNAL_RULES: readonly SignalRule[] = [
  {
    signal: "cashflow_negative",
    find: (facts) => findFactByPrefix(facts, "spend.net_cashflow."),
    when: (fact) => (numeric(fact) ?? 0) < 0,
  },
  {
    signal: "cashflow_positive",
    find: (facts) => findFactByPrefix(facts, "spend.net_cashflow."),
    when: (fact) => (numeric(fact) ?? 0) > 0,
  },
  {
    signal: "anomaly_recent",
    find: (facts) => findFactByPrefix(facts, "anomaly.flags_count."),
    when: (fact, t) => (numeric(fact) ?? 0) >= t.anomalyRecentMinFlags,
  },
  {
    signal: "goal_gap_high",
    find: (facts) => findFact(facts, "goal.gap_amount"),
    when: (fact, t) => (numeric(fact) ?? 0) > t.goalGapHighAmount,
  },
  {
    signal: "overspend_high",
    find: (facts) => findFactByPrefix(facts, "risk.overspend_propensity."),
    when: (fact, t) => (numeric(fact) ?? 0) >= t.overspendHigh,
  },
  {
    signal: "runway_low",
    find: (facts) => findFactByPrefix(facts, "risk.runway_months."),
    when: (fact, t) => {
      const runway = numeric(fact) ?? 0;
      return runway > 0 && runway < t.runwayLowMonths;
    },
  },
  {
    signal: "volatility_high",
    find: (facts) => findFactByPrefix(facts, "risk.cashflow_volatility."),
    when: (fact, t) => (numeric(fact) ?? 0) >= t.volatilityHigh,
  },
  {
    signal: "goal_input_missing",
    find: (facts) => findFact(facts, "goal.status"),
    when: (fact) => String(fact.value).startsWith("insufficient_"),
  },
  {
    signal: "jar_data_missing",
    find: (facts) => findFact(facts, "jar.status"),
    when: (fact) => String(fact.value).startsWith("insufficient_"),
  },
];

/** Coarse service-relevant signals over the fact list, each with the facts behind it. */
export function extractServiceSignals(
  facts: readonly Fact[],
  policyFlags: Pick<PolicyFlags, "risk_appetite">,
  thresholds: ServiceSignalThresholds
): ServiceSignalSet {
  const sourceFactIds: Record<string, string[]> = {};
  for (const rule of SIGNAL_RULES) {
    const fact = rule.find(facts);
    if (fact && rule.when(fact, thresholds)) sourceFactIds[rule.signal] = [fact.fact_id];
  }
  sourceFactIds[riskSignal(policyFlags, facts)] = [];
  return { signals: Object.keys(sourceFactIds).sort(), sourceFactIds };
}
