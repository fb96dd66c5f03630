import type { Citation, EvidencePack, Fact, PolicyFlags } from "../contracts/evidence";
import type { IntentName, IntentSlots } from "../contracts/intent";
import {
  TOOL_NAMES,
  type ToolName,
  type ToolOutputMap,
  type ToolOutputs,
} from "../contracts/tool_outputs";
import type { ServiceSignalThresholds } from "../control-plane/advisor_config";
import {
  average,
  clampInt,
  compareText,
  fmtMoney,
  fmtPct,
  fmtSignedMoney,
  parseIntFromValue,
  safeFloat,
  sanitizeTimeframe,
} from "./format";
import { extractServiceSignals } from "./service_signals";

const MONEY_UNIT = "VND";

type FactInput = Omit<Fact, "unit" | "timeframe"> & { unit?: string; timeframe?: string };

/** Accumulates facts in insertion order; a repeated fact_id keeps the first value. */
export class FactCollector {
  readonly facts: Fact[] = [];
  private readonly ids = new Set<string>();

  add(input: FactInput): void {
    if (this.ids.has(input.fact_id)) return;
    this.ids.add(input.fact_id);
    this.facts.push({ unit: "", timeframe: "", ...input });
  }

  has(factId: string): boolean {
    return this.ids.has(factId);
  }
}

const ANOMALY_FLAG_PRIORITY: Record<string, number> = {
  change_point: 0,
  category_spike: 1,
  spend_outlier: 2,
  spend_drift: 3,
  abnormal_spend: 4,
  income_drop: 5,
  low_balance_risk: 6,
};
const ANOMALY_REASON_MAX = 5;

type AnomalyOutput = ToolOutputs["anomaly-signals"];

export function prioritizeAnomalyFlags(raw: readonly (string | null)[]): string[] {
  const flags: string[] = [];
  for (const item of raw) {
    const value = (item ?? "").trim().toLowerCase();
    if (value && !flags.includes(value)) flags.push(value);
  }
  return flags.sort((a, b) => {
    const rank = (ANOMALY_FLAG_PRIORITY[a] ?? 99) - (ANOMALY_FLAG_PRIORITY[b] ?? 99);
    return rank !== 0 ? rank : compareText(a, b);
  });
}

function anomalyChangePoints(anomaly: AnomalyOutput): string[] {
  const raw = anomaly.external_engines?.ruptures_pelt?.change_points ?? anomaly.change_points ?? [];
  const points: string[] = [];
  for (const item of raw) {
    const value = String(item).trim();
    if (value && !points.includes(value)) points.push(value);
  }
  return points;
}

function anomalyFlagReason(flag: string, anomaly: AnomalyOutput): string {
  switch (flag) {
    case "change_point": {
      const points = anomalyChangePoints(anomaly);
      const latest = points[points.length - 1];
      return latest
        ? `Spending regime changed; the latest change point is ${latest}.`
        : "The spending time series shows a regime change.";
    }
    case "category_spike": {
      const top = anomaly.category_spikes?.[0];
      const name = (top?.category_name ?? "").trim();
      const share = safeFloat(top?.delta_share);
      const amount = safeFloat(top?.recent_amount);
      if (name && share !== undefined && amount !== undefined) {
        return `Category ${name} grew its share by ${fmtPct(share)} with spend of ${fmtMoney(amount)}.`;
      }
      return "A spending category grew its share unusually against the baseline.";
    }
    case "spend_outlier": {
      const probability = safeFloat(anomaly.external_engines?.pyod_ecod?.outlier_probability);
      return probability !== undefined && probability > 0
        ? `Recent spending falls in the outlier group with probability ${fmtPct(probability)}.`
        : "Recent spending is flagged as an outlier.";
    }
    case "spend_drift": {
      const drift = anomaly.external_engines?.river_adwin?.drift_points?.length ?? 0;
      return drift > 0
        ? `The spending series drifted at ${drift} points.`
        : "The spending series drifted away from its baseline.";
    }
    case "abnormal_spend": {
      const z = safeFloat(anomaly.abnormal_spend?.z_score);
      return z !== undefined && z > 0
        ? `Spending over the last 7 days deviates strongly from the baseline median (z=${z.toFixed(2)}).`
        : "Recent spending deviates markedly from history.";
    }
    case "income_drop": {
      const drop = safeFloat(anomaly.income_drop?.drop_pct);
      return drop !== undefined && drop > 0
        ? `Average income dropped ${fmtPct(drop)} against the baseline period.`
        : "Average income dropped markedly against the baseline period.";
    }
    case "low_balance_risk": {
      const runway = safeFloat(anomaly.low_balance_risk?.runway_days_estimate);
      return runway !== undefined && runway > 0
        ? `Estimated runway is ${runway.toFixed(2)} days, below the 90 day safety line.`
        : "Estimated runway is below the 90 day safety line.";
    }
    default:
      return "An unusual signal needs further monitoring.";
  }
}

function statusFacts(
  prefix: "goal" | "jar",
  tool: ToolName,
  status: string,
  reasonCodes: readonly string[] | null | undefined,
  sink: FactCollector
): void {
  const codes = (reasonCodes ?? []).map((code) => code.trim()).filter(Boolean);
  sink.add({
    fact_id: `${prefix}.status`,
    label: `${prefix === "goal" ? "Goal feasibility" : "Jar allocation"} data status`,
    value: status,
    value_text: status,
    source_tool: tool,
    source_path: "status",
  });
  sink.add({
    fact_id: `${prefix}.reason_codes`,
    label: `Why ${prefix === "goal" ? "goal feasibility" : "jar allocation"} data is missing`,
    value: codes,
    value_text: codes.join(", ") || status,
    source_tool: tool,
    source_path: "reason_codes",
  });
}

type Extractor<K extends ToolName> = (output: ToolOutputs[K], sink: FactCollector) => void;

const EXTRACTORS: { [K in ToolName]: Extractor<K> } = {
  "spend-analytics": (out, sink) => {
    const timeframe = sanitizeTimeframe(out.range, "30d");
    const income = safeFloat(out.total_income);
    const spend = safeFloat(out.total_spend);
    let net = safeFloat(out.net_cashflow);
    let netPath = "net_cashflow";
    if (net === undefined && income !== undefined && spend !== undefined) {
      net = income - spend;
      netPath = "total_income-total_spend";
    }
    const base = { unit: MONEY_UNIT, timeframe, source_tool: "spend-analytics" };
    if (income !== undefined) {
      sink.add({ ...base, fact_id: `spend.total_income.${timeframe}`, label: "Total income", value: income, value_text: fmtMoney(income), source_path: "total_income" });
    }
    if (spend !== undefined) {
      sink.add({ ...base, fact_id: `spend.total_spend.${timeframe}`, label: "Total spending", value: spend, value_text: fmtMoney(spend), source_path: "total_spend" });
    }
    if (net !== undefined) {
      sink.add({ ...base, fact_id: `spend.net_cashflow.${timeframe}`, label: "Net cashflow", value: net, value_text: fmtSignedMoney(net), source_path: netPath });
    }
  },

  "cashflow-forecast": (out, sink) => {
    if (out.points.length === 0) return;
    const series = (pick: (point: (typeof out.points)[number]) => unknown) =>
      out.points.map((point) => safeFloat(pick(point))).filter((value): value is number => value !== undefined);
    const base = { unit: MONEY_UNIT, timeframe: "weekly_12", source_tool: "cashflow-forecast" };
    const income = series((point) => point.income_estimate);
    const spend = series((point) => point.spend_estimate);
    const net = series((point) => point.p50);
    if (income.length > 0) {
      const value = average(income);
      sink.add({ ...base, fact_id: "forecast.avg_income.weekly_12", label: "Forecast average income per period", value, value_text: fmtMoney(value), source_path: "points[].income_estimate" });
    }
    if (spend.length > 0) {
      const value = average(spend);
      sink.add({ ...base, fact_id: "forecast.avg_spend.weekly_12", label: "Forecast average spending per period", value, value_text: fmtMoney(value), source_path: "points[].spend_estimate" });
    }
    if (net.length > 0) {
      const value = average(net);
      sink.add({ ...base, fact_id: "forecast.avg_net_p50.weekly_12", label: "Forecast average net (P50) per period", value, value_text: fmtSignedMoney(value), source_path: "points[].p50" });
    }
  },

  "risk-profile-non-investment": (out, sink) => {
    const timeframe = `${clampInt(parseIntFromValue(out.lookback_days, 180), 60, 720)}d`;
    const base = { timeframe, source_tool: "risk-profile-non-investment" };
    const band = (out.risk_band ?? "").trim();
    const runway = safeFloat(out.emergency_runway_months);
    const volatility = safeFloat(out.cashflow_volatility);
    const overspend = safeFloat(out.overspend_propensity);
    if (band) {
      sink.add({ ...base, fact_id: `risk.risk_band.${timeframe}`, label: "Risk band", value: band, value_text: band, source_path: "risk_band" });
    }
    if (runway !== undefined) {
      sink.add({ ...base, fact_id: `risk.runway_months.${timeframe}`, label: "Emergency runway", value: runway, value_text: runway.toFixed(2), unit: "months", source_path: "emergency_runway_months" });
    }
    if (volatility !== undefined) {
      sink.add({ ...base, fact_id: `risk.cashflow_volatility.${timeframe}`, label: "Cashflow volatility", value: volatility, value_text: fmtPct(volatility), unit: "pct", source_path: "cashflow_volatility" });
    }
    if (overspend !== undefined) {
      sink.add({ ...base, fact_id: `risk.overspend_propensity.${timeframe}`, label: "Overspend propensity", value: overspend, value_text: fmtPct(overspend), unit: "pct", source_path: "overspend_propensity" });
    }
  },

  "anomaly-signals": (out, sink) => {
    const flags = prioritizeAnomalyFlags(out.flags);
    const timeframe = `${clampInt(parseIntFromValue(out.lookback_days, 90), 30, 365)}d`;
    const base = { timeframe, source_tool: "anomaly-signals" };
    sink.add({ ...base, fact_id: `anomaly.flags_count.${timeframe}`, label: "Anomaly flag count", value: flags.length, value_text: String(flags.length), source_path: "flags" });

    const highlighted = flags.slice(0, ANOMALY_REASON_MAX);
    if (highlighted.length > 0) {
      sink.add({ ...base, fact_id: `anomaly.top_flag.${timeframe}`, label: "Main anomaly flag", value: highlighted[0], value_text: highlighted[0], source_path: "flags[0]" });
      sink.add({ ...base, fact_id: `anomaly.top_flags.${timeframe}`, label: "Highlighted anomaly flags", value: highlighted, value_text: highlighted.join(", "), source_path: "flags" });
    }
    highlighted.forEach((flag, index) => {
      sink.add({
        ...base,
        fact_id: `anomaly.flag_reason.${index + 1}.${timeframe}`,
        label: `Anomaly reason ${index + 1}`,
        value: flag,
        value_text: anomalyFlagReason(flag, out),
        source_path: `flags::${flag}`,
      });
    });

    const points = anomalyChangePoints(out);
    const latest = points[points.length - 1];
    if (latest) {
      sink.add({ ...base, fact_id: `anomaly.change_points.${timeframe}`, label: "Spending change dates", value: points, value_text: points.join(", "), source_path: "external_engines.ruptures_pelt.change_points" });
      sink.add({ ...base, fact_id: `anomaly.latest_change_point.${timeframe}`, label: "Most recent change date", value: latest, value_text: latest, source_path: "external_engines.ruptures_pelt.change_points[-1]" });
    }
  },

  "goal-feasibility": (out, sink) => {
    const status = (out.status ?? "").trim().toLowerCase();
    if (status.startsWith("insufficient_")) {
      statusFacts("goal", "goal-feasibility", status, out.reason_codes, sink);
      return;
    }
    const tool = "goal-feasibility";
    const target = safeFloat(out.target_amount);
    const horizonRaw = safeFloat(out.horizon_months);
    const horizon = horizonRaw === undefined ? undefined : Math.trunc(horizonRaw);
    const required = safeFloat(out.required_monthly_saving);
    const gap = safeFloat(out.gap_amount);

    if (target !== undefined && target > 0) {
      sink.add({ fact_id: "goal.target_amount", label: "Savings target", value: target, value_text: fmtMoney(target), unit: MONEY_UNIT, timeframe: horizon && horizon > 0 ? `${horizon}m` : "", source_tool: tool, source_path: "target_amount" });
    }
    if (horizon !== undefined && horizon > 0) {
      sink.add({ fact_id: "goal.horizon_months", label: "Goal horizon", value: horizon, value_text: String(horizon), unit: "months", timeframe: `${horizon}m`, source_tool: tool, source_path: "horizon_months" });
    }
    if (required !== undefined && required > 0) {
      sink.add({ fact_id: "goal.required_monthly_saving", label: "Required monthly saving", value: required, value_text: fmtMoney(required), unit: MONEY_UNIT, source_tool: tool, source_path: "required_monthly_saving" });
    }
    if (typeof out.feasible === "boolean") {
      sink.add({ fact_id: "goal.feasible", label: "Goal feasibility", value: out.feasible, value_text: out.feasible ? "feasible" : "not feasible", source_tool: tool, source_path: "feasible" });
    }
    if (gap !== undefined && gap > 0) {
      sink.add({ fact_id: "goal.gap_amount", label: "Shortfall against the goal", value: gap, value_text: fmtMoney(gap), unit: MONEY_UNIT, source_tool: tool, source_path: "gap_amount" });
    }
  },

  "recurring-cashflow-detect": (out, sink) => {
    const ratio = safeFloat(out.fixed_cost_ratio);
    if (ratio === undefined || ratio <= 0) return;
    const timeframe = `${clampInt(parseIntFromValue(out.lookback_months, 6), 3, 24)}m`;
    sink.add({ fact_id: `recurring.fixed_cost_ratio.${timeframe}`, label: "Fixed cost ratio", value: ratio, value_text: fmtPct(ratio), unit: "pct", timeframe, source_tool: "recurring-cashflow-detect", source_path: "fixed_cost_ratio" });
  },

  "jar-allocation-suggest": (out, sink) => {
    const status = (out.status ?? "").trim().toLowerCase();
    if (status.startsWith("insufficient_")) {
      statusFacts("jar", "jar-allocation-suggest", status, out.reason_codes, sink);
      return;
    }
    const first = out.allocations?.[0];
    if (!first) return;
    const tool = "jar-allocation-suggest";
    const name = (first.jar_name ?? "").trim();
    const ratio = safeFloat(first.ratio);
    const amount = safeFloat(first.amount);
    if (name) {
      sink.add({ fact_id: "jar.top.name", label: "Priority allocation jar", value: name, value_text: name, source_tool: tool, source_path: "allocations[0].jar_name" });
    }
    if (ratio !== undefined && ratio > 0) {
      sink.add({ fact_id: "jar.top.ratio", label: "Priority jar allocation ratio", value: ratio, value_text: fmtPct(ratio), unit: "pct", source_tool: tool, source_path: "allocations[0].ratio" });
    }
    if (amount !== undefined && amount > 0) {
      sink.add({ fact_id: "jar.top.amount", label: "Priority jar allocation amount", value: amount, value_text: fmtMoney(amount), unit: MONEY_UNIT, source_tool: tool, source_path: "allocations[0].amount" });
    }
  },

  "what-if-scenario": (out, sink) => {
    const tool = "what-if-scenario";
    const baseTotal = safeFloat(out.base_total_net_p50);
    const best = (out.best_variant_by_goal ?? "").trim();
    if (baseTotal !== undefined) {
      sink.add({ fact_id: "scenario.base_total_net_p50", label: "Baseline total net (P50)", value: baseTotal, value_text: fmtMoney(baseTotal), unit: MONEY_UNIT, source_tool: tool, source_path: "base_total_net_p50" });
    }
    if (!best) return;
    sink.add({ fact_id: "scenario.best_variant.name", label: "Best scenario", value: best, value_text: best, source_tool: tool, source_path: "best_variant_by_goal" });
    const row = (out.scenario_comparison ?? []).find((item) => (item.name ?? "") === best);
    const delta = safeFloat(row?.delta_vs_base);
    if (delta !== undefined) {
      sink.add({ fact_id: "scenario.best_variant.delta", label: "Best scenario change against baseline", value: delta, value_text: fmtSignedMoney(delta), unit: MONEY_UNIT, source_tool: tool, source_path: "scenario_comparison[].delta_vs_base" });
    }
  },

  "suitability-guard": (out, sink) => {
    const tool = "suitability-guard";
    sink.add({ fact_id: "policy.suitability.allow", label: "Policy allows the request", value: out.allow, value_text: out.allow ? "allow" : "deny", source_tool: tool, source_path: "allow" });
    sink.add({ fact_id: "policy.suitability.decision", label: "Suitability decision", value: out.decision, value_text: out.decision, source_tool: tool, source_path: "decision" });
  },
};

function runExtractor<K extends ToolName>(tool: K, outputs: ToolOutputMap, sink: FactCollector): void {
  const output = outputs[tool];
  if (output !== undefined) EXTRACTORS[tool](output, sink);
}

const RISK_APPETITE_LABELS: Record<string, string> = {
  conservative: "conservative",
  moderate: "balanced",
  aggressive: "comfortable with high risk",
};

/** Ratios above 1 are read as whole percentages (15 → 0.15). */
function asRatio(value: number): number {
  return Math.abs(value) > 1 ? value / 100 : value;
}

export function extractSlotFacts(slots: IntentSlots, sink: FactCollector): void {
  const source = "intent_extraction";
  if (slots.target_amount !== undefined && slots.target_amount > 0) {
    sink.add({ fact_id: "slot.target_amount", label: "Target amount from the request", value: slots.target_amount, value_text: fmtMoney(slots.target_amount), unit: MONEY_UNIT, source_tool: source, source_path: "slots.target_amount" });
  }
  if (slots.horizon_months !== undefined && slots.horizon_months > 0) {
    sink.add({ fact_id: "slot.horizon_months", label: "Horizon from the request", value: slots.horizon_months, value_text: String(slots.horizon_months), unit: "months", source_tool: source, source_path: "slots.horizon_months" });
  }
  const appetite = slots.risk_appetite;
  if (appetite && appetite !== "unknown") {
    sink.add({ fact_id: "slot.risk_appetite", label: "Risk appetite from the request", value: appetite, value_text: RISK_APPETITE_LABELS[appetite] ?? appetite, source_tool: source, source_path: "slots.risk_appetite" });
  }
  for (const key of ["income_delta_pct", "spend_delta_pct"] as const) {
    const raw = slots[key];
    if (raw === undefined || raw === 0) continue;
    const ratio = asRatio(raw);
    sink.add({ fact_id: `slot.${key}`, label: `Requested ${key === "income_delta_pct" ? "income" : "spending"} change`, value: ratio, value_text: fmtPct(ratio), unit: "pct", source_tool: source, source_path: `slots.${key}` });
  }
  for (const key of ["income_delta_amount", "spend_delta_amount"] as const) {
    const raw = slots[key];
    if (raw === undefined || raw <= 0) continue;
    sink.add({ fact_id: `slot.${key}`, label: `Requested ${key === "income_delta_amount" ? "income" : "spending"} change amount`, value: raw, value_text: fmtMoney(raw), unit: MONEY_UNIT, source_tool: source, source_path: `slots.${key}` });
  }
}

const KB_SERVICE_PATTERNS: ReadonlyArray<{ suffix: string; label: string; terms: readonly string[] }> = [
  {
    suffix: "savings_deposit",
    label: "Savings and deposit service category available",
    terms: ["saving", "tiet kiem", "deposit", "term deposit", "recurring savings", "goal bucket"],
  },
  {
    suffix: "loans_credit",
    label: "Loan and credit service category available",
    terms: ["loan", "vay", "overdraft", "debt consolidation", "installment"],
  },
  {
    suffix: "cards_payments",
    label: "Card and payment control service category available",
    terms: ["credit card", "debit card", "auto debit", "payment", "spend cap"],
  },
  {
    suffix: "service_playbook",
    label: "Service advisory playbook available",
    terms: ["advisory playbook", "service suggestion policy", "mapping guide"],
  },
];

export function extractKbServiceFacts(matches: readonly Citation[], sink: FactCollector): void {
  const corpus = matches
    .flatMap((match) => [match.snippet, match.citation])
    .map((part) => part.trim().toLowerCase())
    .filter(Boolean)
    .join(" ");
  if (!corpus) return;

  let matched = 0;
  for (const pattern of KB_SERVICE_PATTERNS) {
    if (!pattern.terms.some((term) => corpus.includes(term))) continue;
    sink.add({ fact_id: `kb.service_category.${pattern.suffix}`, label: pattern.label, value: true, value_text: "available", source_tool: "knowledge_base", source_path: "matches[].snippet" });
    matched += 1;
  }
  if (matched > 0) {
    sink.add({ fact_id: "kb.service_category.count", label: "Service categories supported by the knowledge base", value: matched, value_text: String(matched), source_tool: "knowledge_base", source_path: "matches[].snippet" });
  }
}

function extractServiceSignalFacts(
  policyFlags: Pick<PolicyFlags, "risk_appetite">,
  thresholds: ServiceSignalThresholds,
  sink: FactCollector
): void {
  const signalSet = extractServiceSignals(sink.facts, policyFlags, thresholds);
  for (const signal of signalSet.signals) {
    const sources = signalSet.sourceFactIds[signal] ?? [];
    sink.add({ fact_id: `service.signal.${signal}`, label: `Service signal: ${signal}`, value: true, value_text: signal, source_tool: "service_signals", source_path: "facts" });
    if (sources.length > 0) {
      sink.add({ fact_id: `service.signal.${signal}.sources`, label: `Facts behind service signal ${signal}`, value: sources, value_text: sources.join(", "), source_tool: "service_signals", source_path: "facts" });
    }
  }
  sink.add({ fact_id: "service.signal.count", label: "Number of service signals", value: signalSet.signals.length, value_text: String(signalSet.signals.length), source_tool: "service_signals", source_path: "facts" });
}

const REQUIRED_PREFIXES: Record<IntentName, readonly string[]> = {
  summary: ["spend.", "forecast."],
  risk: ["risk.", "anomaly."],
  planning: ["goal.", "spend."],
  scenario: ["scenario."],
  invest: ["policy."],
  out_of_scope: ["policy."],
};

export type EvidenceInput = {
  intent: IntentName;
  toolOutputs: ToolOutputMap;
  slots: IntentSlots;
  kbMatches: readonly Citation[];
  citations: readonly string[];
  policyFlags: Pick<PolicyFlags, "risk_appetite">;
  thresholds: ServiceSignalThresholds;
};

/** Turn tool outputs, slots and KB matches into the request's fact list. Pure. */
export function buildEvidencePack(input: EvidenceInput): EvidencePack {
  const sink = new FactCollector();
  for (const tool of TOOL_NAMES) runExtractor(tool, input.toolOutputs, sink);
  extractSlotFacts(input.slots, sink);
  extractKbServiceFacts(input.kbMatches, sink);
  extractServiceSignalFacts(input.policyFlags, input.thresholds, sink);

  const reasonCodes: string[] = [];
  const required = REQUIRED_PREFIXES[input.intent];
  if (!sink.facts.some((fact) => required.some((prefix) => fact.fact_id.startsWith(prefix)))) {
    reasonCodes.push("insufficient_facts");
  }
  return { facts: sink.facts, citations: [...input.citations], reason_codes: reasonCodes };
}
