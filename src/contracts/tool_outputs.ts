import { z } from "zod";

export const TOOL_NAMES = [
  "spend-analytics",
  "anomaly-signals",
  "cashflow-forecast",
  "risk-profile-non-investment",
  "goal-feasibility",
  "recurring-cashflow-detect",
  "jar-allocation-suggest",
  "what-if-scenario",
  "suitability-guard",
] as const;

export const ToolName = z.enum(TOOL_NAMES);
export type ToolName = z.infer<typeof ToolName>;

export function isToolName(value: string): value is ToolName {
  return ToolName.safeParse(value).success;
}

// Tools serialise amounts either as numbers or as "1,250,000" strings.
const Numeric = z.union([z.number(), z.string()]).nullish();
const Text = z.string().nullish();
const TextList = z.array(z.union([z.string(), z.number()])).nullish();

export const SpendAnalyticsOutput = z
  .object({
    range: Text,
    total_income: Numeric,
    total_spend: Numeric,
    net_cashflow: Numeric,
  })
  .passthrough();

export const CashflowForecastOutput = z
  .object({
    points: z
      .array(
        z
          .object({
            income_estimate: Numeric,
            spend_estimate: Numeric,
            p50: Numeric,
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

export const RiskProfileOutput = z
  .object({
    risk_band: Text,
    emergency_runway_months: Numeric,
    cashflow_volatility: Numeric,
    overspend_propensity: Numeric,
    lookback_days: Numeric,
  })
  .passthrough();

export const AnomalySignalsOutput = z
  .object({
    flags: z.array(z.string().nullable()).default([]),
    lookback_days: Numeric,
    abnormal_spend: z.object({ z_score: Numeric }).passthrough().nullish(),
    income_drop: z.object({ drop_pct: Numeric }).passthrough().nullish(),
    low_balance_risk: z.object({ runway_days_estimate: Numeric }).passthrough().nullish(),
    category_spikes: z
      .array(
        z
          .object({
            category_name: Text,
            delta_share: Numeric,
            recent_amount: Numeric,
          })
          .passthrough()
      )
      .nullish(),
    change_points: TextList,
    external_engines: z
      .object({
        ruptures_pelt: z.object({ change_points: TextList }).passthrough().nullish(),
        pyod_ecod: z.object({ outlier_probability: Numeric }).passthrough().nullish(),
        river_adwin: z.object({ drift_points: z.array(z.unknown()).nullish() }).passthrough().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const GoalFeasibilityOutput = z
  .object({
    status: Text,
    reason_codes: z.array(z.string()).nullish(),
    target_amount: Numeric,
    horizon_months: Numeric,
    required_monthly_saving: Numeric,
    feasible: z.boolean().nullish(),
    gap_amount: Numeric,
  })
  .passthrough();

export const RecurringCashflowOutput = z
  .object({
    fixed_cost_ratio: Numeric,
    lookback_months: Numeric,
  })
  .passthrough();

export const JarAllocationOutput = z
  .object({
    status: Text,
    reason_codes: z.array(z.string()).nullish(),
    allocations: z
      .array(
        z
          .object({
            jar_name: Text,
            ratio: Numeric,
            amount: Numeric,
          })
          .passthrough()
      )
      .nullish(),
  })
  .passthrough();

const SCENARIO_ENVELOPE_KEYS = ["payload", "result", "data", "output"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasScenarioFields(value: Record<string, unknown>): boolean {
  return "scenario_comparison" in value || "best_variant_by_goal" in value;
}

/**
 * Some scenario engines wrap their result one level deep. Lift it so the
 * schema below only has to describe one shape.
 */
export function unwrapScenarioPayload(raw: unknown): unknown {
  if (!isRecord(raw) || hasScenarioFields(raw)) return raw;
  for (const key of SCENARIO_ENVELOPE_KEYS) {
    const nested = raw[key];
    if (isRecord(nested) && hasScenarioFields(nested)) return nested;
  }
  return raw;
}

export const WhatIfScenarioOutput = z.preprocess(
  unwrapScenarioPayload,
  z
    .object({
      base_total_net_p50: Numeric,
      best_variant_by_goal: Text,
      scenario_comparison: z
        .array(
          z
            .object({
              name: Text,
              delta_vs_base: Numeric,
            })
            .passthrough()
        )
        .nullish(),
    })
    .passthrough()
);

export const SuitabilityDecision = z.enum([
  "allow",
  "education_only",
  "deny_recommendation",
  "deny_execution",
]);
export type SuitabilityDecision = z.infer<typeof SuitabilityDecision>;

export const SuitabilityGuardOutput = z
  .object({
    allow: z.boolean().default(true),
    decision: SuitabilityDecision.default("allow"),
    required_disclaimer: Text,
    reason_codes: z.array(z.string()).nullish(),
  })
  .passthrough();

export const TOOL_OUTPUT_SCHEMAS = {
  "spend-analytics": SpendAnalyticsOutput,
  "anomaly-signals": AnomalySignalsOutput,
  "cashflow-forecast": CashflowForecastOutput,
  "risk-profile-non-investment": RiskProfileOutput,
  "goal-feasibility": GoalFeasibilityOutput,
  "recurring-cashflow-detect": RecurringCashflowOutput,
  "jar-allocation-suggest": JarAllocationOutput,
  "what-if-scenario": WhatIfScenarioOutput,
  "suitability-guard": SuitabilityGuardOutput,
} as const satisfies Record<ToolName, z.ZodTypeAny>;

export type ToolOutputs = {
  [K in ToolName]: z.infer<(typeof TOOL_OUTPUT_SCHEMAS)[K]>;
};

/** Tagged union over every tool result the core understands. */
export type ToolResult = {
  [K in ToolName]: { tool: K; output: ToolOutputs[K] };
}[ToolName];

/** Output map after fan-out: one optional, typed slot per tool. */
export type ToolOutputMap = Partial<ToolOutputs>;

export type ToolErrorKind =
  | "transport"
  | "timeout"
  | "http_4xx"
  | "http_5xx"
  | "rpc_error"
  | "invalid_output"
  | "unknown_tool";

export type ToolErrorEntry = {
  error_kind: ToolErrorKind;
  message: string;
};

/** Keyed by the requested name, which may not be a known tool. */
export type ToolErrorMap = Record<string, ToolErrorEntry>;

type ParseOutcome<T> = { success: true; data: T } | { success: false; error: z.ZodError };

const PARSERS: { [K in ToolName]: (raw: unknown) => ParseOutcome<ToolOutputs[K]> } = {
  "spend-analytics": (raw) => SpendAnalyticsOutput.safeParse(raw),
  "anomaly-signals": (raw) => AnomalySignalsOutput.safeParse(raw),
  "cashflow-forecast": (raw) => CashflowForecastOutput.safeParse(raw),
  "risk-profile-non-investment": (raw) => RiskProfileOutput.safeParse(raw),
  "goal-feasibility": (raw) => GoalFeasibilityOutput.safeParse(raw),
  "recurring-cashflow-detect": (raw) => RecurringCashflowOutput.safeParse(raw),
  "jar-allocation-suggest": (raw) => JarAllocationOutput.safeParse(raw),
  "what-if-scenario": (raw) => WhatIfScenarioOutput.safeParse(raw),
  "suitability-guard": (raw) => SuitabilityGuardOutput.safeParse(raw),
};

export function parseToolOutput<K extends ToolName>(
  tool: K,
  raw: unknown
): { ok: true; output: ToolOutputs[K] } | { ok: false; message: string } {
  const parsed = PARSERS[tool](raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return {
      ok: false,
      message: first ? `${first.path.join(".") || "(root)"}: ${first.message}` : "invalid output",
    };
  }
  return { ok: true, output: parsed.data };
}

export function setToolOutput<K extends ToolName>(
  map: ToolOutputMap,
  tool: K,
  output: ToolOutputs[K]
): void {
  map[tool] = output;
}
