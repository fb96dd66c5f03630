import type { IntentName, IntentSlots } from "../contracts/intent";
import type { ToolName } from "../contracts/tool_outputs";
import { clampInt, parseIntFromValue, safeFloat } from "../evidence/format";
import { normalizeForMatching } from "../router/text_match";

export type ToolArgContext = {
  userId: string;
  traceId: string;
  prompt: string;
  intent: IntentName;
  slots: IntentSlots;
};

export type ToolArgs = Record<string, unknown>;

const SPEND_RANGES = ["30d", "60d", "90d"] as const;

function spendRange(slots: IntentSlots): string {
  const raw = (slots.range ?? "").trim().toLowerCase();
  const match = SPEND_RANGES.find((range) => range === raw);
  if (match) return match;
  const days = parseIntFromValue(raw || slots.lookback_days, 30);
  if (days >= 90) return "90d";
  if (days >= 60) return "60d";
  return "30d";
}

function scenarioVariants(slots: IntentSlots): Array<Record<string, number | string>> {
  const overrides: Record<string, number> = {};
  const incomePct = safeFloat(slots.income_delta_pct);
  const spendPct = safeFloat(slots.spend_delta_pct);
  const incomeAmount = safeFloat(slots.income_delta_amount);
  const spendAmount = safeFloat(slots.spend_delta_amount);
  if (incomePct !== undefined) overrides.income_delta_pct = incomePct;
  if (spendPct !== undefined) overrides.spend_delta_pct = spendPct;
  if (incomeAmount !== undefined) overrides.income_delta_amount = incomeAmount;
  if (spendAmount !== undefined) overrides.spend_delta_amount = spendAmount;
  if (Object.keys(overrides).length === 0) return [];
  return [{ name: "requested_change", ...overrides }];
}

/** Best-effort label for what the user wants done, read by the suitability guard. */
export function requestedActionFromPrompt(prompt: string): string {
  const text = normalizeForMatching(prompt);
  if (/\b(should i|is it a good time to|co nen|nen)\s+(buy|mua)\b/.test(text)) return "recommend_buy";
  if (/\b(should i|is it a good time to|co nen|nen)\s+(sell|ban)\b/.test(text)) return "recommend_sell";
  if (/\b(buy|mua)\b/.test(text)) return "buy";
  if (/\b(sell|ban)\b/.test(text)) return "sell";
  if (/\b(trade|execute|order)\b/.test(text)) return "trade";
  return "advice";
}

type ArgBuilder = (ctx: ToolArgContext) => ToolArgs;

const ARG_BUILDERS: Record<ToolName, ArgBuilder> = {
  "spend-analytics": (ctx) => ({ range: spendRange(ctx.slots) }),
  "anomaly-signals": (ctx) => ({
    lookback_days: clampInt(parseIntFromValue(ctx.slots.lookback_days, 90), 30, 365),
  }),
  "cashflow-forecast": () => ({ horizon: "weekly_12" }),
  "risk-profile-non-investment": (ctx) => ({
    lookback_days: clampInt(parseIntFromValue(ctx.slots.lookback_days, 180), 60, 720),
  }),
  "goal-feasibility": (ctx) => ({
    ...(ctx.slots.target_amount !== undefined ? { target_amount: ctx.slots.target_amount } : {}),
    ...(ctx.slots.horizon_months ? { horizon_months: clampInt(ctx.slots.horizon_months, 1, 600) } : {}),
  }),
  "recurring-cashflow-detect": (ctx) => ({
    lookback_months: clampInt(parseIntFromValue(ctx.slots.lookback_months, 6), 3, 24),
  }),
  "jar-allocation-suggest": () => ({}),
  "what-if-scenario": (ctx) => ({
    horizon_months: clampInt(parseIntFromValue(ctx.slots.horizon_months, 12), 1, 24),
    goal: "maximize_savings",
    variants: scenarioVariants(ctx.slots),
  }),
  "suitability-guard": (ctx) => ({
    intent: ctx.intent,
    requested_action: requestedActionFromPrompt(ctx.prompt),
    prompt: ctx.prompt,
  }),
};

/** Arguments for one tool call. Every call carries `user_id` and `trace_id`. */
export function buildToolArgs(tool: ToolName, ctx: ToolArgContext): ToolArgs {
  return {
    user_id: ctx.userId,
    trace_id: ctx.traceId,
    ...ARG_BUILDERS[tool](ctx),
  };
}

