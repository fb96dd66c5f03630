import type { IntentExtraction, IntentName } from "../contracts/intent";
import terms from "./override_terms.json";
import { containsAny, hasInvalidCalendarDate, normalizeForMatching } from "./text_match";

export type OverrideContext = {
  text: string;
  extraction: IntentExtraction;
  hasInvestTerms: boolean;
  hasDelta: boolean;
  outOfScopeScore: number;
};

/**
 * One row of the override table. `intent: null` stops evaluation and keeps
 * the extracted intent.
 */
export type OverrideRule = {
  name: string;
  intent: IntentName | null;
  when: (ctx: OverrideContext) => boolean;
};

export type OverrideResult = {
  intent: IntentName;
  reasonCode: string;
};

const SCENARIO_DELTA_KEYS = [
  "income_delta_pct",
  "spend_delta_pct",
  "income_delta_amount",
  "spend_delta_amount",
  "variants",
] as const;

const INVEST_VERB_PHRASE = new RegExp(
  `\\b(mua|buy|ban|sell)\\s+(${terms.invest_objects.join("|")})\\b`
);
const PURCHASE_PHRASE = /\b(mua|buy)\b\s+\S/;
const TIME_HORIZON_PHRASE =
  /\b(trong|sau|in|within)\s+\d{1,3}\s*(ngay|tuan|thang|nam|days?|weeks?|months?|years?)\b/;
const BUDGET_AMOUNT_PHRASE = /\b\d+(?:[.,]\d+)?\s*(k|nghin|ngan|trieu|ty|ti|m|million|billion)\b/;

function isMeaningful(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === "string") return value.trim().length > 0;
  if (typeof value === "number") return value !== 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object") return Object.keys(value).length > 0;
  return true;
}

export function hasScenarioDelta(slots: Record<string, unknown>): boolean {
  return SCENARIO_DELTA_KEYS.some((key) => isMeaningful(slots[key]));
}

function top2Score(extraction: IntentExtraction, intent: IntentName): number {
  return extraction.top2.find((item) => item.intent === intent)?.score ?? 0;
}

function hasPurchaseGoal(ctx: OverrideContext): boolean {
  if (ctx.hasInvestTerms || !PURCHASE_PHRASE.test(ctx.text)) return false;
  if (containsAny(ctx.text, terms.purchase_goal_cues)) return true;
  return TIME_HORIZON_PHRASE.test(ctx.text) || BUDGET_AMOUNT_PHRASE.test(ctx.text);
}

const isScenario = (ctx: OverrideContext) => ctx.extraction.intent === "scenario";

/** Ordered; the first matching row wins. */
export const OVERRIDE_RULES: readonly OverrideRule[] = [
  {
    name: "invest_to_planning_optimize",
    intent: "planning",
    when: (ctx) =>
      ctx.extraction.intent === "invest" && containsAny(ctx.text, terms.optimize) && !ctx.hasInvestTerms,
  },
  {
    name: "anomaly_to_risk",
    intent: "risk",
    when: (ctx) => containsAny(ctx.text, terms.anomaly) && !ctx.hasInvestTerms,
  },
  {
    name: "savings_deposit_to_planning",
    intent: "planning",
    when: (ctx) => containsAny(ctx.text, terms.savings_deposit) && !ctx.hasInvestTerms,
  },
  {
    name: "home_goal_to_planning",
    intent: "planning",
    when: (ctx) => containsAny(ctx.text, terms.home_goal),
  },
  {
    name: "purchase_goal_to_planning",
    intent: "planning",
    when: hasPurchaseGoal,
  },
  {
    name: "recurring_to_planning",
    intent: "planning",
    when: (ctx) => containsAny(ctx.text, terms.recurring),
  },
  {
    name: "service_priority_to_planning",
    intent: "planning",
    when: (ctx) =>
      containsAny(ctx.text, terms.service_priority) && containsAny(ctx.text, terms.cashflow_pressure),
  },
  {
    name: "oos_invalid_date_in_scope",
    intent: "summary",
    when: (ctx) =>
      ctx.extraction.intent === "out_of_scope" &&
      containsAny(ctx.text, terms.finance) &&
      hasInvalidCalendarDate(ctx.text),
  },
  {
    name: "low_domain_relevance",
    intent: "out_of_scope",
    when: (ctx) => ctx.extraction.intent !== "out_of_scope" && ctx.extraction.domain_relevance <= 0.25,
  },
  {
    name: "low_domain_relevance_top2_oos",
    intent: "out_of_scope",
    when: (ctx) =>
      ctx.extraction.intent !== "out_of_scope" &&
      ctx.extraction.domain_relevance <= 0.4 &&
      ctx.outOfScopeScore >= 0.3,
  },
  {
    name: "scenario_explicit_what_if",
    intent: null,
    when: (ctx) =>
      isScenario(ctx) &&
      (containsAny(ctx.text, terms.what_if) || (ctx.hasDelta && containsAny(ctx.text, terms.change))),
  },
  {
    name: "scenario_to_planning",
    intent: "planning",
    when: (ctx) => isScenario(ctx) && containsAny(ctx.text, terms.scenario_planning),
  },
  {
    name: "scenario_to_risk",
    intent: "risk",
    when: (ctx) => isScenario(ctx) && containsAny(ctx.text, terms.scenario_risk),
  },
  {
    name: "scenario_to_summary",
    intent: "summary",
    when: (ctx) => isScenario(ctx) && containsAny(ctx.text, terms.scenario_summary),
  },
  {
    name: "scenario_to_summary_default",
    intent: "summary",
    when: (ctx) => isScenario(ctx) && !ctx.hasDelta,
  },
];

export function buildOverrideContext(prompt: string, extraction: IntentExtraction): OverrideContext {
  const text = normalizeForMatching(prompt);
  return {
    text,
    extraction,
    hasInvestTerms: containsAny(text, terms.invest) || INVEST_VERB_PHRASE.test(text),
    hasDelta: hasScenarioDelta(extraction.slots),
    outOfScopeScore: top2Score(extraction, "out_of_scope"),
  };
}

export function suggestIntentOverride(
  prompt: string,
  extraction: IntentExtraction,
  rules: readonly OverrideRule[] = OVERRIDE_RULES
): OverrideResult | null {
  const ctx = buildOverrideContext(prompt, extraction);
  for (const rule of rules) {
    if (!rule.when(ctx)) continue;
    if (rule.intent === null) return null;
    return { intent: rule.intent, reasonCode: `intent_override:${rule.name}` };
  }
  return null;
}
