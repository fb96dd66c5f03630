import type { AnswerPlan } from "../contracts/answer_plan";
import type { AdvisoryContext, FactValue } from "../contracts/evidence";
import { compareText } from "../evidence/format";

export const FACT_PLACEHOLDER = /\[F:([a-zA-Z0-9._-]+)\]/g;
const NUMERIC_TOKEN = /[-+]?\d[\d,.]*%?/g;
const LIST_MARKER = /^\s*\d+[.)]\s+/;
const TOKEN_EDGE = /^[.,;:()[\]{}]+|[.,;:()[\]{}]+$/g;
const EXECUTION_WORDING = /\b(buy|sell|trade|execute|short|long)\b/i;

const SAMPLE_SIZE = 5;

export type GroundingViolation =
  | "disclaimer_missing"
  | "unknown_used_fact_ids"
  | "unknown_used_insight_ids"
  | "unknown_used_action_ids"
  | "unknown_metric_fact_id"
  | "metric_fact_not_declared_used"
  | "unknown_fact_placeholders"
  | "placeholder_fact_not_declared_used"
  | "ungrounded_numeric_tokens"
  | "education_only_policy_violation";

export type GroundingResult =
  | { ok: true; errors: [] }
  | {
      ok: false;
      violations: GroundingViolation[];
      /** Violations plus `<violation>_sample:<ids>` detail entries, sorted. */
      errors: string[];
      /** Known fact ids written as placeholders but missing from used_fact_ids. */
      undeclaredPlaceholderIds: string[];
    };

export function proseSections(plan: AnswerPlan): string[] {
  return [...plan.summary_lines, ...plan.actions, ...plan.assumptions, ...plan.limitations];
}

/** Every model-written string the renderer prints; numbers in any of them must be grounded. */
export function renderedTexts(plan: AnswerPlan): string[] {
  return [...proseSections(plan), ...plan.key_metrics.map((metric) => metric.label), plan.disclaimer];
}

export function extractPlaceholderIds(text: string): string[] {
  const ids: string[] = [];
  for (const match of text.matchAll(FACT_PLACEHOLDER)) {
    const id = match[1]?.trim();
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

export function extractNumericTokens(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const match of text.matchAll(NUMERIC_TOKEN)) {
    const token = match[0].trim().replace(TOKEN_EDGE, "");
    if (token) tokens.add(token);
  }
  return tokens;
}

function stripForNumericScan(text: string): string {
  return text
    .replace(FACT_PLACEHOLDER, " ")
    .split("\n")
    .map((line) => line.replace(LIST_MARKER, ""))
    .join("\n");
}

/**
 * Cadence and ordinal numbers ("every 14 days", "top 3", "10%") read as
 * advice rather than data and are tolerated without a backing fact.
 */
export function isSoftToken(token: string): boolean {
  const isPct = token.endsWith("%");
  const value = Number(token.replace(/%$/, "").replace(/,/g, ""));
  if (!Number.isFinite(value)) return false;
  const abs = Math.abs(value);
  if (isPct) return abs <= 25;
  return Number.isInteger(abs) && abs <= 31;
}

function factValueText(value: FactValue): string {
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

function allowedNumericTokens(context: AdvisoryContext, userPrompt: string): Set<string> {
  const allowed = new Set<string>(extractNumericTokens(userPrompt));
  const add = (text: string) => {
    for (const token of extractNumericTokens(text)) allowed.add(token);
  };
  for (const fact of context.facts) {
    add(fact.value_text);
    add(fact.timeframe);
    add(factValueText(fact.value));
  }
  for (const action of context.actions) {
    add(JSON.stringify(action.params));
  }
  if (context.policy_flags.required_disclaimer) add(context.policy_flags.required_disclaimer);
  return allowed;
}

/**
 * Check an answer plan against the advisory context it was generated from.
 * Identifier grounding and numeric grounding run independently; every rule
 * that fails is reported, not only the first.
 */
export function validateGrounding(args: {
  plan: AnswerPlan;
  context: AdvisoryContext;
  userPrompt: string;
}): GroundingResult {
  const { plan, context } = args;
  const factIds = new Set(context.facts.map((fact) => fact.fact_id));
  const insightIds = new Set(context.insights.map((insight) => insight.insight_id));
  const actionIds = new Set(context.actions.map((action) => action.action_id));
  const usedFactIds = new Set(plan.used_fact_ids);

  const violations = new Set<GroundingViolation>();
  const details: string[] = [];
  const flag = (violation: GroundingViolation, sample: string[] = []) => {
    violations.add(violation);
    if (sample.length > 0) {
      const sorted = [...new Set(sample)].sort(compareText).slice(0, SAMPLE_SIZE);
      details.push(`${violation}_sample:${sorted.join(",")}`);
    }
  };

  if (!plan.disclaimer.trim()) flag("disclaimer_missing");

  const unknownFacts = plan.used_fact_ids.filter((id) => !factIds.has(id));
  if (unknownFacts.length) flag("unknown_used_fact_ids", unknownFacts);
  const unknownInsights = plan.used_insight_ids.filter((id) => !insightIds.has(id));
  if (unknownInsights.length) flag("unknown_used_insight_ids", unknownInsights);
  const unknownActions = plan.used_action_ids.filter((id) => !actionIds.has(id));
  if (unknownActions.length) flag("unknown_used_action_ids", unknownActions);

  const metricIds = plan.key_metrics.map((metric) => metric.fact_id);
  const unknownMetrics = metricIds.filter((id) => !factIds.has(id));
  if (unknownMetrics.length) flag("unknown_metric_fact_id", unknownMetrics);
  const undeclaredMetrics = metricIds.filter((id) => !usedFactIds.has(id));
  if (undeclaredMetrics.length) flag("metric_fact_not_declared_used", undeclaredMetrics);

  const sections = proseSections(plan);
  const placeholderIds = sections.flatMap((section) => extractPlaceholderIds(section));
  const unknownPlaceholders = placeholderIds.filter((id) => !factIds.has(id));
  if (unknownPlaceholders.length) flag("unknown_fact_placeholders", unknownPlaceholders);
  const undeclaredPlaceholders = placeholderIds.filter((id) => !usedFactIds.has(id));
  if (undeclaredPlaceholders.length) flag("placeholder_fact_not_declared_used", undeclaredPlaceholders);

  const allowed = allowedNumericTokens(context, args.userPrompt);
  const ungrounded = new Set<string>();
  const rendered = renderedTexts(plan);
  for (const text of rendered) {
    for (const token of extractNumericTokens(stripForNumericScan(text))) {
      if (!allowed.has(token) && !isSoftToken(token)) ungrounded.add(token);
    }
  }
  if (ungrounded.size) flag("ungrounded_numeric_tokens", [...ungrounded]);

  if (context.policy_flags.education_only && EXECUTION_WORDING.test([...sections, ...plan.key_metrics.map((metric) => metric.label)].join(" "))) {
    flag("education_only_policy_violation");
  }

  if (violations.size === 0) return { ok: true, errors: [] };

  return {
    ok: false,
    violations: [...violations].sort(compareText),
    errors: [...violations, ...details].sort(compareText),
    undeclaredPlaceholderIds: [...new Set(undeclaredPlaceholders.filter((id) => factIds.has(id)))],
  };
}
