import type { AnswerPlan } from "../contracts/answer_plan";
import type { AdvisoryContext, Fact } from "../contracts/evidence";
import type { ClarifyingQuestion } from "../contracts/intent";
import { FACT_PLACEHOLDER } from "../gates/grounding_validator";
import { DEFAULT_DISCLAIMER } from "./answer_synthesizer";

export const ADMISSION_FAIL_FAST_MESSAGE =
  "Your message arrived with corrupted characters and could not be read. Please send it again as plain text.";

export const EMPTY_PROMPT_MESSAGE = "Your message was empty. Tell us what you would like help with.";

export const INTERNAL_ERROR_MESSAGE =
  "We were unable to complete this request right now. Please try again shortly.";

const FACTS_ONLY_LIMIT = 5;
const FACTS_ONLY_ACTIONS = 3;
// Derived bookkeeping facts that read poorly on their own.
const FACTS_ONLY_SKIP = ["slot.", "service.signal.", "kb.service_category.", "policy."];

export function formatFactValue(fact: Fact): string {
  if (!fact.unit || fact.unit === "pct") return fact.value_text;
  return `${fact.value_text} ${fact.unit}`;
}

function factIndex(context: AdvisoryContext): Map<string, Fact> {
  return new Map(context.facts.map((fact) => [fact.fact_id, fact]));
}

/** Swap every `[F:id]` for the fact's rendered value; unknown ids stay as written. */
export function fillPlaceholders(text: string, facts: ReadonlyMap<string, Fact>): string {
  return text.replace(FACT_PLACEHOLDER, (whole: string, id: string) => {
    const fact = facts.get(id);
    return fact ? formatFactValue(fact) : whole;
  });
}

function section(title: string, lines: string[]): string[] {
  return lines.length ? ["", `${title}:`, ...lines] : [];
}

export function renderAnswerPlan(plan: AnswerPlan, context: AdvisoryContext): string {
  const facts = factIndex(context);
  const fill = (line: string) => fillPlaceholders(line, facts);

  const metrics = plan.key_metrics.flatMap((metric) => {
    const fact = facts.get(metric.fact_id);
    return fact ? [`- ${metric.label || fact.label}: ${formatFactValue(fact)}`] : [];
  });

  return [
    ...plan.summary_lines.map(fill),
    ...section("Key metrics", metrics),
    ...section("Recommended actions", plan.actions.map((action, i) => `${i + 1}. ${fill(action)}`)),
    ...section("Assumptions", plan.assumptions.map((line) => `- ${fill(line)}`)),
    ...section("Limitations", plan.limitations.map((line) => `- ${fill(line)}`)),
    "",
    plan.disclaimer,
  ].join("\n");
}

/**
 * Deterministic answer with no generation: the top facts verbatim plus the
 * titles of the top action candidates.
 */
export function renderFactsOnly(context: AdvisoryContext): string {
  const shown = context.facts
    .filter((fact) => !FACTS_ONLY_SKIP.some((prefix) => fact.fact_id.startsWith(prefix)))
    .slice(0, FACTS_ONLY_LIMIT);

  const factLines = shown.length
    ? shown.map((fact) => {
        const window = fact.timeframe ? ` (${fact.timeframe})` : "";
        return `- ${fact.label}${window}: ${formatFactValue(fact)}`;
      })
    : ["- No verified data is available for this request yet."];

  const actionLines = context.actions
    .slice(0, FACTS_ONLY_ACTIONS)
    .map((action, i) => `${i + 1}. ${action.title}`);

  return [
    "Here is what your verified data shows:",
    ...factLines,
    ...section("Suggested next steps", actionLines),
    "",
    context.policy_flags.required_disclaimer || DEFAULT_DISCLAIMER,
  ].join("\n");
}

export function renderRefusal(args: { decision?: string; disclaimer?: string }): string {
  const lines = [
    "We can't help with buying, selling or trading specific investments.",
    "We can review your cashflow, risks and savings goals instead.",
  ];
  if (args.decision) lines.push(`Policy decision: ${args.decision}.`);
  lines.push("", args.disclaimer || DEFAULT_DISCLAIMER);
  return lines.join("\n");
}

export function renderClarification(question: ClarifyingQuestion): string {
  return [question.question_text, ...question.options.map((option) => `- ${option}`)].join("\n");
}
