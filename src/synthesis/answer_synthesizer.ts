import {
  ANSWER_PLAN_JSON_SCHEMA,
  ANSWER_PLAN_SCHEMA_VERSION,
  AnswerPlan,
  describeAnswerPlanIssues,
} from "../contracts/answer_plan";
import type { AdvisoryContext } from "../contracts/evidence";
import type { IntentName } from "../contracts/intent";
import { toSinglePromptText, type PromptPack } from "../control-plane/prompt_pack";
import type { Logger } from "../logger";
import type { InferenceProvider } from "../providers/inference_provider";
import { normalizeForMatching } from "../router/text_match";
import { extractJsonObject, type JsonObject } from "./json_extract";

export const DEFAULT_DISCLAIMER = "Educational guidance only. We do not provide investment advice.";

export const RISK_FOLLOW_UP =
  "Which risk appetite fits you best: low, medium, or high? I will refine the plan after your choice.";

const RISK_FOLLOW_UP_INTENTS = new Set<IntentName>(["planning", "scenario", "invest"]);
const RISK_FOLLOW_UP_MARKERS = ["risk appetite", "low, medium, or high"];

const FALLBACK_SUMMARY_LINES = [
  "The response is synthesized from verified facts only.",
  "Guidance is constrained to tool-grounded evidence.",
  "You can provide a more specific goal for a sharper recommendation.",
];

const FALLBACK_ACTIONS = [
  "Confirm your top short-term financial priority.",
  "Refresh your data and re-evaluate in two weeks.",
];

const PLAN_KEYS = new Set([
  "schema_version",
  "summary_lines",
  "key_metrics",
  "actions",
  "assumptions",
  "limitations",
  "disclaimer",
  "used_fact_ids",
  "used_insight_ids",
  "used_action_ids",
]);

export type SynthesisAttempt =
  | { ok: true; plan: AnswerPlan; model: string }
  | { ok: false; errors: string[] };

function textOf(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value).trim();
}

export function coerceStringList(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  const items = Array.isArray(value) ? value : [value];
  return items.map(textOf).filter((item) => item.length > 0);
}

function dedupe(items: Iterable<string>): string[] {
  return [...new Set(items)];
}

/** Model output shows metrics both as `[{fact_id,label}]` and as `{fact_id: label}`. */
export function coerceKeyMetrics(value: unknown): Array<{ fact_id: string; label: string }> {
  const metrics: Array<{ fact_id: string; label: string }> = [];
  const push = (factId: unknown, label: unknown) => {
    const id = textOf(factId);
    if (id) metrics.push({ fact_id: id, label: typeof label === "string" ? label.trim() : "" });
  };

  if (Array.isArray(value)) {
    for (const item of value) {
      if (typeof item === "string") push(item, "");
      else if (typeof item === "object" && item !== null) {
        push(Reflect.get(item, "fact_id"), Reflect.get(item, "label"));
      }
    }
  } else if (typeof value === "object" && value !== null) {
    for (const [key, item] of Object.entries(value)) {
      if (typeof item === "object" && item !== null) {
        push(Reflect.get(item, "fact_id") ?? key, Reflect.get(item, "label"));
      } else {
        push(key, typeof item === "string" ? item : "");
      }
    }
  }
  return metrics;
}

function actionKey(action: string): string {
  const key = normalizeForMatching(action).replace(/\s+/g, " ").trim();
  return RISK_FOLLOW_UP_MARKERS.some((marker) => key.includes(marker)) ? "risk_appetite_follow_up" : key;
}

function dedupeActions(actions: string[]): string[] {
  const seen = new Set<string>();
  return actions.filter((action) => {
    const key = actionKey(action);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Shape raw model JSON into the answer-plan contract without inventing
 * grounding: ids stay exactly as the model declared them so the validator
 * can report unknown ones.
 */
export function normalizeAnswerPayload(
  payload: JsonObject,
  args: { intent: IntentName; context: AdvisoryContext }
): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(payload)) {
    if (PLAN_KEYS.has(key)) out[key] = value;
  }
  out.schema_version = ANSWER_PLAN_SCHEMA_VERSION;

  const summary = coerceStringList(out.summary_lines);
  out.summary_lines = (summary.length < 3 ? [...summary, ...FALLBACK_SUMMARY_LINES] : summary).slice(0, 5);

  out.key_metrics = coerceKeyMetrics(out.key_metrics);

  let actions = coerceStringList(out.actions);
  const flags = args.context.policy_flags;
  if (flags.risk_appetite === "unknown" && RISK_FOLLOW_UP_INTENTS.has(args.intent)) {
    const asked = actions.some((action) => actionKey(action) === "risk_appetite_follow_up");
    if (!asked) actions = [RISK_FOLLOW_UP, ...actions];
  }
  actions = dedupeActions(actions);
  if (actions.length < 2) actions = [...actions, ...FALLBACK_ACTIONS];
  out.actions = actions.slice(0, 4);

  out.assumptions = coerceStringList(out.assumptions);
  out.limitations = coerceStringList(out.limitations);
  out.used_fact_ids = dedupe(coerceStringList(out.used_fact_ids));
  out.used_insight_ids = dedupe(coerceStringList(out.used_insight_ids));
  out.used_action_ids = dedupe(coerceStringList(out.used_action_ids));

  out.disclaimer = textOf(out.disclaimer) || flags.required_disclaimer || DEFAULT_DISCLAIMER;
  return out;
}

/**
 * One generation attempt: call the model, pull out the JSON object,
 * normalise it and check it against the answer-plan contract.
 * Grounding is checked by the caller.
 */
export async function synthesizeAnswerPlan(args: {
  provider: InferenceProvider;
  pack: PromptPack;
  context: AdvisoryContext;
  log: Logger;
}): Promise<SynthesisAttempt> {
  let rawText: string;
  let model: string;
  try {
    const response = await args.provider.complete({
      purpose: "answer_synthesis",
      promptText: toSinglePromptText(args.pack),
      schemaName: ANSWER_PLAN_SCHEMA_VERSION,
      schema: ANSWER_PLAN_JSON_SCHEMA,
      temperature: 0,
      maxOutputTokens: 1200,
      logger: args.log,
    });
    rawText = response.rawText;
    model = response.model;
  } catch (err) {
    const name = err instanceof Error ? err.name : "UnknownError";
    args.log.warn(
      { evt: "synthesis.invoke_failed", error: err instanceof Error ? err.message : String(err) },
      "synthesis.invoke_failed"
    );
    return { ok: false, errors: [`invoke_error:${name}`] };
  }

  args.log.debug({ evt: "synthesis.raw_output", model, rawText }, "synthesis.raw_output");

  const parsed = extractJsonObject(rawText);
  if (!parsed.ok) {
    return { ok: false, errors: ["answer_invalid_json"] };
  }

  const normalized = normalizeAnswerPayload(parsed.value, {
    intent: args.pack.intent,
    context: args.context,
  });
  const validated = AnswerPlan.safeParse(normalized);
  if (!validated.success) {
    return {
      ok: false,
      errors: [
        "answer_invalid_schema",
        ...describeAnswerPlanIssues(validated.error)
          .slice(0, 3)
          .map((issue) => `schema:${issue}`),
      ],
    };
  }

  return { ok: true, plan: validated.data, model };
}
