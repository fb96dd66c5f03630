import {
  INTENT_EXTRACTION_SCHEMA_VERSION,
  IntentExtraction,
  type ClarifyingQuestion,
} from "../contracts/intent";
import { INTENT_EXTRACTION_JSON_SCHEMA } from "../contracts/answer_plan";
import type { Logger } from "../logger";
import type { InferenceProvider } from "../providers/inference_provider";
import { extractJsonObject, type JsonObject } from "../synthesis/json_extract";

export const EXTRACTOR_PROMPT_VERSION = "intent_extractor_v1";

const NUMERIC_SLOTS = [
  "target_amount",
  "horizon_months",
  "income_delta_pct",
  "spend_delta_pct",
  "income_delta_amount",
  "spend_delta_amount",
  "lookback_days",
] as const;
const INTEGER_SLOTS = new Set<string>(["horizon_months", "lookback_days"]);
const RISK_APPETITES = new Set(["conservative", "moderate", "aggressive", "unknown"]);

export type PriorClarification = {
  question: ClarifyingQuestion;
  previousPrompt: string;
};

export type ExtractionOutcome =
  | { ok: true; extraction: IntentExtraction; errors: string[]; attempts: number }
  | { ok: false; errors: string[]; attempts: number };

export function buildExtractionPrompt(userPrompt: string, prior?: PriorClarification): string {
  const lines = [
    "You are an intent and slot extractor for a personal-finance advisor.",
    "Return ONLY one valid JSON object. Do not add markdown, comments, or explanation.",
    `Use schema_version='${INTENT_EXTRACTION_SCHEMA_VERSION}'.`,
    "Allowed intent values: summary, risk, planning, scenario, invest, out_of_scope.",
    "top2 must contain exactly two intent+score entries, best first. Scores must be between 0 and 1.",
    "domain_relevance must be between 0 and 1 and describe how related the prompt is to personal-finance advisory.",
    "Classify as scenario only for explicit what-if or counterfactual prompts with changes.",
    "If the user asks for current-state analysis of a period (30/60/90 days) without hypothetical changes, prefer summary or risk.",
    "If the user asks whether a goal is feasible (buy a house, reach a savings target), prefer planning unless explicit what-if deltas are requested.",
    "If the prompt is not about cashflow, budgeting, non-investment risk, planning or what-if analysis, classify as out_of_scope.",
    "For scenario intent, extract when present: horizon_months, income_delta_pct, spend_delta_pct, income_delta_amount, spend_delta_amount.",
    "For planning intent, extract when present: target_amount, horizon_months.",
    "If the user states a risk preference, set slots.risk_appetite to one of: conservative, moderate, aggressive.",
    "If a value is missing, leave the slot out rather than guessing.",
    "Output JSON fields: schema_version, intent, sub_intent, confidence, domain_relevance, top2, slots, scenario_confidence, reason.",
  ];
  if (prior) {
    lines.push(
      `Earlier the user asked: ${prior.previousPrompt}`,
      `We asked: ${prior.question.question_text} Options: ${prior.question.options.join(" | ")}`,
      "Treat the prompt below as the answer to that question."
    );
  }
  lines.push(`User prompt: ${userPrompt}`);
  return lines.join("\n");
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function outOfScopeTop2Score(top2: unknown): number {
  if (!Array.isArray(top2)) return 0;
  for (const item of top2) {
    if (typeof item !== "object" || item === null) continue;
    const intent: unknown = Reflect.get(item, "intent");
    const score: unknown = Reflect.get(item, "score");
    if (String(intent ?? "").trim() === "out_of_scope" && typeof score === "number") {
      return clamp01(score);
    }
  }
  return 0;
}

function coerceNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value !== "string") return undefined;
  const parsed = Number(value.trim().replace(/,/g, "").replace(/%$/, ""));
  return value.trim() && Number.isFinite(parsed) ? parsed : undefined;
}

function sanitizeSlots(raw: unknown): JsonObject {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return {};
  const slots: JsonObject = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) continue;
    slots[key] = value;
  }
  for (const key of NUMERIC_SLOTS) {
    if (!(key in slots)) continue;
    const parsed = coerceNumber(slots[key]);
    if (parsed === undefined) {
      delete slots[key];
    } else {
      slots[key] = INTEGER_SLOTS.has(key) ? Math.round(parsed) : parsed;
    }
  }
  if (typeof slots.target_amount === "number" && slots.target_amount <= 0) delete slots.target_amount;
  if ("risk_appetite" in slots) {
    const appetite = String(slots.risk_appetite).trim().toLowerCase();
    if (RISK_APPETITES.has(appetite)) slots.risk_appetite = appetite;
    else delete slots.risk_appetite;
  }
  return slots;
}

/** Fill the gaps models commonly leave before the payload meets the contract. */
export function sanitizeExtractionPayload(payload: JsonObject): JsonObject {
  const normalized: JsonObject = { ...payload };
  if (normalized.sub_intent === null || normalized.sub_intent === undefined) normalized.sub_intent = "";
  if (normalized.reason === null || normalized.reason === undefined) normalized.reason = "";
  if (normalized.scenario_confidence === null) delete normalized.scenario_confidence;
  if (normalized.schema_version === undefined) normalized.schema_version = INTENT_EXTRACTION_SCHEMA_VERSION;

  const relevance = normalized.domain_relevance;
  if (typeof relevance === "number" && Number.isFinite(relevance)) {
    normalized.domain_relevance = clamp01(relevance);
  } else {
    const oosScore = outOfScopeTop2Score(normalized.top2);
    if (oosScore > 0) {
      normalized.domain_relevance = 1 - oosScore;
    } else if (normalized.intent === "out_of_scope") {
      normalized.domain_relevance = 0.2;
    } else if (typeof normalized.confidence === "number") {
      normalized.domain_relevance = clamp01(normalized.confidence);
    } else {
      normalized.domain_relevance = 0.5;
    }
  }

  normalized.slots = sanitizeSlots(normalized.slots);
  return normalized;
}

/**
 * Ask the inference boundary for an intent extraction. Transport failures,
 * unparseable text and contract violations each consume one attempt; the
 * caller decides what to do when every attempt fails.
 */
export async function extractIntent(args: {
  provider: InferenceProvider;
  prompt: string;
  retryAttempts: number;
  prior?: PriorClarification;
  log: Logger;
}): Promise<ExtractionOutcome> {
  const promptText = buildExtractionPrompt(args.prompt, args.prior);
  const errors: string[] = [];
  const maxAttempts = Math.max(0, args.retryAttempts) + 1;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let rawText: string;
    try {
      const response = await args.provider.complete({
        purpose: "intent_extraction",
        promptText,
        schemaName: "intent_extraction_v1",
        schema: INTENT_EXTRACTION_JSON_SCHEMA,
        temperature: 0,
        maxOutputTokens: 400,
        logger: args.log,
      });
      rawText = response.rawText;
    } catch (err) {
      const name = err instanceof Error ? err.name : "UnknownError";
      errors.push(`invoke_error:${name}`);
      args.log.warn(
        { evt: "router.extraction_invoke_failed", attempt, error: err instanceof Error ? err.message : String(err) },
        "router.extraction_invoke_failed"
      );
      continue;
    }

    const parsed = extractJsonObject(rawText);
    if (!parsed.ok) {
      errors.push("invalid_json");
      args.log.debug({ evt: "router.extraction_invalid_json", attempt, rawText }, "router.extraction_invalid_json");
      continue;
    }

    const validated = IntentExtraction.safeParse(sanitizeExtractionPayload(parsed.value));
    if (!validated.success) {
      errors.push("invalid_schema");
      for (const issue of validated.error.issues.slice(0, 3)) {
        errors.push(`schema:${issue.path.join(".") || "$"}:${issue.message}`);
      }
      continue;
    }

    return { ok: true, extraction: validated.data, errors, attempts: attempt };
  }

  return { ok: false, errors, attempts: maxAttempts };
}
