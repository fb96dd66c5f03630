import { z } from "zod";

export const INTENT_NAMES = [
  "summary",
  "risk",
  "planning",
  "scenario",
  "invest",
  "out_of_scope",
] as const;

export const IntentName = z.enum(INTENT_NAMES);
export type IntentName = z.infer<typeof IntentName>;

export const RouterMode = z.enum(["rule", "semantic_shadow", "semantic_enforce"]);
export type RouterMode = z.infer<typeof RouterMode>;

export const INTENT_EXTRACTION_SCHEMA_VERSION = "intent_extraction_v1" as const;

export const IntentCandidate = z
  .object({
    intent: IntentName,
    score: z.number().min(0).max(1),
  })
  .strict();
export type IntentCandidate = z.infer<typeof IntentCandidate>;

/**
 * Known slots are typed; anything else the extractor returns rides along
 * untouched so tools and fact extraction can read it later.
 */
export const IntentSlots = z
  .object({
    target_amount: z.number().positive().optional(),
    horizon_months: z.number().int().min(0).max(600).optional(),
    risk_appetite: z.enum(["conservative", "moderate", "aggressive", "unknown"]).optional(),
    income_delta_pct: z.number().optional(),
    spend_delta_pct: z.number().optional(),
    income_delta_amount: z.number().optional(),
    spend_delta_amount: z.number().optional(),
    lookback_days: z.number().int().positive().optional(),
    range: z.string().optional(),
  })
  .passthrough();
export type IntentSlots = z.infer<typeof IntentSlots>;

export const IntentExtraction = z
  .object({
    schema_version: z.literal(INTENT_EXTRACTION_SCHEMA_VERSION).default(INTENT_EXTRACTION_SCHEMA_VERSION),
    intent: IntentName,
    sub_intent: z.string().default(""),
    confidence: z.number().min(0).max(1),
    domain_relevance: z.number().min(0).max(1).default(1),
    top2: z.array(IntentCandidate).length(2),
    slots: IntentSlots.default({}),
    scenario_confidence: z.number().min(0).max(1).optional(),
    reason: z.string().default(""),
  })
  .strict();
export type IntentExtraction = z.infer<typeof IntentExtraction>;

export function top2Gap(extraction: Pick<IntentExtraction, "top2">): number {
  const [first, second] = extraction.top2;
  return (first?.score ?? 0) - (second?.score ?? 0);
}

export const ClarifyingQuestion = z
  .object({
    question_id: z.string().min(1),
    question_text: z.string().min(1),
    options: z.array(z.string().min(1)).min(2).max(5),
    max_questions: z.number().int().min(1),
  })
  .strict();
export type ClarifyingQuestion = z.infer<typeof ClarifyingQuestion>;

export type RouteSource = "rule" | "semantic";

export type RouteDecision = {
  mode: RouterMode;
  policy_version: string;
  final_intent: IntentName;
  tool_bundle: string[];
  clarify_needed: boolean;
  clarifying_question?: ClarifyingQuestion;
  reason_codes: string[];
  fallback_used?: string;
  source: RouteSource;
};

export type ClarificationState = {
  pending: boolean;
  round: number;
  max_questions: number;
  question?: ClarifyingQuestion;
};

export function isIntentName(value: string): value is IntentName {
  return IntentName.safeParse(value).success;
}
