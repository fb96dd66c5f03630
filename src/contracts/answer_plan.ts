import { z } from "zod";

export const ANSWER_PLAN_SCHEMA_VERSION = "answer_plan_v2" as const;

export const KeyMetric = z
  .object({
    fact_id: z.string().min(1),
    label: z.string().default(""),
  })
  .strict();
export type KeyMetric = z.infer<typeof KeyMetric>;

const NonEmptyLine = z.string().refine((line) => line.trim().length > 0, {
  message: "must not be blank",
});

export const AnswerPlan = z
  .object({
    schema_version: z.literal(ANSWER_PLAN_SCHEMA_VERSION),
    summary_lines: z.array(NonEmptyLine).min(3).max(5),
    key_metrics: z.array(KeyMetric).default([]),
    actions: z.array(NonEmptyLine).min(2).max(4),
    assumptions: z.array(z.string()).default([]),
    limitations: z.array(z.string()).default([]),
    disclaimer: z.string().min(1),
    used_fact_ids: z.array(z.string().min(1)).default([]),
    used_insight_ids: z.array(z.string().min(1)).default([]),
    used_action_ids: z.array(z.string().min(1)).default([]),
  })
  .strict();
export type AnswerPlan = z.infer<typeof AnswerPlan>;

export function describeAnswerPlanIssues(error: z.ZodError): string[] {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "$"}: ${issue.message}`)
    .sort();
}

/**
 * JSON schema handed to the inference provider for structured output.
 * Kept in step with the zod contract above.
 */
export const ANSWER_PLAN_JSON_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: [
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
  ],
  properties: {
    schema_version: { type: "string", enum: [ANSWER_PLAN_SCHEMA_VERSION] },
    summary_lines: { type: "array", minItems: 3, maxItems: 5, items: { type: "string" } },
    key_metrics: {
      type: "array",
      items: {
        type: "object",
        required: ["fact_id", "label"],
        properties: {
          fact_id: { type: "string" },
          label: { type: "string" },
        },
      },
    },
    actions: { type: "array", minItems: 2, maxItems: 4, items: { type: "string" } },
    assumptions: { type: "array", items: { type: "string" } },
    limitations: { type: "array", items: { type: "string" } },
    disclaimer: { type: "string" },
    used_fact_ids: { type: "array", items: { type: "string" } },
    used_insight_ids: { type: "array", items: { type: "string" } },
    used_action_ids: { type: "array", items: { type: "string" } },
  },
} as const;

export const INTENT_EXTRACTION_JSON_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "intent",
    "sub_intent",
    "confidence",
    "domain_relevance",
    "top2",
    "slots",
    "scenario_confidence",
    "reason",
  ],
  properties: {
    schema_version: { type: "string", enum: ["intent_extraction_v1"] },
    intent: {
      type: "string",
      enum: ["summary", "risk", "planning", "scenario", "invest", "out_of_scope"],
    },
    sub_intent: { type: "string" },
    confidence: { type: "number" },
    domain_relevance: { type: "number" },
    top2: {
      type: "array",
      minItems: 2,
      maxItems: 2,
      items: {
        type: "object",
        required: ["intent", "score"],
        properties: {
          intent: { type: "string" },
          score: { type: "number" },
        },
      },
    },
    slots: { type: "object", additionalProperties: true },
    scenario_confidence: { type: ["number", "null"] },
    reason: { type: "string" },
  },
} as const;
