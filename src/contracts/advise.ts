import { z } from "zod";

import type { IntentName, RouterMode } from "./intent";

export const AdviseRequest = z
  .object({
    prompt: z.string().min(1).max(8000),
    user_id: z.string().min(1).max(128),
    conversation_id: z.string().min(1).max(128).optional(),
  })
  .strict();
export type AdviseRequest = z.infer<typeof AdviseRequest>;

export type RoutingMeta = {
  router_mode: RouterMode;
  policy_version: string;
  final_intent: IntentName;
  source: "rule" | "semantic";
  tool_bundle: string[];
  clarify_needed: boolean;
  clarification_round: number;
  clarification_question_id?: string;
  fallback_used?: string;
  reason_codes: string[];
  intent_confidence?: number;
  top2_gap?: number;
  shadow_intent?: IntentName;
};

export type ResponseKind =
  | "answer"
  | "facts_only"
  | "clarification"
  | "refusal"
  | "admission_fail_fast"
  | "internal_error";

export type ResponseMeta = {
  response_mode: string;
  kind: ResponseKind;
  schema_version: string;
  encoding_decision: string;
  encoding_reason_codes: string[];
  mojibake_score: number;
  synthesis_attempts: number;
  repair_applied: boolean;
  /** Whether a generated plan passed validation; absent when no generation ran. */
  synthesis_valid?: boolean;
  fallback_used: boolean;
  validation_errors: string[];
  tool_errors: Record<string, { error_kind: string; message: string }>;
  reason_codes: string[];
  error_bucket?: string;
};

export type AdviseResponse = {
  response: string;
  trace_id: string;
  citations: string[];
  tool_calls: string[];
  routing_meta: RoutingMeta;
  response_meta: ResponseMeta;
  disclaimer: string;
};
