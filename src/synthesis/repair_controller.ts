import type { AnswerPlan } from "../contracts/answer_plan";
import type { AdvisoryContext } from "../contracts/evidence";
import type { IntentName } from "../contracts/intent";
import {
  buildPromptPack,
  promptPackLogShape,
  withCorrectionSection,
  type RouteSummary,
} from "../control-plane/prompt_pack";
import { validateGrounding, type GroundingResult } from "../gates/grounding_validator";
import type { Logger } from "../logger";
import type { InferenceProvider } from "../providers/inference_provider";
import { synthesizeAnswerPlan } from "./answer_synthesizer";

const RULE_HINTS: Record<string, string> = {
  answer_invalid_json: "Return exactly one JSON object and nothing else.",
  answer_invalid_schema: "Follow the output fields and line-count bounds exactly.",
  disclaimer_missing: "Include the disclaimer.",
  unknown_used_fact_ids: "Declare only fact_id values listed in the advisory context.",
  unknown_used_insight_ids: "Declare only insight_id values listed in the advisory context.",
  unknown_used_action_ids: "Declare only action_id values listed in the advisory context.",
  unknown_metric_fact_id: "key_metrics may only use listed fact ids.",
  metric_fact_not_declared_used: "Add every key_metrics fact_id to used_fact_ids.",
  unknown_fact_placeholders: "Use [F:fact_id] placeholders only for listed fact ids.",
  placeholder_fact_not_declared_used: "Add every placeholder fact id to used_fact_ids.",
  ungrounded_numeric_tokens: "Replace every raw number with a [F:fact_id] placeholder.",
  education_only_policy_violation: "Do not use buy, sell, trade or execute wording.",
};

export type SynthesisOutcome =
  | {
      ok: true;
      plan: AnswerPlan;
      attempts: number;
      repairApplied: boolean;
      validationErrors: string[];
      model: string;
    }
  | {
      ok: false;
      attempts: number;
      repairApplied: boolean;
      validationErrors: string[];
    };

/** Corrective feedback carrying the names of the rules the last draft broke. */
export function buildCorrectionText(attempt: number, errors: readonly string[]): string {
  const rules = errors.filter((error) => !error.includes(":"));
  if (rules.length === 0) return "";

  const hintLines = rules.flatMap((rule) => {
    const hint = RULE_HINTS[rule];
    return hint ? [`- ${rule}: ${hint}`] : [`- ${rule}`];
  });
  const samples = errors.filter((error) => error.includes("_sample:")).map((error) => `  ${error}`);

  return [
    `CORRECTION (Attempt ${attempt})`,
    "Your previous answer failed validation:",
    ...hintLines,
    ...samples,
    "Return only the corrected JSON object.",
  ].join("\n");
}

/**
 * Extend used_fact_ids to cover placeholders that were written but not
 * declared. No other violation is fixed without a new generation.
 */
export function repairUndeclaredPlaceholders(plan: AnswerPlan, result: GroundingResult): AnswerPlan | undefined {
  if (result.ok || result.undeclaredPlaceholderIds.length === 0) return undefined;
  if (!result.violations.includes("placeholder_fact_not_declared_used")) return undefined;
  return {
    ...plan,
    used_fact_ids: [...new Set([...plan.used_fact_ids, ...result.undeclaredPlaceholderIds])],
  };
}

/**
 * Generate, validate, repair once, retry once with corrective feedback.
 * The attempt budget is fixed by `maxRetries`; when nothing validates the
 * caller falls back to the facts-only renderer.
 */
export async function runSynthesisLoop(args: {
  provider: InferenceProvider;
  userPrompt: string;
  intent: IntentName;
  route: RouteSummary;
  context: AdvisoryContext;
  maxRetries: number;
  log: Logger;
}): Promise<SynthesisOutcome> {
  const { log, context } = args;
  const basePack = buildPromptPack({
    userPrompt: args.userPrompt,
    intent: args.intent,
    route: args.route,
    context,
  });
  const maxAttempts = Math.max(0, Math.min(1, args.maxRetries)) + 1;
  const validationErrors: string[] = [];
  let repairApplied = false;
  let pack = basePack;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    log.debug({ evt: "synthesis.attempt", attempt, pack: promptPackLogShape(pack) }, "synthesis.attempt");

    const draft = await synthesizeAnswerPlan({ provider: args.provider, pack, context, log });
    let failed: string[];

    if (!draft.ok) {
      failed = draft.errors;
    } else {
      const check = validateGrounding({ plan: draft.plan, context, userPrompt: args.userPrompt });
      if (check.ok) {
        log.info({ evt: "synthesis.validated", attempt, repairApplied }, "synthesis.validated");
        return { ok: true, plan: draft.plan, attempts: attempt, repairApplied, validationErrors, model: draft.model };
      }

      failed = check.errors;
      const repaired = repairUndeclaredPlaceholders(draft.plan, check);
      if (repaired) {
        repairApplied = true;
        const recheck = validateGrounding({ plan: repaired, context, userPrompt: args.userPrompt });
        log.info(
          { evt: "synthesis.repair_applied", attempt, ok: recheck.ok },
          "synthesis.repair_applied"
        );
        if (recheck.ok) {
          return {
            ok: true,
            plan: repaired,
            attempts: attempt,
            repairApplied,
            validationErrors: [...validationErrors, ...failed],
            model: draft.model,
          };
        }
        failed = recheck.errors;
      }
    }

    validationErrors.push(...failed);
    log.warn({ evt: "synthesis.validation_failed", attempt, errors: failed }, "synthesis.validation_failed");

    if (attempt < maxAttempts) {
      pack = withCorrectionSection(basePack, buildCorrectionText(attempt, failed));
    }
  }

  return { ok: false, attempts: maxAttempts, repairApplied, validationErrors };
}
