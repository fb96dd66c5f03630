import {
  top2Gap,
  type ClarificationState,
  type ClarifyingQuestion,
  type IntentExtraction,
  type IntentName,
  type RouteDecision,
} from "../contracts/intent";
import type { RouterConfig } from "../control-plane/advisor_config";
import type { Logger } from "../logger";
import type { InferenceProvider } from "../providers/inference_provider";
import { buildClarifyingQuestion, intentFromClarificationReply } from "./clarify";
import { extractIntent } from "./extractor";
import { suggestIntentOverride } from "./overrides";
import { buildRouteDecision, toolBundleForIntent } from "./policy";
import { ruleExtraction } from "./rule_classifier";

export type PendingClarification = {
  round: number;
  question?: ClarifyingQuestion;
  previousPrompt?: string;
  previousIntent?: IntentName;
};

export type RouterOutcome = {
  decision: RouteDecision;
  extraction?: IntentExtraction;
  clarification: ClarificationState;
  extractionErrors: string[];
  extractionAttempts: number;
  shadowDecision?: RouteDecision;
};

function applyOverride(
  prompt: string,
  extraction: IntentExtraction
): { extraction: IntentExtraction; reasonCodes: string[] } {
  const override = suggestIntentOverride(prompt, extraction);
  if (!override || override.intent === extraction.intent) {
    return { extraction, reasonCodes: [] };
  }
  return {
    extraction: { ...extraction, intent: override.intent },
    reasonCodes: [override.reasonCode],
  };
}

/** Rule routing never asks: the keyword classifier has no calibrated confidence. */
function ruleDecision(prompt: string, config: RouterConfig): { decision: RouteDecision; extraction: IntentExtraction } {
  const overridden = applyOverride(prompt, ruleExtraction(prompt));
  const extraction = overridden.extraction;
  return {
    extraction,
    decision: {
      mode: config.mode,
      policy_version: config.policyVersion,
      final_intent: extraction.intent,
      tool_bundle: toolBundleForIntent(extraction.intent),
      clarify_needed: false,
      reason_codes: ["rule_router", ...overridden.reasonCodes],
      source: "rule",
    },
  };
}

/** An exact pick of an intent option settles the ambiguity without another model call. */
function answeredExtraction(prompt: string, pending: PendingClarification): IntentExtraction | null {
  if (!pending.question) return null;
  const chosen = intentFromClarificationReply(prompt);
  if (!chosen) return null;
  const base = ruleExtraction(pending.previousPrompt ?? prompt);
  return {
    ...base,
    intent: chosen,
    confidence: 1,
    domain_relevance: 1,
    top2: [
      { intent: chosen, score: 1 },
      { intent: chosen === "summary" ? "out_of_scope" : "summary", score: 0 },
    ],
    reason: "clarification_answer",
  };
}

function extractionFailedDecision(
  config: RouterConfig,
  round: number,
  errors: string[]
): RouteDecision {
  const reasonCodes = ["extraction_failed", ...errors.filter((code) => !code.startsWith("schema:"))];
  const base = {
    mode: config.mode,
    policy_version: config.policyVersion,
    final_intent: "out_of_scope" as const,
    source: "semantic" as const,
  };
  if (round >= config.maxClarifyQuestions) {
    return {
      ...base,
      tool_bundle: toolBundleForIntent("out_of_scope"),
      clarify_needed: false,
      reason_codes: [...reasonCodes, "clarify_exhausted"],
      fallback_used: "clarify_exhausted",
    };
  }
  const question = buildClarifyingQuestion(
    { top2: [] },
    reasonCodes,
    config.maxClarifyQuestions
  );
  return {
    ...base,
    tool_bundle: [],
    clarify_needed: true,
    clarifying_question: question,
    reason_codes: reasonCodes,
    fallback_used: "extraction_failed",
  };
}

function clarificationState(
  decision: RouteDecision,
  round: number,
  maxQuestions: number
): ClarificationState {
  return {
    pending: decision.clarify_needed,
    round: decision.clarify_needed ? round + 1 : round,
    max_questions: maxQuestions,
    ...(decision.clarifying_question ? { question: decision.clarifying_question } : {}),
  };
}

/**
 * Intent router
 *
 * collecting-extraction -> deciding -> final | clarifying | exhausted
 */
export async function routeIntent(args: {
  prompt: string;
  config: RouterConfig;
  provider: InferenceProvider;
  pending: PendingClarification;
  log: Logger;
}): Promise<RouterOutcome> {
  const { prompt, config, provider, pending, log } = args;
  const round = Math.max(0, pending.round);

  if (config.mode === "rule") {
    const { decision, extraction } = ruleDecision(prompt, config);
    return {
      decision,
      extraction,
      clarification: clarificationState(decision, round, config.maxClarifyQuestions),
      extractionErrors: [],
      extractionAttempts: 0,
    };
  }

  let extraction = answeredExtraction(prompt, pending);
  let errors: string[] = [];
  let attempts = 0;
  if (!extraction) {
    const outcome = await extractIntent({
      provider,
      prompt,
      retryAttempts: config.extractionRetries,
      log,
      ...(pending.question && pending.previousPrompt
        ? { prior: { question: pending.question, previousPrompt: pending.previousPrompt } }
        : {}),
    });
    errors = outcome.errors;
    attempts = outcome.attempts;
    if (outcome.ok) extraction = outcome.extraction;
  }

  let semanticDecision: RouteDecision;
  if (!extraction) {
    semanticDecision = extractionFailedDecision(config, round, errors);
  } else {
    const overridden = applyOverride(prompt, extraction);
    extraction = overridden.extraction;
    semanticDecision = buildRouteDecision({
      mode: config.mode,
      extraction,
      thresholds: config,
      clarifyRound: round,
      source: "semantic",
      extraReasonCodes: overridden.reasonCodes,
    });
  }

  log.info(
    {
      evt: "router.semantic_decision",
      mode: config.mode,
      intent: semanticDecision.final_intent,
      confidence: extraction?.confidence,
      top2Gap: extraction ? top2Gap(extraction) : undefined,
      clarifyNeeded: semanticDecision.clarify_needed,
      reasonCodes: semanticDecision.reason_codes,
      round,
    },
    "router.semantic_decision"
  );

  if (config.mode === "semantic_shadow") {
    const rule = ruleDecision(prompt, config);
    return {
      decision: rule.decision,
      extraction: rule.extraction,
      clarification: clarificationState(rule.decision, round, config.maxClarifyQuestions),
      extractionErrors: errors,
      extractionAttempts: attempts,
      shadowDecision: semanticDecision,
    };
  }

  return {
    decision: semanticDecision,
    ...(extraction ? { extraction } : {}),
    clarification: clarificationState(semanticDecision, round, config.maxClarifyQuestions),
    extractionErrors: errors,
    extractionAttempts: attempts,
  };
}
