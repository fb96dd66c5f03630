import {
  isIntentName,
  top2Gap,
  type IntentExtraction,
  type IntentName,
  type RouteDecision,
  type RouteSource,
  type RouterMode,
} from "../contracts/intent";
import type { ToolName } from "../contracts/tool_outputs";
import { buildClarifyingQuestion } from "./clarify";
import { hasScenarioDelta } from "./overrides";

export const TOOL_BUNDLES: Record<IntentName, readonly ToolName[]> = {
  summary: ["spend-analytics", "cashflow-forecast", "jar-allocation-suggest"],
  risk: ["spend-analytics", "anomaly-signals", "risk-profile-non-investment"],
  planning: [
    "spend-analytics",
    "cashflow-forecast",
    "recurring-cashflow-detect",
    "goal-feasibility",
    "jar-allocation-suggest",
  ],
  scenario: ["what-if-scenario"],
  invest: ["suitability-guard", "risk-profile-non-investment"],
  out_of_scope: ["suitability-guard"],
};

export function toolBundleForIntent(intent: string): ToolName[] {
  const bundle = isIntentName(intent) ? TOOL_BUNDLES[intent] : TOOL_BUNDLES.summary;
  return [...bundle];
}

const CLARIFY_TRIGGERS = [
  "low_intent_confidence",
  "low_top2_gap",
  "low_scenario_confidence",
  "scenario_horizon_missing",
  "scenario_delta_missing",
] as const;

export type RoutePolicyThresholds = {
  policyVersion: string;
  intentConfMin: number;
  top2GapMin: number;
  scenarioConfMin: number;
  maxClarifyQuestions: number;
};

export function clarifyReasons(
  extraction: IntentExtraction,
  thresholds: Pick<RoutePolicyThresholds, "intentConfMin" | "top2GapMin" | "scenarioConfMin">
): string[] {
  const reasons: string[] = [];
  if (extraction.confidence < thresholds.intentConfMin) reasons.push("low_intent_confidence");
  if (top2Gap(extraction) < thresholds.top2GapMin) reasons.push("low_top2_gap");

  if (extraction.intent === "scenario") {
    const scenarioConfidence = extraction.scenario_confidence ?? extraction.confidence;
    if (scenarioConfidence < thresholds.scenarioConfMin) reasons.push("low_scenario_confidence");

    const slots: Record<string, unknown> = extraction.slots;
    const horizon = slots.horizon_months;
    if (horizon === undefined || horizon === null || horizon === "" || horizon === 0) {
      reasons.push("scenario_horizon_missing");
    }
    if (!hasScenarioDelta(slots)) reasons.push("scenario_delta_missing");
  }
  return reasons;
}

/**
 * Confidence and gap thresholds decide between proceeding and asking. Once
 * the round counter reaches the configured maximum the router stops asking
 * and proceeds with the extracted intent.
 */
export function buildRouteDecision(args: {
  mode: RouterMode;
  extraction: IntentExtraction;
  thresholds: RoutePolicyThresholds;
  clarifyRound: number;
  source?: RouteSource;
  extraReasonCodes?: string[];
}): RouteDecision {
  const { extraction, thresholds } = args;
  const source = args.source ?? "semantic";
  const reasonCodes = [...(args.extraReasonCodes ?? []), ...clarifyReasons(extraction, thresholds)];
  const clarifyNeeded = reasonCodes.some((code) =>
    (CLARIFY_TRIGGERS as readonly string[]).includes(code)
  );

  const base = {
    mode: args.mode,
    policy_version: thresholds.policyVersion,
    final_intent: extraction.intent,
    source,
  };

  if (clarifyNeeded && args.clarifyRound >= thresholds.maxClarifyQuestions) {
    return {
      ...base,
      tool_bundle: toolBundleForIntent(extraction.intent),
      clarify_needed: false,
      reason_codes: [...reasonCodes, "clarify_exhausted"],
      fallback_used: "clarify_exhausted",
    };
  }

  if (clarifyNeeded) {
    return {
      ...base,
      tool_bundle: [],
      clarify_needed: true,
      clarifying_question: buildClarifyingQuestion(extraction, reasonCodes, thresholds.maxClarifyQuestions),
      reason_codes: reasonCodes,
    };
  }

  return {
    ...base,
    tool_bundle: toolBundleForIntent(extraction.intent),
    clarify_needed: false,
    reason_codes: reasonCodes,
  };
}
