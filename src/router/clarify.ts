import {
  isIntentName,
  type ClarifyingQuestion,
  type IntentExtraction,
  type IntentName,
} from "../contracts/intent";

const INTENT_OPTION_LABELS: Record<IntentName, string> = {
  summary: "Cashflow overview",
  risk: "Risk alerts",
  planning: "Build a savings plan",
  scenario: "Compare what-if scenarios",
  invest: "Investment education",
  out_of_scope: "Something else",
};

type QuestionTemplate = Omit<ClarifyingQuestion, "max_questions">;

const SCENARIO_HORIZON: QuestionTemplate = {
  question_id: "scenario_horizon",
  question_text: "Which time horizon should the scenario cover?",
  options: ["3 months", "6 months", "12 months"],
};

const SCENARIO_DELTA: QuestionTemplate = {
  question_id: "scenario_delta_dimension",
  question_text: "Which part of your finances should the scenario change?",
  options: ["Income", "Spending", "Both"],
};

const PLANNING_VS_SCENARIO: QuestionTemplate = {
  question_id: "planning_vs_scenario",
  question_text: "Do you want to build a savings plan or compare what-if scenarios?",
  options: [INTENT_OPTION_LABELS.planning, INTENT_OPTION_LABELS.scenario],
};

const SUMMARY_VS_RISK: QuestionTemplate = {
  question_id: "summary_vs_risk",
  question_text: "Would you like a cashflow overview or risk alerts?",
  options: [INTENT_OPTION_LABELS.summary, INTENT_OPTION_LABELS.risk],
};

const GENERIC_INTENT: QuestionTemplate = {
  question_id: "generic_intent",
  question_text: "To give you accurate guidance, please pick your main goal:",
  options: [INTENT_OPTION_LABELS.summary, INTENT_OPTION_LABELS.planning, INTENT_OPTION_LABELS.scenario],
};

function samePair(intents: IntentName[], a: IntentName, b: IntentName): boolean {
  const set = new Set(intents);
  return set.size === 2 && set.has(a) && set.has(b);
}

function pairQuestion(intents: IntentName[]): QuestionTemplate | null {
  const distinct = [...new Set(intents)];
  if (distinct.length !== 2) return null;
  if (samePair(distinct, "planning", "scenario")) return PLANNING_VS_SCENARIO;
  if (samePair(distinct, "summary", "risk")) return SUMMARY_VS_RISK;
  const [first, second] = distinct;
  return {
    question_id: `intent_pair:${first}_vs_${second}`,
    question_text: "Which of these is closest to what you need?",
    options: [INTENT_OPTION_LABELS[first], INTENT_OPTION_LABELS[second]],
  };
}

/**
 * Pick exactly one question by precedence. An ambiguous top-2 is resolved
 * first, since slot questions only make sense once the intent is settled.
 */
export function buildClarifyingQuestion(
  extraction: Pick<IntentExtraction, "top2">,
  reasonCodes: readonly string[],
  maxQuestions: number
): ClarifyingQuestion {
  const reasons = new Set(reasonCodes);
  const topIntents = extraction.top2.map((item) => item.intent);
  const pair = pairQuestion(topIntents);

  let template: QuestionTemplate;
  if (reasons.has("low_top2_gap") && pair) {
    template = pair;
  } else if (reasons.has("scenario_horizon_missing")) {
    template = SCENARIO_HORIZON;
  } else if (reasons.has("scenario_delta_missing")) {
    template = SCENARIO_DELTA;
  } else if (pair && (pair === PLANNING_VS_SCENARIO || pair === SUMMARY_VS_RISK)) {
    template = pair;
  } else {
    template = GENERIC_INTENT;
  }

  return { ...template, options: [...template.options], max_questions: maxQuestions };
}

/** Map a reply that repeats one of the intent options back to that intent. */
export function intentFromClarificationReply(reply: string): IntentName | null {
  const text = reply.trim().toLowerCase();
  if (!text) return null;
  for (const [intent, label] of Object.entries(INTENT_OPTION_LABELS)) {
    if (text === label.toLowerCase()) return isIntentName(intent) ? intent : null;
  }
  return null;
}
