import {
  INTENT_EXTRACTION_SCHEMA_VERSION,
  type IntentExtraction,
  type IntentName,
  type IntentSlots,
} from "../contracts/intent";
import { normalizeForMatching } from "./text_match";

/**
 * Keyword router (v0 heuristic)
 *
 * Deterministic intent classification used by the `rule` router mode and as
 * the shadow baseline for semantic extraction. Table order breaks ties.
 */
const INTENT_KEYWORDS: ReadonlyArray<{ intent: IntentName; terms: readonly string[] }> = [
  {
    intent: "invest",
    terms: ["stock", "shares", "crypto", "etf", "portfolio", "invest", "co phieu", "chung khoan", "dau tu", "trai phieu", "bond"],
  },
  {
    intent: "scenario",
    terms: ["what if", "what-if", "scenario", "suppose", "kich ban", "gia su"],
  },
  {
    intent: "risk",
    terms: ["risk", "anomaly", "unusual", "fraud", "suspicious", "volatility", "runway", "rui ro", "bat thuong", "canh bao"],
  },
  {
    intent: "planning",
    terms: ["plan", "goal", "save", "saving", "budget", "afford", "ke hoach", "tiet kiem", "muc tieu", "ngan sach"],
  },
  {
    intent: "summary",
    terms: ["summary", "overview", "summarize", "spending", "spend", "cashflow", "cash flow", "income", "tong quan", "chi tieu", "dong tien", "thu nhap"],
  },
];

const RISK_APPETITE_TERMS: ReadonlyArray<{ appetite: NonNullable<IntentSlots["risk_appetite"]>; terms: readonly string[] }> = [
  { appetite: "conservative", terms: ["conservative", "low risk", "than trong", "an toan"] },
  { appetite: "moderate", terms: ["moderate", "medium risk", "balanced", "can bang"] },
  { appetite: "aggressive", terms: ["aggressive", "high risk", "mao hiem"] },
];

const HORIZON_PATTERN = /\b(\d{1,3})\s*(months?|thang)\b/;
const YEARS_PATTERN = /\b(\d{1,2})\s*(years?|nam)\b/;

export type RuleClassification = {
  intent: IntentName;
  confidence: number;
  hits: Record<IntentName, number>;
};

export function classifyIntentByRules(prompt: string): RuleClassification {
  const text = normalizeForMatching(prompt);
  const hits: Record<IntentName, number> = {
    summary: 0,
    risk: 0,
    planning: 0,
    scenario: 0,
    invest: 0,
    out_of_scope: 0,
  };
  for (const row of INTENT_KEYWORDS) {
    hits[row.intent] = row.terms.filter((term) => text.includes(term)).length;
  }

  let best: IntentName = "out_of_scope";
  let bestHits = 0;
  for (const row of INTENT_KEYWORDS) {
    if (hits[row.intent] > bestHits) {
      best = row.intent;
      bestHits = hits[row.intent];
    }
  }

  const confidence = bestHits === 0 ? 0.5 : Math.min(0.95, 0.6 + 0.15 * bestHits);
  return { intent: best, confidence, hits };
}

export function extractSlotsByRules(prompt: string): IntentSlots {
  const text = normalizeForMatching(prompt);
  const slots: IntentSlots = {};

  const months = text.match(HORIZON_PATTERN);
  const years = text.match(YEARS_PATTERN);
  if (months) {
    slots.horizon_months = Number(months[1]);
  } else if (years) {
    slots.horizon_months = Number(years[1]) * 12;
  }

  const appetite = RISK_APPETITE_TERMS.find((row) => row.terms.some((term) => text.includes(term)));
  if (appetite) slots.risk_appetite = appetite.appetite;

  return slots;
}

/** Rule classification shaped as an extraction so the policy layer sees one type. */
export function ruleExtraction(prompt: string): IntentExtraction {
  const { intent, confidence, hits } = classifyIntentByRules(prompt);
  const runnerUp =
    INTENT_KEYWORDS.filter((row) => row.intent !== intent)
      .sort((a, b) => hits[b.intent] - hits[a.intent])
      .map((row) => row.intent)[0] ?? "summary";
  const secondIntent: IntentName = intent === "out_of_scope" ? "summary" : hits[runnerUp] > 0 ? runnerUp : "out_of_scope";
  const secondScore = Math.min(confidence, hits[secondIntent] > 0 ? 0.3 + 0.1 * hits[secondIntent] : 0.1);

  return {
    schema_version: INTENT_EXTRACTION_SCHEMA_VERSION,
    intent,
    sub_intent: "",
    confidence,
    domain_relevance: intent === "out_of_scope" ? 0.2 : 1,
    top2: [
      { intent, score: confidence },
      { intent: secondIntent, score: secondScore },
    ],
    slots: extractSlotsByRules(prompt),
    reason: "rule_classifier",
  };
}
