import { ANSWER_PLAN_SCHEMA_VERSION } from "../contracts/answer_plan";
import type { AdvisoryContext } from "../contracts/evidence";
import type { IntentName } from "../contracts/intent";

/**
 * PromptPack is the deterministic spine for the synthesis call.
 * We build it even when the provider is fake so the live model is a swap, not a rewrite.
 */

export type PromptRole = "system" | "user";

export type PromptSectionId = "law" | "correction" | "context" | "user_message";

export type PromptSection = {
  id: PromptSectionId;
  role: PromptRole;
  title: string;
  content: string;
  meta?: {
    fact_ids?: string[];
  };
};

export type RouteSummary = {
  final_intent: IntentName;
  source: "rule" | "semantic";
  reason_codes: string[];
};

export type PromptPack = {
  version: "prompt-pack-v1";
  intent: IntentName;
  sections: PromptSection[];
};

export const SYNTHESIS_PROMPT_VERSION = "answer_synth_v2";
export const CONTEXT_JSON_MARKER = "ADVISORY_CONTEXT_JSON:";
export const USER_PROMPT_MARKER = "User prompt:";

function buildMountedLaw(context: AdvisoryContext): string {
  const lines: string[] = [];
  lines.push("# System Instructions");
  lines.push("You are a personal-finance advisor that writes only from the advisory context below.");
  lines.push("Return ONLY one valid JSON object. Do not add markdown, comments, or explanation.");
  lines.push(`Use schema_version='${ANSWER_PLAN_SCHEMA_VERSION}'.`);
  lines.push(
    "Output JSON fields: schema_version, summary_lines, key_metrics, actions, assumptions, limitations, disclaimer, used_fact_ids, used_insight_ids, used_action_ids."
  );
  lines.push("summary_lines must hold 3 to 5 lines. actions must hold 2 to 4 lines.");
  lines.push("Never write a raw number. Reference a number with a fact placeholder such as [F:spend.net_cashflow.30d].");
  lines.push("Every placeholder you write must also appear in used_fact_ids.");
  lines.push("Reference only fact_id, insight_id and action_id values listed in the advisory context.");
  lines.push("key_metrics entries are {fact_id, label} and must use listed fact ids.");
  if (context.policy_flags.education_only) {
    lines.push("Education only: do not tell the user to buy, sell, trade or execute any order.");
  }
  if (context.policy_flags.risk_appetite === "unknown") {
    lines.push("The user's risk appetite is unknown: ask which level (low, medium, high) they prefer.");
  }
  const disclaimer = context.policy_flags.required_disclaimer;
  if (disclaimer) {
    lines.push(`disclaimer must be: ${disclaimer}`);
  }
  lines.push("");
  lines.push("Example:");
  lines.push(
    JSON.stringify({
      schema_version: ANSWER_PLAN_SCHEMA_VERSION,
      summary_lines: [
        "Net cashflow over the window is [F:spend.net_cashflow.30d].",
        "Spending is steady against income.",
        "A small buffer would absorb surprises.",
      ],
      key_metrics: [{ fact_id: "spend.net_cashflow.30d", label: "Net cashflow" }],
      actions: ["Review your budget weekly.", "Refresh your data in two weeks."],
      assumptions: [],
      limitations: [],
      disclaimer: "Educational guidance only.",
      used_fact_ids: ["spend.net_cashflow.30d"],
      used_insight_ids: [],
      used_action_ids: ["review_budget_weekly"],
    })
  );
  return lines.join("\n");
}

function formatContextSection(context: AdvisoryContext): string {
  return `${CONTEXT_JSON_MARKER}\n${JSON.stringify(context)}`;
}

function formatUserSection(userPrompt: string, intent: IntentName, route: RouteSummary): string {
  return [
    `${USER_PROMPT_MARKER} ${userPrompt}`,
    `Intent: ${intent}`,
    `Route decision: ${JSON.stringify(route)}`,
  ].join("\n");
}

/**
 * Build a deterministic PromptPack.
 * Order is fixed:
 * 1) law (system)
 * 2) context (system)
 * 3) user_message (user)
 */
export function buildPromptPack(args: {
  userPrompt: string;
  intent: IntentName;
  route: RouteSummary;
  context: AdvisoryContext;
}): PromptPack {
  const { userPrompt, intent, route, context } = args;

  const sections: PromptSection[] = [
    {
      id: "law",
      role: "system",
      title: "Mounted law",
      content: buildMountedLaw(context),
    },
    {
      id: "context",
      role: "system",
      title: "Advisory context",
      content: formatContextSection(context),
      meta: { fact_ids: context.facts.map((fact) => fact.fact_id) },
    },
    {
      id: "user_message",
      role: "user",
      title: "User message",
      content: formatUserSection(userPrompt, intent, route),
    },
  ];

  return { version: "prompt-pack-v1", intent, sections };
}

export function withCorrectionSection(pack: PromptPack, correctionText: string): PromptPack {
  const text = correctionText.trim();
  if (!text) return pack;

  const sections: PromptSection[] = [];
  for (const section of pack.sections) {
    sections.push(section);
    if (section.id === "law") {
      sections.push({
        id: "correction",
        role: "system",
        title: "Correction",
        content: text,
      });
    }
  }

  return { ...pack, sections };
}

/**
 * The inference boundary takes one prompt string.
 * Produces a single stable string with section headers.
 */
export function toSinglePromptText(pack: PromptPack): string {
  const parts: string[] = [];

  for (const s of pack.sections) {
    parts.push(`## ${s.title} (${s.role})`);
    parts.push(s.content);
    parts.push("");
  }

  return parts.join("\n").trim();
}

/**
 * Small helper for structured logs. Avoid logging full content by default.
 */
export function promptPackLogShape(pack: PromptPack): {
  version: PromptPack["version"];
  intent: IntentName;
  sectionBytes: Array<{ id: PromptSectionId; role: PromptRole; bytes: number }>;
  factCount: number;
} {
  const context = pack.sections.find((s) => s.id === "context");

  return {
    version: pack.version,
    intent: pack.intent,
    sectionBytes: pack.sections.map((s) => ({
      id: s.id,
      role: s.role,
      bytes: Buffer.byteLength(s.content, "utf8"),
    })),
    factCount: context?.meta?.fact_ids?.length ?? 0,
  };
}
