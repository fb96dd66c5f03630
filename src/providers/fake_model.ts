import { z } from "zod";

import { ANSWER_PLAN_SCHEMA_VERSION } from "../contracts/answer_plan";
import { CONTEXT_JSON_MARKER, USER_PROMPT_MARKER } from "../control-plane/prompt_pack";
import { ruleExtraction } from "../router/rule_classifier";
import type {
  InferencePurpose,
  InferenceProvider,
  InferenceRequest,
  InferenceResponse,
} from "./inference_provider";

export type FakeReply = string | Error | ((request: InferenceRequest) => string);

export type FakeInferenceProviderOptions = {
  /** Replies consumed in order per purpose; the built-in default answers once a queue is empty. */
  replies?: Partial<Record<InferencePurpose, FakeReply[]>>;
  model?: string;
};

// Only the parts of the advisory context the default draft reads.
const DraftContext = z.object({
  facts: z.array(z.object({ fact_id: z.string(), label: z.string() })),
  insights: z.array(z.object({ insight_id: z.string() })),
  actions: z.array(z.object({ action_id: z.string(), title: z.string() })),
  policy_flags: z.object({ required_disclaimer: z.string().optional() }),
});

function lastPromptLine(promptText: string, marker: string): string {
  const lines = promptText.split("\n");
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i]?.trim() ?? "";
    if (line.startsWith(marker)) return line.slice(marker.length).trim();
  }
  return "";
}

function contextJson(promptText: string): unknown {
  const lines = promptText.split("\n");
  const at = lines.findIndex((line) => line.trim() === CONTEXT_JSON_MARKER);
  const raw = at === -1 ? undefined : lines[at + 1];
  if (!raw) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export function defaultExtractionReply(request: InferenceRequest): string {
  return JSON.stringify(ruleExtraction(lastPromptLine(request.promptText, USER_PROMPT_MARKER)));
}

/**
 * Placeholder-only draft built from the context in the prompt. Labels that
 * carry digits are replaced so the draft never writes a raw number.
 */
export function defaultSynthesisReply(request: InferenceRequest): string {
  const parsed = DraftContext.safeParse(contextJson(request.promptText));
  if (!parsed.success) return "{}";
  const context = parsed.data;

  const facts = context.facts.filter((fact) => !fact.fact_id.startsWith("service.")).slice(0, 3);
  const actions = context.actions.slice(0, 3);

  return JSON.stringify({
    schema_version: ANSWER_PLAN_SCHEMA_VERSION,
    summary_lines: facts.map((fact) => {
      const label = /\d/.test(fact.label) ? "Verified figure" : fact.label;
      return `${label}: [F:${fact.fact_id}].`;
    }),
    key_metrics: facts.slice(0, 1).map((fact) => ({ fact_id: fact.fact_id, label: "" })),
    actions: actions.map((action) => `${action.title}.`),
    assumptions: [],
    limitations: [],
    disclaimer: context.policy_flags.required_disclaimer ?? "",
    used_fact_ids: facts.map((fact) => fact.fact_id),
    used_insight_ids: context.insights.slice(0, 2).map((insight) => insight.insight_id),
    used_action_ids: actions.map((action) => action.action_id),
  });
}

const DEFAULT_REPLIES: Record<InferencePurpose, (request: InferenceRequest) => string> = {
  intent_extraction: defaultExtractionReply,
  answer_synthesis: defaultSynthesisReply,
};

/** Scripted, offline inference provider for local runs and tests. */
export class FakeInferenceProvider implements InferenceProvider {
  readonly name = "fake";
  readonly calls: InferenceRequest[] = [];
  private readonly queues: Record<InferencePurpose, FakeReply[]>;
  private readonly model: string;

  constructor(options: FakeInferenceProviderOptions = {}) {
    this.queues = {
      intent_extraction: [...(options.replies?.intent_extraction ?? [])],
      answer_synthesis: [...(options.replies?.answer_synthesis ?? [])],
    };
    this.model = options.model ?? "fake-model";
  }

  callsFor(purpose: InferencePurpose): InferenceRequest[] {
    return this.calls.filter((call) => call.purpose === purpose);
  }

  async complete(request: InferenceRequest): Promise<InferenceResponse> {
    this.calls.push(request);
    const reply = this.queues[request.purpose].shift() ?? DEFAULT_REPLIES[request.purpose];
    if (reply instanceof Error) throw reply;
    const rawText = typeof reply === "function" ? reply(request) : reply;
    return { rawText, model: this.model };
  }
}
