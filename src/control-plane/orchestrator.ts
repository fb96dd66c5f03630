import { randomUUID } from "node:crypto";

import type { AdviseResponse, ResponseKind, ResponseMeta, RoutingMeta } from "../contracts/advise";
import type { AdvisoryContext, PolicyFlags } from "../contracts/evidence";
import { top2Gap } from "../contracts/intent";
import type { ToolErrorMap, ToolOutputMap } from "../contracts/tool_outputs";
import { buildAdvisoryContext } from "../evidence/advisory_context";
import { buildEvidencePack } from "../evidence/facts";
import type { EncodingDecision } from "../gates/encoding_gate";
import { runAdmissionGates } from "../gates/gates_pipeline";
import { AdvisoryPipelineError, type PipelineStage } from "../gates/pipeline_error";
import type { Logger } from "../logger";
import type { InferenceProvider } from "../providers/inference_provider";
import { routeIntent, type PendingClarification, type RouterOutcome } from "../router/intent_router";
import type { ClarificationStore } from "../store/clarification_store";
import { DEFAULT_DISCLAIMER } from "../synthesis/answer_synthesizer";
import { runSynthesisLoop, type SynthesisOutcome } from "../synthesis/repair_controller";
import {
  ADMISSION_FAIL_FAST_MESSAGE,
  EMPTY_PROMPT_MESSAGE,
  INTERNAL_ERROR_MESSAGE,
  renderAnswerPlan,
  renderClarification,
  renderFactsOnly,
  renderRefusal,
} from "../synthesis/renderer";
import { writeAuditBestEffort, type AuditSink } from "../tools/audit_sink";
import { fanOutTools, type FanOutResult } from "../tools/fan_out";
import type { KbClient, KbRetrieval } from "../tools/kb_client";
import type { ToolInvoker } from "../tools/tool_client";
import type { ToolArgContext } from "../tools/tool_registry";
import type { AdvisorConfig } from "./advisor_config";

const SUITABILITY_TOOL = "suitability-guard";

export type AdvisorDeps = {
  config: AdvisorConfig;
  provider: InferenceProvider;
  invoker: ToolInvoker;
  kb: KbClient;
  audit: AuditSink;
  clarifications: ClarificationStore;
  log: Logger;
};

export type AdviseInput = {
  prompt: string;
  userId: string;
  conversationId?: string;
  userToken?: string;
  traceId?: string;
};

type Outcome = {
  kind: ResponseKind;
  text: string;
  disclaimer: string;
};

/** Everything one request accumulates on its way through the stages. */
type RequestState = {
  input: AdviseInput;
  traceId: string;
  log: Logger;
  text: string;
  encoding?: EncodingDecision;
  route?: RouterOutcome;
  policyFlags: Omit<PolicyFlags, "policy_version">;
  toolOutputs: ToolOutputMap;
  toolErrors: ToolErrorMap;
  invoked: string[];
  kb?: KbRetrieval;
  context?: AdvisoryContext;
  synthesis?: SynthesisOutcome;
  reasonCodes: string[];
  outcome?: Outcome;
  error?: AdvisoryPipelineError;
};

type Stage = {
  name: PipelineStage;
  run: (state: RequestState, deps: AdvisorDeps) => Promise<void>;
};

function respond(state: RequestState, kind: ResponseKind, text: string, disclaimer = ""): void {
  state.outcome = { kind, text, disclaimer };
}

function requireRoute(state: RequestState, stage: PipelineStage): RouterOutcome {
  if (state.route) return state.route;
  throw new AdvisoryPipelineError({ bucket: "internal", stage, message: "route decision missing" });
}

function requireContext(state: RequestState, stage: PipelineStage): AdvisoryContext {
  if (state.context) return state.context;
  throw new AdvisoryPipelineError({ bucket: "internal", stage, message: "advisory context missing" });
}

function contextDisclaimer(context: AdvisoryContext): string {
  return context.policy_flags.required_disclaimer || DEFAULT_DISCLAIMER;
}

function argContext(state: RequestState, route: RouterOutcome): ToolArgContext {
  return {
    userId: state.input.userId,
    traceId: state.traceId,
    prompt: state.text,
    intent: route.decision.final_intent,
    slots: route.extraction?.slots ?? {},
  };
}

function mergeFanOut(state: RequestState, result: FanOutResult): void {
  Object.assign(state.toolOutputs, result.outputs);
  Object.assign(state.toolErrors, result.errors);
  state.invoked.push(...result.invoked.filter((tool) => !state.invoked.includes(tool)));
  state.reasonCodes.push(...result.reasonCodes);
}

const admissionStage: Stage = {
  name: "admission",
  async run(state, deps) {
    const admission = runAdmissionGates(state.input.prompt, deps.config.encoding);
    state.text = admission.text;
    state.encoding = admission.encoding;
    state.log.info(
      {
        evt: "admission.decided",
        decision: admission.encoding.decision,
        mojibakeScore: admission.encoding.mojibake_score,
        gates: admission.results.map((gate) => ({ gate: gate.gateName, status: gate.status })),
      },
      "admission.decided"
    );
    if (admission.failReason) {
      state.reasonCodes.push(admission.failReason);
      respond(
        state,
        "admission_fail_fast",
        admission.failReason === "empty_prompt" ? EMPTY_PROMPT_MESSAGE : ADMISSION_FAIL_FAST_MESSAGE
      );
    }
  },
};

const routingStage: Stage = {
  name: "routing",
  async run(state, deps) {
    const conversationId = state.input.conversationId;
    const record = conversationId ? await deps.clarifications.get(conversationId) : null;
    const pending: PendingClarification = record
      ? {
          round: record.round,
          previousPrompt: record.lastPrompt,
          previousIntent: record.lastIntent,
          ...(record.pending && record.question ? { question: record.question } : {}),
        }
      : { round: 0 };

    const route = await routeIntent({
      prompt: state.text,
      config: deps.config.router,
      provider: deps.provider,
      pending,
      log: state.log,
    });
    state.route = route;
    state.reasonCodes.push(...route.decision.reason_codes);

    const question = route.decision.clarifying_question;
    if (route.decision.clarify_needed && question) {
      if (conversationId) {
        await deps.clarifications.recordQuestion({
          conversationId,
          question,
          prompt: record?.lastPrompt ?? state.text,
          intent: route.decision.final_intent,
        });
      }
      respond(state, "clarification", renderClarification(question));
      return;
    }
    if (conversationId && record) await deps.clarifications.resolve(conversationId);
  },
};

/** The guard runs alone before anything else is called so a refusal invokes nothing further. */
const suitabilityStage: Stage = {
  name: "suitability",
  async run(state, deps) {
    const route = requireRoute(state, "suitability");
    if (!route.decision.tool_bundle.includes(SUITABILITY_TOOL)) return;

    const result = await fanOutTools({
      bundle: [SUITABILITY_TOOL],
      invoker: deps.invoker,
      argContext: argContext(state, route),
      userToken: state.input.userToken,
      maxWorkers: 1,
      timeoutMs: deps.config.tools.fanoutTimeoutMs,
      log: state.log,
    });
    mergeFanOut(state, result);

    const guard = result.outputs[SUITABILITY_TOOL];
    if (!guard) {
      state.policyFlags.education_only = true;
      state.reasonCodes.push("suitability_unavailable");
      return;
    }

    state.policyFlags.suitability_decision = guard.decision;
    state.policyFlags.education_only = guard.decision === "education_only";
    if (guard.required_disclaimer) state.policyFlags.required_disclaimer = guard.required_disclaimer;

    if (!guard.allow || guard.decision.startsWith("deny_")) {
      const disclaimer = guard.required_disclaimer || DEFAULT_DISCLAIMER;
      state.reasonCodes.push(`policy_refusal:${guard.decision}`);
      state.log.info({ evt: "suitability.refused", decision: guard.decision }, "suitability.refused");
      respond(state, "refusal", renderRefusal({ decision: guard.decision, disclaimer }), disclaimer);
    }
  },
};

const fanOutStage: Stage = {
  name: "fan_out",
  async run(state, deps) {
    const route = requireRoute(state, "fan_out");
    const bundle = route.decision.tool_bundle.filter((tool) => tool !== SUITABILITY_TOOL);
    const tools = deps.config.tools;

    const [result, kb] = await Promise.all([
      fanOutTools({
        bundle,
        invoker: deps.invoker,
        argContext: argContext(state, route),
        userToken: state.input.userToken,
        maxWorkers: tools.maxWorkers,
        timeoutMs: tools.fanoutTimeoutMs,
        log: state.log,
      }),
      deps.kb.retrieve(
        state.text,
        { intent: route.decision.final_intent },
        { traceId: state.traceId, userToken: state.input.userToken }
      ),
    ]);
    mergeFanOut(state, result);
    state.kb = kb;
    state.reasonCodes.push(...kb.reasonCodes);
  },
};

const evidenceStage: Stage = {
  name: "evidence",
  async run(state, deps) {
    const route = requireRoute(state, "evidence");
    const intent = route.decision.final_intent;
    const slots = route.extraction?.slots ?? {};
    state.policyFlags.risk_appetite = slots.risk_appetite ?? "unknown";

    const evidence = buildEvidencePack({
      intent,
      toolOutputs: state.toolOutputs,
      slots,
      kbMatches: state.kb?.matches ?? [],
      citations: state.kb?.citations ?? [],
      policyFlags: state.policyFlags,
      thresholds: deps.config.signals,
    });
    const built = buildAdvisoryContext({
      intent,
      evidence,
      policyFlags: state.policyFlags,
      policyVersion: deps.config.response.policyVersion,
    });
    state.context = built.context;
    state.reasonCodes.push(...evidence.reason_codes, ...built.reasonCodes);
    state.log.info(
      {
        evt: "evidence.built",
        facts: built.context.facts.length,
        insights: built.context.insights.length,
        actions: built.context.actions.length,
      },
      "evidence.built"
    );
  },
};

const synthesisStage: Stage = {
  name: "synthesis",
  async run(state, deps) {
    if (deps.config.response.mode === "template") {
      state.log.debug({ evt: "synthesis.skipped", mode: "template" }, "synthesis.skipped");
      return;
    }
    const route = requireRoute(state, "synthesis");
    state.synthesis = await runSynthesisLoop({
      provider: deps.provider,
      userPrompt: state.text,
      intent: route.decision.final_intent,
      route: {
        final_intent: route.decision.final_intent,
        source: route.decision.source,
        reason_codes: route.decision.reason_codes,
      },
      context: requireContext(state, "synthesis"),
      maxRetries: deps.config.response.maxRetries,
      log: state.log,
    });
  },
};

const renderStage: Stage = {
  name: "render",
  async run(state, deps) {
    const context = requireContext(state, "render");
    const synthesis = state.synthesis;
    if (deps.config.response.mode === "llm_enforce" && synthesis?.ok) {
      respond(state, "answer", renderAnswerPlan(synthesis.plan, context), synthesis.plan.disclaimer);
      return;
    }
    respond(state, "facts_only", renderFactsOnly(context), contextDisclaimer(context));
  },
};

const STAGES: readonly Stage[] = [
  admissionStage,
  routingStage,
  suitabilityStage,
  fanOutStage,
  evidenceStage,
  synthesisStage,
  renderStage,
];

function buildRoutingMeta(state: RequestState, config: AdvisorConfig): RoutingMeta {
  const route = state.route;
  const decision = route?.decision;
  const extraction = route?.extraction;
  return {
    router_mode: config.router.mode,
    policy_version: config.router.policyVersion,
    final_intent: decision?.final_intent ?? "out_of_scope",
    source: decision?.source ?? "rule",
    tool_bundle: decision?.tool_bundle ?? [],
    clarify_needed: decision?.clarify_needed ?? false,
    clarification_round: route?.clarification.round ?? 0,
    ...(decision?.clarifying_question ? { clarification_question_id: decision.clarifying_question.question_id } : {}),
    ...(decision?.fallback_used ? { fallback_used: decision.fallback_used } : {}),
    reason_codes: decision?.reason_codes ?? [],
    ...(extraction ? { intent_confidence: extraction.confidence, top2_gap: top2Gap(extraction) } : {}),
    ...(route?.shadowDecision ? { shadow_intent: route.shadowDecision.final_intent } : {}),
  };
}

function buildResponseMeta(state: RequestState, outcome: Outcome, config: AdvisorConfig): ResponseMeta {
  const synthesis = state.synthesis;
  return {
    response_mode: config.response.mode,
    kind: outcome.kind,
    schema_version: config.response.schemaVersion,
    encoding_decision: state.encoding?.decision ?? "pass",
    encoding_reason_codes: state.encoding?.reason_codes ?? [],
    mojibake_score: state.encoding?.mojibake_score ?? 0,
    synthesis_attempts: synthesis?.attempts ?? 0,
    repair_applied: synthesis?.repairApplied ?? false,
    ...(synthesis ? { synthesis_valid: synthesis.ok } : {}),
    fallback_used: outcome.kind === "facts_only" && config.response.mode === "llm_enforce",
    validation_errors: synthesis?.validationErrors ?? [],
    tool_errors: { ...state.toolErrors },
    reason_codes: [...new Set(state.reasonCodes)],
    ...(state.error ? { error_bucket: state.error.bucket } : {}),
  };
}

/**
 * Advisory pipeline
 *
 * admission -> routing -> suitability -> fan_out -> evidence -> synthesis -> render -> audit
 *
 * A stage that settles the response (fail-fast, clarification, refusal,
 * internal error) turns every later stage into a no-op; audit always runs.
 */
export async function runAdvisoryPipeline(input: AdviseInput, deps: AdvisorDeps): Promise<AdviseResponse> {
  const traceId = input.traceId ?? randomUUID();
  const log = deps.log.child({ trace_id: traceId });
  const state: RequestState = {
    input,
    traceId,
    log,
    text: input.prompt,
    policyFlags: { education_only: false, risk_appetite: "unknown" },
    toolOutputs: {},
    toolErrors: {},
    invoked: [],
    reasonCodes: [],
  };

  for (const stage of STAGES) {
    if (state.outcome) {
      log.debug({ evt: "stage.skipped", stage: stage.name }, "stage.skipped");
      continue;
    }
    try {
      await stage.run(state, deps);
    } catch (err) {
      const error = AdvisoryPipelineError.fromUnknown(stage.name, err);
      state.error = error;
      log.error({ evt: "pipeline.failed", ...error.toJSON() }, "pipeline.failed");
      respond(state, "internal_error", INTERNAL_ERROR_MESSAGE);
    }
  }

  const outcome = state.outcome ?? { kind: "internal_error" as const, text: INTERNAL_ERROR_MESSAGE, disclaimer: "" };
  const response: AdviseResponse = {
    response: outcome.text,
    trace_id: traceId,
    citations: [...(state.context?.citations ?? state.kb?.citations ?? [])],
    tool_calls: [...state.invoked],
    routing_meta: buildRoutingMeta(state, deps.config),
    response_meta: buildResponseMeta(state, outcome, deps.config),
    disclaimer: outcome.disclaimer,
  };

  await writeAuditBestEffort(
    deps.audit,
    {
      user_id: input.userId,
      trace_id: traceId,
      payload: {
        prompt_fingerprint: state.encoding?.input_fingerprint ?? "",
        intent: response.routing_meta.final_intent,
        kind: outcome.kind,
        tool_calls: response.tool_calls,
        tool_errors: response.response_meta.tool_errors,
        reason_codes: response.response_meta.reason_codes,
        validation_errors: response.response_meta.validation_errors,
        response_mode: response.response_meta.response_mode,
        response_chars: outcome.text.length,
        ...(state.error ? { error: state.error.toJSON() } : {}),
      },
    },
    log,
    input.userToken
  );

  log.info(
    { evt: "advise.responded", kind: outcome.kind, intent: response.routing_meta.final_intent },
    "advise.responded"
  );
  return response;
}
