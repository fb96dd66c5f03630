import type { AdvisoryContext, EvidencePack, PolicyFlags } from "../contracts/evidence";
import type { IntentName } from "../contracts/intent";
import { buildActionCandidates } from "./actions";
import { buildInsightContext, deriveInsights } from "./insights";

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

export type AdvisoryContextResult = {
  context: AdvisoryContext;
  reasonCodes: string[];
};

/**
 * Derive insights and actions from the evidence pack and freeze the result.
 * Nothing downstream may add facts, insights or actions to it.
 */
export function buildAdvisoryContext(args: {
  intent: IntentName;
  evidence: EvidencePack;
  policyFlags: Omit<PolicyFlags, "policy_version">;
  policyVersion: string;
}): AdvisoryContextResult {
  const { intent, evidence } = args;
  const insightCtx = buildInsightContext(intent, evidence.facts, args.policyFlags);
  const insights = deriveInsights(insightCtx);
  const actions = buildActionCandidates(intent, insights, insightCtx.riskAppetite);

  const reasonCodes: string[] = [];
  if (insights.length === 0) reasonCodes.push("insights_empty");
  if (actions.length === 0) reasonCodes.push("action_candidates_empty");

  const context: AdvisoryContext = {
    intent,
    facts: evidence.facts.map((fact) => ({ ...fact })),
    insights,
    actions,
    citations: [...evidence.citations],
    policy_flags: {
      ...args.policyFlags,
      risk_appetite: insightCtx.riskAppetite,
      policy_version: args.policyVersion,
    },
    reason_codes: [...evidence.reason_codes, ...reasonCodes],
  };
  return { context: deepFreeze(context), reasonCodes };
}
