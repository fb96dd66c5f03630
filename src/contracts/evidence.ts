export type Severity = "low" | "medium" | "high";

export type FactValue = number | string | boolean | string[];

/**
 * A single source-attributed data point. `fact_id` is hierarchical and
 * stable (`spend.net_cashflow.30d`) and is the only handle generated
 * text may use to reference a number.
 */
export type Fact = {
  fact_id: string;
  label: string;
  value: FactValue;
  value_text: string;
  unit: string;
  timeframe: string;
  source_tool: string;
  source_path: string;
};

export type Insight = {
  insight_id: string;
  kind: string;
  severity: Severity;
  message_seed: string;
  supporting_fact_ids: string[];
};

export type ActionParamValue = string | number | boolean | string[];

export type ActionCandidate = {
  action_id: string;
  priority: number;
  action_type: string;
  title: string;
  params: Record<string, ActionParamValue>;
  supporting_insight_ids: string[];
};

export type Citation = {
  id: string;
  snippet: string;
  citation: string;
  score: number;
};

export type EvidencePack = {
  facts: Fact[];
  citations: string[];
  reason_codes: string[];
};

export type PolicyFlags = {
  policy_version: string;
  education_only: boolean;
  required_disclaimer?: string;
  suitability_decision?: string;
  risk_appetite: string;
};

/**
 * Everything the generator is allowed to draw from for one request.
 * Frozen once built.
 */
export type AdvisoryContext = Readonly<{
  intent: string;
  facts: readonly Fact[];
  insights: readonly Insight[];
  actions: readonly ActionCandidate[];
  citations: readonly string[];
  policy_flags: Readonly<PolicyFlags>;
  reason_codes: readonly string[];
}>;
