import { config as loadEnv } from "dotenv";

import { RouterMode } from "../contracts/intent";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

type Env = Record<string, string | undefined>;

export type ResponseMode = "template" | "llm_shadow" | "llm_enforce";
export type NormalizationForm = "NFC" | "NFD" | "NFKC" | "NFKD";

export type RouterConfig = {
  mode: RouterMode;
  policyVersion: string;
  intentConfMin: number;
  top2GapMin: number;
  scenarioConfMin: number;
  maxClarifyQuestions: number;
  extractionRetries: number;
};

export type ResponseConfig = {
  mode: ResponseMode;
  maxRetries: number;
  schemaVersion: string;
  policyVersion: string;
};

export type EncodingConfig = {
  enabled: boolean;
  repairEnabled: boolean;
  repairScoreMin: number;
  failfastScoreMin: number;
  repairMinDelta: number;
  normalizationForm: NormalizationForm;
};

export type ToolConfig = {
  gatewayEndpoint: string;
  callTimeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  fanoutTimeoutMs: number;
  maxWorkers: number;
  kbToolName?: string;
  kbId: string;
};

export type ServiceSignalThresholds = {
  overspendHigh: number;
  runwayLowMonths: number;
  volatilityHigh: number;
  goalGapHighAmount: number;
  anomalyRecentMinFlags: number;
};

export type AdvisorConfig = Readonly<{
  router: Readonly<RouterConfig>;
  response: Readonly<ResponseConfig>;
  encoding: Readonly<EncodingConfig>;
  tools: Readonly<ToolConfig>;
  signals: Readonly<ServiceSignalThresholds>;
  auditEndpoint: string;
}>;

export function envBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = (env[name] ?? "").trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  return fallback;
}

export function envFloat(env: Env, name: string, fallback: number): number {
  const raw = (env[name] ?? "").trim();
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function envInt(env: Env, name: string, fallback: number): number {
  const value = envFloat(env, name, fallback);
  return Math.trunc(value);
}

function envEnum<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = (env[name] ?? "").trim().toLowerCase();
  return allowed.find((item) => item.toLowerCase() === raw) ?? fallback;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function withMcpPath(endpoint: string): string {
  const trimmed = endpoint.trim().replace(/\/+$/, "");
  if (!trimmed) return "";
  return trimmed.endsWith("/mcp") ? trimmed : `${trimmed}/mcp`;
}

export function loadAdvisorConfig(env: Env = process.env): AdvisorConfig {
  const routerModeRaw = envEnum(env, "ROUTER_MODE", RouterMode.options, "semantic_enforce");
  const kbToolName = (env.KB_TOOL_NAME ?? "").trim();

  return Object.freeze({
    router: Object.freeze({
      mode: routerModeRaw,
      policyVersion: (env.ROUTER_POLICY_VERSION ?? "").trim() || "v1",
      intentConfMin: clamp(envFloat(env, "ROUTER_INTENT_CONF_MIN", 0.7), 0, 1),
      top2GapMin: clamp(envFloat(env, "ROUTER_TOP2_GAP_MIN", 0.15), 0, 1),
      scenarioConfMin: clamp(envFloat(env, "ROUTER_SCENARIO_CONF_MIN", 0.75), 0, 1),
      maxClarifyQuestions: Math.max(1, envInt(env, "ROUTER_MAX_CLARIFY_QUESTIONS", 2)),
      extractionRetries: clamp(envInt(env, "ROUTER_EXTRACTION_RETRIES", 1), 0, 3),
    }),
    response: Object.freeze({
      mode: envEnum<ResponseMode>(
        env,
        "RESPONSE_MODE",
        ["template", "llm_shadow", "llm_enforce"],
        "llm_enforce"
      ),
      maxRetries: clamp(envInt(env, "RESPONSE_MAX_RETRIES", 1), 0, 1),
      schemaVersion: (env.RESPONSE_SCHEMA_VERSION ?? "").trim() || "answer_plan_v2",
      policyVersion: (env.RESPONSE_POLICY_VERSION ?? "").trim() || "advice_policy_v1",
    }),
    encoding: Object.freeze({
      enabled: envBool(env, "ENCODING_GATE_ENABLED", true),
      repairEnabled: envBool(env, "ENCODING_REPAIR_ENABLED", true),
      repairScoreMin: clamp(envFloat(env, "ENCODING_REPAIR_SCORE_MIN", 0.12), 0, 1),
      failfastScoreMin: clamp(envFloat(env, "ENCODING_FAILFAST_SCORE_MIN", 0.45), 0, 1),
      repairMinDelta: clamp(envFloat(env, "ENCODING_REPAIR_MIN_DELTA", 0.1), 0, 1),
      normalizationForm: envEnum<NormalizationForm>(
        env,
        "ENCODING_NORMALIZATION_FORM",
        ["NFC", "NFD", "NFKC", "NFKD"],
        "NFC"
      ),
    }),
    tools: Object.freeze({
      gatewayEndpoint: withMcpPath(env.TOOL_GATEWAY_ENDPOINT ?? ""),
      callTimeoutMs: Math.max(100, envInt(env, "TOOL_CALL_TIMEOUT_MS", 20_000)),
      maxRetries: clamp(envInt(env, "TOOL_MAX_RETRIES", 2), 0, 5),
      retryBaseMs: Math.max(0, envInt(env, "TOOL_RETRY_BASE_MS", 200)),
      fanoutTimeoutMs: Math.max(100, envInt(env, "TOOL_FANOUT_TIMEOUT_MS", 25_000)),
      maxWorkers: Math.max(1, envInt(env, "TOOL_MAX_WORKERS", 6)),
      ...(kbToolName ? { kbToolName } : {}),
      kbId: (env.KB_ID ?? "").trim(),
    }),
    signals: Object.freeze({
      overspendHigh: envFloat(env, "SERVICE_SIGNAL_OVERSPEND_HIGH", 0.35),
      runwayLowMonths: envFloat(env, "SERVICE_SIGNAL_RUNWAY_LOW_MONTHS", 3),
      volatilityHigh: envFloat(env, "SERVICE_SIGNAL_VOLATILITY_HIGH", 0.35),
      goalGapHighAmount: envFloat(env, "SERVICE_SIGNAL_GOAL_GAP_HIGH_AMOUNT", 0),
      anomalyRecentMinFlags: Math.max(1, envInt(env, "SERVICE_SIGNAL_ANOMALY_RECENT_MIN_FLAGS", 1)),
    }),
    auditEndpoint: (env.AUDIT_ENDPOINT ?? "").trim(),
  });
}
