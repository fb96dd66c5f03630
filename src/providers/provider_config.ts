import { config as loadEnv } from "dotenv";

import { FakeInferenceProvider } from "./fake_model";
import type { InferencePurpose, InferenceProvider } from "./inference_provider";
import { OpenAIInferenceProvider } from "./openai_model";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type ModelTier = "mini" | "full";

export type ModelSelection = {
  model: string;
  source: "default" | "env" | "purpose";
  tier: ModelTier;
};

type SelectModelArgs = {
  advisorEnv?: string;
  nodeEnv?: string;
  purpose: InferencePurpose;
  env?: Record<string, string | undefined>;
};

const DEFAULTS_BY_ENV: Record<string, string> = {
  local: "gpt-4o-mini",
  staging: "gpt-4o-mini",
  prod: "gpt-4o",
};

const MODEL_BY_TIER: Record<ModelTier, string> = {
  mini: "gpt-4o-mini",
  full: "gpt-4o",
};

// Extraction is a short classification call; synthesis carries the context.
const TIER_BY_PURPOSE: Record<InferencePurpose, ModelTier> = {
  intent_extraction: "mini",
  answer_synthesis: "full",
};

export function resolveAdvisorEnv(
  nodeEnv?: string,
  env: Record<string, string | undefined> = process.env
): string {
  const lane = env.ADVISOR_ENV ?? "";
  if (lane) return lane;
  if (nodeEnv === "production") return "prod";
  return "local";
}

export function selectModel(args: SelectModelArgs): ModelSelection {
  const env = args.env ?? process.env;
  const advisorEnv = args.advisorEnv ?? resolveAdvisorEnv(args.nodeEnv, env);
  const tier = TIER_BY_PURPOSE[args.purpose];

  const purposeOverride =
    args.purpose === "intent_extraction" ? env.ADVISOR_MODEL_EXTRACTION : env.ADVISOR_MODEL_SYNTHESIS;
  if (purposeOverride) {
    return { model: purposeOverride, source: "purpose", tier };
  }

  const envDefault = env.ADVISOR_MODEL_DEFAULT;
  const laneModels: Record<string, string | undefined> = {
    local: env.ADVISOR_MODEL_LOCAL,
    staging: env.ADVISOR_MODEL_STAGING,
    prod: env.ADVISOR_MODEL_PROD,
  };
  const envLane = laneModels[advisorEnv];
  if (envDefault || envLane) {
    return { model: envDefault || envLane || "", source: "env", tier };
  }

  // Non-prod lanes keep every purpose on the lane default to bound cost.
  if (advisorEnv !== "prod") {
    return { model: DEFAULTS_BY_ENV[advisorEnv] ?? DEFAULTS_BY_ENV.local, source: "default", tier };
  }
  return { model: MODEL_BY_TIER[tier], source: "default", tier };
}

export type ProviderKind = "openai" | "fake";

/** `LLM_PROVIDER` wins; otherwise the fake runs outside production when no API key is set. */
export function resolveProviderKind(env: Record<string, string | undefined> = process.env): ProviderKind {
  const raw = (env.LLM_PROVIDER ?? "").trim().toLowerCase();
  if (raw === "openai" || raw === "fake") return raw;
  if (env.NODE_ENV !== "production" && !env.OPENAI_API_KEY) return "fake";
  return "openai";
}

export function createInferenceProvider(env: Record<string, string | undefined> = process.env): InferenceProvider {
  if (resolveProviderKind(env) === "fake") return new FakeInferenceProvider();
  const baseUrl = (env.OPENAI_BASE_URL ?? "").trim();
  return new OpenAIInferenceProvider({
    apiKey: env.OPENAI_API_KEY ?? "",
    modelFor: (purpose) => selectModel({ purpose, nodeEnv: env.NODE_ENV, env }).model,
    ...(baseUrl ? { baseUrl } : {}),
  });
}
