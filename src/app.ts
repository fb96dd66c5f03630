import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import { loadAdvisorConfig, type AdvisorConfig } from "./control-plane/advisor_config";
import type { AdvisorDeps } from "./control-plane/orchestrator";
import { createLogger, type Logger } from "./logger";
import { createInferenceProvider } from "./providers/provider_config";
import { adviseRoutes } from "./routes/advise";
import { healthRoutes } from "./routes/healthz";
import { MemoryClarificationStore } from "./store/clarification_store";
import { HttpAuditSink, MemoryAuditSink } from "./tools/audit_sink";
import { KbClient } from "./tools/kb_client";
import { JsonRpcToolClient } from "./tools/tool_client";

/** Production wiring from config; tests pass their own fakes through `overrides`. */
export function buildAdvisorDeps(
  config: AdvisorConfig = loadAdvisorConfig(),
  overrides: Partial<AdvisorDeps> = {}
): AdvisorDeps {
  const log: Logger = overrides.log ?? createLogger();
  const tools = config.tools;
  const invoker =
    overrides.invoker ??
    new JsonRpcToolClient({
      endpoint: tools.gatewayEndpoint,
      timeoutMs: tools.callTimeoutMs,
      maxRetries: tools.maxRetries,
      retryBaseMs: tools.retryBaseMs,
      log,
    });

  return {
    config,
    log,
    invoker,
    provider: overrides.provider ?? createInferenceProvider(),
    kb:
      overrides.kb ??
      new KbClient({
        invoker,
        knowledgeBaseId: tools.kbId,
        ...(tools.kbToolName ? { toolName: tools.kbToolName } : {}),
        log,
      }),
    audit:
      overrides.audit ??
      (config.auditEndpoint ? new HttpAuditSink({ endpoint: config.auditEndpoint }) : new MemoryAuditSink()),
    clarifications: overrides.clarifications ?? new MemoryClarificationStore(),
  };
}

export function buildApp(deps: AdvisorDeps): FastifyInstance {
  const app = Fastify({ logger: false });

  // CORS: permissive for the advisory client. Tighten per deployment.
  app.register(cors, {
    origin: true,
  });

  app.register(healthRoutes, { responseMode: deps.config.response.mode });
  app.register(adviseRoutes, { prefix: "/v1", deps });
  return app;
}
