import type { FastifyInstance } from "fastify";

export async function healthRoutes(app: FastifyInstance, opts: { responseMode?: string } = {}) {
  app.get("/healthz", async () => ({
    ok: true,
    service: "advisor-core",
    ...(opts.responseMode ? { response_mode: opts.responseMode } : {}),
    ts: new Date().toISOString(),
  }));
}
