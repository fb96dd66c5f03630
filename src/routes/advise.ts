import type { FastifyInstance } from "fastify";

import { AdviseRequest } from "../contracts/advise";
import { runAdvisoryPipeline, type AdvisorDeps } from "../control-plane/orchestrator";

function bearerToken(header: string | undefined): string | undefined {
  const raw = (header ?? "").trim();
  if (!raw) return undefined;
  return raw.toLowerCase().startsWith("bearer ") ? raw.slice(7).trim() || undefined : raw;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export async function adviseRoutes(app: FastifyInstance, opts: { deps: AdvisorDeps }) {
  const { deps } = opts;

  app.options("/advise", async (_req, reply) => reply.code(204).send());

  app.post("/advise", async (req, reply) => {
    const parsed = AdviseRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const body = parsed.data;
    const userToken = bearerToken(headerValue(req.headers.authorization));
    const traceId = headerValue(req.headers["x-trace-id"])?.trim();

    const response = await runAdvisoryPipeline(
      {
        prompt: body.prompt,
        userId: body.user_id,
        ...(body.conversation_id ? { conversationId: body.conversation_id } : {}),
        ...(userToken ? { userToken } : {}),
        ...(traceId ? { traceId } : {}),
      },
      { ...deps, log: deps.log.child({ req_id: req.id }) }
    );
    return reply.code(200).send(response);
  });
}
