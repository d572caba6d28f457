import type { FastifyInstance } from "fastify";

import { RecentCorrectionsQuery, TurnRequest } from "../contracts/chat";
import type { PipelineController } from "../control-plane/pipeline_controller";
import type { PipelineMetrics } from "../metrics/pipeline_metrics";

export async function chatRoutes(
  app: FastifyInstance,
  opts: { controller: PipelineController; metrics: PipelineMetrics }
) {
  const { controller, metrics } = opts;

  // Explicit OPTIONS handler for predictable CORS preflight behavior.
  app.options("/chat", async (_req, reply) => reply.code(204).send());

  app.post("/chat", async (req, reply) => {
    const parsed = TurnRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const turn = parsed.data;
    const result = await controller.runTurnWithTimeout({
      sessionId: turn.sessionId,
      message: turn.message,
      userRole: turn.userRole,
    });

    req.log.info(
      {
        evt: "chat.responded",
        turnId: result.turnId,
        status: result.status,
        intent: result.intent,
        isEthical: result.isEthical,
        selfCorrected: result.selfCorrected,
      },
      "chat.responded"
    );

    return { ok: result.status === "completed", ...result };
  });

  app.get("/stats", async () => metrics.snapshot());

  app.get("/corrections/recent", async (req, reply) => {
    const parsed = RecentCorrectionsQuery.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }
    const records = controller.recentCorrections;
    return { corrections: records.slice(-parsed.data.limit) };
  });
}
