import type { FastifyPluginCallback } from "fastify";
import type { PersistenceGateway } from "../../db/gateway";

export type UnderwritingRoutesOptions = {
  gateway: PersistenceGateway;
};

const underwritingRoutes: FastifyPluginCallback<UnderwritingRoutesOptions> = (app, { gateway }, done) => {
  app.get("/api/underwriting/questions", async (_request, reply) => {
    const questions = await gateway.loadUnderwritingQuestions();
    return reply.send({ questions, backend: gateway.backendOf("underwritingQuestions") });
  });

  done();
};

export default underwritingRoutes;
