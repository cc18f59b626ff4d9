import type { FastifyPluginCallback } from "fastify";
import { z } from "zod";
import { customerSubmissionSchema } from "../../orchestrator/artifacts";
import { isStageName } from "../../orchestrator/constants";
import type { StageName } from "../../orchestrator/types";
import type { WorkflowOutcome, WorkflowRunner } from "../../services/workflow";

export type WorkflowRoutesOptions = {
  engine: WorkflowRunner;
};

const RUN_MINUTE_LIMIT = 20;
const RUN_MINUTE_WINDOW_MS = 60_000;

const stopAfterSchema = z
  .custom<StageName>((value) => isStageName(value), "stopAfter must name a workflow stage")
  .optional();

const startBodySchema = customerSubmissionSchema.extend({ stopAfter: stopAfterSchema });

const resumeBodySchema = z.object({ stopAfter: stopAfterSchema }).default({});

const paramsSchema = z.object({ sessionId: z.string().trim().min(1) });

function issuesOf(error: z.ZodError) {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
}

function presentOutcome(outcome: WorkflowOutcome) {
  return {
    sessionId: outcome.sessionId,
    status: outcome.status,
    stage: outcome.stage,
    completedStages: outcome.completedStages,
    nextStage: outcome.nextStage,
    failure: outcome.failure,
    checkpoint: outcome.checkpoint
  };
}

const workflowRoutes: FastifyPluginCallback<WorkflowRoutesOptions> = (app, { engine }, done) => {
  app.post("/api/workflows", async (request, reply) => {
    const parsed = startBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "INVALID_REQUEST", reasons: issuesOf(parsed.error) });
    }

    const rate = app.runLimiter.check(request.ip, "workflow:run", RUN_MINUTE_LIMIT, RUN_MINUTE_WINDOW_MS);
    if (!rate.ok) {
      return reply.code(429).header("Retry-After", String(rate.retryAfterSec)).send({ error: "RATE_LIMIT_EXCEEDED" });
    }

    const { stopAfter, ...submission } = parsed.data;
    const outcome = await engine.start(submission, { stopAfter });
    return reply.code(201).send(presentOutcome(outcome));
  });

  app.post("/api/workflows/:sessionId/resume", async (request, reply) => {
    const params = paramsSchema.safeParse(request.params);
    const body = resumeBodySchema.safeParse(request.body ?? undefined);
    if (!params.success || !body.success) {
      const reasons = [
        ...(params.success ? [] : issuesOf(params.error)),
        ...(body.success ? [] : issuesOf(body.error))
      ];
      return reply.code(400).send({ error: "INVALID_REQUEST", reasons });
    }

    const { sessionId } = params.data;
    const rate = app.runLimiter.check(request.ip, "workflow:run", RUN_MINUTE_LIMIT, RUN_MINUTE_WINDOW_MS);
    if (!rate.ok) {
      return reply.code(429).header("Retry-After", String(rate.retryAfterSec)).send({ error: "RATE_LIMIT_EXCEEDED" });
    }
    if (!app.runLimiter.acquireSession(sessionId)) {
      return reply.code(409).send({ error: "SESSION_BUSY" });
    }

    try {
      const outcome = await engine.resume(sessionId, { stopAfter: body.data.stopAfter });
      if (!outcome) {
        return reply.code(404).send({ error: "SESSION_NOT_FOUND" });
      }
      return reply.send(presentOutcome(outcome));
    } finally {
      app.runLimiter.releaseSession(sessionId);
    }
  });

  app.get("/api/workflows/:sessionId", async (request, reply) => {
    const params = paramsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: "INVALID_REQUEST", reasons: issuesOf(params.error) });
    }

    const checkpoint = await engine.getCheckpoint(params.data.sessionId);
    if (!checkpoint) {
      return reply.code(404).send({ error: "SESSION_NOT_FOUND" });
    }
    return reply.send(checkpoint);
  });

  done();
};

export default workflowRoutes;
