import fastify, { type FastifyInstance } from "fastify";
import { env, type AppEnv } from "./env";
import { createStoreConnection } from "./db/client";
import { LibsqlDocumentStore } from "./db/durable-store";
import { PersistenceGateway } from "./db/gateway";
import logger from "./libs/logger";
import { OpenAIGeneration } from "./libs/openai";
import errorHandlerPlugin from "./plugins/error-handler";
import rateLimitPlugin, { type InMemoryRunLimiter } from "./plugins/rate-limit";
import securityHeadersPlugin from "./plugins/security";
import underwritingRoutes from "./routes/api/underwriting";
import workflowRoutes from "./routes/api/workflows";
import { WorkflowEngine, type WorkflowRunner } from "./services/workflow";

type CreateAppOptions = {
  engine: WorkflowRunner;
  gateway: PersistenceGateway;
  dev: boolean;
  limiter?: InMemoryRunLimiter;
};

export function createApp({ engine, gateway, dev, limiter }: CreateAppOptions): FastifyInstance {
  const app = fastify({
    logger: {
      level: dev ? "info" : "warn"
    }
  });

  app.register(errorHandlerPlugin);
  app.register(securityHeadersPlugin, { dev });
  app.register(rateLimitPlugin, { limiter });
  app.register(workflowRoutes, { engine });
  app.register(underwritingRoutes, { gateway });

  app.get("/api/health", async (_, reply) => {
    return reply.send({ ok: true, backends: gateway.describeBackends() });
  });

  return app;
}

export type BuiltServer = {
  app: FastifyInstance;
  gateway: PersistenceGateway;
};

export async function buildServer(config: AppEnv = env): Promise<BuiltServer> {
  const connection = createStoreConnection({ url: config.TURSO_DATABASE_URL, authToken: config.TURSO_AUTH_TOKEN });
  const gateway = new PersistenceGateway({
    durable: new LibsqlDocumentStore(connection, { autoCreate: config.STORE_AUTO_CREATE }),
    timeoutMs: config.STORE_TIMEOUT_MS,
    retryAfterMs: config.STORE_RETRY_AFTER_MS,
    sequencePrefixes: [config.QUOTE_PREFIX, config.POLICY_PREFIX]
  });
  const backends = await gateway.initialize();
  logger.info({ backends }, "Persistence ready");

  const engine = new WorkflowEngine({
    gateway,
    generation: new OpenAIGeneration({
      apiKey: config.OPENAI_API_KEY,
      baseURL: config.OPENAI_API_BASE,
      model: config.OPENAI_MODEL,
      timeoutMs: config.GENERATION_TIMEOUT_MS
    }),
    identifiers: {
      quotePrefix: config.QUOTE_PREFIX,
      policyPrefix: config.POLICY_PREFIX,
      increment: config.SEQUENCE_INCREMENT,
      defaultStart: config.SEQUENCE_START
    },
    retry: {
      maxAttempts: config.GENERATION_MAX_ATTEMPTS,
      backoffMs: config.GENERATION_BACKOFF_MS,
      jitter: config.GENERATION_BACKOFF_JITTER,
      timeoutMs: config.GENERATION_TIMEOUT_MS
    },
    budgetLimit: config.MAX_STAGE_GENERATION_CALLS
  });

  const app = createApp({ engine, gateway, dev: config.NODE_ENV !== "production" });
  app.addHook("onClose", async () => {
    await gateway.close();
  });
  return { app, gateway };
}

export async function start() {
  const { app } = await buildServer();
  const port = env.PORT ?? 3000;
  const host = env.HOST ?? "0.0.0.0";

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    app.log.info({ signal }, "Shutting down server...");
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await app.listen({ port, host });
    app.log.info(`Server ready on http://${host}:${port}`);
  } catch (error) {
    app.log.error({ err: error }, "Failed to start server");
    process.exit(1);
  }
}
