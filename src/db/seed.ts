import { env } from "../env";
import logger from "../libs/logger";
import { createStoreConnection } from "./client";
import { LibsqlDocumentStore } from "./durable-store";
import { PersistenceGateway } from "./gateway";
import { seedUnderwritingQuestions } from "./underwriting-questions";

async function seed() {
  const connection = createStoreConnection({ url: env.TURSO_DATABASE_URL, authToken: env.TURSO_AUTH_TOKEN });
  const gateway = new PersistenceGateway({
    durable: new LibsqlDocumentStore(connection, { autoCreate: true }),
    timeoutMs: env.STORE_TIMEOUT_MS,
    sequencePrefixes: [env.QUOTE_PREFIX, env.POLICY_PREFIX]
  });

  try {
    const backends = await gateway.initialize();
    if (backends.underwritingQuestions !== "durable") {
      throw new Error("Durable store is unavailable; nothing was seeded.");
    }
    const count = await seedUnderwritingQuestions(gateway);
    logger.info({ count, url: connection.url }, "Seed complete");
  } finally {
    await gateway.close();
  }
}

seed().then(
  () => {
    process.exit(0);
  },
  (error: unknown) => {
    logger.error({ err: error }, "Seed failed");
    process.exit(1);
  }
);
