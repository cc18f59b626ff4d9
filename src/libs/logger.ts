import pino, { type Logger } from "pino";

const nodeEnv = process.env.NODE_ENV ?? "development";

function resolveLevel() {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (nodeEnv === "test") return "silent";
  return nodeEnv === "production" ? "info" : "debug";
}

const logger: Logger = pino({
  name: "policy-workflow",
  level: resolveLevel(),
  ...(nodeEnv === "development"
    ? {
        transport: {
          target: "pino-pretty",
          options: { colorize: true }
        }
      }
    : {})
});

export type { Logger };

export default logger;
