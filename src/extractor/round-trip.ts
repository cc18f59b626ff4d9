import type { z } from "zod";
import type { GenerationMessage, GenerationMode, GenerationService } from "../libs/generation";
import baseLogger, { type Logger } from "../libs/logger";
import { BudgetExceededError } from "../orchestrator/budget";
import type { StageBudgetManager } from "../orchestrator/types";
import { describeError } from "../errors";
import { sleep, withTimeout } from "../utils/timeout";
import { extractStructured } from "./extract";
import type { StrategyName } from "./strategies";

export type RetryPolicy = {
  maxAttempts: number;
  backoffMs: number;
  /** Fraction of the delay that is randomised either way, 0..1. */
  jitter: number;
  timeoutMs: number;
};

export type RoundTripResult<T> = {
  value: T;
  attempts: number;
  source: "generated" | "fallback";
  strategy?: StrategyName;
};

type RoundTripBase = {
  generation: GenerationService;
  purpose: string;
  messages: GenerationMessage[];
  mode?: GenerationMode;
  policy: RetryPolicy;
  budget?: StageBudgetManager;
  logger?: Logger;
};

export type StructuredRequest<S extends z.ZodTypeAny> = RoundTripBase & {
  schema: S;
  fallback: () => z.output<S>;
};

export type TextRequest = RoundTripBase & {
  fallback: () => string;
};

type Interpretation<T> = { ok: true; value: T; strategy?: StrategyName } | { ok: false; reason: string };

export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random) {
  const base = policy.backoffMs * Math.pow(2, attempt - 1);
  const spread = policy.jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(base * (1 + spread)));
}

async function roundTrip<T>(
  request: RoundTripBase,
  interpret: (reply: string) => Interpretation<T>,
  fallback: () => T
): Promise<RoundTripResult<T>> {
  const { generation, purpose, messages, policy, budget } = request;
  const mode = request.mode ?? "generation";
  const log = (request.logger ?? baseLogger).child({ purpose });
  let attempts = 0;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    try {
      budget?.consume(mode);
    } catch (error) {
      if (!(error instanceof BudgetExceededError)) throw error;
      log.warn({ limit: error.limit }, "Generation budget exhausted");
      break;
    }
    attempts = attempt;

    let reply: string | undefined;
    try {
      reply = await withTimeout(`${purpose} generation`, policy.timeoutMs, (signal) =>
        generation.generate({ purpose, messages, mode, signal })
      );
    } catch (error) {
      log.warn({ attempt, err: describeError(error) }, "Generation call failed");
    }

    if (reply !== undefined) {
      const outcome = interpret(reply);
      if (outcome.ok) {
        log.debug({ attempt, strategy: outcome.strategy }, "Generation reply accepted");
        return { value: outcome.value, attempts, source: "generated", strategy: outcome.strategy };
      }
      log.info({ attempt, reason: outcome.reason }, "Generation reply rejected");
    }

    if (attempt < policy.maxAttempts) {
      await sleep(backoffDelay(policy, attempt));
    }
  }

  log.warn({ attempts }, "Using default dataset");
  return { value: fallback(), attempts, source: "fallback" };
}

/**
 * Asks the generation service for structured data, recovers it with the extractor and
 * validates it against `schema`. Exhausted attempts, timeouts and budget overruns all end
 * in `fallback()`; this never rejects on account of the generation service.
 */
export function requestStructured<S extends z.ZodTypeAny>(request: StructuredRequest<S>) {
  return roundTrip<z.output<S>>(
    request,
    (reply) => {
      const extracted = extractStructured(reply);
      if (!extracted.found) {
        return { ok: false, reason: "NO_STRUCTURED_DATA" };
      }
      const parsed = request.schema.safeParse(extracted.value);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return { ok: false, reason: issue ? `${issue.path.join(".") || "root"}: ${issue.message}` : "SCHEMA_MISMATCH" };
      }
      return { ok: true, value: parsed.data, strategy: extracted.strategy };
    },
    request.fallback
  );
}

const FENCE_WRAPPER = /^```[\w-]*\s*\n([\s\S]*?)\n?```$/;

/** Same contract as requestStructured, for stages whose artifact is prose. */
export function requestText(request: TextRequest) {
  return roundTrip<string>(
    request,
    (reply) => {
      const trimmed = reply.trim();
      const body = (FENCE_WRAPPER.exec(trimmed)?.[1] ?? trimmed).trim();
      return body ? { ok: true, value: body } : { ok: false, reason: "EMPTY_REPLY" };
    },
    request.fallback
  );
}
