import { randomUUID } from "node:crypto";
import type { StageName } from "./orchestrator/types";

/**
 * The failure taxonomy the workflow works with.
 *
 * - `ExtractionFailure`: no strategy recovered data from a generation reply. Absorbed by
 *   retrying and then by the stage's default dataset; only ever logged.
 * - `BackendUnavailable`: the durable store could not serve a collection. Absorbed by the
 *   in-memory mirror; logged as a warning.
 * - `ValidationFailure`: a stage artifact is unusable for the next stage. Recorded on the
 *   checkpoint with a correlation id and halts the session.
 * - `StageError`: anything a stage threw that nobody anticipated. Handled like a
 *   validation failure.
 */
export type FailureKind = "ExtractionFailure" | "BackendUnavailable" | "ValidationFailure" | "StageError";

export type WorkflowFailure = {
  kind: Extract<FailureKind, "ValidationFailure" | "StageError">;
  code: string;
  message: string;
  reasons: string[];
  stage: StageName;
  correlationId: string;
  occurredAt: string;
};

export function createFailure(
  stage: StageName,
  kind: WorkflowFailure["kind"],
  code: string,
  reasons: string[]
): WorkflowFailure {
  return {
    kind,
    code,
    message: reasons[0] ?? code,
    reasons,
    stage,
    correlationId: randomUUID(),
    occurredAt: new Date().toISOString()
  };
}

export class BackendUnavailableError extends Error {
  constructor(
    public readonly collection: string,
    options?: { cause?: unknown }
  ) {
    super(`Durable store unavailable for collection "${collection}"`, options);
    this.name = "BackendUnavailableError";
  }
}

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
