import type { CheckpointStatus, StageName } from "./types";

export const STAGES: readonly StageName[] = [
  "intake",
  "profile",
  "underwriting",
  "risk",
  "coverage",
  "draft",
  "polish",
  "pricing",
  "quote",
  "presentation",
  "review",
  "issuance",
  "monitoring",
  "summary"
];

export const MAX_STAGE_GENERATION_CALLS = 8;

/** The eligibility gate runs right after this stage. */
export const GATED_STAGE: StageName = "underwriting";

/** Sessions in these states never advance again. */
export const TERMINAL_STATUSES: ReadonlySet<CheckpointStatus> = new Set<CheckpointStatus>(["Ineligible", "Error"]);

export function isStageName(value: unknown): value is StageName {
  return typeof value === "string" && STAGES.some((stage) => stage === value);
}

export function nextStageAfter(stage: StageName): StageName | null {
  const index = STAGES.indexOf(stage);
  return index >= 0 && index < STAGES.length - 1 ? STAGES[index + 1] : null;
}

/** First stage not yet completed, in order; null once every stage has run. */
export function pendingStage(completed: readonly StageName[]): StageName | null {
  return STAGES.find((stage) => !completed.includes(stage)) ?? null;
}
