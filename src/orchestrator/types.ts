import type { PersistenceGateway } from "../db/gateway";
import type { WorkflowFailure } from "../errors";
import type { RetryPolicy } from "../extractor/round-trip";
import type { GenerationMode, GenerationService } from "../libs/generation";
import type { Logger } from "../libs/logger";
import type { IdentifierPolicy } from "../services/identifiers";
import type { WorkflowArtifacts } from "./artifacts";

export type StageName =
  | "intake"
  | "profile"
  | "underwriting"
  | "risk"
  | "coverage"
  | "draft"
  | "polish"
  | "pricing"
  | "quote"
  | "presentation"
  | "review"
  | "issuance"
  | "monitoring"
  | "summary";

export type CheckpointStatus = "InProgress" | "Draft" | "Active" | "Ineligible" | "Error";

export type StageEvent =
  | { event: "stage.started"; data: { stage: StageName } }
  | { event: "stage.completed"; data: { stage: StageName; usedFallback: boolean } }
  | { event: "stage.failed"; data: { stage: StageName; code: string; correlationId: string } }
  | { event: "workflow.ineligible"; data: { stage: StageName; reason: string } }
  | { event: "checkpoint.saved"; data: { stage: StageName; status: CheckpointStatus } };

export interface StageBudgetManager {
  readonly totalCalls: number;
  consume: (kind: GenerationMode) => void;
}

export type StageContext = {
  sessionId: string;
  quoteNumber: number;
  stage: StageName;
  artifacts: WorkflowArtifacts;
  generation: GenerationService;
  gateway: PersistenceGateway;
  identifiers: IdentifierPolicy;
  retry: RetryPolicy;
  budget: StageBudgetManager;
  logger: Logger;
  now: () => Date;
};

export type StageProcessorResult =
  | { ok: true; update: Partial<WorkflowArtifacts>; usedFallback: boolean }
  | {
      ok: false;
      kind: WorkflowFailure["kind"];
      code: string;
      reasons: string[];
      /** Artifacts worth keeping on the checkpoint even though the stage failed. */
      update?: Partial<WorkflowArtifacts>;
    };

export interface StageProcessor {
  run(context: StageContext): Promise<StageProcessorResult>;
}

export type StageDriverRunArgs = Omit<StageContext, "budget"> & {
  budgetLimit: number;
};

export type StageDriverResult = StageProcessorResult & { generationCalls: number };

export interface StageDriver {
  run(args: StageDriverRunArgs): Promise<StageDriverResult>;
}

/** Persisted snapshot written after every stage; `id` is the session (quote) id. */
export type CheckpointRecord = Omit<WorkflowArtifacts, "customerProfile"> & {
  id: string;
  sessionId: string;
  quoteNumber: number;
  customerProfile: WorkflowArtifacts["customerProfile"] | null;
  stage: StageName | null;
  completedStages: StageName[];
  status: CheckpointStatus;
  lastUpdated: string;
  failure?: WorkflowFailure;
};

export interface CheckpointWriter {
  save(record: CheckpointRecord): Promise<void>;
}

export type WorkflowGraphState = {
  sessionId: string;
  quoteNumber: number;
  stage: StageName | null;
  next: StageName | null;
  stopAfter: StageName | null;
  completedStages: StageName[];
  status: CheckpointStatus;
  artifacts: WorkflowArtifacts;
  failure: WorkflowFailure | null;
  events: StageEvent[];
};

export type WorkflowRuntime = {
  driver: StageDriver;
  checkpoints: CheckpointWriter;
  generation: GenerationService;
  gateway: PersistenceGateway;
  identifiers: IdentifierPolicy;
  retry: RetryPolicy;
  budgetLimit: number;
  logger: Logger;
  now: () => Date;
  onEvent?: (event: StageEvent) => void;
};
