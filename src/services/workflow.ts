import type { PersistenceGateway } from "../db/gateway";
import { createFailure, describeError, type WorkflowFailure } from "../errors";
import type { RetryPolicy } from "../extractor/round-trip";
import type { GenerationService } from "../libs/generation";
import baseLogger, { type Logger } from "../libs/logger";
import { normalizeSubmission, type CustomerSubmissionInput } from "../orchestrator/artifacts";
import { MAX_STAGE_GENERATION_CALLS, TERMINAL_STATUSES, pendingStage } from "../orchestrator/constants";
import { DefaultStageDriver } from "../orchestrator/driver";
import { WORKFLOW_RECURSION_LIMIT, createWorkflowGraph, toCheckpointRecord } from "../orchestrator/graph";
import type {
  CheckpointRecord,
  CheckpointStatus,
  StageDriver,
  StageEvent,
  StageName,
  WorkflowGraphState,
  WorkflowRuntime
} from "../orchestrator/types";
import { CheckpointStore, artifactsOf } from "./checkpoints";
import { allocateQuoteNumber, formatQuoteId, type IdentifierPolicy } from "./identifiers";

export type WorkflowEngineOptions = {
  gateway: PersistenceGateway;
  generation: GenerationService;
  identifiers: IdentifierPolicy;
  retry: RetryPolicy;
  budgetLimit?: number;
  driver?: StageDriver;
  logger?: Logger;
  now?: () => Date;
};

export type WorkflowRunOptions = {
  /** Pause after this stage; the session stays resumable. */
  stopAfter?: StageName;
  onEvent?: (event: StageEvent) => void;
};

export type WorkflowOutcome = {
  sessionId: string;
  quoteNumber: number;
  status: CheckpointStatus;
  stage: StageName | null;
  completedStages: StageName[];
  nextStage: StageName | null;
  failure: WorkflowFailure | null;
  events: StageEvent[];
  checkpoint: CheckpointRecord;
};

function outcomeOf(checkpoint: CheckpointRecord, events: StageEvent[]): WorkflowOutcome {
  const terminal = TERMINAL_STATUSES.has(checkpoint.status);
  return {
    sessionId: checkpoint.sessionId,
    quoteNumber: checkpoint.quoteNumber,
    status: checkpoint.status,
    stage: checkpoint.stage,
    completedStages: checkpoint.completedStages,
    nextStage: terminal ? null : pendingStage(checkpoint.completedStages),
    failure: checkpoint.failure ?? null,
    events,
    checkpoint
  };
}

/** What the HTTP layer needs from the engine. */
export type WorkflowRunner = Pick<WorkflowEngine, "start" | "resume" | "getCheckpoint">;

/**
 * Runs customer sessions through the stage graph. Sessions are keyed by their quote id,
 * checkpointed after every stage and resumable from the first pending stage. `start` and
 * `resume` resolve to a persisted outcome; they do not reject because a stage failed.
 */
export class WorkflowEngine {
  private readonly graph = createWorkflowGraph();
  private readonly checkpoints: CheckpointStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: WorkflowEngineOptions) {
    this.logger = (options.logger ?? baseLogger).child({ component: "workflow" });
    this.checkpoints = new CheckpointStore(options.gateway, this.logger);
    this.now = options.now ?? (() => new Date());
  }

  async start(input: CustomerSubmissionInput, options: WorkflowRunOptions = {}): Promise<WorkflowOutcome> {
    const quoteNumber = await allocateQuoteNumber(this.options.gateway, this.options.identifiers);
    const sessionId = formatQuoteId(this.options.identifiers, quoteNumber);

    const initial = toCheckpointRecord(
      {
        sessionId,
        quoteNumber,
        stage: null,
        completedStages: [],
        status: "InProgress",
        artifacts: { submission: normalizeSubmission(input) },
        failure: null
      },
      this.now()
    );
    await this.checkpoints.save(initial);
    this.logger.info({ sessionId }, "Workflow session started");

    return this.execute(initial, options);
  }

  /** Continues from the first pending stage. Null when the session is unknown. */
  async resume(sessionId: string, options: WorkflowRunOptions = {}): Promise<WorkflowOutcome | null> {
    const checkpoint = await this.checkpoints.load(sessionId);
    if (!checkpoint) {
      return null;
    }

    if (TERMINAL_STATUSES.has(checkpoint.status) || pendingStage(checkpoint.completedStages) === null) {
      this.logger.info({ sessionId, status: checkpoint.status }, "Session has nothing left to run");
      return outcomeOf(checkpoint, []);
    }

    this.logger.info({ sessionId, from: pendingStage(checkpoint.completedStages) }, "Resuming workflow session");
    return this.execute(checkpoint, options);
  }

  getCheckpoint(sessionId: string) {
    return this.checkpoints.load(sessionId);
  }

  private async execute(checkpoint: CheckpointRecord, options: WorkflowRunOptions): Promise<WorkflowOutcome> {
    const log = this.logger.child({ sessionId: checkpoint.sessionId });
    const runtime: WorkflowRuntime = {
      driver: this.options.driver ?? new DefaultStageDriver(),
      checkpoints: this.checkpoints,
      generation: this.options.generation,
      gateway: this.options.gateway,
      identifiers: this.options.identifiers,
      retry: this.options.retry,
      budgetLimit: this.options.budgetLimit ?? MAX_STAGE_GENERATION_CALLS,
      logger: log,
      now: this.now,
      onEvent: options.onEvent
    };

    const initialState: WorkflowGraphState = {
      sessionId: checkpoint.sessionId,
      quoteNumber: checkpoint.quoteNumber,
      stage: checkpoint.stage,
      next: pendingStage(checkpoint.completedStages),
      stopAfter: options.stopAfter ?? null,
      completedStages: checkpoint.completedStages,
      status: checkpoint.status,
      artifacts: artifactsOf(checkpoint),
      failure: null,
      events: []
    };

    let events: StageEvent[] = [];
    try {
      const finalState = await this.graph.invoke(initialState, {
        configurable: { runtime },
        recursionLimit: WORKFLOW_RECURSION_LIMIT
      });
      events = finalState.events;
    } catch (error) {
      await this.recordCrash(checkpoint, error, log);
    }

    const stored = await this.checkpoints.load(checkpoint.sessionId);
    return outcomeOf(stored ?? checkpoint, events);
  }

  /** Last resort when the graph itself rejects: persist an Error outcome for the session. */
  private async recordCrash(checkpoint: CheckpointRecord, error: unknown, log: Logger) {
    const latest = (await this.checkpoints.load(checkpoint.sessionId)) ?? checkpoint;
    const stage = pendingStage(latest.completedStages) ?? latest.stage ?? "intake";
    const failure = createFailure(stage, "StageError", "WORKFLOW_ERROR", [
      describeError(error)
    ]);
    log.error({ correlationId: failure.correlationId, err: error }, "Workflow run crashed");

    try {
      await this.checkpoints.save({
        ...latest,
        stage: failure.stage,
        status: "Error",
        failure,
        lastUpdated: this.now().toISOString()
      });
    } catch (saveError) {
      log.error({ correlationId: failure.correlationId, err: saveError }, "Could not persist crash outcome");
    }
  }
}
