import { Annotation, StateGraph, START, END } from "@langchain/langgraph";
import type { RunnableConfig } from "@langchain/core/runnables";

import { createFailure, describeError, type WorkflowFailure } from "../errors";
import { validateStageInput, validateStageOutput } from "../validators/stage-validator";
import type { WorkflowArtifacts } from "./artifacts";
import { GATED_STAGE, STAGES, nextStageAfter } from "./constants";
import { evaluateEligibility } from "./eligibility";
import type {
  CheckpointRecord,
  CheckpointStatus,
  StageEvent,
  StageName,
  WorkflowGraphState,
  WorkflowRuntime
} from "./types";

const WorkflowState = Annotation.Root({
  sessionId: Annotation<string>(),
  quoteNumber: Annotation<number>(),
  stage: Annotation<StageName | null>(),
  next: Annotation<StageName | null>(),
  stopAfter: Annotation<StageName | null>(),
  completedStages: Annotation<StageName[]>(),
  status: Annotation<CheckpointStatus>(),
  artifacts: Annotation<WorkflowArtifacts>(),
  failure: Annotation<WorkflowFailure | null>(),
  events: Annotation<StageEvent[]>({
    default: () => [],
    reducer: (left, right) => left.concat(right)
  })
});

type NodeConfig = RunnableConfig & {
  configurable?: {
    runtime?: WorkflowRuntime;
  };
};

function resolveRuntime(config?: NodeConfig): WorkflowRuntime {
  const runtime = config?.configurable?.runtime;
  if (!runtime) {
    throw new Error("Workflow runtime is not configured");
  }
  return runtime;
}

function createEventBuffer(onEvent?: (event: StageEvent) => void) {
  const buffer: StageEvent[] = [];
  return {
    emit(event: StageEvent) {
      buffer.push(event);
      onEvent?.(event);
    },
    flush() {
      return buffer;
    }
  };
}

/** Checkpoint status implied by the artifacts alone; the gate and failures override it. */
export function deriveStatus(artifacts: WorkflowArtifacts): CheckpointStatus {
  if (artifacts.issuance) return "Active";
  if (artifacts.policyDraft) return "Draft";
  return "InProgress";
}

export function toCheckpointRecord(
  state: Pick<WorkflowGraphState, "sessionId" | "quoteNumber" | "stage" | "completedStages" | "status" | "artifacts" | "failure">,
  now: Date
): CheckpointRecord {
  const { customerProfile, ...artifacts } = state.artifacts;
  return {
    ...artifacts,
    id: state.sessionId,
    sessionId: state.sessionId,
    quoteNumber: state.quoteNumber,
    customerProfile: customerProfile ?? null,
    stage: state.stage,
    completedStages: state.completedStages,
    status: state.status,
    lastUpdated: now.toISOString(),
    ...(state.failure ? { failure: state.failure } : {})
  };
}

function applyEligibilityGate(artifacts: WorkflowArtifacts) {
  const profile = artifacts.customerProfile;
  if (!profile) {
    return { artifacts, reason: null };
  }

  const decision = evaluateEligibility(profile.underwriting);
  if (decision.eligible) {
    return {
      artifacts: { ...artifacts, customerProfile: { ...profile, eligibility: true, eligibilityReason: null } },
      reason: null
    };
  }
  return {
    artifacts: {
      ...artifacts,
      customerProfile: { ...profile, eligibility: false, eligibilityReason: decision.reason },
      ineligibilityReason: decision.reason
    },
    reason: decision.reason
  };
}

function createStageNode(stage: StageName) {
  return async (state: WorkflowGraphState, config?: NodeConfig): Promise<Partial<WorkflowGraphState>> => {
    const runtime = resolveRuntime(config);
    const log = runtime.logger.child({ sessionId: state.sessionId, stage });
    const events = createEventBuffer(runtime.onEvent);

    const save = async (update: Pick<WorkflowGraphState, "completedStages" | "status" | "artifacts" | "failure">) => {
      await runtime.checkpoints.save(toCheckpointRecord({ ...state, ...update, stage }, runtime.now()));
      events.emit({ event: "checkpoint.saved", data: { stage, status: update.status } });
    };

    const halt = async (
      artifacts: WorkflowArtifacts,
      kind: WorkflowFailure["kind"],
      code: string,
      reasons: string[]
    ): Promise<Partial<WorkflowGraphState>> => {
      const failure = createFailure(stage, kind, code, reasons);
      log.error({ correlationId: failure.correlationId, code, reasons }, "Stage failed");
      events.emit({ event: "stage.failed", data: { stage, code, correlationId: failure.correlationId } });
      await save({ completedStages: state.completedStages, status: "Error", artifacts, failure });
      return { stage, next: null, status: "Error", artifacts, failure, events: events.flush() };
    };

    events.emit({ event: "stage.started", data: { stage } });

    try {
      const input = validateStageInput(stage, state.artifacts);
      if (!input.ok) {
        return await halt(state.artifacts, "ValidationFailure", "MISSING_INPUT", input.reasons);
      }

      const result = await runtime.driver.run({
        sessionId: state.sessionId,
        quoteNumber: state.quoteNumber,
        stage,
        artifacts: state.artifacts,
        generation: runtime.generation,
        gateway: runtime.gateway,
        identifiers: runtime.identifiers,
        retry: runtime.retry,
        budgetLimit: runtime.budgetLimit,
        logger: log,
        now: runtime.now
      });

      if (!result.ok) {
        return await halt({ ...state.artifacts, ...result.update }, result.kind, result.code, result.reasons);
      }

      let artifacts: WorkflowArtifacts = { ...state.artifacts, ...result.update };
      let status = deriveStatus(artifacts);
      let next = nextStageAfter(stage);

      if (stage === GATED_STAGE) {
        const gate = applyEligibilityGate(artifacts);
        artifacts = gate.artifacts;
        if (gate.reason !== null) {
          status = "Ineligible";
          next = null;
          log.info({ reason: gate.reason }, "Applicant is ineligible");
          events.emit({ event: "workflow.ineligible", data: { stage, reason: gate.reason } });
        }
      }

      const output = validateStageOutput(stage, artifacts);
      if (!output.ok) {
        return await halt(artifacts, "ValidationFailure", "INVALID_STAGE_OUTPUT", output.reasons);
      }

      const completedStages = [...state.completedStages.filter((name) => name !== stage), stage];
      events.emit({ event: "stage.completed", data: { stage, usedFallback: result.usedFallback } });
      log.debug({ generationCalls: result.generationCalls, usedFallback: result.usedFallback }, "Stage completed");

      if (state.stopAfter === stage) {
        next = null;
      }

      await save({ completedStages, status, artifacts, failure: null });
      return { stage, next, completedStages, status, artifacts, failure: null, events: events.flush() };
    } catch (error) {
      return halt(state.artifacts, "StageError", "STAGE_ERROR", [describeError(error)]);
    }
  };
}

function routeNext(state: WorkflowGraphState) {
  return state.next ?? END;
}

/**
 * One node per stage. START jumps to `next` (the first pending stage), and each stage
 * routes to its successor until the session pauses, halts or completes.
 */
export function createWorkflowGraph() {
  const graph = new StateGraph(WorkflowState)
    .addNode("intake", createStageNode("intake"))
    .addNode("profile", createStageNode("profile"))
    .addNode("underwriting", createStageNode("underwriting"))
    .addNode("risk", createStageNode("risk"))
    .addNode("coverage", createStageNode("coverage"))
    .addNode("draft", createStageNode("draft"))
    .addNode("polish", createStageNode("polish"))
    .addNode("pricing", createStageNode("pricing"))
    .addNode("quote", createStageNode("quote"))
    .addNode("presentation", createStageNode("presentation"))
    .addNode("review", createStageNode("review"))
    .addNode("issuance", createStageNode("issuance"))
    .addNode("monitoring", createStageNode("monitoring"))
    .addNode("summary", createStageNode("summary"))
    .addConditionalEdges(START, routeNext);

  for (const stage of STAGES) {
    graph.addConditionalEdges(stage, routeNext);
  }

  return graph.compile({ name: "policy-workflow" });
}

export type WorkflowGraph = ReturnType<typeof createWorkflowGraph>;

/** Enough supersteps for every stage plus the entry hop. */
export const WORKFLOW_RECURSION_LIMIT = STAGES.length + 5;
