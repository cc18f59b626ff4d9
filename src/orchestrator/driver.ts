import { describeError } from "../errors";
import { BudgetExceededError, StageBudget } from "./budget";
import { stageProcessors } from "./processors";
import type { StageDriver, StageDriverResult, StageDriverRunArgs, StageName, StageProcessor } from "./types";

/**
 * Runs one stage processor under its own generation budget. Whatever the processor
 * throws comes back as a StageError result instead of unwinding the graph.
 */
export class DefaultStageDriver implements StageDriver {
  constructor(private readonly processors: Record<StageName, StageProcessor> = stageProcessors) {}

  async run({ budgetLimit, ...context }: StageDriverRunArgs): Promise<StageDriverResult> {
    const processor = this.processors[context.stage];
    const budget = new StageBudget(budgetLimit);

    try {
      const result = await processor.run({ ...context, budget });
      return { ...result, generationCalls: budget.totalCalls };
    } catch (error) {
      if (error instanceof BudgetExceededError) {
        return {
          ok: false,
          kind: "StageError",
          code: "BUDGET_EXCEEDED",
          reasons: [error.message],
          generationCalls: budget.totalCalls
        };
      }

      context.logger.error({ err: error }, "Stage processor threw");
      return {
        ok: false,
        kind: "StageError",
        code: "STAGE_ERROR",
        reasons: [describeError(error)],
        generationCalls: budget.totalCalls
      };
    }
  }
}
