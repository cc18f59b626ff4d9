import type { GenerationMode } from "../libs/generation";
import type { StageBudgetManager } from "./types";

export class BudgetExceededError extends Error {
  constructor(public readonly limit: number) {
    super(`Stage budget exceeded (limit: ${limit})`);
    this.name = "BudgetExceededError";
  }
}

/** Caps the generation calls a single stage may make across all of its round trips. */
export class StageBudget implements StageBudgetManager {
  private count: number;
  private readonly byKind: Record<GenerationMode, number> = { generation: 0, validation: 0 };

  constructor(private readonly limit: number, initialCount = 0) {
    this.count = initialCount;
  }

  get totalCalls() {
    return this.count;
  }

  callsOf(kind: GenerationMode) {
    return this.byKind[kind];
  }

  consume(kind: GenerationMode): void {
    if (this.count >= this.limit) {
      throw new BudgetExceededError(this.limit);
    }
    this.count += 1;
    this.byKind[kind] += 1;
  }
}
