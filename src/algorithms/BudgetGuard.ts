import { InvalidConfigError } from "../errors/FlowErrors";
import type { RunBudget, TerminationReason } from "./AlgorithmTypes";

/**
 * Checks a run's budget between iterations.
 *
 * Algorithms call `check` once an augmentation, phase or discharge has
 * been found and before it is applied, never in the middle of an update.
 */
export class BudgetGuard {
  private readonly budget: RunBudget;
  private readonly deadline: number;
  private readonly now: () => number;

  constructor(budget: RunBudget, now: () => number = Date.now) {
    assertBudget(budget);
    this.budget = budget;
    this.now = now;
    this.deadline = budget.timeLimitMs > 0 ? now() + budget.timeLimitMs : Infinity;
  }

  /**
   * @param iterations - Iterations completed so far
   * @returns The reason to stop, or null to continue
   */
  check(iterations: number): TerminationReason | null {
    if (this.budget.signal?.aborted) return "CANCELLED";
    if (iterations >= this.budget.maxIterations) return "BUDGET_EXCEEDED";
    if (this.deadline !== Infinity && this.now() >= this.deadline) return "BUDGET_EXCEEDED";
    return null;
  }

  /**
   * Lighter check used inside a blocking-flow phase, where the phase
   * itself is the counted iteration.
   */
  interrupted(): TerminationReason | null {
    if (this.budget.signal?.aborted) return "CANCELLED";
    if (this.deadline !== Infinity && this.now() >= this.deadline) return "BUDGET_EXCEEDED";
    return null;
  }
}

export function assertBudget(budget: RunBudget): void {
  if (!Number.isInteger(budget.maxIterations) || budget.maxIterations < 0) {
    throw new InvalidConfigError(`maxIterations must be a non-negative integer, got ${budget.maxIterations}`);
  }
  if (!Number.isFinite(budget.timeLimitMs) || budget.timeLimitMs < 0) {
    throw new InvalidConfigError(`timeLimitMs must be a non-negative number, got ${budget.timeLimitMs}`);
  }
  if (!Number.isFinite(budget.tolerance) || budget.tolerance < 0) {
    throw new InvalidConfigError(`tolerance must be a non-negative number, got ${budget.tolerance}`);
  }
}
