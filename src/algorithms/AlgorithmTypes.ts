/**
 * AlgorithmTypes - Max-Flow Capability and Result Types
 *
 * The three max-flow variants share one capability interface and one
 * result shape. Results are plain data so the dashboard can render them
 * without touching residual state.
 */

import type { FlowNetwork } from "../network/FlowNetwork";
import type { TraceRecorder } from "../trace/TraceRecorder";

// =============================================================================
// ALGORITHMS
// =============================================================================

export type AlgorithmName = "AUGMENTING_PATH" | "BLOCKING_FLOW" | "PREFLOW_PUSH";

export const ALGORITHM_NAMES: readonly AlgorithmName[] = ["AUGMENTING_PATH", "BLOCKING_FLOW", "PREFLOW_PUSH"];

/**
 * Why a run stopped.
 * - CONVERGED: no augmenting path remains, the flow is maximal
 * - BUDGET_EXCEEDED: iteration or time budget ran out, the flow is valid
 *   but possibly not maximal
 * - CANCELLED: the caller aborted the run; same guarantees as BUDGET_EXCEEDED
 */
export type TerminationReason = "CONVERGED" | "BUDGET_EXCEEDED" | "CANCELLED";

// =============================================================================
// BUDGET
// =============================================================================

/**
 * Execution budget for a single run.
 */
export interface RunBudget {
  /** Maximum augmentations / phases / active-node discharges */
  maxIterations: number;

  /** Wall-clock limit in milliseconds; 0 disables it */
  timeLimitMs: number;

  /** Values within this distance of zero are treated as zero */
  tolerance: number;

  /** Cooperative cancellation, checked between iterations */
  signal?: AbortSignal;
}

export const DEFAULT_RUN_BUDGET: RunBudget = {
  maxIterations: 100_000,
  timeLimitMs: 0,
  tolerance: 1e-9,
};

// =============================================================================
// RESULT
// =============================================================================

/**
 * Outcome of one max-flow run.
 *
 * Invariants (checked by verifyFlow):
 * - every edge: 0 <= flow <= capacity
 * - every node but source/sink: inflow == outflow
 * - out of source == into sink == value
 */
export interface FlowResult {
  algorithm: AlgorithmName;

  /** Total flow leaving the source */
  value: number;

  /** Flow per edge id, one entry per edge of the network */
  edgeFlows: ReadonlyMap<string, number>;

  /** Augmentations (AUGMENTING_PATH), phases (BLOCKING_FLOW) or discharges (PREFLOW_PUSH) */
  iterations: number;

  termination: TerminationReason;

  /** Tolerance the run compared residuals against */
  tolerance: number;
}

/**
 * Capability shared by every max-flow variant.
 */
export interface MaxFlowAlgorithm {
  readonly name: AlgorithmName;

  /**
   * Computes a max flow from `network.source` to `network.sink`.
   *
   * @param recorder - Optional trace sink; never changes the result
   */
  run(network: FlowNetwork, budget: RunBudget, recorder?: TraceRecorder): FlowResult;
}
