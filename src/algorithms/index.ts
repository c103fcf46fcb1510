/**
 * @fileoverview Max-flow algorithm exports and variant lookup.
 *
 * @module algorithms
 */

import type { AlgorithmName, MaxFlowAlgorithm } from "./AlgorithmTypes";
import { AugmentingPath } from "./AugmentingPath";
import { BlockingFlow } from "./BlockingFlow";
import { PreflowPush } from "./PreflowPush";

export {
  type AlgorithmName,
  type TerminationReason,
  type RunBudget,
  type FlowResult,
  type MaxFlowAlgorithm,
  ALGORITHM_NAMES,
  DEFAULT_RUN_BUDGET,
} from "./AlgorithmTypes";
export { AugmentingPath } from "./AugmentingPath";
export { BlockingFlow } from "./BlockingFlow";
export { PreflowPush } from "./PreflowPush";
export { ResidualGraph } from "./ResidualGraph";
export { BudgetGuard, assertBudget } from "./BudgetGuard";

/**
 * Algorithms hold no state between runs, so one instance per variant is
 * shared.
 */
const ALGORITHMS: Record<AlgorithmName, MaxFlowAlgorithm> = {
  AUGMENTING_PATH: new AugmentingPath(),
  BLOCKING_FLOW: new BlockingFlow(),
  PREFLOW_PUSH: new PreflowPush(),
};

export function getAlgorithm(name: AlgorithmName): MaxFlowAlgorithm {
  return ALGORITHMS[name];
}
