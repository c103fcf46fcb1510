/**
 * @fileoverview Analysis of finished runs: verification, path
 * decomposition, diagnostics and batch studies.
 *
 * @module analysis
 */

export { verifyFlow, netFlows, describeViolation, type FlowViolation } from "./FlowInvariants";
export { decomposeFlow, type FlowPath } from "./FlowPaths";
export {
  diagnoseFlow,
  utilizationBand,
  type FlowDiagnostics,
  type EdgeUtilization,
  type NodeImbalance,
  type UtilizationBand,
} from "./FlowDiagnostics";
export {
  sweepLeakage,
  compareAlgorithms,
  type SweepPoint,
  type AlgorithmRun,
  type AlgorithmComparison,
} from "./ScenarioSweep";
