/**
 * @fileoverview Max-flow / min-cut engine for water distribution grids.
 *
 * ## Usage
 *
 * ```typescript
 * import { FlowNetwork, FlowEngine, ScenarioBuilder } from "water-flow-engine";
 *
 * const network = FlowNetwork.fromEdges(edges, "S", "T");
 * const degraded = new ScenarioBuilder(network).withUniformLeakage(0.1).failEdge("A->T").apply();
 *
 * const engine = new FlowEngine();
 * const result = engine.run(degraded, "BLOCKING_FLOW", { trace: true });
 * const cut = engine.extractMinCut(degraded, result);
 * ```
 *
 * @module water-flow-engine
 */

export * from "./errors/FlowErrors";
export * from "./network";
export * from "./scenario";
export * from "./algorithms";
export { extractMinCut, type MinCut, type CutEdge } from "./cut/MinCutExtractor";
export * from "./trace";
export * from "./engine";
export * from "./analysis";
export {
  type EngineConfig,
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  resolveEngineConfig,
  loadEngineConfig,
} from "./config/EngineConfig";
export {
  parseNetworkJson,
  parseScenarioJson,
  parseEdgeCsv,
  loadNetworkFile,
  DEFAULT_SOURCE,
  DEFAULT_SINK,
} from "./io/NetworkLoader";
export {
  formatFlowResult,
  formatMinCut,
  formatFlowPaths,
  formatSweep,
  formatComparison,
} from "./report/FlowReport";
export * from "./utils";
