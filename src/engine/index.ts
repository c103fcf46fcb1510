export { FlowEngine, run, type RunOptions, type EngineRunResult } from "./FlowEngine";
