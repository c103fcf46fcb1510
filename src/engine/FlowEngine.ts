/**
 * @fileoverview Engine entry point used by the dashboard and scripts.
 *
 * The engine is the only surface the outer layers touch:
 *   run(network, algorithm, options)  -> FlowResult
 *   extractMinCut(network, result)    -> MinCut
 *   applyScenario(network, scenario)  -> FlowNetwork
 *
 * The engine holds configuration only; every run builds its own residual
 * arena, so one engine and one network can serve any number of runs.
 *
 * @module engine/FlowEngine
 */

import type { AlgorithmName, FlowResult, MaxFlowAlgorithm, RunBudget } from "../algorithms/AlgorithmTypes";
import { getAlgorithm } from "../algorithms";
import { describeViolation, verifyFlow } from "../analysis/FlowInvariants";
import { type EngineConfig, resolveEngineConfig } from "../config/EngineConfig";
import { extractMinCut, type MinCut } from "../cut/MinCutExtractor";
import { NumericInstabilityError } from "../errors/FlowErrors";
import { FlowNetwork } from "../network/FlowNetwork";
import { applyScenario, type Scenario } from "../scenario/Scenario";
import type { AlgorithmEvent } from "../trace/AlgorithmEvent";
import { TraceLog, type TraceRecorder } from "../trace/TraceRecorder";
import { createLogger, type Logger } from "../utils/Logger";

/**
 * Per-run options. Unset values fall back to the engine config.
 */
export interface RunOptions {
  maxIterations?: number;
  tolerance?: number;
  timeLimitMs?: number;

  /** Collect the run's events and return them as `trace` */
  trace?: boolean;

  /** External trace sink; receives events as they happen */
  recorder?: TraceRecorder;

  /** Cooperative cancellation */
  signal?: AbortSignal;
}

/**
 * A FlowResult plus, when `trace: true` was requested, its events.
 */
export interface EngineRunResult extends FlowResult {
  trace?: readonly AlgorithmEvent[];
}

/**
 * Fans events out to several recorders in order.
 */
class TeeRecorder implements TraceRecorder {
  constructor(private readonly targets: TraceRecorder[]) {}

  record(event: AlgorithmEvent): void {
    for (const target of this.targets) {
      target.record(event);
    }
  }
}

export class FlowEngine {
  readonly config: EngineConfig;
  private readonly log: Logger;

  constructor(config: Partial<EngineConfig> = {}) {
    this.config = resolveEngineConfig(config);
    this.log = createLogger("FlowEngine", this.config.logLevel);
  }

  /**
   * Runs one max-flow algorithm on a network, given by name or as an
   * instance.
   *
   * @throws NumericInstabilityError if the run's arithmetic drifts past the
   *   tolerance or the finished flow fails verification
   */
  run(network: FlowNetwork, algorithm: AlgorithmName | MaxFlowAlgorithm, options: RunOptions = {}): EngineRunResult {
    const budget = this.budgetFor(options);
    const log = options.trace ? new TraceLog() : undefined;
    const recorder = this.combineRecorders(log, options.recorder);

    const solver = typeof algorithm === "string" ? getAlgorithm(algorithm) : algorithm;
    const started = Date.now();
    const result = solver.run(network, budget, recorder);
    const elapsed = Date.now() - started;

    if (this.config.verifyResults) {
      const violations = verifyFlow(network, result, budget.tolerance);
      if (violations.length > 0) {
        throw new NumericInstabilityError(
          `${solver.name} produced an invalid flow: ${violations.map(describeViolation).join("; ")}`,
          { algorithm: solver.name, violations: violations.length }
        );
      }
    }

    const summary =
      `${solver.name} ${result.termination.toLowerCase()}: value=${result.value.toFixed(2)} ` +
      `after ${result.iterations} iterations (${elapsed}ms)`;
    if (result.termination === "CONVERGED") {
      this.log.info(summary);
    } else {
      this.log.warn(summary);
    }

    return log === undefined ? result : { ...result, trace: log.events };
  }

  /**
   * @throws IncompleteFlowError if the result did not converge
   */
  extractMinCut(network: FlowNetwork, result: FlowResult): MinCut {
    const cut = extractMinCut(network, result);
    this.log.debug(`min cut: ${cut.edges.map((e) => e.edgeId).join(", ") || "(none)"} = ${cut.capacity.toFixed(2)}`);
    return cut;
  }

  /**
   * @throws InvalidScenarioError for bad leakage values or unknown edges
   */
  applyScenario(network: FlowNetwork, scenario: Scenario): FlowNetwork {
    return applyScenario(network, scenario);
  }

  private budgetFor(options: RunOptions): RunBudget {
    return {
      maxIterations: options.maxIterations ?? this.config.maxIterations,
      tolerance: options.tolerance ?? this.config.tolerance,
      timeLimitMs: options.timeLimitMs ?? this.config.timeLimitMs,
      signal: options.signal,
    };
  }

  private combineRecorders(log: TraceLog | undefined, external: TraceRecorder | undefined): TraceRecorder | undefined {
    if (log === undefined) return external;
    if (external === undefined) return log;
    return new TeeRecorder([log, external]);
  }
}

const defaultEngine = new FlowEngine();

/** Runs on a shared engine with the default configuration. */
export function run(network: FlowNetwork, algorithm: AlgorithmName, options: RunOptions = {}): EngineRunResult {
  return defaultEngine.run(network, algorithm, options);
}
