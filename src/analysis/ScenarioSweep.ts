/**
 * ScenarioSweep - Degradation Studies
 *
 * Batches of independent runs over one base network: a leakage sweep
 * (same algorithm, rising leakage) and an algorithm comparison (same
 * network, every algorithm). Each run owns its residual state; the base
 * network is shared read-only.
 */

import { maxBy, minBy } from "lodash";
import { ALGORITHM_NAMES, type AlgorithmName, type TerminationReason } from "../algorithms/AlgorithmTypes";
import { FlowEngine, type RunOptions } from "../engine/FlowEngine";
import { FlowNetwork } from "../network/FlowNetwork";
import { applyScenario, type Scenario } from "../scenario/Scenario";

export interface SweepPoint {
  leakage: number;
  value: number;
  /** value / value of the unperturbed base; 0 when the base carries no flow */
  retained: number;
  termination: TerminationReason;
}

export interface AlgorithmRun {
  algorithm: AlgorithmName;
  value: number;
  iterations: number;
  termination: TerminationReason;
}

export interface AlgorithmComparison {
  runs: AlgorithmRun[];
  /** True when every converged run reports the same value within tolerance */
  agree: boolean;
  /** Largest difference between converged values */
  spread: number;
}

/**
 * Runs `algorithm` once per leakage fraction, applied uniformly on top of
 * an optional base scenario (its failures and per-edge overrides kept).
 */
export function sweepLeakage(
  engine: FlowEngine,
  base: FlowNetwork,
  algorithm: AlgorithmName,
  fractions: readonly number[],
  options: RunOptions = {},
  scenario: Scenario = {}
): SweepPoint[] {
  const reference = engine.run(base, algorithm, options).value;

  return fractions.map((leakage) => {
    const network = applyScenario(base, { ...scenario, defaultLeakage: leakage });
    const result = engine.run(network, algorithm, options);
    return {
      leakage,
      value: result.value,
      retained: reference > 0 ? result.value / reference : 0,
      termination: result.termination,
    };
  });
}

export function compareAlgorithms(
  engine: FlowEngine,
  network: FlowNetwork,
  options: RunOptions = {},
  algorithms: readonly AlgorithmName[] = ALGORITHM_NAMES
): AlgorithmComparison {
  const runs: AlgorithmRun[] = algorithms.map((algorithm) => {
    const result = engine.run(network, algorithm, options);
    return {
      algorithm,
      value: result.value,
      iterations: result.iterations,
      termination: result.termination,
    };
  });

  const converged = runs.filter((r) => r.termination === "CONVERGED");
  const highest = maxBy(converged, (r) => r.value)?.value ?? 0;
  const lowest = minBy(converged, (r) => r.value)?.value ?? 0;
  const spread = highest - lowest;
  const tolerance = (options.tolerance ?? engine.config.tolerance) * (network.edgeCount + 1);

  return { runs, agree: spread <= tolerance, spread };
}
