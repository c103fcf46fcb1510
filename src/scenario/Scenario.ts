/**
 * @fileoverview Scenario perturbation of a base network.
 *
 * A scenario models two kinds of degradation:
 * - Leakage: a pipe loses a fraction of its usable capacity
 * - Failure: a pipe is severed or shut off (capacity forced to 0)
 *
 * Applying a scenario never touches the base network. The derived network
 * keeps every edge, id and insertion index; a failed pipe stays in the
 * topology with zero capacity so the min cut can still name it.
 *
 * @module scenario/Scenario
 */

import { InvalidScenarioError } from "../errors/FlowErrors";
import { FlowNetwork } from "../network/FlowNetwork";
import { createEdgeId } from "../network/NetworkTypes";

/**
 * Scenario description accepted at the engine boundary.
 */
export interface Scenario {
  /** Leakage fraction in [0, 1) applied to every edge without an override */
  defaultLeakage?: number;

  /** Per-edge leakage overrides, keyed by edge id */
  leakage?: Readonly<Record<string, number>>;

  /** Edge ids of failed pipes */
  failedEdges?: readonly string[];
}

export const NEUTRAL_SCENARIO: Scenario = Object.freeze({});

function assertLeakage(value: number, edgeId?: string): void {
  if (!Number.isFinite(value) || value < 0 || value >= 1) {
    const target = edgeId === undefined ? "default leakage" : `leakage on ${edgeId}`;
    throw new InvalidScenarioError(`${target} must be in [0, 1), got ${value}`, {
      edge: edgeId,
      leakage: value,
    });
  }
}

/**
 * Derives the perturbed network for a scenario.
 *
 * Capacity per edge:
 *   failed        -> 0
 *   leakage f     -> capacity * (1 - f)
 *   unperturbed   -> capacity (unchanged, bit for bit)
 *
 * @throws InvalidScenarioError for out-of-range leakage or unknown edge ids
 */
export function applyScenario(base: FlowNetwork, scenario: Scenario): FlowNetwork {
  const defaultLeakage = scenario.defaultLeakage ?? 0;
  assertLeakage(defaultLeakage);

  const overrides = scenario.leakage ?? {};
  for (const [edgeId, value] of Object.entries(overrides)) {
    if (!base.hasEdge(edgeId)) {
      throw new InvalidScenarioError(`Leakage override references unknown edge "${edgeId}"`, { edge: edgeId });
    }
    assertLeakage(value, edgeId);
  }

  const failed = new Set<string>();
  for (const edgeId of scenario.failedEdges ?? []) {
    if (!base.hasEdge(edgeId)) {
      throw new InvalidScenarioError(`Failed edge "${edgeId}" does not exist`, { edge: edgeId });
    }
    failed.add(edgeId);
  }

  const capacities = base.edges.map((edge) => {
    if (failed.has(edge.id)) return 0;
    const leak = overrides[edge.id] ?? defaultLeakage;
    return leak === 0 ? edge.capacity : edge.capacity * (1 - leak);
  });

  return base.withCapacities(capacities);
}

/**
 * Converts the dashboard's leakage slider (percent) into a fraction.
 */
export function leakageFromPercent(percent: number): number {
  if (!Number.isFinite(percent) || percent < 0 || percent >= 100) {
    throw new InvalidScenarioError(`Leakage percent must be in [0, 100), got ${percent}`, { percent });
  }
  return percent / 100;
}

/**
 * Parses a pipe-failure specifier of the form "u,v" into an edge id.
 */
export function parsePipeSpecifier(pipe: string): string {
  const parts = pipe.split(",").map((p) => p.trim());
  if (parts.length !== 2 || parts[0] === "" || parts[1] === "") {
    throw new InvalidScenarioError(`Pipe specifier must look like "u,v", got "${pipe}"`, { pipe });
  }
  return createEdgeId(parts[0], parts[1]);
}

/**
 * Fluent builder for scenarios against one base network.
 *
 * @example
 * const degraded = new ScenarioBuilder(network)
 *   .withUniformLeakage(0.1)
 *   .failEdge("A->T")
 *   .apply();
 */
export class ScenarioBuilder {
  private readonly base: FlowNetwork;
  private defaultLeakage = 0;
  private readonly leakage: Record<string, number> = {};
  private readonly failed: string[] = [];

  constructor(base: FlowNetwork) {
    this.base = base;
  }

  /**
   * Static form of {@link applyScenario}.
   */
  static apply(base: FlowNetwork, scenario: Scenario): FlowNetwork {
    return applyScenario(base, scenario);
  }

  withUniformLeakage(fraction: number): this {
    assertLeakage(fraction);
    this.defaultLeakage = fraction;
    return this;
  }

  withLeakage(edgeId: string, fraction: number): this {
    assertLeakage(fraction, edgeId);
    this.leakage[edgeId] = fraction;
    return this;
  }

  failEdge(edgeId: string): this {
    if (!this.failed.includes(edgeId)) {
      this.failed.push(edgeId);
    }
    return this;
  }

  failEdges(edgeIds: Iterable<string>): this {
    for (const id of edgeIds) {
      this.failEdge(id);
    }
    return this;
  }

  build(): Scenario {
    return {
      defaultLeakage: this.defaultLeakage,
      leakage: { ...this.leakage },
      failedEdges: [...this.failed],
    };
  }

  apply(): FlowNetwork {
    return applyScenario(this.base, this.build());
  }
}
