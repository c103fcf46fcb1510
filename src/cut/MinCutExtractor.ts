/**
 * @fileoverview Minimum cut from a converged max-flow run.
 *
 * The residual state is rebuilt from the result's per-edge flows, so the
 * dashboard only ever hands back a FlowResult, never algorithm internals.
 *
 * S = nodes reachable from the source over arcs with residual > tolerance
 * T = every other node
 *
 * Cut edges are the S -> T edges whose original capacity is positive. Their
 * current capacities sum to the flow value. A pipe failed by a scenario
 * still appears (with capacity 0) when it crosses the cut; when source and
 * sink are disconnected this leaves only such zero-capacity edges, possibly
 * none, and a capacity sum of 0.
 *
 * @module cut/MinCutExtractor
 */

import { sumBy } from "lodash";
import type { FlowResult } from "../algorithms/AlgorithmTypes";
import { ResidualGraph } from "../algorithms/ResidualGraph";
import { IncompleteFlowError } from "../errors/FlowErrors";
import { FlowNetwork } from "../network/FlowNetwork";
import type { NetworkEdge } from "../network/NetworkTypes";

export interface CutEdge {
  edgeId: string;
  from: string;
  to: string;
  /** Capacity in the network the flow ran on */
  capacity: number;
  /** Capacity before any scenario */
  originalCapacity: number;
  /** True when a scenario forced the capacity to 0 */
  failed: boolean;
}

export interface MinCut {
  /** Source side, in node order */
  sourceSide: string[];
  /** Sink side, in node order */
  sinkSide: string[];
  /** Crossing edges S -> T in edge insertion order */
  edges: CutEdge[];
  /** Sum of current capacities of the crossing edges */
  capacity: number;
}

function toCutEdge(edge: NetworkEdge): CutEdge {
  return {
    edgeId: edge.id,
    from: edge.from,
    to: edge.to,
    capacity: edge.capacity,
    originalCapacity: edge.originalCapacity,
    failed: edge.capacity === 0,
  };
}

/**
 * Derives the minimum cut certified by a converged run.
 *
 * @param tolerance - Residual values at or below this count as saturated;
 *   defaults to the tolerance the run used
 * @throws IncompleteFlowError if the run did not converge
 */
export function extractMinCut(network: FlowNetwork, result: FlowResult, tolerance = result.tolerance): MinCut {
  if (result.termination !== "CONVERGED") {
    throw new IncompleteFlowError(`No min cut for a ${result.algorithm} run that ended with ${result.termination}`, {
      algorithm: result.algorithm,
      termination: result.termination,
    });
  }

  const graph = new ResidualGraph(network, tolerance, result.edgeFlows);
  const reachable = graph.reachableFromSource();

  if (reachable[graph.sink]) {
    throw new IncompleteFlowError("Sink is still reachable in the residual graph; the flow is not maximal", {
      algorithm: result.algorithm,
    });
  }

  const sourceSide = network.nodes.filter((n) => reachable[n.index]).map((n) => n.id);
  const sinkSide = network.nodes.filter((n) => !reachable[n.index]).map((n) => n.id);

  const edges = network.edges
    .filter((e) => e.originalCapacity > 0)
    .filter((e) => reachable[network.indexOf(e.from)] && !reachable[network.indexOf(e.to)])
    .map(toCutEdge);

  return {
    sourceSide,
    sinkSide,
    edges,
    capacity: sumBy(edges, (e) => e.capacity),
  };
}
