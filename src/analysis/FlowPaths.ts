/**
 * FlowPaths - Path Decomposition
 *
 * Splits a flow into source-to-sink paths for the "Flow Paths" table.
 *
 * Algorithm:
 * 1. Walk from the source, always taking the first out-edge (insertion
 *    order) that still has flow left
 * 2. Reaching the sink: record the path with its bottleneck and subtract it
 * 3. Revisiting a node: a flow cycle; subtract its bottleneck, record nothing
 * 4. Stop when the source has no flow left
 *
 * Every step zeroes at least one edge, so the loop ends after at most
 * one step per edge.
 */

import type { FlowResult } from "../algorithms/AlgorithmTypes";
import { FlowNetwork } from "../network/FlowNetwork";
import type { NetworkEdge } from "../network/NetworkTypes";

export interface FlowPath {
  nodes: string[];
  edgeIds: string[];
  amount: number;
}

function subtractBottleneck(edges: NetworkEdge[], remaining: number[]): number {
  let amount = Infinity;
  for (const edge of edges) {
    amount = Math.min(amount, remaining[edge.index]);
  }
  for (const edge of edges) {
    remaining[edge.index] = remaining[edge.index] === amount ? 0 : remaining[edge.index] - amount;
  }
  return amount;
}

export function decomposeFlow(network: FlowNetwork, result: FlowResult, tolerance = result.tolerance): FlowPath[] {
  const remaining = network.edges.map((e) => result.edgeFlows.get(e.id) ?? 0);
  const paths: FlowPath[] = [];

  for (;;) {
    const nodes: string[] = [network.source];
    const edges: NetworkEdge[] = [];
    const position = new Map<string, number>([[network.source, 0]]);
    let node = network.source;
    let cycle = false;

    while (node !== network.sink) {
      const next = network.outEdges(node).find((e) => remaining[e.index] > tolerance);
      if (next === undefined) break;

      edges.push(next);
      const seenAt = position.get(next.to);
      if (seenAt !== undefined) {
        subtractBottleneck(edges.slice(seenAt), remaining);
        cycle = true;
        break;
      }

      nodes.push(next.to);
      position.set(next.to, nodes.length - 1);
      node = next.to;
    }

    if (cycle) continue;

    if (node !== network.sink) {
      const last = edges[edges.length - 1];
      if (last === undefined) break;
      // Residue below tolerance strands the walk; drop it
      remaining[last.index] = 0;
      continue;
    }

    const amount = subtractBottleneck(edges, remaining);
    paths.push({ nodes, edgeIds: edges.map((e) => e.id), amount });
  }

  return paths;
}
