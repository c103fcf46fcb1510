/**
 * FlowInvariants - Post-Run Checks
 *
 * Verifies the three invariants every FlowResult must satisfy:
 * - capacity: 0 <= flow <= capacity on every edge
 * - conservation: inflow == outflow at every node except source and sink
 * - value: out of source == into sink == reported value
 *
 * Sums are compared with a slack of tolerance * (edge count + 1), the most
 * rounding that per-edge clamping can accumulate.
 */

import type { FlowResult } from "../algorithms/AlgorithmTypes";
import { FlowNetwork } from "../network/FlowNetwork";

export type FlowViolation =
  | { kind: "missing-edge"; edgeId: string }
  | { kind: "capacity"; edgeId: string; flow: number; capacity: number }
  | { kind: "conservation"; node: string; inflow: number; outflow: number }
  | { kind: "value"; reported: number; sourceOutflow: number; sinkInflow: number };

/**
 * Net flow per node (inflow - outflow), by node id.
 */
export function netFlows(network: FlowNetwork, result: FlowResult): Map<string, { inflow: number; outflow: number }> {
  const totals = new Map(network.nodes.map((n) => [n.id, { inflow: 0, outflow: 0 }]));

  for (const edge of network.edges) {
    const flow = result.edgeFlows.get(edge.id) ?? 0;
    const from = totals.get(edge.from);
    const to = totals.get(edge.to);
    if (from) from.outflow += flow;
    if (to) to.inflow += flow;
  }

  return totals;
}

/**
 * @returns Every violation found; empty for a valid flow
 */
export function verifyFlow(network: FlowNetwork, result: FlowResult, tolerance = result.tolerance): FlowViolation[] {
  const violations: FlowViolation[] = [];
  const slack = tolerance * (network.edgeCount + 1);

  for (const edge of network.edges) {
    const flow = result.edgeFlows.get(edge.id);
    if (flow === undefined) {
      violations.push({ kind: "missing-edge", edgeId: edge.id });
      continue;
    }
    if (!(flow >= -tolerance && flow <= edge.capacity + tolerance)) {
      violations.push({ kind: "capacity", edgeId: edge.id, flow, capacity: edge.capacity });
    }
  }

  const totals = netFlows(network, result);
  for (const node of network.nodes) {
    if (node.role !== "INTERMEDIATE") continue;
    const { inflow, outflow } = totals.get(node.id) ?? { inflow: 0, outflow: 0 };
    if (Math.abs(inflow - outflow) > slack) {
      violations.push({ kind: "conservation", node: node.id, inflow, outflow });
    }
  }

  const source = totals.get(network.source) ?? { inflow: 0, outflow: 0 };
  const sink = totals.get(network.sink) ?? { inflow: 0, outflow: 0 };
  const sourceOutflow = source.outflow - source.inflow;
  const sinkInflow = sink.inflow - sink.outflow;

  if (Math.abs(sourceOutflow - result.value) > slack || Math.abs(sinkInflow - result.value) > slack) {
    violations.push({ kind: "value", reported: result.value, sourceOutflow, sinkInflow });
  }

  return violations;
}

export function describeViolation(violation: FlowViolation): string {
  switch (violation.kind) {
    case "missing-edge":
      return `no flow reported for edge ${violation.edgeId}`;
    case "capacity":
      return `edge ${violation.edgeId} carries ${violation.flow} outside [0, ${violation.capacity}]`;
    case "conservation":
      return `node ${violation.node} has inflow ${violation.inflow} but outflow ${violation.outflow}`;
    case "value":
      return (
        `reported value ${violation.reported} disagrees with source outflow ${violation.sourceOutflow} ` +
        `or sink inflow ${violation.sinkInflow}`
      );
  }
}
