/**
 * FlowDiagnostics - Debug View of a Run
 *
 * Numbers behind the dashboard's debug panel: how much reaches the sink,
 * where forward flow piles up, and how loaded each pipe is.
 */

import { groupBy, orderBy, sumBy } from "lodash";
import type { FlowResult } from "../algorithms/AlgorithmTypes";
import { FlowNetwork } from "../network/FlowNetwork";

/**
 * Load band used to colour a pipe:
 * - idle: no flow
 * - partial: below 50% of capacity
 * - heavy: 50% of capacity or more
 */
export type UtilizationBand = "idle" | "partial" | "heavy";

export interface EdgeUtilization {
  edgeId: string;
  from: string;
  to: string;
  flow: number;
  capacity: number;
  /** flow / capacity, 0 for zero-capacity pipes */
  ratio: number;
  band: UtilizationBand;
  saturated: boolean;
}

export interface NodeImbalance {
  node: string;
  inflow: number;
  outflow: number;
  /** outflow - inflow */
  net: number;
}

export interface FlowDiagnostics {
  sourceOutflow: number;
  sinkInflow: number;
  /** Nodes whose |outflow - inflow| exceeds the tolerance, largest net first */
  imbalances: NodeImbalance[];
  utilization: EdgeUtilization[];
  /** Edge ids per load band */
  bands: Record<UtilizationBand, string[]>;
}

export function utilizationBand(ratio: number): UtilizationBand {
  if (ratio === 0) return "idle";
  return ratio < 0.5 ? "partial" : "heavy";
}

export function diagnoseFlow(network: FlowNetwork, result: FlowResult, tolerance = result.tolerance): FlowDiagnostics {
  const flowOf = (edgeId: string): number => Math.max(0, result.edgeFlows.get(edgeId) ?? 0);

  const utilization: EdgeUtilization[] = network.edges.map((edge) => {
    const flow = flowOf(edge.id);
    const ratio = edge.capacity > 0 ? flow / edge.capacity : 0;
    return {
      edgeId: edge.id,
      from: edge.from,
      to: edge.to,
      flow,
      capacity: edge.capacity,
      ratio,
      band: utilizationBand(ratio),
      saturated: edge.capacity > 0 && flow >= edge.capacity - tolerance,
    };
  });

  const imbalances = orderBy(
    network.nodes
      .map((node) => {
        const inflow = sumBy(network.inEdges(node.id), (e) => flowOf(e.id));
        const outflow = sumBy(network.outEdges(node.id), (e) => flowOf(e.id));
        return { node: node.id, inflow, outflow, net: outflow - inflow };
      })
      .filter((row) => Math.abs(row.net) > tolerance),
    [(row) => row.net],
    ["desc"]
  );

  const grouped = groupBy(utilization, (u) => u.band);
  const idsOf = (band: UtilizationBand): string[] => (grouped[band] ?? []).map((u) => u.edgeId);

  return {
    sourceOutflow: sumBy(network.outEdges(network.source), (e) => flowOf(e.id)),
    sinkInflow: sumBy(network.inEdges(network.sink), (e) => flowOf(e.id)),
    imbalances,
    utilization,
    bands: {
      idle: idsOf("idle"),
      partial: idsOf("partial"),
      heavy: idsOf("heavy"),
    },
  };
}
