/**
 * AugmentingPath - Shortest Augmenting Paths (Edmonds-Karp)
 *
 * Algorithm:
 * 1. BFS from the source over open residual arcs, expanding each node's
 *    arcs in edge insertion order
 * 2. If the sink was not reached, the flow is maximal
 * 3. Check the budget, then push the path's bottleneck residual along it
 * 4. Repeat
 *
 * The flow is valid after every augmentation, so a run stopped by its
 * budget returns the flow as it stands.
 */

import { FlowNetwork } from "../network/FlowNetwork";
import { TraceChannel, type TraceRecorder } from "../trace/TraceRecorder";
import type { AlgorithmName, FlowResult, MaxFlowAlgorithm, RunBudget, TerminationReason } from "./AlgorithmTypes";
import { BudgetGuard } from "./BudgetGuard";
import { ResidualGraph } from "./ResidualGraph";

export class AugmentingPath implements MaxFlowAlgorithm {
  readonly name: AlgorithmName = "AUGMENTING_PATH";

  run(network: FlowNetwork, budget: RunBudget, recorder?: TraceRecorder): FlowResult {
    const graph = new ResidualGraph(network, budget.tolerance);
    const guard = new BudgetGuard(budget);
    const trace = new TraceChannel(recorder);

    let iterations = 0;
    let value = 0;
    let termination: TerminationReason = "CONVERGED";

    for (;;) {
      const path = this.findPath(graph);
      if (path === null) break;

      const stop = guard.check(iterations);
      if (stop !== null) {
        termination = stop;
        break;
      }

      let bottleneck = Infinity;
      for (const arc of path) {
        bottleneck = Math.min(bottleneck, graph.residual(arc));
      }

      for (const arc of path) {
        graph.augment(arc, bottleneck);
      }

      iterations++;
      value += bottleneck;

      if (trace.active) {
        trace.emit({
          kind: "path",
          algorithm: this.name,
          iteration: iterations,
          nodes: [network.source, ...path.map((arc) => graph.nodeId(graph.head(arc)))],
          arcs: path.map((arc) => graph.arcStep(arc)),
          amount: bottleneck,
          flowValue: value,
        });
      }
    }

    const result: FlowResult = {
      algorithm: this.name,
      value: graph.flowValue(),
      edgeFlows: graph.edgeFlows(),
      iterations,
      termination,
      tolerance: budget.tolerance,
    };

    trace.emit({
      kind: "terminated",
      algorithm: this.name,
      reason: termination,
      iterations,
      flowValue: result.value,
    });

    return result;
  }

  /**
   * BFS for a fewest-arcs source-to-sink path.
   *
   * @returns Arcs from source to sink, or null when the sink is unreachable
   */
  private findPath(graph: ResidualGraph): number[] | null {
    const parentArc: number[] = new Array<number>(graph.nodeCount).fill(-1);
    const seen: boolean[] = new Array<boolean>(graph.nodeCount).fill(false);
    const queue: number[] = [graph.source];
    seen[graph.source] = true;

    for (let i = 0; i < queue.length && !seen[graph.sink]; i++) {
      const u = queue[i];
      for (const arc of graph.adjacency[u]) {
        const v = graph.head(arc);
        if (seen[v] || !graph.isOpen(arc)) continue;

        seen[v] = true;
        parentArc[v] = arc;
        if (v === graph.sink) break;
        queue.push(v);
      }
    }

    if (!seen[graph.sink]) return null;

    const path: number[] = [];
    for (let v = graph.sink; v !== graph.source; v = graph.tail(parentArc[v])) {
      path.push(parentArc[v]);
    }
    return path.reverse();
  }
}
