/**
 * BlockingFlow - Level Graph Phases (Dinic)
 *
 * Each phase:
 * 1. Layering: BFS from the source assigns every reachable node its
 *    distance (level). If the sink has no level, the flow is maximal.
 * 2. Blocking flow: DFS along arcs from level L to level L+1 only. Each
 *    node keeps a current-arc pointer that only moves forward, so an arc
 *    found saturated or leading to a dead end is never looked at again
 *    within the phase.
 *
 * The DFS is iterative; long pipelines do not grow the call stack.
 */

import { FlowNetwork } from "../network/FlowNetwork";
import { TraceChannel, type TraceRecorder } from "../trace/TraceRecorder";
import type { AlgorithmName, FlowResult, MaxFlowAlgorithm, RunBudget, TerminationReason } from "./AlgorithmTypes";
import { BudgetGuard } from "./BudgetGuard";
import { ResidualGraph } from "./ResidualGraph";

export class BlockingFlow implements MaxFlowAlgorithm {
  readonly name: AlgorithmName = "BLOCKING_FLOW";

  run(network: FlowNetwork, budget: RunBudget, recorder?: TraceRecorder): FlowResult {
    const graph = new ResidualGraph(network, budget.tolerance);
    const guard = new BudgetGuard(budget);
    const trace = new TraceChannel(recorder);

    let phases = 0;
    let augmentations = 0;
    let value = 0;
    let termination: TerminationReason = "CONVERGED";

    phaseLoop: for (;;) {
      const level = this.buildLevels(graph);
      if (level[graph.sink] < 0) break;

      const stop = guard.check(phases);
      if (stop !== null) {
        termination = stop;
        break;
      }

      phases++;
      if (trace.active) {
        const levels: Record<string, number> = {};
        level.forEach((l, index) => {
          if (l >= 0) levels[graph.nodeId(index)] = l;
        });
        trace.emit({
          kind: "phase",
          algorithm: this.name,
          phase: phases,
          levels,
          sinkLevel: level[graph.sink],
        });
      }

      const current: number[] = new Array<number>(graph.nodeCount).fill(0);

      for (;;) {
        const interrupted = guard.interrupted();
        if (interrupted !== null) {
          termination = interrupted;
          break phaseLoop;
        }

        const path = this.findLevelPath(graph, level, current);
        if (path === null) break;

        let bottleneck = Infinity;
        for (const arc of path) {
          bottleneck = Math.min(bottleneck, graph.residual(arc));
        }
        for (const arc of path) {
          graph.augment(arc, bottleneck);
        }

        augmentations++;
        value += bottleneck;

        if (trace.active) {
          trace.emit({
            kind: "path",
            algorithm: this.name,
            iteration: augmentations,
            phase: phases,
            nodes: [network.source, ...path.map((arc) => graph.nodeId(graph.head(arc)))],
            arcs: path.map((arc) => graph.arcStep(arc)),
            amount: bottleneck,
            flowValue: value,
          });
        }
      }
    }

    const result: FlowResult = {
      algorithm: this.name,
      value: graph.flowValue(),
      edgeFlows: graph.edgeFlows(),
      iterations: phases,
      termination,
      tolerance: budget.tolerance,
    };

    trace.emit({
      kind: "terminated",
      algorithm: this.name,
      reason: termination,
      iterations: phases,
      flowValue: result.value,
    });

    return result;
  }

  /**
   * BFS distances from the source over open arcs; -1 for unreached nodes.
   */
  private buildLevels(graph: ResidualGraph): number[] {
    const level: number[] = new Array<number>(graph.nodeCount).fill(-1);
    const queue: number[] = [graph.source];
    level[graph.source] = 0;

    for (let i = 0; i < queue.length; i++) {
      const u = queue[i];
      for (const arc of graph.adjacency[u]) {
        const v = graph.head(arc);
        if (level[v] < 0 && graph.isOpen(arc)) {
          level[v] = level[u] + 1;
          queue.push(v);
        }
      }
    }

    return level;
  }

  /**
   * Walks from the source to the sink along level-increasing open arcs,
   * resuming every node at its current-arc pointer.
   *
   * Dead-end nodes get level -1 so no later walk in this phase enters them.
   *
   * @returns Arcs of the path, or null once the phase's flow is blocking
   */
  private findLevelPath(graph: ResidualGraph, level: number[], current: number[]): number[] | null {
    const stack: number[] = [];
    let u = graph.source;

    while (u !== graph.sink) {
      const arcs = graph.adjacency[u];
      let advanced = false;

      while (current[u] < arcs.length) {
        const arc = arcs[current[u]];
        const v = graph.head(arc);
        if (level[v] === level[u] + 1 && graph.isOpen(arc)) {
          stack.push(arc);
          u = v;
          advanced = true;
          break;
        }
        current[u]++;
      }

      if (!advanced) {
        level[u] = -1;
        const arc = stack.pop();
        if (arc === undefined) return null;
        u = graph.tail(arc);
        current[u]++;
      }
    }

    return stack;
  }
}
