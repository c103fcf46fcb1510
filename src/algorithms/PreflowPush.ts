/**
 * PreflowPush - Push-Relabel with FIFO Selection
 *
 * State per node: height and excess (inflow - outflow). Conservation is
 * relaxed while the algorithm runs; only excess >= 0 is kept.
 *
 * Algorithm:
 * 1. height(source) = node count, every other height 0
 * 2. Saturate every source out-edge
 * 3. While some node is active (excess > tolerance, height < node count):
 *    discharge the oldest active node (FIFO). Push along admissible arcs
 *    (open, leading exactly one height lower); when the node's arcs are
 *    exhausted, relabel it to 1 + the lowest height among open neighbours.
 * 4. Excess left at nodes that can no longer reach the sink is returned
 *    to the source along flow-carrying paths.
 *
 * Step 4 also runs when the budget stops the loop early, so the result is
 * always a conserving flow.
 */

import { NumericInstabilityError } from "../errors/FlowErrors";
import { FlowNetwork } from "../network/FlowNetwork";
import { TraceChannel, type TraceRecorder } from "../trace/TraceRecorder";
import type { AlgorithmName, FlowResult, MaxFlowAlgorithm, RunBudget, TerminationReason } from "./AlgorithmTypes";
import { BudgetGuard } from "./BudgetGuard";
import { ResidualGraph } from "./ResidualGraph";

/**
 * FIFO of active nodes over a fixed ring of `capacity` slots. Each node is
 * queued at most once at a time, so the node count is always enough.
 */
export class ActiveQueue {
  private readonly slots: number[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    this.slots = new Array<number>(capacity).fill(-1);
  }

  get length(): number {
    return this.count;
  }

  push(node: number): void {
    if (this.count === this.capacity) {
      throw new RangeError(`Active queue is full (${this.capacity} nodes)`);
    }
    this.slots[(this.head + this.count) % this.capacity] = node;
    this.count++;
  }

  /** Removes and returns the oldest node, or undefined when empty */
  shift(): number | undefined {
    if (this.count === 0) return undefined;
    const node = this.slots[this.head];
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return node;
  }
}

interface PreflowState {
  graph: ResidualGraph;
  trace: TraceChannel;
  height: number[];
  excess: number[];
  current: number[];
  queue: ActiveQueue;
  queued: boolean[];
}

export class PreflowPush implements MaxFlowAlgorithm {
  readonly name: AlgorithmName = "PREFLOW_PUSH";

  run(network: FlowNetwork, budget: RunBudget, recorder?: TraceRecorder): FlowResult {
    const graph = new ResidualGraph(network, budget.tolerance);
    const guard = new BudgetGuard(budget);
    const n = graph.nodeCount;

    const state: PreflowState = {
      graph,
      trace: new TraceChannel(recorder),
      height: new Array<number>(n).fill(0),
      excess: new Array<number>(n).fill(0),
      current: new Array<number>(n).fill(0),
      queue: new ActiveQueue(n),
      queued: new Array<boolean>(n).fill(false),
    };

    this.initialize(state);

    let iterations = 0;
    let termination: TerminationReason = "CONVERGED";

    while (state.queue.length > 0) {
      const stop = guard.check(iterations);
      if (stop !== null) {
        termination = stop;
        break;
      }

      const u = state.queue.shift();
      if (u === undefined) break;
      state.queued[u] = false;
      iterations++;
      this.discharge(state, u);
    }

    this.returnExcess(state);

    const result: FlowResult = {
      algorithm: this.name,
      value: graph.flowValue(),
      edgeFlows: graph.edgeFlows(),
      iterations,
      termination,
      tolerance: budget.tolerance,
    };

    state.trace.emit({
      kind: "terminated",
      algorithm: this.name,
      reason: termination,
      iterations,
      flowValue: result.value,
    });

    return result;
  }

  // ===========================================================================
  // PHASE 1: PREFLOW
  // ===========================================================================

  private initialize(state: PreflowState): void {
    const { graph, height, excess } = state;
    height[graph.source] = graph.nodeCount;

    for (const arc of graph.adjacency[graph.source]) {
      if (!graph.isForward(arc) || !graph.isOpen(arc)) continue;

      const v = graph.head(arc);
      const amount = graph.residual(arc);
      graph.augment(arc, amount);
      excess[graph.source] -= amount;
      excess[v] += amount;
      this.tracePush(state, arc, amount);
      this.activate(state, v);
    }
  }

  /**
   * Pushes and relabels `u` until its excess is gone or it stops being
   * active.
   */
  private discharge(state: PreflowState, u: number): void {
    const { graph, height, excess, current } = state;
    const arcs = graph.adjacency[u];
    const n = graph.nodeCount;

    while (excess[u] > graph.tolerance && height[u] < n) {
      if (current[u] >= arcs.length) {
        this.relabel(state, u);
        current[u] = 0;
        continue;
      }

      const arc = arcs[current[u]];
      const v = graph.head(arc);

      if (graph.isOpen(arc) && height[u] === height[v] + 1) {
        const amount = Math.min(excess[u], graph.residual(arc));
        graph.augment(arc, amount);
        excess[u] -= amount;
        excess[v] += amount;
        this.tracePush(state, arc, amount);
        this.activate(state, v);
      } else {
        current[u]++;
      }
    }

    if (excess[u] < -graph.tolerance) {
      throw new NumericInstabilityError(`Negative excess ${excess[u]} at ${graph.nodeId(u)}`, {
        node: graph.nodeId(u),
        excess: excess[u],
      });
    }
  }

  private relabel(state: PreflowState, u: number): void {
    const { graph, height } = state;

    let lowest = Infinity;
    for (const arc of graph.adjacency[u]) {
      if (graph.isOpen(arc)) {
        lowest = Math.min(lowest, height[graph.head(arc)]);
      }
    }

    const previous = height[u];
    // No open arc at all: park the node, its excess is returned afterwards
    height[u] = lowest === Infinity ? graph.nodeCount : lowest + 1;

    state.trace.emit({
      kind: "relabel",
      algorithm: this.name,
      node: graph.nodeId(u),
      fromHeight: previous,
      toHeight: height[u],
    });
  }

  private activate(state: PreflowState, v: number): void {
    const { graph, height, excess, queue, queued } = state;
    if (v === graph.source || v === graph.sink || queued[v]) return;
    if (excess[v] > graph.tolerance && height[v] < graph.nodeCount) {
      queued[v] = true;
      queue.push(v);
    }
  }

  private tracePush(state: PreflowState, arc: number, amount: number): void {
    if (!state.trace.active) return;
    state.trace.emit({
      kind: "push",
      algorithm: this.name,
      arc: state.graph.arcStep(arc),
      amount,
      excessTo: state.excess[state.graph.head(arc)],
    });
  }

  // ===========================================================================
  // PHASE 2: RETURN STRANDED EXCESS
  // ===========================================================================

  /**
   * Sends every remaining excess back to the source.
   *
   * Each step follows incoming flow backwards from the node to the source
   * and cancels min(excess, smallest flow on the path) along it, which
   * zeroes either the excess or one edge's flow.
   */
  private returnExcess(state: PreflowState): void {
    const { graph, excess } = state;

    for (let u = 0; u < graph.nodeCount; u++) {
      if (u === graph.source || u === graph.sink) continue;

      while (excess[u] > graph.tolerance) {
        const path = this.findPathBackToSource(graph, u);
        if (path === null) {
          throw new NumericInstabilityError(`Excess ${excess[u]} at ${graph.nodeId(u)} has no path back to the source`, {
            node: graph.nodeId(u),
            excess: excess[u],
          });
        }

        let amount = excess[u];
        for (const arc of path) {
          amount = Math.min(amount, graph.residual(arc));
        }
        for (const arc of path) {
          graph.augment(arc, amount);
        }
        excess[u] -= amount;

        if (state.trace.active) {
          state.trace.emit({
            kind: "excess-return",
            algorithm: this.name,
            node: graph.nodeId(u),
            arcs: path.map((arc) => graph.arcStep(arc)),
            amount,
          });
        }
      }
    }
  }

  /**
   * BFS from `start` over open reverse arcs (edges carrying flow into the
   * current node) until the source is reached.
   */
  private findPathBackToSource(graph: ResidualGraph, start: number): number[] | null {
    const parentArc: number[] = new Array<number>(graph.nodeCount).fill(-1);
    const seen: boolean[] = new Array<boolean>(graph.nodeCount).fill(false);
    const queue: number[] = [start];
    seen[start] = true;

    for (let i = 0; i < queue.length && !seen[graph.source]; i++) {
      const x = queue[i];
      for (const arc of graph.adjacency[x]) {
        if (graph.isForward(arc) || !graph.isOpen(arc)) continue;
        const y = graph.head(arc);
        if (seen[y]) continue;
        seen[y] = true;
        parentArc[y] = arc;
        queue.push(y);
      }
    }

    if (!seen[graph.source]) return null;

    const path: number[] = [];
    for (let y = graph.source; y !== start; y = graph.tail(parentArc[y])) {
      path.push(parentArc[y]);
    }
    return path.reverse();
  }
}
