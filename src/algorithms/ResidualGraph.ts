/**
 * @fileoverview Per-run residual arena.
 *
 * Every edge i of the network owns two residual arcs:
 *   arc 2i     forward  (from -> to), residual = capacity - flow
 *   arc 2i + 1 reverse  (to -> from), residual = flow
 *
 * Flow is stored once per edge, so 0 <= flow <= capacity is enforced in
 * one place. Each node's adjacency lists its arcs in edge insertion order,
 * which is the tie-break order of every algorithm.
 *
 * @module algorithms/ResidualGraph
 */

import { NumericInstabilityError } from "../errors/FlowErrors";
import { FlowNetwork } from "../network/FlowNetwork";
import type { ArcStep } from "../trace/AlgorithmEvent";

export class ResidualGraph {
  readonly network: FlowNetwork;
  readonly tolerance: number;
  readonly nodeCount: number;
  readonly source: number;
  readonly sink: number;

  /** Outgoing residual arcs per node index */
  readonly adjacency: readonly number[][];

  private readonly capacity: number[];
  private readonly flow: number[];
  private readonly arcHead: number[];

  constructor(network: FlowNetwork, tolerance: number, initialFlows?: ReadonlyMap<string, number>) {
    this.network = network;
    this.tolerance = tolerance;
    this.nodeCount = network.nodeCount;
    this.source = network.indexOf(network.source);
    this.sink = network.indexOf(network.sink);

    const adjacency: number[][] = network.nodes.map(() => []);
    this.capacity = [];
    this.flow = [];
    this.arcHead = [];

    for (const edge of network.edges) {
      const from = network.indexOf(edge.from);
      const to = network.indexOf(edge.to);

      this.capacity.push(edge.capacity);
      this.flow.push(initialFlows?.get(edge.id) ?? 0);
      this.arcHead.push(to, from);

      adjacency[from].push(2 * edge.index);
      adjacency[to].push(2 * edge.index + 1);
    }

    this.adjacency = adjacency;
  }

  // ===========================================================================
  // ARCS
  // ===========================================================================

  head(arc: number): number {
    return this.arcHead[arc];
  }

  tail(arc: number): number {
    return this.arcHead[arc ^ 1];
  }

  isForward(arc: number): boolean {
    return (arc & 1) === 0;
  }

  residual(arc: number): number {
    const edge = arc >> 1;
    return this.isForward(arc) ? this.capacity[edge] - this.flow[edge] : this.flow[edge];
  }

  /** True when the arc can carry more than `tolerance` */
  isOpen(arc: number): boolean {
    return this.residual(arc) > this.tolerance;
  }

  /**
   * Sends `amount` along a residual arc.
   *
   * Values that overshoot the edge bounds by at most `tolerance` are
   * clamped; anything further out aborts the run.
   */
  augment(arc: number, amount: number): void {
    const edge = arc >> 1;
    const cap = this.capacity[edge];
    let next = this.isForward(arc) ? this.flow[edge] + amount : this.flow[edge] - amount;

    if (next < -this.tolerance || next > cap + this.tolerance || Number.isNaN(next)) {
      throw new NumericInstabilityError(`Flow on ${this.network.edges[edge].id} left [0, ${cap}]: ${next}`, {
        edge: this.network.edges[edge].id,
        flow: next,
        capacity: cap,
      });
    }

    if (next < 0) next = 0;
    if (next > cap) next = cap;
    this.flow[edge] = next;
  }

  /** Flow currently assigned to an edge index */
  edgeFlow(edge: number): number {
    return this.flow[edge];
  }

  arcStep(arc: number): ArcStep {
    const edge = this.network.edges[arc >> 1];
    const forward = this.isForward(arc);
    return {
      edgeId: edge.id,
      from: forward ? edge.from : edge.to,
      to: forward ? edge.to : edge.from,
      direction: forward ? "forward" : "reverse",
    };
  }

  nodeId(index: number): string {
    return this.network.nodes[index].id;
  }

  // ===========================================================================
  // AGGREGATES
  // ===========================================================================

  /**
   * Net flow out of the source.
   */
  flowValue(): number {
    let value = 0;
    for (const arc of this.adjacency[this.source]) {
      value += this.isForward(arc) ? this.flow[arc >> 1] : -this.flow[arc >> 1];
    }
    return value;
  }

  edgeFlows(): Map<string, number> {
    return new Map(this.network.edges.map((e) => [e.id, this.flow[e.index]]));
  }

  /**
   * Nodes reachable from the source over open arcs.
   */
  reachableFromSource(): boolean[] {
    const seen: boolean[] = new Array<boolean>(this.nodeCount).fill(false);
    const queue: number[] = [this.source];
    seen[this.source] = true;

    for (let i = 0; i < queue.length; i++) {
      const u = queue[i];
      for (const arc of this.adjacency[u]) {
        const v = this.arcHead[arc];
        if (!seen[v] && this.isOpen(arc)) {
          seen[v] = true;
          queue.push(v);
        }
      }
    }

    return seen;
  }
}
