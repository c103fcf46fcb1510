/**
 * AlgorithmEvent - Execution Trace Records
 *
 * One event per meaningful algorithm step. Events carry enough data to
 * replay the evolution of the per-edge flow: every flow change appears as
 * a `path`, `push` or `excess-return` event with its edge, direction and
 * amount.
 */

import type { AlgorithmName, TerminationReason } from "../algorithms/AlgorithmTypes";

/** Direction of travel along an edge in the residual graph */
export type ArcDirection = "forward" | "reverse";

/**
 * A residual arc used by a step. `reverse` means flow on `edgeId` was
 * cancelled (travelling from `edge.to` back to `edge.from`).
 */
export interface ArcStep {
  edgeId: string;
  from: string;
  to: string;
  direction: ArcDirection;
}

interface EventBase {
  /** Position in the run's event sequence, starting at 0 */
  seq: number;
  algorithm: AlgorithmName;
}

/** An augmenting path was found and saturated by `amount`. */
export interface PathEvent extends EventBase {
  kind: "path";
  iteration: number;
  /** Blocking-flow phase the path belongs to (BLOCKING_FLOW only) */
  phase?: number;
  nodes: string[];
  arcs: ArcStep[];
  amount: number;
  /** Total flow value after this augmentation */
  flowValue: number;
}

/** A level graph was built at the start of a blocking-flow phase. */
export interface PhaseEvent extends EventBase {
  kind: "phase";
  phase: number;
  /** BFS distance of every reached node */
  levels: Record<string, number>;
  /** Level of the sink, or -1 when the sink was not reached */
  sinkLevel: number;
}

/** Excess moved across one residual arc. */
export interface PushEvent extends EventBase {
  kind: "push";
  arc: ArcStep;
  amount: number;
  /** Excess of the receiving node after the push */
  excessTo: number;
}

/** A node's height was raised. */
export interface RelabelEvent extends EventBase {
  kind: "relabel";
  node: string;
  fromHeight: number;
  toHeight: number;
}

/**
 * Stranded excess sent back to the source along a flow-carrying path
 * (flow on every edge of `arcs` is reduced by `amount`).
 */
export interface ExcessReturnEvent extends EventBase {
  kind: "excess-return";
  node: string;
  arcs: ArcStep[];
  amount: number;
}

export interface TerminatedEvent extends EventBase {
  kind: "terminated";
  reason: TerminationReason;
  iterations: number;
  flowValue: number;
}

export type AlgorithmEvent =
  | PathEvent
  | PhaseEvent
  | PushEvent
  | RelabelEvent
  | ExcessReturnEvent
  | TerminatedEvent;

export type AlgorithmEventKind = AlgorithmEvent["kind"];

type WithoutSeq<E> = E extends unknown ? Omit<E, "seq"> : never;

/** An event as emitted by an algorithm, before it is sequenced. */
export type AlgorithmEventBody = WithoutSeq<AlgorithmEvent>;
