/**
 * @fileoverview Trace side channel for algorithm runs.
 *
 * Algorithms talk to a {@link TraceChannel}, which stamps sequence numbers
 * and forwards to the injected recorder. With no recorder the channel is
 * inactive and algorithms skip building event payloads; either way the
 * run's numbers are unaffected.
 *
 * @module trace/TraceRecorder
 */

import type { AlgorithmEvent, AlgorithmEventBody, AlgorithmEventKind } from "./AlgorithmEvent";

/**
 * Sink for algorithm events. Receives events in run order, one at a time.
 */
export interface TraceRecorder {
  record(event: AlgorithmEvent): void;
}

/** Recorder that discards everything. */
export const NOOP_RECORDER: TraceRecorder = Object.freeze({
  record(): void {
    // discard
  },
});

/**
 * In-memory recorder that keeps events in arrival order.
 */
export class TraceLog implements TraceRecorder {
  private readonly entries: AlgorithmEvent[] = [];

  record(event: AlgorithmEvent): void {
    this.entries.push(event);
  }

  get events(): readonly AlgorithmEvent[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Events of one kind, narrowed to that kind's shape.
   */
  ofKind<K extends AlgorithmEventKind>(kind: K): Extract<AlgorithmEvent, { kind: K }>[] {
    return this.entries.filter((e): e is Extract<AlgorithmEvent, { kind: K }> => e.kind === kind);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * Per-run wrapper around a recorder.
 */
export class TraceChannel {
  private readonly recorder: TraceRecorder | undefined;
  private seq = 0;

  constructor(recorder?: TraceRecorder) {
    this.recorder = recorder;
  }

  /** False when nobody listens; algorithms use it to skip payload work */
  get active(): boolean {
    return this.recorder !== undefined;
  }

  emit(body: AlgorithmEventBody): void {
    if (this.recorder === undefined) return;
    this.recorder.record({ ...body, seq: this.seq++ });
  }
}
