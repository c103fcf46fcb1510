/**
 * @fileoverview Error types raised by the flow engine.
 *
 * Every engine error carries a `kind` so callers (the dashboard, the CLI)
 * can branch without instanceof chains. Budget exhaustion is not an error:
 * it is reported through `FlowResult.termination`.
 *
 * @module errors/FlowErrors
 */

export type FlowErrorKind =
  | "InvalidNetwork"
  | "InvalidScenario"
  | "NumericInstability"
  | "IncompleteFlow"
  | "InvalidConfig";

/**
 * Base class for all engine errors.
 */
export class FlowError extends Error {
  readonly kind: FlowErrorKind;

  /** Extra context (ids, values) attached for diagnostics */
  readonly details: Readonly<Record<string, unknown>>;

  constructor(kind: FlowErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = `${kind}Error`;
    this.kind = kind;
    this.details = details;
  }
}

/** Structural problem found while constructing a FlowNetwork. */
export class InvalidNetworkError extends FlowError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("InvalidNetwork", message, details);
  }
}

/** Leakage or failure settings that cannot be applied to the base network. */
export class InvalidScenarioError extends FlowError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("InvalidScenario", message, details);
  }
}

/**
 * A residual capacity, flow or excess drifted past the tolerance in a
 * direction the invariants forbid. The run that raised it is abandoned.
 */
export class NumericInstabilityError extends FlowError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("NumericInstability", message, details);
  }
}

/** A min cut was requested for a run that did not converge. */
export class IncompleteFlowError extends FlowError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("IncompleteFlow", message, details);
  }
}

export class InvalidConfigError extends FlowError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("InvalidConfig", message, details);
  }
}

export function isFlowError(value: unknown): value is FlowError {
  return value instanceof FlowError;
}
