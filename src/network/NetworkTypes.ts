/**
 * NetworkTypes - Water Network Data Model
 *
 * Plain data shapes shared by the network, the algorithms and the
 * external dashboard layer. Nodes are junctions/reservoirs, edges are
 * pipes with a capacity in MLD (megalitres per day).
 */

// =============================================================================
// NODES
// =============================================================================

export type NodeRole = "SOURCE" | "SINK" | "INTERMEDIATE";

/**
 * A junction, reservoir or delivery point in the grid.
 */
export interface NetworkNode {
  /** Unique node identifier */
  readonly id: string;

  /** Role in the network (exactly one SOURCE and one SINK) */
  readonly role: NodeRole;

  /** Stable index assigned at construction, used by residual arenas */
  readonly index: number;
}

// =============================================================================
// EDGES
// =============================================================================

/**
 * A directed pipe segment.
 */
export interface NetworkEdge {
  /** Edge identity, "<from>-><to>" unless the description names it */
  readonly id: string;

  /** Insertion index; drives every tie-break in the engine */
  readonly index: number;

  readonly from: string;
  readonly to: string;

  /** Usable capacity after any scenario has been applied */
  readonly capacity: number;

  /**
   * Capacity before any scenario was applied. Equal to `capacity` on a
   * network built from a description.
   */
  readonly originalCapacity: number;
}

// =============================================================================
// DESCRIPTIONS (boundary shapes)
// =============================================================================

export interface NodeDescription {
  id: string;
  role?: NodeRole;
}

export interface EdgeDescription {
  id?: string;
  from: string;
  to: string;
  capacity: number;
}

/**
 * The only network shape the dashboard layer is allowed to construct.
 */
export interface NetworkDescription {
  nodes: NodeDescription[];
  edges: EdgeDescription[];
  source: string;
  sink: string;
}

/**
 * How duplicate (from, to) pairs are handled at construction.
 * - reject: throw InvalidNetworkError
 * - merge: sum capacities into the first edge of the pair
 */
export type ParallelEdgePolicy = "reject" | "merge";

export interface NetworkOptions {
  parallelEdges: ParallelEdgePolicy;
}

export const DEFAULT_NETWORK_OPTIONS: NetworkOptions = {
  parallelEdges: "reject",
};

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Create the default edge id for a pipe.
 */
export function createEdgeId(from: string, to: string): string {
  return `${from}->${to}`;
}
