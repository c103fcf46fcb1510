/**
 * @fileoverview Immutable capacitated network of a water distribution grid.
 *
 * The network is validated once, at construction. Algorithms never see an
 * invalid network, and never mutate one: each run keeps its own residual
 * arena indexed by the stable node/edge indices assigned here, so several
 * runs can share a network.
 *
 * @module network/FlowNetwork
 */

import { InvalidNetworkError } from "../errors/FlowErrors";
import {
  type NetworkNode,
  type NetworkEdge,
  type NodeRole,
  type NetworkDescription,
  type EdgeDescription,
  type NetworkOptions,
  DEFAULT_NETWORK_OPTIONS,
  createEdgeId,
} from "./NetworkTypes";

/**
 * FlowNetwork is a directed graph with one source and one sink.
 *
 * Edges keep their insertion order; `edges[i].index === i` always holds.
 */
export class FlowNetwork {
  readonly source: string;
  readonly sink: string;
  readonly nodes: readonly NetworkNode[];
  readonly edges: readonly NetworkEdge[];

  private readonly nodesById: Map<string, NetworkNode>;
  private readonly edgesById: Map<string, NetworkEdge>;
  private readonly outgoing: Map<string, NetworkEdge[]>;
  private readonly incoming: Map<string, NetworkEdge[]>;

  /**
   * Builds and validates a network.
   *
   * @param description - Nodes, edges, source and sink
   * @param options - Construction options (parallel edge policy)
   * @param originalCapacities - Pre-scenario capacities by edge index; only
   *   passed when deriving a network from another one
   * @throws InvalidNetworkError on any structural problem
   */
  constructor(
    description: NetworkDescription,
    options: Partial<NetworkOptions> = {},
    originalCapacities?: readonly number[]
  ) {
    const config: NetworkOptions = { ...DEFAULT_NETWORK_OPTIONS, ...options };
    const { source, sink } = description;

    if (source === sink) {
      throw new InvalidNetworkError(`Source and sink must differ (both are "${source}")`, { source, sink });
    }

    this.source = source;
    this.sink = sink;
    this.nodes = Object.freeze(this.buildNodes(description));
    this.nodesById = new Map(this.nodes.map((n) => [n.id, n]));

    if (!this.nodesById.has(source)) {
      throw new InvalidNetworkError(`Source "${source}" is not a node of the network`, { source });
    }
    if (!this.nodesById.has(sink)) {
      throw new InvalidNetworkError(`Sink "${sink}" is not a node of the network`, { sink });
    }

    this.edges = Object.freeze(this.buildEdges(description.edges, config, originalCapacities));
    this.edgesById = new Map(this.edges.map((e) => [e.id, e]));

    this.outgoing = new Map(this.nodes.map((n) => [n.id, []]));
    this.incoming = new Map(this.nodes.map((n) => [n.id, []]));
    for (const edge of this.edges) {
      this.outgoing.get(edge.from)?.push(edge);
      this.incoming.get(edge.to)?.push(edge);
    }
  }

  /**
   * Builds a network from a bare edge list, inferring the node set in order
   * of first appearance.
   */
  static fromEdges(
    edges: EdgeDescription[],
    source: string,
    sink: string,
    options: Partial<NetworkOptions> = {}
  ): FlowNetwork {
    const ids: string[] = [];
    const seen = new Set<string>();
    const visit = (id: string): void => {
      if (!seen.has(id)) {
        seen.add(id);
        ids.push(id);
      }
    };

    visit(source);
    for (const edge of edges) {
      visit(edge.from);
      visit(edge.to);
    }
    visit(sink);

    return new FlowNetwork({ nodes: ids.map((id) => ({ id })), edges, source, sink }, options);
  }

  // ===========================================================================
  // CONSTRUCTION
  // ===========================================================================

  private buildNodes(description: NetworkDescription): NetworkNode[] {
    const nodes: NetworkNode[] = [];
    const seen = new Set<string>();

    for (const node of description.nodes) {
      if (node.id.length === 0) {
        throw new InvalidNetworkError("Node ids must be non-empty");
      }
      if (seen.has(node.id)) {
        throw new InvalidNetworkError(`Duplicate node "${node.id}"`, { node: node.id });
      }
      seen.add(node.id);

      const role = this.resolveRole(node.id, node.role);
      nodes.push(Object.freeze({ id: node.id, role, index: nodes.length }));
    }

    return nodes;
  }

  /**
   * Roles are optional in descriptions; when given they must agree with
   * the designated source and sink.
   */
  private resolveRole(id: string, declared: NodeRole | undefined): NodeRole {
    const expected: NodeRole = id === this.source ? "SOURCE" : id === this.sink ? "SINK" : "INTERMEDIATE";

    if (declared !== undefined && declared !== expected) {
      if (declared === "SOURCE") {
        throw new InvalidNetworkError(`Duplicate source: "${id}" is tagged SOURCE but the source is "${this.source}"`, {
          node: id,
        });
      }
      if (declared === "SINK") {
        throw new InvalidNetworkError(`Duplicate sink: "${id}" is tagged SINK but the sink is "${this.sink}"`, {
          node: id,
        });
      }
      throw new InvalidNetworkError(`Node "${id}" is tagged ${declared} but is the designated ${expected}`, {
        node: id,
      });
    }

    return expected;
  }

  private buildEdges(
    descriptions: EdgeDescription[],
    config: NetworkOptions,
    originalCapacities: readonly number[] | undefined
  ): NetworkEdge[] {
    if (originalCapacities !== undefined && originalCapacities.length !== descriptions.length) {
      throw new InvalidNetworkError("Original capacities do not match the edge list", {
        edges: descriptions.length,
        originalCapacities: originalCapacities.length,
      });
    }

    const edges: NetworkEdge[] = [];
    const byPair = new Map<string, number>();
    const ids = new Set<string>();

    descriptions.forEach((desc, position) => {
      const { from, to, capacity } = desc;

      if (!this.nodesById.has(from) || !this.nodesById.has(to)) {
        throw new InvalidNetworkError(`Edge ${from} -> ${to} references an unknown node`, { from, to });
      }
      if (from === to) {
        throw new InvalidNetworkError(`Self-loop on "${from}" is not allowed`, { node: from });
      }
      if (!Number.isFinite(capacity) || capacity < 0) {
        throw new InvalidNetworkError(`Edge ${from} -> ${to} has invalid capacity ${capacity}`, {
          from,
          to,
          capacity,
        });
      }

      const pair = createEdgeId(from, to);
      const existing = byPair.get(pair);
      if (existing !== undefined) {
        if (config.parallelEdges === "reject") {
          throw new InvalidNetworkError(`Duplicate edge ${from} -> ${to}`, { from, to });
        }
        const merged = edges[existing];
        edges[existing] = {
          ...merged,
          capacity: merged.capacity + capacity,
          originalCapacity: merged.originalCapacity + capacity,
        };
        return;
      }

      const id = desc.id ?? pair;
      if (ids.has(id)) {
        throw new InvalidNetworkError(`Duplicate edge id "${id}"`, { edge: id });
      }

      const originalCapacity = originalCapacities?.[position] ?? capacity;
      if (!Number.isFinite(originalCapacity) || originalCapacity < capacity) {
        throw new InvalidNetworkError(`Edge ${id} has capacity above its original capacity`, {
          edge: id,
          capacity,
          originalCapacity,
        });
      }

      ids.add(id);
      byPair.set(pair, edges.length);
      edges.push({ id, index: edges.length, from, to, capacity, originalCapacity });
    });

    return edges.map((edge) => Object.freeze(edge));
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  get nodeCount(): number {
    return this.nodes.length;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  hasNode(id: string): boolean {
    return this.nodesById.has(id);
  }

  hasEdge(id: string): boolean {
    return this.edgesById.has(id);
  }

  getNode(id: string): NetworkNode | undefined {
    return this.nodesById.get(id);
  }

  getEdge(id: string): NetworkEdge | undefined {
    return this.edgesById.get(id);
  }

  /**
   * Index of a node in `nodes`, or -1 when absent.
   */
  indexOf(nodeId: string): number {
    return this.nodesById.get(nodeId)?.index ?? -1;
  }

  /** Out-edges of a node in insertion order. */
  outEdges(nodeId: string): readonly NetworkEdge[] {
    return this.outgoing.get(nodeId) ?? [];
  }

  /** In-edges of a node in insertion order. */
  inEdges(nodeId: string): readonly NetworkEdge[] {
    return this.incoming.get(nodeId) ?? [];
  }

  /**
   * Derives a network with identical topology and ids but new capacities.
   * Original capacities carry over so failed pipes stay reportable.
   *
   * @param capacities - New capacity per edge index
   */
  withCapacities(capacities: readonly number[]): FlowNetwork {
    if (capacities.length !== this.edges.length) {
      throw new InvalidNetworkError("Capacity list does not match the edge list", {
        edges: this.edges.length,
        capacities: capacities.length,
      });
    }

    const description: NetworkDescription = {
      nodes: this.nodes.map((n) => ({ id: n.id, role: n.role })),
      edges: this.edges.map((e) => ({ id: e.id, from: e.from, to: e.to, capacity: capacities[e.index] })),
      source: this.source,
      sink: this.sink,
    };

    return new FlowNetwork(
      description,
      {},
      this.edges.map((e) => e.originalCapacity)
    );
  }

  /**
   * Returns the boundary description of this network (current capacities).
   */
  toDescription(): NetworkDescription {
    return {
      nodes: this.nodes.map((n) => ({ id: n.id, role: n.role })),
      edges: this.edges.map((e) => ({ id: e.id, from: e.from, to: e.to, capacity: e.capacity })),
      source: this.source,
      sink: this.sink,
    };
  }
}
