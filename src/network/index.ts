/**
 * @fileoverview Network model exports.
 *
 * @module network
 */

export { FlowNetwork } from "./FlowNetwork";
export {
  type NodeRole,
  type NetworkNode,
  type NetworkEdge,
  type NodeDescription,
  type EdgeDescription,
  type NetworkDescription,
  type ParallelEdgePolicy,
  type NetworkOptions,
  DEFAULT_NETWORK_OPTIONS,
  createEdgeId,
} from "./NetworkTypes";
