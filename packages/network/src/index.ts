/**
 * Network package - a hydrologic node network over MCP.
 *
 * Nodes (stream gages, diversions, reservoirs, confluences...) drain into
 * exactly one downstream node, ending at a single End node. Tools:
 * - network_summary / network_list / network_find / network_export: inspect
 * - network_insert / network_delete / network_rename / network_rebuild: edit
 * - network_trace / network_flow_nodes: walk the network
 * - network_locate / network_interpolate: coordinates
 * - network_validate: structural checks
 *
 * Data is stored in .streamnet/network.json in the project root.
 */

export { NodeNetwork } from "./core/NodeNetwork.js";
export type { NetworkOptions, RebuildOptions } from "./core/NodeNetwork.js";
export { StreamNode } from "./core/StreamNode.js";
export { NetworkService } from "./core/NetworkService.js";
export type { NetworkSummary, InsertResult, DeleteResult, FlowNodes, Direction } from "./core/NetworkService.js";
export { GeometryInterpolator } from "./core/GeometryInterpolator.js";
export type { InterpolationOptions, InterpolationReport } from "./core/GeometryInterpolator.js";
export type {
  NodeType,
  NodeTypeFilter,
  TributaryOrder,
  Position,
  NodeRecord,
  NodeSnapshot,
  SavedOrdering,
  StoredNodeRecord,
  InsertNodeOptions,
  Limits,
  Point,
} from "./core/model.js";
export { NODE_TYPES, NODE_TYPE_INFO, END_NODE_ID, REAL_NODES, lookupNodeType } from "./core/model.js";
export { NodeRecordSchema, LimitsSchema, PointSchema } from "./core/schemas.js";
export type { NetworkFile } from "./core/NetworkStorage.js";
export { loadNetworkFile, saveNetworkFile, networkFileExists, getNetworkPath } from "./core/NetworkStorage.js";
export type { NetworkConfig } from "./config.js";
export { loadNetworkConfig, DEFAULT_DATA_DIR } from "./config.js";
export { registerNetworkTools } from "./tools/registerTools.js";
