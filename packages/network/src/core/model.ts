/**
 * Stream network model types.
 */

/**
 * Hydrologic node types. Baseflow and Import are legacy types kept for
 * reading older networks; see NodeNetwork.convertLegacyNodeTypes().
 */
export const NODE_TYPES = [
  "Blank",
  "Diversion",
  "DiversionAndWell",
  "Well",
  "Streamflow",
  "Confluence",
  "XConfluence",
  "InstreamFlow",
  "Reservoir",
  "Import",
  "Baseflow",
  "End",
  "Other",
  "Unknown",
  "StreamTop",
  "Label",
  "Formula",
  "Plan",
] as const;

export type NodeType = (typeof NODE_TYPES)[number];

interface NodeTypeInfo {
  /** Three-character code used in compact listings */
  abbreviation: string;
  /** Upper-case code used in network files */
  code: string;
  /** Human readable name */
  label: string;
}

export const NODE_TYPE_INFO: Record<NodeType, NodeTypeInfo> = {
  Blank: { abbreviation: "BLK", code: "BLANK", label: "Blank" },
  Diversion: { abbreviation: "DIV", code: "DIV", label: "Diversion" },
  DiversionAndWell: { abbreviation: "D&W", code: "D&W", label: "Diversion and Well" },
  Well: { abbreviation: "WEL", code: "WELL", label: "Well" },
  Streamflow: { abbreviation: "FLO", code: "FLOW", label: "Streamflow" },
  Confluence: { abbreviation: "CON", code: "CONFL", label: "Confluence" },
  XConfluence: { abbreviation: "XCN", code: "XCONFL", label: "Cross-Confluence" },
  InstreamFlow: { abbreviation: "ISF", code: "ISF", label: "Instream Flow" },
  Reservoir: { abbreviation: "RES", code: "RES", label: "Reservoir" },
  Import: { abbreviation: "IMP", code: "IMPORT", label: "Import" },
  Baseflow: { abbreviation: "BFL", code: "BFL", label: "Baseflow" },
  End: { abbreviation: "END", code: "END", label: "End" },
  Other: { abbreviation: "OTH", code: "OTH", label: "Other" },
  Unknown: { abbreviation: "UNK", code: "UNKNOWN", label: "Unknown" },
  StreamTop: { abbreviation: "STR", code: "STREAM", label: "Stream Top" },
  Label: { abbreviation: "LAB", code: "LABEL", label: "Label" },
  Formula: { abbreviation: "FOR", code: "FORMULA", label: "Formula" },
  Plan: { abbreviation: "PLN", code: "PLAN", label: "Plan" },
};

/**
 * Types that are physical stations: the "real" node set.
 */
export const REAL_NODE_TYPES: ReadonlySet<NodeType> = new Set<NodeType>([
  "Streamflow",
  "Diversion",
  "DiversionAndWell",
  "Reservoir",
  "InstreamFlow",
  "Well",
  "Other",
  "Plan",
]);

/**
 * Types whose identifiers may carry a ".suffix" that is not part of the
 * structure id.
 */
export const STRUCTURE_NODE_TYPES: ReadonlySet<NodeType> = new Set<NodeType>([
  "Diversion",
  "DiversionAndWell",
  "InstreamFlow",
  "Reservoir",
  "Well",
  "Import",
]);

/** Sentinel for getNodesForType(): every node whose type is in REAL_NODE_TYPES. */
export const REAL_NODES = "real";
export type NodeTypeFilter = NodeType | typeof REAL_NODES;

export function isConfluenceType(type: NodeType): boolean {
  return type === "Confluence" || type === "XConfluence";
}

const TYPE_LOOKUP = new Map<string, NodeType>();
for (const type of NODE_TYPES) {
  const info = NODE_TYPE_INFO[type];
  for (const key of [type, info.abbreviation, info.code, info.label]) {
    TYPE_LOOKUP.set(key.toLowerCase(), type);
  }
}

/**
 * Resolve a type from its name, abbreviation, code or label (any case).
 */
export function lookupNodeType(text: string): NodeType | undefined {
  return TYPE_LOOKUP.get(text.trim().toLowerCase());
}

/**
 * Convention for which upstream branch is "primary".
 *
 * With "added-first" the last entry of an upstream list continues the reach
 * and computational walks enter branches from the end of the list;
 * "added-last" mirrors that.
 */
export type TributaryOrder = "added-first" | "added-last";

export const DEFAULT_TRIBUTARY_ORDER: TributaryOrder = "added-first";

/** Positioning semantics for traversal. */
export type Position = "relative" | "absolute" | "reach" | "computational";

/** Id of the head node of a new network */
export const END_NODE_ID = "END";

/**
 * Flat, id-only form of a node.
 * This is what serializers see; it round-trips through NodeNetwork.fromRecords().
 */
export interface NodeRecord {
  id: string;
  type: NodeType;
  description?: string;
  isNaturalFlow?: boolean;
  isImport?: boolean;
  isDryRiver?: boolean;
  x?: number | null;
  y?: number | null;
  /** Null or absent for the End node */
  downstreamId?: string | null;
  upstreamIds: string[];
}

/**
 * Ordering metadata; recomputed by the network, never set by callers.
 */
export interface NodeOrdering {
  serial: number;
  computationalOrder: number;
  reachCounter: number;
  nodeInReachNumber: number;
  tributaryNumber: number;
}

/** Export form: a record plus its ordering metadata. */
export type NodeSnapshot = NodeRecord & NodeOrdering;

/**
 * Numbers that depend on edit history rather than on the graph alone.
 * Saved with the network so a reload does not renumber it.
 */
export type SavedOrdering = Pick<NodeOrdering, "serial" | "reachCounter" | "nodeInReachNumber">;

export type StoredNodeRecord = NodeRecord & Partial<SavedOrdering>;

export interface InsertNodeOptions {
  id: string;
  type: NodeType;
  downstreamId: string;
  /** Existing upstream child of the downstream node to splice above */
  upstreamId?: string;
  description?: string;
  isNaturalFlow?: boolean;
  isImport?: boolean;
  isDryRiver?: boolean;
}

/** Rectangle in layout coordinates: left, bottom, right, top. */
export interface Limits {
  lx: number;
  by: number;
  rx: number;
  ty: number;
}

export interface Point {
  x: number;
  y: number;
}
