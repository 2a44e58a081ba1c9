/**
 * Read-only searches over a linked network.
 */

import type { Limits, NodeType, NodeTypeFilter } from "./model.js";
import { REAL_NODES, REAL_NODE_TYPES, STRUCTURE_NODE_TYPES } from "./model.js";
import type { StreamNode } from "./StreamNode.js";
import { nextInReach } from "./traversal.js";

/** Secondary attributes findNodeByData() can match on. */
export type NodeDataKind = "description" | "baseId";

export type NodePredicate = (node: StreamNode) => boolean;

const DATA_MATCHERS: Record<NodeDataKind, (node: StreamNode, value: string) => boolean> = {
  description: (node, value) => node.description.toLowerCase() === value.toLowerCase(),
  baseId: (node, value) => baseId(node).toLowerCase() === value.toLowerCase(),
};

/** Id text before the first "." for structure types, else the whole id. */
export function baseId(node: StreamNode): string {
  if (!STRUCTURE_NODE_TYPES.has(node.type)) return node.id;
  const dot = node.id.indexOf(".");
  return dot > 0 ? node.id.slice(0, dot) : node.id;
}

export function isGageNode(node: StreamNode): boolean {
  return node.type === "Streamflow" && node.isNaturalFlow;
}

export function isNaturalFlowNode(node: StreamNode, treatDryAsNaturalFlow: boolean): boolean {
  return node.isNaturalFlow || (treatDryAsNaturalFlow && node.isDryRiver);
}

export function matchesType(node: StreamNode, filter: NodeTypeFilter): boolean {
  return filter === REAL_NODES ? REAL_NODE_TYPES.has(node.type) : node.type === filter;
}

export function findNodeByData(
  nodes: readonly StreamNode[],
  kind: NodeDataKind,
  nodeType: NodeType,
  value: string
): StreamNode | null {
  const matcher = DATA_MATCHERS[kind];
  return nodes.find((node) => node.type === nodeType && matcher(node, value)) ?? null;
}

/** First node strictly downstream of node that satisfies predicate. */
export function findDownstream(node: StreamNode, predicate: NodePredicate): StreamNode | null {
  const visited = new Set<StreamNode>([node]);
  for (let current = node.downstream; current && !visited.has(current); current = current.downstream) {
    if (predicate(current)) return current;
    visited.add(current);
  }
  return null;
}

/**
 * Nearest natural-flow node below node on the same reach.
 */
export function findDownstreamNaturalFlowNodeInReach(
  node: StreamNode,
  treatDryAsNaturalFlow: boolean
): StreamNode | null {
  const visited = new Set<StreamNode>([node]);
  for (let current = node.downstream; current && !visited.has(current); current = current.downstream) {
    if (current.reachCounter !== node.reachCounter) return null;
    if (isNaturalFlowNode(current, treatDryAsNaturalFlow)) return current;
    visited.add(current);
  }
  return null;
}

/**
 * Nearest natural-flow node above node on the same reach.
 */
export function findUpstreamNaturalFlowNodeInReach(
  node: StreamNode,
  treatDryAsNaturalFlow: boolean
): StreamNode | null {
  const visited = new Set<StreamNode>([node]);
  for (let current = nextInReach(node); current && !visited.has(current); current = nextInReach(current)) {
    if (isNaturalFlowNode(current, treatDryAsNaturalFlow)) return current;
    visited.add(current);
  }
  return null;
}

/**
 * Nearest gage on every upstream branch of node.
 *
 * Climbs each upstream entry; a gage ends the climb on that branch, a node
 * with several upstream entries splits it. Results follow upstream list
 * order, depth first.
 */
export function findUpstreamFlowNodes(node: StreamNode, isGage: NodePredicate = isGageNode): StreamNode[] {
  const found: StreamNode[] = [];
  const visited = new Set<StreamNode>([node]);
  const stack = [...node.upstream].reverse();
  for (let current = stack.pop(); current; current = stack.pop()) {
    if (visited.has(current)) continue;
    visited.add(current);
    if (isGage(current)) {
      found.push(current);
      continue;
    }
    for (let i = current.upstreamCount - 1; i >= 0; i--) stack.push(current.upstream[i]);
  }
  return found;
}

export interface UpstreamSearchOptions {
  /** Include the starting node in the result */
  includeStart?: boolean;
  /**
   * Ids where the search stops. The stop node itself is included unless its
   * id is given with a leading "-".
   */
  stopIds?: readonly string[];
}

/**
 * Every node upstream of node, depth first in upstream list order.
 */
export function findUpstreamNodes(node: StreamNode, options: UpstreamSearchOptions = {}): StreamNode[] {
  const include = new Set<string>();
  const exclude = new Set<string>();
  for (const raw of options.stopIds ?? []) {
    const id = raw.trim();
    if (id.startsWith("-")) exclude.add(id.slice(1).toLowerCase());
    else if (id) include.add(id.toLowerCase());
  }

  const found: StreamNode[] = options.includeStart ? [node] : [];
  const visited = new Set<StreamNode>([node]);
  const stack = [...node.upstream].reverse();
  for (let current = stack.pop(); current; current = stack.pop()) {
    if (visited.has(current)) continue;
    visited.add(current);
    const key = current.id.toLowerCase();
    if (exclude.has(key)) continue;
    found.push(current);
    if (include.has(key)) continue;
    for (let i = current.upstreamCount - 1; i >= 0; i--) stack.push(current.upstream[i]);
  }
  return found;
}

export function determineExtent(nodes: readonly StreamNode[]): Limits | null {
  let limits: Limits | null = null;
  for (const node of nodes) {
    const point = node.location();
    if (!point) continue;
    if (!limits) {
      limits = { lx: point.x, by: point.y, rx: point.x, ty: point.y };
      continue;
    }
    limits.lx = Math.min(limits.lx, point.x);
    limits.rx = Math.max(limits.rx, point.x);
    limits.by = Math.min(limits.by, point.y);
    limits.ty = Math.max(limits.ty, point.y);
  }
  return limits;
}
