/**
 * Traversal primitives.
 *
 * Every function takes the network's tributary convention explicitly. Loops
 * keep a visited set: a malformed graph raises StructuralError instead of
 * spinning.
 */

import { StructuralError } from "@streamnet/core";
import type { Position, TributaryOrder } from "./model.js";
import { isConfluenceType } from "./model.js";
import type { StreamNode } from "./StreamNode.js";

/**
 * Index of the upstream entry that continues the current reach.
 */
export function primaryUpstreamIndex(node: StreamNode, order: TributaryOrder): number {
  return order === "added-first" ? node.upstreamCount - 1 : 0;
}

function guard(visited: Set<StreamNode>, node: StreamNode, what: string): void {
  if (visited.has(node)) {
    throw new StructuralError(`${what} revisited node "${node.id}"; the network contains a cycle`);
  }
  visited.add(node);
}

/**
 * Check that a node sits at the slot its tributary number claims.
 */
function slotOf(node: StreamNode, downstream: StreamNode): number {
  const index = node.tributaryNumber - 1;
  if (downstream.upstream[index] !== node) {
    throw new StructuralError(
      `"${node.id}" has tributary number ${node.tributaryNumber} but is not at that position under "${downstream.id}"`
    );
  }
  return index;
}

export function absoluteDownstream(node: StreamNode): StreamNode {
  const visited = new Set<StreamNode>();
  let current = node;
  for (;;) {
    guard(visited, current, "downstream walk");
    const next = current.downstream;
    if (!next) return current;
    current = next;
  }
}

export function absoluteUpstream(node: StreamNode, order: TributaryOrder): StreamNode {
  const visited = new Set<StreamNode>();
  let current = node;
  for (;;) {
    guard(visited, current, "upstream walk");
    if (current.upstreamCount === 0) return current;
    current = current.upstream[primaryUpstreamIndex(current, order)];
  }
}

/** First node of the reach (nodeInReachNumber 1), walking downstream. */
export function reachDownstream(node: StreamNode): StreamNode {
  const visited = new Set<StreamNode>();
  let current = node;
  for (;;) {
    guard(visited, current, "reach walk");
    const next = current.downstream;
    if (current.nodeInReachNumber === 1 || !next) return current;
    current = next;
  }
}

/**
 * Top of the reach: follow the upstream neighbour on the same reach until
 * there is none, or until a confluence with a single upstream entry.
 */
export function reachUpstream(node: StreamNode): StreamNode {
  const visited = new Set<StreamNode>();
  let current = node;
  for (;;) {
    guard(visited, current, "reach walk");
    if (current.upstreamCount === 1 && isConfluenceType(current.type)) return current;
    const next = nextInReach(current);
    if (!next) return current;
    current = next;
  }
}

/**
 * Next node in computational order.
 *
 * Moves to the downstream neighbour once the last sibling tributary has been
 * walked; otherwise jumps to the top of the next sibling branch.
 */
export function computationalDownstream(node: StreamNode, order: TributaryOrder): StreamNode {
  const downstream = node.downstream;
  if (!downstream) return node;

  const count = downstream.upstreamCount;
  const index = slotOf(node, downstream);

  if (order === "added-first") {
    if (count === 1 || index === 0) return downstream;
    return absoluteUpstream(downstream.upstream[index - 1], order);
  }
  if (count === 1 || index === count - 1) return downstream;
  return absoluteUpstream(downstream.upstream[index + 1], order);
}

/**
 * Previous node in computational order: the inverse of computationalDownstream.
 * A leaf moves across to the sibling branch walked just before it; the first
 * node of the walk returns itself.
 */
export function computationalUpstream(node: StreamNode, order: TributaryOrder): StreamNode {
  if (node.upstreamCount > 0) {
    return node.upstream[order === "added-first" ? 0 : node.upstreamCount - 1];
  }

  const visited = new Set<StreamNode>();
  let current = node;
  for (;;) {
    guard(visited, current, "confluence search");
    const downstream = current.downstream;
    if (!downstream) return node;
    const index = slotOf(current, downstream);
    const sibling = order === "added-first" ? index + 1 : index - 1;
    if (sibling >= 0 && sibling < downstream.upstreamCount) {
      return downstream.upstream[sibling];
    }
    current = downstream;
  }
}

/**
 * The upstream neighbour that shares this node's reach, if any.
 */
export function nextInReach(node: StreamNode): StreamNode | null {
  return node.upstream.find((n) => n.reachCounter === node.reachCounter) ?? null;
}

export function getDownstreamNode(node: StreamNode, position: Position, order: TributaryOrder): StreamNode {
  switch (position) {
    case "relative":
      return node.downstream ?? node;
    case "absolute":
      return absoluteDownstream(node);
    case "reach":
      return reachDownstream(node);
    case "computational":
      return computationalDownstream(node, order);
  }
}

/**
 * Upstream counterpart of getDownstreamNode. Only "relative" can return null
 * (a leaf has no neighbour); the others return the node itself at the top.
 */
export function getUpstreamNode(node: StreamNode, position: Position, order: TributaryOrder): StreamNode | null {
  switch (position) {
    case "relative":
      return node.upstreamCount > 0 ? node.upstream[primaryUpstreamIndex(node, order)] : null;
    case "absolute":
      return absoluteUpstream(node, order);
    case "reach":
      return reachUpstream(node);
    case "computational":
      return computationalUpstream(node, order);
  }
}

/**
 * Every node reachable from any node's root, in computational order.
 */
export function walkComputational(anyNode: StreamNode, order: TributaryOrder): StreamNode[] {
  const start = absoluteUpstream(absoluteDownstream(anyNode), order);
  const visited = new Set<StreamNode>();
  const nodes: StreamNode[] = [];
  let current = start;
  for (;;) {
    guard(visited, current, "computational walk");
    nodes.push(current);
    if (!current.downstream) return nodes;
    const next = computationalDownstream(current, order);
    if (next === current) {
      throw new StructuralError(`computational walk made no progress at "${current.id}"`);
    }
    current = next;
  }
}

/** Relative downstream path from node to the head, inclusive. */
export function pathToHead(node: StreamNode): StreamNode[] {
  const visited = new Set<StreamNode>();
  const path: StreamNode[] = [];
  let current: StreamNode | null = node;
  while (current) {
    guard(visited, current, "downstream walk");
    path.push(current);
    current = current.downstream;
  }
  return path;
}
