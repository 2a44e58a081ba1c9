/**
 * Node deletion.
 *
 * Adjacency is externalized to id lists, rewritten around the deleted id and
 * then relinked by id, so several links can change at once without ever
 * exposing a half-updated graph.
 */

import type { Result } from "@streamnet/core";
import { Ok, Err, NotFoundError, StructuralError } from "@streamnet/core";
import type { StreamNode } from "./StreamNode.js";
import type { GraphState } from "./graph.js";
import { idKey, renumberComputationalOrder, renumberTributaries } from "./graph.js";

interface Links {
  downstreamId: string | null;
  upstreamIds: string[];
}

function externalize(arena: ReadonlyMap<string, StreamNode>): Map<StreamNode, Links> {
  const links = new Map<StreamNode, Links>();
  for (const node of arena.values()) {
    links.set(node, { downstreamId: node.downstreamId(), upstreamIds: node.upstreamIds() });
  }
  return links;
}

function resolve(arena: ReadonlyMap<string, StreamNode>, id: string): StreamNode {
  const node = arena.get(idKey(id));
  if (!node) {
    throw new StructuralError(`cannot relink unknown node id "${id}"`);
  }
  return node;
}

/**
 * Delete a node and reattach its upstream children to its downstream node.
 * Deleting the End node is a no-op and yields Ok(null).
 */
export function deleteNode(state: GraphState, id: string): Result<StreamNode | null, NotFoundError> {
  const { arena, log } = state;
  const target = arena.get(idKey(id));
  if (!target) {
    return Err(new NotFoundError(id));
  }
  const downstream = target.downstream;
  if (target.type === "End" || !downstream) {
    log.info(`"${target.id}" is the network head; nothing deleted`);
    return Ok(null);
  }

  const deletedKey = idKey(target.id);
  const links = externalize(arena);
  links.delete(target);
  const childIds = target.upstreamIds();

  for (const link of links.values()) {
    if (link.downstreamId !== null && idKey(link.downstreamId) === deletedKey) {
      link.downstreamId = downstream.id;
    }
    const position = link.upstreamIds.findIndex((upstreamId) => idKey(upstreamId) === deletedKey);
    if (position >= 0) {
      link.upstreamIds.splice(position, 1, ...childIds);
    }
  }

  // Siblings under the downstream node are ordered by serial.
  const downstreamLinks = links.get(downstream);
  if (!downstreamLinks) {
    throw new StructuralError(`"${downstream.id}" is linked but missing from the node index`);
  }
  downstreamLinks.upstreamIds = downstreamLinks.upstreamIds
    .map((upstreamId) => resolve(arena, upstreamId))
    .sort((a, b) => a.serial - b.serial)
    .map((node) => node.id);

  const resolved = new Map<StreamNode, StreamNode[]>();
  for (const [node, link] of links) {
    resolved.set(
      node,
      link.upstreamIds.map((upstreamId) => resolve(arena, upstreamId))
    );
  }

  // Mutation starts here.
  for (const node of links.keys()) {
    if (node.serial > target.serial) node.serial--;
    if (node.reachCounter === target.reachCounter && node.nodeInReachNumber > target.nodeInReachNumber) {
      node.nodeInReachNumber--;
    }
    node.setDownstreamNode(null);
    node.clearUpstream();
  }
  for (const [node, upstream] of resolved) {
    for (const child of upstream) node.addUpstreamNode(child);
    renumberTributaries(node);
  }

  target.setDownstreamNode(null);
  target.clearUpstream();
  arena.delete(deletedKey);

  renumberComputationalOrder(state);
  log.debug(`deleted "${target.id}"; ${childIds.length} upstream node(s) moved to "${downstream.id}"`);

  return Ok(target);
}
