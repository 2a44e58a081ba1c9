/**
 * Bulk rebuild from a flat list of id-linked records.
 */

import type { Logger } from "@streamnet/core";
import { StructuralError } from "@streamnet/core";
import type { NodeRecord, TributaryOrder } from "./model.js";
import { StreamNode } from "./StreamNode.js";
import { idKey } from "./graph.js";
import { walkComputational } from "./traversal.js";

export interface BuiltGraph {
  head: StreamNode;
  arena: Map<string, StreamNode>;
}

interface PendingChild {
  child: number;
  parent: number;
  position: number;
  siblings: number;
}

/**
 * Build a linked graph from records.
 *
 * With headFirst the End record leads the list, otherwise it closes it. Reach
 * numbers are handed out depth-first from the head: the primary upstream
 * entry (last for added-first, first for added-last) continues its reach,
 * every other entry opens the next reach number in discovery order. Serial and computational order then follow one
 * computational walk: serial N..1 and computationalOrder 1..N.
 *
 * @throws StructuralError when the records do not describe a single tree
 * rooted at one End node.
 */
export function buildGraph(
  records: readonly NodeRecord[],
  headFirst: boolean,
  order: TributaryOrder,
  log: Logger
): BuiltGraph {
  if (records.length === 0) {
    throw new StructuralError("cannot rebuild a network from an empty node list");
  }
  const ordered = headFirst ? [...records] : [...records].reverse();

  const index = new Map<string, number>();
  ordered.forEach((record, i) => {
    const key = idKey(record.id);
    if (!key) {
      throw new StructuralError(`node at position ${i} has an empty id`);
    }
    if (index.has(key)) {
      throw new StructuralError(`duplicate node id "${record.id}"`);
    }
    index.set(key, i);
  });

  const headRecord = ordered[0];
  if (headRecord.type !== "End" || (headRecord.downstreamId ?? "").trim() !== "") {
    throw new StructuralError(
      `expected the End node ${headFirst ? "first" : "last"} in the list, found "${headRecord.id}"`
    );
  }

  for (let i = 1; i < ordered.length; i++) {
    const record = ordered[i];
    if (record.type === "End") {
      throw new StructuralError(`second End node "${record.id}"`);
    }
    const downstreamId = (record.downstreamId ?? "").trim();
    if (!downstreamId) {
      throw new StructuralError(`"${record.id}" has no downstream node`);
    }
    if (!index.has(idKey(downstreamId))) {
      throw new StructuralError(`downstream node "${downstreamId}" of "${record.id}" is not in the list`);
    }
  }

  const children = ordered.map((record) => {
    const resolved: number[] = [];
    for (const upstreamId of record.upstreamIds) {
      const j = index.get(idKey(upstreamId));
      if (j === undefined) {
        log.warn(`skipping unknown upstream id "${upstreamId}" of "${record.id}"`);
        continue;
      }
      if (resolved.includes(j)) {
        throw new StructuralError(`"${upstreamId}" is listed twice upstream of "${record.id}"`);
      }
      const childDownstream = ordered[j].downstreamId ?? "";
      if (idKey(childDownstream) !== idKey(record.id)) {
        throw new StructuralError(
          `"${upstreamId}" is listed upstream of "${record.id}" but drains to "${childDownstream}"`
        );
      }
      resolved.push(j);
    }
    return resolved;
  });

  const nodes = ordered.map(
    (record) =>
      new StreamNode({
        id: record.id.trim(),
        type: record.type,
        description: record.description,
        isNaturalFlow: record.isNaturalFlow,
        isImport: record.isImport,
        isDryRiver: record.isDryRiver,
        x: record.x,
        y: record.y,
      })
  );

  const head = nodes[0];
  head.reachCounter = 1;
  head.nodeInReachNumber = 1;
  head.tributaryNumber = 1;

  const visited: boolean[] = nodes.map(() => false);
  visited[0] = true;
  let highestReach = 1;

  const pushChildren = (stack: PendingChild[], parent: number): void => {
    const list = children[parent];
    for (let position = list.length - 1; position >= 0; position--) {
      stack.push({ child: list[position], parent, position, siblings: list.length });
    }
  };

  const stack: PendingChild[] = [];
  pushChildren(stack, 0);
  for (let pending = stack.pop(); pending; pending = stack.pop()) {
    const { child, parent, position, siblings } = pending;
    if (visited[child]) {
      throw new StructuralError(`"${nodes[child].id}" is reachable twice; the network contains a cycle`);
    }
    visited[child] = true;

    const node = nodes[child];
    const downstream = nodes[parent];
    const primary = order === "added-first" ? siblings - 1 : 0;
    if (position === primary) {
      node.reachCounter = downstream.reachCounter;
      node.nodeInReachNumber = downstream.nodeInReachNumber + 1;
    } else {
      highestReach++;
      node.reachCounter = highestReach;
      node.nodeInReachNumber = 1;
    }
    node.tributaryNumber = position + 1;
    downstream.addUpstreamNode(node);
    pushChildren(stack, child);
  }

  const orphan = nodes.find((_, i) => !visited[i]);
  if (orphan) {
    throw new StructuralError(`"${orphan.id}" is not connected to "${head.id}"`);
  }

  const walk = walkComputational(head, order);
  if (walk.length !== nodes.length) {
    throw new StructuralError(`computational walk visited ${walk.length} of ${nodes.length} nodes`);
  }
  walk.forEach((node, i) => {
    node.computationalOrder = i + 1;
    node.serial = nodes.length - i;
  });

  const arena = new Map<string, StreamNode>();
  for (const node of nodes) arena.set(idKey(node.id), node);

  return { head, arena };
}
