/**
 * Node insertion.
 *
 * Every check and every new value is worked out before the first link
 * changes, so a rejected insert leaves the network untouched.
 */

import type { DuplicateIdWarning, NetworkError, Result } from "@streamnet/core";
import { Ok, Err, NotFoundError, invalidInput } from "@streamnet/core";
import type { InsertNodeOptions, Point } from "./model.js";
import { StreamNode } from "./StreamNode.js";
import type { GraphState } from "./graph.js";
import { idKey, renumberComputationalOrder } from "./graph.js";

export interface InsertOutcome {
  node: StreamNode;
  warnings: DuplicateIdWarning[];
}

/** Offset used when the only located neighbour is the downstream node. */
const NUDGE = 0.001;

/**
 * Make an id unique (ignoring case) by appending "_<n>".
 */
export function disambiguateId(arena: ReadonlyMap<string, StreamNode>, requested: string): string {
  if (!arena.has(idKey(requested))) return requested;
  let n = 1;
  while (arena.has(idKey(`${requested}_${n}`))) n++;
  return `${requested}_${n}`;
}

/** Highest serial among node and everything upstream of it. */
function maxSerialInSubtree(node: StreamNode): number {
  let max = node.serial;
  const stack = [...node.upstream];
  for (let current = stack.pop(); current; current = stack.pop()) {
    max = Math.max(max, current.serial);
    stack.push(...current.upstream);
  }
  return max;
}

function maxReach(arena: ReadonlyMap<string, StreamNode>): number {
  let max = 0;
  for (const node of arena.values()) max = Math.max(max, node.reachCounter);
  return max;
}

/**
 * Initial position: midpoint of the anchors, else continue the downstream
 * node's own delta, else a small nudge off the downstream node.
 */
function placeNewNode(downstream: StreamNode, upstream: StreamNode | null): Point | null {
  const d = downstream.location();
  if (!d) return null;

  const u = upstream?.location() ?? null;
  if (u) return { x: (d.x + u.x) / 2, y: (d.y + u.y) / 2 };

  const dd = downstream.downstream?.location() ?? null;
  if (dd) return { x: d.x + (d.x - dd.x), y: d.y + (d.y - dd.y) };

  return { x: d.x + NUDGE, y: d.y + NUDGE };
}

export function insertNode(state: GraphState, options: InsertNodeOptions): Result<InsertOutcome, NetworkError> {
  const { arena, log } = state;
  const requestedId = options.id.trim();
  if (!requestedId) {
    return Err(invalidInput("Node id must not be empty"));
  }
  if (options.type === "End") {
    return Err(invalidInput("A network has exactly one End node"));
  }

  const downstream = arena.get(idKey(options.downstreamId));
  if (!downstream) {
    return Err(new NotFoundError(options.downstreamId, "Downstream node"));
  }

  let upstream: StreamNode | null = null;
  if (options.upstreamId !== undefined && options.upstreamId.trim() !== "") {
    const anchor = arena.get(idKey(options.upstreamId));
    if (!anchor) {
      return Err(new NotFoundError(options.upstreamId, "Upstream node"));
    }
    if (anchor.downstream === downstream) {
      upstream = anchor;
    } else {
      log.warn(`"${anchor.id}" is not upstream of "${downstream.id}"; adding a new branch instead`);
    }
  }

  const warnings: DuplicateIdWarning[] = [];
  const id = disambiguateId(arena, requestedId);
  if (id !== requestedId) {
    warnings.push({ kind: "duplicate-id", requestedId, assignedId: id });
    log.info(`id "${requestedId}" is taken; using "${id}"`);
  }

  const serialBase = upstream ? upstream.serial - 1 : maxSerialInSubtree(downstream);
  const location = placeNewNode(downstream, upstream);

  let reachCounter: number;
  let nodeInReachNumber: number;
  if (upstream) {
    reachCounter = upstream.reachCounter;
    nodeInReachNumber = upstream.nodeInReachNumber;
  } else if (downstream.upstreamCount === 0) {
    reachCounter = downstream.reachCounter;
    nodeInReachNumber = downstream.nodeInReachNumber + 1;
  } else {
    reachCounter = maxReach(arena) + 1;
    nodeInReachNumber = 1;
  }

  // Mutation starts here.
  const node = new StreamNode({
    id,
    type: options.type,
    description: options.description,
    isNaturalFlow: options.isNaturalFlow,
    isImport: options.isImport,
    isDryRiver: options.isDryRiver,
    x: location?.x ?? null,
    y: location?.y ?? null,
  });

  for (const other of arena.values()) {
    if (other.serial > serialBase) other.serial++;
    if (upstream && other.reachCounter === reachCounter && other.nodeInReachNumber >= nodeInReachNumber) {
      other.nodeInReachNumber++;
    }
  }

  if (upstream) {
    upstream.addDownstreamNode(node);
  } else {
    downstream.addUpstreamNode(node);
    node.tributaryNumber = downstream.upstreamCount;
  }

  node.serial = serialBase + 1;
  node.reachCounter = reachCounter;
  node.nodeInReachNumber = nodeInReachNumber;
  node.computationalOrder = downstream.computationalOrder;
  arena.set(idKey(id), node);

  renumberComputationalOrder(state);
  log.debug(`inserted ${node.toString()}`);

  return Ok({ node, warnings });
}
