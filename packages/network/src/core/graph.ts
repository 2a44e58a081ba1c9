/**
 * Shared state passed between NodeNetwork and its mutation modules.
 */

import type { Logger } from "@streamnet/core";
import { StructuralError } from "@streamnet/core";
import type { TributaryOrder } from "./model.js";
import type { StreamNode } from "./StreamNode.js";
import { walkComputational } from "./traversal.js";

export interface GraphState {
  head: StreamNode;
  /** Every node keyed by lower-cased id */
  arena: Map<string, StreamNode>;
  readonly tributaryOrder: TributaryOrder;
  readonly log: Logger;
}

export function idKey(id: string): string {
  return id.trim().toLowerCase();
}

/**
 * Renumber computationalOrder 1..N along the computational walk.
 */
export function renumberComputationalOrder(state: GraphState): StreamNode[] {
  const walk = walkComputational(state.head, state.tributaryOrder);
  if (walk.length !== state.arena.size) {
    throw new StructuralError(
      `computational walk visited ${walk.length} of ${state.arena.size} nodes`
    );
  }
  walk.forEach((node, index) => {
    node.computationalOrder = index + 1;
  });
  return walk;
}

/** Keep tributaryNumber equal to each upstream entry's position + 1. */
export function renumberTributaries(node: StreamNode): void {
  node.upstream.forEach((upstream, index) => {
    upstream.tributaryNumber = index + 1;
  });
}
