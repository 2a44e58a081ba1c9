/**
 * A single hydrologic element of a stream network.
 *
 * Holds identity, type, flags, ordering metadata and geometry, plus one
 * downstream neighbour and an ordered list of upstream neighbours. The
 * upstream order encodes tributary numbering. Ordering metadata is written
 * by NodeNetwork; nothing else should set it.
 */

import type { NodeOrdering, NodeRecord, NodeSnapshot, NodeType, Point } from "./model.js";
import { NODE_TYPE_INFO } from "./model.js";

export interface StreamNodeInit {
  id: string;
  type: NodeType;
  description?: string;
  isNaturalFlow?: boolean;
  isImport?: boolean;
  isDryRiver?: boolean;
  x?: number | null;
  y?: number | null;
}

export class StreamNode implements NodeOrdering {
  id: string;
  type: NodeType;
  description: string;
  isNaturalFlow: boolean;
  isImport: boolean;
  isDryRiver: boolean;

  serial = 0;
  computationalOrder = 0;
  reachCounter = 0;
  nodeInReachNumber = 1;
  tributaryNumber = 1;

  x: number | null;
  y: number | null;

  private _downstream: StreamNode | null = null;
  private readonly _upstream: StreamNode[] = [];

  constructor(init: StreamNodeInit) {
    this.id = init.id;
    this.type = init.type;
    this.description = init.description ?? "";
    this.isNaturalFlow = init.isNaturalFlow ?? false;
    this.isImport = init.isImport ?? false;
    this.isDryRiver = init.isDryRiver ?? false;
    this.x = init.x ?? null;
    this.y = init.y ?? null;
  }

  get downstream(): StreamNode | null {
    return this._downstream;
  }

  get upstream(): readonly StreamNode[] {
    return this._upstream;
  }

  get upstreamCount(): number {
    return this._upstream.length;
  }

  /**
   * Append n to the upstream list and point n's downstream at this node.
   */
  addUpstreamNode(node: StreamNode): void {
    this._upstream.push(node);
    node._downstream = this;
  }

  /**
   * Splice n between this node and its current downstream neighbour.
   * The old downstream keeps n in the slot this node used to occupy.
   */
  addDownstreamNode(node: StreamNode): StreamNode {
    const old = this._downstream;
    if (old) {
      const slot = old._upstream.indexOf(this);
      if (slot >= 0) {
        old._upstream[slot] = node;
      } else {
        old._upstream.push(node);
      }
      node._downstream = old;
      node.tributaryNumber = this.tributaryNumber;
      node._upstream.push(this);
      this._downstream = node;
      this.tributaryNumber = node._upstream.length;
    } else {
      node.addUpstreamNode(this);
      this.tributaryNumber = node._upstream.length;
    }
    return node;
  }

  setDownstreamNode(node: StreamNode | null): void {
    this._downstream = node;
  }

  /** Drop every upstream link without touching the neighbours. */
  clearUpstream(): void {
    this._upstream.length = 0;
  }

  downstreamId(): string | null {
    return this._downstream?.id ?? null;
  }

  upstreamIds(): string[] {
    return this._upstream.map((n) => n.id);
  }

  hasLocation(): boolean {
    return this.location() !== null;
  }

  location(): Point | null {
    if (this.x === null || this.y === null || !Number.isFinite(this.x) || !Number.isFinite(this.y)) {
      return null;
    }
    return { x: this.x, y: this.y };
  }

  setLocation(x: number | null, y: number | null): void {
    this.x = x;
    this.y = y;
  }

  /** Id-only record, as consumed by NodeNetwork.fromRecords(). */
  toRecord(): NodeRecord {
    return {
      id: this.id,
      type: this.type,
      description: this.description,
      isNaturalFlow: this.isNaturalFlow,
      isImport: this.isImport,
      isDryRiver: this.isDryRiver,
      x: this.x,
      y: this.y,
      downstreamId: this.downstreamId(),
      upstreamIds: this.upstreamIds(),
    };
  }

  toSnapshot(): NodeSnapshot {
    return {
      ...this.toRecord(),
      serial: this.serial,
      computationalOrder: this.computationalOrder,
      reachCounter: this.reachCounter,
      nodeInReachNumber: this.nodeInReachNumber,
      tributaryNumber: this.tributaryNumber,
    };
  }

  toString(): string {
    const up = this.upstreamIds().join(",");
    return (
      `"${this.id}" T=${NODE_TYPE_INFO[this.type].abbreviation} T#=${this.tributaryNumber} ` +
      `RC=${this.reachCounter} N#=${this.nodeInReachNumber} S#=${this.serial} ` +
      `C#=${this.computationalOrder} DS=${this.downstreamId() ?? "-"} US=[${up}]`
    );
  }
}
