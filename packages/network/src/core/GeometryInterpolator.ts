/**
 * Fills in missing node coordinates.
 *
 * Main stem first (interpolate between known points, extrapolate the ends),
 * then every side reach from its downstream anchor, then an optional clamp
 * into the layout rectangle. Depends on NodeNetwork; the network knows
 * nothing about it.
 */

import type { Advisory } from "@streamnet/core";
import { advisory } from "@streamnet/core";
import type { Limits, Point } from "./model.js";
import type { NodeNetwork } from "./NodeNetwork.js";
import type { StreamNode } from "./StreamNode.js";

export interface InterpolationOptions {
  /** Layout rectangle. When given, coordinates outside it are pulled back in. */
  limits?: Limits;
  /** Distance between extrapolated nodes; default 6% of the smaller extent */
  nodeSpacing?: number;
  /** Coordinates applied before interpolation, keyed by node id */
  overrides?: Readonly<Record<string, Point>>;
}

export interface InterpolationReport {
  /** Nodes that received coordinates */
  filled: number;
  advisories: Advisory[];
}

const SPACING_FRACTION = 0.06;
const CLAMP_MARGIN_FRACTION = 0.05;

export class GeometryInterpolator {
  private readonly advisories: Advisory[] = [];
  private filled = 0;

  constructor(private readonly network: NodeNetwork) {}

  fill(options: InterpolationOptions = {}): InterpolationReport {
    this.advisories.length = 0;
    this.filled = 0;

    if (options.overrides) this.applyOverrides(options.overrides);

    const extent = options.limits ?? this.network.determineExtent();
    const spacing = options.nodeSpacing ?? defaultSpacing(extent);

    this.fillMainStem(spacing, extent);
    this.fillSideReaches(spacing);
    if (options.limits) this.clamp(options.limits);

    return { filled: this.filled, advisories: [...this.advisories] };
  }

  private note(node: StreamNode | null, message: string): void {
    this.advisories.push(advisory(node?.id ?? null, message));
    this.network.log.warn(node ? `${node.id}: ${message}` : message);
  }

  private place(node: StreamNode, x: number, y: number): void {
    node.setLocation(x, y);
    this.filled++;
  }

  private applyOverrides(overrides: Readonly<Record<string, Point>>): void {
    for (const [id, point] of Object.entries(overrides)) {
      const node = this.network.findNode(id);
      if (!node) {
        this.note(null, `no node "${id}" for location override`);
        continue;
      }
      node.setLocation(point.x, point.y);
    }
  }

  /** Main stem, top to bottom (End last). */
  private mainStem(): StreamNode[] {
    const stem: StreamNode[] = [];
    const head = this.network.head;
    const seen = new Set<StreamNode>();
    for (let node: StreamNode | null = head; node && !seen.has(node); ) {
      seen.add(node);
      stem.push(node);
      node = node.upstream.find((n) => n.reachCounter === head.reachCounter) ?? null;
    }
    return stem.reverse();
  }

  private fillMainStem(spacing: number, extent: Limits | null): void {
    const stem = this.mainStem();
    const anchors = stem.flatMap((node, index) => (node.hasLocation() ? [index] : []));

    if (anchors.length === stem.length) return;

    if (anchors.length === 0) {
      const left = extent?.lx ?? 0;
      const bottom = extent?.by ?? 0;
      this.note(null, "main stem has no located nodes; laying it out from the lower-left corner");
      stem.forEach((node, index) => {
        this.place(node, left + spacing * (index + 1), bottom + spacing * (index + 1));
      });
      return;
    }

    // Interior gaps.
    for (let a = 0; a + 1 < anchors.length; a++) {
      const from = anchors[a];
      const to = anchors[a + 1];
      if (to - from < 2) continue;
      const p0 = pointOf(stem[from]);
      const p1 = pointOf(stem[to]);
      for (let k = from + 1; k < to; k++) {
        const t = (k - from) / (to - from);
        this.place(stem[k], p0.x + (p1.x - p0.x) * t, p0.y + (p1.y - p0.y) * t);
      }
    }

    const first = anchors[0];
    const last = anchors[anchors.length - 1];

    if (anchors.length === 1) {
      const p = pointOf(stem[first]);
      stem.forEach((node, k) => {
        if (k !== first) this.place(node, p.x + spacing * (k - first), p.y + spacing * (k - first));
      });
      return;
    }

    if (first > 0) {
      const p = pointOf(stem[first]);
      const below = pointOf(stem[first + 1]);
      const delta = this.delta(stem[first], p, below, spacing);
      for (let k = first - 1; k >= 0; k--) {
        this.place(stem[k], p.x + delta.x * (first - k), p.y + delta.y * (first - k));
      }
    }

    if (last < stem.length - 1) {
      const p = pointOf(stem[last]);
      const above = pointOf(stem[last - 1]);
      const delta = this.delta(stem[last], p, above, spacing);
      for (let k = last + 1; k < stem.length; k++) {
        this.place(stem[k], p.x + delta.x * (k - last), p.y + delta.y * (k - last));
      }
    }
  }

  /**
   * Step from `other` to `anchor`; zero components fall back to the spacing.
   */
  private delta(anchor: StreamNode, p: Point, other: Point, spacing: number): Point {
    let x = p.x - other.x;
    let y = p.y - other.y;
    if (x === 0 || y === 0) {
      this.note(anchor, "zero extrapolation step replaced by node spacing");
      if (x === 0) x = spacing;
      if (y === 0) y = spacing;
    }
    return { x, y };
  }

  private fillSideReaches(spacing: number): void {
    const nodes = this.network.nodes();

    // Gaps between two located nodes on one downstream chain.
    for (const node of nodes) {
      if (!node.hasLocation()) continue;
      const gap: StreamNode[] = [];
      let below = node.downstream;
      while (below && !below.hasLocation()) {
        gap.push(below);
        below = below.downstream;
      }
      if (!below || gap.length === 0) continue;
      const p0 = pointOf(node);
      const p1 = pointOf(below);
      const steps = gap.length + 1;
      gap.forEach((n, i) => {
        const t = (i + 1) / steps;
        this.place(n, p0.x + (p1.x - p0.x) * t, p0.y + (p1.y - p0.y) * t);
      });
    }

    // Unanchored tops: continue the anchor's own step upstream.
    for (const node of nodes) {
      if (node.hasLocation()) continue;
      const chain: StreamNode[] = [];
      let anchor: StreamNode | null = node;
      while (anchor && !anchor.hasLocation()) {
        chain.push(anchor);
        anchor = anchor.downstream;
      }
      if (!anchor) continue;
      const p = pointOf(anchor);
      const next = anchor.downstream?.location() ?? null;
      const delta = next ? { x: p.x - next.x, y: p.y - next.y } : { x: spacing, y: spacing };
      if (delta.x === 0 && delta.y === 0) {
        delta.x = spacing;
        delta.y = spacing;
      }
      // chain runs top to bottom; the bottom entry sits one step above the anchor
      chain.forEach((n, i) => {
        const steps = chain.length - i;
        this.place(n, p.x + delta.x * steps, p.y + delta.y * steps);
      });
    }
  }

  private clamp(limits: Limits): void {
    const width = limits.rx - limits.lx;
    const height = limits.ty - limits.by;
    const mx = width * CLAMP_MARGIN_FRACTION;
    const my = height * CLAMP_MARGIN_FRACTION;

    for (const node of this.network.nodes()) {
      const p = node.location();
      if (!p) continue;
      let { x, y } = p;
      if (x < limits.lx) x = limits.lx + mx;
      else if (x > limits.rx) x = limits.rx - mx;
      if (y < limits.by) y = limits.by + my;
      else if (y > limits.ty) y = limits.ty - my;
      if (x !== p.x || y !== p.y) {
        this.note(node, `moved from (${p.x}, ${p.y}) to (${x}, ${y}) to stay inside the layout limits`);
        node.setLocation(x, y);
      }
    }
  }
}

function defaultSpacing(extent: Limits | null): number {
  if (!extent) return 1;
  const spacing = Math.min(extent.rx - extent.lx, extent.ty - extent.by) * SPACING_FRACTION;
  return spacing > 0 ? spacing : 1;
}

function pointOf(node: StreamNode): Point {
  return node.location() ?? { x: 0, y: 0 };
}
