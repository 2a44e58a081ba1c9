import { describe, it, expect } from "vitest";
import { StructuralError } from "@streamnet/core";
import { StreamNode } from "../src/core/StreamNode.js";
import {
  absoluteDownstream,
  absoluteUpstream,
  computationalDownstream,
  computationalUpstream,
  getDownstreamNode,
  getUpstreamNode,
  pathToHead,
  reachDownstream,
  reachUpstream,
  walkComputational,
} from "../src/core/traversal.js";
import { chainAB, forkABC, ids, insertAll, newNetwork, node } from "./fixtures/networks.js";

describe("traversal", () => {
  describe("added-first", () => {
    const network = forkABC("added-first");
    const end = node(network, "END");
    const a = node(network, "A");
    const b = node(network, "B");
    const c = node(network, "C");

    it("walks the last-added branch first", () => {
      expect(ids(walkComputational(end, "added-first"))).toEqual(["C", "B", "A", "END"]);
    });

    it("steps computationally downstream from the first-added branch to the confluence", () => {
      expect(computationalDownstream(c, "added-first")).toBe(b);
      expect(computationalDownstream(b, "added-first")).toBe(a);
      expect(computationalDownstream(a, "added-first")).toBe(end);
      expect(computationalDownstream(end, "added-first")).toBe(end);
    });

    it("steps computationally upstream as the inverse", () => {
      expect(computationalUpstream(end, "added-first")).toBe(a);
      expect(computationalUpstream(a, "added-first")).toBe(b);
      expect(computationalUpstream(b, "added-first")).toBe(c);
      expect(computationalUpstream(c, "added-first")).toBe(c);
    });

    it("follows the last upstream entry to the absolute top", () => {
      expect(absoluteUpstream(end, "added-first")).toBe(c);
      expect(absoluteDownstream(c)).toBe(end);
    });

    it("relative upstream picks the primary branch and returns null at a leaf", () => {
      expect(getUpstreamNode(end, "relative", "added-first")).toBe(a);
      expect(getUpstreamNode(a, "relative", "added-first")).toBe(c);
      expect(getUpstreamNode(b, "relative", "added-first")).toBeNull();
      expect(getDownstreamNode(end, "relative", "added-first")).toBe(end);
    });
  });

  describe("added-last", () => {
    const network = forkABC("added-last");
    const end = node(network, "END");
    const a = node(network, "A");
    const b = node(network, "B");
    const c = node(network, "C");

    it("walks the first-added branch first", () => {
      expect(ids(walkComputational(c, "added-last"))).toEqual(["B", "C", "A", "END"]);
    });

    it("moves across to the later sibling before the confluence", () => {
      expect(computationalDownstream(b, "added-last")).toBe(c);
      expect(computationalDownstream(c, "added-last")).toBe(a);
      expect(computationalUpstream(a, "added-last")).toBe(c);
      expect(computationalUpstream(c, "added-last")).toBe(b);
    });

    it("follows the first upstream entry to the absolute top", () => {
      expect(absoluteUpstream(end, "added-last")).toBe(b);
    });
  });

  describe("reach walks", () => {
    it("reachDownstream stops at the first node of the reach", () => {
      const network = forkABC();
      expect(reachDownstream(node(network, "C")).id).toBe("C");
      expect(reachDownstream(node(network, "B")).id).toBe("END");
    });

    it("reachUpstream stays on the reach", () => {
      const network = forkABC();
      expect(reachUpstream(node(network, "END")).id).toBe("B");
      expect(reachUpstream(node(network, "C")).id).toBe("C");
    });

    it("reachUpstream stops at a confluence with a single upstream entry", () => {
      const network = newNetwork();
      insertAll(network, [
        ["K", "END", "Confluence"],
        ["L", "K"],
      ]);
      expect(reachUpstream(node(network, "END")).id).toBe("K");
    });
  });

  it("pathToHead lists the downstream path", () => {
    const network = forkABC();
    expect(ids(pathToHead(node(network, "B")))).toEqual(["B", "A", "END"]);
  });

  it("getDownstreamNode dispatches on position", () => {
    const network = chainAB();
    const b = node(network, "B");
    expect(getDownstreamNode(b, "relative", "added-first").id).toBe("A");
    expect(getDownstreamNode(b, "absolute", "added-first").id).toBe("END");
    expect(getDownstreamNode(b, "reach", "added-first").id).toBe("END");
    expect(getDownstreamNode(b, "computational", "added-first").id).toBe("A");
  });

  describe("malformed graphs", () => {
    it("raises StructuralError on a downstream cycle", () => {
      const p = new StreamNode({ id: "P", type: "Streamflow" });
      const q = new StreamNode({ id: "Q", type: "Streamflow" });
      p.addUpstreamNode(q);
      q.addUpstreamNode(p);
      expect(() => absoluteDownstream(p)).toThrow(StructuralError);
    });

    it("raises StructuralError when a tributary number disagrees with its slot", () => {
      const network = forkABC();
      const b = node(network, "B");
      b.tributaryNumber = 2;
      expect(() => computationalDownstream(b, "added-first")).toThrow(StructuralError);
    });
  });
});
