import { describe, it, expect } from "vitest";
import { StreamNode } from "../src/core/StreamNode.js";

function make(id: string): StreamNode {
  return new StreamNode({ id, type: "Streamflow" });
}

describe("StreamNode", () => {
  it("starts unlinked with default flags and no location", () => {
    const n = make("G1");
    expect(n.description).toBe("");
    expect(n.isNaturalFlow).toBe(false);
    expect(n.isImport).toBe(false);
    expect(n.isDryRiver).toBe(false);
    expect(n.downstream).toBeNull();
    expect(n.upstreamCount).toBe(0);
    expect(n.location()).toBeNull();
    expect(n.tributaryNumber).toBe(1);
  });

  it("addUpstreamNode links both directions", () => {
    const d = make("D");
    const u = make("U");
    d.addUpstreamNode(u);
    expect(d.upstreamIds()).toEqual(["U"]);
    expect(u.downstreamId()).toBe("D");
  });

  describe("addDownstreamNode", () => {
    it("splices a node into the slot the caller occupied", () => {
      const d = make("D");
      const u1 = make("U1");
      const u2 = make("U2");
      d.addUpstreamNode(u1);
      d.addUpstreamNode(u2);
      u2.tributaryNumber = 2;

      const n = make("N");
      u2.addDownstreamNode(n);

      expect(d.upstreamIds()).toEqual(["U1", "N"]);
      expect(n.downstream).toBe(d);
      expect(n.upstreamIds()).toEqual(["U2"]);
      expect(n.tributaryNumber).toBe(2);
      expect(u2.downstream).toBe(n);
      expect(u2.tributaryNumber).toBe(1);
    });

    it("attaches below a node that has no downstream neighbour", () => {
      const top = make("TOP");
      const n = make("N");
      top.addDownstreamNode(n);
      expect(n.upstreamIds()).toEqual(["TOP"]);
      expect(top.downstream).toBe(n);
      expect(n.downstream).toBeNull();
    });
  });

  it("clearUpstream leaves the neighbours' own links alone", () => {
    const d = make("D");
    const u = make("U");
    d.addUpstreamNode(u);
    d.clearUpstream();
    expect(d.upstreamCount).toBe(0);
    expect(u.downstream).toBe(d);
    u.setDownstreamNode(null);
    expect(u.downstreamId()).toBeNull();
  });

  it("treats non-finite coordinates as unlocated", () => {
    const n = make("G1");
    n.setLocation(3, Number.NaN);
    expect(n.hasLocation()).toBe(false);
    n.setLocation(3, 4);
    expect(n.location()).toEqual({ x: 3, y: 4 });
  });

  it("exports an id-only record", () => {
    const d = new StreamNode({ id: "D", type: "Diversion", description: "Main ditch", x: 1, y: 2 });
    d.addUpstreamNode(make("U"));
    expect(d.toRecord()).toEqual({
      id: "D",
      type: "Diversion",
      description: "Main ditch",
      isNaturalFlow: false,
      isImport: false,
      isDryRiver: false,
      x: 1,
      y: 2,
      downstreamId: null,
      upstreamIds: ["U"],
    });
  });

  it("formats a one-line description", () => {
    const end = new StreamNode({ id: "END", type: "End" });
    end.addUpstreamNode(make("A"));
    expect(end.toString()).toBe('"END" T=END T#=1 RC=0 N#=1 S#=0 C#=0 DS=- US=[A]');
  });
});
