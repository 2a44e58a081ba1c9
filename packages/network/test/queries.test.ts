import { describe, it, expect } from "vitest";
import { NodeNetwork } from "../src/core/NodeNetwork.js";
import { ids, loadRecords, node, quiet } from "./fixtures/networks.js";

function basin(treatDryAsNaturalFlow = false): NodeNetwork {
  const built = NodeNetwork.fromRecords(loadRecords("basin.json"), {
    headFirst: false,
    treatDryAsNaturalFlow,
    logger: quiet,
  });
  if (!built.ok) throw built.error;
  return built.value;
}

describe("queries", () => {
  const network = basin();

  it("walks the basin in computational order", () => {
    expect(ids(network.nodes())).toEqual(["G3", "R5", "G2", "D100.01", "X", "G", "END"]);
    expect(network.getMostUpstreamNode().id).toBe("G3");
  });

  describe("lookups", () => {
    it("finds nodes by id ignoring case", () => {
      expect(network.findNode("d100.01")?.id).toBe("D100.01");
      expect(network.findNode("nope")).toBeNull();
    });

    it("finds nodes by description or base id", () => {
      expect(network.findNodeByData("description", "Diversion", "upper ditch")?.id).toBe("D100.01");
      expect(network.findNodeByData("baseId", "Diversion", "D100")?.id).toBe("D100.01");
      expect(network.findNodeByData("baseId", "Reservoir", "D100")).toBeNull();
    });

    it("filters by type and by the real node set", () => {
      expect(ids(network.getNodesForType("Streamflow"))).toEqual(["G3", "G2", "G"]);
      expect(ids(network.getNodesForType("real"))).toEqual(["G3", "R5", "G2", "D100.01", "G"]);
      expect(ids(network.getBaseflowNodes())).toEqual(["G3", "G2", "G"]);
    });

    it("lists structure ids without their suffix", () => {
      expect(network.getNodeIdentifiersByType(["Diversion", "Reservoir"])).toEqual(["R5", "D100"]);
    });

    it("counts nodes per type", () => {
      expect(network.getNodeCounts()).toEqual({
        Streamflow: 3,
        Diversion: 1,
        Reservoir: 1,
        Confluence: 1,
        End: 1,
      });
    });
  });

  describe("flow node searches", () => {
    it("finds the nearest downstream gage", () => {
      expect(network.findDownstreamFlowNode(node(network, "G2"))?.id).toBe("G");
      expect(network.findDownstreamFlowNode(node(network, "G"))).toBeNull();
    });

    it("finds the nearest gage on each upstream branch", () => {
      expect(ids(network.findUpstreamFlowNodes(node(network, "X")))).toEqual(["G2", "G3"]);
      expect(ids(network.findUpstreamFlowNodes(node(network, "END")))).toEqual(["G"]);
    });

    it("searches natural-flow nodes within the reach only", () => {
      expect(network.findDownstreamNaturalFlowNodeInReach(node(network, "G3"))?.id).toBe("G");
      expect(network.findUpstreamNaturalFlowNodeInReach(node(network, "X"))?.id).toBe("G3");
      expect(network.findDownstreamNaturalFlowNodeInReach(node(network, "G2"))).toBeNull();
    });

    it("counts dry-river nodes as natural flow when configured", () => {
      const dry = basin(true);
      expect(dry.findDownstreamNaturalFlowNodeInReach(node(dry, "G3"))?.id).toBe("R5");
      expect(dry.findUpstreamNaturalFlowNodeInReach(node(dry, "X"))?.id).toBe("R5");
    });

    it("finds the next real and cross-confluence nodes downstream", () => {
      expect(network.findNextRealDownstreamNode(node(network, "G2"))?.id).toBe("D100.01");
      expect(network.findNextRealDownstreamNode(node(network, "D100.01"))?.id).toBe("G");
      expect(network.findNextXConfluenceDownstreamNode(node(network, "G2"))).toBeNull();
    });
  });

  describe("findUpstreamNodes", () => {
    const x = node(network, "X");

    it("collects every upstream node depth first", () => {
      expect(ids(network.findUpstreamNodes(x))).toEqual(["D100.01", "G2", "R5", "G3"]);
      expect(ids(network.findUpstreamNodes(x, { includeStart: true }))[0]).toBe("X");
    });

    it("stops at listed ids, dropping those marked with a minus", () => {
      expect(ids(network.findUpstreamNodes(x, { stopIds: ["d100.01"] }))).toEqual(["D100.01", "R5", "G3"]);
      expect(ids(network.findUpstreamNodes(x, { stopIds: ["-R5"] }))).toEqual(["D100.01", "G2"]);
    });
  });

  describe("reach helpers", () => {
    it("identifies the top of each reach", () => {
      expect(network.isMostUpstreamNodeInReach(node(network, "G3"))).toBe(true);
      expect(network.isMostUpstreamNodeInReach(node(network, "G2"))).toBe(true);
      expect(network.isMostUpstreamNodeInReach(node(network, "X"))).toBe(false);
    });

    it("walks to the top of the reach through a multi-branch confluence", () => {
      expect(network.getUpstreamNode(node(network, "G"), "reach")?.id).toBe("G3");
    });
  });

  describe("getNodeSequence", () => {
    it("returns the downstream path between two nodes", () => {
      const path = network.getNodeSequence("G2", "G");
      expect(path.ok).toBe(true);
      if (path.ok) expect(ids(path.value)).toEqual(["G2", "D100.01", "X", "G"]);
    });

    it("rejects a target that is not downstream", () => {
      const path = network.getNodeSequence("G", "G2");
      expect(path.ok).toBe(false);
      if (!path.ok) {
        expect(path.error.code).toBe("INVALID");
        expect(path.error.message).toBe('"G2" is not downstream of "G"');
      }
    });
  });

  describe("determineExtent", () => {
    it("is null without coordinates", () => {
      expect(basin().determineExtent()).toBeNull();
    });

    it("bounds the located nodes", () => {
      const located = basin();
      node(located, "G").setLocation(5, -2);
      node(located, "G3").setLocation(-1, 7);
      expect(located.determineExtent()).toEqual({ lx: -1, by: -2, rx: 5, ty: 7 });
    });
  });
});
