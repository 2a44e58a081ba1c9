import { describe, it, expect } from "vitest";
import { StructuralError } from "@streamnet/core";
import { NodeNetwork } from "../src/core/NodeNetwork.js";
import type { NodeRecord, TributaryOrder } from "../src/core/model.js";
import { chainAB, node, quiet, recordingLogger } from "./fixtures/networks.js";

/** End <- A, A upstream [B, C], C upstream [D]; End last */
function records(): NodeRecord[] {
  return [
    { id: "D", type: "Streamflow", downstreamId: "C", upstreamIds: [] },
    { id: "C", type: "Diversion", downstreamId: "A", upstreamIds: ["D"] },
    { id: "B", type: "Reservoir", downstreamId: "A", upstreamIds: [] },
    { id: "A", type: "Confluence", downstreamId: "END", upstreamIds: ["B", "C"] },
    { id: "END", type: "End", upstreamIds: ["A"] },
  ];
}

function build(input: NodeRecord[], order: TributaryOrder = "added-first", headFirst = false): NodeNetwork {
  const built = NodeNetwork.fromRecords(input, { headFirst, tributaryOrder: order, logger: quiet });
  if (!built.ok) throw built.error;
  return built.value;
}

function table(network: NodeNetwork): Record<string, number[]> {
  const rows: Record<string, number[]> = {};
  for (const n of network.nodes()) {
    rows[n.id] = [n.serial, n.computationalOrder, n.reachCounter, n.nodeInReachNumber, n.tributaryNumber];
  }
  return rows;
}

function rebuildError(input: NodeRecord[], headFirst = false): string {
  const network = new NodeNetwork({ logger: quiet });
  const result = network.rebuild(input, headFirst);
  if (result.ok) return "";
  expect(result.error).toBeInstanceOf(StructuralError);
  return result.error.message;
}

describe("rebuild", () => {
  it("numbers an added-first network", () => {
    const network = build(records());
    expect(table(network)).toEqual({
      D: [5, 1, 1, 4, 1],
      C: [4, 2, 1, 3, 2],
      B: [3, 3, 2, 1, 1],
      A: [2, 4, 1, 2, 1],
      END: [1, 5, 1, 1, 1],
    });
    expect(network.validate()).toEqual([]);
  });

  it("numbers an added-last network", () => {
    const network = build(records(), "added-last");
    expect(table(network)).toEqual({
      B: [5, 1, 1, 3, 1],
      D: [4, 2, 2, 2, 1],
      C: [3, 3, 2, 1, 2],
      A: [2, 4, 1, 2, 1],
      END: [1, 5, 1, 1, 1],
    });
  });

  it("accepts the End node first with headFirst", () => {
    const network = build([...records()].reverse(), "added-first", true);
    expect(table(network)).toEqual(table(build(records())));
  });

  it("reproduces every ordering number from its own export", () => {
    for (const order of ["added-first", "added-last"] as const) {
      const first = build(records(), order);
      const second = build(first.exportRecords(), order);
      expect(second.exportRecords()).toEqual(first.exportRecords());
    }
  });

  it("keeps links, flags and coordinates", () => {
    const input = records();
    input[0] = { ...input[0], description: "Upper gage", isNaturalFlow: true, x: 4, y: 8 };
    const d = node(build(input), "D");
    expect(d.description).toBe("Upper gage");
    expect(d.isNaturalFlow).toBe(true);
    expect(d.location()).toEqual({ x: 4, y: 8 });
    expect(d.downstreamId()).toBe("C");
  });

  it("skips unknown upstream ids with a warning", () => {
    const { log, lines } = recordingLogger("warn");
    const input = records();
    input[3] = { ...input[3], upstreamIds: ["B", "GHOST", "C"] };
    const built = NodeNetwork.fromRecords(input, { headFirst: false, logger: log });
    expect(built.ok).toBe(true);
    if (built.ok) expect(node(built.value, "A").upstreamIds()).toEqual(["B", "C"]);
    expect(lines).toEqual(['[test] WARN skipping unknown upstream id "GHOST" of "A"']);
  });

  describe("structural errors", () => {
    it("rejects an empty list", () => {
      expect(rebuildError([])).toBe("cannot rebuild a network from an empty node list");
    });

    it("expects the End node at the chosen end of the list", () => {
      expect(rebuildError([...records()].reverse())).toBe('expected the End node last in the list, found "D"');
      expect(rebuildError(records(), true)).toBe('expected the End node first in the list, found "D"');
    });

    it("rejects duplicate ids ignoring case", () => {
      const input = records();
      input[2] = { ...input[2], id: "d" };
      expect(rebuildError(input)).toBe('duplicate node id "D"');
    });

    it("rejects a second End node", () => {
      const input = records();
      input[2] = { id: "E2", type: "End", downstreamId: "A", upstreamIds: [] };
      expect(rebuildError(input)).toBe('second End node "E2"');
    });

    it("rejects missing and unknown downstream ids", () => {
      const missing = records();
      missing[2] = { ...missing[2], downstreamId: null };
      expect(rebuildError(missing)).toBe('"B" has no downstream node');

      const unknown = records();
      unknown[2] = { ...unknown[2], downstreamId: "Q" };
      expect(rebuildError(unknown)).toBe('downstream node "Q" of "B" is not in the list');
    });

    it("rejects upstream lists that contradict downstream ids", () => {
      const input = records();
      input[4] = { ...input[4], upstreamIds: ["A", "B"] };
      expect(rebuildError(input)).toBe('"B" is listed upstream of "END" but drains to "A"');
    });

    it("rejects an upstream entry listed twice", () => {
      const input = records();
      input[1] = { ...input[1], upstreamIds: ["D", "d"] };
      expect(rebuildError(input)).toBe('"d" is listed twice upstream of "C"');
    });

    it("rejects a node no upstream list reaches", () => {
      const input = records();
      input[3] = { ...input[3], upstreamIds: ["C"] };
      expect(rebuildError(input)).toBe('"B" is not connected to "END"');
    });

    it("leaves the current network in place", () => {
      const network = chainAB();
      const before = network.exportRecords();
      expect(network.rebuild([], false).ok).toBe(false);
      expect(network.exportRecords()).toEqual(before);
    });
  });
});
