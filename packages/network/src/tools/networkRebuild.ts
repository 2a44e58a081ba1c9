/**
 * network_rebuild tool - Replace the network from a flat node list.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";
import type { NodeRecord } from "../core/model.js";
import { NodeRecordSchema } from "../core/schemas.js";

interface RebuildInput {
  nodes: NodeRecord[];
  headFirst?: boolean;
  name?: string;
}

export const registerNetworkRebuild: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_rebuild",
    {
      title: "Rebuild network",
      description:
        "Replace the network with one built from nodes linked by downstreamId/upstreamIds. The End node " +
        "must come last (or first with headFirst). Ordering numbers are recomputed. Nothing changes on error.",
      inputSchema: {
        nodes: z.array(NodeRecordSchema).min(1).describe("Nodes with id links"),
        headFirst: z.boolean().optional().default(false).describe("End node is first in the list"),
        name: z.string().optional().describe("Network name"),
      },
    },
    async (input: RebuildInput) =>
      resultToResponse(service.rebuild(input.nodes, input.headFirst ?? false, input.name), (summary) =>
        jsonResponse({ ...summary })
      )
  );
};
