/**
 * network_flow_nodes tool - Gages and natural-flow nodes around a node.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";

interface FlowNodesInput {
  id: string;
}

export const registerNetworkFlowNodes: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_flow_nodes",
    {
      title: "Flow nodes",
      description:
        "For a node: the nearest downstream gage, the nearest gage on each upstream branch, and the " +
        "nearest natural-flow nodes above and below it within its reach.",
      inputSchema: {
        id: z.string().min(1).describe("Node id"),
      },
    },
    async (input: FlowNodesInput) =>
      resultToResponse(service.flowNodes(input.id), (flow) => jsonResponse({ ...flow }))
  );
};
