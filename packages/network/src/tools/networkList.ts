/**
 * network_list tool - Nodes in computational order.
 */

import { z } from "zod";
import { jsonResponse, textResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";
import type { NodeTypeFilter } from "../core/model.js";
import { REAL_NODES } from "../core/model.js";
import { NodeTypeSchema } from "../core/schemas.js";

interface ListInput {
  type?: NodeTypeFilter;
  compact?: boolean;
}

export const registerNetworkList: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_list",
    {
      title: "List nodes",
      description:
        "List nodes in computational order. type filters by node type; 'real' keeps physical stations only. " +
        "compact returns one line per node: order serial id TYPE reach.position.",
      inputSchema: {
        type: z.union([NodeTypeSchema, z.literal(REAL_NODES)]).optional().describe("Node type or 'real'"),
        compact: z.boolean().optional().default(false).describe("One line per node"),
      },
    },
    async (input: ListInput) => {
      if (input.compact) {
        return textResponse(service.describeNodes(input.type).join("\n"));
      }
      const nodes = service.listNodes(input.type);
      return jsonResponse({ nodes, total: nodes.length });
    }
  );
};
