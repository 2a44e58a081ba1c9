/**
 * network_find tool - Look up a node by id, or by type and description.
 */

import { z } from "zod";
import { errorResponse, jsonResponse, resultToResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";
import type { NodeType } from "../core/model.js";
import { NodeTypeSchema } from "../core/schemas.js";

interface FindInput {
  id?: string;
  type?: NodeType;
  description?: string;
  baseId?: string;
}

export const registerNetworkFind: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_find",
    {
      title: "Find node",
      description:
        "Find a node by id (case-insensitive). Without id, find the first node of `type` whose " +
        "description or base id (text before the first '.') matches.",
      inputSchema: {
        id: z.string().optional().describe("Node id"),
        type: NodeTypeSchema.optional().describe("Node type, required when searching by description or baseId"),
        description: z.string().optional().describe("Description to match"),
        baseId: z.string().optional().describe("Structure id without its .suffix"),
      },
    },
    async (input: FindInput) => {
      if (input.id) {
        return resultToResponse(service.getNode(input.id), (node) => jsonResponse({ node }));
      }
      if (!input.type) {
        return errorResponse("Provide id, or type with description or baseId");
      }
      const network = service.getNetwork();
      const found =
        input.description !== undefined
          ? network.findNodeByData("description", input.type, input.description)
          : input.baseId !== undefined
            ? network.findNodeByData("baseId", input.type, input.baseId)
            : null;
      if (!found) {
        return errorResponse(`No ${input.type} node matches`);
      }
      return jsonResponse({ node: found.toSnapshot() });
    }
  );
};
