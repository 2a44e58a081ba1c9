/**
 * network_delete tool - Remove a node, reattaching its upstream nodes.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";

interface DeleteInput {
  id: string;
}

export const registerNetworkDelete: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_delete",
    {
      title: "Delete node",
      description:
        "Delete a node. Its upstream nodes drain directly to its downstream node. Deleting the End node does nothing.",
      inputSchema: {
        id: z.string().min(1).describe("Node id"),
      },
    },
    async (input: DeleteInput) =>
      resultToResponse(service.deleteNode(input.id), (deleted) => jsonResponse({ ...deleted }))
  );
};
