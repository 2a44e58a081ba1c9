/**
 * network_rename tool - Change a node id.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";

interface RenameInput {
  id: string;
  newId: string;
}

export const registerNetworkRename: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_rename",
    {
      title: "Rename node",
      description: "Give a node a new id. Fails if the id is already used (ids are case-insensitive).",
      inputSchema: {
        id: z.string().min(1).describe("Current node id"),
        newId: z.string().min(1).describe("New node id"),
      },
    },
    async (input: RenameInput) =>
      resultToResponse(service.renameNode(input.id, input.newId), (node) => jsonResponse({ node }))
  );
};
