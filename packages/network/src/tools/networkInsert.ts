/**
 * network_insert tool - Add a node above an existing one.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";
import type { NodeType } from "../core/model.js";
import { NodeTypeSchema } from "../core/schemas.js";

interface InsertInput {
  id: string;
  type: NodeType;
  downstreamId: string;
  upstreamId?: string;
  description?: string;
  isNaturalFlow?: boolean;
  isImport?: boolean;
  isDryRiver?: boolean;
}

export const registerNetworkInsert: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_insert",
    {
      title: "Insert node",
      description:
        "Insert a node upstream of downstreamId. With upstreamId (an existing upstream neighbour of " +
        "downstreamId) the node is spliced between the two; otherwise it starts a new branch. " +
        "A taken id gets a _<n> suffix and a warning.",
      inputSchema: {
        id: z.string().min(1).describe("New node id"),
        type: NodeTypeSchema.describe("Node type, or its code or abbreviation (FLOW, DIV, RES)"),
        downstreamId: z.string().min(1).describe("Node the new node drains to"),
        upstreamId: z.string().optional().describe("Existing upstream neighbour to splice above"),
        description: z.string().optional().describe("Free text description"),
        isNaturalFlow: z.boolean().optional().describe("Flow is estimated rather than measured"),
        isImport: z.boolean().optional().describe("Imports water from outside the network"),
        isDryRiver: z.boolean().optional().describe("Node is on a dry river segment"),
      },
    },
    async (input: InsertInput) =>
      resultToResponse(service.insertNode(input), (inserted) => jsonResponse({ ...inserted }))
  );
};
