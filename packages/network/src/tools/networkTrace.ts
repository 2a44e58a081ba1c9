/**
 * network_trace tool - Traversal step or downstream path.
 */

import { z } from "zod";
import { errorResponse, jsonResponse, resultToResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";
import type { Position } from "../core/model.js";
import type { Direction } from "../core/NetworkService.js";
import { PositionSchema } from "../core/schemas.js";

interface TraceInput {
  id: string;
  direction?: Direction;
  position?: Position;
  toId?: string;
}

export const registerNetworkTrace: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_trace",
    {
      title: "Trace network",
      description:
        "From node id, take one step in direction using a position mode (relative: neighbour; absolute: " +
        "network extreme; reach: end of the reach; computational: next/previous in computational order). " +
        "With toId, return the downstream path from id to toId instead.",
      inputSchema: {
        id: z.string().min(1).describe("Start node id"),
        direction: z.enum(["upstream", "downstream"]).optional().default("downstream").describe("Direction"),
        position: PositionSchema.optional().default("relative").describe("Position mode"),
        toId: z.string().optional().describe("End of a downstream path"),
      },
    },
    async (input: TraceInput) => {
      if (input.toId) {
        return resultToResponse(service.sequence(input.id, input.toId), (path) => jsonResponse({ path }));
      }
      const result = service.step(input.id, input.direction ?? "downstream", input.position ?? "relative");
      if (result.ok && !result.value) {
        return errorResponse(`"${input.id}" has no upstream neighbour`);
      }
      return resultToResponse(result, (node) => jsonResponse({ node }));
    }
  );
};
