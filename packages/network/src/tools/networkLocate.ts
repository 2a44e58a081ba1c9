/**
 * network_locate tool - Set node coordinates directly.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";
import type { Point } from "../core/model.js";
import { PointSchema } from "../core/schemas.js";

interface LocateInput {
  locations: Record<string, Point>;
}

export const registerNetworkLocate: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_locate",
    {
      title: "Locate nodes",
      description: "Set x/y for nodes, keyed by node id. All ids must exist.",
      inputSchema: {
        locations: z.record(z.string(), PointSchema).describe("Node id to {x, y}"),
      },
    },
    async (input: LocateInput) =>
      resultToResponse(service.setLocations(input.locations), (updated) => jsonResponse({ updated }))
  );
};
