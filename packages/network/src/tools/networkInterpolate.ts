/**
 * network_interpolate tool - Fill in missing coordinates.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";
import type { Limits, Point } from "../core/model.js";
import { LimitsSchema, PointSchema } from "../core/schemas.js";

interface InterpolateInput {
  limits?: Limits;
  nodeSpacing?: number;
  overrides?: Record<string, Point>;
}

export const registerNetworkInterpolate: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_interpolate",
    {
      title: "Interpolate locations",
      description:
        "Give every unlocated node coordinates: interpolate along the main stem, extrapolate its ends and " +
        "each side reach. overrides are applied first. With limits, nodes outside the rectangle are moved " +
        "inside. Returns the number of nodes filled and any advisories.",
      inputSchema: {
        limits: LimitsSchema.optional().describe("Layout rectangle {lx, by, rx, ty}"),
        nodeSpacing: z.number().positive().optional().describe("Step between extrapolated nodes"),
        overrides: z.record(z.string(), PointSchema).optional().describe("Node id to {x, y}, applied first"),
      },
    },
    async (input: InterpolateInput) =>
      resultToResponse(service.interpolate(input), (report) => jsonResponse({ ...report }))
  );
};
