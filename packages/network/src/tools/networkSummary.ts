/**
 * network_summary tool - Size, convention and node counts.
 */

import { jsonResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";

export const registerNetworkSummary: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_summary",
    {
      title: "Network summary",
      description: "Node count, reach count, tributary convention and counts per node type.",
      inputSchema: {},
    },
    async () => jsonResponse({ ...service.getSummary() })
  );
};
