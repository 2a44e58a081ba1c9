/**
 * network_validate tool - Check structural invariants.
 */

import { jsonResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";

export const registerNetworkValidate: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_validate",
    {
      title: "Validate network",
      description: "Check tree shape, adjacency, tributary positions and serial/computational numbering.",
      inputSchema: {},
    },
    async () => {
      const problems = service.validate();
      return jsonResponse({ valid: problems.length === 0, problems });
    }
  );
};
