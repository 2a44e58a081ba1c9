/**
 * network_export tool - Computational-order node list with id links.
 */

import { jsonResponse } from "@streamnet/core";
import type { ToolRegistrar } from "./types.js";

export const registerNetworkExport: ToolRegistrar = (server, service) => {
  server.registerTool(
    "network_export",
    {
      title: "Export network",
      description:
        "All nodes in computational order (End last) with type, flags, coordinates, id links and ordering " +
        "numbers. The nodes list can be passed back to network_rebuild.",
      inputSchema: {},
    },
    async () => jsonResponse({ name: service.getSummary().name, nodes: service.exportRecords() })
  );
};
