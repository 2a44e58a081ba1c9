#!/usr/bin/env node
/**
 * Stream network MCP server.
 * Edits and queries the node network stored in the working directory.
 */

import { createLogger, runServer } from "@streamnet/core";
import { loadNetworkConfig } from "./config.js";
import { NetworkService } from "./core/NetworkService.js";
import { registerNetworkTools } from "./tools/registerTools.js";

interface Services {
  network: NetworkService;
}

runServer<Services>({
  config: {
    name: "streamnet:network",
    version: "0.1.0",
  },
  createServices: () => {
    const config = loadNetworkConfig();
    if (!config.ok) throw new Error(config.error);
    const log = createLogger("network", { level: config.value.logLevel });
    const network = NetworkService.open(process.cwd(), config.value, log);
    if (!network.ok) throw new Error(network.error);
    return { network: network.value };
  },
  registerTools: (server, services) => {
    registerNetworkTools(server, services.network);
  },
});
