/**
 * Register all network MCP tools.
 */

import type { McpServer } from "@streamnet/core";
import type { NetworkService } from "../core/NetworkService.js";

import { registerNetworkSummary } from "./networkSummary.js";
import { registerNetworkInsert } from "./networkInsert.js";
import { registerNetworkDelete } from "./networkDelete.js";
import { registerNetworkRename } from "./networkRename.js";
import { registerNetworkFind } from "./networkFind.js";
import { registerNetworkList } from "./networkList.js";
import { registerNetworkTrace } from "./networkTrace.js";
import { registerNetworkFlowNodes } from "./networkFlowNodes.js";
import { registerNetworkRebuild } from "./networkRebuild.js";
import { registerNetworkExport } from "./networkExport.js";
import { registerNetworkLocate } from "./networkLocate.js";
import { registerNetworkInterpolate } from "./networkInterpolate.js";
import { registerNetworkValidate } from "./networkValidate.js";

export function registerNetworkTools(server: McpServer, service: NetworkService): void {
  registerNetworkSummary(server, service);
  registerNetworkInsert(server, service);
  registerNetworkDelete(server, service);
  registerNetworkRename(server, service);
  registerNetworkFind(server, service);
  registerNetworkList(server, service);
  registerNetworkTrace(server, service);
  registerNetworkFlowNodes(server, service);
  registerNetworkRebuild(server, service);
  registerNetworkExport(server, service);
  registerNetworkLocate(server, service);
  registerNetworkInterpolate(server, service);
  registerNetworkValidate(server, service);
}
