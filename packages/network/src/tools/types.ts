/**
 * Shared types for network tool registration.
 */

import type { McpServer } from "@streamnet/core";
import type { NetworkService } from "../core/NetworkService.js";

export interface ToolRegistrar {
  (server: McpServer, service: NetworkService): void;
}
