/**
 * Network storage - JSON file persistence.
 * Stores the exported node list in <dataDir>/network.json under the project root.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import type { Result } from "@streamnet/core";
import { Ok, Err, errorMessage } from "@streamnet/core";
import type { StoredNodeRecord, TributaryOrder } from "./model.js";
import { StoredNodeRecordSchema, TributaryOrderSchema } from "./schemas.js";

const NETWORK_FILE = "network.json";
export const NETWORK_FILE_VERSION = 1;

/**
 * On-disk form: nodes in computational order, End last. Serial and reach
 * numbers are optional; files without them are renumbered on load.
 */
export interface NetworkFile {
  version: typeof NETWORK_FILE_VERSION;
  name: string;
  tributaryOrder: TributaryOrder;
  treatDryAsNaturalFlow: boolean;
  nodes: StoredNodeRecord[];
}

const networkFileSchema = z.object({
  version: z.literal(NETWORK_FILE_VERSION),
  name: z.string(),
  tributaryOrder: TributaryOrderSchema,
  treatDryAsNaturalFlow: z.boolean(),
  nodes: z.array(StoredNodeRecordSchema),
});

export function getNetworkPath(projectPath: string, dataDir: string): string {
  return join(projectPath, dataDir, NETWORK_FILE);
}

export function networkFileExists(projectPath: string, dataDir: string): boolean {
  return existsSync(getNetworkPath(projectPath, dataDir));
}

/**
 * Load the network file. Ok(null) when there is none yet.
 */
export function loadNetworkFile(projectPath: string, dataDir: string): Result<NetworkFile | null, string> {
  const path = getNetworkPath(projectPath, dataDir);
  if (!existsSync(path)) return Ok(null);

  let content: unknown;
  try {
    content = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    return Err(`Cannot read ${path}: ${errorMessage(error)}`);
  }

  const parsed = networkFileSchema.safeParse(content);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
    return Err(`Invalid network file ${path}${where}: ${first.message}`);
  }
  return Ok(parsed.data);
}

/**
 * Save the network file.
 * Writes to a temp file and renames it over the old one.
 */
export function saveNetworkFile(projectPath: string, dataDir: string, file: NetworkFile): void {
  const dir = join(projectPath, dataDir);
  const path = getNetworkPath(projectPath, dataDir);
  const tempPath = `${path}.tmp`;

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(tempPath, JSON.stringify(file, null, 2), "utf-8");
  renameSync(tempPath, path);
}
