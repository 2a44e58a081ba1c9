/**
 * Environment configuration for the network server.
 */

import { z } from "zod";
import type { LogLevel, Result } from "@streamnet/core";
import { Ok, Err, parseLogLevel } from "@streamnet/core";
import type { TributaryOrder } from "./core/model.js";
import { DEFAULT_TRIBUTARY_ORDER } from "./core/model.js";
import { TributaryOrderSchema } from "./core/schemas.js";

export interface NetworkConfig {
  /** Directory under the project root that holds network.json */
  dataDir: string;
  /** Convention for new networks; a saved network keeps its own */
  tributaryOrder: TributaryOrder;
  treatDryAsNaturalFlow: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_DATA_DIR = ".streamnet";

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const flagSchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === "") return false;
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${value}"` });
    return z.NEVER;
  });

const envSchema = z.object({
  STREAMNET_DATA_DIR: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_DATA_DIR)),
  STREAMNET_TRIBUTARY_ORDER: z.preprocess(
    (value) => {
      const cleaned = blankToUndefined(value);
      return typeof cleaned === "string" ? cleaned.trim().toLowerCase() : cleaned;
    },
    TributaryOrderSchema.default(DEFAULT_TRIBUTARY_ORDER)
  ),
  STREAMNET_TREAT_DRY_AS_NATURAL_FLOW: flagSchema,
  STREAMNET_LOG_LEVEL: z.string().optional().transform((value) => parseLogLevel(value)),
});

/**
 * Read configuration from environment variables.
 */
export function loadNetworkConfig(env: Record<string, string | undefined> = process.env): Result<NetworkConfig, string> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return Err(`Invalid configuration: ${details.join("; ")}`);
  }
  const values = parsed.data;
  return Ok({
    dataDir: values.STREAMNET_DATA_DIR,
    tributaryOrder: values.STREAMNET_TRIBUTARY_ORDER,
    treatDryAsNaturalFlow: values.STREAMNET_TREAT_DRY_AS_NATURAL_FLOW,
    logLevel: values.STREAMNET_LOG_LEVEL,
  });
}
