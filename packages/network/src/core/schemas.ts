/**
 * Zod schemas shared by storage and the tool layer.
 */

import { z } from "zod";
import { NODE_TYPES, lookupNodeType } from "./model.js";

/** Accepts a type name, abbreviation, file code or label in any case. */
export const NodeTypeSchema = z.preprocess(
  (value) => (typeof value === "string" ? (lookupNodeType(value) ?? value) : value),
  z.enum(NODE_TYPES)
);

export const TributaryOrderSchema = z.enum(["added-first", "added-last"]);

export const PositionSchema = z.enum(["relative", "absolute", "reach", "computational"]);

export const PointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export const LimitsSchema = z
  .object({
    lx: z.number(),
    by: z.number(),
    rx: z.number(),
    ty: z.number(),
  })
  .refine((limits) => limits.rx > limits.lx && limits.ty > limits.by, {
    message: "limits must have rx > lx and ty > by",
  });

export const NodeRecordSchema = z.object({
  id: z.string().min(1),
  type: NodeTypeSchema,
  description: z.string().optional(),
  isNaturalFlow: z.boolean().optional(),
  isImport: z.boolean().optional(),
  isDryRiver: z.boolean().optional(),
  x: z.number().nullable().optional(),
  y: z.number().nullable().optional(),
  downstreamId: z.string().nullable().optional(),
  upstreamIds: z.array(z.string()),
});

export const StoredNodeRecordSchema = NodeRecordSchema.extend({
  serial: z.number().int().positive().optional(),
  reachCounter: z.number().int().positive().optional(),
  nodeInReachNumber: z.number().int().positive().optional(),
});
