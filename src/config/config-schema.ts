import { z } from "zod";
import { isLogger } from "../interfaces/logger.js";

/** Upper bound on slots; storage is allocated and filled eagerly at construction. */
export const MAX_CAPACITY = 2 ** 24;

export const capacitySchema = z.number().int().min(1).max(MAX_CAPACITY);

export const ringBufferOptionsSchema = z
  .object({
    fill: z.unknown().optional(),
    logger: z.unknown().refine((v) => v === undefined || isLogger(v), "must implement Logger"),
  })
  .strict();
