/**
 * Zod runtime schemas for the key service wire types.
 *
 * @see wire.ts for the TypeScript types these mirror.
 */

import { z } from "zod";
import type { ApiErrorBody } from "./wire.js";

export const PortSchema = z.number().int().min(1).max(65535);

export const ApiErrorBodySchema: z.ZodType<ApiErrorBody> = z.object({
  message: z.string(),
  detail: z.string().nullable().optional(),
});
