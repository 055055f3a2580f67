/**
 * Request body schemas for the API routes.
 */

import { z } from "zod";

export const extractRequestSchema = z.object({
  image: z.string().min(1, "Image is required"),
  // "name, email" from the form field, or an array from API clients
  columns: z.union([z.string(), z.array(z.string())]).optional(),
  instructions: z.string().max(4000, "Instructions are too long").optional(),
  model: z.string().trim().min(1).optional(),
  threshold: z.number().min(0).max(1).optional(),
});

export type ExtractRequestBody = z.infer<typeof extractRequestSchema>;

export const saveRequestSchema = z.object({
  table: z.object({
    headers: z.array(z.string().trim().min(1, "Column names cannot be blank")).min(1, "At least one column is required"),
    rows: z.array(
      z.object({
        cells: z.array(z.object({ value: z.string() })),
      })
    ),
  }),
});

export type SaveRequestBody = z.infer<typeof saveRequestSchema>;
