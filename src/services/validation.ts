/**
 * Input validation schemas for SearchService
 */

import { z } from "zod";

/**
 * Search input
 *
 * - query: 1-1000 characters after trimming
 * - limit: integer 1-50, default 5
 * - namespace / repoUrl: optional scope; namespace wins when both are given
 */
export const SearchQuerySchema = z
  .object({
    query: z
      .string()
      .trim()
      .min(1, "Query must not be empty")
      .max(1000, "Query must not exceed 1000 characters"),

    limit: z
      .number()
      .int("Limit must be an integer")
      .min(1, "Limit must be at least 1")
      .max(50, "Limit must not exceed 50")
      .default(5),

    namespace: z.string().trim().min(1, "Namespace must not be empty").optional(),

    repoUrl: z.string().trim().min(1, "Repository URL must not be empty").optional(),
  })
  .strict();

export type ValidatedSearchQuery = z.infer<typeof SearchQuerySchema>;
