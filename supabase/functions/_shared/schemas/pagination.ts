/**
 * Pagination Zod Schemas
 *
 * Page-number pagination query params (strings from the query string).
 */

import { z } from "zod";

export const pageQuerySchema = z.object({
  page: z.string().regex(/^\d+$/, "page must be a positive integer").optional(),
  per_page: z.string().regex(/^\d+$/, "per_page must be a positive integer").optional(),
});

export const limitQuerySchema = z.object({
  limit: z.string().regex(/^\d+$/, "limit must be a positive integer").optional(),
});
