/**
 * Common Zod Schemas
 *
 * Validation schemas shared by more than one function.
 */

import { z } from "zod";

/** Caller identity, normalized to lowercase */
export const emailSchema = z.string().trim().toLowerCase().email();

/** Positive integer arriving as a path or query string */
export const idParamSchema = z.coerce.number().int().positive();

export const translationTypeSchema = z.enum(["text", "speech"]);

export const preferenceCategorySchema = z.enum(["ui", "translation", "audio", "general", "privacy"]);

/** Language code or language name, resolved later against the catalog */
export const languageInputSchema = z.string().trim().min(1).max(40);

/** JSON value accepted as a preference */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/** Query-string boolean: "true"/"1"/"yes" */
export const queryBooleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === "boolean" ? value : ["true", "1", "yes"].includes(value.toLowerCase())
  );

export { z };
