/**
 * Profile API v1
 *
 * Endpoints:
 * - POST /api-v1-profile/login          - Create-or-get the user, stamp last login
 * - PUT  /api-v1-profile/languages      - Preferred source/target languages
 * - PUT  /api-v1-profile/favorite-pair  - Mark or unmark the favorite language pair
 * - PUT  /api-v1-profile/preferences    - Set one preference
 * - GET  /api-v1-profile/preferences    - All preferences
 *
 * Headers:
 * - x-user-email: <email>
 *
 * @module api-v1-profile
 */

import { createAPIHandler, type HandlerContext, ok, parseBody, requireUser } from "../_shared/api-handler.ts";
import { NotFoundError, ValidationError } from "../_shared/errors.ts";
import { jsonValueSchema, languageInputSchema, preferenceCategorySchema, z } from "../_shared/schemas/common.ts";
import { getServices } from "../_shared/services.ts";

const VERSION = "1.0.0";

// =============================================================================
// Schemas
// =============================================================================

const loginSchema = z.object({
  full_name: z.string().trim().min(1).max(200).optional(),
});

const languagesSchema = z.object({
  source_lang: languageInputSchema.optional(),
  target_lang: languageInputSchema.optional(),
});

const favoritePairSchema = z.object({
  source_lang: languageInputSchema,
  target_lang: languageInputSchema,
  is_favorite: z.boolean().default(true),
});

const preferenceSchema = z.object({
  key: z.string().trim().min(1).max(100),
  value: jsonValueSchema,
  category: preferenceCategorySchema.default("general"),
});

// =============================================================================
// Handlers
// =============================================================================

async function login(ctx: HandlerContext, userEmail: string): Promise<Response> {
  const body = parseBody(loginSchema, ctx);
  return ok(await getServices().profile.login(userEmail, body.full_name), ctx);
}

async function updateLanguages(ctx: HandlerContext, userEmail: string): Promise<Response> {
  const body = parseBody(languagesSchema, ctx);
  if (body.source_lang === undefined && body.target_lang === undefined) {
    throw new ValidationError("Provide source_lang or target_lang");
  }
  const user = await getServices().profile.updateLanguages(userEmail, {
    sourceLanguage: body.source_lang,
    targetLanguage: body.target_lang,
  });
  return ok(user, ctx);
}

async function setFavoritePair(ctx: HandlerContext, userEmail: string): Promise<Response> {
  const body = parseBody(favoritePairSchema, ctx);
  const result = await getServices().profile.setFavoritePair(
    userEmail,
    body.source_lang,
    body.target_lang,
    body.is_favorite,
  );
  return ok(result, ctx);
}

async function setPreference(ctx: HandlerContext, userEmail: string): Promise<Response> {
  const body = parseBody(preferenceSchema, ctx);
  return ok(await getServices().profile.setPreference(userEmail, body.key, body.value, body.category), ctx);
}

async function getPreferences(ctx: HandlerContext, userEmail: string): Promise<Response> {
  const preferences = await getServices().profile.getPreferences(userEmail);
  return ok({ preferences }, ctx);
}

function unknownRoute(ctx: HandlerContext): never {
  throw new NotFoundError("Route", ctx.route.resource || "/");
}

// =============================================================================
// Main Handler
// =============================================================================

export default createAPIHandler({
  service: "api-v1-profile",
  version: VERSION,
  audit: () => getServices().systemLog,
  routes: {
    GET: {
      handler: (ctx) =>
        ctx.route.resource === "preferences" ? getPreferences(ctx, requireUser(ctx)) : unknownRoute(ctx),
    },
    POST: {
      handler: (ctx) => ctx.route.resource === "login" ? login(ctx, requireUser(ctx)) : unknownRoute(ctx),
    },
    PUT: {
      handler: (ctx) => {
        const userEmail = requireUser(ctx);
        switch (ctx.route.resource) {
          case "languages":
            return updateLanguages(ctx, userEmail);
          case "favorite-pair":
            return setFavoritePair(ctx, userEmail);
          case "preferences":
            return setPreference(ctx, userEmail);
          default:
            return unknownRoute(ctx);
        }
      },
    },
  },
});
