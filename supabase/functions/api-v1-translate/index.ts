/**
 * Translate API v1
 *
 * The write path: every successful translation becomes one ledger event.
 *
 * Routes:
 * - POST /api-v1-translate           - Translate one text
 * - POST /api-v1-translate/batch     - Translate up to 20 texts under one cooldown
 * - GET  /api-v1-translate/languages - Supported languages (no identity needed)
 *
 * @module api-v1-translate
 */

import { createAPIHandler, type HandlerContext, ok, parseBody, requireUser } from "../_shared/api-handler.ts";
import { addMetadata } from "../_shared/context.ts";
import { NotFoundError } from "../_shared/errors.ts";
import { languageInputSchema, translationTypeSchema, z } from "../_shared/schemas/common.ts";
import { getServices } from "../_shared/services.ts";
import { type BatchItemResult, MAX_BATCH_SIZE, type TranslateResult } from "../_shared/translation/gateway.ts";

const VERSION = "1.0.0";

// =============================================================================
// Schemas
// =============================================================================

const translateSchema = z.object({
  text: z.string(),
  source_lang: languageInputSchema.default("auto"),
  target_lang: languageInputSchema,
  type: translationTypeSchema.default("text"),
});

const batchSchema = z.object({
  texts: z.array(z.string()).min(1).max(MAX_BATCH_SIZE),
  source_lang: languageInputSchema.default("auto"),
  target_lang: languageInputSchema,
  type: translationTypeSchema.default("text"),
});

// =============================================================================
// Views
// =============================================================================

function toTranslationView(result: TranslateResult) {
  return {
    event_id: result.eventId,
    translated_text: result.translatedText,
    source_language: result.sourceLanguage,
    target_language: result.targetLanguage,
    character_count: result.characterCount,
    elapsed_ms: result.elapsedMs,
    confidence: result.confidence,
    attempts: result.attempts,
  };
}

function toBatchItemView(item: BatchItemResult) {
  if (!item.ok) {
    return { index: item.index, original_text: item.originalText, error: item.error, code: item.code };
  }
  return { index: item.index, original_text: item.originalText, ...toTranslationView(item) };
}

// =============================================================================
// Handlers
// =============================================================================

async function handleTranslate(ctx: HandlerContext): Promise<Response> {
  const userEmail = requireUser(ctx);
  const body = parseBody(translateSchema, ctx);
  addMetadata("source_lang", body.source_lang);
  addMetadata("target_lang", body.target_lang);

  const result = await getServices().gateway.translate({
    userEmail,
    text: body.text,
    sourceLanguage: body.source_lang,
    targetLanguage: body.target_lang,
    type: body.type,
    ipAddress: ctx.origin.ipAddress,
    userAgent: ctx.origin.userAgent,
  });
  addMetadata("event_id", result.eventId);
  addMetadata("attempts", result.attempts);

  return ok(toTranslationView(result), ctx);
}

async function handleBatch(ctx: HandlerContext): Promise<Response> {
  const userEmail = requireUser(ctx);
  const body = parseBody(batchSchema, ctx);
  addMetadata("batch_size", body.texts.length);

  const result = await getServices().gateway.translateBatch({
    userEmail,
    texts: body.texts,
    sourceLanguage: body.source_lang,
    targetLanguage: body.target_lang,
    type: body.type,
    ipAddress: ctx.origin.ipAddress,
    userAgent: ctx.origin.userAgent,
  });
  addMetadata("succeeded", result.succeeded);

  return ok({
    results: result.results.map(toBatchItemView),
    succeeded: result.succeeded,
    failed: result.failed,
  }, ctx);
}

function handlePost(ctx: HandlerContext): Promise<Response> {
  switch (ctx.route.resource) {
    case "":
      return handleTranslate(ctx);
    case "batch":
      return handleBatch(ctx);
    default:
      throw new NotFoundError("Route", ctx.route.resource);
  }
}

function handleGet(ctx: HandlerContext): Promise<Response> {
  if (ctx.route.resource !== "languages") {
    throw new NotFoundError("Route", ctx.route.resource || "/");
  }
  const languages = getServices().languages.list();
  return Promise.resolve(ok({ languages, count: languages.length }, ctx));
}

// =============================================================================
// Main Handler
// =============================================================================

export default createAPIHandler({
  service: "api-v1-translate",
  version: VERSION,
  audit: () => getServices().systemLog,
  routes: {
    POST: { handler: handlePost },
    GET: { handler: handleGet, requireIdentity: false },
  },
});
