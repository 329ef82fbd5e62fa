/**
 * initex – Node integration / extractionMiddleware
 *
 * A small, framework-agnostic handler exposing the extractor over HTTP.
 * It works with Express, with raw `http.Server` (after the body has been
 * parsed) and with anything shaped like `(req, res, next)`.
 *
 *  Request body (JSON):
 *    {
 *      "operation": "entryList",
 *      "source": "EVOLUTION({EVO_LEVEL, 16, SPECIES_IVYSAUR})"
 *    }
 *
 *  Response (JSON):
 *    {
 *      "ok": true,
 *      "result": [{ "method": "EVO_LEVEL", "parameter": "16",
 *                   "target": "SPECIES_IVYSAUR", "conditions": [] }],
 *      "skipped": [],
 *      "diagnostics": []
 *    }
 *
 *  On error:
 *    {
 *      "ok": false,
 *      "error": {
 *        "code": "E_PARSE",
 *        "message": "unclosed brace group",
 *        "decoder": "entryList",
 *        "fragment": "{EVO_LEVEL, 16"
 *      }
 *    }
 *
 * License: Apache-2.0
 */

import { createExtractor } from '../../core/extractor';
import type { Extractor, ExtractorOptions } from '../../core/extractor';
import { isExtractorError } from '../../core/errors';
import type { ExtractionDiagnostic, SkippedEntry } from '../../core/types';

//////////////////////
// Public interfaces //
//////////////////////

export const EXTRACTION_OPERATIONS = ['evaluate', 'entries', 'species', 'entryList'] as const;

export type ExtractionOperation = (typeof EXTRACTION_OPERATIONS)[number];

export interface ExtractionRequestPayload {
  operation: ExtractionOperation;
  source: string;
}

export interface WireSkippedEntry {
  key: string;
  reason: SkippedEntry['reason'];
  index: number;
  /**
   * Message of the underlying error, when there is one.
   */
  cause?: string;
}

export interface ExtractionResponse<Result = unknown> {
  ok: boolean;
  result?: Result;
  skipped?: WireSkippedEntry[];
  diagnostics?: ExtractionDiagnostic[];
  error?: {
    code: string;
    message: string;
    decoder?: string;
    fragment?: string;
    line?: number;
    column?: number;
    snippet?: string;
    note?: string;
  };
}

/**
 * The parts of a request the middleware reads. Express requests and parsed
 * `http.IncomingMessage`s both fit.
 */
export interface MiddlewareRequest {
  method?: string;
  body?: unknown;
}

/**
 * The parts of a response the middleware writes: Express-style
 * `status().json()` when available, `statusCode`/`setHeader`/`end`
 * otherwise.
 */
export interface MiddlewareResponse {
  statusCode?: number;
  status?(code: number): unknown;
  json?(body: unknown): unknown;
  setHeader?(name: string, value: string | number): unknown;
  end?(chunk: string): unknown;
}

export type MiddlewareNext = (err?: unknown) => void;

export interface ExtractionMiddlewareOptions {
  /**
   * Pre-configured extractor. If omitted, one is created from
   * `extractorOptions`.
   */
  extractor?: Extractor;

  extractorOptions?: ExtractorOptions;

  /**
   * Defaults to ["POST"].
   */
  allowedMethods?: string[];

  /**
   * Reject `source` strings longer than this with 413 before extracting.
   * Defaults to 1 MiB worth of characters.
   */
  maxWireSourceLength?: number;

  /**
   * Called with every failure before the error response is built. An error
   * thrown here goes to `next` in place of the response (in delegate mode
   * the payload is still attached to the request). Without `next` the
   * response is sent and the handler rejects with it.
   */
  onError?(err: unknown, req: MiddlewareRequest): void | Promise<void>;

  /**
   * Attach the response payload to `req[requestPropertyName]` and call
   * `next()` instead of responding. Default: false.
   */
  delegateResponse?: boolean;

  /**
   * Default: "initex".
   */
  requestPropertyName?: string;

  /**
   * Include line, column, snippet, fragment and note in error responses.
   * Default: true.
   */
  exposeErrorDetails?: boolean;

  corsHeaders?: Readonly<Record<string, string>>;
}

export type ExtractionHandler = (
  req: MiddlewareRequest,
  res: MiddlewareResponse,
  next?: MiddlewareNext,
) => Promise<void>;

const DEFAULT_MAX_WIRE_SOURCE_LENGTH = 1024 * 1024;

//////////////////////
// Middleware factory
//////////////////////

/**
 *   import express from 'express';
 *
 *   const app = express();
 *   app.use(express.json({ limit: '2mb' }));
 *   app.post('/api/extract', createExtractionMiddleware());
 */
export function createExtractionMiddleware(
  options: ExtractionMiddlewareOptions = {},
): ExtractionHandler {
  const {
    extractor: baseExtractor = createExtractor(options.extractorOptions),
    allowedMethods = ['POST'],
    maxWireSourceLength = DEFAULT_MAX_WIRE_SOURCE_LENGTH,
    onError,
    delegateResponse = false,
    requestPropertyName = 'initex',
    exposeErrorDetails = true,
    corsHeaders,
  } = options;

  const methods = allowedMethods.map((m) => m.toUpperCase());

  return async function extractionMiddleware(req, res, next): Promise<void> {
    const respond = (status: number, body: ExtractionResponse): void => {
      if (delegateResponse && typeof next === 'function') {
        Reflect.set(req, requestPropertyName, body);
        next();
        return;
      }
      if (corsHeaders) setCorsHeaders(res, corsHeaders);
      sendJson(res, status, body);
    };

    const method = (req.method ?? 'GET').toUpperCase();
    if (methods.length > 0 && !methods.includes(method)) {
      if (typeof next === 'function') {
        next();
        return;
      }
      respond(405, {
        ok: false,
        error: { code: 'E_METHOD', message: 'Method Not Allowed' },
      });
      return;
    }

    const payload = readPayload(req.body);
    if (typeof payload === 'string') {
      respond(400, { ok: false, error: { code: 'E_REQUEST', message: payload } });
      return;
    }

    if (payload.source.length > maxWireSourceLength) {
      respond(413, {
        ok: false,
        error: {
          code: 'E_LIMIT',
          message: `"source" is longer than ${maxWireSourceLength} characters`,
        },
      });
      return;
    }

    const skipped: WireSkippedEntry[] = [];
    const diagnostics: ExtractionDiagnostic[] = [];
    const extractor = createExtractor({
      ...baseExtractor.options,
      onSkip(entry) {
        skipped.push(toWireSkip(entry));
        baseExtractor.options.onSkip?.(entry);
      },
      onDiagnostic(diagnostic) {
        diagnostics.push(diagnostic);
        baseExtractor.options.onDiagnostic?.(diagnostic);
      },
    });

    try {
      const result = runOperation(extractor, payload);
      respond(200, { ok: true, result, skipped, diagnostics });
    } catch (err) {
      let hookError: unknown = null;
      if (onError) {
        try {
          await onError(err, req);
        } catch (thrown) {
          hookError = thrown;
        }
      }

      const status = !isExtractorError(err) ? 500 : err.code === 'E_LIMIT' ? 413 : 400;
      const body = buildErrorResponse(err, exposeErrorDetails);

      if (hookError === null) {
        respond(status, body);
        return;
      }

      if (typeof next === 'function') {
        if (delegateResponse) Reflect.set(req, requestPropertyName, body);
        next(hookError);
        return;
      }

      respond(status, body);
      throw hookError;
    }
  };
}

//////////////////////
// Helper functions //
//////////////////////

function runOperation(extractor: Extractor, payload: ExtractionRequestPayload): unknown {
  switch (payload.operation) {
    case 'evaluate':
      return extractor.evaluate(payload.source);
    case 'entries':
      return extractor.scanEntries(payload.source);
    case 'species':
      return extractor.scanSpecies(payload.source);
    case 'entryList':
      return extractor.decodeEntryList(payload.source);
  }
}

/**
 * The payload, or a message saying why the body is not one.
 */
function readPayload(body: unknown): ExtractionRequestPayload | string {
  if (typeof body !== 'object' || body === null) {
    return 'request body must be a JSON object';
  }

  const operation: unknown = Reflect.get(body, 'operation');
  const source: unknown = Reflect.get(body, 'source');

  if (!isOperation(operation)) {
    return `"operation" must be one of ${EXTRACTION_OPERATIONS.join(', ')}`;
  }
  if (typeof source !== 'string') {
    return '"source" must be a string';
  }

  return { operation, source };
}

function isOperation(value: unknown): value is ExtractionOperation {
  return EXTRACTION_OPERATIONS.some((op) => op === value);
}

function toWireSkip(entry: SkippedEntry): WireSkippedEntry {
  const wire: WireSkippedEntry = { key: entry.key, reason: entry.reason, index: entry.index };
  if (entry.cause instanceof Error) wire.cause = entry.cause.message;
  return wire;
}

function buildErrorResponse(err: unknown, exposeDetails: boolean): ExtractionResponse {
  if (!isExtractorError(err)) {
    return {
      ok: false,
      error: {
        code: 'E_INTERNAL',
        message: exposeDetails && err instanceof Error ? err.message : 'Internal error',
      },
    };
  }

  const error: NonNullable<ExtractionResponse['error']> = {
    code: err.code,
    message: err.message,
  };
  if (err.decoder !== null) error.decoder = err.decoder;

  if (exposeDetails) {
    if (err.fragment !== '') error.fragment = err.fragment;
    if (err.line !== null) error.line = err.line;
    if (err.column !== null) error.column = err.column;
    if (err.snippet !== '') error.snippet = err.snippet;
    if (err.note !== undefined) error.note = err.note;
  }

  return { ok: false, error };
}

/**
 * JSON sender for Express-like and raw Node responses.
 */
function sendJson(res: MiddlewareResponse, statusCode: number, body: ExtractionResponse): void {
  if (typeof res.status === 'function' && typeof res.json === 'function') {
    res.status(statusCode);
    res.json(body);
    return;
  }

  const payload = JSON.stringify(body);
  res.statusCode = statusCode;
  if (typeof res.setHeader === 'function') {
    res.setHeader('Content-Type', 'application/json; charset=utf-8');
    res.setHeader('Content-Length', Buffer.byteLength(payload, 'utf8'));
  }
  if (typeof res.end === 'function') {
    res.end(payload);
  }
}

function setCorsHeaders(res: MiddlewareResponse, headers: Readonly<Record<string, string>>): void {
  if (typeof res.setHeader !== 'function') return;
  for (const [key, value] of Object.entries(headers)) {
    res.setHeader(key, value);
  }
}
