/**
 * HTTP adapter for co-processor callbacks.
 *
 * Uses generic request/response shapes so it plugs into Express, Koa,
 * Fastify or a bare `http.createServer` handler. The body is expected to
 * be JSON (already parsed, or as a string):
 *
 * ```json
 * { "requestId": "…", "plaintext": "<hex>", "proof": "<hex>" }
 * ```
 *
 * @packageDocumentation
 */

import type { DecryptionResult } from '@cloakroom/coprocessor';
import { fromHex } from '@cloakroom/crypto';
import {
  CloakroomErrorCode,
  defaultLogger,
  isCloakroomError,
  isNonEmptyString,
  isPlainObject,
  isValidHex,
  sanitizeJsonInput,
} from '@cloakroom/types';
import type { Logger } from '@cloakroom/types';

// ─── Generic HTTP types ──────────────────────────────────────────────────────

/** Generic incoming request. `body` is the raw or parsed JSON body. */
export interface IncomingRequest {
  method?: string;
  url?: string;
  headers?: Record<string, string | string[] | undefined>;
  body?: unknown;
}

/** Generic outgoing response. */
export interface OutgoingResponse {
  statusCode?: number;
  setHeader?: (name: string, value: string) => void;
  end?: (body?: string) => void;
}

/** Anything that can commit a decryption result; `CloakroomEngine` satisfies this. */
export interface DecryptionResolver {
  resolveReveal(result: DecryptionResult): Promise<unknown>;
}

export interface DecryptionCallbackHandlerOptions {
  resolver: DecryptionResolver;
  logger?: Logger;
}

export type CallbackHandler = (req: IncomingRequest, res: OutgoingResponse) => Promise<void>;

// ─── Responses ───────────────────────────────────────────────────────────────

const STATUS_BY_CODE: Partial<Record<CloakroomErrorCode, number>> = {
  [CloakroomErrorCode.MALFORMED_PAYLOAD]: 400,
  [CloakroomErrorCode.INVALID_INPUT]: 400,
  [CloakroomErrorCode.CRYPTO_INVALID_HEX]: 400,
  [CloakroomErrorCode.INVALID_PROOF]: 403,
  [CloakroomErrorCode.UNKNOWN_REQUEST]: 404,
  [CloakroomErrorCode.ALREADY_REVEALED]: 409,
};

function send(res: OutgoingResponse, status: number, body?: Record<string, unknown>): void {
  res.statusCode = status;
  if (body === undefined) {
    res.end?.();
    return;
  }
  res.setHeader?.('content-type', 'application/json');
  res.end?.(JSON.stringify(body));
}

/** Map an error from `resolveReveal` to an HTTP status. */
export function statusForError(error: unknown): number {
  if (isCloakroomError(error)) {
    return STATUS_BY_CODE[error.code] ?? 500;
  }
  return 500;
}

// ─── Body parsing ────────────────────────────────────────────────────────────

/**
 * Turn a callback body into a {@link DecryptionResult}, or `undefined`
 * if it does not have the expected shape.
 */
export function parseCallbackBody(body: unknown): DecryptionResult | undefined {
  const parsed = typeof body === 'string' ? sanitizeJsonInput(body) : body;
  if (!isPlainObject(parsed)) {
    return undefined;
  }
  const { requestId, plaintext, proof } = parsed;
  if (!isNonEmptyString(requestId) || !isValidHex(plaintext) || !isValidHex(proof)) {
    return undefined;
  }
  return { requestId, plaintext: fromHex(plaintext), proof: fromHex(proof) };
}

// ─── Handler ─────────────────────────────────────────────────────────────────

/**
 * Build a handler that feeds co-processor callbacks into `resolveReveal`.
 *
 * | Outcome | Status |
 * |---|---|
 * | committed | 204 |
 * | malformed body or payload | 400 |
 * | invalid proof | 403 |
 * | unknown or already-resolved request | 404 |
 * | schedule already revealed | 409 |
 * | method other than POST | 405 |
 * | anything else | 500 |
 *
 * @example
 * ```typescript
 * app.post('/callbacks/decryption', express.json(),
 *   createDecryptionCallbackHandler({ resolver: engine }));
 * ```
 */
export function createDecryptionCallbackHandler(options: DecryptionCallbackHandlerOptions): CallbackHandler {
  const { resolver } = options;
  const logger = options.logger ?? defaultLogger.child('http');

  return async (req: IncomingRequest, res: OutgoingResponse): Promise<void> => {
    if (req.method !== undefined && req.method.toUpperCase() !== 'POST') {
      res.setHeader?.('allow', 'POST');
      send(res, 405, { error: 'Method Not Allowed' });
      return;
    }

    let result: DecryptionResult | undefined;
    try {
      result = parseCallbackBody(req.body);
    } catch (err) {
      logger.warn('unparseable decryption callback', { error: err instanceof Error ? err.message : String(err) });
      send(res, 400, { error: CloakroomErrorCode.INVALID_INPUT, message: 'Body is not valid JSON' });
      return;
    }
    if (!result) {
      send(res, 400, {
        error: CloakroomErrorCode.INVALID_INPUT,
        message: 'Body must be {"requestId": string, "plaintext": hex, "proof": hex}',
      });
      return;
    }

    try {
      await resolver.resolveReveal(result);
      send(res, 204);
    } catch (err) {
      const status = statusForError(err);
      if (status === 500) {
        logger.error('decryption callback failed', {
          requestId: result.requestId,
          error: err instanceof Error ? err.message : String(err),
        });
        send(res, 500, { error: 'Internal Server Error' });
        return;
      }
      logger.warn('decryption callback refused', { requestId: result.requestId, status });
      send(res, status, {
        error: isCloakroomError(err) ? err.code : 'Error',
        message: err instanceof Error ? err.message : String(err),
      });
    }
  };
}
