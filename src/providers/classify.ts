/**
 * Upstream failure classification.
 *
 * Rate limits, server errors, timeouts and connection failures are
 * retryable and advance the fallback chain. Anything the provider rejects
 * as the caller's fault is terminal.
 *
 * @packageDocumentation
 */

import { ProviderError, type ProviderErrorKind } from '../errors.js';
import type { ProviderCall } from './types.js';

export function classifyStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 408) return 'timeout';
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'server_error';
  return 'client_error';
}

/**
 * Build a ProviderError from a non-2xx response, keeping the upstream body
 * (parsed when it is JSON) as detail.
 */
export async function errorFromResponse(response: Response, call: ProviderCall): Promise<ProviderError> {
  const kind = classifyStatus(response.status);
  let detail: unknown = null;
  try {
    const text = await response.text();
    detail = parseMaybeJson(text);
  } catch (err) {
    detail = `unreadable error body: ${err instanceof Error ? err.message : String(err)}`;
  }

  return new ProviderError(`${call.provider.id} returned HTTP ${response.status}`, {
    providerId: call.provider.id,
    model: call.model,
    kind,
    status: response.status,
    detail,
  });
}

/**
 * Map a rejected fetch (or body read) to a ProviderError. Already
 * classified errors pass through.
 */
export function errorFromFetch(err: unknown, call: ProviderCall, timedOut: boolean): ProviderError {
  if (err instanceof ProviderError) return err;

  const message = err instanceof Error ? err.message : String(err);
  if (timedOut) {
    return timeoutError(call, `${call.provider.id} timed out after ${call.provider.timeoutMs}ms`);
  }
  return new ProviderError(`${call.provider.id} connection failed: ${message}`, {
    providerId: call.provider.id,
    model: call.model,
    kind: 'connection',
    detail: causeMessage(err),
  });
}

export function timeoutError(call: ProviderCall, message: string): ProviderError {
  return new ProviderError(message, {
    providerId: call.provider.id,
    model: call.model,
    kind: 'timeout',
  });
}

export function malformed(call: ProviderCall, message: string, detail?: unknown): ProviderError {
  return new ProviderError(`${call.provider.id} sent a malformed response: ${message}`, {
    providerId: call.provider.id,
    model: call.model,
    kind: 'malformed_response',
    detail,
  });
}

function parseMaybeJson(text: string): unknown {
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text.slice(0, 2000);
  }
}

function causeMessage(err: unknown): string | undefined {
  if (err instanceof Error && err.cause instanceof Error) {
    return err.cause.message;
  }
  return undefined;
}
