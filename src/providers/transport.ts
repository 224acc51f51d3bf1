/**
 * HTTP plumbing shared by the provider adapters: a POST with a deadline,
 * and a server-sent-events reader over a fetch body.
 *
 * @packageDocumentation
 */

import type { ReadableStream, ReadableStreamDefaultReader, ReadableStreamReadResult } from 'node:stream/web';
import { createLogger } from '../logger.js';
import { errorFromFetch, errorFromResponse, malformed, timeoutError } from './classify.js';
import type { ProviderCall } from './types.js';

const log = createLogger('transport');

export interface OpenResponse {
  response: Response;
  /** Stop the deadline timer once the caller is done with the body */
  release(): void;
  /** Tear down the upstream request and its socket */
  abort(): void;
}

/**
 * POST a JSON body. Resolves once response headers arrive with a 2xx
 * status; rejects with a classified ProviderError otherwise. The
 * provider's `timeoutMs` keeps running until `release()` is called.
 */
export async function postJson(
  call: ProviderCall,
  url: string,
  headers: Record<string, string>,
  body: unknown,
): Promise<OpenResponse> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, call.provider.timeoutMs);
  timer.unref();

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers, ...call.provider.headers },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (err) {
    clearTimeout(timer);
    throw errorFromFetch(err, call, timedOut);
  }

  if (!response.ok) {
    try {
      throw await errorFromResponse(response, call);
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    response,
    release: () => clearTimeout(timer),
    abort: () => {
      clearTimeout(timer);
      controller.abort();
    },
  };
}

/**
 * Read a JSON body under the request deadline.
 */
export async function readJson(call: ProviderCall, open: OpenResponse): Promise<unknown> {
  let text: string;
  try {
    text = await open.response.text();
  } catch (err) {
    throw errorFromFetch(err, call, false);
  } finally {
    open.release();
  }

  try {
    return JSON.parse(text);
  } catch {
    throw malformed(call, 'body is not JSON', text.slice(0, 500));
  }
}

export interface SseEvent {
  event?: string;
  data: string;
}

/**
 * Yield complete SSE events. Multiple `data:` lines are joined with `\n`;
 * comments and unknown fields are ignored.
 *
 * Every read must produce data within the provider's `timeoutMs`, or the
 * stream fails with a `timeout` ProviderError. If iteration stops before
 * the body ends (error, early return, stall), the body is cancelled and
 * `abandon` is called so the upstream connection is released.
 */
export async function* readSseEvents(
  call: ProviderCall,
  body: ReadableStream<Uint8Array> | null,
  abandon?: () => void,
): AsyncGenerator<SseEvent, void, unknown> {
  const reader = body?.getReader();
  if (!reader) {
    abandon?.();
    throw malformed(call, 'no response body');
  }

  const decoder = new TextDecoder();
  let buffer = '';
  let eventType: string | undefined;
  let dataLines: string[] = [];
  let finished = false;

  function* takeLines(final: boolean): Generator<SseEvent> {
    const lines = buffer.split('\n');
    buffer = final ? '' : lines.pop() ?? '';

    for (const raw of lines) {
      const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
      if (line === '') {
        if (dataLines.length > 0) {
          yield eventType !== undefined ? { event: eventType, data: dataLines.join('\n') } : { data: dataLines.join('\n') };
        }
        eventType = undefined;
        dataLines = [];
      } else if (line.startsWith('event:')) {
        eventType = line.slice(6).trim();
      } else if (line.startsWith('data:')) {
        dataLines.push(line.slice(5).replace(/^ /, ''));
      }
    }
  }

  function nextChunk(source: ReadableStreamDefaultReader<Uint8Array>): Promise<ReadableStreamReadResult<Uint8Array>> {
    return new Promise((resolve, reject) => {
      const idle = setTimeout(() => {
        reject(timeoutError(call, `${call.provider.id} stream stalled for ${call.provider.timeoutMs}ms`));
      }, call.provider.timeoutMs);
      idle.unref();

      source.read().then(
        (chunk) => {
          clearTimeout(idle);
          resolve(chunk);
        },
        (err: unknown) => {
          clearTimeout(idle);
          reject(errorFromFetch(err, call, false));
        },
      );
    });
  }

  try {
    while (true) {
      const chunk = await nextChunk(reader);
      if (chunk.done) {
        finished = true;
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      yield* takeLines(false);
    }

    buffer += decoder.decode();
    buffer += '\n\n';
    yield* takeLines(true);
  } finally {
    if (!finished) {
      await reader.cancel().catch((err: unknown) => {
        log.debug(`Cancelling ${call.provider.id} stream failed: ${err instanceof Error ? err.message : String(err)}`);
      });
      abandon?.();
    }
    reader.releaseLock();
  }
}

/**
 * Parse an SSE data payload as JSON, or fail the stream.
 */
export function parseEventData(call: ProviderCall, data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    throw malformed(call, 'stream event is not JSON', data.slice(0, 500));
  }
}

export function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
