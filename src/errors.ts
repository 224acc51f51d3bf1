/**
 * Gateway error types.
 *
 * Every error that can reach a client carries an HTTP status and a
 * machine-readable code; `toErrorBody` renders the wire format.
 *
 * @packageDocumentation
 */

export class GatewayError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }

  /** Extra fields rendered next to `type` and `message`. */
  details(): Record<string, unknown> {
    return {};
  }
}

export class RequestValidationError extends GatewayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid request: ${issues.join('; ')}`, 400, 'invalid_request');
    this.issues = issues;
  }

  override details(): Record<string, unknown> {
    return { issues: this.issues };
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string) {
    super(message, 500, 'config_error');
  }
}

export type ProviderErrorKind =
  | 'timeout'
  | 'connection'
  | 'rate_limit'
  | 'server_error'
  | 'client_error'
  | 'auth'
  | 'malformed_response';

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set([
  'timeout',
  'connection',
  'rate_limit',
  'server_error',
]);

export interface ProviderErrorOptions {
  providerId: string;
  model: string;
  kind: ProviderErrorKind;
  status?: number;
  detail?: unknown;
}

/**
 * A failed attempt against one provider. Retryable errors advance the
 * fallback chain; everything else aborts it.
 */
export class ProviderError extends GatewayError {
  readonly providerId: string;
  readonly model: string;
  readonly kind: ProviderErrorKind;
  readonly retryable: boolean;
  readonly upstreamStatus: number | undefined;
  readonly detail: unknown;

  constructor(message: string, opts: ProviderErrorOptions) {
    super(message, clientStatusFor(opts.kind, opts.status), opts.kind);
    this.providerId = opts.providerId;
    this.model = opts.model;
    this.kind = opts.kind;
    this.retryable = RETRYABLE_KINDS.has(opts.kind);
    this.upstreamStatus = opts.status;
    this.detail = opts.detail;
  }

  override details(): Record<string, unknown> {
    return {
      provider: this.providerId,
      model: this.model,
      upstream_status: this.upstreamStatus ?? null,
      detail: this.detail ?? null,
    };
  }
}

function clientStatusFor(kind: ProviderErrorKind, upstream?: number): number {
  switch (kind) {
    case 'client_error':
    case 'auth':
      return upstream ?? 400;
    case 'timeout':
      return 504;
    default:
      return 502;
  }
}

export interface ProviderAttempt {
  providerId: string;
  model: string;
  kind: ProviderErrorKind;
  message: string;
  status?: number;
}

/**
 * Every provider in the chain failed with a retryable error, or the
 * per-request attempt budget ran out.
 */
export class ChainExhaustedError extends GatewayError {
  readonly attempts: ProviderAttempt[];

  constructor(attempts: ProviderAttempt[]) {
    const tried = attempts.map((a) => `${a.providerId}/${a.model} (${a.kind})`).join(', ');
    super(`All providers failed after ${attempts.length} attempt(s): ${tried}`, 502, 'chain_exhausted');
    this.attempts = attempts;
  }

  override details(): Record<string, unknown> {
    return { attempts: this.attempts };
  }
}

export class NoRouteError extends GatewayError {
  constructor(model: string) {
    super(`No enabled provider can serve model "${model}"`, 503, 'no_route');
  }
}

/**
 * Render any thrown value as `{ status, body }` for an HTTP response.
 */
export function toErrorBody(err: unknown): { status: number; body: { error: Record<string, unknown> } } {
  if (err instanceof GatewayError) {
    return {
      status: err.status,
      body: { error: { type: err.code, message: err.message, ...err.details() } },
    };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { status: 500, body: { error: { type: 'internal_error', message } } };
}
