/**
 * Fallback chain execution.
 *
 * @packageDocumentation
 */

import { ChainExhaustedError, ProviderError, type ProviderAttempt } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { ProviderTarget } from '../routing/router.js';
import type { ProviderHealth } from './health.js';

export interface FallbackOptions {
  /** Total attempts allowed across the chain, retries included */
  maxAttempts: number;
  /** Extra same-provider attempts for retryable errors (default: 0) */
  retriesFor?: (providerId: string) => number;
  health?: ProviderHealth;
  logger?: Logger;
}

export interface FallbackResult<T> {
  value: T;
  target: ProviderTarget;
  /** Failed attempts that came before the successful one */
  failures: ProviderAttempt[];
}

const fallbackLog = createLogger('fallback');

/**
 * Try each target in order. A retryable ProviderError moves on (after any
 * same-provider retries); a terminal error is rethrown at once. Running
 * out of targets or attempt budget raises ChainExhaustedError.
 */
export async function executeWithFallback<T>(
  chain: readonly ProviderTarget[],
  attempt: (target: ProviderTarget) => Promise<T>,
  opts: FallbackOptions,
): Promise<FallbackResult<T>> {
  const log = opts.logger ?? fallbackLog;
  const failures: ProviderAttempt[] = [];
  let budget = opts.maxAttempts;

  for (const target of chain) {
    const tries = 1 + Math.max(0, opts.retriesFor?.(target.providerId) ?? 0);

    for (let i = 0; i < tries; i++) {
      if (budget <= 0) {
        throw new ChainExhaustedError(failures);
      }
      budget--;

      try {
        const value = await attempt(target);
        opts.health?.recordSuccess(target.providerId);
        return { value, target, failures };
      } catch (err) {
        if (!(err instanceof ProviderError) || !err.retryable) {
          throw err;
        }

        opts.health?.recordFailure(target.providerId);
        const failure: ProviderAttempt = {
          providerId: target.providerId,
          model: target.model,
          kind: err.kind,
          message: err.message,
        };
        if (err.upstreamStatus !== undefined) failure.status = err.upstreamStatus;
        failures.push(failure);
        log.warn(`${target.providerId}/${target.model} failed (${err.kind}): ${err.message}`);
      }
    }
  }

  throw new ChainExhaustedError(failures);
}
