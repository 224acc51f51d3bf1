/**
 * Wires every component of the gateway from one frozen config.
 *
 * @packageDocumentation
 */

import type * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { ResponseCache, type PromptCache } from './cache/response-cache.js';
import type { GatewayConfig } from './config.js';
import { Gateway } from './gateway/ingress.js';
import { createLogger, type Logger } from './logger.js';
import { MetricsAggregator } from './metrics/aggregator.js';
import { MetricsService } from './metrics/service.js';
import { CostCalculator } from './pricing/cost.js';
import { ProviderHealth, type StateChange } from './providers/health.js';
import { ProviderRegistry, type AdapterFactory } from './providers/registry.js';
import { Router } from './routing/router.js';
import { createGatewayServer } from './server.js';
import { BatchWriter } from './storage/batch-writer.js';
import { AuditStore } from './storage/store.js';

export interface GatewayAppOptions {
  logger?: Logger;
  /** Replace provider adapters (tests, custom transports) */
  adapters?: Partial<AdapterFactory>;
  /** Use an existing store instead of opening `storage.dbPath` */
  store?: AuditStore;
}

export interface GatewayApp {
  readonly config: Readonly<GatewayConfig>;
  readonly gateway: Gateway;
  readonly cache: PromptCache | null;
  readonly aggregator: MetricsAggregator;
  readonly metrics: MetricsService;
  readonly store: AuditStore;
  readonly writer: BatchWriter;
  readonly health: ProviderHealth;
  readonly server: http.Server;
  /** Listen on the configured host/port (0 picks a free port). */
  start(): Promise<AddressInfo>;
  /** Stop accepting requests, wait for calls in progress, flush the writer, close the store. */
  stop(): Promise<void>;
}

export function createGatewayApp(config: Readonly<GatewayConfig>, opts: GatewayAppOptions = {}): GatewayApp {
  const log = opts.logger ?? createLogger();

  const registry = new ProviderRegistry(config.providers, opts.adapters);
  const costs = new CostCalculator(config.pricing, config.tiers);
  const health = new ProviderHealth(config.circuitBreaker);
  health.on('stateChange', (change: StateChange) => {
    log.warn(`Provider ${change.providerId} circuit ${change.from} -> ${change.to}`);
  });
  const router = new Router(config.routing, { registry, costs, health });

  const cache: PromptCache | null = config.cache.enabled
    ? new ResponseCache({ maxEntries: config.cache.maxEntries, ttlSeconds: config.cache.ttlSeconds })
    : null;

  const aggregator = new MetricsAggregator({
    windowsSeconds: config.metrics.windowsSeconds,
    recentCallsLimit: config.metrics.recentCallsLimit,
  });

  const store = opts.store ?? new AuditStore(config.storage.dbPath);
  const writer = new BatchWriter(store, {
    ...config.writer,
    retentionDays: config.storage.retentionDays,
    logger: log,
  });

  const gateway = new Gateway({ config, cache, router, registry, costs, metrics: aggregator, events: writer, health, logger: log });

  const metrics = new MetricsService({
    aggregator,
    cache,
    writer,
    store,
    health,
    queryCacheTtlMs: config.metrics.queryCacheTtlMs,
  });

  const server = createGatewayServer({
    gateway,
    metrics,
    cache,
    maxBodyBytes: config.server.maxBodyBytes,
    recentCallsLimit: config.metrics.recentCallsLimit,
    isDegraded: () => writer.isDegraded(),
    logger: log,
  });

  let stopped = false;

  return {
    config,
    gateway,
    cache,
    aggregator,
    metrics,
    store,
    writer,
    health,
    server,

    start(): Promise<AddressInfo> {
      writer.start();
      return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(config.server.port, config.server.host, () => {
          server.off('error', reject);
          const address = server.address();
          if (address === null || typeof address === 'string') {
            reject(new Error('Server is not listening on a TCP port'));
            return;
          }
          log.info(`Listening on http://${address.address}:${address.port}`);
          resolve(address);
        });
      });
    },

    async stop(): Promise<void> {
      if (stopped) return;
      stopped = true;

      if (server.listening) {
        await new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
          server.closeIdleConnections();
        });
      }
      // Streams whose client already left can outlive the server
      await gateway.drain();
      await writer.stop();
      store.close();
      health.removeAllListeners();
    },
  };
}
