/**
 * Configuration Management
 *
 * Loads and validates the gateway configuration: providers, routing rules,
 * pricing, cache, metrics, writer and storage settings. The resolved config
 * is frozen and shared read-only for the lifetime of the process.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * One backend's connection facts
 */
const ProviderSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['anthropic', 'openai']),
  baseUrl: z.string().url(),
  apiKeyEnv: z.string().optional(),
  timeoutMs: z.number().int().positive().default(120_000),
  /** Extra attempts on the same provider for retryable errors */
  maxRetries: z.number().int().min(0).default(0),
  enabled: z.boolean().default(true),
  headers: z.record(z.string(), z.string()).optional(),
});

const RuleTargetShape = {
  provider: z.string().min(1),
  /** Rewrite the requested model (e.g. agent -> cheaper model) */
  model: z.string().min(1).optional(),
  priority: z.number().int().default(0),
  /** `provider` or `provider:model`; a bare provider keeps the rule's model */
  fallbacks: z.array(z.string().min(1)).default([]),
};

const RoutingRuleSchema = z.discriminatedUnion('match', [
  z.object({ match: z.literal('agent'), agentType: z.string().min(1), ...RuleTargetShape }),
  z.object({ match: z.literal('tier'), tier: z.string().min(1), ...RuleTargetShape }),
  z.object({
    match: z.literal('model'),
    pattern: z.string().min(1).refine(isValidRegExp, { message: 'pattern is not a valid regular expression' }),
    ...RuleTargetShape,
  }),
]);

const PricingSchema = z.object({
  /** USD per million input tokens */
  input: z.number().min(0),
  /** USD per million output tokens */
  output: z.number().min(0),
  tier: z.string().optional(),
});

const TierSchema = z.object({
  name: z.string().min(1),
  /** Lower-case substrings of the model id */
  patterns: z.array(z.string().min(1)),
});

/**
 * Full config schema
 */
export const ConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string().default('127.0.0.1'),
        port: z.number().int().min(0).max(65535).default(4820),
        maxBodyBytes: z.number().int().positive().default(10 * 1024 * 1024),
      })
      .default({}),
    providers: z.array(ProviderSchema).min(1),
    routing: z.object({
      rules: z.array(RoutingRuleSchema).default([]),
      defaultProvider: z.string().min(1),
      defaultModel: z.string().min(1).optional(),
      /** Per-request attempt budget across the whole chain */
      maxAttempts: z.number().int().positive().default(3),
    }),
    pricing: z.record(z.string(), PricingSchema).default({}),
    tiers: z.array(TierSchema).default([]),
    cache: z
      .object({
        enabled: z.boolean().default(true),
        maxEntries: z.number().int().positive().default(10_000),
        /** 0 disables expiry */
        ttlSeconds: z.number().int().min(0).default(3600),
        cacheStreamed: z.boolean().default(true),
      })
      .default({}),
    metrics: z
      .object({
        windowsSeconds: z.array(z.number().int().positive()).min(1).default([60, 300, 600]),
        recentCallsLimit: z.number().int().positive().default(100),
        queryCacheTtlMs: z.number().int().min(0).default(1000),
      })
      .default({}),
    writer: z
      .object({
        batchSize: z.number().int().positive().default(100),
        flushIntervalMs: z.number().int().positive().default(5000),
        queueCapacity: z.number().int().positive().default(10_000),
        enqueueTimeoutMs: z.number().int().min(0).default(250),
        maxRetries: z.number().int().min(0).default(5),
        retryBaseDelayMs: z.number().int().positive().default(500),
      })
      .default({}),
    storage: z
      .object({
        dbPath: z.string().default(path.join(os.homedir(), '.cachegate', 'audit.db')),
        retentionDays: z.number().positive().default(30),
      })
      .default({}),
    circuitBreaker: z
      .object({
        failureThreshold: z.number().int().positive().default(5),
        resetTimeoutMs: z.number().int().positive().default(30_000),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const ids = new Set(config.providers.map((p) => p.id));
    if (ids.size !== config.providers.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['providers'], message: 'provider ids must be unique' });
    }
    if (!ids.has(config.routing.defaultProvider)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['routing', 'defaultProvider'],
        message: `unknown provider "${config.routing.defaultProvider}"`,
      });
    }
    config.routing.rules.forEach((rule, i) => {
      for (const ref of [rule.provider, ...rule.fallbacks.map((f) => parseFallbackRef(f).provider)]) {
        if (!ids.has(ref)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['routing', 'rules', i],
            message: `unknown provider "${ref}"`,
          });
        }
      }
    });
  });

export type ConfigInput = z.input<typeof ConfigSchema>;
export type GatewayConfig = z.infer<typeof ConfigSchema>;
export type ProviderConfig = GatewayConfig['providers'][number];
export type RoutingRule = GatewayConfig['routing']['rules'][number];
export type ModelPricing = GatewayConfig['pricing'][string];
export type TierDefinition = GatewayConfig['tiers'][number];

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ConfigInput = {
  providers: [
    {
      id: 'anthropic',
      kind: 'anthropic',
      baseUrl: 'https://api.anthropic.com/v1',
      apiKeyEnv: 'ANTHROPIC_API_KEY',
    },
    {
      id: 'openai',
      kind: 'openai',
      baseUrl: 'https://api.openai.com/v1',
      apiKeyEnv: 'OPENAI_API_KEY',
    },
    {
      id: 'ollama',
      kind: 'openai',
      baseUrl: 'http://localhost:11434/v1',
      timeoutMs: 300_000,
    },
  ],
  routing: {
    rules: [
      { match: 'model', pattern: '^claude-', provider: 'anthropic' },
      { match: 'model', pattern: '^gpt-', provider: 'openai' },
      { match: 'model', pattern: '^ollama/', provider: 'ollama' },
    ],
    defaultProvider: 'anthropic',
  },
  pricing: {
    'claude-opus-4': { input: 15, output: 75 },
    'claude-sonnet-4': { input: 3, output: 15 },
    'claude-sonnet-3.5': { input: 3, output: 15 },
    'claude-haiku-4': { input: 1, output: 5 },
    'gpt-4': { input: 30, output: 60 },
    'gpt-4o': { input: 2.5, output: 10 },
    'gpt-4o-mini': { input: 0.15, output: 0.6 },
    'ollama/llama3-70b': { input: 0, output: 0 },
    'ollama/mistral': { input: 0, output: 0 },
  },
  tiers: [
    { name: 'local', patterns: ['ollama/'] },
    { name: 'cheap', patterns: ['haiku', 'mini', 'flash'] },
    { name: 'mid', patterns: ['sonnet', 'gpt-4o', 'gpt-4.1'] },
    { name: 'premium', patterns: ['opus', 'gpt-4'] },
  ],
};

/**
 * Get config file path
 */
export function getConfigPath(): string {
  return process.env['CACHEGATE_CONFIG'] ?? path.join(os.homedir(), '.cachegate', 'config.json');
}

/**
 * Validate raw input into a frozen config. Throws ConfigError with every
 * failing path.
 */
export function parseConfig(input: unknown): Readonly<GatewayConfig> {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid config: ${issues.join('; ')}`);
  }
  return freezeConfig(result.data);
}

/**
 * Load and validate config. A missing file yields the defaults; environment
 * overrides are applied before validation.
 */
export function loadConfig(configPath: string = getConfigPath()): Readonly<GatewayConfig> {
  let raw: unknown = DEFAULT_CONFIG;

  if (fs.existsSync(configPath)) {
    try {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new ConfigError(`Config JSON parse error in ${configPath}: ${err.message}`);
      }
      throw new ConfigError(`Failed to read config ${configPath}: ${String(err)}`);
    }
  }

  return parseConfig(applyEnvOverrides(raw));
}

function applyEnvOverrides(raw: unknown): unknown {
  if (!isPlainObject(raw)) return raw;
  const port = process.env['CACHEGATE_PORT'];
  const dbPath = process.env['CACHEGATE_DB_PATH'];
  if (!port && !dbPath) return raw;

  const next: Record<string, unknown> = { ...raw };
  if (port) {
    const server = isPlainObject(raw['server']) ? raw['server'] : {};
    next['server'] = { ...server, port: Number(port) };
  }
  if (dbPath) {
    const storage = isPlainObject(raw['storage']) ? raw['storage'] : {};
    next['storage'] = { ...storage, dbPath };
  }
  return next;
}

/**
 * Split a fallback reference (`provider` or `provider:model`).
 */
export function parseFallbackRef(ref: string): { provider: string; model?: string } {
  const sep = ref.indexOf(':');
  if (sep <= 0 || sep === ref.length - 1) return { provider: ref };
  return { provider: ref.slice(0, sep), model: ref.slice(sep + 1) };
}

/**
 * Resolve a provider's API key from its configured environment variable.
 */
export function resolveApiKey(provider: ProviderConfig): string | undefined {
  if (!provider.apiKeyEnv) return undefined;
  const value = process.env[provider.apiKeyEnv];
  return value && value.length > 0 ? value : undefined;
}

/**
 * Recursively freeze a config snapshot.
 */
export function freezeConfig<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      freezeConfig(child);
    }
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isValidRegExp(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}
