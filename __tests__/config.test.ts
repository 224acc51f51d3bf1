import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  parseFallbackRef,
  resolveApiKey,
  type ConfigInput,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const minimal: ConfigInput = {
  providers: [{ id: 'p', kind: 'openai', baseUrl: 'http://127.0.0.1:11434/v1' }],
  routing: { defaultProvider: 'p' },
};

describe('parseConfig', () => {
  it('fills in defaults', () => {
    const config = parseConfig(minimal);
    expect(config.server).toEqual({ host: '127.0.0.1', port: 4820, maxBodyBytes: 10 * 1024 * 1024 });
    expect(config.cache).toEqual({ enabled: true, maxEntries: 10_000, ttlSeconds: 3600, cacheStreamed: true });
    expect(config.metrics.windowsSeconds).toEqual([60, 300, 600]);
    expect(config.writer.batchSize).toBe(100);
    expect(config.routing.maxAttempts).toBe(3);
    expect(config.providers[0]).toMatchObject({ timeoutMs: 120_000, maxRetries: 0, enabled: true });
  });

  it('accepts the default config', () => {
    const config = parseConfig(DEFAULT_CONFIG);
    expect(config.providers.map((p) => p.id)).toEqual(['anthropic', 'openai', 'ollama']);
  });

  it('freezes the result deeply', () => {
    const config = parseConfig(minimal);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.providers[0])).toBe(true);
    expect(Object.isFrozen(config.routing.rules)).toBe(true);
  });

  it('rejects an unknown default provider', () => {
    expect(() => parseConfig({ ...minimal, routing: { defaultProvider: 'nope' } })).toThrow(
      'routing.defaultProvider: unknown provider "nope"',
    );
  });

  it('rejects duplicate provider ids', () => {
    const provider = { id: 'p', kind: 'openai' as const, baseUrl: 'http://127.0.0.1:11434/v1' };
    expect(() => parseConfig({ ...minimal, providers: [provider, provider] })).toThrow('providers: provider ids must be unique');
  });

  it('rejects rules that name unknown providers, fallbacks included', () => {
    expect(() =>
      parseConfig({
        ...minimal,
        routing: {
          defaultProvider: 'p',
          rules: [{ match: 'model', pattern: '^gpt-', provider: 'p', fallbacks: ['ghost:gpt-4o'] }],
        },
      }),
    ).toThrow('unknown provider "ghost"');
  });

  it('rejects invalid regular expressions', () => {
    expect(() =>
      parseConfig({ ...minimal, routing: { defaultProvider: 'p', rules: [{ match: 'model', pattern: '(', provider: 'p' }] } }),
    ).toThrow(/pattern is not a valid regular expression/);
  });

  it('throws ConfigError for structurally invalid input', () => {
    expect(() => parseConfig({ providers: [] })).toThrow(ConfigError);
  });
});

describe('parseFallbackRef', () => {
  it('splits provider and model', () => {
    expect(parseFallbackRef('openai:gpt-4o')).toEqual({ provider: 'openai', model: 'gpt-4o' });
  });

  it('keeps everything after the first colon as the model', () => {
    expect(parseFallbackRef('ollama:llama3:70b')).toEqual({ provider: 'ollama', model: 'llama3:70b' });
  });

  it('treats a bare name as a provider', () => {
    expect(parseFallbackRef('openai')).toEqual({ provider: 'openai' });
    expect(parseFallbackRef('openai:')).toEqual({ provider: 'openai:' });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cachegate-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    delete process.env['CACHEGATE_PORT'];
    delete process.env['CACHEGATE_DB_PATH'];
  });

  it('falls back to the defaults when the file is missing', () => {
    const config = loadConfig(path.join(dir, 'missing.json'));
    expect(config.routing.defaultProvider).toBe('anthropic');
  });

  it('reads a JSON file', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ ...minimal, cache: { ttlSeconds: 0 } }));
    const config = loadConfig(file);
    expect(config.providers.map((p) => p.id)).toEqual(['p']);
    expect(config.cache.ttlSeconds).toBe(0);
  });

  it('reports JSON syntax errors', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, '{ broken');
    expect(() => loadConfig(file)).toThrow(ConfigError);
  });

  it('applies environment overrides', () => {
    process.env['CACHEGATE_PORT'] = '9999';
    process.env['CACHEGATE_DB_PATH'] = ':memory:';
    const config = loadConfig(path.join(dir, 'missing.json'));
    expect(config.server.port).toBe(9999);
    expect(config.storage.dbPath).toBe(':memory:');
  });
});

describe('resolveApiKey', () => {
  afterEach(() => {
    delete process.env['CACHEGATE_CONFIG_TEST_KEY'];
  });

  it('reads the configured environment variable', () => {
    const [provider] = parseConfig({
      providers: [{ id: 'p', kind: 'openai', baseUrl: 'http://127.0.0.1:1/v1', apiKeyEnv: 'CACHEGATE_CONFIG_TEST_KEY' }],
      routing: { defaultProvider: 'p' },
    }).providers;
    if (!provider) throw new Error('provider missing');

    expect(resolveApiKey(provider)).toBeUndefined();
    process.env['CACHEGATE_CONFIG_TEST_KEY'] = '';
    expect(resolveApiKey(provider)).toBeUndefined();
    process.env['CACHEGATE_CONFIG_TEST_KEY'] = 'test-secret';
    expect(resolveApiKey(provider)).toBe('test-secret');
  });
});
