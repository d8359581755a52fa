import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { ExtensionConfigSchema, defaultCacheDir, loadHostConfig, parseExtensionsConfig } from '../config.js';

describe('ExtensionConfigSchema', () => {
  it('fills defaults', () => {
    expect(ExtensionConfigSchema.parse({ id: 'elm', source: { type: 'path', path: './elm.wasm' } })).toEqual({
      id: 'elm',
      source: { type: 'path', path: './elm.wasm' },
      enabled: true,
      config: {},
    });
  });

  it('accepts a github source without a tag', () => {
    const parsed = ExtensionConfigSchema.parse({
      id: 'gleam',
      source: { type: 'github', repo: 'acme/morphir-gleam', asset: 'gleam.wasm' },
    });
    expect(parsed.source).toEqual({ type: 'github', repo: 'acme/morphir-gleam', asset: 'gleam.wasm' });
  });

  it('rejects a malformed repo', () => {
    const result = ExtensionConfigSchema.safeParse({
      id: 'g',
      source: { type: 'github', repo: 'no-slash', asset: 'g.wasm' },
    });
    expect(result.success).toBe(false);
  });
});

describe('parseExtensionsConfig', () => {
  it('takes the id from the key', () => {
    const [outcome] = parseExtensionsConfig({ elm: { source: { type: 'path', path: 'elm.wasm' }, enabled: false } });
    expect(outcome).toEqual({
      id: 'elm',
      ok: true,
      config: { id: 'elm', source: { type: 'path', path: 'elm.wasm' }, enabled: false, config: {} },
    });
  });

  it('rejects an id that disagrees with its key', () => {
    expect(parseExtensionsConfig({ elm: { id: 'gleam', source: { type: 'path', path: 'a.wasm' } } })).toEqual([
      { id: 'elm', ok: false, error: 'id "gleam" does not match key "elm"' },
    ]);
  });

  it('reports each invalid entry on its own', () => {
    const outcomes = parseExtensionsConfig({
      a: { source: { type: 'path', path: 'a.wasm' }, limits: { maxTimeMs: -1 } },
      b: { source: { type: 'path', path: 'b.wasm' } },
      c: 'nonsense',
    });
    expect(outcomes.map((o) => [o.id, o.ok])).toEqual([['a', false], ['b', true], ['c', false]]);
  });

  it('throws for a non-object map', () => {
    expect(() => parseExtensionsConfig(['elm'])).toThrow('Extensions config must be an object keyed by extension id');
  });
});

describe('loadHostConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadHostConfig({ XDG_CACHE_HOME: '/tmp/xdg' })).toEqual({
      logLevel: 'info',
      cacheDir: join('/tmp/xdg', 'morphir', 'extensions'),
      maxMemoryBytes: 256 * 1024 * 1024,
      timeoutMs: undefined,
      maxFuel: undefined,
      hardKill: false,
    });
  });

  it('reads every setting', () => {
    expect(loadHostConfig({
      MORPHIR_EXT_LOG_LEVEL: 'debug',
      MORPHIR_EXT_CACHE_DIR: '/var/cache/ext',
      MORPHIR_EXT_MAX_MEMORY_BYTES: '1048576',
      MORPHIR_EXT_TIMEOUT_MS: '5000',
      MORPHIR_EXT_MAX_FUEL: '100',
      MORPHIR_EXT_HARD_KILL: '1',
    })).toEqual({
      logLevel: 'debug',
      cacheDir: '/var/cache/ext',
      maxMemoryBytes: 1048576,
      timeoutMs: 5000,
      maxFuel: 100,
      hardKill: true,
    });
  });

  it('names the variable that is invalid', () => {
    expect(() => loadHostConfig({ MORPHIR_EXT_TIMEOUT_MS: '1.5' }))
      .toThrow('MORPHIR_EXT_TIMEOUT_MS must be a positive integer, got "1.5"');
    expect(() => loadHostConfig({ MORPHIR_EXT_LOG_LEVEL: 'loud' })).toThrow(/^MORPHIR_EXT_LOG_LEVEL must be one of/);
    expect(() => loadHostConfig({ MORPHIR_EXT_HARD_KILL: 'yes' }))
      .toThrow('MORPHIR_EXT_HARD_KILL must be true or false, got "yes"');
  });

  it('derives the cache dir from XDG_CACHE_HOME', () => {
    expect(defaultCacheDir({ XDG_CACHE_HOME: '/c' })).toBe(join('/c', 'morphir', 'extensions'));
  });
});
