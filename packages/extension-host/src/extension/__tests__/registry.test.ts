import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { buildGuest, guestInfo } from '../../__tests__/fixtures/guest-builder.js';
import { loadHostConfig } from '../../config.js';
import { IrCache } from '../../host-imports/host-state.js';
import { CachingLoader } from '../../loader/loader.js';
import { createLogger } from '../../logger.js';
import { NodeAdapter } from '../../platform/node-adapter.js';
import { ExtensionRegistry } from '../registry.js';

const silent = createLogger({ level: 'silent' });

class CountingAdapter extends NodeAdapter {
  compiled = 0;

  override async compile(bytes: Uint8Array): Promise<WebAssembly.Module> {
    this.compiled++;
    return super.compile(bytes);
  }
}

class CountingLoader extends CachingLoader {
  paths: string[] = [];

  override async loadFromPath(path: string): Promise<string> {
    this.paths.push(path);
    return super.loadFromPath(path);
  }
}

describe('ExtensionRegistry', () => {
  let root: string;
  let adapter: CountingAdapter;
  let loader: CountingLoader;
  let registry: ExtensionRegistry;

  async function writeGuest(relPath: string, info: Record<string, unknown>): Promise<string> {
    const path = join(root, relPath);
    await mkdir(join(path, '..'), { recursive: true });
    await writeFile(path, buildGuest({ info }));
    return path;
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'registry-'));
    adapter = new CountingAdapter();
    loader = new CountingLoader(join(root, 'cache'), { logger: silent });
    registry = new ExtensionRegistry({
      workspaceRoot: root,
      outputDir: join(root, '.morphir-dist'),
      loader,
      adapter,
      logger: silent,
    });
  });

  afterEach(async () => {
    await registry.dispose();
    await rm(root, { recursive: true, force: true });
  });

  describe('load', () => {
    it('loads a registered extension once and serves it from cache after', async () => {
      await writeGuest('echo.wasm', guestInfo('echo', ['frontend']));
      registry.register({ id: 'echo', source: { type: 'path', path: './echo.wasm' }, enabled: true });

      const first = await registry.load('echo');
      expect(first.info.id).toBe('echo');

      const second = await registry.load('echo');
      expect(second).toBe(first);
      expect(loader.paths).toEqual([join(root, 'echo.wasm')]);
      expect(adapter.compiled).toBe(1);
    });

    it('shares one cold load between concurrent callers', async () => {
      await writeGuest('echo.wasm', guestInfo('echo', []));
      registry.register({ id: 'echo', source: { type: 'path', path: './echo.wasm' } });

      const [a, b, c] = await Promise.all([registry.load('echo'), registry.load('echo'), registry.load('echo')]);
      expect(b).toBe(a);
      expect(c).toBe(a);
      expect(adapter.compiled).toBe(1);
    });

    it('fails a disabled extension with DISABLED', async () => {
      registry.register({ id: 'x', source: { type: 'path', path: './x.wasm' }, enabled: false });
      await expect(registry.load('x')).rejects.toMatchObject({ kind: 'DISABLED', message: 'Extension is disabled: x' });
      expect(loader.paths).toEqual([]);
    });

    it('fails an unregistered id with NOT_FOUND', async () => {
      await expect(registry.load('nope'))
        .rejects.toMatchObject({ kind: 'NOT_FOUND', message: 'Extension not registered: nope' });
    });

    it('replaces a config on re-register', () => {
      registry.register({ id: 'a', source: { type: 'path', path: './one.wasm' } });
      registry.register({ id: 'a', source: { type: 'path', path: './two.wasm' }, enabled: false });
      expect(registry.getConfig('a')).toEqual({
        id: 'a',
        source: { type: 'path', path: './two.wasm' },
        enabled: false,
        config: {},
      });
    });

    it('reports a missing module as LOAD_FAILED', async () => {
      registry.register({ id: 'ghost', source: { type: 'path', path: './ghost.wasm' } });
      await expect(registry.load('ghost')).rejects.toMatchObject({
        kind: 'LOAD_FAILED',
        message: `Extension file not found: ${join(root, 'ghost.wasm')}`,
      });
    });

    it('loads from an explicit path', async () => {
      const path = await writeGuest('bin/ts.wasm', guestInfo('ts', ['backend']));
      const container = await registry.loadFromPath('ts', path);
      expect(container.id).toBe('ts');
      expect(registry.getConfig('ts')?.source).toEqual({ type: 'path', path });
    });

    it('applies per-extension limits over the registry defaults', async () => {
      await writeGuest('echo.wasm', guestInfo('echo', []));
      const limited = ExtensionRegistry.fromHostConfig(
        loadHostConfig({ MORPHIR_EXT_TIMEOUT_MS: '1000', MORPHIR_EXT_CACHE_DIR: join(root, 'cache') }),
        root,
        join(root, 'out'),
        { logger: silent },
      );
      limited.register({ id: 'echo', source: { type: 'path', path: './echo.wasm' } });
      limited.register({ id: 'fast', source: { type: 'path', path: './echo.wasm' }, limits: { maxTimeMs: 200 } });
      try {
        const echo = await limited.load('echo');
        expect(echo.limits).toEqual({ maxMemoryBytes: 268435456, maxTimeMs: 1000 });
        expect(echo.hardKill).toBe(true);
        expect((await limited.load('fast')).limits.maxTimeMs).toBe(200);
      } finally {
        await limited.dispose();
      }
    });
  });

  describe('unload', () => {
    it('disposes and forgets a loaded extension', async () => {
      await writeGuest('echo.wasm', guestInfo('echo', []));
      registry.register({ id: 'echo', source: { type: 'path', path: './echo.wasm' } });
      const container = await registry.load('echo');

      await registry.unload('echo');
      expect(registry.get('echo')).toBeUndefined();
      expect(registry.has('echo')).toBe(true);
      await expect(container.call('morphir.extension.info', null))
        .rejects.toMatchObject({ message: 'Container has been disposed' });
    });

    it('fails for an extension that is not loaded', async () => {
      await expect(registry.unload('echo'))
        .rejects.toMatchObject({ kind: 'NOT_FOUND', message: 'Extension not loaded: echo' });
    });
  });

  describe('lookup', () => {
    beforeEach(async () => {
      await writeGuest('builtin/gleam.wasm', guestInfo('gleam', ['frontend']));
      await writeGuest('elm.wasm', guestInfo('morphir-elm', ['frontend', 'validator'], { languages: ['elm'] }));
      await writeGuest('ts.wasm', guestInfo('morphir-ts', ['backend'], { targets: ['typescript'] }));
    });

    it('discovers builtins by file stem', async () => {
      expect(await registry.discoverBuiltins(join(root, 'builtin'))).toEqual(['gleam']);
      expect(registry.getConfig('gleam')?.source).toEqual({ type: 'path', path: join(root, 'builtin/gleam.wasm') });
    });

    it('finds a builtin frontend by language', async () => {
      await registry.discoverBuiltins(join(root, 'builtin'));
      const found = await registry.findExtensionByLanguage('gleam');
      expect(found?.info.id).toBe('gleam');
      expect(await registry.findExtensionByLanguage('cobol')).toBeUndefined();
    });

    it('finds loaded extensions by advertised language or target', async () => {
      await registry.loadFromPath('elm', join(root, 'elm.wasm'));
      await registry.loadFromPath('ts', join(root, 'ts.wasm'));

      expect((await registry.findExtensionByLanguage('elm'))?.id).toBe('elm');
      expect((await registry.findExtensionByTarget('typescript'))?.id).toBe('ts');
      expect(await registry.findExtensionByTarget('elm')).toBeUndefined();
    });

    it('lists loaded extensions and filters by type', async () => {
      await registry.loadFromPath('elm', join(root, 'elm.wasm'));
      await registry.loadFromPath('ts', join(root, 'ts.wasm'));

      expect(registry.list().map((info) => info.id)).toEqual(['morphir-elm', 'morphir-ts']);
      expect(registry.listByType('validator').map((c) => c.id)).toEqual(['elm']);
      expect(registry.findByType('backend')?.id).toBe('ts');
      expect(registry.findByType('transform')).toBeUndefined();
    });
  });

  describe('batch operations', () => {
    it('registers valid config entries and reports invalid ones', () => {
      const outcomes = registry.discoverFromConfig({
        echo: { source: { type: 'path', path: './echo.wasm' } },
        bad: { source: { type: 'url', url: 'not a url' } },
      });
      expect(outcomes.map((o) => [o.id, o.ok])).toEqual([['echo', true], ['bad', false]]);
      expect(outcomes[1]).toEqual({ id: 'bad', ok: false, error: 'source.url: Invalid url' });
      expect(registry.has('echo')).toBe(true);
      expect(registry.has('bad')).toBe(false);
    });

    it('attempts every extension and reports each outcome', async () => {
      await writeGuest('echo.wasm', guestInfo('echo', []));
      registry.register({ id: 'echo', source: { type: 'path', path: './echo.wasm' } });
      registry.register({ id: 'off', source: { type: 'path', path: './echo.wasm' }, enabled: false });
      registry.register({ id: 'ghost', source: { type: 'path', path: './ghost.wasm' } });

      const outcomes = await registry.loadAll();
      expect(outcomes.map((o) => (o.ok ? [o.id, 'ok'] : [o.id, o.error.kind]))).toEqual([
        ['echo', 'ok'],
        ['off', 'DISABLED'],
        ['ghost', 'LOAD_FAILED'],
      ]);
      expect(registry.list().map((info) => info.id)).toEqual(['echo']);
    });
  });

  it('uses the IR cache it was given', () => {
    const irCache = new IrCache();
    const shared = new ExtensionRegistry({ workspaceRoot: root, outputDir: root, irCache, logger: silent });
    expect(shared.irCache).toBe(irCache);
  });
});
