/**
 * Resolves extension sources to local .wasm paths.
 *
 * Remote modules are downloaded once into the cache directory as
 * `<id>.wasm`; the download lands in `<cacheDir>/temp` first and is renamed
 * into place, so an interrupted fetch never leaves a partial module where
 * a later load would pick it up.
 */

import { access, mkdir, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';

import { ExtensionError, errorMessage } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';

export interface ExtensionLoader {
  loadFromPath(path: string): Promise<string>;
  loadFromUrl(id: string, url: string): Promise<string>;
  loadFromGithub(id: string, repo: string, tag: string | undefined, asset: string): Promise<string>;
}

export type FetchFn = (url: string) => Promise<Response>;

export interface CachingLoaderOptions {
  fetch?: FetchFn;
  logger?: Logger;
}

export function githubReleaseUrl(repo: string, tag: string | undefined, asset: string): string {
  if (tag === undefined || tag === 'latest') {
    return `https://github.com/${repo}/releases/latest/download/${asset}`;
  }
  return `https://github.com/${repo}/releases/download/${tag}/${asset}`;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class CachingLoader implements ExtensionLoader {
  readonly cacheDir: string;
  private tempDir: string;
  private fetchFn: FetchFn;
  private logger: Logger;

  constructor(cacheDir: string, options?: CachingLoaderOptions) {
    this.cacheDir = cacheDir;
    this.tempDir = join(cacheDir, 'temp');
    this.fetchFn = options?.fetch ?? ((url) => fetch(url));
    this.logger = (options?.logger ?? defaultLogger).child({ component: 'loader' });
  }

  async loadFromPath(path: string): Promise<string> {
    if (!(await exists(path))) {
      throw new ExtensionError('LOAD_FAILED', `Extension file not found: ${path}`);
    }
    if (extname(path) !== '.wasm') {
      throw new ExtensionError('LOAD_FAILED', `Expected .wasm file, got: ${path}`);
    }
    return resolve(path);
  }

  async loadFromUrl(id: string, url: string): Promise<string> {
    const cachePath = join(this.cacheDir, `${id}.wasm`);
    if (await exists(cachePath)) {
      this.logger.debug({ id, path: cachePath }, 'using cached extension');
      return cachePath;
    }

    this.logger.info({ id, url }, 'downloading extension');
    let bytes: Uint8Array;
    try {
      const response = await this.fetchFn(url);
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      bytes = new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      throw new ExtensionError('LOAD_FAILED', `Failed to download extension from ${url}: ${errorMessage(err)}`, {
        extensionId: id,
        cause: err,
      });
    }

    const tempPath = join(this.tempDir, `${id}.wasm.tmp`);
    try {
      await mkdir(this.tempDir, { recursive: true });
      await writeFile(tempPath, bytes);
      await rename(tempPath, cachePath);
    } catch (err) {
      throw new ExtensionError('LOAD_FAILED', `Failed to cache extension ${id}: ${errorMessage(err)}`, {
        extensionId: id,
        cause: err,
      });
    }
    this.logger.info({ id, path: cachePath }, 'extension cached');
    return cachePath;
  }

  async loadFromGithub(id: string, repo: string, tag: string | undefined, asset: string): Promise<string> {
    return this.loadFromUrl(id, githubReleaseUrl(repo, tag, asset));
  }

  /** Cached module paths, sorted. */
  async listCached(): Promise<string[]> {
    if (!(await exists(this.cacheDir))) return [];
    const entries = await readdir(this.cacheDir);
    return entries
      .filter((entry) => entry.endsWith('.wasm'))
      .sort()
      .map((entry) => join(this.cacheDir, entry));
  }

  async clearCache(): Promise<void> {
    await rm(this.cacheDir, { recursive: true, force: true });
    await mkdir(this.cacheDir, { recursive: true });
  }
}
