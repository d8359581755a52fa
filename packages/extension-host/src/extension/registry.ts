/**
 * ExtensionRegistry: maps extension ids to configuration and lazily
 * loaded containers.
 *
 * Concurrent cold loads of one id share a single in-flight promise, so a
 * module is fetched and instantiated at most once per registry. Every
 * container built here shares the registry's IR cache.
 */

import { isAbsolute, resolve } from 'node:path';

import { ExtensionConfigSchema, parseExtensionsConfig } from '../config.js';
import type { ConfigOutcome, ExtensionConfig, ExtensionConfigInput, ExtensionSource, HostConfig } from '../config.js';
import { ExtensionContainer } from '../container/container.js';
import { ExtensionError, errorMessage } from '../errors.js';
import { HostFunctions } from '../host-imports/host-functions.js';
import { IrCache } from '../host-imports/host-state.js';
import { CachingLoader } from '../loader/loader.js';
import type { ExtensionLoader } from '../loader/loader.js';
import { defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { NodeAdapter } from '../platform/node-adapter.js';
import type { PlatformAdapter } from '../platform/adapter.js';
import type { ExtensionInfo, ExtensionType, ResourceLimits } from './types.js';

export interface RegistryOptions {
  workspaceRoot: string;
  outputDir: string;
  /** Where remote modules are cached; ignored when `loader` is given. */
  cacheDir?: string;
  loader?: ExtensionLoader;
  /** Session IR cache; a fresh one per registry by default. */
  irCache?: IrCache;
  /** Applied to every extension; per-extension `limits` override field by field. */
  limits?: ResourceLimits;
  hardKill?: boolean;
  adapter?: PlatformAdapter;
  logger?: Logger;
}

export type LoadOutcome =
  | { id: string; ok: true; container: ExtensionContainer }
  | { id: string; ok: false; error: ExtensionError };

function toExtensionError(err: unknown, id: string): ExtensionError {
  if (err instanceof ExtensionError) return err;
  return new ExtensionError('LOAD_FAILED', errorMessage(err), { extensionId: id, cause: err });
}

export class ExtensionRegistry {
  readonly workspaceRoot: string;
  readonly outputDir: string;
  readonly irCache: IrCache;
  readonly loader: ExtensionLoader;
  private configs = new Map<string, ExtensionConfig>();
  private extensions = new Map<string, ExtensionContainer>();
  private inflight = new Map<string, Promise<ExtensionContainer>>();
  private options: RegistryOptions;
  private adapter: PlatformAdapter;
  private logger: Logger;

  constructor(options: RegistryOptions) {
    this.options = options;
    this.workspaceRoot = options.workspaceRoot;
    this.outputDir = options.outputDir;
    this.irCache = options.irCache ?? new IrCache();
    this.adapter = options.adapter ?? new NodeAdapter();
    this.logger = (options.logger ?? defaultLogger).child({ component: 'registry' });
    this.loader = options.loader ?? new CachingLoader(
      options.cacheDir ?? resolve(options.outputDir, '.extension-cache'),
      { logger: options.logger },
    );
  }

  /** Registry wired from `loadHostConfig()` settings. */
  static fromHostConfig(
    config: HostConfig,
    workspaceRoot: string,
    outputDir: string,
    options?: Partial<RegistryOptions>,
  ): ExtensionRegistry {
    return new ExtensionRegistry({
      cacheDir: config.cacheDir,
      limits: {
        maxMemoryBytes: config.maxMemoryBytes,
        maxTimeMs: config.timeoutMs,
        maxFuel: config.maxFuel,
      },
      hardKill: config.hardKill,
      ...options,
      workspaceRoot,
      outputDir,
    });
  }

  /** Insert or replace a config (last write wins). Throws ZodError if invalid. */
  register(config: ExtensionConfigInput): ExtensionConfig {
    const parsed = ExtensionConfigSchema.parse(config);
    this.configs.set(parsed.id, parsed);
    this.logger.info({ id: parsed.id, source: parsed.source.type }, 'extension registered');
    return parsed;
  }

  has(id: string): boolean {
    return this.configs.has(id);
  }

  getConfig(id: string): ExtensionConfig | undefined {
    return this.configs.get(id);
  }

  async load(id: string): Promise<ExtensionContainer> {
    const cached = this.extensions.get(id);
    if (cached) return cached;

    const pending = this.inflight.get(id);
    if (pending) return pending;

    const load = this.coldLoad(id).finally(() => {
      this.inflight.delete(id);
    });
    this.inflight.set(id, load);
    return load;
  }

  async loadFromPath(id: string, path: string): Promise<ExtensionContainer> {
    this.register({ id, source: { type: 'path', path } });
    return this.load(id);
  }

  registerBuiltin(id: string, path: string): ExtensionConfig {
    return this.register({ id, source: { type: 'path', path } });
  }

  /** Register every `*.wasm` in `dir` as a builtin keyed by file stem. */
  async discoverBuiltins(dir: string): Promise<string[]> {
    const found = await this.adapter.scanExtensions(dir);
    for (const [id, path] of found) {
      this.registerBuiltin(id, path);
    }
    return Array.from(found.keys());
  }

  async unload(id: string): Promise<void> {
    const container = this.extensions.get(id);
    if (!container) {
      throw new ExtensionError('NOT_FOUND', `Extension not loaded: ${id}`, { extensionId: id });
    }
    this.extensions.delete(id);
    await container.dispose();
    this.logger.info({ id }, 'extension unloaded');
  }

  get(id: string): ExtensionContainer | undefined {
    return this.extensions.get(id);
  }

  list(): ExtensionInfo[] {
    return Array.from(this.extensions.values(), (c) => c.info);
  }

  listByType(type: ExtensionType): ExtensionContainer[] {
    return Array.from(this.extensions.values()).filter((c) => c.supports(type));
  }

  findByType(type: ExtensionType): ExtensionContainer | undefined {
    return this.listByType(type)[0];
  }

  /**
   * Register every valid entry of a `{ [id]: config }` map; the key is the
   * canonical id. Invalid entries are reported, not thrown.
   */
  discoverFromConfig(raw: unknown): ConfigOutcome[] {
    const outcomes = parseExtensionsConfig(raw);
    for (const outcome of outcomes) {
      if (outcome.ok) {
        this.register(outcome.config);
      } else {
        this.logger.warn({ id: outcome.id, error: outcome.error }, 'invalid extension config');
      }
    }
    return outcomes;
  }

  /** Attempt every registered id; one failure never stops the rest. */
  async loadAll(): Promise<LoadOutcome[]> {
    const outcomes: LoadOutcome[] = [];
    for (const id of Array.from(this.configs.keys())) {
      try {
        outcomes.push({ id, ok: true, container: await this.load(id) });
      } catch (err) {
        outcomes.push({ id, ok: false, error: toExtensionError(err, id) });
      }
    }
    return outcomes;
  }

  async findExtensionByLanguage(language: string): Promise<ExtensionContainer | undefined> {
    return this.findFor(language, 'frontend', (info) => info.languages);
  }

  async findExtensionByTarget(target: string): Promise<ExtensionContainer | undefined> {
    return this.findFor(target, 'backend', (info) => info.targets);
  }

  /** Unload everything. Configs stay registered. */
  async dispose(): Promise<void> {
    await Promise.allSettled(Array.from(this.inflight.values()));
    const containers = Array.from(this.extensions.values());
    this.extensions.clear();
    await Promise.all(containers.map((c) => c.dispose()));
  }

  private async findFor(
    query: string,
    type: ExtensionType,
    advertised: (info: ExtensionInfo) => string[] | undefined,
  ): Promise<ExtensionContainer | undefined> {
    // Builtins are keyed by the language or target they serve.
    try {
      const byId = await this.load(query);
      if (byId.supports(type)) return byId;
    } catch (err) {
      this.logger.debug({ query, err: errorMessage(err) }, `no ${type} extension with id`);
    }

    for (const container of this.extensions.values()) {
      if (!container.supports(type)) continue;
      if (container.id === query || advertised(container.info)?.includes(query)) {
        return container;
      }
    }
    return undefined;
  }

  private async coldLoad(id: string): Promise<ExtensionContainer> {
    const config = this.configs.get(id);
    if (!config) {
      throw new ExtensionError('NOT_FOUND', `Extension not registered: ${id}`, { extensionId: id });
    }
    if (!config.enabled) {
      throw new ExtensionError('DISABLED', `Extension is disabled: ${id}`, { extensionId: id });
    }

    let wasmPath: string;
    try {
      wasmPath = await this.fetchSource(id, config.source);
    } catch (err) {
      throw toExtensionError(err, id);
    }

    const host = HostFunctions.forWorkspace(this.workspaceRoot, this.outputDir, {
      irCache: this.irCache,
      logger: this.options.logger,
    });
    const container = await ExtensionContainer.fromFile(id, wasmPath, host, {
      limits: { ...this.options.limits, ...config.limits },
      hardKill: this.options.hardKill,
      adapter: this.adapter,
      logger: this.options.logger,
    });

    this.extensions.set(id, container);
    this.logger.info({ id, name: container.info.name, version: container.info.version }, 'extension loaded');
    return container;
  }

  private fetchSource(id: string, source: ExtensionSource): Promise<string> {
    switch (source.type) {
      case 'path':
        return this.loader.loadFromPath(
          isAbsolute(source.path) ? source.path : resolve(this.workspaceRoot, source.path),
        );
      case 'url':
        return this.loader.loadFromUrl(id, source.url);
      case 'github':
        return this.loader.loadFromGithub(id, source.repo, source.tag, source.asset);
    }
  }
}
