/**
 * Host-side implementation of the functions an extension can call.
 *
 * Works on plain strings and bytes; binding to a guest's linear memory is
 * done by createHostImports (inline) or by the worker relay (hardKill), so
 * both execution paths share this one implementation.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { SandboxError, errorMessage } from '../errors.js';
import type { WorkspaceInfo } from '../extension/types.js';
import { defaultLogger, logGuestMessage } from '../logger.js';
import type { Logger } from '../logger.js';
import { FileSandbox } from '../vfs/file-sandbox.js';
import { VirtualPathConfig } from '../vfs/virtual-paths.js';
import { createHostState } from './host-state.js';
import type { HostState, IrCache } from './host-state.js';

/** Negative results of the file host calls. */
export const HostStatus = {
  DENIED: -1,
  INVALID_PATH: -2,
  IO: -3,
} as const;

export type FileReadResult =
  | { ok: true; data: Uint8Array }
  | { ok: false; status: number };

export interface HostFunctionsOptions {
  state: HostState;
  sandbox?: FileSandbox;
  logger?: Logger;
}

export interface WorkspaceHostOptions {
  irCache?: IrCache;
  logger?: Logger;
  cacheDir?: string;
  sandbox?: FileSandbox;
}

export class HostFunctions {
  readonly state: HostState;
  readonly sandbox: FileSandbox;
  private logger: Logger;

  constructor(options: HostFunctionsOptions) {
    this.state = options.state;
    this.sandbox = options.sandbox
      ?? new FileSandbox(VirtualPathConfig.forWorkspace(options.state.workspaceRoot, options.state.outputDir));
    this.logger = options.logger ?? defaultLogger.child({ component: 'host' });
  }

  static forWorkspace(workspaceRoot: string, outputDir: string, options?: WorkspaceHostOptions): HostFunctions {
    return new HostFunctions({
      state: createHostState(workspaceRoot, outputDir, options?.irCache),
      sandbox: options?.sandbox
        ?? new FileSandbox(VirtualPathConfig.forWorkspace(workspaceRoot, outputDir, options?.cacheDir)),
      logger: options?.logger,
    });
  }

  /** Same state and sandbox, with guest log lines tagged by extension id. */
  forExtension(extensionId: string): HostFunctions {
    return new HostFunctions({
      state: this.state,
      sandbox: this.sandbox,
      logger: this.logger.child({ extension: extensionId }),
    });
  }

  workspaceInfo(): WorkspaceInfo {
    return { root: this.state.workspaceRoot, output_dir: this.state.outputDir };
  }

  /** Store IR under `key`. Returns false when `irJson` is not valid JSON. */
  cacheIr(key: string, irJson: string): boolean {
    let ir: unknown;
    try {
      ir = JSON.parse(irJson);
    } catch {
      this.logger.warn({ key }, 'cache_ir called with invalid JSON');
      return false;
    }
    this.state.irCache.set(key, ir);
    return true;
  }

  getCachedIr(key: string): string | undefined {
    if (!this.state.irCache.has(key)) return undefined;
    return JSON.stringify(this.state.irCache.get(key));
  }

  log(level: string, message: string): void {
    logGuestMessage(this.logger, level, message);
  }

  readFile(virtualPath: string): FileReadResult {
    const real = this.resolve(virtualPath, 'read');
    if (typeof real === 'number') return { ok: false, status: real };
    try {
      return { ok: true, data: readFileSync(real) };
    } catch (err) {
      this.logger.debug({ path: virtualPath, err: errorMessage(err) }, 'read_file failed');
      return { ok: false, status: HostStatus.IO };
    }
  }

  /** Returns 0 on success, or a negative HostStatus. */
  writeFile(virtualPath: string, data: Uint8Array): number {
    const real = this.resolve(virtualPath, 'write');
    if (typeof real === 'number') return real;
    try {
      mkdirSync(dirname(real), { recursive: true });
      writeFileSync(real, data);
      return 0;
    } catch (err) {
      this.logger.debug({ path: virtualPath, err: errorMessage(err) }, 'write_file failed');
      return HostStatus.IO;
    }
  }

  private resolve(virtualPath: string, mode: 'read' | 'write'): string | number {
    try {
      return mode === 'read' ? this.sandbox.resolveRead(virtualPath) : this.sandbox.resolveWrite(virtualPath);
    } catch (err) {
      if (!(err instanceof SandboxError)) throw err;
      this.logger.debug({ path: virtualPath, kind: err.kind }, `${mode}_file rejected`);
      return err.kind === 'ACCESS_DENIED' ? HostStatus.DENIED : HostStatus.INVALID_PATH;
    }
  }
}
