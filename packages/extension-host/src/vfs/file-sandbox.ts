/**
 * Permission layer over VirtualPathConfig.
 *
 * Mapped paths are always allowed. Unmapped paths are allowed only when the
 * matching external-access flag is set, and even then they fail resolution
 * with INVALID_PATH rather than ACCESS_DENIED.
 */

import { SandboxError } from '../errors.js';
import type { VirtualPathConfig } from './virtual-paths.js';

export interface FileSandboxOptions {
  allowExternalReads?: boolean;
  allowExternalWrites?: boolean;
}

export class FileSandbox {
  readonly config: VirtualPathConfig;
  private allowExternalReads: boolean;
  private allowExternalWrites: boolean;

  constructor(config: VirtualPathConfig, options?: FileSandboxOptions) {
    this.config = config;
    this.allowExternalReads = options?.allowExternalReads ?? false;
    this.allowExternalWrites = options?.allowExternalWrites ?? false;
  }

  static permissive(config: VirtualPathConfig): FileSandbox {
    return new FileSandbox(config, { allowExternalReads: true, allowExternalWrites: true });
  }

  canRead(path: string): boolean {
    return this.config.isValid(path) || this.allowExternalReads;
  }

  canWrite(path: string): boolean {
    return this.config.isValid(path) || this.allowExternalWrites;
  }

  resolveRead(virtualPath: string): string {
    if (!this.canRead(virtualPath)) {
      throw new SandboxError('ACCESS_DENIED', virtualPath);
    }
    return this.resolveMapped(virtualPath);
  }

  resolveWrite(virtualPath: string): string {
    if (!this.canWrite(virtualPath)) {
      throw new SandboxError('ACCESS_DENIED', virtualPath);
    }
    return this.resolveMapped(virtualPath);
  }

  private resolveMapped(virtualPath: string): string {
    const real = this.config.resolve(virtualPath);
    if (real === undefined) {
      throw new SandboxError('INVALID_PATH', virtualPath);
    }
    return real;
  }
}
