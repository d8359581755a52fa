/**
 * Virtual path mappings: logical paths an extension sees (`/workspace/...`)
 * mapped onto real host directories.
 *
 * When several prefixes could match a query, the longest one wins, so
 * `/workspace/gen` mapped separately from `/workspace` always takes its own
 * subtree regardless of insertion order. A suffix that climbs out of its
 * base through `..` does not resolve.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, relative, sep } from 'node:path';

function stripTrailingSlashes(prefix: string): string {
  return prefix.replace(/\/+$/, '');
}

function escapesBase(base: string, target: string): boolean {
  const rel = relative(base, target);
  return rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
}

export class VirtualPathConfig {
  private mappings = new Map<string, string>();

  /** Standard layout: `/workspace`, `/output` and `/cache`. */
  static forWorkspace(workspaceRoot: string, outputDir: string, cacheDir?: string): VirtualPathConfig {
    const config = new VirtualPathConfig();
    config.addMapping('/workspace', workspaceRoot);
    config.addMapping('/output', outputDir);
    config.addMapping('/cache', cacheDir ?? join(process.env.XDG_CACHE_HOME || join(homedir(), '.cache'), 'morphir'));
    return config;
  }

  addMapping(virtualPrefix: string, realPath: string): void {
    this.mappings.set(stripTrailingSlashes(virtualPrefix), realPath);
  }

  removeMapping(virtualPrefix: string): void {
    this.mappings.delete(stripTrailingSlashes(virtualPrefix));
  }

  resolve(virtualPath: string): string | undefined {
    for (const [prefix, base] of this.byLength((p) => p)) {
      if (virtualPath === prefix) return base;
      if (!virtualPath.startsWith(`${prefix}/`)) continue;

      const suffix = virtualPath.slice(prefix.length).replace(/^\/+/, '');
      if (suffix === '') return base;
      const real = join(base, suffix);
      return escapesBase(base, real) ? undefined : real;
    }
    return undefined;
  }

  virtualize(realPath: string): string | undefined {
    for (const [prefix, base] of this.byLength((_, b) => b)) {
      if (escapesBase(base, realPath)) continue;
      const rel = relative(base, realPath);
      if (rel === '') return prefix;
      return `${prefix}/${rel.split(sep).join('/')}`;
    }
    return undefined;
  }

  isValid(virtualPath: string): boolean {
    return this.resolve(virtualPath) !== undefined;
  }

  prefixes(): string[] {
    return Array.from(this.mappings.keys());
  }

  getMapping(prefix: string): string | undefined {
    return this.mappings.get(stripTrailingSlashes(prefix));
  }

  /** Entries ordered by descending key length; ties keep insertion order. */
  private byLength(key: (prefix: string, base: string) => string): [string, string][] {
    return Array.from(this.mappings.entries())
      .sort(([pa, ba], [pb, bb]) => key(pb, bb).length - key(pa, ba).length);
  }
}
