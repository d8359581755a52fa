/**
 * Session-scoped state behind the host functions.
 *
 * One IrCache belongs to one registry; every container that registry builds
 * shares it. Accesses are synchronous and complete before control returns
 * to guest code, so no entry is ever observed half-written.
 */

export class IrCache {
  private entries = new Map<string, unknown>();

  get(key: string): unknown {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, ir: unknown): void {
    this.entries.set(key, ir);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface HostState {
  workspaceRoot: string;
  outputDir: string;
  irCache: IrCache;
}

export function createHostState(
  workspaceRoot = '.',
  outputDir = '.morphir-dist',
  irCache: IrCache = new IrCache(),
): HostState {
  return { workspaceRoot, outputDir, irCache };
}
