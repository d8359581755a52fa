/**
 * Node.js platform adapter: loads .wasm modules from the local filesystem.
 */

import { readdir, readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { PlatformAdapter } from './adapter.js';

function wasmToExtensionId(filename: string): string {
  return filename.replace(/\.wasm$/, '');
}

export class NodeAdapter implements PlatformAdapter {
  async loadModule(path: string): Promise<WebAssembly.Module> {
    const buffer = await readFile(path);
    return this.compile(buffer);
  }

  async compile(bytes: Uint8Array): Promise<WebAssembly.Module> {
    // Copy into a plain ArrayBuffer; the bytes may be a view over shared memory.
    return WebAssembly.compile(new Uint8Array(bytes));
  }

  async instantiate(
    module: WebAssembly.Module,
    imports: WebAssembly.Imports,
  ): Promise<WebAssembly.Instance> {
    return new WebAssembly.Instance(module, imports);
  }

  async scanExtensions(dir: string): Promise<Map<string, string>> {
    const entries = await readdir(dir);
    const extensions = new Map<string, string>();
    for (const entry of entries.sort()) {
      if (!entry.endsWith('.wasm')) continue;
      extensions.set(wasmToExtensionId(entry), resolve(dir, entry));
    }
    return extensions;
  }
}
