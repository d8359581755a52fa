/**
 * WasmPlugin: runs a guest on the calling thread.
 *
 * Fuel is enforced at host-call boundaries through the ExecutionMeter;
 * memory is bounded by the limits the module was rewritten with, and any
 * memory it imports is created with those same limits. Any call that
 * traps or trips a limit discards the instance; the next call
 * instantiates a fresh one from the compiled module.
 */

import { ExtensionError, errorMessage } from '../errors.js';
import { readLengthPrefixed, writeBytes } from '../host-imports/common.js';
import type { HostFunctions } from '../host-imports/host-functions.js';
import { HOST_MODULE, createHostImports } from '../host-imports/morphir-imports.js';
import type { PlatformAdapter } from '../platform/adapter.js';
import { ExecutionMeter } from './meter.js';
import type { MemoryImport } from './memory-limits.js';
import { GuestExports, classifyTrap, describeExports } from './plugin.js';
import type { PluginInstance } from './plugin.js';

export interface WasmPluginOptions {
  extensionId: string;
  host: HostFunctions;
  adapter: PlatformAdapter;
  memoryImports: MemoryImport[];
  maxFuel?: number;
}

export class WasmPlugin implements PluginInstance {
  private module: WebAssembly.Module;
  private options: WasmPluginOptions;
  private meter: ExecutionMeter;
  private exportNames: Set<string>;
  private instance: WebAssembly.Instance | null = null;
  private disposed = false;

  private constructor(module: WebAssembly.Module, options: WasmPluginOptions) {
    this.module = module;
    this.options = options;
    this.meter = new ExecutionMeter({ maxFuel: options.maxFuel }, options.extensionId);
    this.exportNames = describeExports(module).functions;
  }

  /** Instantiate eagerly so link errors surface at load time as LOAD_FAILED. */
  static async create(module: WebAssembly.Module, options: WasmPluginOptions): Promise<WasmPlugin> {
    const plugin = new WasmPlugin(module, options);
    try {
      plugin.instance = await plugin.instantiate();
    } catch (err) {
      throw new ExtensionError('LOAD_FAILED', `Failed to instantiate module: ${errorMessage(err)}`, {
        extensionId: options.extensionId,
        cause: err,
      });
    }
    return plugin;
  }

  hasExport(name: string): boolean {
    return this.exportNames.has(name);
  }

  async call(exportName: string, input: Uint8Array): Promise<Uint8Array> {
    if (this.disposed) {
      throw new ExtensionError('EXECUTION_FAILED', 'Plugin has been disposed', {
        extensionId: this.options.extensionId,
      });
    }
    const instance = this.instance ?? await this.instantiate();
    this.instance = instance;

    let ptr: number;
    this.meter.start();
    try {
      ptr = this.invoke(instance, exportName, input);
    } catch (err) {
      this.instance = null;
      throw classifyTrap(err, this.options.extensionId);
    } finally {
      this.meter.stop();
    }

    try {
      return readLengthPrefixed(this.memoryOf(instance), ptr);
    } catch (err) {
      throw new ExtensionError('INVALID_RESPONSE', `Export ${exportName} returned an unreadable buffer: ${errorMessage(err)}`, {
        extensionId: this.options.extensionId,
        cause: err,
      });
    }
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    this.instance = null;
  }

  private async instantiate(): Promise<WebAssembly.Instance> {
    const { host, adapter, memoryImports } = this.options;
    const imports: WebAssembly.Imports = {
      [HOST_MODULE]: createHostImports(host, () => this.currentMemory(), this.meter),
    };
    for (const mem of memoryImports) {
      imports[mem.module] = {
        ...imports[mem.module],
        [mem.name]: new WebAssembly.Memory({ initial: mem.initial, maximum: mem.maximum, shared: mem.shared }),
      };
    }
    return adapter.instantiate(this.module, imports);
  }

  private invoke(instance: WebAssembly.Instance, exportName: string, input: Uint8Array): number {
    const fn = instance.exports[exportName];
    if (typeof fn !== 'function') {
      throw new ExtensionError('EXECUTION_FAILED', `Module has no function export "${exportName}"`, {
        extensionId: this.options.extensionId,
      });
    }

    let result: unknown;
    if (fn.length === 0) {
      result = fn();
    } else {
      const alloc = instance.exports[GuestExports.ALLOC];
      if (typeof alloc !== 'function') {
        throw new ExtensionError('EXECUTION_FAILED', 'Module has no alloc export', {
          extensionId: this.options.extensionId,
        });
      }
      const inPtr: unknown = alloc(input.length);
      if (typeof inPtr !== 'number') throw new Error('alloc did not return a pointer');
      writeBytes(this.memoryOf(instance), inPtr, input.length, input);
      result = fn(inPtr, input.length);
    }

    if (typeof result !== 'number') {
      throw new ExtensionError('INVALID_RESPONSE', `Export ${exportName} did not return a pointer`, {
        extensionId: this.options.extensionId,
      });
    }
    // i32 results arrive signed; pointers are unsigned.
    return result >>> 0;
  }

  private memoryOf(instance: WebAssembly.Instance): WebAssembly.Memory {
    const memory = instance.exports[GuestExports.MEMORY];
    if (!(memory instanceof WebAssembly.Memory)) {
      throw new ExtensionError('EXECUTION_FAILED', 'Module does not export its memory', {
        extensionId: this.options.extensionId,
      });
    }
    return memory;
  }

  private currentMemory(): WebAssembly.Memory {
    if (!this.instance) {
      throw new Error('memory not initialized');
    }
    return this.memoryOf(this.instance);
  }
}
