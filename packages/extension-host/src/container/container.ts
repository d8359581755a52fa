/**
 * ExtensionContainer: host-side handle for one loaded extension.
 *
 * Owns exactly one plugin instance and serializes every call into it
 * through a FIFO queue. Metadata is fetched from the guest at load time;
 * a module that cannot describe itself never becomes a container.
 */

import { readFile } from 'node:fs/promises';
import type { z } from 'zod';

import { ExtensionError, errorMessage } from '../errors.js';
import { CallQueue } from '../execution/call-queue.js';
import { boundModuleMemory } from '../execution/memory-limits.js';
import type { BoundedModule } from '../execution/memory-limits.js';
import { GuestExports, missingExports } from '../execution/plugin.js';
import type { PluginInstance } from '../execution/plugin.js';
import { WasmPlugin } from '../execution/wasm-plugin.js';
import { WorkerPlugin } from '../execution/worker-plugin.js';
import {
  CompileResultSchema,
  DEFAULT_CAPABILITIES,
  DEFAULT_MAX_MEMORY_BYTES,
  ExtensionCapabilitiesSchema,
  ExtensionInfoSchema,
  GenerateResultSchema,
  TransformResultSchema,
  ValidateResultSchema,
} from '../extension/types.js';
import type {
  CompileRequest,
  CompileResult,
  ExtensionCapabilities,
  ExtensionInfo,
  ExtensionType,
  GenerateRequest,
  GenerateResult,
  ResourceLimits,
  TransformRequest,
  TransformResult,
  ValidateRequest,
  ValidateResult,
} from '../extension/types.js';
import type { HostFunctions } from '../host-imports/host-functions.js';
import { defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { NodeAdapter } from '../platform/node-adapter.js';
import type { PlatformAdapter } from '../platform/adapter.js';
import { createRequest, decodeResponse, encodeMessage, unwrapResponse } from '../protocol/envelope.js';
import { Methods } from '../protocol/types.js';

export interface ContainerOptions {
  limits?: ResourceLimits;
  /**
   * Run the guest in a worker thread so runaway compute can be killed.
   * Implied by `limits.maxTimeMs`.
   */
  hardKill?: boolean;
  adapter?: PlatformAdapter;
  logger?: Logger;
}

const EMPTY = new Uint8Array(0);
const decoder = new TextDecoder();

function parseJson(bytes: Uint8Array): unknown {
  return JSON.parse(decoder.decode(bytes));
}

export class ExtensionContainer {
  readonly id: string;
  readonly info: ExtensionInfo;
  readonly limits: ResourceLimits;
  readonly hardKill: boolean;
  private plugin: PluginInstance;
  private queue = new CallQueue();
  private nextRequestId = 1;
  private logger: Logger;
  private disposed = false;

  private constructor(
    id: string,
    plugin: PluginInstance,
    info: ExtensionInfo,
    limits: ResourceLimits,
    hardKill: boolean,
    logger: Logger,
  ) {
    this.id = id;
    this.plugin = plugin;
    this.info = info;
    this.limits = limits;
    this.hardKill = hardKill;
    this.logger = logger;
  }

  static async fromFile(
    id: string,
    wasmPath: string,
    host: HostFunctions,
    options?: ContainerOptions,
  ): Promise<ExtensionContainer> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(wasmPath);
    } catch (err) {
      throw new ExtensionError('IO', `Failed to read ${wasmPath}: ${errorMessage(err)}`, {
        extensionId: id,
        cause: err,
      });
    }
    return ExtensionContainer.fromBytes(id, bytes, host, options);
  }

  static async fromBytes(
    id: string,
    bytes: Uint8Array,
    host: HostFunctions,
    options: ContainerOptions = {},
  ): Promise<ExtensionContainer> {
    const adapter = options.adapter ?? new NodeAdapter();
    const logger = (options.logger ?? defaultLogger).child({ component: 'container', extension: id });
    const maxMemoryBytes = options.limits?.maxMemoryBytes ?? DEFAULT_MAX_MEMORY_BYTES;
    const limits: ResourceLimits = { ...options.limits, maxMemoryBytes };
    // A time limit needs a thread the guest cannot block.
    const hardKill = options.hardKill === true || limits.maxTimeMs !== undefined;

    let bounded: BoundedModule;
    try {
      bounded = boundModuleMemory(bytes, maxMemoryBytes);
    } catch (err) {
      throw new ExtensionError('LOAD_FAILED', `Invalid module: ${errorMessage(err)}`, {
        extensionId: id,
        cause: err,
      });
    }

    let module: WebAssembly.Module;
    try {
      module = await adapter.compile(bounded.bytes);
    } catch (err) {
      throw new ExtensionError('LOAD_FAILED', `Failed to compile module: ${errorMessage(err)}`, {
        extensionId: id,
        cause: err,
      });
    }

    const missing = missingExports(module);
    if (missing) {
      throw new ExtensionError('INIT_FAILED', missing, { extensionId: id });
    }

    const pluginOptions = {
      extensionId: id,
      host: host.forExtension(id),
      memoryImports: bounded.memoryImports,
      maxFuel: limits.maxFuel,
    };
    const plugin: PluginInstance = hardKill
      ? await WorkerPlugin.create(module, { ...pluginOptions, maxTimeMs: limits.maxTimeMs, logger })
      : await WasmPlugin.create(module, { ...pluginOptions, adapter });

    let info: ExtensionInfo;
    try {
      info = ExtensionInfoSchema.parse(parseJson(await plugin.call(GuestExports.INFO, EMPTY)));
    } catch (err) {
      await plugin.dispose();
      throw new ExtensionError('INIT_FAILED', `Extension did not describe itself: ${errorMessage(err)}`, {
        extensionId: id,
        cause: err,
      });
    }

    logger.debug({ name: info.name, version: info.version, types: info.types }, 'container ready');
    return new ExtensionContainer(id, plugin, info, limits, hardKill, logger);
  }

  supports(type: ExtensionType): boolean {
    return this.info.types.includes(type);
  }

  /** Calls queued or running. */
  get pendingCalls(): number {
    return this.queue.pending;
  }

  /**
   * Invoke a JSON-RPC method on the guest. With a schema the result is
   * validated and typed; a result that does not match is INVALID_RESPONSE.
   */
  async call(method: string, params: unknown): Promise<unknown>;
  async call<S extends z.ZodTypeAny>(method: string, params: unknown, schema: S): Promise<z.output<S>>;
  async call(method: string, params: unknown, schema?: z.ZodTypeAny): Promise<unknown> {
    const id = this.nextRequestId++;
    const request = encodeMessage(createRequest(method, params, id));
    this.logger.debug({ method, id }, 'calling extension');

    const output = await this.enqueue(GuestExports.HANDLE, request);
    const response = decodeResponse(output, this.id);
    if (response.id !== id) {
      this.logger.warn({ method, expected: id, received: response.id }, 'response id does not match request');
    }
    const result = unwrapResponse(response, this.id);
    if (!schema) return result;

    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new ExtensionError('INVALID_RESPONSE', `Unexpected result for ${method}: ${parsed.error.message}`, {
        extensionId: this.id,
      });
    }
    return parsed.data;
  }

  async compile(request: CompileRequest): Promise<CompileResult> {
    this.requireCapability('frontend');
    return this.call(Methods.COMPILE, request, CompileResultSchema);
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    this.requireCapability('backend');
    return this.call(Methods.GENERATE, request, GenerateResultSchema);
  }

  async validate(request: ValidateRequest): Promise<ValidateResult> {
    this.requireCapability('validator');
    return this.call(Methods.VALIDATE, request, ValidateResultSchema);
  }

  async transform(request: TransformRequest): Promise<TransformResult> {
    this.requireCapability('transform');
    return this.call(Methods.TRANSFORM, request, TransformResultSchema);
  }

  /** Invoke an export directly, without the JSON-RPC envelope. */
  async callRaw(exportName: string, input: Uint8Array): Promise<Uint8Array> {
    if (!this.plugin.hasExport(exportName)) {
      throw new ExtensionError('EXECUTION_FAILED', `Module has no function export "${exportName}"`, {
        extensionId: this.id,
      });
    }
    return this.enqueue(exportName, input);
  }

  /** Optional feature flags; defaults when the guest has no `capabilities` export. */
  async capabilities(): Promise<ExtensionCapabilities> {
    if (!this.plugin.hasExport(GuestExports.CAPABILITIES)) {
      return { ...DEFAULT_CAPABILITIES };
    }
    const output = await this.enqueue(GuestExports.CAPABILITIES, EMPTY);
    let raw: unknown;
    try {
      raw = parseJson(output);
    } catch (err) {
      throw new ExtensionError('INVALID_RESPONSE', `Capabilities are not valid JSON: ${errorMessage(err)}`, {
        extensionId: this.id,
        cause: err,
      });
    }
    const parsed = ExtensionCapabilitiesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExtensionError('INVALID_RESPONSE', `Malformed capabilities: ${parsed.error.message}`, {
        extensionId: this.id,
      });
    }
    return parsed.data;
  }

  /** Wait for queued calls to finish, then release the instance. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await this.queue.drain();
    await this.plugin.dispose();
  }

  private enqueue(exportName: string, input: Uint8Array): Promise<Uint8Array> {
    if (this.disposed) {
      return Promise.reject(new ExtensionError('EXECUTION_FAILED', 'Container has been disposed', {
        extensionId: this.id,
      }));
    }
    return this.queue.enqueue(() => this.plugin.call(exportName, input));
  }

  private requireCapability(type: ExtensionType): void {
    if (!this.supports(type)) {
      throw new ExtensionError('UNSUPPORTED_CAPABILITY', `Extension ${this.id} does not support ${type}`, {
        extensionId: this.id,
      });
    }
  }
}
