/**
 * WorkerPlugin: runs a guest in a worker_threads Worker.
 *
 * A guest stuck in pure computation never reaches a host call, so the
 * meter cannot stop it; here the main thread owns a wall-clock timer and
 * terminates the worker when it fires. Host calls are relayed back to the
 * main thread over a SharedArrayBuffer and served by the same
 * HostFunctions an inline guest uses. After a terminated or failed call
 * the worker is replaced lazily on the next call. An idle worker is
 * unref'd so it never holds the host process open on its own.
 */

import type { Worker } from 'node:worker_threads';
import { z } from 'zod';

import { EXTENSION_ERROR_KINDS, ExtensionError, errorMessage } from '../errors.js';
import type { HostFunctions } from '../host-imports/host-functions.js';
import { RelayRequestSchema, serveHostCall } from '../host-imports/relay.js';
import { defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { MemoryImport } from './memory-limits.js';
import { describeExports } from './plugin.js';
import type { PluginInstance } from './plugin.js';
import type { RelayMessage } from './proxy-protocol.js';
import {
  SAB_SIZE,
  STATUS_ERROR,
  STATUS_RESPONSE,
  decodeMessage,
  respond,
} from './proxy-protocol.js';
import { PLUGIN_WORKER_SOURCE } from './worker-source.js';

export interface WorkerPluginOptions {
  extensionId: string;
  host: HostFunctions;
  memoryImports: MemoryImport[];
  maxTimeMs?: number;
  maxFuel?: number;
  logger?: Logger;
}

const WorkerMessageSchema = z.union([
  z.literal('proxy-request'),
  z.object({ type: z.literal('ready') }),
  z.object({ type: z.literal('init-error'), message: z.string() }),
  z.object({ type: z.literal('result'), output: z.instanceof(Uint8Array) }),
  z.object({ type: z.literal('error'), kind: z.enum(EXTENSION_ERROR_KINDS), message: z.string() }),
]);

type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

interface PendingCall {
  resolve: (output: Uint8Array) => void;
  reject: (err: ExtensionError) => void;
}

interface WorkerHandle {
  worker: Worker;
  sab: SharedArrayBuffer;
}

export class WorkerPlugin implements PluginInstance {
  private module: WebAssembly.Module;
  private options: WorkerPluginOptions;
  private logger: Logger;
  private exportNames: Set<string>;
  private current: WorkerHandle | null = null;
  private pending: PendingCall | null = null;
  private timeoutTimer: ReturnType<typeof setTimeout> | null = null;
  private disposed = false;

  private constructor(module: WebAssembly.Module, options: WorkerPluginOptions) {
    this.module = module;
    this.options = options;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'worker', extension: options.extensionId });
    this.exportNames = describeExports(module).functions;
  }

  /** Start the worker and wait until it has instantiated the module. */
  static async create(module: WebAssembly.Module, options: WorkerPluginOptions): Promise<WorkerPlugin> {
    const plugin = new WorkerPlugin(module, options);
    await plugin.startWorker();
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
    const handle = this.current ?? await this.startWorker();

    return new Promise<Uint8Array>((resolve, reject) => {
      this.pending = { resolve, reject };

      const { maxTimeMs } = this.options;
      if (maxTimeMs !== undefined) {
        this.timeoutTimer = setTimeout(() => {
          this.logger.warn({ exportName, maxTimeMs }, 'terminating worker on time limit');
          this.terminate(new ExtensionError('TIMEOUT', `Call exceeded time limit of ${maxTimeMs}ms`, {
            extensionId: this.options.extensionId,
          }));
        }, maxTimeMs);
      }

      handle.worker.ref();
      handle.worker.postMessage({ type: 'call', exportName, input });
    });
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    const handle = this.current;
    this.current = null;
    this.settle((pending) => pending.reject(new ExtensionError('EXECUTION_FAILED', 'Plugin has been disposed', {
      extensionId: this.options.extensionId,
    })));
    if (handle) {
      await handle.worker.terminate();
    }
  }

  private async startWorker(): Promise<WorkerHandle> {
    const { Worker } = await import('node:worker_threads');
    const sab = new SharedArrayBuffer(SAB_SIZE);
    const worker = new Worker(PLUGIN_WORKER_SOURCE, {
      eval: true,
      workerData: {
        module: this.module,
        sab,
        memoryImports: this.options.memoryImports,
        maxFuel: this.options.maxFuel,
      },
    });
    const handle: WorkerHandle = { worker, sab };

    await new Promise<void>((resolve, reject) => {
      const onMessage = (raw: unknown) => {
        const msg = WorkerMessageSchema.safeParse(raw);
        if (!msg.success || msg.data === 'proxy-request') return;
        if (msg.data.type === 'ready') {
          cleanup();
          resolve();
        } else if (msg.data.type === 'init-error') {
          cleanup();
          reject(new ExtensionError('LOAD_FAILED', `Failed to instantiate module: ${msg.data.message}`, {
            extensionId: this.options.extensionId,
          }));
        }
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new ExtensionError('LOAD_FAILED', `Worker failed to start: ${err.message}`, {
          extensionId: this.options.extensionId,
          cause: err,
        }));
      };
      const cleanup = () => {
        worker.off('message', onMessage);
        worker.off('error', onError);
      };
      worker.on('message', onMessage);
      worker.on('error', onError);
    }).catch(async (err: unknown) => {
      await worker.terminate();
      throw err;
    });
    worker.unref();

    worker.on('message', (raw: unknown) => this.onMessage(handle, raw));
    worker.on('error', (err) => {
      if (this.current !== handle) return;
      this.terminate(new ExtensionError('EXECUTION_FAILED', `Worker error: ${err.message}`, {
        extensionId: this.options.extensionId,
        cause: err,
      }));
    });
    worker.on('exit', (code) => {
      if (this.current !== handle) return;
      this.terminate(new ExtensionError('EXECUTION_FAILED', `Worker exited with code ${code}`, {
        extensionId: this.options.extensionId,
      }));
    });

    this.current = handle;
    return handle;
  }

  private onMessage(handle: WorkerHandle, raw: unknown): void {
    // Messages from a worker we already replaced are stale.
    if (this.current !== handle) return;
    const parsed = WorkerMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ error: parsed.error.message }, 'unrecognized worker message');
      return;
    }
    const msg: WorkerMessage = parsed.data;
    if (msg === 'proxy-request') {
      this.handleProxyRequest(handle.sab);
      return;
    }
    if (msg.type === 'result') {
      this.settle((pending) => pending.resolve(msg.output));
    } else if (msg.type === 'error') {
      this.settle((pending) => pending.reject(new ExtensionError(msg.kind, msg.message, {
        extensionId: this.options.extensionId,
      })));
    }
  }

  private handleProxyRequest(sab: SharedArrayBuffer): void {
    let message: RelayMessage;
    try {
      message = decodeMessage(sab);
    } catch (err) {
      respond(sab, STATUS_ERROR, { message: `Malformed host call: ${errorMessage(err)}` });
      return;
    }
    const request = RelayRequestSchema.safeParse(message.metadata);
    if (!request.success) {
      respond(sab, STATUS_ERROR, { message: `Unknown host call: ${request.error.message}` });
      return;
    }
    try {
      const reply = serveHostCall(this.options.host, request.data, message.binary);
      respond(sab, STATUS_RESPONSE, reply.metadata, reply.binary);
    } catch (err) {
      respond(sab, STATUS_ERROR, { message: errorMessage(err) });
    }
  }

  private settle(fn: (pending: PendingCall) => void): void {
    if (this.timeoutTimer) {
      clearTimeout(this.timeoutTimer);
      this.timeoutTimer = null;
    }
    this.current?.worker.unref();
    const pending = this.pending;
    this.pending = null;
    if (pending) fn(pending);
  }

  private terminate(reason: ExtensionError): void {
    const handle = this.current;
    this.current = null;
    if (handle) {
      handle.worker.terminate().catch((err: unknown) => {
        this.logger.warn({ err: errorMessage(err) }, 'worker terminate failed');
      });
    }
    this.settle((pending) => pending.reject(reason));
  }
}
