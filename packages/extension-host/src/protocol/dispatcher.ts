/**
 * Extension-side JSON-RPC dispatcher.
 *
 * Maps protocol method names to capability handlers. The method table is
 * built explicitly from the handlers passed at construction: an extension
 * advertises exactly the capability types it registered a handler for.
 * Transport-agnostic: `dispatch` takes a decoded request, `handleBytes`
 * implements the guest `handle` export contract (bytes in, bytes out).
 */

import type { z } from 'zod';
import { ExtensionError, errorMessage } from '../errors.js';
import {
  CompileRequestSchema,
  DEFAULT_CAPABILITIES,
  GenerateRequestSchema,
  TransformRequestSchema,
  ValidateRequestSchema,
} from '../extension/types.js';
import type {
  CompileResult,
  ExtensionCapabilities,
  ExtensionInfoSchema,
  ExtensionType,
  GenerateResult,
  TransformResult,
  ValidateResult,
} from '../extension/types.js';
import {
  decodeRequest,
  encodeMessage,
  errorResponse,
  methodErrorCode,
  successResponse,
} from './envelope.js';
import { ErrorCodes, Methods, RpcErrorSchema } from './types.js';
import type { ExtensionRequest, ExtensionResponse, RpcError } from './types.js';

type Awaitable<T> = T | Promise<T>;

export type CapabilityHandler =
  | { type: 'frontend'; compile(request: z.output<typeof CompileRequestSchema>): Awaitable<CompileResult> }
  | { type: 'backend'; generate(request: z.output<typeof GenerateRequestSchema>): Awaitable<GenerateResult> }
  | { type: 'validator'; validate(request: z.output<typeof ValidateRequestSchema>): Awaitable<ValidateResult> }
  | { type: 'transform'; transform(request: z.output<typeof TransformRequestSchema>): Awaitable<TransformResult> };

/** Extension metadata in wire form; `types` is derived from the handlers. */
export type DispatcherInfo = Omit<z.input<typeof ExtensionInfoSchema>, 'types'>;

type MethodRunner = (params: unknown) => Promise<unknown>;

class InvalidParamsError extends Error {}

function runner<S extends z.ZodTypeAny>(schema: S, fn: (params: z.output<S>) => unknown): MethodRunner {
  return async (params) => {
    const parsed = schema.safeParse(params);
    if (!parsed.success) {
      throw new InvalidParamsError(parsed.error.message);
    }
    return fn(parsed.data);
  };
}

function methodFor(handler: CapabilityHandler): [string, MethodRunner] {
  switch (handler.type) {
    case 'frontend':
      return [Methods.COMPILE, runner(CompileRequestSchema, (p) => handler.compile(p))];
    case 'backend':
      return [Methods.GENERATE, runner(GenerateRequestSchema, (p) => handler.generate(p))];
    case 'validator':
      return [Methods.VALIDATE, runner(ValidateRequestSchema, (p) => handler.validate(p))];
    case 'transform':
      return [Methods.TRANSFORM, runner(TransformRequestSchema, (p) => handler.transform(p))];
  }
}

export class ExtensionDispatcher {
  private methods = new Map<string, MethodRunner>();
  private info: DispatcherInfo;
  private capabilities: ExtensionCapabilities;
  private types: ExtensionType[] = [];

  constructor(
    info: DispatcherInfo,
    handlers: CapabilityHandler[],
    capabilities?: Partial<ExtensionCapabilities>,
  ) {
    this.info = info;
    this.capabilities = { ...DEFAULT_CAPABILITIES, ...capabilities };

    for (const handler of handlers) {
      if (this.types.includes(handler.type)) {
        throw new Error(`Duplicate ${handler.type} handler for extension ${info.id}`);
      }
      const [method, run] = methodFor(handler);
      this.methods.set(method, run);
      this.types.push(handler.type);
    }
    this.methods.set(Methods.INFO, async () => this.describe());
    this.methods.set(Methods.CAPABILITIES, async () => this.capabilities);
  }

  /** Wire-form metadata, as returned by the `info` export. */
  describe(): z.input<typeof ExtensionInfoSchema> {
    return { ...this.info, types: [...this.types] };
  }

  /** Methods this extension answers, in registration order. */
  supportedMethods(): string[] {
    return Array.from(this.methods.keys());
  }

  async dispatch(request: ExtensionRequest): Promise<ExtensionResponse> {
    const run = this.methods.get(request.method);
    if (!run) {
      return errorResponse(request.id, {
        code: ErrorCodes.METHOD_NOT_FOUND,
        message: `Method not found: ${request.method}`,
      });
    }
    try {
      return successResponse(request.id, await run(request.params));
    } catch (err) {
      return errorResponse(request.id, this.toError(err, request.method));
    }
  }

  /** `handle` export contract: JSON request bytes in, JSON response bytes out. */
  async handleBytes(input: Uint8Array): Promise<Uint8Array> {
    const decoded = decodeRequest(input);
    if (!decoded.ok) {
      return encodeMessage(errorResponse(decoded.id, decoded.error));
    }
    return encodeMessage(await this.dispatch(decoded.request));
  }

  /** `info` export contract. */
  infoBytes(): Uint8Array {
    return new TextEncoder().encode(JSON.stringify(this.describe()));
  }

  private toError(err: unknown, method: string): RpcError {
    if (err instanceof InvalidParamsError) {
      return { code: ErrorCodes.INVALID_PARAMS, message: `Invalid params: ${err.message}` };
    }
    if (err instanceof ExtensionError && err.rpcError) {
      return err.rpcError;
    }
    const rpc = RpcErrorSchema.safeParse(err);
    if (rpc.success) {
      return rpc.data;
    }
    return { code: methodErrorCode(method), message: errorMessage(err) };
  }
}
