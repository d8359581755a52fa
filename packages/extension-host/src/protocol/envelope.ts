/**
 * Encode/decode helpers for the JSON-RPC envelope, and the mapping from
 * host-side failures onto RPC error codes.
 */

import { ExtensionError, errorMessage } from '../errors.js';
import type { ExtensionErrorKind } from '../errors.js';
import {
  ErrorCodes,
  JSONRPC_VERSION,
  Methods,
  RequestSchema,
  RpcErrorSchema,
} from './types.js';
import type {
  ErrorResponse,
  ExtensionRequest,
  ExtensionResponse,
  ResponseId,
  RpcError,
  SuccessResponse,
} from './types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function createRequest(method: string, params: unknown, id: number): ExtensionRequest {
  return { jsonrpc: JSONRPC_VERSION, method, params: params ?? null, id };
}

export function successResponse(id: ResponseId, result: unknown): SuccessResponse {
  return { jsonrpc: JSONRPC_VERSION, result: result ?? null, id };
}

export function errorResponse(id: ResponseId, error: RpcError): ErrorResponse {
  return { jsonrpc: JSONRPC_VERSION, error, id };
}

export function isErrorResponse(response: ExtensionResponse): response is ErrorResponse {
  return 'error' in response;
}

/**
 * Result of a success response; an error response becomes EXECUTION_FAILED
 * carrying the guest's error object.
 */
export function unwrapResponse(response: ExtensionResponse, extensionId?: string): unknown {
  if (isErrorResponse(response)) {
    const { code, message } = response.error;
    throw new ExtensionError('EXECUTION_FAILED', `Extension error ${code}: ${message}`, {
      extensionId,
      rpcError: response.error,
    });
  }
  return response.result;
}

/** Serialize a request or response to UTF-8 JSON bytes. */
export function encodeMessage(message: ExtensionRequest | ExtensionResponse): Uint8Array {
  let json: string;
  try {
    json = JSON.stringify(message);
  } catch (err) {
    throw new ExtensionError('JSON', `Failed to serialize message: ${errorMessage(err)}`, { cause: err });
  }
  return encoder.encode(json);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasOwn(obj: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/**
 * Decode guest output into a Response. Anything that is not valid JSON,
 * or that carries both or neither of result/error, is INVALID_RESPONSE.
 */
export function decodeResponse(bytes: Uint8Array, extensionId?: string): ExtensionResponse {
  const invalid = (message: string, cause?: unknown) =>
    new ExtensionError('INVALID_RESPONSE', message, { extensionId, cause });

  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(bytes));
  } catch (err) {
    throw invalid(`Response is not valid JSON: ${errorMessage(err)}`, err);
  }
  if (!isRecord(raw)) {
    throw invalid('Response is not a JSON object');
  }
  if (raw.jsonrpc !== JSONRPC_VERSION) {
    throw invalid(`Unsupported jsonrpc version: ${String(raw.jsonrpc)}`);
  }
  const id = raw.id;
  if (id !== null && (typeof id !== 'number' || !Number.isInteger(id))) {
    throw invalid('Response id must be an integer or null');
  }

  const hasResult = hasOwn(raw, 'result');
  const hasError = hasOwn(raw, 'error');
  if (hasResult === hasError) {
    throw invalid(hasResult ? 'Response carries both result and error' : 'Response carries neither result nor error');
  }

  if (hasError) {
    const parsed = RpcErrorSchema.safeParse(raw.error);
    if (!parsed.success) {
      throw invalid(`Malformed error object: ${parsed.error.message}`);
    }
    return errorResponse(id, parsed.data);
  }
  return { jsonrpc: JSONRPC_VERSION, result: raw.result, id };
}

export type DecodedRequest =
  | { ok: true; request: ExtensionRequest }
  | { ok: false; id: ResponseId; error: RpcError };

/** Decode request bytes on the extension side of the boundary. */
export function decodeRequest(bytes: Uint8Array): DecodedRequest {
  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(bytes));
  } catch (err) {
    return {
      ok: false,
      id: null,
      error: { code: ErrorCodes.PARSE_ERROR, message: `Parse error: ${errorMessage(err)}` },
    };
  }
  const parsed = RequestSchema.safeParse(raw);
  if (!parsed.success) {
    const id = isRecord(raw) && typeof raw.id === 'number' ? raw.id : null;
    return {
      ok: false,
      id,
      error: { code: ErrorCodes.INVALID_REQUEST, message: `Invalid request: ${parsed.error.message}` },
    };
  }
  return { ok: true, request: parsed.data };
}

/** Error code a capability method reports when its handler fails. */
export function methodErrorCode(method: string | undefined): number {
  switch (method) {
    case Methods.COMPILE:
      return ErrorCodes.COMPILATION_ERROR;
    case Methods.GENERATE:
      return ErrorCodes.GENERATION_ERROR;
    case Methods.VALIDATE:
      return ErrorCodes.VALIDATION_ERROR;
    case Methods.TRANSFORM:
      return ErrorCodes.TRANSFORMATION_ERROR;
    default:
      return ErrorCodes.EXTENSION_ERROR;
  }
}

function kindToCode(kind: ExtensionErrorKind, method: string | undefined): number {
  switch (kind) {
    case 'JSON':
      return ErrorCodes.PARSE_ERROR;
    case 'UNSUPPORTED_CAPABILITY':
      return ErrorCodes.METHOD_NOT_FOUND;
    case 'INVALID_RESPONSE':
      return ErrorCodes.INTERNAL_ERROR;
    case 'EXECUTION_FAILED':
      return methodErrorCode(method);
    case 'NOT_FOUND':
    case 'DISABLED':
    case 'LOAD_FAILED':
    case 'INIT_FAILED':
    case 'TIMEOUT':
    case 'RESOURCE_EXHAUSTED':
    case 'IO':
      return ErrorCodes.EXTENSION_ERROR;
  }
}

/**
 * Express any failure as an RpcError for a cross-process caller.
 * A guest-supplied error passes through unchanged.
 */
export function toRpcError(err: unknown, method?: string): RpcError {
  if (err instanceof ExtensionError) {
    if (err.rpcError) return err.rpcError;
    const data: Record<string, unknown> = { kind: err.kind };
    if (err.extensionId !== undefined) data.extensionId = err.extensionId;
    return { code: kindToCode(err.kind, method), message: err.message, data };
  }
  return { code: ErrorCodes.INTERNAL_ERROR, message: errorMessage(err) };
}
