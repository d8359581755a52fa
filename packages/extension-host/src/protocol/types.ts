/**
 * JSON-RPC 2.0 envelope for host ↔ extension calls.
 *
 * Every invocation is a single blocking round trip: the request id is a
 * correlation token, never a multiplexing key.
 */

import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';

export const Methods = {
  INFO: 'morphir.extension.info',
  CAPABILITIES: 'morphir.extension.capabilities',
  COMPILE: 'morphir.frontend.compile',
  GENERATE: 'morphir.backend.generate',
  VALIDATE: 'morphir.validator.validate',
  TRANSFORM: 'morphir.transform.transform',
} as const;

export type ExtensionMethod = (typeof Methods)[keyof typeof Methods];

export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  // Server-defined range
  EXTENSION_ERROR: -32000,
  COMPILATION_ERROR: -32001,
  GENERATION_ERROR: -32002,
  VALIDATION_ERROR: -32003,
  TRANSFORMATION_ERROR: -32004,
} as const;

export const RpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export type RpcError = z.infer<typeof RpcErrorSchema>;

export const RequestSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  method: z.string().min(1),
  params: z.unknown(),
  id: z.number().int().nonnegative(),
});

export type ExtensionRequest = z.infer<typeof RequestSchema>;

/** id is null only when the peer could not read the request id. */
export type ResponseId = number | null;

export interface SuccessResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  result: unknown;
  id: ResponseId;
}

export interface ErrorResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  error: RpcError;
  id: ResponseId;
}

/** Exactly one of `result` / `error` is present. */
export type ExtensionResponse = SuccessResponse | ErrorResponse;
