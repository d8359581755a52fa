/** Error taxonomy for extension loading and invocation. */

import type { RpcError } from './protocol/types.js';

export const EXTENSION_ERROR_KINDS = [
  'NOT_FOUND',
  'DISABLED',
  'LOAD_FAILED',
  'INIT_FAILED',
  'UNSUPPORTED_CAPABILITY',
  'EXECUTION_FAILED',
  'INVALID_RESPONSE',
  'TIMEOUT',
  'RESOURCE_EXHAUSTED',
  'IO',
  'JSON',
] as const;

export type ExtensionErrorKind = (typeof EXTENSION_ERROR_KINDS)[number];

export interface ExtensionErrorOptions {
  extensionId?: string;
  /** Error object the guest returned in its JSON-RPC response. */
  rpcError?: RpcError;
  cause?: unknown;
}

export class ExtensionError extends Error {
  kind: ExtensionErrorKind;
  extensionId: string | undefined;
  rpcError: RpcError | undefined;

  constructor(kind: ExtensionErrorKind, message: string, options?: ExtensionErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ExtensionError';
    this.kind = kind;
    this.extensionId = options?.extensionId;
    this.rpcError = options?.rpcError;
  }
}

export function isExtensionError(err: unknown, kind?: ExtensionErrorKind): err is ExtensionError {
  return err instanceof ExtensionError && (kind === undefined || err.kind === kind);
}

export function errorKindOf(err: unknown): ExtensionErrorKind | undefined {
  return err instanceof ExtensionError ? err.kind : undefined;
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type SandboxErrorKind = 'ACCESS_DENIED' | 'INVALID_PATH';

/**
 * Raised by FileSandbox. ACCESS_DENIED is a policy decision, INVALID_PATH
 * means access was allowed but no mapping covers the path.
 */
export class SandboxError extends Error {
  kind: SandboxErrorKind;
  path: string;

  constructor(kind: SandboxErrorKind, path: string) {
    super(kind === 'ACCESS_DENIED' ? `Access denied: ${path}` : `Invalid path: ${path}`);
    this.name = 'SandboxError';
    this.kind = kind;
    this.path = path;
  }
}
