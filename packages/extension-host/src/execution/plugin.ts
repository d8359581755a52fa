/**
 * Guest ABI and the execution-mode-independent plugin interface.
 *
 * Every extension module exports `memory`, `alloc(len) -> ptr`,
 * `info() -> ptr` and `handle(ptr, len) -> ptr`, and optionally
 * `capabilities() -> ptr`. A returned pointer addresses a u32
 * little-endian length followed by that many bytes of output.
 */

import { ExtensionError, errorMessage } from '../errors.js';

export const GuestExports = {
  MEMORY: 'memory',
  ALLOC: 'alloc',
  INFO: 'info',
  HANDLE: 'handle',
  CAPABILITIES: 'capabilities',
} as const;

export const REQUIRED_FUNCTION_EXPORTS = [GuestExports.ALLOC, GuestExports.INFO, GuestExports.HANDLE];

export const WASM_PAGE_BYTES = 64 * 1024;

export interface PluginInstance {
  /**
   * Invoke a function export. Exports that take parameters receive
   * `input` written into guest memory via `alloc`; zero-parameter exports
   * are called bare.
   */
  call(exportName: string, input: Uint8Array): Promise<Uint8Array>;

  hasExport(name: string): boolean;

  dispose(): Promise<void>;
}

/** Names of the function and memory exports a module declares. */
export function describeExports(module: WebAssembly.Module): { functions: Set<string>; memories: Set<string> } {
  const functions = new Set<string>();
  const memories = new Set<string>();
  for (const exp of WebAssembly.Module.exports(module)) {
    if (exp.kind === 'function') functions.add(exp.name);
    else if (exp.kind === 'memory') memories.add(exp.name);
  }
  return { functions, memories };
}

/**
 * Missing parts of the guest ABI, as a message, or undefined when the
 * module exports everything required.
 */
export function missingExports(module: WebAssembly.Module): string | undefined {
  const { functions, memories } = describeExports(module);
  const missing: string[] = REQUIRED_FUNCTION_EXPORTS.filter((name) => !functions.has(name));
  if (!memories.has(GuestExports.MEMORY)) missing.push(GuestExports.MEMORY);
  return missing.length > 0 ? `Module is missing required exports: ${missing.join(', ')}` : undefined;
}

/** Wrap a trap or host-side abort raised during a guest call. */
export function classifyTrap(err: unknown, extensionId: string): ExtensionError {
  if (err instanceof ExtensionError) return err;
  return new ExtensionError('EXECUTION_FAILED', `Extension trapped: ${errorMessage(err)}`, {
    extensionId,
    cause: err,
  });
}
