/**
 * Main-thread side of host calls made by a guest running in a worker.
 *
 * The worker marshals arguments out of guest memory and posts one op per
 * host call; this module answers it from the same HostFunctions an inline
 * guest would use. Guest-visible status codes travel in `metadata.status`.
 */

import { z } from 'zod';

import type { HostFunctions } from './host-functions.js';

const decoder = new TextDecoder();
const encoder = new TextEncoder();

export const RelayRequestSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('workspaceInfo') }),
  z.object({ op: z.literal('cacheIr'), key: z.string() }),
  z.object({ op: z.literal('getCachedIr'), key: z.string() }),
  z.object({ op: z.literal('log'), level: z.string(), message: z.string() }),
  z.object({ op: z.literal('readFile'), path: z.string() }),
  z.object({ op: z.literal('writeFile'), path: z.string() }),
]);

export type RelayRequest = z.infer<typeof RelayRequestSchema>;

export interface RelayReply {
  metadata: { status: number };
  binary?: Uint8Array;
}

export function serveHostCall(
  host: HostFunctions,
  request: RelayRequest,
  binary: Uint8Array | null,
): RelayReply {
  switch (request.op) {
    case 'workspaceInfo':
      return { metadata: { status: 0 }, binary: encoder.encode(JSON.stringify(host.workspaceInfo())) };
    case 'cacheIr': {
      const ok = host.cacheIr(request.key, decoder.decode(binary ?? new Uint8Array(0)));
      return { metadata: { status: ok ? 0 : -1 } };
    }
    case 'getCachedIr': {
      const ir = host.getCachedIr(request.key);
      if (ir === undefined) return { metadata: { status: -1 } };
      return { metadata: { status: 0 }, binary: encoder.encode(ir) };
    }
    case 'log':
      host.log(request.level, request.message);
      return { metadata: { status: 0 } };
    case 'readFile': {
      const result = host.readFile(request.path);
      if (!result.ok) return { metadata: { status: result.status } };
      return { metadata: { status: 0 }, binary: result.data };
    }
    case 'writeFile':
      return { metadata: { status: host.writeFile(request.path, binary ?? new Uint8Array(0)) } };
  }
}
