/**
 * `morphir` import namespace for inline (main-thread) guests.
 *
 * Every import charges the execution meter first, so fuel limits
 * are enforced at each host call. Memory is resolved per call because the
 * guest's buffer is replaced when it grows.
 */

import type { ExecutionMeter } from '../execution/meter.js';
import {
  readBytes,
  readString,
  writeBytes,
  writeJson,
  writeString,
} from './common.js';
import type { HostFunctions } from './host-functions.js';

export const HOST_MODULE = 'morphir';

export const HOST_IMPORT_NAMES = [
  'get_workspace_info',
  'cache_ir',
  'get_cached_ir',
  'log',
  'read_file',
  'write_file',
] as const;

export function createHostImports(
  host: HostFunctions,
  memory: () => WebAssembly.Memory,
  meter: ExecutionMeter,
): WebAssembly.ModuleImports {
  return {
    get_workspace_info(outPtr: number, outCap: number): number {
      meter.charge();
      return writeJson(memory(), outPtr, outCap, host.workspaceInfo());
    },

    cache_ir(keyPtr: number, keyLen: number, irPtr: number, irLen: number): number {
      meter.charge();
      const mem = memory();
      const key = readString(mem, keyPtr, keyLen);
      return host.cacheIr(key, readString(mem, irPtr, irLen)) ? 0 : -1;
    },

    get_cached_ir(keyPtr: number, keyLen: number, outPtr: number, outCap: number): number {
      meter.charge();
      const mem = memory();
      const ir = host.getCachedIr(readString(mem, keyPtr, keyLen));
      if (ir === undefined) return -1;
      return writeString(mem, outPtr, outCap, ir);
    },

    log(levelPtr: number, levelLen: number, msgPtr: number, msgLen: number): void {
      meter.charge();
      const mem = memory();
      host.log(readString(mem, levelPtr, levelLen), readString(mem, msgPtr, msgLen));
    },

    read_file(pathPtr: number, pathLen: number, outPtr: number, outCap: number): number {
      meter.charge();
      const mem = memory();
      const result = host.readFile(readString(mem, pathPtr, pathLen));
      if (!result.ok) return result.status;
      return writeBytes(mem, outPtr, outCap, result.data);
    },

    write_file(pathPtr: number, pathLen: number, dataPtr: number, dataLen: number): number {
      meter.charge();
      const mem = memory();
      return host.writeFile(readString(mem, pathPtr, pathLen), readBytes(mem, dataPtr, dataLen));
    },
  };
}
