/**
 * Plain JS source of the plugin worker.
 *
 * The worker runs inside an eval'd Worker and cannot import modules, so the
 * guest ABI (alloc + length-prefixed output) and the `morphir` import
 * namespace are restated here. Each import copies its arguments out of
 * guest memory and relays them to the main thread over the SAB, blocking
 * on Atomics.wait until HostFunctions has answered.
 * Must be kept in sync with proxy-protocol.ts, plugin.ts,
 * memory-limits.ts and morphir-imports.ts.
 */

import {
  METADATA_OFFSET,
  STATUS_ERROR,
  STATUS_IDLE,
  STATUS_REQUEST,
} from './proxy-protocol.js';

export const PLUGIN_WORKER_SOURCE = `
const { workerData, parentPort } = require('node:worker_threads');
const { module, sab, memoryImports, maxFuel } = workerData;
const int32 = new Int32Array(sab);
const uint8 = new Uint8Array(sab);
const encoder = new TextEncoder();
const decoder = new TextDecoder();
const OFFSET = ${METADATA_OFFSET};

class LimitError extends Error {
  constructor(kind, message) {
    super(message);
    this.kind = kind;
  }
}

let instance = null;
let fuel = Infinity;

function memory() {
  const mem = instance && instance.exports.memory;
  if (!(mem instanceof WebAssembly.Memory)) throw new Error('Module does not export its memory');
  return mem;
}

function readBytes(ptr, len) {
  const mem = memory();
  if (ptr < 0 || len < 0 || ptr + len > mem.buffer.byteLength) {
    throw new RangeError('guest pointer out of bounds: ' + ptr + '+' + len);
  }
  return new Uint8Array(mem.buffer, ptr, len).slice();
}

function readString(ptr, len) {
  return decoder.decode(readBytes(ptr, len));
}

function writeBytes(ptr, cap, data) {
  if (data.length > cap) return data.length;
  const mem = memory();
  if (ptr < 0 || ptr + data.length > mem.buffer.byteLength) {
    throw new RangeError('guest pointer out of bounds: ' + ptr + '+' + data.length);
  }
  new Uint8Array(mem.buffer, ptr, data.length).set(data);
  return data.length;
}

function relay(op, params, binary) {
  fuel -= 1;
  if (fuel < 0) {
    throw new LimitError('RESOURCE_EXHAUSTED', 'Fuel limit of ' + maxFuel + ' host calls exceeded');
  }
  const json = encoder.encode(JSON.stringify(Object.assign({ op }, params)));
  const binLen = binary ? binary.byteLength : 0;
  if (OFFSET + json.byteLength + binLen > sab.byteLength) {
    throw new RangeError('relay payload exceeds buffer');
  }
  uint8.set(json, OFFSET);
  Atomics.store(int32, 1, json.byteLength);
  if (binLen > 0) uint8.set(binary, OFFSET + json.byteLength);
  Atomics.store(int32, 2, binLen);

  Atomics.store(int32, 0, ${STATUS_REQUEST});
  parentPort.postMessage('proxy-request');
  Atomics.wait(int32, 0, ${STATUS_REQUEST});

  const status = Atomics.load(int32, 0);
  const metaLen = Atomics.load(int32, 1);
  const dataLen = Atomics.load(int32, 2);
  const metadata = JSON.parse(decoder.decode(uint8.slice(OFFSET, OFFSET + metaLen)));
  const data = uint8.slice(OFFSET + metaLen, OFFSET + metaLen + dataLen);
  Atomics.store(int32, 0, ${STATUS_IDLE});
  if (status === ${STATUS_ERROR}) throw new Error(metadata.message || 'host call failed');
  return { status: metadata.status, data };
}

const hostImports = {
  get_workspace_info(outPtr, outCap) {
    const r = relay('workspaceInfo', {});
    return writeBytes(outPtr, outCap, r.data);
  },
  cache_ir(keyPtr, keyLen, irPtr, irLen) {
    return relay('cacheIr', { key: readString(keyPtr, keyLen) }, readBytes(irPtr, irLen)).status;
  },
  get_cached_ir(keyPtr, keyLen, outPtr, outCap) {
    const r = relay('getCachedIr', { key: readString(keyPtr, keyLen) });
    if (r.status < 0) return r.status;
    return writeBytes(outPtr, outCap, r.data);
  },
  log(levelPtr, levelLen, msgPtr, msgLen) {
    relay('log', { level: readString(levelPtr, levelLen), message: readString(msgPtr, msgLen) });
  },
  read_file(pathPtr, pathLen, outPtr, outCap) {
    const r = relay('readFile', { path: readString(pathPtr, pathLen) });
    if (r.status < 0) return r.status;
    return writeBytes(outPtr, outCap, r.data);
  },
  write_file(pathPtr, pathLen, dataPtr, dataLen) {
    return relay('writeFile', { path: readString(pathPtr, pathLen) }, readBytes(dataPtr, dataLen)).status;
  },
};

function instantiate() {
  const imports = { morphir: hostImports };
  for (const mem of memoryImports) {
    imports[mem.module] = Object.assign({}, imports[mem.module], {
      [mem.name]: new WebAssembly.Memory({ initial: mem.initial, maximum: mem.maximum, shared: mem.shared }),
    });
  }
  return new WebAssembly.Instance(module, imports);
}

function invoke(exportName, input) {
  const fn = instance.exports[exportName];
  if (typeof fn !== 'function') {
    throw new LimitError('EXECUTION_FAILED', 'Module has no function export "' + exportName + '"');
  }
  let result;
  if (fn.length === 0) {
    result = fn();
  } else {
    const inPtr = instance.exports.alloc(input.length);
    writeBytes(inPtr, input.length, input);
    result = fn(inPtr, input.length);
  }
  if (typeof result !== 'number') {
    throw new LimitError('INVALID_RESPONSE', 'Export ' + exportName + ' did not return a pointer');
  }
  return result >>> 0;
}

parentPort.on('message', (msg) => {
  if (!msg || msg.type !== 'call') return;
  fuel = maxFuel === undefined ? Infinity : maxFuel;
  let ptr;
  try {
    if (!instance) instance = instantiate();
    ptr = invoke(msg.exportName, msg.input);
  } catch (err) {
    instance = null;
    parentPort.postMessage({
      type: 'error',
      kind: err instanceof LimitError ? err.kind : 'EXECUTION_FAILED',
      message: err instanceof LimitError ? err.message : 'Extension trapped: ' + (err && err.message ? err.message : String(err)),
    });
    return;
  }
  let output;
  try {
    const mem = memory();
    if (ptr + 4 > mem.buffer.byteLength) throw new RangeError('output pointer out of bounds: ' + ptr);
    const len = new DataView(mem.buffer).getUint32(ptr, true);
    output = readBytes(ptr + 4, len);
  } catch (err) {
    parentPort.postMessage({
      type: 'error',
      kind: 'INVALID_RESPONSE',
      message: 'Export ' + msg.exportName + ' returned an unreadable buffer: ' + err.message,
    });
    return;
  }
  parentPort.postMessage({ type: 'result', output });
});

try {
  instance = instantiate();
  parentPort.postMessage({ type: 'ready' });
} catch (err) {
  parentPort.postMessage({ type: 'init-error', message: err && err.message ? err.message : String(err) });
}
`;
