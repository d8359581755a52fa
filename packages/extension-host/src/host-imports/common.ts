/**
 * Buffer read/write helpers for WASM linear memory.
 *
 * The memory is always passed in fresh: `memory.buffer` is detached and
 * replaced whenever the guest grows its memory, so no view may be kept
 * across a call into guest code.
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Size of the little-endian length header in front of guest output. */
export const LENGTH_PREFIX_BYTES = 4;

function checkRange(memory: WebAssembly.Memory, ptr: number, len: number): void {
  if (ptr < 0 || len < 0 || ptr + len > memory.buffer.byteLength) {
    throw new RangeError(`guest pointer out of bounds: ${ptr}+${len} > ${memory.buffer.byteLength}`);
  }
}

/**
 * Read a UTF-8 string from WASM linear memory.
 */
export function readString(memory: WebAssembly.Memory, ptr: number, len: number): string {
  checkRange(memory, ptr, len);
  return decoder.decode(new Uint8Array(memory.buffer, ptr, len));
}

/**
 * Read raw bytes from WASM linear memory.
 * Returns a copy (not a view) so the data survives memory growth.
 */
export function readBytes(memory: WebAssembly.Memory, ptr: number, len: number): Uint8Array {
  checkRange(memory, ptr, len);
  return new Uint8Array(memory.buffer, ptr, len).slice();
}

/**
 * Read guest output: a u32 little-endian length at `ptr` followed by
 * that many bytes.
 */
export function readLengthPrefixed(memory: WebAssembly.Memory, ptr: number): Uint8Array {
  checkRange(memory, ptr, LENGTH_PREFIX_BYTES);
  const len = new DataView(memory.buffer).getUint32(ptr, true);
  return readBytes(memory, ptr + LENGTH_PREFIX_BYTES, len);
}

/**
 * Write raw bytes into the guest's output buffer.
 * Returns bytes written on success, or the required size if the buffer
 * is too small (guest should allocate a larger buffer and retry).
 */
export function writeBytes(memory: WebAssembly.Memory, ptr: number, cap: number, data: Uint8Array): number {
  if (data.length > cap) {
    return data.length;
  }
  checkRange(memory, ptr, data.length);
  new Uint8Array(memory.buffer, ptr, data.length).set(data);
  return data.length;
}

/**
 * Write a UTF-8 string into the guest's output buffer; same return
 * convention as writeBytes.
 */
export function writeString(memory: WebAssembly.Memory, ptr: number, cap: number, s: string): number {
  return writeBytes(memory, ptr, cap, encoder.encode(s));
}

/**
 * Write a JSON-serialized value into the guest's output buffer; same return
 * convention as writeBytes.
 */
export function writeJson(memory: WebAssembly.Memory, ptr: number, cap: number, value: unknown): number {
  return writeString(memory, ptr, cap, JSON.stringify(value));
}
