/**
 * Caps the linear memories a module declares before it is compiled.
 *
 * Every memory definition and memory import gets a maximum of
 * `floor(maxMemoryBytes / 64 KiB)` pages (or its own, if smaller), so a
 * `memory.grow` past the ceiling fails inside the guest and returns -1.
 * A memory whose initial size is already over the ceiling is rejected.
 *
 * Only the import (2) and memory (5) sections are rewritten; every other
 * section is copied through untouched.
 */

import { WASM_PAGE_BYTES } from './plugin.js';

const WASM_MAGIC = [0x00, 0x61, 0x73, 0x6d];
const HEADER_BYTES = 8;

const SECTION_IMPORT = 2;
const SECTION_MEMORY = 5;

const LIMITS_HAS_MAX = 0x01;
const LIMITS_SHARED = 0x02;
const LIMITS_KNOWN_FLAGS = 0x07;

/** A memory the module imports, with the limits the host must satisfy. */
export interface MemoryImport {
  module: string;
  name: string;
  initial: number;
  maximum: number;
  shared: boolean;
}

export interface BoundedModule {
  bytes: Uint8Array;
  memoryImports: MemoryImport[];
}

interface Limits {
  flags: number;
  initial: number;
  maximum: number | undefined;
}

const decoder = new TextDecoder();

function readVarUint(buf: Uint8Array, offset: number): { value: number; offset: number } {
  let value = 0;
  let multiplier = 1;
  for (;;) {
    if (offset >= buf.length) {
      throw new Error('Unexpected end of module while reading varUint');
    }
    const byte = buf[offset++];
    value += (byte & 0x7f) * multiplier;
    if (byte < 0x80) break;
    multiplier *= 0x80;
    if (!Number.isSafeInteger(value)) {
      throw new Error('varUint exceeds safe integer range');
    }
  }
  return { value, offset };
}

function encodeVarUint(value: number): number[] {
  const bytes: number[] = [];
  let v = value;
  while (v > 0x7f) {
    bytes.push(0x80 | (v % 0x80));
    v = Math.floor(v / 0x80);
  }
  bytes.push(v);
  return bytes;
}

function readByte(buf: Uint8Array, offset: number): number {
  if (offset >= buf.length) {
    throw new Error('Unexpected end of module');
  }
  return buf[offset];
}

function readName(buf: Uint8Array, offset: number): { value: string; offset: number } {
  const len = readVarUint(buf, offset);
  const end = len.offset + len.value;
  if (end > buf.length) {
    throw new Error('Unexpected end of module while reading a name');
  }
  return { value: decoder.decode(buf.subarray(len.offset, end)), offset: end };
}

function readLimits(buf: Uint8Array, offset: number): { value: Limits; offset: number } {
  const flags = readByte(buf, offset);
  if ((flags & ~LIMITS_KNOWN_FLAGS) !== 0) {
    throw new Error(`Unsupported limits flags 0x${flags.toString(16)}`);
  }
  const initial = readVarUint(buf, offset + 1);
  if ((flags & LIMITS_HAS_MAX) === 0) {
    return { value: { flags, initial: initial.value, maximum: undefined }, offset: initial.offset };
  }
  const maximum = readVarUint(buf, initial.offset);
  return { value: { flags, initial: initial.value, maximum: maximum.value }, offset: maximum.offset };
}

/** Skip a value type; `(ref ht)` and `(ref null ht)` carry a heap type. */
function skipValueType(buf: Uint8Array, offset: number): number {
  const type = readByte(buf, offset);
  if (type !== 0x63 && type !== 0x64) return offset + 1;
  let at = offset + 1;
  while (readByte(buf, at) & 0x80) at++;
  return at + 1;
}

class MemoryCap {
  readonly maxPages: number;
  private maxMemoryBytes: number;

  constructor(maxMemoryBytes: number) {
    this.maxMemoryBytes = maxMemoryBytes;
    this.maxPages = Math.floor(maxMemoryBytes / WASM_PAGE_BYTES);
  }

  apply(limits: Limits): Limits {
    if (limits.initial > this.maxPages) {
      throw new RangeError(
        `initial memory of ${limits.initial * WASM_PAGE_BYTES} bytes exceeds limit of ${this.maxMemoryBytes}`,
      );
    }
    return {
      flags: limits.flags | LIMITS_HAS_MAX,
      initial: limits.initial,
      maximum: Math.min(limits.maximum ?? this.maxPages, this.maxPages),
    };
  }
}

function encodeLimits(limits: Limits): number[] {
  const out = [limits.flags, ...encodeVarUint(limits.initial)];
  if (limits.maximum !== undefined) out.push(...encodeVarUint(limits.maximum));
  return out;
}

function rewriteMemorySection(content: Uint8Array, cap: MemoryCap): number[] {
  const count = readVarUint(content, 0);
  const out = encodeVarUint(count.value);
  let offset = count.offset;
  for (let i = 0; i < count.value; i++) {
    const limits = readLimits(content, offset);
    out.push(...encodeLimits(cap.apply(limits.value)));
    offset = limits.offset;
  }
  return out;
}

function rewriteImportSection(content: Uint8Array, cap: MemoryCap, memories: MemoryImport[]): number[] {
  const count = readVarUint(content, 0);
  const out = encodeVarUint(count.value);
  let offset = count.offset;
  for (let i = 0; i < count.value; i++) {
    const start = offset;
    const moduleName = readName(content, offset);
    const fieldName = readName(content, moduleName.offset);
    const kind = readByte(content, fieldName.offset);
    offset = fieldName.offset + 1;

    switch (kind) {
      case 0x00: // function: type index
        offset = readVarUint(content, offset).offset;
        break;
      case 0x01: // table: reference type, limits
        offset = readLimits(content, skipValueType(content, offset)).offset;
        break;
      case 0x02: {
        const limits = readLimits(content, offset);
        const capped = cap.apply(limits.value);
        memories.push({
          module: moduleName.value,
          name: fieldName.value,
          initial: capped.initial,
          maximum: capped.maximum ?? cap.maxPages,
          shared: (capped.flags & LIMITS_SHARED) !== 0,
        });
        out.push(...content.subarray(start, offset), ...encodeLimits(capped));
        offset = limits.offset;
        continue;
      }
      case 0x03: // global: value type, mutability
        offset = skipValueType(content, offset) + 1;
        break;
      case 0x04: // tag: attribute, type index
        offset = readVarUint(content, offset + 1).offset;
        break;
      default:
        throw new Error(`Unsupported import kind 0x${kind.toString(16)}`);
    }
    out.push(...content.subarray(start, offset));
  }
  return out;
}

/**
 * Rewrite `bytes` so no memory can grow past `maxMemoryBytes`. Bytes that
 * do not start with the wasm magic number are returned unchanged for the
 * compiler to reject.
 */
export function boundModuleMemory(bytes: Uint8Array, maxMemoryBytes: number): BoundedModule {
  const memoryImports: MemoryImport[] = [];
  if (bytes.length < HEADER_BYTES || WASM_MAGIC.some((b, i) => bytes[i] !== b)) {
    return { bytes, memoryImports };
  }

  const cap = new MemoryCap(maxMemoryBytes);
  const chunks: Uint8Array[] = [bytes.subarray(0, HEADER_BYTES)];
  let offset = HEADER_BYTES;
  while (offset < bytes.length) {
    const id = bytes[offset];
    const size = readVarUint(bytes, offset + 1);
    const end = size.offset + size.value;
    if (end > bytes.length) {
      throw new Error(`Section ${id} runs past the end of the module`);
    }
    const content = bytes.subarray(size.offset, end);

    if (id === SECTION_IMPORT || id === SECTION_MEMORY) {
      const rewritten = id === SECTION_IMPORT
        ? rewriteImportSection(content, cap, memoryImports)
        : rewriteMemorySection(content, cap);
      chunks.push(Uint8Array.from([id, ...encodeVarUint(rewritten.length), ...rewritten]));
    } else {
      chunks.push(bytes.subarray(offset, end));
    }
    offset = end;
  }

  const out = new Uint8Array(chunks.reduce((sum, chunk) => sum + chunk.length, 0));
  let at = 0;
  for (const chunk of chunks) {
    out.set(chunk, at);
    at += chunk.length;
  }
  return { bytes: out, memoryImports };
}
