/**
 * SharedArrayBuffer layout for relaying host calls out of a plugin worker.
 *
 * Layout:
 *   [0-3]    Int32   status: IDLE=0, REQUEST=1, RESPONSE=2, ERROR=3
 *   [4-7]    Int32   metadata length (JSON bytes)
 *   [8-11]   Int32   binary data length (raw bytes)
 *   [12..]   Uint8   JSON metadata (UTF-8)
 *   [12+N..] Uint8   binary payload (file content, IR JSON; no base64)
 *
 * The worker side of this protocol is embedded as plain JS in
 * worker-source.ts and must be kept in sync with these constants.
 */

export const SAB_SIZE = 32 * 1024 * 1024; // 32 MB

export const STATUS_IDLE = 0;
export const STATUS_REQUEST = 1;
export const STATUS_RESPONSE = 2;
export const STATUS_ERROR = 3;

/** Byte offset where metadata/binary payload begins. */
export const METADATA_OFFSET = 12;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export interface RelayMessage {
  metadata: unknown;
  binary: Uint8Array | null;
}

/** Write metadata JSON + optional binary into the SAB. Status is left to the caller. */
export function encodeMessage(
  sab: SharedArrayBuffer,
  metadata: Record<string, unknown>,
  binary?: Uint8Array,
): void {
  const int32 = new Int32Array(sab);
  const uint8 = new Uint8Array(sab);

  const jsonBytes = encoder.encode(JSON.stringify(metadata));
  const binLen = binary?.byteLength ?? 0;
  if (METADATA_OFFSET + jsonBytes.byteLength + binLen > sab.byteLength) {
    throw new RangeError(`relay payload of ${jsonBytes.byteLength + binLen} bytes exceeds buffer`);
  }

  uint8.set(jsonBytes, METADATA_OFFSET);
  Atomics.store(int32, 1, jsonBytes.byteLength);

  if (binary && binLen > 0) {
    uint8.set(binary, METADATA_OFFSET + jsonBytes.byteLength);
  }
  Atomics.store(int32, 2, binLen);
}

/** Read metadata + binary from the SAB. */
export function decodeMessage(sab: SharedArrayBuffer): RelayMessage {
  const int32 = new Int32Array(sab);
  const uint8 = new Uint8Array(sab);

  const metaLen = Atomics.load(int32, 1);
  const binLen = Atomics.load(int32, 2);

  // slice() copies out of shared memory; TextDecoder rejects shared views.
  const metaBytes = uint8.slice(METADATA_OFFSET, METADATA_OFFSET + metaLen);
  const metadata: unknown = JSON.parse(decoder.decode(metaBytes));

  const binary = binLen > 0
    ? uint8.slice(METADATA_OFFSET + metaLen, METADATA_OFFSET + metaLen + binLen)
    : null;

  return { metadata, binary };
}

/** Publish a response (or error) and wake the blocked worker. */
export function respond(
  sab: SharedArrayBuffer,
  status: typeof STATUS_RESPONSE | typeof STATUS_ERROR,
  metadata: Record<string, unknown>,
  binary?: Uint8Array,
): void {
  const int32 = new Int32Array(sab);
  encodeMessage(sab, metadata, binary);
  Atomics.store(int32, 0, status);
  Atomics.notify(int32, 0);
}
