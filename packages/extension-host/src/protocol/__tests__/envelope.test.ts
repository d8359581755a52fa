import { describe, expect, it } from 'vitest';

import { ExtensionError } from '../../errors.js';
import {
  createRequest,
  decodeRequest,
  decodeResponse,
  encodeMessage,
  errorResponse,
  isErrorResponse,
  successResponse,
  toRpcError,
  unwrapResponse,
} from '../envelope.js';
import { ErrorCodes, Methods } from '../types.js';

const encoder = new TextEncoder();
const bytes = (value: unknown) => encoder.encode(typeof value === 'string' ? value : JSON.stringify(value));

function decodeError(value: unknown): ExtensionError {
  try {
    decodeResponse(bytes(value), 'ext');
  } catch (err) {
    if (err instanceof ExtensionError) return err;
    throw err;
  }
  throw new Error('expected decodeResponse to throw');
}

describe('createRequest', () => {
  it('builds a 2.0 request', () => {
    expect(createRequest(Methods.INFO, { a: 1 }, 7)).toEqual({
      jsonrpc: '2.0',
      method: 'morphir.extension.info',
      params: { a: 1 },
      id: 7,
    });
  });

  it('uses null for absent params', () => {
    expect(createRequest('m', undefined, 1).params).toBeNull();
  });
});

describe('encodeMessage', () => {
  it('serializes to UTF-8 JSON', () => {
    const out = new TextDecoder().decode(encodeMessage(successResponse(3, 'é')));
    expect(out).toBe('{"jsonrpc":"2.0","result":"é","id":3}');
  });
});

describe('decodeResponse', () => {
  it('decodes a success response', () => {
    const response = decodeResponse(bytes({ jsonrpc: '2.0', id: 1, result: { ok: true } }));
    expect(isErrorResponse(response)).toBe(false);
    expect(unwrapResponse(response)).toEqual({ ok: true });
  });

  it('keeps a null result as a success', () => {
    const response = decodeResponse(bytes({ jsonrpc: '2.0', id: 1, result: null }));
    expect(unwrapResponse(response)).toBeNull();
  });

  it('decodes an error response', () => {
    const response = decodeResponse(bytes({ jsonrpc: '2.0', id: 2, error: { code: -32001, message: 'boom' } }));
    expect(isErrorResponse(response)).toBe(true);
    expect(response).toEqual(errorResponse(2, { code: -32001, message: 'boom' }));
  });

  it('rejects a response with both result and error', () => {
    const err = decodeError({ jsonrpc: '2.0', id: 1, result: 1, error: { code: 1, message: 'x' } });
    expect(err.kind).toBe('INVALID_RESPONSE');
    expect(err.message).toBe('Response carries both result and error');
    expect(err.extensionId).toBe('ext');
  });

  it('rejects a response with neither result nor error', () => {
    expect(decodeError({ jsonrpc: '2.0', id: 1 }).message).toBe('Response carries neither result nor error');
  });

  it('rejects non-JSON output', () => {
    const err = decodeError('not json');
    expect(err.kind).toBe('INVALID_RESPONSE');
    expect(err.message).toMatch(/^Response is not valid JSON: /);
  });

  it('rejects a non-object', () => {
    expect(decodeError([1, 2]).message).toBe('Response is not a JSON object');
  });

  it('rejects another jsonrpc version', () => {
    expect(decodeError({ jsonrpc: '1.0', id: 1, result: 1 }).message).toBe('Unsupported jsonrpc version: 1.0');
  });

  it('rejects a fractional id', () => {
    expect(decodeError({ jsonrpc: '2.0', id: 1.5, result: 1 }).message).toBe('Response id must be an integer or null');
  });

  it('rejects a malformed error object', () => {
    expect(decodeError({ jsonrpc: '2.0', id: 1, error: { message: 'no code' } }).message)
      .toMatch(/^Malformed error object: /);
  });
});

describe('unwrapResponse', () => {
  it('turns an error response into EXECUTION_FAILED keeping the guest error', () => {
    const rpcError = { code: -32001, message: 'syntax error', data: { line: 3 } };
    let caught: unknown;
    try {
      unwrapResponse(errorResponse(1, rpcError), 'elm');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ExtensionError);
    if (!(caught instanceof ExtensionError)) return;
    expect(caught.kind).toBe('EXECUTION_FAILED');
    expect(caught.message).toBe('Extension error -32001: syntax error');
    expect(caught.rpcError).toEqual(rpcError);
    expect(caught.extensionId).toBe('elm');
  });
});

describe('decodeRequest', () => {
  it('decodes a valid request', () => {
    const decoded = decodeRequest(encodeMessage(createRequest(Methods.COMPILE, { sources: [] }, 4)));
    expect(decoded).toEqual({
      ok: true,
      request: { jsonrpc: '2.0', method: 'morphir.frontend.compile', params: { sources: [] }, id: 4 },
    });
  });

  it('reports a parse error with a null id', () => {
    const decoded = decodeRequest(bytes('{oops'));
    expect(decoded.ok).toBe(false);
    if (decoded.ok) return;
    expect(decoded.id).toBeNull();
    expect(decoded.error.code).toBe(ErrorCodes.PARSE_ERROR);
  });

  it('reports an invalid request with the id it could read', () => {
    const decoded = decodeRequest(bytes({ jsonrpc: '2.0', id: 9 }));
    expect(decoded.ok).toBe(false);
    if (decoded.ok) return;
    expect(decoded.id).toBe(9);
    expect(decoded.error.code).toBe(ErrorCodes.INVALID_REQUEST);
    expect(decoded.error.message).toMatch(/^Invalid request: /);
  });
});

describe('toRpcError', () => {
  it('passes a guest error through unchanged', () => {
    const rpcError = { code: -32004, message: 'bad ir' };
    const err = new ExtensionError('EXECUTION_FAILED', 'Extension error -32004: bad ir', { rpcError });
    expect(toRpcError(err, Methods.TRANSFORM)).toBe(rpcError);
  });

  it('maps an execution failure to the method error code', () => {
    const err = new ExtensionError('EXECUTION_FAILED', 'trapped', { extensionId: 'gen' });
    expect(toRpcError(err, Methods.GENERATE)).toEqual({
      code: ErrorCodes.GENERATION_ERROR,
      message: 'trapped',
      data: { kind: 'EXECUTION_FAILED', extensionId: 'gen' },
    });
  });

  it('maps an unsupported capability to METHOD_NOT_FOUND', () => {
    const err = new ExtensionError('UNSUPPORTED_CAPABILITY', 'no');
    expect(toRpcError(err).code).toBe(ErrorCodes.METHOD_NOT_FOUND);
  });

  it('maps a limit to EXTENSION_ERROR', () => {
    expect(toRpcError(new ExtensionError('TIMEOUT', 'slow')).code).toBe(ErrorCodes.EXTENSION_ERROR);
  });

  it('maps anything else to INTERNAL_ERROR', () => {
    expect(toRpcError(new Error('oops'))).toEqual({ code: ErrorCodes.INTERNAL_ERROR, message: 'oops' });
  });
});
