import { describe, expect, it } from 'vitest';

import { SandboxError } from '../../errors.js';
import { FileSandbox } from '../file-sandbox.js';
import { VirtualPathConfig } from '../virtual-paths.js';

const config = VirtualPathConfig.forWorkspace('/ws', '/ws/out', '/tmp/cache');

function sandboxErrorOf(fn: () => unknown): SandboxError {
  try {
    fn();
  } catch (err) {
    if (err instanceof SandboxError) return err;
    throw err;
  }
  throw new Error('expected a SandboxError');
}

describe('FileSandbox', () => {
  const cases: Array<{ external: boolean; path: string; allowed: boolean; resolves: boolean }> = [
    { external: false, path: '/workspace/a.elm', allowed: true, resolves: true },
    { external: false, path: '/etc/passwd', allowed: false, resolves: false },
    { external: true, path: '/workspace/a.elm', allowed: true, resolves: true },
    { external: true, path: '/etc/passwd', allowed: true, resolves: false },
  ];

  it.each(cases)('reads $path with external=$external', ({ external, path, allowed, resolves }) => {
    const sandbox = new FileSandbox(config, { allowExternalReads: external });
    expect(sandbox.canRead(path)).toBe(allowed);
    if (resolves) {
      expect(sandbox.resolveRead(path)).toBe('/ws/a.elm');
    } else {
      const err = sandboxErrorOf(() => sandbox.resolveRead(path));
      expect(err.kind).toBe(allowed ? 'INVALID_PATH' : 'ACCESS_DENIED');
      expect(err.path).toBe(path);
    }
  });

  it('checks writes against their own flag', () => {
    const sandbox = new FileSandbox(config, { allowExternalReads: true });
    expect(sandbox.canRead('/elsewhere')).toBe(true);
    expect(sandbox.canWrite('/elsewhere')).toBe(false);
    expect(sandboxErrorOf(() => sandbox.resolveWrite('/elsewhere')).message).toBe('Access denied: /elsewhere');
    expect(sandbox.resolveWrite('/output/ir.json')).toBe('/ws/out/ir.json');
  });

  it('permissive allows everything but still only resolves mapped paths', () => {
    const sandbox = FileSandbox.permissive(config);
    expect(sandbox.canWrite('/anywhere')).toBe(true);
    expect(sandboxErrorOf(() => sandbox.resolveWrite('/anywhere')).message).toBe('Invalid path: /anywhere');
  });

  it('denies an escaping path by default', () => {
    const sandbox = new FileSandbox(config);
    expect(sandboxErrorOf(() => sandbox.resolveRead('/workspace/../../etc/passwd')).kind).toBe('ACCESS_DENIED');
  });
});
