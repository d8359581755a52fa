import { describe, expect, it } from 'vitest';

import { createLogger, logGuestMessage } from '../logger.js';

function capture(level: string) {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({ level, destination: { write: (msg: string) => lines.push(JSON.parse(msg)) } });
  return { lines, logger };
}

describe('createLogger', () => {
  it('tags every line with the service name', () => {
    const { lines, logger } = capture('info');
    logger.child({ component: 'registry' }).info({ id: 'elm' }, 'extension loaded');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      service: 'morphir-extension-host',
      component: 'registry',
      id: 'elm',
      msg: 'extension loaded',
    });
  });

  it('drops lines below its level', () => {
    const { lines, logger } = capture('warn');
    logger.info('hidden');
    logger.error('shown');
    expect(lines.map((l) => l.msg)).toEqual(['shown']);
  });
});

describe('logGuestMessage', () => {
  it('maps guest levels onto logger levels', () => {
    const { lines, logger } = capture('debug');
    for (const level of ['debug', 'info', 'warn', 'error', 'Error', 'trace', '']) {
      logGuestMessage(logger, level, level);
    }
    expect(lines.map((l) => l.level)).toEqual([20, 30, 40, 50, 50, 30, 30]);
  });
});
