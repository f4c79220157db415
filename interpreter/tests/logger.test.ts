/**
 * Logger tests: level gating and line format.
 */

import { createLogger, Logger, LogLevel } from '../src/logger';

function capture(options: { name?: string; level?: LogLevel } = {}): {
  logger: Logger;
  lines: string[];
} {
  const lines: string[] = [];
  const logger = createLogger({ ...options, sink: line => lines.push(line) });
  return { logger, lines };
}

describe('Logger', () => {
  test('defaults to warn', () => {
    const { logger, lines } = capture();
    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('careful');
    logger.error('broken');
    expect(logger.getLevel()).toBe('warn');
    expect(lines).toEqual(['[aki] WARN careful', '[aki] ERROR broken']);
  });

  test('payloads are appended as JSON', () => {
    const { logger, lines } = capture({ name: 'cli', level: 'debug' });
    logger.debug('parsed', { nodes: 3, file: 'main.aki' });
    expect(lines).toEqual(['[cli] DEBUG parsed {"nodes":3,"file":"main.aki"}']);
  });

  test('payloads that cannot be serialized fall back to String()', () => {
    const { logger, lines } = capture({ level: 'info' });
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;
    logger.info('cyclic', cyclic);
    expect(lines).toEqual(['[aki] INFO cyclic [object Object]']);
  });

  test('setLevel changes gating', () => {
    const { logger, lines } = capture({ level: 'error' });
    logger.info('before');
    logger.setLevel('info');
    logger.info('after');
    expect(lines).toEqual(['[aki] INFO after']);
  });

  test('silent drops everything', () => {
    const { logger, lines } = capture({ level: 'silent' });
    logger.error('nope');
    expect(lines).toEqual([]);
    expect(logger.isEnabled('error')).toBe(false);
  });

  test('each logger keeps its own level', () => {
    const first = createLogger({ level: 'silent' });
    const second = createLogger({ level: 'silent' });
    first.setLevel('debug');
    expect(first.isEnabled('debug')).toBe(true);
    expect(second.getLevel()).toBe('silent');
  });

  test('isEnabled follows the level order', () => {
    const { logger } = capture({ level: 'info' });
    expect(logger.isEnabled('error')).toBe(true);
    expect(logger.isEnabled('info')).toBe(true);
    expect(logger.isEnabled('debug')).toBe(false);
  });
});
