import { describe, it, expect } from 'vitest';
import pc from 'picocolors';
import { createLogger, silentLogger } from '../log.js';

function capture(level?: 'debug' | 'info' | 'warn' | 'error') {
  const lines: string[] = [];
  const logger = createLogger({ level, write: (line) => lines.push(line) });
  return { lines, logger };
}

describe('createLogger', () => {
  it('logs info and above by default', () => {
    const { lines, logger } = capture();

    logger.debug('hidden');
    logger.info('plain');
    logger.success('done');

    expect(lines).toEqual(['plain', pc.green('done')]);
  });

  it('prefixes warnings and errors', () => {
    const { lines, logger } = capture('warn');

    logger.info('skipped');
    logger.warn('careful');
    logger.error('broken');

    expect(lines).toEqual([pc.yellow('Warning: careful'), pc.red('Error: broken')]);
  });

  it('writes debug lines at the debug level', () => {
    const { lines, logger } = capture('debug');
    logger.debug('details');
    expect(lines).toEqual([pc.dim('details')]);
  });
});

describe('silentLogger', () => {
  it('accepts every level without throwing', () => {
    expect(() => {
      silentLogger.debug('a');
      silentLogger.info('b');
      silentLogger.warn('c');
    }).not.toThrow();
  });
});
