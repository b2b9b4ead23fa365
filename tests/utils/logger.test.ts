import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { LogLevel } from '../../src/types/index.js';
import { DepsolveLogger, logLevelFromEnv, parseLogLevel } from '../../src/utils/logger.js';

function createRecordingLogger(level: LogLevel): { logger: DepsolveLogger; lines: string[] } {
  const lines: string[] = [];
  const logger = new DepsolveLogger({
    level,
    sink: line => lines.push(line),
    now: () => new Date('2026-01-02T03:04:05.000Z')
  });
  return { logger, lines };
}

describe('Logger', () => {
  it('drops messages below the configured level', () => {
    const { logger, lines } = createRecordingLogger(LogLevel.WARN);
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('cycle broken');
    logger.error('no order');

    assert.deepStrictEqual(lines, [
      '2026-01-02T03:04:05.000Z depsolve:warn  cycle broken',
      '2026-01-02T03:04:05.000Z depsolve:error no order'
    ]);
  });

  it('appends metadata as one line of JSON', () => {
    const { logger, lines } = createRecordingLogger(LogLevel.DEBUG);
    logger.debug('Loaded entries', { index: 'main.yml', count: 2 });
    logger.info('plain', 'extra');

    assert.deepStrictEqual(lines, [
      '2026-01-02T03:04:05.000Z depsolve:debug Loaded entries {"index":"main.yml","count":2}',
      '2026-01-02T03:04:05.000Z depsolve:info  plain extra'
    ]);
  });

  it('expands nested errors', () => {
    const { logger, lines } = createRecordingLogger(LogLevel.ERROR);
    const error = new Error('boom');
    error.stack = 'Error: boom';
    logger.error('failed', { error });

    assert.deepStrictEqual(lines, [
      '2026-01-02T03:04:05.000Z depsolve:error failed {"error":{"name":"Error","message":"boom","stack":"Error: boom"}}'
    ]);
  });

  it('changes level at run time', () => {
    const { logger, lines } = createRecordingLogger(LogLevel.ERROR);
    logger.setLevel(LogLevel.DEBUG);
    assert.equal(logger.getLevel(), LogLevel.DEBUG);
    logger.debug('now visible');
    assert.equal(lines.length, 1);
  });

  describe('parseLogLevel', () => {
    it('accepts level names in any case', () => {
      assert.equal(parseLogLevel(' Warn '), LogLevel.WARN);
      assert.equal(parseLogLevel('debug'), LogLevel.DEBUG);
    });

    it('rejects unknown names', () => {
      assert.equal(parseLogLevel('verbose'), undefined);
      assert.equal(parseLogLevel(undefined), undefined);
    });
  });

  describe('logLevelFromEnv', () => {
    it('prefers DEPSOLVE_LOG_LEVEL', () => {
      assert.equal(logLevelFromEnv({ DEPSOLVE_LOG_LEVEL: 'warn', DEPSOLVE_VERBOSE: '1' }), LogLevel.WARN);
    });

    it('falls back to DEPSOLVE_VERBOSE, then NODE_ENV', () => {
      assert.equal(logLevelFromEnv({ DEPSOLVE_LOG_LEVEL: 'loud', DEPSOLVE_VERBOSE: '1' }), LogLevel.DEBUG);
      assert.equal(logLevelFromEnv({ NODE_ENV: 'development' }), LogLevel.INFO);
      assert.equal(logLevelFromEnv({}), LogLevel.ERROR);
    });
  });
});
