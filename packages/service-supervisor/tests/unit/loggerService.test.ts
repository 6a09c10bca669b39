import { describe, test } from 'node:test';
import assert from 'node:assert';
import { LoggerService } from '../../src/services/LoggerService.js';

describe('LoggerService', () => {
  test('should keep entries apart per supervisor', () => {
    const logger = new LoggerService({ console: false });

    logger.addLog('backend-a', 'info', 'listening', 'stdout');
    logger.addLog('backend-b', 'warn', 'slow health check');

    const entries = logger.getLogs('backend-a');
    assert.strictEqual(entries.length, 1);
    assert.strictEqual(entries[0]?.message, 'listening');
    assert.strictEqual(entries[0]?.source, 'stdout');
    assert.strictEqual(logger.getLogs('backend-b')[0]?.source, undefined);
  });

  test('should strip control characters and trim', () => {
    const logger = new LoggerService({ console: false });

    logger.addLog('backend', 'info', '  line\u0007 one\n');

    assert.strictEqual(logger.getLogs('backend')[0]?.message, 'line one');
  });

  test('should cap message length', () => {
    const logger = new LoggerService({ console: false });

    logger.addLog('backend', 'info', 'x'.repeat(1500));

    assert.strictEqual(logger.getLogs('backend')[0]?.message.length, 1000);
  });

  test('should keep only the newest entries per supervisor', () => {
    const logger = new LoggerService({ console: false, maxLogsPerSource: 3 });

    for (let i = 1; i <= 5; i++) {
      logger.addLog('backend', 'info', `entry ${i}`);
    }

    assert.deepStrictEqual(logger.getLogs('backend').map(entry => entry.message), ['entry 3', 'entry 4', 'entry 5']);
  });

  test('should return the last entries when limited', () => {
    const logger = new LoggerService({ console: false });
    logger.addLog('backend', 'info', 'first');
    logger.addLog('backend', 'info', 'second');
    logger.addLog('backend', 'info', 'third');

    assert.deepStrictEqual(logger.getLogs('backend', { limit: 2 }).map(entry => entry.message), ['second', 'third']);
  });

  test('should select child output by origin before limiting', () => {
    const logger = new LoggerService({ console: false });
    logger.addLog('backend', 'info', 'booting', 'stdout');
    logger.addLog('backend', 'warn', 'port busy', 'stderr');
    logger.addLog('backend', 'error', 'Service failed to start');

    const output = logger.getLogs('backend', { origins: ['stdout', 'stderr'], limit: 1 });

    assert.deepStrictEqual(output.map(entry => entry.message), ['port busy']);
  });

  test('should return a copy of the stored entries', () => {
    const logger = new LoggerService({ console: false });
    logger.addLog('backend', 'info', 'kept');

    logger.getLogs('backend').pop();

    assert.strictEqual(logger.getLogs('backend').length, 1);
  });

  test('should return nothing for an unknown supervisor', () => {
    const logger = new LoggerService({ console: false });

    assert.deepStrictEqual(logger.getLogs('missing', { limit: 5 }), []);
  });

  test('should drop entries older than the retention window', () => {
    const logger = new LoggerService({ console: false, retentionHours: 0 });
    logger.addLog('backend', 'info', 'stale');

    logger.cleanup();

    assert.deepStrictEqual(logger.getLogs('backend'), []);
  });

  test('should keep recent entries on cleanup', () => {
    const logger = new LoggerService({ console: false });
    logger.addLog('backend', 'info', 'fresh');

    logger.cleanup();

    assert.deepStrictEqual(logger.getLogs('backend').map(entry => entry.message), ['fresh']);
  });
});
