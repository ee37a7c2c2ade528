/**
 * Logger Tests
 *
 * - Respects logLevel threshold (silent, errors, warnings, info, debug)
 * - Context is formatted as JSON, UNKNOWN state and cycles included
 * - FileLogger writes timestamped lines and truncates per run
 * - createLogger() fans out to console and file
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, readFileSync, writeFileSync, mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { UNKNOWN } from '@provision/types';
import {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  closeLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
} from '@provision/core';

function capture(level: LogLevel): { logger: ConsoleLogger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new ConsoleLogger(level, (line) => lines.push(line)), lines };
}

function logAll(logger: Logger): void {
  logger.error('e');
  logger.warn('w');
  logger.info('i');
  logger.debug('d');
  logger.trace('t');
}

describe('ConsoleLogger', () => {
  describe('level threshold', () => {
    const expected: Record<LogLevel, string[]> = {
      silent: [],
      errors: ['[ERROR] e'],
      warnings: ['[ERROR] e', '[WARN] w'],
      info: ['[ERROR] e', '[WARN] w', '[INFO] i'],
      debug: ['[ERROR] e', '[WARN] w', '[INFO] i', '[DEBUG] d', '[TRACE] t'],
    };

    for (const [level, lines] of Object.entries(expected)) {
      it(`should emit ${lines.length} line(s) at ${level}`, () => {
        assert.ok(isLogLevel(level));
        const { logger, lines: output } = capture(level);
        logAll(logger);
        assert.deepStrictEqual(output, lines);
      });
    }
  });

  it('should append context as JSON', () => {
    const { logger, lines } = capture('info');
    logger.info('Resource converged', { resource: 'firewall-stealth', status: 'converged' });
    assert.deepStrictEqual(lines, ['[INFO] Resource converged {"resource":"firewall-stealth","status":"converged"}']);
  });

  it('should omit empty context', () => {
    const { logger, lines } = capture('info');
    logger.info('Reconciliation started', {});
    assert.deepStrictEqual(lines, ['[INFO] Reconciliation started']);
  });

  it('should render the UNKNOWN sentinel by its description', () => {
    const { logger, lines } = capture('info');
    logger.info('Probed', { state: UNKNOWN });
    assert.deepStrictEqual(lines, ['[INFO] Probed {"state":"provision.unknown"}']);
  });

  it('should survive circular context', () => {
    const { logger, lines } = capture('info');
    const context: Record<string, unknown> = { id: 'a' };
    context.self = context;
    logger.info('loop', context);
    assert.deepStrictEqual(lines, ['[INFO] loop {"id":"a","self":"[Circular]"}']);
  });
});

describe('isLogLevel', () => {
  it('should accept only known levels', () => {
    assert.strictEqual(isLogLevel('debug'), true);
    assert.strictEqual(isLogLevel('verbose'), false);
    assert.strictEqual(isLogLevel(undefined), false);
  });
});

describe('FileLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'provision-logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write timestamped lines and truncate an existing file', async () => {
    const path = join(dir, 'run.log');
    writeFileSync(path, 'previous run\n');

    const logger = new FileLogger('info', path);
    logger.info('Applying', { resource: 'power-sleep' });
    logger.debug('hidden');
    await logger.close();

    const lines = readFileSync(path, 'utf-8').trimEnd().split('\n');
    assert.strictEqual(lines.length, 1);
    assert.match(lines[0], /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[INFO\] Applying \{"resource":"power-sleep"\}$/);
  });

  it('should create missing parent directories', async () => {
    const path = join(dir, 'nested', 'deeper', 'run.log');
    const logger = new FileLogger('debug', path);
    await logger.close();
    assert.ok(existsSync(path));
  });

  it('should refuse a directory as the log path', () => {
    const path = join(dir, 'taken');
    mkdirSync(path);
    assert.throws(() => new FileLogger('info', path), /is a directory/);
  });
});

describe('MultiLogger', () => {
  it('should let each logger filter on its own level', () => {
    const quiet = capture('errors');
    const loud = capture('debug');
    const logger = new MultiLogger([quiet.logger, loud.logger]);

    logger.warn('w');
    logger.error('e');

    assert.deepStrictEqual(quiet.lines, ['[ERROR] e']);
    assert.deepStrictEqual(loud.lines, ['[WARN] w', '[ERROR] e']);
  });
});

describe('createLogger', () => {
  it('should return a console logger without a log file', () => {
    assert.ok(createLogger('info') instanceof ConsoleLogger);
  });

  it('should also capture debug output in the log file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'provision-logger-'));
    try {
      const path = join(dir, 'provision.log');
      const logger = createLogger('silent', { logFile: path });
      assert.ok(logger instanceof MultiLogger);
      logger.debug('Probing', { resource: 'filevault' });
      await closeLogger(logger);
      assert.match(readFileSync(path, 'utf-8'), /\[DEBUG\] Probing \{"resource":"filevault"\}\n$/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
