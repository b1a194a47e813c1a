import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { runApp } from '../app.js';
import { USAGE } from '../config/cliArgs.js';
import { configureLogger, consoleTransport } from '../config/logger.js';

const testEnv = { NODE_ENV: 'test' };
const quiet = { write: () => true };

describe('runApp', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'exam-codes-app-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    configureLogger({ nodeEnv: 'test', level: 'info' });
  });

  it('prints usage for --help', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(runApp(['--help'], testEnv)).toEqual({ exitCode: 0 });
    expect(logSpy).toHaveBeenCalledWith(USAGE);

    logSpy.mockRestore();
  });

  it('generates prefixed and unprefixed codes into the output directory', () => {
    const result = runApp(['--seed', '7', '--out-dir', dir, '3', '4', 'A:5', '5'], testEnv, { progress: quiet });

    expect(result.exitCode).toBe(0);
    const prefixed = fs.readFileSync(path.join(dir, 'prefix_A.txt'), 'utf8').trimEnd().split('\n');
    const plain = fs.readFileSync(path.join(dir, 'prefix_.txt'), 'utf8').trimEnd().split('\n');
    expect(prefixed).toHaveLength(5);
    expect(plain).toHaveLength(5);
    for (const code of prefixed) expect(code).toMatch(/^A\d{4}$/);
    for (const code of plain) expect(code).toMatch(/^\d{4}$/);
    expect(result.summary?.usedCount).toBe(10);
    expect(result.summary?.minDistance).toBeGreaterThanOrEqual(3);
  });

  it('takes the output directory from the environment', () => {
    const result = runApp(['1', '3', 'Q:2'], { ...testEnv, CODES_OUTPUT_DIR: dir }, { progress: quiet });

    expect(result.exitCode).toBe(0);
    expect(fs.existsSync(path.join(dir, 'prefix_Q.txt'))).toBe(true);
  });

  it('switches console logging to JSON when the environment says production', () => {
    const result = runApp(['--out-dir', dir, '0', '2', '1'], { NODE_ENV: 'production', LOG_LEVEL: 'error' }, {
      progress: quiet,
    });
    expect(result.exitCode).toBe(0);

    const format = consoleTransport.format;
    if (!format) throw new Error('console transport has no format');
    const info = format.transform({ level: 'info', message: 'All finished!', module: 'generator' });
    if (typeof info !== 'object') throw new Error('log entry was filtered out');

    const line: unknown = JSON.parse(String(Reflect.get(info, Symbol.for('message'))));
    expect(line).toMatchObject({
      level: 'info',
      message: 'All finished!',
      environment: 'production',
      serviceName: 'exam-codes',
      metadata: { module: 'generator' },
    });
  });

  it('exits with 2 on invalid arguments or environment', () => {
    expect(runApp(['x', '2', '3'], testEnv).exitCode).toBe(2);
    expect(runApp(['2', '4', '1'], { ...testEnv, LOG_LEVEL: 'loud' }).exitCode).toBe(2);
  });

  it('exits with 1 when an existing-codes file is missing', () => {
    const result = runApp(['--existing', path.join(dir, 'missing.txt'), '--out-dir', dir, '2', '4', '1'], testEnv, {
      progress: quiet,
    });

    expect(result.exitCode).toBe(1);
  });

  it('exits with 1 when CODES_MAX_ATTEMPTS is reached', () => {
    const result = runApp(['--out-dir', dir, '2', '1', '2'], { ...testEnv, CODES_MAX_ATTEMPTS: '5' }, { progress: quiet });

    expect(result.exitCode).toBe(1);
    expect(fs.readFileSync(path.join(dir, 'prefix_.txt'), 'utf8')).toMatch(/^\d\n$/);
  });
});
