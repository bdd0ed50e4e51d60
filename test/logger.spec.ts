import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LocalTime } from '@js-joda/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createDebugLog, disabledLog, FileDebugLog, formatLogLine } from '../src/logger.js';

const time = LocalTime.of(9, 5, 7, 12_000_000);

describe('formatLogLine', () => {
  it('prefixes the time', () => {
    expect(formatLogLine(time, 'end of input')).toBe('[09:05:07.012] end of input');
  });

  it('inspects non-string arguments on one line', () => {
    expect(formatLogLine(time, 'key', { type: 'enter', ctrl: false })).toBe("[09:05:07.012] key { type: 'enter', ctrl: false }");
  });

  it('writes string arguments as they are', () => {
    expect(formatLogLine(time, 'submission', 'accepted', 3, null)).toBe('[09:05:07.012] submission accepted 3 null');
  });
});

describe('FileDebugLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'keyprompt-log-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends one line per message', () => {
    const path = join(dir, 'trace.log');
    const log = new FileDebugLog(path, () => time);
    log.log('first');
    log.log('second', 2);
    expect(readFileSync(path, 'utf8')).toBe('[09:05:07.012] first\n[09:05:07.012] second 2\n');
  });
});

describe('createDebugLog', () => {
  it('is disabled without a path', () => {
    expect(createDebugLog(null)).toBe(disabledLog);
    expect(disabledLog.enabled).toBe(false);
  });

  it('writes to the given file', () => {
    const log = createDebugLog('/tmp/unused.log');
    expect(log).toBeInstanceOf(FileDebugLog);
    expect(log.enabled).toBe(true);
  });
});
