import { appendFileSync } from 'node:fs';
import { inspect } from 'node:util';
import { DateTimeFormatter, LocalTime } from '@js-joda/core';

const TIME_FORMAT = DateTimeFormatter.ofPattern('HH:mm:ss.SSS');

/**
 * Opt-in trace of keys, actions and prompt outcomes.
 * The terminal itself belongs to the prompt, so this never writes to stdout.
 */
export interface DebugLog {
  readonly enabled: boolean;
  log(message: string, ...args: unknown[]): void;
}

export const disabledLog: DebugLog = {
  enabled: false,
  log: () => undefined,
};

export function formatLogLine(time: LocalTime, message: string, ...args: unknown[]): string {
  let line = `[${time.format(TIME_FORMAT)}] ${message}`;
  for (const a of args) {
    line += ' ';
    line += typeof a === 'string' ? a : inspect(a, { depth: null, colors: false, breakLength: Infinity, compact: true });
  }
  return line;
}

export class FileDebugLog implements DebugLog {
  public readonly enabled = true;

  public constructor(
    public readonly path: string,
    private readonly now: () => LocalTime = () => LocalTime.now(),
  ) {}

  public log(message: string, ...args: unknown[]): void {
    appendFileSync(this.path, `${formatLogLine(this.now(), message, ...args)}\n`);
  }
}

export function createDebugLog(path: string | null): DebugLog {
  return path === null ? disabledLog : new FileDebugLog(path);
}
