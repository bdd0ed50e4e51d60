import type { Backend, Color, TextStyle } from './backend.js';
import { BackendError } from './errors.js';
import { type Key, type KeySource, StdinKeySource } from './input.js';
import { type DebugLog, disabledLog } from './logger.js';

const ESC = '\x1B[';
const cursorUp = (n: number) => (n > 0 ? `${ESC}${n}A` : '');
const cursorTo = (col: number) => `${ESC}${col + 1}G`;
const clearLine = `${ESC}2K`;
const showCursor = `${ESC}?25h`;
const hideCursorSeq = `${ESC}?25l`;

const FG: Record<Color, number> = {
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  grey: 37,
  darkGrey: 90,
  white: 97,
};

const STYLE_ON: Record<TextStyle, number> = { bold: 1, dim: 2, italic: 3, underline: 4, inverse: 7 };
const STYLE_OFF: Record<TextStyle, number> = { bold: 22, dim: 22, italic: 23, underline: 24, inverse: 27 };

const sgr = (code: number) => `${ESC}${code}m`;

/**
 * Backend that emits ANSI escape sequences.
 * Output accumulates until flush() so each frame reaches the terminal in one write.
 */
export class AnsiBackend implements Backend {
  private output = '';

  public constructor(
    private readonly keys: KeySource,
    private readonly out: (data: string) => void,
    private readonly width: () => number = () => process.stdout.columns || 80,
  ) {}

  public columns(): number {
    return this.width();
  }

  public readKey(): Promise<Key | null> {
    return this.keys.next();
  }

  public write(text: string): void {
    this.output += text;
  }

  public setForeground(color: Color): void {
    this.output += sgr(FG[color]);
  }

  public setBackground(color: Color): void {
    this.output += sgr(FG[color] + 10);
  }

  public setStyle(style: TextStyle): void {
    this.output += sgr(STYLE_ON[style]);
  }

  public resetForeground(): void {
    this.output += sgr(39);
  }

  public resetBackground(): void {
    this.output += sgr(49);
  }

  public resetStyle(style: TextStyle): void {
    this.output += sgr(STYLE_OFF[style]);
  }

  public cursorUp(): void {
    this.output += cursorUp(1);
  }

  public cursorHorizontalReset(): void {
    this.output += cursorTo(0);
  }

  public clearLine(): void {
    this.output += clearLine;
  }

  public cursorHide(): void {
    this.output += hideCursorSeq;
  }

  public cursorShow(): void {
    this.output += showCursor;
  }

  public flush(): void {
    if (this.output.length === 0) {
      return;
    }
    const data = this.output;
    this.output = '';
    try {
      this.out(data);
    } catch (err) {
      throw new BackendError('Failed to write to the terminal', { cause: err });
    }
  }

  public dispose(): void {
    this.flush();
    this.keys.close();
  }
}

/** Backend over the process's own terminal, in raw mode until disposed. */
export function createTerminalBackend(log: DebugLog = disabledLog): AnsiBackend {
  if (!process.stdin.isTTY) {
    throw new BackendError('Prompts need an interactive terminal on stdin');
  }
  return new AnsiBackend(new StdinKeySource(process.stdin, log), (data) => {
    process.stdout.write(data);
  });
}
