import type { Backend, Color, TextStyle } from '../src/backend.js';
import { charKey, type Key, namedKey } from '../src/input.js';

export const enter = namedKey('enter');
export const escape = namedKey('escape');
export const backspace = namedKey('backspace');
export const ctrlC = charKey('c', { ctrl: true });

export function typeText(text: string): Key[] {
  return Array.from(text, (c) => charKey(c));
}

/**
 * In-memory backend: plays a fixed list of keys and records every output call.
 * `screen()` replays the writes and cursor moves onto a grid of lines, wrapping
 * at `width` the way a terminal does.
 */
export class RecordingBackend implements Backend {
  public readonly events: string[] = [];
  public cursorHidden = false;
  public flushes = 0;
  public disposed = false;
  private readonly keys: Key[];
  private lines: string[] = [''];
  private row = 0;
  private col = 0;

  public constructor(
    keys: readonly Key[] = [],
    private readonly width = 80,
  ) {
    this.keys = [...keys];
  }

  public columns(): number {
    return this.width;
  }

  public get remainingKeys(): number {
    return this.keys.length;
  }

  public async readKey(): Promise<Key | null> {
    return this.keys.shift() ?? null;
  }

  public write(text: string): void {
    this.events.push(`write:${text}`);
    for (const c of text) {
      if (c === '\n') {
        this.row++;
        this.col = 0;
        if (this.lines.length <= this.row) {
          this.lines.push('');
        }
        continue;
      }
      if (this.col >= this.width) {
        this.row++;
        this.col = 0;
        if (this.lines.length <= this.row) {
          this.lines.push('');
        }
      }
      const line = this.lines[this.row].padEnd(this.col);
      this.lines[this.row] = line.slice(0, this.col) + c + line.slice(this.col + 1);
      this.col++;
    }
  }

  public setForeground(color: Color): void {
    this.events.push(`fg:${color}`);
  }

  public setBackground(color: Color): void {
    this.events.push(`bg:${color}`);
  }

  public setStyle(style: TextStyle): void {
    this.events.push(`style:${style}`);
  }

  public resetForeground(): void {
    this.events.push('fg:reset');
  }

  public resetBackground(): void {
    this.events.push('bg:reset');
  }

  public resetStyle(style: TextStyle): void {
    this.events.push(`style:reset:${style}`);
  }

  public cursorUp(): void {
    this.events.push('up');
    this.row = Math.max(0, this.row - 1);
  }

  public cursorHorizontalReset(): void {
    this.events.push('hr');
    this.col = 0;
  }

  public clearLine(): void {
    this.events.push('clear');
    this.lines[this.row] = '';
  }

  public cursorHide(): void {
    this.events.push('hide');
    this.cursorHidden = true;
  }

  public cursorShow(): void {
    this.events.push('show');
    this.cursorHidden = false;
  }

  public flush(): void {
    this.flushes++;
  }

  public dispose(): void {
    this.disposed = true;
  }

  /** Lines above the cursor row, i.e. everything written and ended with a newline. */
  public screen(): string[] {
    return this.lines.slice(0, this.row);
  }

  public clearEvents(): void {
    this.events.length = 0;
  }
}
