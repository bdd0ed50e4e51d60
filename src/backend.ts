import type { Key } from './input.js';

export const COLORS = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white', 'grey', 'darkGrey'] as const;

export type Color = (typeof COLORS)[number];

export const TEXT_STYLES = ['bold', 'dim', 'italic', 'underline', 'inverse'] as const;

export type TextStyle = (typeof TEXT_STYLES)[number];

/**
 * Everything the prompt engine needs from a terminal.
 * Output calls may be buffered until {@link Backend.flush}.
 */
export interface Backend {
  /** Resolves with the next key, or `null` once the input stream has ended. */
  readKey(): Promise<Key | null>;
  /** Terminal width in cells, used to count rows a long line wraps onto. */
  columns(): number;
  write(text: string): void;
  setForeground(color: Color): void;
  setBackground(color: Color): void;
  setStyle(style: TextStyle): void;
  resetForeground(): void;
  resetBackground(): void;
  resetStyle(style: TextStyle): void;
  cursorUp(): void;
  cursorHorizontalReset(): void;
  clearLine(): void;
  cursorHide(): void;
  cursorShow(): void;
  flush(): void;
  /** Releases the input side (raw mode, listeners). */
  dispose(): void;
}
