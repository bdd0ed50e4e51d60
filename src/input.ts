/**
 * Keyboard input using Node's readline keypress parser.
 * Translates Node keypress events into the engine's Key model.
 *
 * readline.emitKeypressEvents() takes care of:
 * - CSI sequences (\x1b[A) and SS3/application mode (\x1bOA)
 * - Modifier keys (Ctrl, Alt, Shift)
 * - Partial escape sequence buffering with timeout
 * - Home, End, Delete, PageUp, PageDown
 */

import readline from 'node:readline';
import { BackendError } from './errors.js';
import { type DebugLog, disabledLog } from './logger.js';

export type NamedKey = 'enter' | 'escape' | 'backspace' | 'delete' | 'left' | 'right' | 'up' | 'down' | 'tab' | 'pageup' | 'pagedown' | 'home' | 'end';

export interface KeyModifiers {
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}

export interface CharKey extends KeyModifiers {
  type: 'char';
  value: string;
}

export interface SpecialKey extends KeyModifiers {
  type: NamedKey;
}

export type Key = CharKey | SpecialKey;

export const NO_MODIFIERS: Readonly<KeyModifiers> = { ctrl: false, alt: false, shift: false };

export function charKey(value: string, modifiers: Partial<KeyModifiers> = {}): CharKey {
  return { type: 'char', value, ...NO_MODIFIERS, ...modifiers };
}

export function namedKey(type: NamedKey, modifiers: Partial<KeyModifiers> = {}): SpecialKey {
  return { type, ...NO_MODIFIERS, ...modifiers };
}

export function hasModifiers(key: Key): boolean {
  return key.ctrl || key.alt;
}

export interface NodeKey {
  sequence: string;
  name: string | undefined;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

const NAMED_KEYS: Record<string, NamedKey> = {
  return: 'enter',
  enter: 'enter',
  escape: 'escape',
  backspace: 'backspace',
  delete: 'delete',
  left: 'left',
  right: 'right',
  up: 'up',
  down: 'down',
  tab: 'tab',
  pageup: 'pageup',
  pagedown: 'pagedown',
  home: 'home',
  end: 'end',
};

/**
 * Translate a Node readline keypress event into a Key.
 */
export function translateKey(ch: string | undefined, key: NodeKey | undefined): Key | null {
  const name = key?.name;
  const modifiers: KeyModifiers = {
    ctrl: key?.ctrl ?? false,
    alt: key?.meta ?? false,
    shift: key?.shift ?? false,
  };
  const sequence = key?.sequence ?? ch ?? '';

  // CSI u format (Kitty keyboard protocol): ESC [ keycode ; modifier u
  // readline doesn't parse these, so handle them from the raw sequence
  // biome-ignore lint/suspicious/noControlCharactersInRegex: matching terminal escape sequences requires \x1b
  const csiU = sequence.match(/^\x1b\[(\d+);(\d+)u$/);
  if (csiU) {
    const keycode = Number(csiU[1]);
    const modifier = Number(csiU[2]);
    const ctrl = modifier === 5;
    if (keycode === 13) {
      return namedKey('enter', { ctrl });
    }
    if (keycode === 127) {
      return namedKey('backspace', { ctrl });
    }
  }

  if (name !== undefined && name in NAMED_KEYS) {
    return { type: NAMED_KEYS[name], ...modifiers };
  }

  // Ctrl+letter and Alt+letter arrive as the bare letter name
  if ((modifiers.ctrl || modifiers.alt) && name !== undefined && [...name].length === 1) {
    return charKey(name, modifiers);
  }

  // Regular printable character (supports multi-byte Unicode like emoji)
  if (ch && [...ch].length === 1 && ch >= ' ') {
    return charKey(ch, modifiers);
  }

  return null;
}

export interface KeySource {
  /** Resolves with the next key, or `null` when the stream has ended. */
  next(): Promise<Key | null>;
  close(): void;
}

/** The parts of a TTY read stream the key source uses; `process.stdin` by default. */
export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

interface Waiter {
  resolve: (key: Key | null) => void;
  reject: (err: Error) => void;
}

/**
 * Reads keys from a TTY in raw mode, one at a time.
 * Keys pressed while nobody is waiting are queued in arrival order.
 */
export class StdinKeySource implements KeySource {
  private readonly queue: Key[] = [];
  private waiter: Waiter | undefined;
  private ended = false;
  private failure: Error | undefined;
  private readonly wasRaw: boolean;

  public constructor(
    private readonly stdin: KeyInput = process.stdin,
    private readonly log: DebugLog = disabledLog,
  ) {
    readline.emitKeypressEvents(stdin);
    this.wasRaw = stdin.isRaw ?? false;
    if (stdin.isTTY) {
      stdin.setRawMode?.(true);
    }
    stdin.on('keypress', this.onKeypress);
    stdin.on('end', this.onEnd);
    stdin.on('error', this.onError);
    stdin.resume();
  }

  public next(): Promise<Key | null> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  public close(): void {
    this.stdin.removeListener('keypress', this.onKeypress);
    this.stdin.removeListener('end', this.onEnd);
    this.stdin.removeListener('error', this.onError);
    if (this.stdin.isTTY) {
      this.stdin.setRawMode?.(this.wasRaw);
    }
    this.stdin.pause();
  }

  private readonly onKeypress = (ch: string | undefined, key: NodeKey | undefined): void => {
    const translated = translateKey(ch, key);
    this.log.log('keypress', { sequence: key?.sequence ?? ch, name: key?.name, ctrl: key?.ctrl, meta: key?.meta, shift: key?.shift }, translated);
    if (!translated) {
      return;
    }
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.resolve(translated);
    } else {
      this.queue.push(translated);
    }
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.takeWaiter()?.resolve(null);
  };

  private readonly onError = (err: Error): void => {
    this.failure = new BackendError('Failed to read from the terminal', { cause: err });
    this.takeWaiter()?.reject(this.failure);
  };

  private takeWaiter(): Waiter | undefined {
    const waiter = this.waiter;
    this.waiter = undefined;
    return waiter;
  }
}
