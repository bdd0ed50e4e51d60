/**
 * Semantic actions decoded from keys.
 *
 * Every prompt type declares its own closed action union that embeds the
 * shared {@link InputAction} set for its text field. The mappers here are
 * pure: the same key and configuration always give the same action.
 */

import { hasModifiers, type Key } from './input.js';

export type InputAction =
  | { type: 'moveLeft' }
  | { type: 'moveRight' }
  | { type: 'moveToStart' }
  | { type: 'moveToEnd' }
  | { type: 'moveWordLeft' }
  | { type: 'moveWordRight' }
  | { type: 'deleteLeft' }
  | { type: 'deleteRight' }
  | { type: 'deleteWordLeft' }
  | { type: 'deleteWordRight' }
  | { type: 'insert'; char: string };

export type PromptAction<TInner> = { type: 'submit' } | { type: 'cancel' } | { type: 'interrupt' } | { type: 'inner'; action: TInner };

export type KeyMapper<TInner> = (key: Key) => TInner | null;

/**
 * Text editing keys shared by every prompt with a text field.
 */
export function inputActionFromKey(key: Key): InputAction | null {
  if (key.type !== 'char') {
    const word = key.ctrl || key.alt;
    switch (key.type) {
      case 'backspace':
        return word ? { type: 'deleteWordLeft' } : { type: 'deleteLeft' };
      case 'delete':
        return word ? { type: 'deleteWordRight' } : { type: 'deleteRight' };
      case 'left':
        return word ? { type: 'moveWordLeft' } : { type: 'moveLeft' };
      case 'right':
        return word ? { type: 'moveWordRight' } : { type: 'moveRight' };
      case 'home':
        return { type: 'moveToStart' };
      case 'end':
        return { type: 'moveToEnd' };
      default:
        return null;
    }
  }

  if (key.ctrl) {
    switch (key.value) {
      case 'a':
        return { type: 'moveToStart' };
      case 'e':
        return { type: 'moveToEnd' };
      // tmux sends Ctrl+W for Ctrl+Backspace
      case 'w':
        return { type: 'deleteWordLeft' };
    }
    return null;
  }

  if (key.alt) {
    switch (key.value) {
      case 'b':
        return { type: 'moveWordLeft' };
      case 'f':
        return { type: 'moveWordRight' };
      // tmux sends ESC+d for Ctrl+Delete
      case 'd':
        return { type: 'deleteWordRight' };
    }
    return null;
  }

  return { type: 'insert', char: key.value };
}

/**
 * Keys every prompt shares: Enter submits, Escape cancels, Ctrl+C interrupts.
 * Everything else goes to the prompt's own mapper.
 */
export function promptActionFromKey<TInner>(key: Key, inner: KeyMapper<TInner>): PromptAction<TInner> | null {
  if (key.type === 'enter') {
    return { type: 'submit' };
  }
  if (key.type === 'escape') {
    return { type: 'cancel' };
  }
  if (key.type === 'char' && key.ctrl && key.value === 'c') {
    return { type: 'interrupt' };
  }
  const action = inner(key);
  return action === null ? null : { type: 'inner', action };
}

/**
 * Vertical list navigation shared by list prompts. Arrow keys always apply;
 * `k`/`j` only in vim mode.
 */
export type ListNavigation = { type: 'moveUp' } | { type: 'moveDown' } | { type: 'pageUp' } | { type: 'pageDown' } | { type: 'moveToFirst' } | { type: 'moveToLast' };

export function listNavigationFromKey(key: Key, vimMode: boolean): ListNavigation | null {
  if (hasModifiers(key)) {
    return null;
  }
  switch (key.type) {
    case 'up':
      return { type: 'moveUp' };
    case 'down':
      return { type: 'moveDown' };
    case 'pageup':
      return { type: 'pageUp' };
    case 'pagedown':
      return { type: 'pageDown' };
    case 'home':
      return { type: 'moveToFirst' };
    case 'end':
      return { type: 'moveToLast' };
    case 'char':
      if (vimMode && key.value === 'k') {
        return { type: 'moveUp' };
      }
      if (vimMode && key.value === 'j') {
        return { type: 'moveDown' };
      }
      return null;
    default:
      return null;
  }
}
