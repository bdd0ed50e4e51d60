/**
 * Pure single-line text buffer with cursor management.
 * No I/O, just data manipulation.
 *
 * Content is held as Unicode scalar values, so the cursor moves over a
 * multi-byte character or an emoji code point as one unit.
 */

import type { InputAction } from './actions.js';

export interface EditorState {
  readonly chars: readonly string[];
  /** Always within `[0, chars.length]`. */
  readonly cursor: number;
}

export interface EditorSplit {
  before: string;
  /** The character under the cursor, or a space at end of content. */
  at: string;
  after: string;
}

export function createEditor(initial = ''): EditorState {
  const chars = Array.from(initial);
  return { chars, cursor: chars.length };
}

export function getText(state: EditorState): string {
  return state.chars.join('');
}

export function isEmpty(state: EditorState): boolean {
  return state.chars.length === 0;
}

export function clear(_state: EditorState): EditorState {
  return createEditor();
}

export function insertChar(state: EditorState, char: string): EditorState {
  const { chars, cursor } = state;
  const inserted = Array.from(char);
  return { chars: [...chars.slice(0, cursor), ...inserted, ...chars.slice(cursor)], cursor: cursor + inserted.length };
}

export function deleteLeft(state: EditorState): EditorState {
  const { chars, cursor } = state;
  if (cursor === 0) {
    return state;
  }
  return { chars: [...chars.slice(0, cursor - 1), ...chars.slice(cursor)], cursor: cursor - 1 };
}

export function deleteRight(state: EditorState): EditorState {
  const { chars, cursor } = state;
  if (cursor >= chars.length) {
    return state;
  }
  return { chars: [...chars.slice(0, cursor), ...chars.slice(cursor + 1)], cursor };
}

export function deleteWordLeft(state: EditorState): EditorState {
  const target = moveWordLeft(state).cursor;
  if (target === state.cursor) {
    return state;
  }
  const { chars, cursor } = state;
  return { chars: [...chars.slice(0, target), ...chars.slice(cursor)], cursor: target };
}

export function deleteWordRight(state: EditorState): EditorState {
  const target = moveWordRight(state).cursor;
  if (target === state.cursor) {
    return state;
  }
  const { chars, cursor } = state;
  return { chars: [...chars.slice(0, cursor), ...chars.slice(target)], cursor };
}

export function moveLeft(state: EditorState): EditorState {
  if (state.cursor === 0) {
    return state;
  }
  return { chars: state.chars, cursor: state.cursor - 1 };
}

export function moveRight(state: EditorState): EditorState {
  if (state.cursor >= state.chars.length) {
    return state;
  }
  return { chars: state.chars, cursor: state.cursor + 1 };
}

export function moveToStart(state: EditorState): EditorState {
  return { chars: state.chars, cursor: 0 };
}

export function moveToEnd(state: EditorState): EditorState {
  return { chars: state.chars, cursor: state.chars.length };
}

const isWhitespace = (c: string) => /\s/u.test(c);

/** Skips whitespace, then the word before it. */
export function moveWordLeft(state: EditorState): EditorState {
  const { chars } = state;
  let i = state.cursor;
  while (i > 0 && isWhitespace(chars[i - 1])) {
    i--;
  }
  while (i > 0 && !isWhitespace(chars[i - 1])) {
    i--;
  }
  return i === state.cursor ? state : { chars, cursor: i };
}

/** Skips whitespace, then the word after it, landing on the word's end. */
export function moveWordRight(state: EditorState): EditorState {
  const { chars } = state;
  let i = state.cursor;
  while (i < chars.length && isWhitespace(chars[i])) {
    i++;
  }
  while (i < chars.length && !isWhitespace(chars[i])) {
    i++;
  }
  return i === state.cursor ? state : { chars, cursor: i };
}

export function split(state: EditorState): EditorSplit {
  const { chars, cursor } = state;
  return {
    before: chars.slice(0, cursor).join(''),
    at: chars[cursor] ?? ' ',
    after: chars.slice(cursor + 1).join(''),
  };
}

/** Replaces every character with `mask`, keeping the cursor where it is. */
export function masked(state: EditorState, mask: string): EditorState {
  return { chars: state.chars.map(() => mask), cursor: state.cursor };
}

export function applyInputAction(state: EditorState, action: InputAction): EditorState {
  switch (action.type) {
    case 'insert':
      return insertChar(state, action.char);
    case 'deleteLeft':
      return deleteLeft(state);
    case 'deleteRight':
      return deleteRight(state);
    case 'deleteWordLeft':
      return deleteWordLeft(state);
    case 'deleteWordRight':
      return deleteWordRight(state);
    case 'moveLeft':
      return moveLeft(state);
    case 'moveRight':
      return moveRight(state);
    case 'moveWordLeft':
      return moveWordLeft(state);
    case 'moveWordRight':
      return moveWordRight(state);
    case 'moveToStart':
      return moveToStart(state);
    case 'moveToEnd':
      return moveToEnd(state);
  }
}
