import { describe, expect, it } from 'vitest';
import {
  applyInputAction,
  clear,
  createEditor,
  deleteLeft,
  deleteRight,
  deleteWordLeft,
  deleteWordRight,
  getText,
  insertChar,
  isEmpty,
  masked,
  moveLeft,
  moveRight,
  moveToEnd,
  moveToStart,
  moveWordLeft,
  moveWordRight,
  split,
} from '../src/editor.js';

const at = (text: string, cursor: number) => ({ ...createEditor(text), cursor });

describe('createEditor', () => {
  it('starts empty', () => {
    const state = createEditor();
    expect(getText(state)).toBe('');
    expect(state.cursor).toBe(0);
    expect(isEmpty(state)).toBe(true);
  });

  it('places the cursor after the initial text', () => {
    expect(createEditor('abc').cursor).toBe(3);
  });

  it('counts characters, not UTF-16 units', () => {
    const state = createEditor('a😀b');
    expect(state.chars).toEqual(['a', '😀', 'b']);
    expect(state.cursor).toBe(3);
  });
});

describe('insertChar', () => {
  it('inserts at the cursor and moves past it', () => {
    const state = insertChar(at('ac', 1), 'b');
    expect(getText(state)).toBe('abc');
    expect(state.cursor).toBe(2);
  });

  it('inserts an emoji as one character', () => {
    const state = insertChar(createEditor('a'), '😀');
    expect(state.chars.length).toBe(2);
    expect(state.cursor).toBe(2);
  });
});

describe('deleteLeft / deleteRight', () => {
  it('deleteLeft removes the character before the cursor', () => {
    const state = deleteLeft(createEditor('abc'));
    expect(getText(state)).toBe('ab');
    expect(state.cursor).toBe(2);
  });

  it('deleteLeft at the start is a no-op', () => {
    const state = at('abc', 0);
    expect(deleteLeft(state)).toBe(state);
  });

  it('deleteRight removes the character under the cursor', () => {
    const state = deleteRight(at('abc', 1));
    expect(getText(state)).toBe('ac');
    expect(state.cursor).toBe(1);
  });

  it('deleteRight at the end is a no-op', () => {
    const state = createEditor('abc');
    expect(deleteRight(state)).toBe(state);
  });

  it('removes a whole emoji', () => {
    const state = deleteLeft(moveLeft(createEditor('a😀b')));
    expect(getText(state)).toBe('ab');
    expect(state.cursor).toBe(1);
  });
});

describe('cursor movement', () => {
  it('moveLeft stops at 0', () => {
    const state = at('ab', 0);
    expect(moveLeft(state)).toBe(state);
  });

  it('moveRight stops at the end', () => {
    const state = createEditor('ab');
    expect(moveRight(state)).toBe(state);
  });

  it('moveToStart and moveToEnd', () => {
    expect(moveToStart(createEditor('abc')).cursor).toBe(0);
    expect(moveToEnd(at('abc', 1)).cursor).toBe(3);
  });

  it('keeps the cursor in range over any sequence of edits', () => {
    let state = createEditor();
    const steps = [
      (s: typeof state) => insertChar(s, 'x'),
      moveLeft,
      moveLeft,
      deleteLeft,
      moveRight,
      moveRight,
      deleteRight,
      (s: typeof state) => insertChar(s, 'y'),
      moveWordLeft,
      deleteWordRight,
      deleteWordLeft,
      moveToEnd,
      deleteLeft,
      deleteLeft,
    ];
    for (const step of steps) {
      state = step(state);
      expect(state.cursor).toBeGreaterThanOrEqual(0);
      expect(state.cursor).toBeLessThanOrEqual(state.chars.length);
    }
  });
});

describe('word movement', () => {
  it('moveWordLeft skips whitespace then the word', () => {
    const first = moveWordLeft(createEditor('hello  world'));
    expect(first.cursor).toBe(7);
    expect(moveWordLeft(first).cursor).toBe(0);
  });

  it('moveWordRight lands after the next word', () => {
    const first = moveWordRight(at('hello  world', 0));
    expect(first.cursor).toBe(5);
    expect(moveWordRight(first).cursor).toBe(12);
  });

  it('deleteWordLeft removes trailing whitespace and the word before it', () => {
    const state = deleteWordLeft(createEditor('foo bar '));
    expect(getText(state)).toBe('foo ');
    expect(state.cursor).toBe(4);
  });

  it('deleteWordRight removes the next word', () => {
    const state = deleteWordRight(at('foo bar', 0));
    expect(getText(state)).toBe(' bar');
    expect(state.cursor).toBe(0);
  });

  it('word deletes at the edges are no-ops', () => {
    const start = at('foo', 0);
    const end = createEditor('foo');
    expect(deleteWordLeft(start)).toBe(start);
    expect(deleteWordRight(end)).toBe(end);
  });
});

describe('split', () => {
  it('shows a space under the cursor at the end', () => {
    expect(split(createEditor('ab'))).toEqual({ before: 'ab', at: ' ', after: '' });
  });

  it('splits around the cursor', () => {
    expect(split(at('abc', 1))).toEqual({ before: 'a', at: 'b', after: 'c' });
  });
});

describe('masked', () => {
  it('replaces each character and keeps the cursor', () => {
    const state = masked(at('a😀c', 1), '*');
    expect(getText(state)).toBe('***');
    expect(state.cursor).toBe(1);
  });
});

describe('clear', () => {
  it('empties the buffer', () => {
    const state = clear(createEditor('abc'));
    expect(getText(state)).toBe('');
    expect(state.cursor).toBe(0);
  });
});

describe('applyInputAction', () => {
  it('dispatches each action', () => {
    let state = createEditor('ab');
    state = applyInputAction(state, { type: 'insert', char: 'c' });
    state = applyInputAction(state, { type: 'moveToStart' });
    state = applyInputAction(state, { type: 'deleteRight' });
    state = applyInputAction(state, { type: 'moveToEnd' });
    state = applyInputAction(state, { type: 'deleteLeft' });
    expect(getText(state)).toBe('b');
    expect(state.cursor).toBe(1);
  });
});
