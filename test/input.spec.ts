import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { charKey, namedKey, type NodeKey, StdinKeySource, translateKey } from '../src/input.js';

const nodeKey = (partial: Partial<NodeKey>): NodeKey => ({ sequence: '', name: undefined, ctrl: false, meta: false, shift: false, ...partial });

describe('translateKey', () => {
  it('translates a printable character', () => {
    expect(translateKey('a', nodeKey({ sequence: 'a', name: 'a' }))).toEqual(charKey('a'));
  });

  it('keeps shift on an uppercase character', () => {
    expect(translateKey('A', nodeKey({ sequence: 'A', name: 'a', shift: true }))).toEqual(charKey('A', { shift: true }));
  });

  it('translates return to enter', () => {
    expect(translateKey('\r', nodeKey({ sequence: '\r', name: 'return' }))).toEqual(namedKey('enter'));
  });

  it('translates arrows with modifiers', () => {
    expect(translateKey(undefined, nodeKey({ sequence: '\x1b[1;5D', name: 'left', ctrl: true }))).toEqual(namedKey('left', { ctrl: true }));
  });

  it('translates ctrl+letter to a char key with ctrl', () => {
    expect(translateKey('\x03', nodeKey({ sequence: '\x03', name: 'c', ctrl: true }))).toEqual(charKey('c', { ctrl: true }));
  });

  it('translates meta to alt', () => {
    expect(translateKey('b', nodeKey({ sequence: '\x1bb', name: 'b', meta: true }))).toEqual(charKey('b', { alt: true }));
  });

  it('handles the kitty CSI u encoding of ctrl+enter', () => {
    expect(translateKey(undefined, nodeKey({ sequence: '\x1b[13;5u' }))).toEqual(namedKey('enter', { ctrl: true }));
  });

  it('accepts a multi-byte character without a key event', () => {
    expect(translateKey('😀', undefined)).toEqual(charKey('😀'));
  });

  it('returns null for keys outside the key model', () => {
    expect(translateKey(undefined, nodeKey({ sequence: '\x1b[15~', name: 'f5' }))).toBeNull();
  });
});

describe('StdinKeySource', () => {
  it('delivers keys in order and null once the stream ends', async () => {
    const stream = new PassThrough();
    const source = new StdinKeySource(stream);
    stream.write('ab\r');

    expect(await source.next()).toEqual(charKey('a'));
    expect(await source.next()).toEqual(charKey('b'));
    expect(await source.next()).toEqual(namedKey('enter'));

    stream.end();
    expect(await source.next()).toBeNull();
    source.close();
  });
});
