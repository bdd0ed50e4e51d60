import { describe, expect, it, vi } from 'vitest';
import { BackendError } from '../src/errors.js';
import { charKey, type KeySource } from '../src/input.js';
import { AnsiBackend } from '../src/terminal.js';

function setup(out: (data: string) => void = () => undefined) {
  const keys: KeySource = {
    next: vi.fn(async () => charKey('a')),
    close: vi.fn(),
  };
  return { keys, backend: new AnsiBackend(keys, out) };
}

describe('AnsiBackend', () => {
  it('buffers output until flush', () => {
    const out = vi.fn();
    const { backend } = setup(out);
    backend.write('hi');
    expect(out).not.toHaveBeenCalled();
    backend.flush();
    expect(out).toHaveBeenCalledExactlyOnceWith('hi');
  });

  it('reports the width from its width source', () => {
    const keys: KeySource = { next: vi.fn(async () => null), close: vi.fn() };
    const backend = new AnsiBackend(keys, () => undefined, () => 42);
    expect(backend.columns()).toBe(42);
  });

  it('skips empty flushes', () => {
    const out = vi.fn();
    const { backend } = setup(out);
    backend.flush();
    expect(out).not.toHaveBeenCalled();
  });

  it('emits SGR sequences for colors and styles', () => {
    const out = vi.fn();
    const { backend } = setup(out);
    backend.setForeground('red');
    backend.setBackground('grey');
    backend.setStyle('bold');
    backend.write('x');
    backend.resetStyle('bold');
    backend.resetBackground();
    backend.resetForeground();
    backend.setForeground('darkGrey');
    backend.flush();
    expect(out).toHaveBeenCalledWith('\x1B[31m\x1B[47m\x1B[1mx\x1B[22m\x1B[49m\x1B[39m\x1B[90m');
  });

  it('emits cursor and line control sequences', () => {
    const out = vi.fn();
    const { backend } = setup(out);
    backend.cursorHide();
    backend.cursorUp();
    backend.cursorHorizontalReset();
    backend.clearLine();
    backend.cursorShow();
    backend.flush();
    expect(out).toHaveBeenCalledWith('\x1B[?25l\x1B[1A\x1B[1G\x1B[2K\x1B[?25h');
  });

  it('wraps write failures in BackendError', () => {
    const { backend } = setup(() => {
      throw new Error('EPIPE');
    });
    backend.write('x');
    expect(() => backend.flush()).toThrow(BackendError);
  });

  it('reads keys from the key source', async () => {
    const { backend, keys } = setup();
    expect(await backend.readKey()).toEqual(charKey('a'));
    expect(keys.next).toHaveBeenCalledOnce();
  });

  it('flushes and closes the key source on dispose', () => {
    const out = vi.fn();
    const { backend, keys } = setup(out);
    backend.write('bye');
    backend.dispose();
    expect(out).toHaveBeenCalledWith('bye');
    expect(keys.close).toHaveBeenCalledOnce();
  });
});
