import { describe, expect, it } from 'vitest';
import { EndOfInputError } from '../src/errors.js';
import { namedKey } from '../src/input.js';
import { confirm, formatConfirmationDefault, parseConfirmation } from '../src/prompts/confirm.js';
import { enter, RecordingBackend, typeText } from './helpers.js';

describe('confirm', () => {
  it('accepts y', async () => {
    const backend = new RecordingBackend([...typeText('y'), enter]);
    expect(await confirm({ message: 'Continue?' }, { backend })).toBe(true);
    expect(backend.screen()).toEqual(['? Continue? Yes']);
  });

  it('accepts No in any case', async () => {
    const backend = new RecordingBackend([...typeText('No'), enter]);
    expect(await confirm({ message: 'Continue?' }, { backend })).toBe(false);
    expect(backend.screen()).toEqual(['? Continue? No']);
  });

  it('uses the default for an empty answer', async () => {
    const backend = new RecordingBackend([enter]);
    expect(await confirm({ message: 'Continue?', default: false }, { backend })).toBe(false);
  });

  it('shows the default as a hint', async () => {
    const backend = new RecordingBackend([]);
    await expect(confirm({ message: 'Continue?', default: true }, { backend })).rejects.toThrow(EndOfInputError);
    expect(backend.screen()).toEqual(['? Continue? (Y/n)  ']);
  });

  it('rejects an unrecognised answer and keeps it for editing', async () => {
    const backend = new RecordingBackend([...typeText('maybe'), enter]);
    await expect(confirm({ message: 'Continue?' }, { backend })).rejects.toThrow(EndOfInputError);
    expect(backend.screen()).toEqual(["# Invalid answer, try typing 'y' for yes or 'n' for no", '? Continue? maybe ']);
  });

  it('rejects an empty answer without a default', async () => {
    const backend = new RecordingBackend([enter, ...typeText('xn'), namedKey('home'), namedKey('delete'), enter]);
    expect(await confirm({ message: 'Continue?' }, { backend })).toBe(false);
  });

  it('uses a custom parser and error message', async () => {
    const parser = (input: string) => (input === 'ja' ? true : input === 'nein' ? false : null);
    const backend = new RecordingBackend([...typeText('yes'), enter]);
    await expect(confirm({ message: 'Weiter?', parser, errorMessage: 'ja oder nein' }, { backend })).rejects.toThrow(EndOfInputError);
    expect(backend.screen()[0]).toBe('# ja oder nein');
  });
});

describe('parseConfirmation', () => {
  it('parses yes and no variants', () => {
    expect(parseConfirmation('y')).toBe(true);
    expect(parseConfirmation(' YES ')).toBe(true);
    expect(parseConfirmation('n')).toBe(false);
    expect(parseConfirmation('No')).toBe(false);
    expect(parseConfirmation('nope')).toBeNull();
    expect(parseConfirmation('')).toBeNull();
  });
});

describe('formatConfirmationDefault', () => {
  it('capitalises the default', () => {
    expect(formatConfirmationDefault(true)).toBe('Y/n');
    expect(formatConfirmationDefault(false)).toBe('y/N');
  });
});
