import { describe, expect, it } from 'vitest';
import { invalid, maxLength, minLength, minSelections, required, runValidators, valid, type Validator } from '../src/validator.js';

describe('built-in validators', () => {
  it('required rejects an empty answer', () => {
    expect(required()('')).toEqual({ type: 'invalid', message: 'A response is required' });
    expect(required()('x')).toEqual({ type: 'valid' });
  });

  it('minLength counts characters', () => {
    expect(minLength(2)('😀😀')).toEqual({ type: 'valid' });
    expect(minLength(3)('😀😀')).toEqual({ type: 'invalid', message: 'The length of the response should be at least 3' });
  });

  it('maxLength counts characters', () => {
    expect(maxLength(2)('😀😀')).toEqual({ type: 'valid' });
    expect(maxLength(1, 'too long')('ab')).toEqual({ type: 'invalid', message: 'too long' });
  });

  it('minSelections pluralises its message', () => {
    expect(minSelections(1)([])).toEqual({ type: 'invalid', message: 'Select at least 1 option' });
    expect(minSelections(2)(['a'])).toEqual({ type: 'invalid', message: 'Select at least 2 options' });
    expect(minSelections(1)(['a'])).toEqual({ type: 'valid' });
  });

  it('invalid has a default message', () => {
    expect(invalid()).toEqual({ type: 'invalid', message: 'Invalid input' });
  });
});

describe('runValidators', () => {
  it('is valid with no validators', async () => {
    expect(await runValidators([], 'x')).toEqual(valid());
  });

  it('returns the first failure', async () => {
    const calls: string[] = [];
    const track =
      (name: string, result: ReturnType<typeof valid>): Validator<string> =>
      () => {
        calls.push(name);
        return result;
      };
    const result = await runValidators([track('a', valid()), track('b', invalid('b failed')), track('c', invalid('c failed'))], 'x');
    expect(result).toEqual({ type: 'invalid', message: 'b failed' });
    expect(calls).toEqual(['a', 'b']);
  });

  it('awaits async validators', async () => {
    const slow: Validator<string> = async (value) => (value === 'ok' ? valid() : invalid('nope'));
    expect(await runValidators([slow], 'ok')).toEqual(valid());
    expect(await runValidators([slow], 'no')).toEqual(invalid('nope'));
  });
});
