export type Validation = { type: 'valid' } | { type: 'invalid'; message: string };

/**
 * Checks a candidate answer. Must not have side effects: the driver calls it
 * again on every submission, with the same value if nothing changed.
 */
export type Validator<T> = (value: T) => Validation | Promise<Validation>;

export const DEFAULT_ERROR_MESSAGE = 'Invalid input';

export function valid(): Validation {
  return { type: 'valid' };
}

export function invalid(message = DEFAULT_ERROR_MESSAGE): Validation {
  return { type: 'invalid', message };
}

/** First failing validator wins. */
export async function runValidators<T>(validators: readonly Validator<T>[], value: T): Promise<Validation> {
  for (const validator of validators) {
    const result = await validator(value);
    if (result.type === 'invalid') {
      return result;
    }
  }
  return valid();
}

const length = (value: string) => Array.from(value).length;

export function required(message = 'A response is required'): Validator<string> {
  return (value) => (value.length > 0 ? valid() : invalid(message));
}

/** Length in characters, not UTF-16 units. */
export function minLength(min: number, message = `The length of the response should be at least ${min}`): Validator<string> {
  return (value) => (length(value) >= min ? valid() : invalid(message));
}

export function maxLength(max: number, message = `The length of the response should be at most ${max}`): Validator<string> {
  return (value) => (length(value) <= max ? valid() : invalid(message));
}

/** For multi-select answers. */
export function minSelections<T>(min: number, message = `Select at least ${min} option${min === 1 ? '' : 's'}`): Validator<readonly T[]> {
  return (value) => (value.length >= min ? valid() : invalid(message));
}
