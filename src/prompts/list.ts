import { InvalidConfigurationError } from '../errors.js';

/** An option picked by the user, with its position in the original list. */
export interface ListOption<T> {
  index: number;
  value: T;
}

/** Decides whether an option stays visible for the current filter input. */
export type Filter<T> = (filter: string, option: T, label: string, index: number) => boolean;

/** Case-insensitive substring match on the option's label. */
export function defaultFilter<T>(filter: string, _option: T, label: string): boolean {
  return label.toLowerCase().includes(filter.toLowerCase());
}

export function filterIndices<T>(options: readonly T[], labels: readonly string[], filter: string, predicate: Filter<T>): number[] {
  if (filter.length === 0) {
    return options.map((_, i) => i);
  }
  const indices: number[] = [];
  options.forEach((option, i) => {
    if (predicate(filter, option, labels[i], i)) {
      indices.push(i);
    }
  });
  return indices;
}

export function assertListConfig(optionCount: number, pageSize: number, startingCursor: number): void {
  if (optionCount === 0) {
    throw new InvalidConfigurationError('available options can not be empty');
  }
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new InvalidConfigurationError(`page size must be a positive integer, got ${pageSize}`);
  }
  if (!Number.isInteger(startingCursor) || startingCursor < 0 || startingCursor >= optionCount) {
    throw new InvalidConfigurationError(`starting cursor ${startingCursor} is out of range for ${optionCount} options`);
  }
}
