/**
 * The visible window of a list. `first`/`last` tell whether the window
 * touches either end of the full list, which decides the continuation markers.
 */
export interface Page<T> {
  content: T[];
  /** Index of the highlighted entry within `content`. */
  selection: number;
  first: boolean;
  last: boolean;
  total: number;
}

/**
 * Computes the window of at most `pageSize` entries that contains `cursor`,
 * keeping the cursor centred once the list is longer than one page.
 *
 * Stateless: wrap-around is the caller's job, done on `cursor` beforehand.
 */
export function paginate<T>(choices: readonly T[], pageSize: number, cursor: number): Page<T> {
  const total = choices.length;
  const size = Math.max(1, pageSize);
  const sel = Math.min(Math.max(0, cursor), Math.max(0, total - 1));
  const half = Math.floor(size / 2);

  let start: number;
  let selection: number;
  if (total <= size) {
    start = 0;
    selection = sel;
  } else if (sel < half) {
    start = 0;
    selection = sel;
  } else if (total - sel - 1 < half) {
    start = total - size;
    selection = sel - start;
  } else {
    start = sel - half;
    selection = half;
  }

  const end = Math.min(total, start + size);
  return {
    content: choices.slice(start, end),
    selection,
    first: start === 0,
    last: end === total,
    total,
  };
}

/** Moves `cursor` by `delta` over a list of `length`, wrapping at both ends. */
export function wrapCursor(cursor: number, delta: number, length: number): number {
  if (length === 0) {
    return 0;
  }
  return (((cursor + delta) % length) + length) % length;
}
