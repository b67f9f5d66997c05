import { InvalidConfigurationError } from "../errors";

/**
 * Splitting threshold used when none is given.
 */
export const DEFAULT_MAX_ELEMS = 2;

export function checkMaxElems(maxElems: number) {
  if (!(Number.isSafeInteger(maxElems) && maxElems >= 1)) {
    throw new InvalidConfigurationError(`Invalid maxElems: ${maxElems}`);
  }
}

/**
 * Splits a slice at `floor(length / 2)`, or returns null if it fits in one leaf.
 */
export function splitMidpoint<T>(
  elements: readonly T[],
  maxElems: number
): [left: readonly T[], right: readonly T[]] | null {
  if (elements.length <= maxElems) return null;
  const mid = Math.floor(elements.length / 2);
  return [elements.slice(0, mid), elements.slice(mid)];
}
