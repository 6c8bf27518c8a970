import { promises as fs } from 'fs';
import type { AllocationFailure, Result } from './result';
import { ok } from './result';
import { CustomSet } from './set';

// Results take the comparator and options of the first operand. Inputs are never modified.

export const filterOut = <T>(
  set: CustomSet<T>,
  predicate: (element: T) => boolean
): Result<CustomSet<T>, AllocationFailure> => {
  const result = new CustomSet<T>(set.equalityFunction, set.options);
  const end = set.end();
  for (const it = set.begin(); !it.equals(end); it.next()) {
    if (predicate(it.value)) {
      const added = result.add(it.value);
      if (!added.ok) {
        result.clear();
        return added;
      }
    }
  }
  return ok(result);
}

/**
 * Every element of `a` in `a`'s order, then the elements of `b` that `a`
 * lacks, in `b`'s order.
 */
export const union = <T>(a: CustomSet<T>, b: CustomSet<T>): Result<CustomSet<T>, AllocationFailure> => {
  const copied = a.clone();
  if (!copied.ok) {
    return copied;
  }
  const result = copied.value;
  const end = b.end();
  for (const it = b.begin(); !it.equals(end); it.next()) {
    const added = result.add(it.value);
    if (!added.ok) {
      result.clear();
      return added;
    }
  }
  return ok(result);
}

/** Elements of `a` that `b` also contains, in `a`'s order. */
export const intersection = <T>(a: CustomSet<T>, b: CustomSet<T>): Result<CustomSet<T>, AllocationFailure> => {
  return filterOut(a, (element) => b.contains(element));
}

/**
 * Writes `set.toString()` to `filename`. A destination that cannot be
 * written is reported through the set's logger and nothing is thrown.
 */
export const save = async (set: CustomSet<string>, filename: string): Promise<void> => {
  const logger = set.options.logger ?? console;
  try {
    await fs.writeFile(filename, set.toString(), 'utf8');
  } catch (e) {
    logger.error(`Failed to open file: ${filename}`, e);
  }
}
