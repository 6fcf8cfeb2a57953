/**
 * Find-or-create over a unique constraint.
 *
 * A concurrent writer may insert the same key between our find and our
 * insert; the storage layer then raises ConstraintViolationError and the
 * row the other writer created is returned instead.
 */

import { ConstraintViolationError } from '../errors.js';

export interface FindOrCreateResult<T> {
  value: T;
  created: boolean;
}

export async function findOrCreate<T>(
  find: () => Promise<T | null>,
  create: () => Promise<T>
): Promise<FindOrCreateResult<T>> {
  const existing = await find();
  if (existing !== null) {
    return { value: existing, created: false };
  }

  try {
    return { value: await create(), created: true };
  } catch (error) {
    if (!(error instanceof ConstraintViolationError)) {
      throw error;
    }
    const winner = await find();
    if (winner === null) {
      throw error;
    }
    return { value: winner, created: false };
  }
}
