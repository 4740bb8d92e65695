import { EngineError, PersistenceError } from '../core/errors.js';

/**
 * Run a store operation, turning driver failures into PersistenceError.
 * Engine errors thrown inside (e.g. NotFound from a transaction) pass through.
 */
export function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof EngineError) throw error;
    throw new PersistenceError(`${operation} failed`, { cause: error });
  }
}

export function now(): string {
  return new Date().toISOString();
}
