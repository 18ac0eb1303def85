/**
 * @toolgate/core: Utilities
 *
 * Shared utility functions used across packages.
 */

import { randomUUID } from 'node:crypto';

/**
 * Generate a unique identifier.
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Current timestamp in milliseconds.
 */
export function now(): number {
  return Date.now();
}

/**
 * Exhaustiveness check for discriminated unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
