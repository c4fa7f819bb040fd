import type { Alternative } from './types.js';

/**
 * Empty record keyed by alternative label. It has no prototype, so a label such
 * as "__proto__" is stored as an ordinary own key instead of being swallowed.
 */
export function alternativeRecord<T>(): Record<Alternative, T> {
  return Object.create(null);
}
