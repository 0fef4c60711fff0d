import type { SourceAdapter } from './types.js';

/** Checks an adapter against `SourceAdapter` without widening its own type. */
export function defineAdapter<T extends SourceAdapter>(adapter: T): T {
  return adapter;
}
