import type { CurrencyCode } from '@currency-rates/shared';

export const AVAILABLE_KEY = 'available';
export const RATE_COLLECTION_KEY = 'rate:collection';
export const TIME_COLLECTION_KEY = 'time:collection';

/** Hash field of a pair's timeline inside `time:collection`. */
export function pairField(base: CurrencyCode, second: CurrencyCode): string {
  return `${base}:${second}`;
}
