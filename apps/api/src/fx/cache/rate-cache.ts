import type {
  CurrencyCode,
  CurrencyRate,
  CurrencyRates,
  CurrencyTimelineRate,
  CurrencyWithBanStatus,
} from '@currency-rates/shared';

export const RATE_CACHE = Symbol('RATE_CACHE');

/**
 * Derived copies of availability, snapshots and timelines.
 *
 * `undefined` means the entry is not there. Anything that stops the cache from
 * answering (backend down, timeout, undecodable value, a write that touched
 * nothing) rejects with a DependencyError instead.
 */
export interface RateCache {
  getAvailableCurrencies(signal: AbortSignal): Promise<CurrencyWithBanStatus[] | undefined>;
  setAvailableCurrencies(list: readonly CurrencyWithBanStatus[], signal: AbortSignal): Promise<void>;
  invalidateAvailableCurrencies(signal: AbortSignal): Promise<void>;

  /** Projects `second` out of the cached snapshot for `base`; a snapshot without it is a miss. */
  getLastRate(base: CurrencyCode, second: CurrencyCode, signal: AbortSignal): Promise<CurrencyRate | undefined>;
  setLastRates(snapshot: CurrencyRates, signal: AbortSignal): Promise<void>;

  getTimeline(base: CurrencyCode, second: CurrencyCode, signal: AbortSignal): Promise<CurrencyTimelineRate | undefined>;
  setTimeline(timeline: CurrencyTimelineRate, signal: AbortSignal): Promise<void>;
}
