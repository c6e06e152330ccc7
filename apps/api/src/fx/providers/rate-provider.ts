import type { CalendarDate, CurrencyCode, CurrencyRates, CurrencyTimelineRate } from '@currency-rates/shared';

export const RATE_PROVIDER = Symbol('RATE_PROVIDER');

export interface RateProvider {
  readonly name: string;
  /** Every target the provider quotes against `base` on `asOf`. */
  fetchSnapshot(base: CurrencyCode, asOf: CalendarDate, signal: AbortSignal): Promise<CurrencyRates>;
  /** Daily `base`/`second` rates over [start, end]; days without the pair are left out. */
  fetchTimeline(
    base: CurrencyCode,
    second: CurrencyCode,
    start: CalendarDate,
    end: CalendarDate,
    signal: AbortSignal,
  ): Promise<CurrencyTimelineRate>;
}
