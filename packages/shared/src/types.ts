import type { CalendarDate } from './calendar-date';
import type { CurrencyCode } from './currency';
import type { DateSeries } from './date-series';

export interface CurrencyWithBanStatus {
  currency: CurrencyCode;
  banned: boolean;
}

/** One pair at one date, projected out of a snapshot. */
export interface CurrencyRate {
  base: CurrencyCode;
  second: CurrencyCode;
  rate: number;
  date: CalendarDate;
}

/** One provider response: a base against every target the provider chose to return. */
export interface CurrencyRates {
  base: CurrencyCode;
  rates: Readonly<Record<string, number>>;
  date: CalendarDate;
}

export interface CurrencyTimelineRate {
  base: CurrencyCode;
  second: CurrencyCode;
  rates: DateSeries;
  predictions?: DateSeries;
  startDate: CalendarDate;
  endDate: CalendarDate;
}

/** Undefined when the snapshot does not carry the target. */
export function projectRate(snapshot: CurrencyRates, second: CurrencyCode): CurrencyRate | undefined {
  if (!Object.hasOwn(snapshot.rates, second)) return undefined;
  const rate = snapshot.rates[second];
  return { base: snapshot.base, second, rate, date: snapshot.date };
}
