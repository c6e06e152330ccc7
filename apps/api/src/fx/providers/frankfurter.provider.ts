import type { HttpService } from '@nestjs/axios';
import {
  frankfurterSnapshotSchema,
  frankfurterTimeseriesSchema,
  type CalendarDate,
  type CurrencyCode,
  type CurrencyRates,
  type CurrencyTimelineRate,
} from '@currency-rates/shared';
import { DependencyError } from '../../common/errors';
import type { RateProvider } from './rate-provider';
import { pairSeries, requestJson, trimSlash } from './upstream';

export const FRANKFURTER_URL = 'https://api.frankfurter.app';

// ECB reference rates. No key, no success flag; errors come back as 4xx.
export class FrankfurterProvider implements RateProvider {
  readonly name = 'frankfurter(ECB)';
  private readonly baseUrl: string;

  constructor(private readonly http: HttpService, baseUrl: string = FRANKFURTER_URL) {
    this.baseUrl = trimSlash(baseUrl);
  }

  async fetchSnapshot(base: CurrencyCode, asOf: CalendarDate, signal: AbortSignal): Promise<CurrencyRates> {
    const body = await requestJson(
      this.http,
      `fetch ${base} rates for ${asOf.format()} from ${this.name}`,
      frankfurterSnapshotSchema,
      { method: 'GET', url: `${this.baseUrl}/${asOf.format()}`, params: { from: base } },
      signal,
    );
    return { base, rates: body.rates, date: body.date };
  }

  async fetchTimeline(
    base: CurrencyCode,
    second: CurrencyCode,
    start: CalendarDate,
    end: CalendarDate,
    signal: AbortSignal,
  ): Promise<CurrencyTimelineRate> {
    const op = `fetch ${base}/${second} timeline from ${this.name}`;
    const body = await requestJson(
      this.http,
      op,
      frankfurterTimeseriesSchema,
      {
        method: 'GET',
        url: `${this.baseUrl}/${start.format()}..${end.format()}`,
        params: { from: base, to: second },
      },
      signal,
    );

    try {
      return {
        base,
        second,
        rates: pairSeries(body.rates, second),
        startDate: body.start_date,
        endDate: body.end_date,
      };
    } catch (e) {
      throw new DependencyError(op, e);
    }
  }
}
