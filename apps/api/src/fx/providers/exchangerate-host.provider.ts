import type { HttpService } from '@nestjs/axios';
import {
  snapshotResponseSchema,
  timeseriesResponseSchema,
  type CalendarDate,
  type CurrencyCode,
  type CurrencyRates,
  type CurrencyTimelineRate,
} from '@currency-rates/shared';
import { DependencyError } from '../../common/errors';
import type { RateProvider } from './rate-provider';
import { pairSeries, requestJson, trimSlash } from './upstream';

export const EXCHANGERATE_HOST_URL = 'https://api.exchangerate.host';

export interface ExchangeRateHostOptions {
  baseUrl: string;
  places: number;
  accessKey?: string;
}

/**
 * exchangerate.host: `/{date}` for one day against every target and
 * `/timeseries` for a pair over a range. A `success: false` body is a failure
 * even under HTTP 200.
 */
export class ExchangeRateHostProvider implements RateProvider {
  readonly name = 'exchangerate.host';
  private readonly baseUrl: string;

  constructor(
    private readonly http: HttpService,
    private readonly options: ExchangeRateHostOptions,
  ) {
    this.baseUrl = trimSlash(options.baseUrl);
  }

  async fetchSnapshot(base: CurrencyCode, asOf: CalendarDate, signal: AbortSignal): Promise<CurrencyRates> {
    const op = `fetch ${base} rates for ${asOf.format()} from ${this.name}`;
    const body = await requestJson(
      this.http,
      op,
      snapshotResponseSchema,
      { method: 'GET', url: `${this.baseUrl}/${asOf.format()}`, params: this.params({ base }) },
      signal,
    );
    if (!body.success) throw new DependencyError(op, new Error('unsuccessful response'));
    if (!body.rates) throw new DependencyError(op, new Error('response has no rates'));

    return { base, rates: body.rates, date: body.date ?? asOf };
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
      timeseriesResponseSchema,
      {
        method: 'GET',
        url: `${this.baseUrl}/timeseries`,
        params: this.params({
          start_date: start.format(),
          end_date: end.format(),
          base,
          symbols: second,
        }),
      },
      signal,
    );
    if (!body.success) throw new DependencyError(op, new Error('unsuccessful response'));

    try {
      return {
        base,
        second,
        rates: pairSeries(body.rates ?? {}, second),
        startDate: body.start_date ?? start,
        endDate: body.end_date ?? end,
      };
    } catch (e) {
      throw new DependencyError(op, e);
    }
  }

  private params(query: Record<string, string>): Record<string, string | number> {
    const params: Record<string, string | number> = { ...query, places: this.options.places };
    if (this.options.accessKey) params.access_key = this.options.accessKey;
    return params;
  }
}
