import type { HttpService } from '@nestjs/axios';
import { forecastResponseSchema, type DateSeries } from '@currency-rates/shared';
import { requestJson } from './upstream';

export const FORECAST_CLIENT = Symbol('FORECAST_CLIENT');

export interface ForecastClient {
  /** Values for the days following the last point of `history`, in order. */
  forecast(history: DateSeries, signal: AbortSignal): Promise<number[]>;
}

export class HttpForecastClient implements ForecastClient {
  constructor(
    private readonly http: HttpService,
    private readonly url: string,
  ) {}

  forecast(history: DateSeries, signal: AbortSignal): Promise<number[]> {
    return requestJson(
      this.http,
      'fetch forecast',
      forecastResponseSchema,
      {
        method: 'POST',
        url: this.url,
        data: history.toJSON(),
        headers: { 'Content-Type': 'application/json' },
      },
      signal,
    );
  }
}
