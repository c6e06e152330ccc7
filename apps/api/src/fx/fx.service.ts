import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CalendarDate,
  CalendarDateParseError,
  DateSeries,
  projectRate,
  type CurrencyCode,
  type CurrencyRate,
  type CurrencyRegistry,
  type CurrencyTimelineRate,
  type CurrencyWithBanStatus,
} from '@currency-rates/shared';
import { bestEffort } from '../common/best-effort';
import { InvalidParameterError, RateNotOfferedError } from '../common/errors';
import { childScope } from '../common/scope';
import { reconcileBans } from './availability';
import { RATE_CACHE, type RateCache } from './cache/rate-cache';
import { CLOCK, type Clock } from './clock';
import { CURRENCY_REGISTRY, FX_TIMEOUTS, type FxTimeouts } from './fx.tokens';
import { FORECAST_CLIENT, type ForecastClient } from './providers/forecast.client';
import { RATE_PROVIDER, type RateProvider } from './providers/rate-provider';
import { BAN_STORE, type BanStore } from './store/ban-store';

/**
 * Cache-aside over the rate cache, the ban store and the upstream provider.
 *
 * Parameters are checked before any I/O. Reads and fetches that fail end the
 * request; only cache write-back and invalidation go through bestEffort().
 */
@Injectable()
export class FxService {
  private readonly logger = new Logger(FxService.name);

  constructor(
    @Inject(CURRENCY_REGISTRY) private readonly registry: CurrencyRegistry,
    @Inject(RATE_CACHE) private readonly cache: RateCache,
    @Inject(BAN_STORE) private readonly bans: BanStore,
    @Inject(RATE_PROVIDER) private readonly provider: RateProvider,
    @Inject(FORECAST_CLIENT) private readonly forecaster: ForecastClient | null,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(FX_TIMEOUTS) private readonly timeouts: FxTimeouts,
  ) {}

  async getAvailableCurrencies(signal: AbortSignal): Promise<CurrencyWithBanStatus[]> {
    const cached = await this.cache.getAvailableCurrencies(this.cacheScope(signal));
    if (cached) return cached;

    const codes = this.registry.allCodes();
    const rows = await this.bans.listBans(codes, childScope(signal, this.timeouts.storeMs));
    const list = reconcileBans(codes, rows);

    await bestEffort(this.logger, 'save available currencies', () =>
      this.cache.setAvailableCurrencies(list, this.cacheScope(signal)),
    );
    return list;
  }

  async changeBanStatus(currency: string, banned: boolean, signal: AbortSignal): Promise<void> {
    const code = this.requireCode('currency', currency);

    await this.bans.upsertBan(code, banned, childScope(signal, this.timeouts.storeMs));
    await bestEffort(this.logger, 'invalidate available currencies', () =>
      this.cache.invalidateAvailableCurrencies(this.cacheScope(signal)),
    );
  }

  async getCurrentRate(base: string, second: string, signal: AbortSignal): Promise<CurrencyRate> {
    const baseCode = this.requireCode('base', base);
    const secondCode = this.requireCode('second', second);
    const today = this.clock.today();

    const cached = await this.cache.getLastRate(baseCode, secondCode, this.cacheScope(signal));
    if (cached && cached.date.isSet && !cached.date.isAfter(today)) return cached;

    const snapshot = await this.provider.fetchSnapshot(
      baseCode,
      today.addDays(-1),
      childScope(signal, this.timeouts.providerMs),
    );
    const rate = projectRate(snapshot, secondCode);
    if (!rate) throw new RateNotOfferedError(baseCode, secondCode);

    await bestEffort(this.logger, `save last rates for ${baseCode}`, () =>
      this.cache.setLastRates(snapshot, this.cacheScope(signal)),
    );
    return rate;
  }

  async getTimeline(
    base: string,
    second: string,
    start: string,
    end: string,
    signal: AbortSignal,
  ): Promise<CurrencyTimelineRate> {
    const baseCode = this.requireCode('base', base);
    const secondCode = this.requireCode('second', second);
    const startDate = this.requireDate('start', start);
    const endDate = this.requireDate('end', end);
    if (startDate.isAfter(endDate)) throw new InvalidParameterError('end', `${end} is before start ${start}`);

    const timeline =
      (await this.cache.getTimeline(baseCode, secondCode, this.cacheScope(signal))) ??
      (await this.seedTimeline(baseCode, secondCode, signal));

    return {
      base: timeline.base,
      second: timeline.second,
      rates: timeline.rates.between(startDate, endDate),
      predictions: timeline.predictions,
      startDate,
      endDate,
    };
  }

  // A year back from yesterday through yesterday, whatever range was asked
  // for; the cached copy then serves every range inside it.
  private async seedTimeline(
    base: CurrencyCode,
    second: CurrencyCode,
    signal: AbortSignal,
  ): Promise<CurrencyTimelineRate> {
    const yesterday = this.clock.today().addDays(-1);

    let timeline = await this.provider.fetchTimeline(
      base,
      second,
      yesterday.addYears(-1),
      yesterday,
      childScope(signal, this.timeouts.providerMs),
    );

    if (this.forecaster) {
      const values = await this.forecaster.forecast(
        timeline.rates,
        childScope(signal, this.timeouts.forecastMs),
      );
      timeline = {
        ...timeline,
        predictions: DateSeries.fromEntries(values.map((value, i) => [yesterday.addDays(i + 1), value] as const)),
      };
    }

    const seeded = timeline;
    await bestEffort(this.logger, `save timeline ${base}:${second}`, () =>
      this.cache.setTimeline(seeded, this.cacheScope(signal)),
    );
    return seeded;
  }

  private cacheScope(signal: AbortSignal): AbortSignal {
    return childScope(signal, this.timeouts.cacheMs);
  }

  private requireCode(field: string, value: string): CurrencyCode {
    if (!this.registry.isValid(value)) throw new InvalidParameterError(field, `unknown currency code '${value}'`);
    return value;
  }

  private requireDate(field: string, value: string): CalendarDate {
    try {
      return CalendarDate.parseCanonical(value);
    } catch (e) {
      if (e instanceof CalendarDateParseError) throw new InvalidParameterError(field, e.message);
      throw e;
    }
  }
}
