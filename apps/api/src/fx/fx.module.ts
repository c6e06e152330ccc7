import { Module } from '@nestjs/common';
import { HttpModule, HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import type Redis from 'ioredis';
import type { Pool } from 'pg';
import { createCurrencyRegistry } from '@currency-rates/shared';
import type { Env } from '../config/env.schema';
import { PG_POOL, poolQuery } from '../lib/db';
import { REDIS_CLIENT } from '../lib/redis';
import { RATE_CACHE } from './cache/rate-cache';
import { ioredisCacheClient, RedisRateCache } from './cache/redis-rate-cache';
import { CLOCK, SystemClock } from './clock';
import { FxController } from './fx.controller';
import { FxService } from './fx.service';
import { CURRENCY_REGISTRY, FX_TIMEOUTS, type FxTimeouts } from './fx.tokens';
import { EXCHANGERATE_HOST_URL, ExchangeRateHostProvider } from './providers/exchangerate-host.provider';
import { FORECAST_CLIENT, HttpForecastClient, type ForecastClient } from './providers/forecast.client';
import { FRANKFURTER_URL, FrankfurterProvider } from './providers/frankfurter.provider';
import { RATE_PROVIDER, type RateProvider } from './providers/rate-provider';
import { BAN_STORE } from './store/ban-store';
import { PgBanStore } from './store/pg-ban-store';

type Cfg = ConfigService<Env, true>;

const rateProviderFactory = {
  provide: RATE_PROVIDER,
  inject: [HttpService, ConfigService],
  useFactory: (http: HttpService, cfg: Cfg): RateProvider => {
    const url = cfg.get('FX_API_URL', { infer: true });
    if (cfg.get('FX_PROVIDER', { infer: true }) === 'FRANKFURTER') {
      return new FrankfurterProvider(http, url ?? FRANKFURTER_URL);
    }
    return new ExchangeRateHostProvider(http, {
      baseUrl: url ?? EXCHANGERATE_HOST_URL,
      places: cfg.get('FX_RATE_PLACES', { infer: true }),
      accessKey: cfg.get('FX_API_KEY', { infer: true }),
    });
  },
};

// No URL, no predictions.
const forecastClientFactory = {
  provide: FORECAST_CLIENT,
  inject: [HttpService, ConfigService],
  useFactory: (http: HttpService, cfg: Cfg): ForecastClient | null => {
    const url = cfg.get('FORECAST_API_URL', { infer: true });
    return url ? new HttpForecastClient(http, url) : null;
  },
};

const rateCacheFactory = {
  provide: RATE_CACHE,
  inject: [REDIS_CLIENT, ConfigService],
  useFactory: (redis: Redis, cfg: Cfg) =>
    new RedisRateCache(ioredisCacheClient(redis), {
      availableTtlSeconds: cfg.get('AVAILABLE_TTL_SECONDS', { infer: true }),
    }),
};

const banStoreFactory = {
  provide: BAN_STORE,
  inject: [PG_POOL],
  useFactory: (pool: Pool) => new PgBanStore(poolQuery(pool)),
};

const timeoutsFactory = {
  provide: FX_TIMEOUTS,
  inject: [ConfigService],
  useFactory: (cfg: Cfg): FxTimeouts => ({
    cacheMs: cfg.get('CACHE_TIMEOUT_MS', { infer: true }),
    storeMs: cfg.get('DB_TIMEOUT_MS', { infer: true }),
    providerMs: cfg.get('FX_TIMEOUT_MS', { infer: true }),
    forecastMs: cfg.get('FORECAST_TIMEOUT_MS', { infer: true }),
  }),
};

@Module({
  imports: [HttpModule.register({ maxRedirects: 0 })],
  controllers: [FxController],
  providers: [
    FxService,
    { provide: CURRENCY_REGISTRY, useFactory: () => createCurrencyRegistry() },
    { provide: CLOCK, useClass: SystemClock },
    rateProviderFactory,
    forecastClientFactory,
    rateCacheFactory,
    banStoreFactory,
    timeoutsFactory,
  ],
  exports: [FxService],
})
export class FxModule {}
