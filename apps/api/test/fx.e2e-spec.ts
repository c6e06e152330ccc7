import { type INestApplication, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { createCurrencyRegistry } from '@currency-rates/shared';
import { DependencyError } from '../src/common/errors';
import { RATE_CACHE } from '../src/fx/cache/rate-cache';
import { CLOCK } from '../src/fx/clock';
import { FxController } from '../src/fx/fx.controller';
import { FxService } from '../src/fx/fx.service';
import { CURRENCY_REGISTRY, FX_TIMEOUTS } from '../src/fx/fx.tokens';
import { FORECAST_CLIENT } from '../src/fx/providers/forecast.client';
import { RATE_PROVIDER } from '../src/fx/providers/rate-provider';
import { BAN_STORE } from '../src/fx/store/ban-store';
import {
  code,
  day,
  FakeBanStore,
  FakeForecastClient,
  FakeRateCache,
  FakeRateProvider,
  FixedClock,
  series,
} from './fakes';

describe('FxController (e2e)', () => {
  let app: INestApplication;
  let cache: FakeRateCache;
  let bans: FakeBanStore;
  let provider: FakeRateProvider;
  let forecaster: FakeForecastClient;
  let clock: FixedClock;

  beforeEach(async () => {
    cache = new FakeRateCache();
    bans = new FakeBanStore();
    provider = new FakeRateProvider();
    forecaster = new FakeForecastClient([0.95]);
    clock = new FixedClock(day('2024-01-02'));

    const moduleRef = await Test.createTestingModule({
      controllers: [FxController],
      providers: [
        FxService,
        { provide: CURRENCY_REGISTRY, useValue: createCurrencyRegistry(['USD', 'EUR', 'GBP']) },
        { provide: RATE_CACHE, useValue: cache },
        { provide: BAN_STORE, useValue: bans },
        { provide: RATE_PROVIDER, useValue: provider },
        { provide: FORECAST_CLIENT, useValue: forecaster },
        { provide: CLOCK, useValue: clock },
        { provide: FX_TIMEOUTS, useValue: { cacheMs: 200, storeMs: 200, providerMs: 1_000, forecastMs: 1_000 } },
      ],
    }).compile();

    app = moduleRef.createNestApplication({ logger: false });
    app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /currency/available', () => {
    it('lists every code, banned first', async () => {
      bans.rows.set(code('GBP'), true);

      const res = await request(app.getHttpServer()).get('/currency/available').expect(200);

      expect(res.body).toEqual([
        { currency: 'GBP', banned: true },
        { currency: 'EUR', banned: false },
        { currency: 'USD', banned: false },
      ]);
    });
  });

  describe('POST /currency/change-ban', () => {
    it('acknowledges with 200', async () => {
      const res = await request(app.getHttpServer())
        .post('/currency/change-ban')
        .send({ currency: 'EUR', banned: true })
        .expect(200);

      expect(res.body).toEqual({ ok: true });
      expect(bans.rows.get(code('EUR'))).toBe(true);
    });

    it('rejects a body whose flag is not a boolean', async () => {
      await request(app.getHttpServer())
        .post('/currency/change-ban')
        .send({ currency: 'EUR', banned: 'yes' })
        .expect(400);

      expect(bans.calls).toEqual([]);
    });

    it('rejects an unknown currency', async () => {
      const res = await request(app.getHttpServer())
        .post('/currency/change-ban')
        .send({ currency: 'ZZZ', banned: true })
        .expect(400);

      expect(res.body.error).toBe('VALIDATION_FAILED');
      expect(bans.calls).toEqual([]);
    });
  });

  describe('GET /currency/current-rate', () => {
    it('answers with the projected rate', async () => {
      provider.snapshots.set(code('USD'), { base: code('USD'), rates: { EUR: 0.9123 }, date: day('2024-01-01') });

      const res = await request(app.getHttpServer())
        .get('/currency/current-rate')
        .query({ base: 'USD', second: 'EUR' })
        .expect(200);

      expect(res.body).toEqual({ base: 'USD', second: 'EUR', rate: 0.9123, date: '2024-01-01' });
      expect(res.headers['cache-control']).toBe('public, max-age=30, stale-while-revalidate=60');
    });

    it('rejects an unknown code with no backend calls', async () => {
      const res = await request(app.getHttpServer())
        .get('/currency/current-rate')
        .query({ base: 'USD', second: 'XYZ' })
        .expect(400);

      expect(res.body).toEqual({
        statusCode: 400,
        error: 'VALIDATION_FAILED',
        field: 'second',
        message: "invalid second: unknown currency code 'XYZ'",
      });
      expect(cache.calls).toEqual([]);
      expect(bans.calls).toEqual([]);
      expect(provider.calls).toBe(0);
    });

    it('rejects a missing parameter', async () => {
      await request(app.getHttpServer()).get('/currency/current-rate').query({ base: 'USD' }).expect(400);
      expect(cache.calls).toEqual([]);
    });

    it('tells a pair the provider does not quote apart from a bad parameter', async () => {
      provider.snapshots.set(code('USD'), { base: code('USD'), rates: { GBP: 0.79 }, date: day('2024-01-01') });

      const res = await request(app.getHttpServer())
        .get('/currency/current-rate')
        .query({ base: 'USD', second: 'EUR' })
        .expect(400);

      expect(res.body.error).toBe('RATE_NOT_OFFERED');
      expect(res.body.message).toBe("cannot find rate for 'EUR' against 'USD'");
    });

    it('answers 500 when the provider fails', async () => {
      provider.failure = new DependencyError('fetch USD rates for 2024-01-01 from fake', new Error('socket hang up'));

      const res = await request(app.getHttpServer())
        .get('/currency/current-rate')
        .query({ base: 'USD', second: 'EUR' })
        .expect(500);

      expect(res.body).toEqual({
        statusCode: 500,
        error: 'DEPENDENCY_FAILURE',
        message: 'fetch USD rates for 2024-01-01 from fake: socket hang up',
      });
      expect(res.headers['cache-control']).toBeUndefined();
    });

    it('does not mark a rejected request cacheable', async () => {
      const res = await request(app.getHttpServer())
        .get('/currency/current-rate')
        .query({ base: 'USD', second: 'XYZ' })
        .expect(400);

      expect(res.headers['cache-control']).toBeUndefined();
    });
  });

  describe('GET /currency/time-series', () => {
    beforeEach(() => {
      clock.current = day('2024-01-21');
      provider.timelines.set('USD:EUR', series({ '2024-01-09': 0.9, '2024-01-10': 0.91, '2024-01-20': 0.93 }));
    });

    it('filters rates to the inclusive range and returns every prediction', async () => {
      const res = await request(app.getHttpServer())
        .get('/currency/time-series')
        .query({ base: 'USD', second: 'EUR', start: '2024-01-10', end: '2024-01-20' })
        .expect(200);

      expect(res.body).toEqual({
        base: 'USD',
        second: 'EUR',
        rates: { '2024-01-10': 0.91, '2024-01-20': 0.93 },
        predictions: { '2024-01-21': 0.95 },
        startDate: '2024-01-10',
        endDate: '2024-01-20',
      });
    });

    it('rejects an unknown code with no backend calls', async () => {
      const res = await request(app.getHttpServer())
        .get('/currency/time-series')
        .query({ base: 'XYZ', second: 'EUR', start: '2024-01-10', end: '2024-01-20' })
        .expect(400);

      expect(res.body.error).toBe('VALIDATION_FAILED');
      expect(res.body.field).toBe('base');
      expect(cache.calls).toEqual([]);
      expect(provider.calls).toBe(0);
    });

    it('rejects an inverted range', async () => {
      const res = await request(app.getHttpServer())
        .get('/currency/time-series')
        .query({ base: 'USD', second: 'EUR', start: '2024-01-20', end: '2024-01-10' })
        .expect(400);

      expect(res.body.field).toBe('end');
      expect(provider.calls).toBe(0);
    });

    it('rejects a malformed date', async () => {
      const res = await request(app.getHttpServer())
        .get('/currency/time-series')
        .query({ base: 'USD', second: 'EUR', start: '10/01/2024', end: '2024-01-20' })
        .expect(400);

      expect(res.body.message).toBe("invalid start: invalid date '10/01/2024', expected YYYY-MM-DD");
    });
  });
});
