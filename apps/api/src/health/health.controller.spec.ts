import { ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Env } from '../config/env.schema';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  const cfg = new ConfigService<Env, true>({ DB_TIMEOUT_MS: 50, CACHE_TIMEOUT_MS: 50 });
  const db = { query: jest.fn(async (_text: string): Promise<unknown> => ({ rows: [{ '?column?': 1 }] })) };
  const redis = { ping: jest.fn(async (): Promise<string> => 'PONG') };

  beforeEach(() => {
    db.query.mockClear();
    redis.ping.mockClear();
  });

  it('reports liveness without touching the backends', () => {
    const controller = new HealthController(db, redis, cfg);

    expect(controller.health()).toEqual({ status: 'ok' });
    expect(db.query).not.toHaveBeenCalled();
  });

  it('is ready when both backends answer', async () => {
    const controller = new HealthController(db, redis, cfg);

    await expect(controller.ready()).resolves.toEqual({ status: 'ok', postgres: 'up', redis: 'up' });
    expect(db.query).toHaveBeenCalledWith('select 1');
    expect(redis.ping).toHaveBeenCalledTimes(1);
  });

  it('answers 503 naming the backend that is down', async () => {
    const controller = new HealthController(
      db,
      { ping: async () => Promise.reject(new Error('Connection is closed.')) },
      cfg,
    );

    const error = await controller.ready().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceUnavailableException);
    expect(error instanceof ServiceUnavailableException && error.getResponse()).toEqual({
      status: 'error',
      postgres: 'up',
      redis: 'down',
      errors: ['Connection is closed.'],
    });
  });

  it('treats a probe that outlives its timeout as down', async () => {
    const controller = new HealthController({ query: () => new Promise(() => undefined) }, redis, cfg);

    const error = await controller.ready().catch((e: unknown) => e);

    expect(error instanceof ServiceUnavailableException && error.getResponse()).toEqual({
      status: 'error',
      postgres: 'down',
      redis: 'up',
      errors: ['timed out'],
    });
  });
});
