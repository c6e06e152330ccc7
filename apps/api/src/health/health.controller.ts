// apps/api/src/health/health.controller.ts
import { Controller, Get, Inject, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Env } from '../config/env.schema';
import { describeCause } from '../common/errors';
import { abortable } from '../common/scope';
import { PG_POOL } from '../lib/db';
import { REDIS_CLIENT } from '../lib/redis';

// Just enough of pg.Pool and ioredis to probe them.
export interface SqlProbe {
  query(text: string): Promise<unknown>;
}
export interface RedisProbe {
  ping(): Promise<string>;
}

type ProbeResult = 'up' | 'down';

@Controller()
export class HealthController {
  constructor(
    @Inject(PG_POOL) private readonly db: SqlProbe,
    @Inject(REDIS_CLIENT) private readonly redis: RedisProbe,
    private readonly cfg: ConfigService<Env, true>,
  ) {}

  @Get('/')
  root() {
    return { status: 'ok' };
  }

  @Get('/health')
  health() {
    return { status: 'ok' };
  }

  @Get('/health/ready')
  async ready() {
    const [postgres, redis] = await Promise.all([
      this.probe(() => this.db.query('select 1'), this.cfg.get('DB_TIMEOUT_MS', { infer: true })),
      this.probe(() => this.redis.ping(), this.cfg.get('CACHE_TIMEOUT_MS', { infer: true })),
    ]);
    const body = { postgres: postgres.state, redis: redis.state };
    if (postgres.state === 'down' || redis.state === 'down') {
      throw new ServiceUnavailableException({
        status: 'error',
        ...body,
        errors: [postgres.error, redis.error].filter((e): e is string => e !== undefined),
      });
    }
    return { status: 'ok', ...body };
  }

  private async probe(
    check: () => Promise<unknown>,
    timeoutMs: number,
  ): Promise<{ state: ProbeResult; error?: string }> {
    try {
      await abortable(check(), AbortSignal.timeout(timeoutMs));
      return { state: 'up' };
    } catch (e) {
      return { state: 'down', error: describeCause(e) };
    }
  }
}
