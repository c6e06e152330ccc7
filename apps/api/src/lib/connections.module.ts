import { Global, Inject, Logger, Module, type OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type Redis from 'ioredis';
import type { Pool } from 'pg';
import type { Env } from '../config/env.schema';
import { createPool, PG_POOL } from './db';
import { createRedis, REDIS_CLIENT } from './redis';

const poolProvider = {
  provide: PG_POOL,
  inject: [ConfigService],
  useFactory: (cfg: ConfigService<Env, true>): Pool =>
    createPool({
      DATABASE_URL: cfg.get('DATABASE_URL', { infer: true }),
      DB_POOL_SIZE: cfg.get('DB_POOL_SIZE', { infer: true }),
      DB_SSL: cfg.get('DB_SSL', { infer: true }),
    }),
};

const redisProvider = {
  provide: REDIS_CLIENT,
  inject: [ConfigService],
  useFactory: async (cfg: ConfigService<Env, true>): Promise<Redis> => {
    const redis = createRedis(cfg.get('REDIS_URL', { infer: true }));
    await redis.connect();
    return redis;
  },
};

/** Process-wide pg pool and Redis client, closed on shutdown. */
@Global()
@Module({
  providers: [poolProvider, redisProvider],
  exports: [PG_POOL, REDIS_CLIENT],
})
export class ConnectionsModule implements OnApplicationShutdown {
  private readonly logger = new Logger(ConnectionsModule.name);

  constructor(
    @Inject(PG_POOL) private readonly pool: Pool,
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
  ) {}

  async onApplicationShutdown() {
    const results = await Promise.allSettled([this.pool.end(), this.redis.quit()]);
    for (const r of results) {
      if (r.status === 'rejected') this.logger.warn(`close failed: ${String(r.reason)}`);
    }
  }
}
