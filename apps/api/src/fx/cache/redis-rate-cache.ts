import type Redis from 'ioredis';
import type { z } from 'zod';
import {
  currencyRatesSchema,
  currencyTimelineRateSchema,
  currencyWithBanStatusListSchema,
  projectRate,
  type CurrencyCode,
  type CurrencyRate,
  type CurrencyRates,
  type CurrencyTimelineRate,
  type CurrencyWithBanStatus,
} from '@currency-rates/shared';
import { DependencyError } from '../../common/errors';
import { abortable } from '../../common/scope';
import { AVAILABLE_KEY, pairField, RATE_COLLECTION_KEY, TIME_COLLECTION_KEY } from './cache-keys';
import type { RateCache } from './rate-cache';

/** The Redis commands the cache issues. */
export interface CacheClient {
  get(key: string): Promise<string | null>;
  /** SET with EX; resolves 'OK' when written. */
  setEx(key: string, value: string, ttlSeconds: number): Promise<string | null>;
  del(key: string): Promise<number>;
  hget(key: string, field: string): Promise<string | null>;
  /** Resolves the number of fields newly created. */
  hset(key: string, field: string, value: string): Promise<number>;
}

export function ioredisCacheClient(redis: Redis): CacheClient {
  return {
    get: (key) => redis.get(key),
    setEx: (key, value, ttlSeconds) => redis.set(key, value, 'EX', ttlSeconds),
    del: (key) => redis.del(key),
    hget: (key, field) => redis.hget(key, field),
    hset: (key, field, value) => redis.hset(key, field, value),
  };
}

export interface RedisRateCacheOptions {
  availableTtlSeconds: number;
}

export class RedisRateCache implements RateCache {
  constructor(
    private readonly client: CacheClient,
    private readonly options: RedisRateCacheOptions,
  ) {}

  async getAvailableCurrencies(signal: AbortSignal): Promise<CurrencyWithBanStatus[] | undefined> {
    const op = 'get available currencies from cache';
    const raw = await this.run(op, signal, () => this.client.get(AVAILABLE_KEY));
    // An empty string is never something we wrote.
    if (raw === '') throw new DependencyError(op, new Error('empty value'));
    return raw === null ? undefined : decode(op, currencyWithBanStatusListSchema, raw);
  }

  async setAvailableCurrencies(list: readonly CurrencyWithBanStatus[], signal: AbortSignal): Promise<void> {
    const op = 'set available currencies in cache';
    const reply = await this.run(op, signal, () =>
      this.client.setEx(AVAILABLE_KEY, JSON.stringify(list), this.options.availableTtlSeconds),
    );
    if (reply !== 'OK') throw new DependencyError(op, new Error(`unexpected reply ${String(reply)}`));
  }

  async invalidateAvailableCurrencies(signal: AbortSignal): Promise<void> {
    const op = 'invalidate available currencies in cache';
    const removed = await this.run(op, signal, () => this.client.del(AVAILABLE_KEY));
    if (removed === 0) throw new DependencyError(op, new Error('no key removed'));
  }

  async getLastRate(base: CurrencyCode, second: CurrencyCode, signal: AbortSignal): Promise<CurrencyRate | undefined> {
    const op = `get last rate ${base}/${second} from cache`;
    const raw = await this.run(op, signal, () => this.client.hget(RATE_COLLECTION_KEY, base));
    if (raw === null) return undefined;
    return projectRate(decode(op, currencyRatesSchema, raw), second);
  }

  async setLastRates(snapshot: CurrencyRates, signal: AbortSignal): Promise<void> {
    await this.hset(`set last rates for ${snapshot.base} in cache`, RATE_COLLECTION_KEY, snapshot.base, snapshot, signal);
  }

  async getTimeline(
    base: CurrencyCode,
    second: CurrencyCode,
    signal: AbortSignal,
  ): Promise<CurrencyTimelineRate | undefined> {
    const op = `get timeline ${base}/${second} from cache`;
    const raw = await this.run(op, signal, () => this.client.hget(TIME_COLLECTION_KEY, pairField(base, second)));
    return raw === null ? undefined : decode(op, currencyTimelineRateSchema, raw);
  }

  async setTimeline(timeline: CurrencyTimelineRate, signal: AbortSignal): Promise<void> {
    const field = pairField(timeline.base, timeline.second);
    await this.hset(`set timeline ${field} in cache`, TIME_COLLECTION_KEY, field, timeline, signal);
  }

  // HSET answers 0 when the field already existed. The value is replaced all
  // the same, but the write is still reported as touching nothing.
  private async hset(op: string, key: string, field: string, value: unknown, signal: AbortSignal) {
    const created = await this.run(op, signal, () => this.client.hset(key, field, JSON.stringify(value)));
    if (created === 0) throw new DependencyError(op, new Error('no field created'));
  }

  private async run<T>(op: string, signal: AbortSignal, command: () => Promise<T>): Promise<T> {
    try {
      signal.throwIfAborted();
      return await abortable(command(), signal);
    } catch (e) {
      throw new DependencyError(op, e);
    }
  }
}

function decode<T>(op: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new DependencyError(op, e);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) throw new DependencyError(op, parsed.error);
  return parsed.data;
}
