import { z } from 'zod';
import { currencyCodeSchema, type CurrencyCode, type CurrencyWithBanStatus } from '@currency-rates/shared';
import { DependencyError } from '../../common/errors';
import { abortable } from '../../common/scope';
import type { QueryFunction } from '../../lib/db';
import type { BanStore } from './ban-store';

const LIST_BANS = 'select currency, banned from currency_bans where currency = any($1)';

const UPSERT_BAN = `insert into currency_bans (currency, banned) values ($1, $2)
on conflict (currency) do update set banned = excluded.banned`;

const banRowsSchema = z.array(z.object({ currency: currencyCodeSchema, banned: z.boolean() }));

export class PgBanStore implements BanStore {
  constructor(private readonly query: QueryFunction) {}

  async listBans(codes: readonly CurrencyCode[], signal: AbortSignal): Promise<CurrencyWithBanStatus[]> {
    const op = 'list currency bans';
    const { rows } = await this.run(op, signal, () => this.query(LIST_BANS, [[...codes]]));
    const parsed = banRowsSchema.safeParse(rows);
    if (!parsed.success) throw new DependencyError(op, parsed.error);
    return parsed.data;
  }

  async upsertBan(code: CurrencyCode, banned: boolean, signal: AbortSignal): Promise<void> {
    await this.run(`upsert ban for ${code}`, signal, () => this.query(UPSERT_BAN, [code, banned]));
  }

  private async run<T>(op: string, signal: AbortSignal, statement: () => Promise<T>): Promise<T> {
    try {
      signal.throwIfAborted();
      return await abortable(statement(), signal);
    } catch (e) {
      throw new DependencyError(op, e);
    }
  }
}
