import type { CurrencyCode, CurrencyWithBanStatus } from '@currency-rates/shared';

export const BAN_STORE = Symbol('BAN_STORE');

/** Authoritative ban flags. Only codes someone has toggled have a row. */
export interface BanStore {
  listBans(codes: readonly CurrencyCode[], signal: AbortSignal): Promise<CurrencyWithBanStatus[]>;
  /** Insert or overwrite; repeating the same call leaves the same row. */
  upsertBan(code: CurrencyCode, banned: boolean, signal: AbortSignal): Promise<void>;
}
