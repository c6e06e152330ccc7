import type { CurrencyCode, CurrencyWithBanStatus } from '@currency-rates/shared';

/**
 * One entry per registry code. Store rows override the default of unbanned;
 * rows for codes outside `codes` are ignored. Banned codes come first, then
 * everything by code.
 */
export function reconcileBans(
  codes: readonly CurrencyCode[],
  rows: readonly CurrencyWithBanStatus[],
): CurrencyWithBanStatus[] {
  const banned = new Map<string, boolean>();
  for (const row of rows) banned.set(row.currency, row.banned);

  return codes
    .map((currency) => ({ currency, banned: banned.get(currency) ?? false }))
    .sort((a, b) => {
      if (a.banned !== b.banned) return a.banned ? -1 : 1;
      return a.currency < b.currency ? -1 : a.currency > b.currency ? 1 : 0;
    });
}
