import { z } from 'zod';
import defaultCodes from './data/currencies.json';

export const currencyCodeSchema = z
  .string()
  .regex(/^[A-Z]{3}$/, 'currency code must be three uppercase letters')
  .brand<'CurrencyCode'>();

/** A code known to be in a CurrencyRegistry (or read back from a store that only holds such codes). */
export type CurrencyCode = z.infer<typeof currencyCodeSchema>;

/**
 * Immutable set of supported currency codes. Built once at startup and handed
 * to whoever needs to validate codes.
 */
export class CurrencyRegistry {
  private readonly codes: ReadonlySet<string>;

  constructor(codes: Iterable<string>) {
    this.codes = new Set(codes);
    Object.freeze(this);
  }

  get size(): number {
    return this.codes.size;
  }

  isValid(code: string): code is CurrencyCode {
    return this.codes.has(code);
  }

  /** Sorted copy. */
  allCodes(): CurrencyCode[] {
    const out: CurrencyCode[] = [];
    for (const code of this.codes) {
      if (this.isValid(code)) out.push(code);
    }
    return out.sort();
  }
}

export function createCurrencyRegistry(codes: Iterable<string> = defaultCodes): CurrencyRegistry {
  return new CurrencyRegistry(codes);
}
