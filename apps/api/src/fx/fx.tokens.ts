export const CURRENCY_REGISTRY = Symbol('CURRENCY_REGISTRY');
export const FX_TIMEOUTS = Symbol('FX_TIMEOUTS');

/** Per-call budgets, each applied as a child of the request's signal. */
export interface FxTimeouts {
  cacheMs: number;
  storeMs: number;
  providerMs: number;
  forecastMs: number;
}
