import { Logger } from '@nestjs/common';
import { describeCause } from './errors';

export type BestEffortOutcome = { ok: true } | { ok: false; error: unknown };

/**
 * Side operations whose failure must not change the caller's result (cache
 * write-back, cache invalidation). The failure is logged and handed back as a
 * value; callers drop it.
 */
export async function bestEffort(
  logger: Logger,
  label: string,
  operation: () => Promise<unknown>,
): Promise<BestEffortOutcome> {
  try {
    await operation();
    return { ok: true };
  } catch (error) {
    logger.warn(`error in ${label}: ${describeCause(error)}`);
    return { ok: false, error };
  }
}
