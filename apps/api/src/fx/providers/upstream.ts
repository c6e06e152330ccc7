import type { HttpService } from '@nestjs/axios';
import type { AxiosRequestConfig } from 'axios';
import { firstValueFrom } from 'rxjs';
import type { z } from 'zod';
import { CalendarDate, DateSeries } from '@currency-rates/shared';
import { DependencyError } from '../../common/errors';
import { abortable } from '../../common/scope';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * One upstream round trip bounded by `signal`, with the payload checked
 * against `schema`. Every failure comes out as a DependencyError for `op`;
 * when the scope has fired, its reason is the cause so timeouts stay visible.
 */
export async function requestJson<T>(
  http: HttpService,
  op: string,
  schema: Schema<T>,
  config: AxiosRequestConfig,
  signal: AbortSignal,
): Promise<T> {
  let data: unknown;
  try {
    signal.throwIfAborted();
    const res = await abortable(firstValueFrom(http.request<unknown>({ ...config, signal })), signal);
    data = res.data;
  } catch (e) {
    throw new DependencyError(op, signal.aborted ? signal.reason : e);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new DependencyError(op, parsed.error);
  return parsed.data;
}

/** Keeps the days whose quote map carries `second`. */
export function pairSeries(byDate: Record<string, Record<string, number>>, second: string): DateSeries {
  const series = new DateSeries();
  for (const [day, quotes] of Object.entries(byDate)) {
    if (Object.hasOwn(quotes, second)) series.set(CalendarDate.parse(day), quotes[second]);
  }
  return series;
}

export function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
