import { z } from 'zod';
import { CalendarDate, CalendarDateParseError } from './calendar-date';
import { currencyCodeSchema } from './currency';
import { DateSeries } from './date-series';
import type { CurrencyRate, CurrencyRates, CurrencyTimelineRate, CurrencyWithBanStatus } from './types';

export const calendarDateSchema: z.ZodType<CalendarDate, z.ZodTypeDef, unknown> = z
  .union([z.string(), z.null()])
  .transform((value, ctx) => {
    if (value === null) return CalendarDate.UNSET;
    try {
      return CalendarDate.parse(value);
    } catch (e) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: e instanceof CalendarDateParseError ? e.message : String(e),
      });
      return z.NEVER;
    }
  });

export const dateSeriesSchema: z.ZodType<DateSeries, z.ZodTypeDef, unknown> = z
  .record(z.string(), z.number())
  .transform((record, ctx) => {
    try {
      return DateSeries.fromRecord(record);
    } catch (e) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: e instanceof CalendarDateParseError ? e.message : String(e),
      });
      return z.NEVER;
    }
  });

// Shapes as stored in the cache.

export const currencyWithBanStatusListSchema: z.ZodType<CurrencyWithBanStatus[], z.ZodTypeDef, unknown> = z.array(
  z.object({ currency: currencyCodeSchema, banned: z.boolean() }),
);

export const currencyRatesSchema: z.ZodType<CurrencyRates, z.ZodTypeDef, unknown> = z.object({
  base: currencyCodeSchema,
  rates: z.record(z.string(), z.number()),
  date: calendarDateSchema,
});

export const currencyRateSchema: z.ZodType<CurrencyRate, z.ZodTypeDef, unknown> = z.object({
  base: currencyCodeSchema,
  second: currencyCodeSchema,
  rate: z.number(),
  date: calendarDateSchema,
});

export const currencyTimelineRateSchema: z.ZodType<CurrencyTimelineRate, z.ZodTypeDef, unknown> = z.object({
  base: currencyCodeSchema,
  second: currencyCodeSchema,
  rates: dateSeriesSchema,
  predictions: dateSeriesSchema.optional(),
  startDate: calendarDateSchema,
  endDate: calendarDateSchema,
});

// Upstream payloads.

export const snapshotResponseSchema = z.object({
  success: z.boolean(),
  base: z.string().optional(),
  rates: z.record(z.string(), z.number()).optional(),
  date: calendarDateSchema.optional(),
});
export type SnapshotResponse = z.infer<typeof snapshotResponseSchema>;

export const timeseriesResponseSchema = z.object({
  success: z.boolean(),
  base: z.string().optional(),
  rates: z.record(z.string(), z.record(z.string(), z.number())).optional(),
  start_date: calendarDateSchema.optional(),
  end_date: calendarDateSchema.optional(),
});
export type TimeseriesResponse = z.infer<typeof timeseriesResponseSchema>;

export const forecastResponseSchema = z.array(z.number());

// Frankfurter answers without a success flag; HTTP status carries failure.

export const frankfurterSnapshotSchema = z.object({
  base: z.string(),
  date: calendarDateSchema,
  rates: z.record(z.string(), z.number()),
});
export type FrankfurterSnapshot = z.infer<typeof frankfurterSnapshotSchema>;

export const frankfurterTimeseriesSchema = z.object({
  base: z.string(),
  start_date: calendarDateSchema,
  end_date: calendarDateSchema,
  rates: z.record(z.string(), z.record(z.string(), z.number())),
});
export type FrankfurterTimeseries = z.infer<typeof frankfurterTimeseriesSchema>;
