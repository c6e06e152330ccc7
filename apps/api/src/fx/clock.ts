import { CalendarDate } from '@currency-rates/shared';

export const CLOCK = Symbol('CLOCK');

export interface Clock {
  today(): CalendarDate;
}

/** Today in UTC, matching the provider's day boundaries. */
export class SystemClock implements Clock {
  today(): CalendarDate {
    return CalendarDate.fromDate(new Date());
  }
}
