import { CalendarDate } from './calendar-date';

/**
 * Rates indexed by calendar date. Keys are epoch days, so two CalendarDate
 * instances for the same day address the same point.
 */
export class DateSeries {
  private readonly points = new Map<number, number>();

  static fromEntries(entries: Iterable<readonly [CalendarDate, number]>): DateSeries {
    const series = new DateSeries();
    for (const [date, value] of entries) series.set(date, value);
    return series;
  }

  /** Keys go through CalendarDate.parse; a bad key throws CalendarDateParseError. */
  static fromRecord(record: Readonly<Record<string, number>>): DateSeries {
    const series = new DateSeries();
    for (const [key, value] of Object.entries(record)) series.set(CalendarDate.parse(key), value);
    return series;
  }

  get size(): number {
    return this.points.size;
  }

  set(date: CalendarDate, value: number): this {
    this.points.set(date.epochDay, value);
    return this;
  }

  get(date: CalendarDate): number | undefined {
    return this.points.get(date.epochDay);
  }

  has(date: CalendarDate): boolean {
    return this.points.has(date.epochDay);
  }

  /** Ascending by date. */
  entries(): Array<[CalendarDate, number]> {
    return [...this.points.entries()]
      .sort(([a], [b]) => a - b)
      .map(([day, value]): [CalendarDate, number] => [CalendarDate.fromEpochDay(day), value]);
  }

  values(): number[] {
    return this.entries().map(([, value]) => value);
  }

  /** Points with start <= date <= end. */
  between(start: CalendarDate, end: CalendarDate): DateSeries {
    return DateSeries.fromEntries(
      this.entries().filter(([date]) => !date.isBefore(start) && !date.isAfter(end)),
    );
  }

  toJSON(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [date, value] of this.entries()) out[date.format()] = value;
    return out;
  }
}
