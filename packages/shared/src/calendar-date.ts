const DAY_MS = 86_400_000;

const CANONICAL = /^(\d{4})-(\d{2})-(\d{2})$/;
const RFC3339 = /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(\.\d+)?(?:[Zz]|[+-](\d{2}):(\d{2}))$/;

export class CalendarDateParseError extends Error {
  constructor(readonly input: string) {
    super(`invalid date '${input}', expected YYYY-MM-DD`);
    this.name = 'CalendarDateParseError';
  }
}

function pad(value: number, width: number) {
  return String(value).padStart(width, '0');
}

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear does not.
function utcMidnight(year: number, monthIndex: number, day: number): number {
  const date = new Date(0);
  return date.setUTCFullYear(year, monthIndex, day);
}

/**
 * A calendar date without time of day, kept as a whole number of days since
 * 1970-01-01 so it orders and compares as a plain integer.
 *
 * `UNSET` stands in for "no date" and travels as `null` in JSON.
 */
export class CalendarDate {
  static readonly UNSET = new CalendarDate(undefined);

  private constructor(private readonly day: number | undefined) {}

  static fromEpochDay(day: number): CalendarDate {
    if (!Number.isSafeInteger(day)) throw new RangeError(`epoch day must be an integer, got ${day}`);
    return new CalendarDate(day);
  }

  /** Returns undefined when the parts do not name a real day (2023-02-29). */
  static fromParts(year: number, month: number, day: number): CalendarDate | undefined {
    const ms = utcMidnight(year, month - 1, day);
    const check = new Date(ms);
    if (
      Number.isNaN(ms) ||
      check.getUTCFullYear() !== year ||
      check.getUTCMonth() !== month - 1 ||
      check.getUTCDate() !== day
    ) {
      return undefined;
    }
    return new CalendarDate(Math.floor(ms / DAY_MS));
  }

  /** The UTC calendar date of an instant. */
  static fromDate(date: Date): CalendarDate {
    return new CalendarDate(Math.floor(date.getTime() / DAY_MS));
  }

  /** Strict `YYYY-MM-DD`. */
  static parseCanonical(text: string): CalendarDate {
    const match = CANONICAL.exec(text);
    const parsed = match ? CalendarDate.fromParts(Number(match[1]), Number(match[2]), Number(match[3])) : undefined;
    if (!parsed) throw new CalendarDateParseError(text);
    return parsed;
  }

  /**
   * `YYYY-MM-DD`, falling back to an RFC 3339 timestamp. The date written in
   * the timestamp is kept as is; its offset does not move it to another day.
   * `"null"` reads back as UNSET.
   */
  static parse(text: string): CalendarDate {
    if (text === 'null') return CalendarDate.UNSET;
    if (CANONICAL.test(text)) return CalendarDate.parseCanonical(text);

    const match = RFC3339.exec(text);
    if (!match) throw new CalendarDateParseError(text);
    const [hours, minutes, seconds] = [Number(match[4]), Number(match[5]), Number(match[6])];
    if (hours > 23 || minutes > 59 || seconds > 60) throw new CalendarDateParseError(text);
    // Absent for Z.
    const [offsetHours, offsetMinutes] = [Number(match[8] ?? 0), Number(match[9] ?? 0)];
    if (offsetHours > 23 || offsetMinutes > 59) throw new CalendarDateParseError(text);

    const parsed = CalendarDate.fromParts(Number(match[1]), Number(match[2]), Number(match[3]));
    if (!parsed) throw new CalendarDateParseError(text);
    return parsed;
  }

  get isSet(): boolean {
    return this.day !== undefined;
  }

  get epochDay(): number {
    if (this.day === undefined) throw new RangeError('date is unset');
    return this.day;
  }

  addDays(days: number): CalendarDate {
    return CalendarDate.fromEpochDay(this.epochDay + days);
  }

  /** Feb 29 plus one year lands on Mar 1. */
  addYears(years: number): CalendarDate {
    const date = this.toDate();
    return CalendarDate.fromDate(
      new Date(utcMidnight(date.getUTCFullYear() + years, date.getUTCMonth(), date.getUTCDate())),
    );
  }

  /** UNSET sorts before every real date. */
  compare(other: CalendarDate): number {
    if (this.day === undefined || other.day === undefined) {
      return (this.day === undefined ? 0 : 1) - (other.day === undefined ? 0 : 1);
    }
    return this.day - other.day;
  }

  equals(other: CalendarDate): boolean {
    return this.day === other.day;
  }

  isBefore(other: CalendarDate): boolean {
    return this.compare(other) < 0;
  }

  isAfter(other: CalendarDate): boolean {
    return this.compare(other) > 0;
  }

  /** Midnight UTC of this date. */
  toDate(): Date {
    return new Date(this.epochDay * DAY_MS);
  }

  format(): string {
    if (this.day === undefined) return 'null';
    const date = this.toDate();
    return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
  }

  toString(): string {
    return this.format();
  }

  toJSON(): string | null {
    return this.day === undefined ? null : this.format();
  }
}
