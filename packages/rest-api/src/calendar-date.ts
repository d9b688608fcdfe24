const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/** A date without a time of day, encoded as `YYYY-MM-DD`. */
export class CalendarDate {
  private constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number,
  ) {}

  static of(year: number, month: number, day: number): CalendarDate {
    const probe = new Date(Date.UTC(year, month - 1, day));
    if (
      !Number.isInteger(year) ||
      probe.getUTCFullYear() !== year ||
      probe.getUTCMonth() !== month - 1 ||
      probe.getUTCDate() !== day
    ) {
      throw new RangeError(`Invalid calendar date: ${year}-${month}-${day}`);
    }
    return new CalendarDate(year, month, day);
  }

  static parse(value: string): CalendarDate {
    const match = DATE_RE.exec(value);
    if (!match) {
      throw new RangeError(`Invalid calendar date: ${value}`);
    }
    return CalendarDate.of(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  static isValid(value: string): boolean {
    try {
      CalendarDate.parse(value);
      return true;
    } catch {
      return false;
    }
  }

  equals(other: CalendarDate): boolean {
    return (
      this.year === other.year &&
      this.month === other.month &&
      this.day === other.day
    );
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }
}
