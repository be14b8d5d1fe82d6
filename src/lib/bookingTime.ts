/**
 * An instant with microsecond precision. Providers report fractional seconds
 * past the millisecond, which a `Date` alone would drop.
 */
export class BookingTime {
  constructor(readonly epochMicros: number) {}

  static fromDate(date: Date): BookingTime {
    return new BookingTime(date.getTime() * 1000);
  }

  equals(other: BookingTime): boolean {
    return this.epochMicros === other.epochMicros;
  }

  compare(other: BookingTime): number {
    return this.epochMicros - other.epochMicros;
  }

  /**
   * UTC ISO-8601. Six fractional digits when the instant carries
   * microseconds, the usual three otherwise.
   */
  toISOString(): string {
    const millis = Math.floor(this.epochMicros / 1000);
    const micros = this.epochMicros - millis * 1000;
    const iso = new Date(millis).toISOString();
    return micros === 0 ? iso : `${iso.slice(0, -1)}${String(micros).padStart(3, '0')}Z`;
  }
}
