import { describe, expect, it } from 'vitest';
import { BookingTime } from './bookingTime';

describe('BookingTime', () => {
  it('prints microseconds only when present', () => {
    expect(new BookingTime(1704103200123000).toISOString()).toBe('2024-01-01T10:00:00.123Z');
    expect(new BookingTime(1704103200123004).toISOString()).toBe('2024-01-01T10:00:00.123004Z');
  });

  it('orders instants that share a millisecond', () => {
    const earlier = new BookingTime(1704103200123400);
    const later = new BookingTime(1704103200123900);

    expect(earlier.compare(later)).toBeLessThan(0);
    expect(earlier.equals(later)).toBe(false);
    expect(earlier.equals(new BookingTime(1704103200123400))).toBe(true);
  });
});
