import { describe, it, expect } from 'vitest';
import { addDays, isPastLocalDeadline, isValidTimeZone, localDateOf, parseTimeOfDay } from '../local-day';

describe('localDateOf', () => {
  it('uses the calendar date of the given zone', () => {
    expect(localDateOf(new Date('2026-03-10T16:30:00Z'), 'Asia/Shanghai')).toBe('2026-03-11');
    expect(localDateOf(new Date('2026-03-10T16:30:00Z'), 'UTC')).toBe('2026-03-10');
  });

  it('follows daylight saving offsets', () => {
    expect(localDateOf(new Date('2026-03-10T03:30:00Z'), 'America/New_York')).toBe('2026-03-09');
  });
});

describe('isPastLocalDeadline', () => {
  const deadline = { hour: 20, minute: 0 };

  it('is true from the deadline minute onwards', () => {
    expect(isPastLocalDeadline(new Date('2026-03-10T11:59:00Z'), 'Asia/Shanghai', deadline)).toBe(false);
    expect(isPastLocalDeadline(new Date('2026-03-10T12:00:00Z'), 'Asia/Shanghai', deadline)).toBe(true);
  });

  it('resets at local midnight', () => {
    expect(isPastLocalDeadline(new Date('2026-03-10T16:05:00Z'), 'Asia/Shanghai', deadline)).toBe(false);
  });
});

describe('addDays', () => {
  it('crosses month and year boundaries', () => {
    expect(addDays('2026-02-27', 2)).toBe('2026-03-01');
    expect(addDays('2026-01-01', -1)).toBe('2025-12-31');
  });
});

describe('parseTimeOfDay', () => {
  it('parses 24h times', () => {
    expect(parseTimeOfDay('20:00')).toEqual({ hour: 20, minute: 0 });
    expect(parseTimeOfDay(' 7:05 ')).toEqual({ hour: 7, minute: 5 });
  });

  it('rejects anything else', () => {
    expect(parseTimeOfDay('24:00')).toBeNull();
    expect(parseTimeOfDay('12:60')).toBeNull();
    expect(parseTimeOfDay('noon')).toBeNull();
  });
});

describe('isValidTimeZone', () => {
  it('accepts IANA zones only', () => {
    expect(isValidTimeZone('Asia/Shanghai')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
    expect(isValidTimeZone('')).toBe(false);
  });
});
