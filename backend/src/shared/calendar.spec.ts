import {
  ageOn,
  calculateAge,
  formatCalendarDate,
  parseCalendarDate,
} from './calendar';

describe('calendar', () => {
  it('parses real dates only', () => {
    expect(parseCalendarDate('2024-02-29')).toEqual({
      year: 2024,
      month: 2,
      day: 29,
    });
    expect(parseCalendarDate('2023-02-29')).toBeNull();
    expect(parseCalendarDate('2024-13-01')).toBeNull();
    expect(parseCalendarDate('2024-04-00')).toBeNull();
  });

  it('keeps years below 100 as written', () => {
    expect(parseCalendarDate('0099-01-01')).toEqual({
      year: 99,
      month: 1,
      day: 1,
    });
    expect(parseCalendarDate('0004-02-29')).toEqual({
      year: 4,
      month: 2,
      day: 29,
    });
    expect(parseCalendarDate('0003-02-29')).toBeNull();
  });

  it('keeps the written date of a timestamp', () => {
    expect(parseCalendarDate('1990-05-15T23:30:00-05:00')).toEqual({
      year: 1990,
      month: 5,
      day: 15,
    });
    expect(parseCalendarDate('1990-05-15Tlate')).toBeNull();
  });

  it('pads years and fields when formatting', () => {
    expect(formatCalendarDate({ year: 987, month: 3, day: 4 })).toBe(
      '0987-03-04',
    );
  });

  it('counts a leap-day birthday only once the day has passed', () => {
    const birth = { year: 2000, month: 2, day: 29 };
    expect(calculateAge(birth, { year: 2023, month: 2, day: 28 })).toBe(22);
    expect(calculateAge(birth, { year: 2023, month: 3, day: 1 })).toBe(23);
  });

  it('derives the age from a stored date of birth', () => {
    expect(ageOn('1990-06-16', new Date('2024-06-15T12:00:00Z'))).toBe(33);
    expect(ageOn('1990-06-15', new Date('2024-06-15T12:00:00Z'))).toBe(34);
  });

  it('refuses to compute an age from a corrupt stored date', () => {
    expect(() => ageOn('not-a-date', new Date())).toThrow(
      'Invalid stored date of birth "not-a-date".',
    );
  });
});
