export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(T.+)?$/;

/**
 * Reads `YYYY-MM-DD`, optionally followed by an ISO time part which is
 * ignored once it parses. Returns null for impossible dates such as
 * 2023-02-30.
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, yearText, monthText, dayText, timePart] = match;
  if (timePart && !Number.isFinite(Date.parse(value.trim()))) {
    return null;
  }
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  // Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not.
  const check = new Date(0);
  check.setUTCFullYear(year, month - 1, day);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }
  return { year, month, day };
}

export function formatCalendarDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function toCalendarDate(instant: Date): CalendarDate {
  return {
    year: instant.getUTCFullYear(),
    month: instant.getUTCMonth() + 1,
    day: instant.getUTCDate(),
  };
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** Whole years completed between `birth` and `today` (UTC calendar). */
export function calculateAge(birth: CalendarDate, today: CalendarDate): number {
  const years = today.year - birth.year;
  const birthdayPending =
    today.month < birth.month ||
    (today.month === birth.month && today.day < birth.day);
  return birthdayPending ? years - 1 : years;
}

export function ageOn(dateOfBirth: string, now: Date): number {
  const birth = parseCalendarDate(dateOfBirth);
  if (!birth) {
    throw new Error(`Invalid stored date of birth "${dateOfBirth}".`);
  }
  return calculateAge(birth, toCalendarDate(now));
}
