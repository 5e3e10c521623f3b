const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const DAY_MS = 24 * 60 * 60 * 1000;

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?([AaPp][Mm])?$/;
const MONTH_FIRST_PATTERN = /^(\d{1,2})[-/](\d{1,2})[-/](\d{4}|\d{2})$/;
const YEAR_FIRST_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

type Clock = { hours: number; minutes: number; seconds: number };

function parseMonth(token: string): number | undefined {
  const key = token.toLowerCase();
  if (key.length < 3) {
    return undefined;
  }
  const index = MONTH_NAMES.findIndex((name) => name === key || name.slice(0, 3) === key);
  return index >= 0 ? index : undefined;
}

function parseClock(token: string, allowMeridiem: boolean): Clock | undefined {
  const match = CLOCK_PATTERN.exec(token);
  if (!match) {
    return undefined;
  }
  let hours = Number.parseInt(match[1] ?? '', 10);
  const minutes = Number.parseInt(match[2] ?? '', 10);
  const seconds = match[3] ? Number.parseInt(match[3], 10) : 0;
  const meridiem = match[4]?.toUpperCase();

  if (minutes > 59 || seconds > 59) {
    return undefined;
  }

  if (meridiem) {
    if (!allowMeridiem || hours < 1 || hours > 12) {
      return undefined;
    }
    if (meridiem === 'AM' && hours === 12) {
      hours = 0;
    } else if (meridiem === 'PM' && hours < 12) {
      hours += 12;
    }
  } else if (hours > 23) {
    return undefined;
  }

  return { hours, minutes, seconds };
}

function expandTwoDigitYear(token: string): number {
  const value = Number.parseInt(token, 10);
  if (token.length > 2) {
    return value;
  }
  return value < 50 ? 2000 + value : 1900 + value;
}

function buildDate(year: number, monthIndex: number, day: number, clock: Clock): Date | undefined {
  if (monthIndex < 0 || monthIndex > 11 || day < 1 || day > 31) {
    return undefined;
  }
  const date = new Date(Date.UTC(year, monthIndex, day, clock.hours, clock.minutes, clock.seconds));
  // Date.UTC rolls Feb 30 over into March
  if (date.getUTCMonth() !== monthIndex || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

/**
 * `Mon DD HH:MM` or `Mon DD YYYY` as printed by `ls -l`.
 * When only a clock time is given the year comes from `referenceDate`, stepping
 * back one year if that would place the entry more than a day in the future.
 * Fields are interpreted as UTC.
 */
export function parseUnixListingDate(
  month: string,
  day: string,
  timeOrYear: string,
  referenceDate: Date,
): Date | undefined {
  const monthIndex = parseMonth(month);
  if (monthIndex === undefined || !/^\d{1,2}$/.test(day)) {
    return undefined;
  }
  const dayOfMonth = Number.parseInt(day, 10);

  if (/^\d{4}$/.test(timeOrYear)) {
    return buildDate(Number.parseInt(timeOrYear, 10), monthIndex, dayOfMonth, { hours: 0, minutes: 0, seconds: 0 });
  }

  const clock = parseClock(timeOrYear, false);
  if (!clock) {
    return undefined;
  }

  const year = referenceDate.getUTCFullYear();
  const candidate = buildDate(year, monthIndex, dayOfMonth, clock);
  if (candidate && candidate.getTime() > referenceDate.getTime() + DAY_MS) {
    return buildDate(year - 1, monthIndex, dayOfMonth, clock);
  }
  return candidate;
}

/** `MM-DD-YY  HH:MM[AM|PM]` as printed by IIS and other DOS-style servers. */
export function parseDosListingDate(date: string, time: string): Date | undefined {
  const clock = parseClock(time, true);
  if (!clock) {
    return undefined;
  }

  const monthFirst = MONTH_FIRST_PATTERN.exec(date);
  if (monthFirst) {
    const month = Number.parseInt(monthFirst[1] ?? '', 10);
    const day = Number.parseInt(monthFirst[2] ?? '', 10);
    return buildDate(expandTwoDigitYear(monthFirst[3] ?? ''), month - 1, day, clock);
  }

  const yearFirst = YEAR_FIRST_PATTERN.exec(date);
  if (yearFirst) {
    const month = Number.parseInt(yearFirst[2] ?? '', 10);
    const day = Number.parseInt(yearFirst[3] ?? '', 10);
    return buildDate(Number.parseInt(yearFirst[1] ?? '', 10), month - 1, day, clock);
  }

  return undefined;
}
