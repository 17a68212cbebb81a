// Cron expression parser utility
//
// Parses standard 5-field cron expressions (minute hour day month weekday)
// and calculates the next run time in the process time zone.
//
// Examples:
//   "0 8 * * *"      -> Every day at 08:00
//   "*/15 * * * *"   -> Every 15 minutes
//   "0 9 * * 1-5"    -> 9 AM on weekdays
//   "0 0 1 * *"      -> First day of every month

interface FieldBounds {
  name: string;
  min: number;
  max: number;
}

const FIELDS: readonly FieldBounds[] = [
  { name: 'minute', min: 0, max: 59 },
  { name: 'hour', min: 0, max: 23 },
  { name: 'day of month', min: 1, max: 31 },
  { name: 'month', min: 1, max: 12 },
  // 7 is accepted as an alias for Sunday
  { name: 'day of week', min: 0, max: 7 },
];

// Feb 29 can be eight years from the previous one
const MAX_SEARCH_YEARS = 8;

export interface CronSchedule {
  minutes: Set<number>;
  hours: Set<number>;
  daysOfMonth: Set<number>;
  months: Set<number>;
  daysOfWeek: Set<number>;
  /** False when the field is a wildcard */
  dayOfMonthRestricted: boolean;
  dayOfWeekRestricted: boolean;
}

/**
 * Parse a cron expression, throwing on anything malformed or out of range
 */
export function parseCronExpression(expression: string): CronSchedule {
  const fields = expression.trim().split(/\s+/).filter(Boolean);

  if (fields.length !== FIELDS.length) {
    throw new Error(
      `Invalid cron expression "${expression}": expected 5 fields, got ${fields.length}`
    );
  }

  const [minute, hour, dayOfMonth, month, dayOfWeek] = fields.map((field, i) =>
    parseField(field, FIELDS[i])
  );

  return {
    minutes: minute,
    hours: hour,
    daysOfMonth: dayOfMonth,
    months: month,
    daysOfWeek: new Set(Array.from(dayOfWeek, (d) => d % 7)),
    dayOfMonthRestricted: !fields[2].startsWith('*'),
    dayOfWeekRestricted: !fields[4].startsWith('*'),
  };
}

function parseField(field: string, bounds: FieldBounds): Set<number> {
  const values = new Set<number>();

  for (const part of field.split(',')) {
    const [range, stepText, ...rest] = part.split('/');
    if (rest.length > 0) {
      throw new Error(`Invalid ${bounds.name} "${part}": more than one step`);
    }

    const step = stepText === undefined ? 1 : parseNumber(stepText, bounds);
    if (step < 1) {
      throw new Error(`Invalid ${bounds.name} "${part}": step must be at least 1`);
    }

    let start: number;
    let end: number;
    if (range === '*') {
      start = bounds.min;
      end = bounds.max;
    } else if (range.includes('-')) {
      const [from, to, ...extra] = range.split('-');
      if (extra.length > 0) {
        throw new Error(`Invalid ${bounds.name} range "${range}"`);
      }
      start = parseNumber(from, bounds);
      end = parseNumber(to, bounds);
      if (start > end) {
        throw new Error(`Invalid ${bounds.name} range "${range}": start is after end`);
      }
    } else {
      start = parseNumber(range, bounds);
      // "5/10" means every 10 starting at 5
      end = stepText === undefined ? start : bounds.max;
    }

    if (start < bounds.min || end > bounds.max) {
      throw new Error(
        `Invalid ${bounds.name} "${part}": must be between ${bounds.min} and ${bounds.max}`
      );
    }

    for (let value = start; value <= end; value += step) {
      values.add(value);
    }
  }

  return values;
}

function parseNumber(text: string, bounds: FieldBounds): number {
  if (!/^\d+$/.test(text)) {
    throw new Error(`Invalid ${bounds.name} "${text}": not a number`);
  }
  return Number.parseInt(text, 10);
}

/**
 * Day matching follows the usual cron rule: when both day fields are
 * restricted, either one matching is enough.
 */
function matchesDay(schedule: CronSchedule, date: Date): boolean {
  const domMatch = schedule.daysOfMonth.has(date.getDate());
  const dowMatch = schedule.daysOfWeek.has(date.getDay());

  if (schedule.dayOfMonthRestricted && schedule.dayOfWeekRestricted) {
    return domMatch || dowMatch;
  }
  return domMatch && dowMatch;
}

/**
 * Calculate the first run time strictly after `from`
 */
export function getNextRunTime(
  cronExpression: string,
  from: Date = new Date()
): Date {
  const schedule = parseCronExpression(cronExpression);

  const next = new Date(from);
  next.setSeconds(0, 0);
  next.setMinutes(next.getMinutes() + 1);

  const limit = new Date(from);
  limit.setFullYear(limit.getFullYear() + MAX_SEARCH_YEARS);

  while (next.getTime() <= limit.getTime()) {
    if (!schedule.months.has(next.getMonth() + 1)) {
      next.setMonth(next.getMonth() + 1, 1);
      next.setHours(0, 0, 0, 0);
      continue;
    }

    if (!matchesDay(schedule, next)) {
      next.setDate(next.getDate() + 1);
      next.setHours(0, 0, 0, 0);
      continue;
    }

    if (!schedule.hours.has(next.getHours())) {
      next.setHours(next.getHours() + 1, 0, 0, 0);
      continue;
    }

    if (!schedule.minutes.has(next.getMinutes())) {
      next.setMinutes(next.getMinutes() + 1, 0, 0);
      continue;
    }

    return next;
  }

  throw new Error(
    `Cron expression "${cronExpression}" has no run time within ${MAX_SEARCH_YEARS} years`
  );
}

/**
 * Validate a cron expression. Schedules that can never fire, such as
 * "0 0 30 2 *", are invalid.
 */
export function isValidCronExpression(expression: string): boolean {
  try {
    getNextRunTime(expression);
    return true;
  } catch {
    return false;
  }
}
