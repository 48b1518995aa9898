/**
 * Deadline parsing and formatting. Deadlines are stored as DD-MM-YYYY;
 * creation dates as YYYY-MM-DD.
 *
 * `normalizeDeadline` also accepts human-friendly input: today, tomorrow,
 * yesterday, relative (+3d/+2w/+1m), day-of-week names (mon-sunday),
 * month+day (jan15) and ISO dates, and returns the DD-MM-YYYY form.
 */

const MS_PER_DAY = 86_400_000;

const DEADLINE_RE = /^(\d{1,2})-(\d{1,2})-(\d{4})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

const pad = (n: number) => String(n).padStart(2, '0');

/** Format a Date as yyyy-MM-dd */
export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Format a Date as dd-MM-yyyy */
export function formatDeadline(d: Date): string {
  return `${pad(d.getDate())}-${pad(d.getMonth() + 1)}-${d.getFullYear()}`;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

/** Local midnight of the given calendar day, or null if the day does not exist */
function calendarDate(year: number, month: number, day: number): Date | null {
  const d = new Date(year, month, day);
  if (d.getFullYear() !== year || d.getMonth() !== month || d.getDate() !== day) {
    return null; // e.g. 31-02
  }
  return d;
}

/** Parse a dd-MM-yyyy deadline into local midnight. Null if malformed or impossible. */
export function parseDeadline(text: string | null | undefined): Date | null {
  const m = DEADLINE_RE.exec(text?.trim() ?? '');
  if (!m) return null;
  return calendarDate(parseInt(m[3]!, 10), parseInt(m[2]!, 10) - 1, parseInt(m[1]!, 10));
}

/** Whole days from `now` until the deadline's midnight, rounded down. Null if unparseable. */
export function daysUntil(deadline: string, now: Date): number | null {
  const due = parseDeadline(deadline);
  if (!due) return null;
  return Math.floor((due.getTime() - now.getTime()) / MS_PER_DAY);
}

function tryParseRelative(input: string, today: Date): Date | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const count = parseInt(m[1]!, 10);
  switch (m[2]) {
    case 'd': return addDays(today, count);
    case 'w': return addDays(today, count * 7);
    case 'm': return addMonths(today, count);
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): Date | null {
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let ahead = (target - today.getDay() + 7) % 7;
  if (ahead === 0) ahead = 7; // Next week if today
  return addDays(today, ahead);
}

function tryParseMonthDay(input: string, today: Date): Date | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m) return null;

  const month = MONTH_MAP[m[1]!]!;
  const day = parseInt(m[2]!, 10);
  const candidate = calendarDate(today.getFullYear(), month, day);
  if (!candidate) return null;

  // Already past this year: use next year
  if (candidate.getTime() < today.getTime()) {
    return calendarDate(today.getFullYear() + 1, month, day);
  }
  return candidate;
}

function tryParseIso(input: string): Date | null {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return null;
  return calendarDate(parseInt(m[1]!, 10), parseInt(m[2]!, 10) - 1, parseInt(m[3]!, 10));
}

/**
 * Turn user input into a dd-MM-yyyy deadline.
 * Returns null if the input can't be parsed.
 *
 * @param input - e.g. "tomorrow", "+3d", "friday", "jan15", "2026-03-01", "1-3-2026"
 * @param now - Override "today" for testing. Defaults to current date.
 */
export function normalizeDeadline(input: string | null | undefined, now?: Date): string | null {
  const trimmed = input?.trim();
  if (!trimmed) return null;

  const today = new Date(now ?? new Date());
  today.setHours(0, 0, 0, 0);

  const normalized = trimmed.toLowerCase();
  let result: Date | null;

  switch (normalized) {
    case 'today': result = today; break;
    case 'tomorrow': result = addDays(today, 1); break;
    case 'yesterday': result = addDays(today, -1); break;
    default:
      result = parseDeadline(trimmed)
        ?? tryParseIso(trimmed)
        ?? tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? tryParseMonthDay(normalized, today);
  }

  return result ? formatDeadline(result) : null;
}
