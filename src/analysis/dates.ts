const MS_PER_DAY = 86_400_000;

/** Mean length of a month in days; one model period. */
export const DAYS_PER_PERIOD = 30.44;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MAX_DAY_NUMBER = Date.UTC(9999, 11, 31) / MS_PER_DAY;

/** Days since 1970-01-01 for a YYYY-MM-DD date, or null when it is not a real calendar date. */
export function parseDayNumber(date: string): number | null {
  const match = ISO_DATE_RE.exec(date);
  if (!match) return null;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return ms / MS_PER_DAY;
}

export function dayNumber(date: string): number {
  const n = parseDayNumber(date);
  if (n === null) {
    throw new Error(`Invalid date: ${date}`);
  }
  return n;
}

/** Far-future results are pinned to 9999-12-31. */
export function fromDayNumber(n: number): string {
  return new Date(Math.min(Math.floor(n), MAX_DAY_NUMBER) * MS_PER_DAY).toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  return fromDayNumber(dayNumber(date) + Math.floor(days));
}

/** Calendar date `t` periods after the epoch. */
export function periodDate(epoch: string, t: number): string {
  return addDays(epoch, t * DAYS_PER_PERIOD);
}

export function monthOf(date: string): string {
  return date.slice(0, 7);
}

export function toIsoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Every YYYY-MM label from `first` to `last` inclusive. */
export function monthRange(first: string, last: string): string[] {
  const months: string[] = [];
  let year = Number(first.slice(0, 4));
  let month = Number(first.slice(5, 7));
  const endYear = Number(last.slice(0, 4));
  const endMonth = Number(last.slice(5, 7));
  while (year < endYear || (year === endYear && month <= endMonth)) {
    months.push(`${year}-${String(month).padStart(2, '0')}`);
    month++;
    if (month > 12) {
      month = 1;
      year++;
    }
  }
  return months;
}
