const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Calendar date in `YYYY-MM-DD` form */
export type IsoDate = string;

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return date.toISOString().split('T')[0] === value;
}

/**
 * Current UTC calendar date
 */
export function toIsoDate(date: Date = new Date()): IsoDate {
  return date.toISOString().split('T')[0];
}

function toUtcMidnight(value: IsoDate): number {
  if (!isIsoDate(value)) {
    throw new RangeError(`Invalid calendar date: '${value}'`);
  }
  return Date.parse(`${value}T00:00:00Z`);
}

/**
 * Whole days from `from` to `to`; negative when `to` is earlier.
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((toUtcMidnight(to) - toUtcMidnight(from)) / MS_PER_DAY);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return toIsoDate(new Date(toUtcMidnight(date) + days * MS_PER_DAY));
}
