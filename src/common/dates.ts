/**
 * Calendar-date helpers.
 *
 * Dates are ISO `YYYY-MM-DD` strings. Arithmetic runs in UTC on whole days,
 * so daylight-saving transitions never shift a result.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Calendar date in `YYYY-MM-DD` form.
 */
export type IsoDate = string;

const toUtcMs = (date: IsoDate): number => {
  const match = ISO_DATE_PATTERN.exec(date);
  if (match === null) {
    throw new RangeError(`Invalid ISO date: ${date}`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
};

const fromUtcMs = (ms: number): IsoDate => new Date(ms).toISOString().slice(0, 10);

/**
 * True for a well-formed, existing calendar date (rejects 2024-02-30).
 */
export const isIsoDate = (value: string): boolean => {
  const match = ISO_DATE_PATTERN.exec(value);
  if (match === null) return false;
  return fromUtcMs(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]))) === value;
};

/**
 * Today's date in the given IANA timezone.
 */
export const todayIn = (timeZone: string, now: Date = new Date()): IsoDate => {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
};

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 */
export const daysBetween = (from: IsoDate, to: IsoDate): number =>
  Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);

export const addDays = (date: IsoDate, days: number): IsoDate =>
  fromUtcMs(toUtcMs(date) + days * MS_PER_DAY);

/**
 * First day of the month containing `date`.
 */
export const startOfMonth = (date: IsoDate): IsoDate => `${date.slice(0, 7)}-01`;

/**
 * `dd/mm/yyyy`, the format used in outbound emails.
 */
export const formatDayMonthYear = (date: IsoDate): string => {
  const [year, month, day] = date.split('-');
  return `${day ?? ''}/${month ?? ''}/${year ?? ''}`;
};
