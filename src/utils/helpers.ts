import { IsoDate, IsoMonth } from '../types';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

function toUtc(date: IsoDate): number {
  return Date.parse(`${date}T00:00:00Z`);
}

/**
 * Check that a string is a real `YYYY-MM-DD` calendar date.
 */
export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const time = toUtc(value);
  return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
}

/**
 * Calendar days between two dates, inclusive of both ends.
 */
export function inclusiveDayCount(start: IsoDate, end: IsoDate): number {
  return Math.round((toUtc(end) - toUtc(start)) / MS_PER_DAY) + 1;
}

/**
 * Shift a date by a (possibly negative) number of days.
 */
export function addDays(date: IsoDate, days: number): IsoDate {
  return new Date(toUtc(date) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Check if two date ranges overlap.
 */
export function datesOverlap(
  start1: IsoDate, end1: IsoDate,
  start2: IsoDate, end2: IsoDate
): boolean {
  return start1 <= end2 && start2 <= end1;
}

export function monthOf(date: IsoDate): IsoMonth {
  return date.slice(0, 7);
}

/**
 * Shift a `YYYY-MM` month by a number of months.
 */
export function addMonths(month: IsoMonth, months: number): IsoMonth {
  const [year, mon] = month.split('-').map(Number);
  const index = (year ?? 0) * 12 + ((mon ?? 1) - 1) + months;
  const y = Math.floor(index / 12);
  const m = (index % 12) + 1;
  return `${String(y).padStart(4, '0')}-${String(m).padStart(2, '0')}`;
}

export function isIsoMonth(value: string): boolean {
  return /^\d{4}-(0[1-9]|1[0-2])$/.test(value);
}

export function monthBounds(month: IsoMonth): { start: IsoDate; end: IsoDate } {
  const start = `${month}-01`;
  return { start, end: addDays(`${addMonths(month, 1)}-01`, -1) };
}

export function todayIso(now: Date = new Date()): IsoDate {
  return now.toISOString().slice(0, 10);
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
