import { ConfigError } from './errors.js';

/** A calendar day, independent of any time zone. */
export interface BenchDate {
  year: number;
  month: number;
  day: number;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseDate(raw: string): BenchDate {
  const match = ISO_DATE.exec(raw.trim());
  if (!match) {
    throw new ConfigError(`Invalid date "${raw}". Expected YYYY-MM-DD`);
  }
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  const probe = new Date(Date.UTC(date.year, date.month - 1, date.day));
  if (
    probe.getUTCFullYear() !== date.year ||
    probe.getUTCMonth() !== date.month - 1 ||
    probe.getUTCDate() !== date.day
  ) {
    throw new ConfigError(`Invalid date "${raw}": no such day`);
  }
  return date;
}

export function today(now: Date = new Date()): BenchDate {
  return { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
}

export function resolveDate(raw?: string): BenchDate {
  return raw ? parseDate(raw) : today();
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** 2019-08-01 */
export function formatIsoDate(date: BenchDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

/** 2019/08/01, the layout of dated directories in the bucket. */
export function formatDatePath(date: BenchDate): string {
  return `${pad(date.year, 4)}/${pad(date.month)}/${pad(date.day)}`;
}

/** 20190801 */
export function formatCompactDate(date: BenchDate): string {
  return `${pad(date.year, 4)}${pad(date.month)}${pad(date.day)}`;
}
