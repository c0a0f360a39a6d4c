import crypto from 'node:crypto';
import type { YearMonth } from './types';

export function now(): number {
  return Date.now();
}

export function toIso(ts: number): string {
  return new Date(ts).toISOString();
}

export function randomToken(prefix: string): string {
  return `${prefix}_${crypto.randomUUID()}_${crypto.randomBytes(8).toString('hex')}`;
}

export function hashPassword(password: string): string {
  const salt = crypto.randomBytes(16).toString('hex');
  const hash = crypto.scryptSync(password, salt, 64).toString('hex');
  return `${salt}:${hash}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [salt, hash] = stored.split(':');
  if (!salt || !hash) {
    return false;
  }
  const candidate = crypto.scryptSync(password, salt, 64).toString('hex');
  const a = Buffer.from(hash, 'hex');
  const b = Buffer.from(candidate, 'hex');
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(a, b);
}

export interface ParsedEntryDate extends YearMonth {
  date: string;
  day: number;
}

/**
 * Reads the calendar date at the head of an entry timestamp. Accepts
 * `YYYY-MM-DD HH:MM:SS` (with or without a meridiem) and ISO 8601.
 */
export function parseEntryDate(timestamp: string): ParsedEntryDate | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/.exec(timestamp.trim());
  if (!match) {
    return undefined;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (
    candidate.getUTCFullYear() !== year ||
    candidate.getUTCMonth() !== month - 1 ||
    candidate.getUTCDate() !== day
  ) {
    return undefined;
  }
  return { date: `${match[1]}-${match[2]}-${match[3]}`, year, month, day };
}

export function formatTimestamp(ts: number, timeZone?: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  }).formatToParts(new Date(ts));
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((item) => item.type === type)?.value ?? '00';
  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`;
}

export function currentYearMonth(ts: number, timeZone?: string): YearMonth {
  const [year, month] = formatTimestamp(ts, timeZone).split('-');
  return { year: Number(year), month: Number(month) };
}

export function monthKey(year: number, month: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

/** First day of the month and first day of the following month, both `YYYY-MM-DD`. */
export function monthBounds(year: number, month: number): { start: string; end: string } {
  const next = month === 12 ? { year: year + 1, month: 1 } : { year, month: month + 1 };
  return {
    start: `${monthKey(year, month)}-01`,
    end: `${monthKey(next.year, next.month)}-01`
  };
}
