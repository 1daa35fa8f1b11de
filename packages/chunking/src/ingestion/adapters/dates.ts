/**
 * FILE PURPOSE: Recover a YYYY-MM-DD meeting date from loosely formatted export fields
 */

import { WHITESPACE_CLASS, trimWhitespace } from '../whitespace.js';

const NUMERIC_DATE_RE = /(\d{4})[./-](\d{1,2})[./-](\d{1,2})/;
const GAP = `[${WHITESPACE_CLASS}]*`;
const KOREAN_DATE_RE = new RegExp(`(\\d{4})${GAP}년${GAP}(\\d{1,2})${GAP}월${GAP}(\\d{1,2})${GAP}일`);

/** Columns checked for a date, in priority order. */
export const DATE_FIELDS = [
  'date_ymd',
  'date',
  'createdTime',
  'created_time',
  'created_at',
  'start_time',
  'startTime',
  'meeting_date',
] as const;

function formatYmd(year: string, month: string, day: string): string {
  return `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
}

export function normalizeDateString(value: string | null | undefined): string {
  if (!value) return '';
  const head = trimWhitespace(value).slice(0, 50);

  for (const pattern of [NUMERIC_DATE_RE, KOREAN_DATE_RE]) {
    const match = pattern.exec(head);
    if (match) {
      const [, year = '', month = '', day = ''] = match;
      return formatYmd(year, month, day);
    }
  }

  if (head.length >= 10 && head[4] === '-' && head[7] === '-') return head.slice(0, 10);
  return '';
}

/** First recognisable date among DATE_FIELDS, then the meeting name itself. */
export function extractDate(row: Record<string, string | undefined>, meetingName: string): string {
  for (const field of DATE_FIELDS) {
    const date = normalizeDateString(row[field]);
    if (date) return date;
  }
  return normalizeDateString(meetingName);
}
