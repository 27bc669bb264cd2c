import { readFile } from 'node:fs/promises';
import type { CitationStats, ScheduleRule } from '../models';
import { parseWeekday } from '../models';
import { ScheduleTableError } from '../errors';
import { parseDelimited } from '../lib/csv';
import { parseLineGeometry } from '../lib/geometry';

const REQUIRED_COLUMNS = ['Corridor', 'Limits', 'BlockSide', 'WeekDay', 'FromHour', 'ToHour', 'Line'] as const;

export interface RowIssue {
  row: number;  // 1-based, the header is row 1
  reason: string;
}

export interface ParsedTable {
  rules: ScheduleRule[];
  issues: RowIssue[];
  totalRows: number;
}

export type TableLoadResult =
  | { status: 'ready'; rules: ScheduleRule[]; issues: RowIssue[]; totalRows: number }
  | { status: 'unavailable'; reason: string };

const TRUE_FLAGS = new Set(['1', 'y', 'yes', 't', 'true']);

function parseFlag(value: string): boolean {
  return TRUE_FLAGS.has(value.trim().toLowerCase());
}

function parseNumber(value: string): number {
  const n = Number.parseFloat(value.trim());
  return Number.isFinite(n) ? n : 0;
}

function parseOptionalNumber(value: string): number | null {
  if (!value.trim()) return null;
  const n = Number.parseFloat(value.trim());
  return Number.isFinite(n) ? n : null;
}

// 24 is written for midnight at the end of a day
function parseHour(value: string): number {
  const n = Math.trunc(parseNumber(value));
  return n >= 0 && n <= 24 ? n % 24 : 0;
}

class ColumnReader {
  private readonly index = new Map<string, number>();

  constructor(header: string[]) {
    header.forEach((name, i) => {
      const key = name.trim().toLowerCase();
      if (!this.index.has(key)) this.index.set(key, i);
    });
  }

  has(column: string): boolean {
    return this.index.has(column.toLowerCase());
  }

  read(row: string[], column: string): string {
    const i = this.index.get(column.toLowerCase());
    return i === undefined ? '' : (row[i] ?? '').trim();
  }
}

function freezeRule(rule: ScheduleRule): ScheduleRule {
  rule.line.forEach(point => Object.freeze(point));
  Object.freeze(rule.line);
  if (rule.citations) Object.freeze(rule.citations);
  Object.freeze(rule);
  return rule;
}

/**
 * Parse the street sweeping schedule table.
 *
 * Columns are found by header name, case-insensitively. Rows whose geometry or
 * weekday cannot be read are skipped and reported in `issues`; a table without
 * one of the required columns throws ScheduleTableError.
 */
export function parseScheduleTable(text: string): ParsedTable {
  const [header, ...rows] = parseDelimited(text.replace(/^\uFEFF/, ''));
  if (!header) {
    throw new ScheduleTableError('Schedule table is empty');
  }

  const columns = new ColumnReader(header);
  const missing = REQUIRED_COLUMNS.filter(column => !columns.has(column));
  if (missing.length > 0) {
    throw new ScheduleTableError(`Schedule table is missing columns: ${missing.join(', ')}`);
  }

  const hasCitations = columns.has('CitationCount');
  const rules: ScheduleRule[] = [];
  const issues: RowIssue[] = [];

  rows.forEach((row, i) => {
    const rowNumber = i + 2;
    const weekdayLabel = columns.read(row, 'WeekDay');
    const weekday = parseWeekday(weekdayLabel);
    if (weekday === null) {
      issues.push({ row: rowNumber, reason: `unknown weekday "${weekdayLabel}"` });
      return;
    }

    const line = parseLineGeometry(columns.read(row, 'Line'));
    if (!line) {
      issues.push({ row: rowNumber, reason: 'unreadable line geometry' });
      return;
    }

    let citations: CitationStats | undefined;
    if (hasCitations) {
      citations = {
        count: parseNumber(columns.read(row, 'CitationCount')),
        avg_hour: parseOptionalNumber(columns.read(row, 'AvgCitationHour')),
        min_hour: parseOptionalNumber(columns.read(row, 'MinCitationHour')),
        max_hour: parseOptionalNumber(columns.read(row, 'MaxCitationHour')),
      };
    }

    const rule: ScheduleRule = {
      id: columns.read(row, 'BlockSweepID') || `row-${rowNumber}`,
      cnn: columns.read(row, 'CNN'),
      corridor: columns.read(row, 'Corridor'),
      limits: columns.read(row, 'Limits'),
      cnn_right_left: columns.read(row, 'CNNRightLeft'),
      block_side: columns.read(row, 'BlockSide'),
      full_name: columns.read(row, 'FullName'),
      weekday,
      from_hour: parseHour(columns.read(row, 'FromHour')),
      to_hour: parseHour(columns.read(row, 'ToHour')),
      week1: parseFlag(columns.read(row, 'Week1')),
      week2: parseFlag(columns.read(row, 'Week2')),
      week3: parseFlag(columns.read(row, 'Week3')),
      week4: parseFlag(columns.read(row, 'Week4')),
      week5: parseFlag(columns.read(row, 'Week5')),
      holidays: parseFlag(columns.read(row, 'Holidays')),
      line,
      ...(citations ? { citations } : {}),
    };
    rules.push(freezeRule(rule));
  });

  return { rules, issues, totalRows: rows.length };
}

/**
 * Read and parse the schedule table at `path`. Failures are reported as an
 * unavailable result so callers can answer "no data" instead of crashing.
 */
export async function loadScheduleTable(path: string): Promise<TableLoadResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error('Failed to read schedule table', { path, reason });
    return { status: 'unavailable', reason };
  }

  try {
    const { rules, issues, totalRows } = parseScheduleTable(text);
    if (issues.length > 0) {
      console.log('Skipped schedule rows', { path, skipped: issues.length, sample: issues.slice(0, 5) });
    }
    console.log('Loaded schedule table', { path, rules: rules.length, totalRows });
    return { status: 'ready', rules, issues, totalRows };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error('Unusable schedule table', { path, reason });
    return { status: 'unavailable', reason };
  }
}
