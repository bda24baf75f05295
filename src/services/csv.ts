import axios, { AxiosInstance } from 'axios';
import fs from 'fs/promises';
import { parse as parseCsv } from 'csv-parse/sync';
import { format, isValid, parse as parseDate } from 'date-fns';
import { z } from 'zod';
import { Logger, TimeRecord } from '../types/timesheet.js';
import { FetchError, FormatError, errorMessage } from '../errors.js';

export const CSV_COLUMNS = {
  date: 'data',
  issueId: 'zagadnienie',
  hours: 'godzin',
  activityName: 'activity',
} as const;

const REQUIRED_COLUMNS = Object.values(CSV_COLUMNS);

// date-fns accepts 1-4 digit years for yyyy, so the cell shape is checked first
const DATE_FORMATS: Array<[RegExp, string]> = [
  [/^\d{4}-\d{2}-\d{2}$/, 'yyyy-MM-dd'],
  [/^\d{2}\.\d{2}\.\d{4}$/, 'dd.MM.yyyy'],
  [/^\d{2}\/\d{2}\/\d{4}$/, 'dd/MM/yyyy'],
];

const HOURS_PATTERN = /^\d+([.,]\d+)?$/;

const parsedRowsSchema = z.array(
  z.object({
    record: z.record(z.string()),
    info: z.object({ lines: z.number() }),
  })
);

export interface CsvLoadOptions {
  delimiter?: string;
}

export function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Parses an hours cell, accepting a comma as the decimal separator.
 * Returns NaN unless the cell is a plain non-negative decimal.
 */
export function parseHours(value: string): number {
  const trimmed = value.trim();
  return HOURS_PATTERN.test(trimmed) ? Number(trimmed.replace(',', '.')) : NaN;
}

/**
 * Normalizes a date cell to yyyy-MM-dd, or returns null when no known format matches.
 */
export function normalizeDate(value: string): string | null {
  const trimmed = value.trim();
  for (const [shape, pattern] of DATE_FORMATS) {
    if (!shape.test(trimmed)) {
      continue;
    }
    const date = parseDate(trimmed, pattern, new Date());
    if (isValid(date)) {
      return format(date, 'yyyy-MM-dd');
    }
  }
  return null;
}

export function distinctDates(records: TimeRecord[]): string[] {
  return [...new Set(records.map(record => record.date))].sort();
}

export class CsvLoader {
  private http: AxiosInstance;

  constructor(private logger: Logger = console, http?: AxiosInstance) {
    this.http = http ?? axios.create({ headers: { 'User-Agent': 'Timesheet Sync Tool' } });
  }

  async loadRecords(source: string, options: CsvLoadOptions = {}): Promise<TimeRecord[]> {
    const content = await this.readSource(source);
    const rows = this.parseRows(content, options.delimiter ?? ',');

    const records: TimeRecord[] = [];
    for (const { record, info } of rows) {
      const parsed = this.toTimeRecord(record, info.lines);
      if (parsed) {
        records.push(parsed);
      }
    }
    return records;
  }

  private async readSource(source: string): Promise<string> {
    if (isRemoteSource(source)) {
      try {
        const response = await this.http.get<string>(source, { responseType: 'text' });
        return String(response.data);
      } catch (error) {
        if (axios.isAxiosError(error) && error.response) {
          throw new FetchError(`Failed to download CSV from ${source}: HTTP ${error.response.status}`, error);
        }
        throw new FetchError(`Failed to download CSV from ${source}: ${errorMessage(error)}`, error);
      }
    }

    try {
      return await fs.readFile(source, 'utf-8');
    } catch (error) {
      throw new FetchError(`Failed to read CSV file ${source}: ${errorMessage(error)}`, error);
    }
  }

  private parseRows(content: string, delimiter: string): z.infer<typeof parsedRowsSchema> {
    let header: string[] = [];
    let parsed: unknown;
    try {
      parsed = parseCsv(content, {
        bom: true,
        delimiter,
        info: true,
        relax_column_count: true,
        skip_empty_lines: true,
        trim: true,
        columns: (columns: string[]) => {
          header = columns;
          return columns;
        },
      });
    } catch (error) {
      throw new FormatError(`Failed to parse CSV: ${errorMessage(error)}`, error);
    }

    if (header.length > 0) {
      const missing = REQUIRED_COLUMNS.filter(column => !header.includes(column));
      if (missing.length > 0) {
        throw new FormatError(`CSV is missing required columns: ${missing.join(', ')}`);
      }
    }

    const rows = parsedRowsSchema.safeParse(parsed);
    if (!rows.success) {
      throw new FormatError(`Failed to parse CSV: ${rows.error.message}`);
    }
    return rows.data;
  }

  private toTimeRecord(row: Record<string, string>, line: number): TimeRecord | null {
    const date = row[CSV_COLUMNS.date] ?? '';
    const issue = row[CSV_COLUMNS.issueId] ?? '';
    const hours = row[CSV_COLUMNS.hours] ?? '';
    const activityName = row[CSV_COLUMNS.activityName] ?? '';

    if (!date || !issue || !hours || !activityName) {
      this.logger.warn(`⚠️ Skipping CSV line ${line}: missing date, issue, hours or activity`);
      return null;
    }

    const spentOn = normalizeDate(date);
    if (!spentOn) {
      this.logger.warn(`⚠️ Skipping CSV line ${line}: invalid date "${date}"`);
      return null;
    }

    const issueId = /^#?\d+$/.test(issue) ? Number(issue.replace(/^#/, '')) : NaN;
    if (!Number.isInteger(issueId) || issueId <= 0) {
      this.logger.warn(`⚠️ Skipping CSV line ${line}: invalid issue id "${issue}"`);
      return null;
    }

    const parsedHours = parseHours(hours);
    if (!Number.isFinite(parsedHours) || parsedHours <= 0) {
      this.logger.warn(`⚠️ Skipping CSV line ${line}: invalid hours "${hours}"`);
      return null;
    }

    return { date: spentOn, issueId, hours: parsedHours, activityName, line };
  }
}
