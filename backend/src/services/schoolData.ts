/**
 * School CSV loader. Header names are trimmed before matching because the
 * source export pads some of them with spaces.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { SchoolDataError } from '../errors';
import type { SchoolRecord } from '../types';

export const SCHOOL_COLUMNS = {
  name: 'Denominazione',
  municipality: 'Comune',
  address: 'Indirizzo',
  lat: 'latitudine',
  lon: 'longitudine',
  generalSeats: 'sum_COMUNE',
  montessoriSeats: 'sum_CON METODO MONTESSORI',
  supportSeats: 'sum_SOSTEGNO PSICOFISICO',
} as const;

export interface SchoolDataset {
  records: SchoolRecord[];
  /** 1-based data row numbers dropped for unusable coordinates. */
  skippedRows: number[];
}

const rowsSchema = z.array(z.record(z.string(), z.string()));
const headerSchema = z.array(z.array(z.string()));

/** Column names of the first line, for files with no data rows. */
function headerColumns(text: string): string[] {
  const [header] = headerSchema.parse(parse(text, { to_line: 1, bom: true, trim: true, skip_empty_lines: true }));
  return (header ?? []).map((h) => h.trim());
}

function parseNumber(val: string | undefined): number {
  if (val == null) return NaN;
  const t = val.trim().replace(',', '.');
  return t === '' ? NaN : Number(t);
}

function parseCount(val: string | undefined): number {
  const n = parseNumber(val);
  return Number.isFinite(n) && n > 0 ? n : 0;
}

export function parseSchoolsCsv(text: string, source = 'input'): SchoolDataset {
  let raw: unknown;
  try {
    raw = parse(text, {
      columns: (header: string[]) => header.map((h) => h.trim()),
      skip_empty_lines: true,
      bom: true,
      trim: true,
    });
  } catch (e) {
    throw new SchoolDataError(`Could not parse ${source}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const rows = rowsSchema.parse(raw);

  const present = new Set<string>(rows.length ? Object.keys(rows[0]) : headerColumns(text));
  const missing = Object.values(SCHOOL_COLUMNS).filter((c) => !present.has(c));
  if (missing.length) {
    throw new SchoolDataError(`${source} is missing required columns: ${missing.join(', ')}`, { missing });
  }

  const records: SchoolRecord[] = [];
  const skippedRows: number[] = [];
  rows.forEach((r, i) => {
    const lat = parseNumber(r[SCHOOL_COLUMNS.lat]);
    const lon = parseNumber(r[SCHOOL_COLUMNS.lon]);
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      skippedRows.push(i + 1);
      return;
    }
    records.push({
      row: i,
      name: r[SCHOOL_COLUMNS.name] ?? '',
      municipality: r[SCHOOL_COLUMNS.municipality] ?? '',
      address: r[SCHOOL_COLUMNS.address] ?? '',
      lat,
      lon,
      generalSeats: parseCount(r[SCHOOL_COLUMNS.generalSeats]),
      montessoriSeats: parseCount(r[SCHOOL_COLUMNS.montessoriSeats]),
      supportSeats: parseCount(r[SCHOOL_COLUMNS.supportSeats]),
    });
  });
  return { records, skippedRows };
}

export function loadSchoolsCsv(csvPath: string): SchoolDataset {
  if (!fs.existsSync(csvPath)) {
    throw new SchoolDataError(`File '${path.basename(csvPath)}' not found.`, { path: csvPath });
  }
  const data = parseSchoolsCsv(fs.readFileSync(csvPath, 'utf-8'), path.basename(csvPath));
  if (data.skippedRows.length) {
    console.warn(`[schools] skipped ${data.skippedRows.length} row(s) without coordinates: ${data.skippedRows.join(', ')}`);
  }
  return data;
}

let cached: { path: string; data: SchoolDataset } | null = null;

/** Loads once per process; `reload` re-reads the file (used outside production). */
export function getSchools(csvPath: string, opts: { reload?: boolean } = {}): SchoolDataset {
  if (!opts.reload && cached && cached.path === csvPath) return cached.data;
  const data = loadSchoolsCsv(csvPath);
  cached = { path: csvPath, data };
  return data;
}
