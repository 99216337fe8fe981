import { stringify } from 'csv-stringify/sync';
import type { DistanceBand, TableRow } from '../types';

const EXPORT_COLUMNS: { key: keyof TableRow; header: string }[] = [
  { key: 'name', header: 'Name' },
  { key: 'municipality', header: 'Municipality' },
  { key: 'address', header: 'Address' },
  { key: 'distanceKm', header: 'Distance (km)' },
  { key: 'cyclingDistanceKm', header: 'Cycling distance (km)' },
  { key: 'band', header: 'Band' },
  { key: 'generalSeats', header: 'General seats' },
  { key: 'montessoriSeats', header: 'Montessori seats' },
  { key: 'supportSeats', header: 'Support seats' },
];

/** Rows as shown in the table; a missing cycling distance is an empty cell. */
export function tableToCsv(rows: readonly TableRow[]): string {
  return stringify(
    rows.map((r) => EXPORT_COLUMNS.map(({ key }) => r[key] ?? '')),
    { header: true, columns: EXPORT_COLUMNS.map((c) => c.header) },
  );
}

export function exportFileName(bands: readonly DistanceBand[]): string {
  return `filtered_schools_${bands.join('-')}.csv`;
}
