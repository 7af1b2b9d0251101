import fs from 'node:fs';
import Papa from 'papaparse';
import { DataFileError } from './errors';

export type CsvRow = Record<string, string>;

export interface CsvTable {
  file: string;
  fields: string[];
  rows: CsvRow[];
}

export type ColumnRef = { name: string } | { index: number };

const describeColumn = (ref: ColumnRef) => ('name' in ref ? `"${ref.name}"` : `#${ref.index}`);

export function parseCsvTable(file: string, text: string): CsvTable {
  const result = Papa.parse<CsvRow>(text.replace(/^\uFEFF/, ''), {
    header: true,
    delimiter: ',',
    skipEmptyLines: true
  });
  // Ragged rows pass here; cellValue rejects a cell that is actually missing.
  const [first] = result.errors.filter((error) => error.type !== 'FieldMismatch');
  if (first) {
    const where = typeof first.row === 'number' ? ` (row ${first.row + 1})` : '';
    throw new DataFileError('csv_syntax', file, `${first.message}${where}`);
  }
  return { file, fields: result.meta.fields ?? [], rows: result.data };
}

export const readCsvTable = (file: string): CsvTable => parseCsvTable(file, fs.readFileSync(file, 'utf8'));

/** Maps a column reference to the header name it points at, or fails on a missing column. */
export function resolveColumn(table: CsvTable, ref: ColumnRef): string {
  const name = 'name' in ref ? (table.fields.includes(ref.name) ? ref.name : undefined) : table.fields[ref.index];
  if (name === undefined) {
    throw new DataFileError('missing_column', table.file, `missing column ${describeColumn(ref)}`);
  }
  return name;
}

export function cellValue(table: CsvTable, row: CsvRow, column: string, rowIndex: number): string {
  const value = row[column];
  if (value === undefined) {
    throw new DataFileError('bad_value', table.file, `row ${rowIndex + 1} has no value for "${column}"`);
  }
  return value;
}

export function formatCsvTable(columns: string[], rows: CsvRow[]): string {
  const body = Papa.unparse(
    { fields: columns, data: rows.map((row) => columns.map((column) => row[column] ?? '')) },
    { newline: '\n' }
  );
  return `${body}\n`;
}

export function writeCsvTable(file: string, columns: string[], rows: CsvRow[]) {
  fs.writeFileSync(file, formatCsvTable(columns, rows), 'utf8');
}
