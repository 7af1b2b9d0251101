import { LEDGER_LAST_DONE_COLUMN, LEDGER_NAME_COLUMN } from './config';
import { cellValue, readCsvTable, resolveColumn, writeCsvTable, type CsvTable } from './csv-table';
import { DataFileError } from './errors';
import type { CompletionEntry, CompletionLedger } from './types';

const LEDGER_COLUMNS = [LEDGER_NAME_COLUMN, LEDGER_LAST_DONE_COLUMN];

const parseTimestamp = (table: CsvTable, raw: string, rowIndex: number): Date => {
  const parsed = new Date(raw.trim());
  if (Number.isNaN(parsed.getTime())) {
    throw new DataFileError('bad_value', table.file, `row ${rowIndex + 1} has an invalid timestamp "${raw}"`);
  }
  return parsed;
};

export const lookupLastDone = (ledger: CompletionLedger, name: string, fallback: Date): Date =>
  ledger.find((entry) => entry.name === name)?.lastDone ?? fallback;

export const upsertCompletion = (ledger: CompletionLedger, name: string, at: Date): CompletionLedger => {
  const index = ledger.findIndex((entry) => entry.name === name);
  if (index === -1) return [...ledger, { name, lastDone: at }];
  return ledger.map((entry, i) => (i === index ? { ...entry, lastDone: at } : entry));
};

/** Folds rows into one entry per name; a repeated name keeps its latest timestamp. */
export const mergeEntries = (entries: CompletionEntry[]): CompletionLedger =>
  entries.reduce<CompletionLedger>((ledger, entry) => {
    const current = lookupLastDone(ledger, entry.name, entry.lastDone);
    const latest = current.getTime() > entry.lastDone.getTime() ? current : entry.lastDone;
    return upsertCompletion(ledger, entry.name, latest);
  }, []);

export function decodeLedger(table: CsvTable): CompletionLedger {
  const nameColumn = resolveColumn(table, { name: LEDGER_NAME_COLUMN });
  const lastDoneColumn = resolveColumn(table, { name: LEDGER_LAST_DONE_COLUMN });
  return mergeEntries(
    table.rows.map((row, rowIndex) => ({
      name: cellValue(table, row, nameColumn, rowIndex),
      lastDone: parseTimestamp(table, cellValue(table, row, lastDoneColumn, rowIndex), rowIndex)
    }))
  );
}

export function loadLedger(file: string): CompletionLedger {
  console.log(`Reading csv file : ${file}`);
  return decodeLedger(readCsvTable(file));
}

export function saveLedger(file: string, ledger: CompletionLedger): void {
  writeCsvTable(
    file,
    LEDGER_COLUMNS,
    ledger.map((entry) => ({
      [LEDGER_NAME_COLUMN]: entry.name,
      [LEDGER_LAST_DONE_COLUMN]: entry.lastDone.toISOString()
    }))
  );
}
