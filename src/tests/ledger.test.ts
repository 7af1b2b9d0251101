import fs from 'node:fs';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { formatCsvTable, parseCsvTable } from '../lib/csv-table';
import { DataFileError } from '../lib/errors';
import { decodeLedger, loadLedger, lookupLastDone, saveLedger, upsertCompletion } from '../lib/ledger';
import type { CompletionLedger } from '../lib/types';
import { captureError, fixturePath, makeTempDir } from './helpers';

const never = new Date(0);
const march = new Date('2026-03-05T08:00:00.000Z');
const april = new Date('2026-04-11T21:15:00.000Z');

describe('ledger lookup and upsert', () => {
  it('returns the fallback for unknown names', () => {
    expect(lookupLastDone([{ name: 'A', lastDone: march }], 'B', never)).toBe(never);
    expect(lookupLastDone([{ name: 'A', lastDone: march }], 'A', never)).toBe(march);
  });

  it('appends a new name and overwrites an existing one', () => {
    let ledger: CompletionLedger = [];
    ledger = upsertCompletion(ledger, 'A', march);
    ledger = upsertCompletion(ledger, 'B', march);
    ledger = upsertCompletion(ledger, 'A', april);
    expect(ledger).toEqual([
      { name: 'A', lastDone: april },
      { name: 'B', lastDone: march }
    ]);
  });

  it('keeps a single entry when the same upsert is applied twice', () => {
    const once = upsertCompletion([], 'A', april);
    const twice = upsertCompletion(once, 'A', april);
    expect(twice).toEqual([{ name: 'A', lastDone: april }]);
  });

  it('does not mutate the ledger it was given', () => {
    const ledger: CompletionLedger = [{ name: 'A', lastDone: march }];
    upsertCompletion(ledger, 'A', april);
    expect(ledger).toEqual([{ name: 'A', lastDone: march }]);
  });
});

describe('ledger files', () => {
  it('merges duplicate names keeping the latest timestamp', () => {
    expect(loadLedger(fixturePath('ledger-duplicates.csv'))).toEqual([
      { name: 'A', lastDone: march },
      { name: 'B', lastDone: new Date('2026-02-10T12:00:00.000Z') }
    ]);
  });

  it('fails when the ledger file does not exist', () => {
    expect(() => loadLedger(path.join(makeTempDir(), 'LastDonePuzzles.csv'))).toThrowError(/ENOENT/);
  });

  it('loads a header-only ledger as empty', () => {
    const file = path.join(makeTempDir(), 'LastDonePuzzles.csv');
    fs.writeFileSync(file, 'Name,LastDone\n', 'utf8');
    expect(loadLedger(file)).toEqual([]);
  });

  it('writes the whole table with ISO timestamps', () => {
    expect(
      formatCsvTable(['Name', 'LastDone'], [
        { Name: 'A', LastDone: march.toISOString() },
        { Name: '#12:Sail, Boat', LastDone: april.toISOString() }
      ])
    ).toBe('Name,LastDone\nA,2026-03-05T08:00:00.000Z\n"#12:Sail, Boat",2026-04-11T21:15:00.000Z\n');
  });

  it('reloads exactly what was saved', () => {
    const file = path.join(makeTempDir(), 'LastDonePuzzles.csv');
    const ledger: CompletionLedger = [
      { name: '#1002:Snail', lastDone: march },
      { name: '#12:Sail, Boat', lastDone: april }
    ];
    saveLedger(file, ledger);
    expect(loadLedger(file)).toEqual(ledger);

    saveLedger(file, upsertCompletion(ledger, '#1002:Snail', april));
    expect(loadLedger(file)).toEqual([
      { name: '#1002:Snail', lastDone: april },
      { name: '#12:Sail, Boat', lastDone: april }
    ]);
    expect(fs.readFileSync(file, 'utf8').split('\n')[0]).toBe('Name,LastDone');
  });

  it('rejects an unparseable timestamp', () => {
    const table = parseCsvTable('ledger.csv', 'Name,LastDone\nA,not-a-date\n');
    const error = captureError(() => decodeLedger(table));
    expect(error).toBeInstanceOf(DataFileError);
    expect(String(error)).toContain('ledger.csv: row 1 has an invalid timestamp "not-a-date"');
  });

  it('requires both ledger columns', () => {
    const table = parseCsvTable('ledger.csv', 'Name,Finished\nA,2026-03-05T08:00:00.000Z\n');
    expect(() => decodeLedger(table)).toThrowError('ledger.csv: missing column "LastDone"');
  });
});
