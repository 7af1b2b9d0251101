import { loadCatalogs } from './catalog';
import { loadLedger, saveLedger, upsertCompletion } from './ledger';
import type { CompletionLedger, DataPaths, PuzzleCatalogs, PuzzleRecord } from './types';

export interface PickerSession {
  paths: DataPaths;
  catalogs: PuzzleCatalogs;
  ledger: CompletionLedger;
}

export type InputOutcome =
  | { kind: 'ignored' }
  | { kind: 'not_found'; name: string }
  | { kind: 'updated'; record: PuzzleRecord };

export function openSession(paths: DataPaths): PickerSession {
  const ledger = loadLedger(paths.ledger);
  return { paths, catalogs: loadCatalogs(paths, ledger), ledger };
}

export const findPuzzle = (catalogs: PuzzleCatalogs, name: string): PuzzleRecord | undefined =>
  [...catalogs.color, ...catalogs.bw].find((record) => record.name === name);

/** Applies one line of user input; the caller persists the ledger when the outcome is `updated`. */
export function handleInput(session: PickerSession, line: string, now = new Date()): InputOutcome {
  const name = line.replace(/[\r\n]+$/, '');
  if (!name) return { kind: 'ignored' };

  const record = findPuzzle(session.catalogs, name);
  if (!record) return { kind: 'not_found', name };

  record.lastDone = now;
  session.ledger = upsertCompletion(session.ledger, record.name, now);
  return { kind: 'updated', record };
}

export const persistLedger = (session: PickerSession) => saveLedger(session.paths.ledger, session.ledger);

export function describeOutcome(outcome: InputOutcome): string | undefined {
  if (outcome.kind === 'not_found') return 'Puzzle not found.';
  if (outcome.kind === 'updated') return `Marked ${outcome.record.name} as done.`;
  return undefined;
}
