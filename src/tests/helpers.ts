import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { PuzzleRecord } from '../lib/types';

export const fixturePath = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

export const makeTempDir = () => fs.mkdtempSync(path.join(os.tmpdir(), 'nonogram-picker-'));

export const mkPuzzle = (overrides: Partial<PuzzleRecord> = {}): PuzzleRecord => ({
  name: 'test-puzzle',
  xp: 100,
  width: 10,
  height: 10,
  difficulty: 'other_nonogram',
  category: 'bw',
  lastDone: new Date(0),
  ...overrides
});

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}
