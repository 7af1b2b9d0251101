import { resolveDataPaths } from '../src/lib/config';
import { summarizeCatalog } from '../src/lib/catalog-summary';
import { openSession } from '../src/lib/session';
import type { PuzzleCategory } from '../src/lib/types';

const LABELS: Record<PuzzleCategory, string> = { color: 'color', bw: 'B&W' };

function run() {
  const session = openSession(resolveDataPaths());
  const now = new Date();

  for (const category of ['color', 'bw'] as const) {
    const summary = summarizeCatalog(session.catalogs[category], now);
    console.log(`\n=== ${LABELS[category]} catalog ===`);
    console.log(
      `puzzles=${summary.total}, eligible=${summary.eligible}, true nonogram=${summary.trueNonogram}, max XP=${summary.maxXp}`
    );

    if (summary.total === 0) {
      console.error(`ERROR: ${LABELS[category]} catalog is empty.`);
      process.exitCode = 1;
    }
    if (summary.duplicateNames.length) {
      console.error(
        `ERROR: duplicate names (${summary.duplicateNames.length}). First 10:\n${summary.duplicateNames.slice(0, 10).join('\n')}`
      );
      process.exitCode = 1;
    }
  }

  console.log(`\nledger entries: ${session.ledger.length}`);
}

try {
  run();
} catch (error) {
  console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}
