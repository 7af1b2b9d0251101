import { createInterface } from 'node:readline/promises';
import { resolveDataPaths } from './lib/config';
import { renderReport } from './lib/report';
import { describeOutcome, handleInput, openSession, persistLedger, type PickerSession } from './lib/session';

const PROMPT = 'Enter Puzzle Name to mark as done:';

const printReport = (session: PickerSession) => {
  console.log();
  for (const line of renderReport(session.catalogs)) console.log(line);
  console.log(PROMPT);
};

async function main() {
  const session = openSession(resolveDataPaths());
  const rl = createInterface({ input: process.stdin, terminal: false });
  try {
    printReport(session);
    for await (const line of rl) {
      const outcome = handleInput(session, line);
      if (outcome.kind === 'updated') persistLedger(session);
      const message = describeOutcome(outcome);
      if (message) console.log(message);
      printReport(session);
    }
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
