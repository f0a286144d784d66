import { Command } from 'commander';
import fs from 'node:fs';
import { loadConfig } from '../config.js';
import { ledgerPath, openLedger } from '../core/db.js';
import { getLedgerCounts, getRecentRuns } from '../core/ledger.js';
import { listStoreSlugs } from '../zim/page.js';

/** Lines printed by `notezim status`. Reads the ledger without modifying it. */
export function statusLines(notebookPath: string, store: string, recent = 5): string[] {
  const pages = listStoreSlugs(notebookPath, store).length;
  const lines = [`Notebook:    ${notebookPath}`, `Pages:       ${pages} in ${store}/`];

  if (!fs.existsSync(ledgerPath(notebookPath))) {
    lines.push('Ledger:      none (no import has run yet)');
    return lines;
  }

  const db = openLedger(notebookPath, { dryRun: true });
  try {
    const counts = getLedgerCounts(db);
    lines.push(`Ledger:      ${counts.notes} notes recorded`);
    lines.push(`Runs:        ${counts.runs}`);

    const runs = getRecentRuns(db, recent);
    if (runs.length > 0) {
      lines.push('');
      lines.push('Recent runs:');
      for (const run of runs) {
        const state = run.finished_at ? '' : ' (unfinished)';
        lines.push(
          `  ${run.started_at}${state}: ` +
            `${run.imported} imported, ${run.updated} updated, ${run.skipped} skipped, ${run.failed} failed`
        );
      }
    }
  } finally {
    db.close();
  }
  return lines;
}

export const statusCommand = new Command('status')
  .description('Show managed page and import ledger stats')
  .option('--notebook <dir>', 'root directory of the Zim notebook')
  .action((options: { notebook?: string }) => {
    const config = loadConfig({ overrides: { notebookPath: options.notebook } });
    if (!config.notebook.path) {
      console.error('error: No notebook directory given (use --notebook or the config file)');
      process.exitCode = 1;
      return;
    }
    for (const line of statusLines(config.notebook.path, config.notebook.store)) {
      console.log(line);
    }
  });
