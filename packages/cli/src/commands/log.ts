/**
 * switchboard log: Query the option change log
 *
 * Reads <home>/logs/option-changes.jsonl. Every write attempt through the
 * accessor is logged regardless of outcome, so refused changes show up
 * here as well.
 */

import { Command } from 'commander';
import { CHANGE_LOG_FILE, readLog, type ChangeLogRecord } from '@switchboard/runtime-host';
import { outcomeColor, t } from '../tui/theme.js';
import { openStateIO, type GlobalOptions } from './runtime.js';

interface LogOptions {
  option?: string;
  outcome?: string;
  json?: boolean;
  limit: string;
}

function label(record: ChangeLogRecord): string {
  if (record.option !== null) return record.option;
  return record.letter !== null ? `-${record.letter}` : '(unnamed)';
}

export function formatRecord(record: ChangeLogRecord): string {
  return [
    t.muted(record.timestamp),
    label(record).padEnd(24),
    record.access.padEnd(8),
    `${record.previous} -> ${record.requested}`.padEnd(8),
    outcomeColor(record.outcome)(record.outcome),
  ].join('  ');
}

export function filterRecords(
  records: ReadonlyArray<ChangeLogRecord>,
  filters: { option?: string | undefined; outcome?: string | undefined; limit: number },
): ChangeLogRecord[] {
  const matching = records.filter(
    (r) =>
      (filters.option === undefined || r.option === filters.option || r.letter === filters.option) &&
      (filters.outcome === undefined || r.outcome === filters.outcome),
  );
  return filters.limit > 0 ? matching.slice(-filters.limit) : matching;
}

export const logCommand = new Command('log')
  .description('Query the option change log')
  .option('--option <name>', 'Filter by option name or letter')
  .option('--outcome <outcome>', 'Filter by outcome (Changed|Unchanged|Ignored|NotFound|ReadOnly|Forbidden|BadValue)')
  .option('--json', 'Output as JSON')
  .option('--limit <n>', 'Maximum number of entries to return (0 for all)', '100')
  .action((options: LogOptions, command: Command) => {
    const limit = Number.parseInt(options.limit, 10);
    if (!Number.isInteger(limit) || limit < 0) {
      // eslint-disable-next-line no-console
      console.error(`switchboard log: --limit must be a non-negative integer, got "${options.limit}"`);
      process.exitCode = 2;
      return;
    }

    const stateIO = openStateIO(command.optsWithGlobals<GlobalOptions>());
    const { records, stats } = readLog(stateIO.readLogRaw(CHANGE_LOG_FILE));
    const selected = filterRecords(records, { option: options.option, outcome: options.outcome, limit });

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(selected, null, 2));
      return;
    }

    if (selected.length === 0) {
      // eslint-disable-next-line no-console
      console.log(t.muted('no entries'));
    }
    for (const record of selected) {
      // eslint-disable-next-line no-console
      console.log(formatRecord(record));
    }
    if (stats.parseErrors > 0) {
      // eslint-disable-next-line no-console
      console.error(t.amber(`${stats.parseErrors} malformed line(s) skipped`));
    }
  });
