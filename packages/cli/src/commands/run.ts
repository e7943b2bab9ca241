/**
 * switchboard [options]: run commands
 *
 *   switchboard -c 'set -o; shopt -s extglob'   run a command string
 *   echo 'set -e' | switchboard                  read commands from stdin
 *   switchboard                                  interactive shell (TTY)
 *
 * The process exits with the status given to `exit`, else the status of
 * the last command. Rejected startup options exit with status 2 before any
 * command runs.
 */

import * as readline from 'node:readline';
import { ExitStatus } from '@switchboard/kernel';
import { openSession, printResult, type GlobalOptions } from './runtime.js';

function isInteractive(options: GlobalOptions): boolean {
  const isTTY = process.stdout.isTTY === true && process.stdin.isTTY === true;
  return isTTY && options.c === undefined && process.env['SWITCHBOARD_NO_TUI'] === undefined;
}

async function readScript(run: (line: string) => boolean): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  try {
    for await (const line of rl) {
      if (!run(line)) break;
    }
  } finally {
    rl.close();
  }
}

export async function runRoot(options: GlobalOptions): Promise<void> {
  const interactive = isInteractive(options);
  const session = openSession(
    options,
    { interactive },
    { pendingCommand: options.c !== undefined, readFromStdin: options.c === undefined },
  );
  if (session.startupErrors.length > 0) {
    process.exitCode = ExitStatus.BadUsage;
    return;
  }

  if (options.c !== undefined) {
    for (const result of session.execute(options.c)) printResult(result);
  } else if (interactive) {
    const { launchShell } = await import('../tui/shell.js');
    await launchShell(session);
  } else {
    await readScript((line) => {
      for (const result of session.execute(line)) printResult(result);
      return session.exitRequested === undefined;
    });
  }

  process.exitCode = session.exitRequested ?? session.lastStatus;
}
