/**
 * switchboard describe: Show an option's help
 *
 *   switchboard describe noglob
 *   switchboard describe --level 1 f
 */

import { Command } from 'commander';
import { describeBuiltin } from '../builtins/describe.js';
import { openSession, printResult, type GlobalOptions } from './runtime.js';

export const describeCommand = new Command('describe')
  .description('Describe options and how to query or change them')
  .argument('<names...>', 'Option names (or single letters)')
  .option('--level <n>', 'Detail level 1-3', '3')
  .action((names: string[], options: { level: string }, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    if (!['1', '2', '3'].includes(options.level)) {
      // eslint-disable-next-line no-console
      console.error(`switchboard describe: --level must be 1, 2 or 3, got "${options.level}"`);
      process.exitCode = 2;
      return;
    }
    const session = openSession(globals);
    const result = describeBuiltin.run([`-${options.level}`, ...names], session);
    printResult(result);
    process.exitCode = result.status;
  });
