#!/usr/bin/env node
/**
 * bin/switchboard.ts: entry point for the `switchboard` CLI command.
 *
 * The root command decides between the interactive shell (TTY, no -c,
 * SWITCHBOARD_NO_TUI unset), a command string and a script on stdin:
 *
 * switchboard                          → interactive shell
 * switchboard -c 'shopt -s extglob'    → run and exit
 * SWITCHBOARD_NO_TUI=1 switchboard     → read commands from stdin
 */

const { program } = await import('../commands/index.js')
await program.parseAsync()
