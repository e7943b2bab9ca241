/**
 * Switchboard CLI - Builtin Output
 *
 * Collects a builtin's stdout and stderr lines and its exit status.
 */

import type { CommandResult } from '@switchboard/extension-loader';
import type { Session } from '../session/session.js';

export interface Builtin {
  readonly name: string;
  readonly usage: string;
  readonly description: string;
  run(args: ReadonlyArray<string>, session: Session): CommandResult;
}

export class CommandOutput {
  private readonly stdout: string[] = [];
  private readonly stderr: string[] = [];
  private status = 0;

  print(...lines: ReadonlyArray<string>): void {
    this.stdout.push(...lines);
  }

  /** Record diagnostics. The status only ever rises. */
  fail(status: number, ...lines: ReadonlyArray<string>): void {
    this.stderr.push(...lines);
    this.status = Math.max(this.status, status);
  }

  /** Append another command's result, as for a command after assignments. */
  merge(result: CommandResult): void {
    this.stdout.push(...result.stdout);
    this.stderr.push(...result.stderr);
    this.status = result.status;
  }

  result(): CommandResult {
    return { status: this.status, stdout: this.stdout, stderr: this.stderr };
  }
}

export function usageLine(name: string, usage: string): string {
  return `${name}: usage: ${usage}`;
}

/** `reason (details)` for a failed load or unload. */
export function formatFailure(result: { readonly reason: string; readonly details?: string | undefined }): string {
  return result.details !== undefined ? `${result.reason} (${result.details})` : result.reason;
}
