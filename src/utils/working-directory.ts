import { resolve } from 'path';
import type { Command } from 'commander';

/**
 * Working directory for a subcommand: the global --cwd option resolved
 * against the process directory, or the process directory itself.
 */
export function getWorkingDirectory(command: Command): string {
  const programOpts = command.parent?.opts() ?? {};
  const cwd: unknown = programOpts.cwd;
  return typeof cwd === 'string' && cwd ? resolve(process.cwd(), cwd) : process.cwd();
}
