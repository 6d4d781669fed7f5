/**
 * Command execution for external pipeline tools (conda, coverage, flake8,
 * doctr, anaconda-client). Commands run without a shell; callers expand
 * globs themselves.
 */

import { spawn } from 'node:child_process';
import { resolve as resolvePath } from 'node:path';
import { getLogger } from '../core/logger.js';
import { Timer } from './timer.js';

export interface CommandSpec {
  command: string;
  args: string[];
  /** Working directory, relative paths resolve against the runner's cwd */
  cwd?: string;
  /** Extra variables for this child only; never written to process.env */
  env?: Record<string, string>;
}

export interface CommandResult {
  exitCode: number;
  duration: number;
  /** Set when the process could not be started at all */
  error?: string;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

/**
 * Runs commands as child processes with inherited stdio so tool output
 * streams straight into the CI log.
 */
export class ProcessRunner implements CommandRunner {
  private logger = getLogger();

  constructor(private readonly cwd: string = process.cwd()) {}

  run(spec: CommandSpec): Promise<CommandResult> {
    const timer = new Timer();
    this.logger.info({ command: formatCommand(spec), cwd: spec.cwd }, 'Running command');

    return new Promise((resolve) => {
      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd ? resolvePath(this.cwd, spec.cwd) : this.cwd,
        env: spec.env ? { ...process.env, ...spec.env } : process.env,
        stdio: 'inherit',
      });

      child.once('error', (err) => {
        // ENOENT and friends: the tool is not installed
        resolve({ exitCode: 127, duration: timer.stop(), error: err.message });
      });

      child.once('close', (code, signal) => {
        resolve({
          exitCode: code ?? 1,
          duration: timer.stop(),
          error: signal ? `terminated by ${signal}` : undefined,
        });
      });
    });
  }
}

/**
 * Logs each command instead of running it; every command succeeds.
 */
export class DryRunRunner implements CommandRunner {
  private logger = getLogger();
  readonly commands: CommandSpec[] = [];

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.commands.push(spec);
    this.logger.info({ command: formatCommand(spec), cwd: spec.cwd }, '[DRY RUN] Would run command');
    return { exitCode: 0, duration: 0 };
  }
}
