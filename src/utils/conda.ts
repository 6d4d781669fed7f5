import type { CommandSpec } from './exec.js';

export function conda(args: string[], cwd?: string): CommandSpec {
  return { command: 'conda', args, cwd };
}

/**
 * Runs a tool inside a named conda environment. Output is not captured so
 * it streams into the CI log like an activated shell would.
 */
export function inEnv(envName: string, command: string[], cwd?: string): CommandSpec {
  return conda(['run', '--no-capture-output', '-n', envName, ...command], cwd);
}
