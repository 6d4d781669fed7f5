/**
 * Option parsing and setup shared by every command
 */

import { resolve } from 'path';
import { InvalidArgumentError } from 'commander';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger, type LogFormat } from '../core/logger.js';
import type { GateConfig } from '../core/types.js';
import type { ContextOverrides } from '../pipeline/context.js';

// A type alias rather than an interface so it satisfies commander's OptionValues
export type GlobalOptions = {
  verbose?: boolean;
  logFormat?: LogFormat;
  officialRepo?: string;
};

export interface ProjectOptions {
  dir: string;
  json?: boolean;
}

export interface OverrideOptions {
  branch?: string;
  tag?: string;
  repoSlug?: string;
  pullRequest?: boolean;
}

export function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['true', 'yes', '1'].includes(normalized)) return true;
  if (['false', 'no', '0'].includes(normalized)) return false;
  throw new InvalidArgumentError(`Expected true or false, got "${value}".`);
}

export function parseLogFormat(value: string): LogFormat {
  if (value === 'pretty' || value === 'json') return value;
  throw new InvalidArgumentError('Expected "pretty" or "json".');
}

/**
 * Load the project configuration and install the process logger.
 * CLI flags take precedence over the config file and the environment.
 */
export function prepare(options: ProjectOptions, globals: GlobalOptions): { config: GateConfig; projectDir: string } {
  const projectDir = resolve(options.dir);
  const config = new ConfigManager(projectDir).load(
    globals.officialRepo ? { repository: { official: globals.officialRepo } } : undefined,
  );

  setLogger(createLogger('release-gate', {
    verbose: globals.verbose,
    level: config.logging.level,
    format: globals.logFormat ?? config.logging.format,
  }));

  return { config, projectDir };
}

export function toOverrides(options: OverrideOptions): ContextOverrides {
  return {
    branch: options.branch,
    tag: options.tag,
    repoSlug: options.repoSlug,
    isPullRequest: options.pullRequest,
  };
}
