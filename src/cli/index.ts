/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { GateError } from '../core/errors.js';
import { parseLogFormat } from './shared.js';
import { createRunCommand } from './commands/run.js';
import { createPlanCommand } from './commands/plan.js';
import { createPublishCommand } from './commands/publish.js';
import { createContextCommand } from './commands/context.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('CI pipeline and deployment gate for conda-packaged projects')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--log-format <format>', 'Log output format (pretty or json)', parseLogFormat)
    .option('--official-repo <slug>', 'Override the official repository (owner/repo)');

  program.addCommand(createRunCommand());
  program.addCommand(createPlanCommand());
  program.addCommand(createPublishCommand());
  program.addCommand(createContextCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      const code = error instanceof GateError ? ` [${error.code}]` : '';
      console.error(`\n❌ ${error.message}${code}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    } else {
      console.error(`\n❌ ${String(error)}\n`);
    }
    process.exit(1);
  }
}
