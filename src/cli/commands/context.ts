/**
 * `release-gate context` — print the pipeline context read from the CI environment.
 */

import { Command } from 'commander';
import { readPipelineContext } from '../../pipeline/context.js';
import { formatContext } from '../format.js';
import { prepare, type GlobalOptions, type ProjectOptions } from '../shared.js';

export function createContextCommand(): Command {
  const cmd = new Command('context');

  cmd
    .description('Show the pipeline context the gate will see')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action((options: ProjectOptions, command: Command) => {
      const { config } = prepare(options, command.optsWithGlobals<GlobalOptions>());
      const context = readPipelineContext(config);

      if (options.json) {
        console.log(JSON.stringify(context, null, 2));
        return;
      }

      console.log();
      console.log(formatContext(context).join('\n'));
      console.log();
    });

  return cmd;
}
