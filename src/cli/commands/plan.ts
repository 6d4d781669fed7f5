/**
 * `release-gate plan` — show what the gate would publish for the current
 * (or an overridden) CI context. Runs nothing.
 */

import { Command } from 'commander';
import { readPipelineContext } from '../../pipeline/context.js';
import { evaluateGate } from '../../deploy/gate.js';
import { formatContext, formatEvaluation } from '../format.js';
import {
  prepare,
  parseBoolean,
  toOverrides,
  type GlobalOptions,
  type OverrideOptions,
  type ProjectOptions,
} from '../shared.js';

type PlanOptions = ProjectOptions & OverrideOptions;

export function createPlanCommand(): Command {
  const cmd = new Command('plan');

  cmd
    .description('Evaluate the deployment gate without running anything')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--branch <name>', 'Override the CI branch')
    .option('--tag <name>', 'Override the CI tag')
    .option('--repo-slug <slug>', 'Override the repository slug')
    .option('--pull-request <bool>', 'Override the pull request flag', parseBoolean)
    .option('--json', 'Output the decision as JSON')
    .action((options: PlanOptions, command: Command) => {
      const { config } = prepare(options, command.optsWithGlobals<GlobalOptions>());
      const context = readPipelineContext(config, process.env, toOverrides(options));
      const gate = evaluateGate(context, {
        builtDocs: config.docs.builtDir,
        deployBranch: config.docs.deployBranch,
      });

      if (options.json) {
        console.log(JSON.stringify({ context, ...gate }, null, 2));
        return;
      }

      console.log();
      console.log([...formatContext(context), '', ...formatEvaluation(gate)].join('\n'));
      console.log();
    });

  return cmd;
}
