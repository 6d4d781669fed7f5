/**
 * `release-gate publish` — evaluate the gate and publish an artifact that
 * an earlier `conda build` already produced.
 */

import { Command } from 'commander';
import { createPipeline } from '../../pipeline/runner.js';
import { formatReport, reportToJson } from '../format.js';
import { prepare, type GlobalOptions, type ProjectOptions } from '../shared.js';

interface PublishOptions extends ProjectOptions {
  dryRun?: boolean;
}

export function createPublishCommand(): Command {
  const cmd = new Command('publish');

  cmd
    .description('Publish docs and artifacts without building or testing')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--dry-run', 'Print commands instead of running them')
    .option('--json', 'Output the report as JSON')
    .action(async (options: PublishOptions, command: Command) => {
      const { config, projectDir } = prepare(options, command.optsWithGlobals<GlobalOptions>());
      const pipeline = createPipeline(config, { projectDir, dryRun: options.dryRun });

      const report = await pipeline.publish();

      if (options.json) {
        console.log(JSON.stringify(reportToJson(report), null, 2));
      } else {
        console.log(formatReport(report).join('\n'));
      }
      process.exitCode = report.exitCode;
    });

  return cmd;
}
