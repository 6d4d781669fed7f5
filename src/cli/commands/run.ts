/**
 * `release-gate run` — the full CI pipeline: provision, build, test, lint,
 * then whatever publishing the gate allows.
 */

import { Command } from 'commander';
import { createPipeline } from '../../pipeline/runner.js';
import { formatReport, reportToJson } from '../format.js';
import { prepare, type GlobalOptions, type ProjectOptions } from '../shared.js';

interface RunOptions extends ProjectOptions {
  dryRun?: boolean;
}

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run the full pipeline and publish what the gate allows')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--dry-run', 'Print commands instead of running them')
    .option('--json', 'Output the run report as JSON')
    .action(async (options: RunOptions, command: Command) => {
      const { config, projectDir } = prepare(options, command.optsWithGlobals<GlobalOptions>());
      const pipeline = createPipeline(config, { projectDir, dryRun: options.dryRun });

      const report = await pipeline.run();

      if (options.json) {
        console.log(JSON.stringify(reportToJson(report), null, 2));
      } else {
        console.log(formatReport(report).join('\n'));
      }
      process.exitCode = report.exitCode;
    });

  return cmd;
}
