/**
 * DocsTarget — builds the Sphinx documentation inside the test environment
 * and pushes the rendered HTML to the pages branch with doctr.
 *
 * The build halts on the first failing command; deploy only runs once the
 * build has produced its output.
 */

import type { GateConfig } from '../../core/types.js';
import type { DocsPublishAction, PublishTarget } from '../types.js';
import type { CommandRunner, CommandSpec } from '../../utils/exec.js';
import { formatCommand } from '../../utils/exec.js';
import { conda, inEnv } from '../../utils/conda.js';
import { PublishError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';

export class DocsTarget implements PublishTarget<DocsPublishAction> {
  readonly name = 'docs';
  private logger = getLogger();

  constructor(
    private readonly config: GateConfig,
    private readonly runner: CommandRunner,
  ) {}

  buildCommands(): CommandSpec[] {
    const { envName } = this.config.conda;
    const { requirements, pipPackages, sourceDir } = this.config.docs;

    const commands: CommandSpec[] = [
      conda(['install', '-q', '-n', envName, '--file', requirements]),
    ];
    if (pipPackages.length > 0) {
      commands.push(inEnv(envName, ['pip', 'install', ...pipPackages]));
    }
    commands.push(inEnv(envName, ['make', 'html'], sourceDir));
    return commands;
  }

  deployCommand(action: DocsPublishAction): CommandSpec {
    return inEnv(this.config.conda.envName, [
      'doctr', 'deploy', '.',
      '--built-docs', action.builtDocs,
      '--deploy-branch-name', action.deployBranch,
    ]);
  }

  async publish(action: DocsPublishAction): Promise<string[]> {
    const logs: string[] = [];

    logs.push('Building documentation...');
    for (const spec of this.buildCommands()) {
      await this.exec(spec, logs, 'Documentation build failed');
    }

    logs.push(`Deploying ${action.builtDocs} to ${action.deployBranch}...`);
    await this.exec(this.deployCommand(action), logs, 'Documentation deploy failed');
    logs.push('  Documentation published');

    return logs;
  }

  private async exec(spec: CommandSpec, logs: string[], failure: string): Promise<void> {
    const line = formatCommand(spec);
    logs.push(`  $ ${line}`);

    const result = await this.runner.run(spec);
    if (result.exitCode !== 0) {
      const detail = result.error ?? `exit code ${result.exitCode}`;
      this.logger.error({ action: this.name, command: line, exitCode: result.exitCode }, failure);
      throw new PublishError(`${failure}: ${line} (${detail})`, this.name);
    }
  }
}
