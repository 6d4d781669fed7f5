/**
 * ChannelTarget — uploads built conda artifacts to an anaconda.org channel.
 *
 * The upload token is borrowed from the CredentialVault for the single
 * `anaconda upload` call and handed to that child process only.
 */

import { glob } from 'glob';
import type { GateConfig } from '../../core/types.js';
import type { PublishTarget, UploadAction } from '../types.js';
import type { CommandRunner } from '../../utils/exec.js';
import type { CredentialVault } from '../credentials.js';
import { resolveArtifactGlob } from '../../core/config.js';
import { PublishError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';

export interface ChannelTargetOptions {
  projectDir?: string;
  /** Upload the pattern itself when nothing is built yet */
  dryRun?: boolean;
}

export class ChannelTarget implements PublishTarget<UploadAction> {
  readonly name = 'anaconda';
  private logger = getLogger();

  constructor(
    private readonly config: GateConfig,
    private readonly runner: CommandRunner,
    private readonly vault: CredentialVault,
    private readonly options: ChannelTargetOptions = {},
  ) {}

  async findArtifacts(): Promise<string[]> {
    const files = await glob(resolveArtifactGlob(this.config), {
      cwd: this.options.projectDir ?? process.cwd(),
      nodir: true,
    });
    return files.sort();
  }

  async publish(action: UploadAction): Promise<string[]> {
    const logs: string[] = [];

    const pattern = resolveArtifactGlob(this.config);
    let artifacts = await this.findArtifacts();
    if (artifacts.length === 0) {
      if (!this.options.dryRun) {
        throw new PublishError(`No artifacts match ${pattern}`, action.kind);
      }
      artifacts = [pattern];
    }
    logs.push(`Uploading ${artifacts.length} artifact(s) with the ${action.credential} credential...`);

    const result = await this.vault.withCredential(action.credential, (lease) =>
      this.runner.run({
        command: 'anaconda',
        args: ['upload', ...artifacts],
        env: lease.env,
      }),
    );

    if (result.exitCode !== 0) {
      const detail = result.error ?? `exit code ${result.exitCode}`;
      this.logger.error({ action: action.kind, exitCode: result.exitCode }, 'Artifact upload failed');
      throw new PublishError(`anaconda upload failed (${detail})`, action.kind);
    }

    for (const artifact of artifacts) {
      logs.push(`  Uploaded ${artifact}`);
    }
    return logs;
  }
}
