import { BaseStep } from './base-step.js';
import { ProvisioningError } from '../../core/errors.js';
import { conda } from '../../utils/conda.js';
import type { CommandSpec } from '../../utils/exec.js';
import type { StepContext } from '../types.js';

/**
 * Configures the base conda install non-interactively, installs the build
 * tooling and registers the package channels.
 */
export class ProvisionStep extends BaseStep {
  name = 'provision';
  description = 'Provisioning conda and build tools';
  stage = 'install' as const;

  protected commands({ config }: StepContext): CommandSpec[] {
    const { buildTools, channels, appendChannels, showInfo } = config.conda;

    const commands = [
      conda(['config', '--set', 'always_yes', 'yes', '--set', 'changeps1', 'no']),
      conda(['install', '-q', ...buildTools]),
      conda(['update', '-q', 'conda', 'conda-build']),
      ...channels.map((channel) => conda(['config', '--add', 'channels', channel])),
      ...appendChannels.map((channel) => conda(['config', '--append', 'channels', channel])),
    ];
    if (showInfo) {
      commands.push(conda(['info', '-a']));
    }
    return commands;
  }

  protected failure(message: string): ProvisioningError {
    return new ProvisioningError(message, this.name);
  }
}
