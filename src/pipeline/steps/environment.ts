import { BaseStep } from './base-step.js';
import { ProvisioningError } from '../../core/errors.js';
import { conda } from '../../utils/conda.js';
import type { CommandSpec } from '../../utils/exec.js';
import type { StepContext } from '../types.js';

export class EnvironmentStep extends BaseStep {
  name = 'environment';
  description = 'Creating test environment';
  stage = 'install' as const;

  protected commands({ config }: StepContext): CommandSpec[] {
    const { envName, pythonVersion, requirements } = config.conda;
    return [
      conda([
        'create', '-q', '-n', envName,
        `python=${pythonVersion}`,
        config.project.package,
        '--file', requirements,
      ]),
    ];
  }

  protected failure(message: string): ProvisioningError {
    return new ProvisioningError(message, this.name);
  }
}
