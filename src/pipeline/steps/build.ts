import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { BaseStep } from './base-step.js';
import { BuildError } from '../../core/errors.js';
import { conda } from '../../utils/conda.js';
import type { CommandSpec } from '../../utils/exec.js';
import type { StepContext } from '../types.js';

/**
 * Builds the package from its recipe, then exposes the output folder as a
 * local channel so the test environment installs the fresh build.
 */
export class BuildStep extends BaseStep {
  name = 'build';
  description = 'Building conda package';
  stage = 'install' as const;

  protected commands({ config, projectDir }: StepContext): CommandSpec[] {
    const { recipeDir, outputFolder } = config.conda;
    const localChannel = pathToFileURL(resolve(projectDir, outputFolder)).href;

    return [
      conda(['build', '-q', recipeDir, '--output-folder', outputFolder]),
      conda(['config', '--add', 'channels', localChannel]),
    ];
  }

  protected failure(message: string): BuildError {
    return new BuildError(message, this.name);
  }
}
