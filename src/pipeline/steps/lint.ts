import { glob } from 'glob';
import { BaseStep } from './base-step.js';
import { TestFailureError } from '../../core/errors.js';
import { resolveLintGlobs } from '../../core/config.js';
import { inEnv } from '../../utils/conda.js';
import type { CommandSpec } from '../../utils/exec.js';
import type { StepContext } from '../types.js';

/**
 * Lint gate — runs the linter over the package sources
 */
export class LintStep extends BaseStep {
  name = 'lint';
  description = 'Linting package sources';
  stage = 'script' as const;

  protected async commands({ config, projectDir }: StepContext): Promise<CommandSpec[]> {
    const patterns = resolveLintGlobs(config);
    const files = await glob(patterns, { cwd: projectDir, nodir: true });

    if (files.length === 0) {
      throw this.failure(`Step "${this.name}" failed: no files match ${patterns.join(' ')}`);
    }

    return [inEnv(config.conda.envName, [...config.tests.lint, ...files.sort()])];
  }

  protected failure(message: string): TestFailureError {
    return new TestFailureError(message, this.name);
  }
}
