import { BaseStep } from './base-step.js';
import { TestFailureError } from '../../core/errors.js';
import { inEnv } from '../../utils/conda.js';
import type { CommandSpec } from '../../utils/exec.js';
import type { StepContext } from '../types.js';

/**
 * Runs the test suite under coverage and prints the coverage report.
 */
export class TestStep extends BaseStep {
  name = 'test';
  description = 'Running tests with coverage';
  stage = 'script' as const;

  protected commands({ config }: StepContext): CommandSpec[] {
    return config.tests.commands.map((command) => inEnv(config.conda.envName, command));
  }

  protected failure(message: string): TestFailureError {
    return new TestFailureError(message, this.name);
  }
}
