import { BaseStep } from './base-step.js';
import { GateError } from '../../core/errors.js';
import { inEnv } from '../../utils/conda.js';
import type { CommandSpec } from '../../utils/exec.js';
import type { StepContext } from '../types.js';

/**
 * Uploads the coverage report. Runs after success and never fails the run.
 */
export class CoverageStep extends BaseStep {
  name = 'coverage';
  description = 'Uploading coverage report';
  stage = 'after_success' as const;
  fatal = false;

  protected commands({ config }: StepContext): CommandSpec[] {
    if (!config.coverage.upload) {
      return [];
    }
    return [inEnv(config.conda.envName, config.coverage.command)];
  }

  protected failure(message: string): GateError {
    return new GateError(message, 'COVERAGE_UPLOAD_FAILURE', this.stage);
  }
}
