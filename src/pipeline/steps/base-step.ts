import type { PipelineStage } from '../../core/types.js';
import { GateError } from '../../core/errors.js';
import type { CommandSpec } from '../../utils/exec.js';
import type { PipelineStep, StepContext, StepResult } from '../types.js';
import { formatCommand } from '../../utils/exec.js';
import { getLogger } from '../../core/logger.js';
import { Timer } from '../../utils/timer.js';

/**
 * A step is an ordered list of commands; the first non-zero exit halts it.
 */
export abstract class BaseStep implements PipelineStep {
  abstract name: string;
  abstract description: string;
  abstract stage: PipelineStage;
  fatal = true;

  protected logger = getLogger();

  async run(context: StepContext): Promise<StepResult> {
    const timer = new Timer();
    const ran: string[] = [];
    this.logger.info({ step: this.name }, this.description);

    let commands: CommandSpec[];
    try {
      commands = await this.commands(context);
    } catch (err) {
      // A step may refuse to start, e.g. when there is nothing to check
      if (!(err instanceof GateError)) throw err;
      const duration = timer.stop();
      this.logger.error({ step: this.name, durationMs: Math.round(duration) }, err.message);
      return { step: this.name, stage: this.stage, passed: false, commands: ran, duration, exitCode: 1, error: err };
    }

    for (const spec of commands) {
      const line = formatCommand(spec);
      ran.push(line);

      const result = await context.runner.run(spec);
      if (result.exitCode !== 0) {
        const detail = result.error ?? `exit code ${result.exitCode}`;
        const error = this.failure(`Step "${this.name}" failed: ${line} (${detail})`);
        const duration = timer.stop();

        this.logger.error(
          { step: this.name, command: line, exitCode: result.exitCode, durationMs: Math.round(duration) },
          error.message,
        );

        return {
          step: this.name,
          stage: this.stage,
          passed: false,
          commands: ran,
          duration,
          exitCode: result.exitCode,
          error,
        };
      }
    }

    const duration = timer.stop();
    this.logger.debug({ step: this.name, durationMs: Math.round(duration) }, 'Step passed');
    return { step: this.name, stage: this.stage, passed: true, commands: ran, duration, exitCode: 0 };
  }

  protected abstract commands(context: StepContext): CommandSpec[] | Promise<CommandSpec[]>;

  protected abstract failure(message: string): GateError;
}
