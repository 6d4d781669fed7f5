import type { GateConfig, PipelineStage } from '../core/types.js';
import type { GateError } from '../core/errors.js';
import type { CommandRunner } from '../utils/exec.js';
import type { GateEvaluation, PublishResult } from '../deploy/types.js';
import type { PipelineContext } from './context.js';

export interface StepContext {
  config: GateConfig;
  runner: CommandRunner;
  projectDir: string;
}

export interface PipelineStep {
  name: string;
  description: string;
  stage: PipelineStage;
  /** A failing fatal step aborts the rest of the run */
  fatal: boolean;
  run(context: StepContext): Promise<StepResult>;
}

export interface StepResult {
  step: string;
  stage: PipelineStage;
  passed: boolean;
  /** Commands that were run, in order */
  commands: string[];
  duration: number;
  exitCode: number;
  error?: GateError;
}

export interface PipelineReport {
  runId: string;
  context: Readonly<PipelineContext>;
  steps: StepResult[];
  /** Absent when a fatal step stopped the run before the gate was evaluated */
  gate?: GateEvaluation;
  publishes: PublishResult[];
  /** Set when a fatal step aborted the run */
  abortedAt?: string;
  exitCode: number;
  duration: number;
}
