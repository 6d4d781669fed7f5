/**
 * Pipeline Runner — install, script, deploy and after-success phases of one
 * CI run.
 *
 * Fatal steps fail fast: the first failure ends the run before anything is
 * published. Publish actions are independent of one another; any failure
 * among them makes the exit code non-zero without stopping the others.
 */

import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type { GateConfig } from '../core/types.js';
import type { CommandRunner } from '../utils/exec.js';
import type { GateEvaluation, PublishResult } from '../deploy/types.js';
import type { PipelineContext } from './context.js';
import type { PipelineReport, PipelineStep, StepContext, StepResult } from './types.js';
import { ProcessRunner, DryRunRunner } from '../utils/exec.js';
import { readPipelineContext, type ContextOverrides } from './context.js';
import { evaluateGate } from '../deploy/gate.js';
import { Deployer } from '../deploy/deployer.js';
import { CredentialVault } from '../deploy/credentials.js';
import { DocsTarget } from '../deploy/targets/docs-target.js';
import { ChannelTarget } from '../deploy/targets/channel-target.js';
import {
  ProvisionStep,
  BuildStep,
  EnvironmentStep,
  TestStep,
  LintStep,
  CoverageStep,
} from './steps/index.js';
import { getLogger } from '../core/logger.js';
import { Timer } from '../utils/timer.js';

export interface PipelineSteps {
  install: PipelineStep[];
  script: PipelineStep[];
  afterSuccess: PipelineStep[];
}

export interface PipelineRunnerOptions {
  config: GateConfig;
  projectDir: string;
  runner: CommandRunner;
  context: Readonly<PipelineContext>;
  deployer: Deployer;
  steps?: PipelineSteps;
}

export function defaultSteps(): PipelineSteps {
  return {
    install: [new ProvisionStep(), new BuildStep(), new EnvironmentStep()],
    script: [new TestStep(), new LintStep()],
    afterSuccess: [new CoverageStep()],
  };
}

export class PipelineRunner extends EventEmitter {
  private config: GateConfig;
  private projectDir: string;
  private runner: CommandRunner;
  private context: Readonly<PipelineContext>;
  private deployer: Deployer;
  private steps: PipelineSteps;
  private logger = getLogger();

  constructor(options: PipelineRunnerOptions) {
    super();
    this.config = options.config;
    this.projectDir = options.projectDir;
    this.runner = options.runner;
    this.context = options.context;
    this.deployer = options.deployer;
    this.steps = options.steps ?? defaultSteps();
  }

  getContext(): Readonly<PipelineContext> {
    return this.context;
  }

  /**
   * Full run: install -> script -> docs publish -> after-success uploads.
   */
  async run(): Promise<PipelineReport> {
    const timer = new Timer();
    const runId = `run_${nanoid(8)}`;
    const stepResults: StepResult[] = [];
    this.emit('pipeline:start', { timestamp: Date.now(), runId });

    for (const step of [...this.steps.install, ...this.steps.script]) {
      const result = await this.runStep(step, stepResults);
      if (!result.passed && !step.fatal) {
        this.logger.warn({ step: step.name }, 'Non-fatal step failed, continuing');
        continue;
      }
      if (!result.passed) {
        this.logger.error({ runId, step: step.name, code: result.error?.code }, 'Run aborted');
        this.emit('pipeline:aborted', { timestamp: Date.now(), runId, step: step.name });
        return {
          runId,
          context: this.context,
          steps: stepResults,
          publishes: [],
          abortedAt: step.name,
          exitCode: 1,
          duration: timer.stop(),
        };
      }
    }

    const gate = this.evaluate();
    const docs = gate.actions.filter((action) => action.kind === 'docs');
    const uploads = gate.actions.filter((action) => action.kind !== 'docs');

    const publishes: PublishResult[] = await this.deployer.deployAll(docs);

    for (const step of this.steps.afterSuccess) {
      const result = await this.runStep(step, stepResults);
      if (!result.passed) {
        this.logger.warn({ step: step.name }, 'After-success step failed, continuing');
      }
    }

    publishes.push(...(await this.deployer.deployAll(uploads)));

    const report: PipelineReport = {
      runId,
      context: this.context,
      steps: stepResults,
      gate,
      publishes,
      exitCode: this.exitCodeFor(publishes),
      duration: timer.stop(),
    };
    this.emit('pipeline:complete', { timestamp: Date.now(), runId, exitCode: report.exitCode });
    return report;
  }

  /**
   * Gate and publish only, for an artifact built by an earlier invocation.
   */
  async publish(): Promise<PipelineReport> {
    const timer = new Timer();
    const runId = `run_${nanoid(8)}`;
    const gate = this.evaluate();
    const publishes = await this.deployer.deployAll(gate.actions);

    return {
      runId,
      context: this.context,
      steps: [],
      gate,
      publishes,
      exitCode: this.exitCodeFor(publishes),
      duration: timer.stop(),
    };
  }

  private evaluate(): GateEvaluation {
    const gate = evaluateGate(this.context, {
      builtDocs: this.config.docs.builtDir,
      deployBranch: this.config.docs.deployBranch,
    });
    this.logger.info({ actions: gate.actions.map((action) => action.kind) }, 'Gate evaluated');
    this.deployer.reportSkipped(gate.skipped);
    return gate;
  }

  private async runStep(step: PipelineStep, results: StepResult[]): Promise<StepResult> {
    const stepContext: StepContext = {
      config: this.config,
      runner: this.runner,
      projectDir: this.projectDir,
    };
    this.emit('pipeline:step', { timestamp: Date.now(), step: step.name });
    const result = await step.run(stepContext);
    results.push(result);
    return result;
  }

  /**
   * Fatal step failures return early, so only publish failures remain.
   */
  private exitCodeFor(publishes: PublishResult[]): number {
    return publishes.some((result) => result.status === 'failed') ? 1 : 0;
  }
}

export interface CreatePipelineOptions {
  projectDir: string;
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
  overrides?: ContextOverrides;
}

/**
 * Wire a runner from configuration and the CI environment.
 */
export function createPipeline(config: GateConfig, options: CreatePipelineOptions): PipelineRunner {
  const env = options.env ?? process.env;
  const runner: CommandRunner = options.dryRun
    ? new DryRunRunner()
    : new ProcessRunner(options.projectDir);
  const vault = CredentialVault.fromEnv(config, env);

  const deployer = new Deployer({
    docs: new DocsTarget(config, runner),
    upload: new ChannelTarget(config, runner, vault, {
      projectDir: options.projectDir,
      dryRun: options.dryRun,
    }),
  });

  return new PipelineRunner({
    config,
    projectDir: options.projectDir,
    runner,
    context: readPipelineContext(config, env, options.overrides),
    deployer,
  });
}
