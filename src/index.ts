/**
 * release-gate — CI pipeline and deployment gate for conda-packaged projects
 *
 * @example
 * ```ts
 * import { ConfigManager, readPipelineContext, evaluateGate } from 'release-gate'
 *
 * const config = new ConfigManager(process.cwd()).load()
 * const { actions, skipped } = evaluateGate(readPipelineContext(config))
 * ```
 */

// Gate and deploy
export * from './deploy/index.js';
export { DEFAULT_GATE_OPTIONS } from './deploy/gate.js';
export type { GateOptions } from './deploy/gate.js';
export type { ChannelTargetOptions } from './deploy/targets/channel-target.js';
export type { CredentialLease } from './deploy/credentials.js';
export type { DeployerTargets } from './deploy/deployer.js';

// Context
export { readPipelineContext, parsePullRequestFlag, CI_VARIABLES } from './pipeline/context.js';
export type { PipelineContext, ContextOverrides } from './pipeline/context.js';

// Execution
export { PipelineRunner, createPipeline, defaultSteps } from './pipeline/runner.js';
export type { PipelineSteps, PipelineRunnerOptions, CreatePipelineOptions } from './pipeline/runner.js';
export {
  BaseStep,
  ProvisionStep,
  BuildStep,
  EnvironmentStep,
  TestStep,
  LintStep,
  CoverageStep,
} from './pipeline/steps/index.js';
export type { PipelineStep, StepContext, StepResult, PipelineReport } from './pipeline/types.js';

// Commands
export { ProcessRunner, DryRunRunner, formatCommand } from './utils/exec.js';
export type { CommandRunner, CommandSpec, CommandResult } from './utils/exec.js';

// Core
export { ConfigManager, resolveDeployKeyVariable, resolveArtifactGlob, resolveLintGlobs } from './core/config.js';
export { GateConfigSchema } from './core/types.js';
export type { GateConfig, GateConfigInput, PipelineStage } from './core/types.js';
export {
  GateError,
  ConfigError,
  ProvisioningError,
  BuildError,
  TestFailureError,
  PublishError,
} from './core/errors.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export { VERSION, NAME } from './version.js';
