/**
 * Pipeline Context — the read-only snapshot of CI state a run is gated on.
 *
 * Built once at the start of a run from the CI environment (Travis CI
 * variable names) and frozen; nothing downstream may mutate it.
 */

import type { GateConfig } from '../core/types.js';
import { resolveDeployKeyVariable } from '../core/config.js';

export interface PipelineContext {
  isPullRequest: boolean;
  repoSlug: string;
  officialRepoSlug: string;
  trunkBranch: string;
  branch: string;
  /** Empty string means the commit is not tagged */
  tag: string;
  hasDevCredential: boolean;
  hasTagCredential: boolean;
  docsRequested: boolean;
  hasDocsDeployKey: boolean;
}

/** Values that take precedence over the environment, e.g. from CLI flags */
export interface ContextOverrides {
  isPullRequest?: boolean;
  repoSlug?: string;
  branch?: string;
  tag?: string;
}

export const CI_VARIABLES = {
  pullRequest: 'TRAVIS_PULL_REQUEST',
  repoSlug: 'TRAVIS_REPO_SLUG',
  branch: 'TRAVIS_BRANCH',
  tag: 'TRAVIS_TAG',
} as const;

function isSet(value: string | undefined): boolean {
  return value !== undefined && value !== '';
}

/**
 * Travis sets TRAVIS_PULL_REQUEST to "false" or the PR number. Anything
 * other than the literal "false" (including an unset variable) is treated
 * as a pull request so that publishing never happens by accident.
 */
export function parsePullRequestFlag(value: string | undefined): boolean {
  return value !== 'false';
}

export function readPipelineContext(
  config: GateConfig,
  env: NodeJS.ProcessEnv = process.env,
  overrides: ContextOverrides = {},
): Readonly<PipelineContext> {
  const context: PipelineContext = {
    isPullRequest: overrides.isPullRequest ?? parsePullRequestFlag(env[CI_VARIABLES.pullRequest]),
    repoSlug: overrides.repoSlug ?? env[CI_VARIABLES.repoSlug] ?? '',
    officialRepoSlug: config.repository.official,
    trunkBranch: config.repository.trunkBranch,
    branch: overrides.branch ?? env[CI_VARIABLES.branch] ?? '',
    tag: overrides.tag ?? env[CI_VARIABLES.tag] ?? '',
    hasDevCredential: isSet(env[config.publish.credentials.dev]),
    hasTagCredential: isSet(env[config.publish.credentials.tag]),
    docsRequested: isSet(env[config.docs.flagVariable]),
    hasDocsDeployKey: isSet(env[resolveDeployKeyVariable(config)]),
  };

  return Object.freeze(context);
}
