/**
 * Config and context builders shared by the unit tests
 */

import { GateConfigSchema, type GateConfig, type GateConfigInput } from '../../src/core/types.js';
import type { PipelineContext } from '../../src/pipeline/context.js';

export const OFFICIAL_REPO = 'pcdshub/pcdsdevices';

export function createConfig(overrides: Partial<GateConfigInput> = {}): GateConfig {
  return GateConfigSchema.parse({
    project: { package: 'pcdsdevices' },
    repository: { official: OFFICIAL_REPO },
    ...overrides,
  });
}

/**
 * A context from the official repository, not a pull request, on a feature
 * branch with nothing configured; tests switch on what they need.
 */
export function createContext(overrides: Partial<PipelineContext> = {}): PipelineContext {
  return {
    isPullRequest: false,
    repoSlug: OFFICIAL_REPO,
    officialRepoSlug: OFFICIAL_REPO,
    trunkBranch: 'master',
    branch: 'feature',
    tag: '',
    hasDevCredential: false,
    hasTagCredential: false,
    docsRequested: false,
    hasDocsDeployKey: false,
    ...overrides,
  };
}
