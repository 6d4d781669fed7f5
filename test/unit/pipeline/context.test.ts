import { describe, it, expect } from 'vitest';
import { readPipelineContext, parsePullRequestFlag } from '../../../src/pipeline/context.js';
import { createConfig } from '../../helpers/fixtures.js';

const config = createConfig();

function travisEnv(overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv {
  return {
    TRAVIS_PULL_REQUEST: 'false',
    TRAVIS_REPO_SLUG: 'pcdshub/pcdsdevices',
    TRAVIS_BRANCH: 'master',
    TRAVIS_TAG: '',
    ...overrides,
  };
}

describe('parsePullRequestFlag', () => {
  it('treats only the literal "false" as a branch build', () => {
    expect(parsePullRequestFlag('false')).toBe(false);
    expect(parsePullRequestFlag('42')).toBe(true);
    expect(parsePullRequestFlag('')).toBe(true);
    expect(parsePullRequestFlag(undefined)).toBe(true);
  });
});

describe('readPipelineContext', () => {
  it('reads the CI variables', () => {
    const context = readPipelineContext(config, travisEnv());
    expect(context).toEqual({
      isPullRequest: false,
      repoSlug: 'pcdshub/pcdsdevices',
      officialRepoSlug: 'pcdshub/pcdsdevices',
      trunkBranch: 'master',
      branch: 'master',
      tag: '',
      hasDevCredential: false,
      hasTagCredential: false,
      docsRequested: false,
      hasDocsDeployKey: false,
    });
  });

  it('detects non-empty credentials by their configured names', () => {
    const context = readPipelineContext(config, travisEnv({
      CONDA_UPLOAD_TOKEN_DEV: 'test-dev-token',
      CONDA_UPLOAD_TOKEN_TAG: '',
    }));
    expect(context.hasDevCredential).toBe(true);
    expect(context.hasTagCredential).toBe(false);
  });

  it('honours renamed credential variables', () => {
    const renamed = createConfig({ publish: { credentials: { dev: 'DEV_TOKEN' } } });
    const context = readPipelineContext(renamed, travisEnv({
      DEV_TOKEN: 'test-dev-token',
      CONDA_UPLOAD_TOKEN_DEV: '',
    }));
    expect(context.hasDevCredential).toBe(true);
  });

  it('derives the docs deploy key variable from the official slug', () => {
    const context = readPipelineContext(config, travisEnv({
      BUILD_DOCS: '1',
      DOCTR_DEPLOY_ENCRYPTION_KEY_PCDSHUB_PCDSDEVICES: 'test-deploy-key',
    }));
    expect(context.docsRequested).toBe(true);
    expect(context.hasDocsDeployKey).toBe(true);
  });

  it('counts any non-empty docs flag as a request', () => {
    expect(readPipelineContext(config, travisEnv({ BUILD_DOCS: '0' })).docsRequested).toBe(true);
    expect(readPipelineContext(config, travisEnv({ BUILD_DOCS: '' })).docsRequested).toBe(false);
  });

  it('defaults missing variables to empty values', () => {
    const context = readPipelineContext(config, {});
    expect(context.isPullRequest).toBe(true);
    expect(context.repoSlug).toBe('');
    expect(context.branch).toBe('');
    expect(context.tag).toBe('');
  });

  it('prefers explicit overrides over the environment', () => {
    const context = readPipelineContext(config, travisEnv(), {
      branch: 'v2.0.0',
      tag: 'v2.0.0',
      isPullRequest: true,
      repoSlug: 'someone/pcdsdevices',
    });
    expect(context.branch).toBe('v2.0.0');
    expect(context.tag).toBe('v2.0.0');
    expect(context.isPullRequest).toBe(true);
    expect(context.repoSlug).toBe('someone/pcdsdevices');
  });

  it('returns a frozen snapshot', () => {
    const env = travisEnv();
    const context = readPipelineContext(config, env);
    env.TRAVIS_BRANCH = 'changed';

    expect(Object.isFrozen(context)).toBe(true);
    expect(context.branch).toBe('master');
  });
});
