import { describe, it, expect } from 'vitest';
import {
  GateError,
  ConfigError,
  ProvisioningError,
  BuildError,
  TestFailureError,
  PublishError,
} from '../../../src/core/errors.js';

describe('error taxonomy', () => {
  it.each([
    [new ProvisioningError('setup failed', 'provision'), 'ProvisioningError', 'PROVISIONING_FAILURE', 'install'],
    [new BuildError('build failed', 'build'), 'BuildError', 'BUILD_FAILURE', 'install'],
    [new TestFailureError('tests failed', 'test'), 'TestFailureError', 'TEST_FAILURE', 'script'],
    [new PublishError('upload failed', 'dev-release'), 'PublishError', 'PUBLISH_FAILURE', 'deploy'],
    [new ConfigError('bad config'), 'ConfigError', 'CONFIG_ERROR', 'config'],
  ])('%s carries its name, code and stage', (error, name, code, stage) => {
    expect(error).toBeInstanceOf(GateError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(error.stage).toBe(stage);
  });

  it('keeps the originating step or action', () => {
    expect(new TestFailureError('lint failed', 'lint').step).toBe('lint');
    expect(new PublishError('deploy failed', 'docs').action).toBe('docs');
  });

  it('keeps the cause', () => {
    const cause = new Error('yaml: bad indent');
    expect(new ConfigError('bad config', cause).cause).toBe(cause);
  });
});
