import type { PipelineStage } from './types.js';

export class GateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: PipelineStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GateError';
  }
}

export class ConfigError extends GateError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class ProvisioningError extends GateError {
  constructor(message: string, public readonly step: string, cause?: Error) {
    super(message, 'PROVISIONING_FAILURE', 'install', cause);
    this.name = 'ProvisioningError';
  }
}

export class BuildError extends GateError {
  constructor(message: string, public readonly step: string, cause?: Error) {
    super(message, 'BUILD_FAILURE', 'install', cause);
    this.name = 'BuildError';
  }
}

export class TestFailureError extends GateError {
  constructor(message: string, public readonly step: string, cause?: Error) {
    super(message, 'TEST_FAILURE', 'script', cause);
    this.name = 'TestFailureError';
  }
}

export class PublishError extends GateError {
  constructor(message: string, public readonly action: string, cause?: Error) {
    super(message, 'PUBLISH_FAILURE', 'deploy', cause);
    this.name = 'PublishError';
  }
}

