export { BaseStep } from './base-step.js';
export { ProvisionStep } from './provision.js';
export { BuildStep } from './build.js';
export { EnvironmentStep } from './environment.js';
export { TestStep } from './test.js';
export { LintStep } from './lint.js';
export { CoverageStep } from './coverage.js';
