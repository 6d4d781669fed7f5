/**
 * Deploy — barrel exports for the gate, its targets and the deployer.
 */

export { evaluateGate, shouldPublishDocs, shouldPublishTagRelease, shouldPublishDevBuild } from './gate.js';
export { Deployer } from './deployer.js';
export { CredentialVault } from './credentials.js';
export { DocsTarget } from './targets/docs-target.js';
export { ChannelTarget } from './targets/channel-target.js';
export type {
  CredentialKind,
  DocsPublishAction,
  TagReleaseAction,
  DevReleaseAction,
  UploadAction,
  PublishAction,
  PublishKind,
  PublishSkip,
  PublishResult,
  PublishStatus,
  PublishTarget,
  GateEvaluation,
} from './types.js';
