/**
 * Deploy Types
 *
 * Publish decisions produced by the gate and the results of carrying them out.
 */

// ═══════════════════════════════════════════════════════════════
// DECISIONS
// ═══════════════════════════════════════════════════════════════

export type CredentialKind = 'dev' | 'tag';

export interface DocsPublishAction {
  kind: 'docs';
  /** Directory of rendered HTML handed to the deploy tool */
  builtDocs: string;
  /** Branch the rendered docs are pushed to */
  deployBranch: string;
}

export interface TagReleaseAction {
  kind: 'tag-release';
  credential: 'tag';
}

export interface DevReleaseAction {
  kind: 'dev-release';
  credential: 'dev';
}

export type UploadAction = TagReleaseAction | DevReleaseAction;
export type PublishAction = DocsPublishAction | UploadAction;
export type PublishKind = PublishAction['kind'];

/** A rule whose guard did not hold. Informational, never an error. */
export interface PublishSkip {
  kind: PublishKind;
  reason: string;
}

export interface GateEvaluation {
  actions: PublishAction[];
  skipped: PublishSkip[];
}

// ═══════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════

export type PublishStatus = 'success' | 'failed';

export interface PublishResult {
  kind: PublishKind;
  status: PublishStatus;
  /** Deployment log lines */
  logs: string[];
  /** Duration in milliseconds */
  duration: number;
  error?: string;
}

export interface PublishTarget<A extends PublishAction> {
  readonly name: string;
  /** Resolves with log lines; throws PublishError on failure */
  publish(action: A): Promise<string[]>;
}
