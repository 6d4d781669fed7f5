/**
 * Deployment Gate
 *
 * Decides, from a frozen PipelineContext, which publish actions a run may
 * take. Each rule is an independent predicate; any subset may fire. The
 * tag-release and dev-release rules are exclusive because one requires a
 * tag and the other requires its absence.
 */

import type { PipelineContext } from '../pipeline/context.js';
import type { GateEvaluation, PublishAction, PublishSkip } from './types.js';

export interface GateOptions {
  builtDocs: string;
  deployBranch: string;
}

export const DEFAULT_GATE_OPTIONS: GateOptions = {
  builtDocs: 'docs/build/html',
  deployBranch: 'gh-pages',
};

type Guard = [holds: boolean, reason: string];

/** Returns the reason of the first guard that does not hold */
function firstFailing(guards: Guard[]): string | null {
  const failed = guards.find(([holds]) => !holds);
  return failed ? failed[1] : null;
}

function releaseGuards(context: PipelineContext): Guard[] {
  return [
    [!context.isPullRequest, 'pull request builds never publish'],
    [
      context.repoSlug === context.officialRepoSlug,
      `repository ${context.repoSlug || '(unknown)'} is not ${context.officialRepoSlug}`,
    ],
  ];
}

/**
 * Docs deploys share the pull request and fork guards.
 */
function docsGuards(context: PipelineContext): Guard[] {
  return [
    ...releaseGuards(context),
    [context.docsRequested, 'docs build not requested for this job'],
    [context.hasDocsDeployKey, 'docs deploy key not configured'],
  ];
}

function tagReleaseGuards(context: PipelineContext): Guard[] {
  return [
    ...releaseGuards(context),
    [
      context.branch === context.tag,
      `branch ${context.branch || '(unset)'} does not match tag ${context.tag || '(none)'}`,
    ],
    [context.tag !== '', 'commit is not tagged'],
    [context.hasTagCredential, 'tag upload credential not configured'],
  ];
}

function devReleaseGuards(context: PipelineContext): Guard[] {
  return [
    ...releaseGuards(context),
    [context.branch === context.trunkBranch, `branch ${context.branch} is not ${context.trunkBranch}`],
    [context.tag === '', `commit is tagged ${context.tag}`],
    [context.hasDevCredential, 'dev upload credential not configured'],
  ];
}

export function shouldPublishDocs(context: PipelineContext): boolean {
  return firstFailing(docsGuards(context)) === null;
}

/**
 * The branch-equals-tag comparison is kept as observed: on a tag build the
 * CI branch variable carries the tag name.
 */
export function shouldPublishTagRelease(context: PipelineContext): boolean {
  return firstFailing(tagReleaseGuards(context)) === null;
}

export function shouldPublishDevBuild(context: PipelineContext): boolean {
  return firstFailing(devReleaseGuards(context)) === null;
}

export function evaluateGate(
  context: PipelineContext,
  options: GateOptions = DEFAULT_GATE_OPTIONS,
): GateEvaluation {
  const actions: PublishAction[] = [];
  const skipped: PublishSkip[] = [];

  const docsBlocked = firstFailing(docsGuards(context));
  if (docsBlocked === null) {
    actions.push({ kind: 'docs', builtDocs: options.builtDocs, deployBranch: options.deployBranch });
  } else {
    skipped.push({ kind: 'docs', reason: docsBlocked });
  }

  const tagBlocked = firstFailing(tagReleaseGuards(context));
  if (tagBlocked === null) {
    actions.push({ kind: 'tag-release', credential: 'tag' });
  } else {
    skipped.push({ kind: 'tag-release', reason: tagBlocked });
  }

  const devBlocked = firstFailing(devReleaseGuards(context));
  if (devBlocked === null) {
    actions.push({ kind: 'dev-release', credential: 'dev' });
  } else {
    skipped.push({ kind: 'dev-release', reason: devBlocked });
  }

  return { actions, skipped };
}
