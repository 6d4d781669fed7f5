/**
 * Human-readable rendering of contexts, gate decisions and run reports
 */

import type { PipelineContext } from '../pipeline/context.js';
import type { PipelineReport } from '../pipeline/types.js';
import type { GateEvaluation } from '../deploy/types.js';
import { formatDuration } from '../utils/timer.js';

const RULE = '  ' + '─'.repeat(40);

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

export function formatContext(context: Readonly<PipelineContext>): string[] {
  return [
    '  Pipeline context:',
    `    Pull request:    ${yesNo(context.isPullRequest)}`,
    `    Repository:      ${context.repoSlug || '(unset)'}`,
    `    Official repo:   ${context.officialRepoSlug}`,
    `    Branch:          ${context.branch || '(unset)'}`,
    `    Tag:             ${context.tag || '(none)'}`,
    `    Docs requested:  ${yesNo(context.docsRequested)}`,
    `    Docs deploy key: ${yesNo(context.hasDocsDeployKey)}`,
    `    Dev credential:  ${yesNo(context.hasDevCredential)}`,
    `    Tag credential:  ${yesNo(context.hasTagCredential)}`,
  ];
}

export function formatEvaluation(gate: GateEvaluation): string[] {
  const lines = ['  Publish actions:'];
  if (gate.actions.length === 0) {
    lines.push('    (none)');
  }
  for (const action of gate.actions) {
    lines.push(`    + ${action.kind}`);
  }
  if (gate.skipped.length > 0) {
    lines.push('  Skipped:');
    for (const skip of gate.skipped) {
      lines.push(`    - ${skip.kind}: ${skip.reason}`);
    }
  }
  return lines;
}

export function formatReport(report: PipelineReport): string[] {
  const lines = ['', `  Run ${report.runId}`, RULE];

  for (const step of report.steps) {
    const mark = step.passed ? '✓' : '✗';
    lines.push(`  ${mark} ${step.step.padEnd(12)} ${formatDuration(step.duration)}`);
    if (step.error) {
      lines.push(`      ${step.error.message}`);
    }
  }

  if (report.abortedAt) {
    lines.push(`  Aborted at "${report.abortedAt}"; nothing was published.`);
  }

  for (const publish of report.publishes) {
    const mark = publish.status === 'success' ? '✓' : '✗';
    lines.push(`  ${mark} publish:${publish.kind} ${formatDuration(publish.duration)}`);
    if (publish.error) {
      lines.push(`      ${publish.error}`);
    }
  }

  lines.push(RULE);
  lines.push(`  Exit code ${report.exitCode} after ${formatDuration(report.duration)}`);
  lines.push('');
  return lines;
}

/**
 * JSON view of a report; errors are flattened to their code and message.
 */
export function reportToJson(report: PipelineReport): Record<string, unknown> {
  return {
    ...report,
    steps: report.steps.map(({ error, ...step }) => ({
      ...step,
      error: error ? { code: error.code, message: error.message } : undefined,
    })),
  };
}
