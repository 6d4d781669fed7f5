import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { formatContext, formatEvaluation, formatReport, reportToJson } from '../../../src/cli/format.js';
import { parseBoolean, parseLogFormat, toOverrides } from '../../../src/cli/shared.js';
import { TestFailureError } from '../../../src/core/errors.js';
import type { PipelineReport } from '../../../src/pipeline/types.js';
import { createContext } from '../../helpers/fixtures.js';

// ── Helpers ──

function createReport(overrides: Partial<PipelineReport> = {}): PipelineReport {
  return {
    runId: 'run_test',
    context: createContext(),
    steps: [],
    publishes: [],
    exitCode: 0,
    duration: 1500,
    ...overrides,
  };
}

describe('formatContext', () => {
  it('marks unset values', () => {
    const lines = formatContext(createContext({ branch: '', tag: '', isPullRequest: true }));

    expect(lines).toContain('    Pull request:    yes');
    expect(lines).toContain('    Branch:          (unset)');
    expect(lines).toContain('    Tag:             (none)');
  });
});

describe('formatEvaluation', () => {
  it('lists fired actions and skip reasons', () => {
    const lines = formatEvaluation({
      actions: [{ kind: 'dev-release', credential: 'dev' }],
      skipped: [{ kind: 'docs', reason: 'docs build not requested for this job' }],
    });

    expect(lines).toEqual([
      '  Publish actions:',
      '    + dev-release',
      '  Skipped:',
      '    - docs: docs build not requested for this job',
    ]);
  });

  it('says when nothing fires', () => {
    expect(formatEvaluation({ actions: [], skipped: [] })).toEqual(['  Publish actions:', '    (none)']);
  });
});

describe('formatReport', () => {
  it('shows step outcomes, the abort point and the exit code', () => {
    const error = new TestFailureError('Step "test" failed: coverage run run_tests.py (exit code 1)', 'test');
    const lines = formatReport(createReport({
      steps: [
        { step: 'provision', stage: 'install', passed: true, commands: [], duration: 250, exitCode: 0 },
        { step: 'test', stage: 'script', passed: false, commands: [], duration: 1500, exitCode: 1, error },
      ],
      abortedAt: 'test',
      exitCode: 1,
    }));

    expect(lines).toContain('  ✓ provision    250ms');
    expect(lines).toContain('  ✗ test         1.5s');
    expect(lines).toContain(`      ${error.message}`);
    expect(lines).toContain('  Aborted at "test"; nothing was published.');
    expect(lines).toContain('  Exit code 1 after 1.5s');
  });

  it('shows publish failures', () => {
    const lines = formatReport(createReport({
      publishes: [{ kind: 'docs', status: 'failed', logs: [], duration: 40, error: 'Documentation deploy failed' }],
      exitCode: 1,
    }));

    expect(lines).toContain('  ✗ publish:docs 40ms');
    expect(lines).toContain('      Documentation deploy failed');
  });
});

describe('reportToJson', () => {
  it('flattens step errors to code and message', () => {
    const error = new TestFailureError('lint failed', 'lint');
    const json = reportToJson(createReport({
      steps: [{ step: 'lint', stage: 'script', passed: false, commands: ['flake8'], duration: 1, exitCode: 1, error }],
    }));

    expect(json.steps).toEqual([{
      step: 'lint',
      stage: 'script',
      passed: false,
      commands: ['flake8'],
      duration: 1,
      exitCode: 1,
      error: { code: 'TEST_FAILURE', message: 'lint failed' },
    }]);
  });
});

describe('option parsing', () => {
  it.each([
    ['true', true],
    ['YES', true],
    ['0', false],
    [' false ', false],
  ])('parses %j as %s', (input, expected) => {
    expect(parseBoolean(input)).toBe(expected);
  });

  it('rejects other booleans', () => {
    expect(() => parseBoolean('maybe')).toThrow(InvalidArgumentError);
  });

  it('accepts only known log formats', () => {
    expect(parseLogFormat('json')).toBe('json');
    expect(() => parseLogFormat('xml')).toThrow('Expected "pretty" or "json".');
  });

  it('maps the pull request flag onto the context override', () => {
    expect(toOverrides({ branch: 'v1.2.0', tag: 'v1.2.0', pullRequest: false })).toEqual({
      branch: 'v1.2.0',
      tag: 'v1.2.0',
      repoSlug: undefined,
      isPullRequest: false,
    });
  });
});
