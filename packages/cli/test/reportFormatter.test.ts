/**
 * Tests for run report formatting (`provision apply` / `provision plan` output)
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { UNKNOWN } from '@provision/types';
import type { ReconciliationOutcome } from '@provision/types';
import { RunReport } from '@provision/core';
import {
  buildJsonReport,
  describeOutcome,
  formatCounts,
  formatOutcome,
  formatRunReport,
} from '../src/utils/reportFormatter.js';

type OutcomeFields = Omit<ReconciliationOutcome, 'type' | 'durationMs'> & Partial<Pick<ReconciliationOutcome, 'type' | 'durationMs'>>;

function outcome(fields: OutcomeFields): ReconciliationOutcome {
  return { type: 'test', durationMs: 5, ...fields };
}

const UNCHANGED = outcome({ resourceId: 'power-sleep', startState: 0, endState: 0, action: 'none', result: 'success' });
const CONVERGED = outcome({
  resourceId: 'filevault',
  startState: 'on',
  endState: 'off',
  target: 'off',
  action: 'applied',
  result: 'success',
  durationMs: 12,
});
const NO_ROOT = outcome({
  resourceId: 'remote-login',
  action: 'none',
  result: 'failed',
  reason: 'InsufficientPrivilege',
  error: 'Requires root privileges (running as alice)',
});

describe('describeOutcome', () => {
  it('should show the state of an unchanged resource', () => {
    assert.strictEqual(describeOutcome(UNCHANGED), '0');
  });

  it('should show the transition of a converged resource', () => {
    assert.strictEqual(describeOutcome(CONVERGED), 'on → off');
  });

  it('should show the planned target, lists included', () => {
    const planned = outcome({
      resourceId: 'dns-magicdns:Wi-Fi',
      startState: ['1.1.1.1'],
      endState: ['1.1.1.1'],
      target: ['100.100.100.100', '1.1.1.1'],
      action: 'planned',
      result: 'success',
    });
    assert.strictEqual(describeOutcome(planned), '[1.1.1.1] → [100.100.100.100, 1.1.1.1]');
  });

  it('should explain a plan that waits on a planned prerequisite', () => {
    const planned = outcome({ resourceId: 'go', action: 'planned', result: 'success', blockedBy: 'homebrew' });
    assert.strictEqual(describeOutcome(planned), 'after homebrew is applied');
  });

  it('should prefix failures with their reason', () => {
    assert.strictEqual(describeOutcome(NO_ROOT), 'InsufficientPrivilege: Requires root privileges (running as alice)');
  });

  it('should explain each kind of skip', () => {
    const skipped = (fields: Pick<ReconciliationOutcome, 'result' | 'reason' | 'blockedBy'>): string =>
      describeOutcome(outcome({ resourceId: 'x', action: 'none', ...fields }));

    assert.strictEqual(
      skipped({ result: 'skippedDependencyFailed', reason: 'SkippedDependencyFailed', blockedBy: 'go' }),
      'dependency go did not converge'
    );
    assert.strictEqual(
      skipped({ result: 'skippedExcluded', reason: 'DependencyExcluded', blockedBy: 'homebrew' }),
      'dependency homebrew was excluded'
    );
    assert.strictEqual(skipped({ result: 'skippedExcluded', reason: 'UserOnly' }), 'requires root (excluded by --user-only)');
    assert.strictEqual(skipped({ result: 'skippedExcluded', reason: 'RunHalted' }), 'not attempted (stopped after failure)');
  });
});

describe('formatOutcome', () => {
  it('should render icon, id and description without color', () => {
    assert.strictEqual(formatOutcome(CONVERGED, { color: false }), '✓ filevault: on → off');
  });

  it('should color the icon by status', () => {
    assert.strictEqual(formatOutcome(UNCHANGED), '\x1b[32m✓\x1b[0m power-sleep: 0');
  });

  it('should append the duration in verbose mode', () => {
    assert.strictEqual(formatOutcome(CONVERGED, { color: false, verbose: true }), '✓ filevault: on → off (12ms)');
  });

  it('should print the hint on its own line', () => {
    const failed = outcome({
      resourceId: 'tailscale-connection',
      startState: 'inactive',
      target: 'active',
      action: 'applied',
      result: 'failed',
      reason: 'ApplyError',
      error: 'Tailscale is not connected and no auth key is configured',
      hint: 'Run: sudo tailscale up (and follow the login link)',
    });

    assert.strictEqual(
      formatOutcome(failed, { color: false }),
      '✗ tailscale-connection: ApplyError: Tailscale is not connected and no auth key is configured\n' +
        '  → Run: sudo tailscale up (and follow the login link)'
    );
  });
});

describe('formatCounts', () => {
  it('should list every status in a fixed order', () => {
    const report = new RunReport([UNCHANGED, CONVERGED, NO_ROOT]);
    assert.strictEqual(formatCounts(report.counts()), '1 unchanged, 1 converged, 0 planned, 1 failed, 0 skipped');
  });
});

describe('formatRunReport', () => {
  it('should print header, outcomes, summary and the sudo hint', () => {
    const report = new RunReport([UNCHANGED, NO_ROOT]);

    assert.strictEqual(
      formatRunReport(report, { color: false, source: '/etc/provision.yaml' }),
      [
        'Reconciling 2 resource(s) from /etc/provision.yaml',
        '',
        '✓ power-sleep: 0',
        '✗ remote-login: InsufficientPrivilege: Requires root privileges (running as alice)',
        '',
        'Status: 1 unchanged, 0 converged, 0 planned, 1 failed, 0 skipped',
        '→ Re-run with sudo, or pass --user-only to skip root-level resources',
      ].join('\n')
    );
  });

  it('should name the built-in defaults and say Plan for dry runs', () => {
    const planned = outcome({
      resourceId: 'firewall-stealth',
      startState: 'off',
      endState: 'off',
      target: 'on',
      action: 'planned',
      result: 'success',
    });
    const report = new RunReport([planned], { dryRun: true });

    assert.strictEqual(
      formatRunReport(report, { color: false, source: null }),
      [
        'Planning 1 resource(s) from built-in defaults',
        '',
        '→ firewall-stealth: off → on',
        '',
        'Plan: 0 unchanged, 0 converged, 1 planned, 0 failed, 0 skipped',
      ].join('\n')
    );
  });

  it('should omit the header when no source is given', () => {
    const report = new RunReport([UNCHANGED]);
    assert.strictEqual(
      formatRunReport(report, { color: false }),
      '✓ power-sleep: 0\n\nStatus: 1 unchanged, 0 converged, 0 planned, 0 failed, 0 skipped'
    );
  });

  it('should color the summary red when the run failed', () => {
    const lines = formatRunReport(new RunReport([NO_ROOT])).split('\n');
    assert.strictEqual(lines[2], '\x1b[31mStatus: 0 unchanged, 0 converged, 0 planned, 1 failed, 0 skipped\x1b[0m');
  });
});

describe('buildJsonReport', () => {
  it('should carry status, states and errors per outcome', () => {
    const unknown = outcome({
      resourceId: 'firewall-enabled',
      type: 'firewall-state',
      startState: UNKNOWN,
      action: 'none',
      result: 'failed',
      reason: 'ProbeError',
      error: 'Current state could not be determined',
    });
    const json = buildJsonReport(new RunReport([CONVERGED, unknown]), '/etc/provision.yaml');

    assert.strictEqual(json.success, false);
    assert.strictEqual(json.dryRun, false);
    assert.strictEqual(json.config, '/etc/provision.yaml');
    assert.deepStrictEqual(json.counts, { unchanged: 0, converged: 1, planned: 0, failed: 1, skipped: 0 });
    assert.deepStrictEqual(json.outcomes[0], {
      resourceId: 'filevault',
      type: 'test',
      status: 'converged',
      action: 'applied',
      result: 'success',
      reason: undefined,
      startState: 'on',
      endState: 'off',
      target: 'off',
      error: undefined,
      hint: undefined,
      blockedBy: undefined,
      durationMs: 12,
    });
    assert.strictEqual(json.outcomes[1].startState, 'unknown');
    assert.strictEqual(json.outcomes[1].status, 'failed');
  });

  it('should survive JSON serialization', () => {
    const json = buildJsonReport(new RunReport([UNCHANGED]));
    const parsed: unknown = JSON.parse(JSON.stringify(json));
    assert.deepStrictEqual(parsed, {
      success: true,
      dryRun: false,
      config: null,
      counts: { unchanged: 1, converged: 0, planned: 0, failed: 0, skipped: 0 },
      outcomes: [
        {
          resourceId: 'power-sleep',
          type: 'test',
          status: 'unchanged',
          action: 'none',
          result: 'success',
          startState: 0,
          endState: 0,
          durationMs: 5,
        },
      ],
    });
  });
});
