/**
 * Output formatting for reconciliation runs (`provision apply` / `provision plan`)
 */

import { UNKNOWN } from '@provision/types';
import type { ObservedState, OutcomeStatus, ReconciliationOutcome } from '@provision/types';
import { describeState, outcomeStatus } from '@provision/core';
import type { OutcomeCounts, RunReport } from '@provision/core';

// ANSI colors (matching existing CLI style)
const COLORS = {
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
};

type Color = keyof typeof COLORS;

const STATUS_STYLE: Record<OutcomeStatus, { icon: string; color: Color }> = {
  unchanged: { icon: '✓', color: 'green' },
  converged: { icon: '✓', color: 'cyan' },
  planned: { icon: '→', color: 'yellow' },
  failed: { icon: '✗', color: 'red' },
  skipped: { icon: '○', color: 'dim' },
};

const STATUS_ORDER: readonly OutcomeStatus[] = ['unchanged', 'converged', 'planned', 'failed', 'skipped'];

export interface ReportFormatOptions {
  /** Emit ANSI colors (default: true) */
  color?: boolean;
  /** Include per-resource durations */
  verbose?: boolean;
  /** Config file path, or null for the built-in defaults */
  source?: string | null;
}

function paint(text: string, color: Color, enabled: boolean): string {
  return enabled ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/**
 * One-line explanation of an outcome, without the resource id.
 */
export function describeOutcome(outcome: ReconciliationOutcome): string {
  switch (outcomeStatus(outcome)) {
    case 'unchanged':
      return describeState(outcome.endState);
    case 'converged':
      return `${describeState(outcome.startState)} → ${describeState(outcome.endState)}`;
    case 'planned':
      if (outcome.startState === undefined && outcome.blockedBy) {
        return `after ${outcome.blockedBy} is applied`;
      }
      return `${describeState(outcome.startState)} → ${describeState(outcome.target)}`;
    case 'failed':
      return outcome.error ? `${outcome.reason}: ${outcome.error}` : `${outcome.reason}`;
    case 'skipped':
      return describeSkip(outcome);
  }
}

function describeSkip(outcome: ReconciliationOutcome): string {
  switch (outcome.reason) {
    case 'SkippedDependencyFailed':
      return `dependency ${outcome.blockedBy} did not converge`;
    case 'DependencyExcluded':
      return `dependency ${outcome.blockedBy} was excluded`;
    case 'UserOnly':
      return 'requires root (excluded by --user-only)';
    case 'RunHalted':
      return 'not attempted (stopped after failure)';
    default:
      return 'skipped';
  }
}

/**
 * Format a single outcome for console output.
 */
export function formatOutcome(outcome: ReconciliationOutcome, options: ReportFormatOptions = {}): string {
  const color = options.color ?? true;
  const style = STATUS_STYLE[outcomeStatus(outcome)];
  let output = `${paint(style.icon, style.color, color)} ${outcome.resourceId}: ${describeOutcome(outcome)}`;

  if (options.verbose) {
    output += paint(` (${outcome.durationMs}ms)`, 'dim', color);
  }
  if (outcome.hint) {
    output += `\n  ${paint('→', 'dim', color)} ${outcome.hint}`;
  }

  return output;
}

export function formatCounts(counts: OutcomeCounts): string {
  return STATUS_ORDER.map(status => `${counts[status]} ${status}`).join(', ');
}

/**
 * Format full report for console.
 */
export function formatRunReport(report: RunReport, options: ReportFormatOptions = {}): string {
  const color = options.color ?? true;
  const lines: string[] = [];

  if (options.source !== undefined) {
    const origin = options.source ?? 'built-in defaults';
    lines.push(`${report.dryRun ? 'Planning' : 'Reconciling'} ${report.outcomes.length} resource(s) from ${origin}`);
    lines.push('');
  }

  for (const outcome of report.outcomes) {
    lines.push(formatOutcome(outcome, options));
  }

  lines.push('');
  const summary = `${report.dryRun ? 'Plan' : 'Status'}: ${formatCounts(report.counts())}`;
  lines.push(paint(summary, report.overallSuccess ? 'green' : 'red', color));

  if (report.outcomes.some(o => o.reason === 'InsufficientPrivilege')) {
    lines.push(`${paint('→', 'dim', color)} Re-run with sudo, or pass --user-only to skip root-level resources`);
  }

  return lines.join('\n');
}

/**
 * JSON-safe rendering of a state (UNKNOWN has no JSON form).
 */
export function jsonState(state: ObservedState | undefined): ObservedState | 'unknown' | undefined {
  return state === UNKNOWN ? 'unknown' : state;
}

export interface JsonOutcome {
  resourceId: string;
  type: string;
  status: OutcomeStatus;
  action: ReconciliationOutcome['action'];
  result: ReconciliationOutcome['result'];
  reason?: ReconciliationOutcome['reason'];
  startState?: unknown;
  endState?: unknown;
  target?: unknown;
  error?: string;
  hint?: string;
  blockedBy?: string;
  durationMs: number;
}

export interface JsonRunReport {
  success: boolean;
  dryRun: boolean;
  config: string | null;
  counts: OutcomeCounts;
  outcomes: JsonOutcome[];
}

/**
 * Build JSON report structure.
 */
export function buildJsonReport(report: RunReport, source: string | null = null): JsonRunReport {
  return {
    success: report.overallSuccess,
    dryRun: report.dryRun,
    config: source,
    counts: report.counts(),
    outcomes: report.outcomes.map(outcome => ({
      resourceId: outcome.resourceId,
      type: outcome.type,
      status: outcomeStatus(outcome),
      action: outcome.action,
      result: outcome.result,
      reason: outcome.reason,
      startState: jsonState(outcome.startState),
      endState: jsonState(outcome.endState),
      target: outcome.target,
      error: outcome.error,
      hint: outcome.hint,
      blockedBy: outcome.blockedBy,
      durationMs: outcome.durationMs,
    })),
  };
}
