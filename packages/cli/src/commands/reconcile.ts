/**
 * Apply and plan commands - Run one reconciliation pass
 *
 * `apply` converges every resource; `plan` probes and diffs only.
 * Both exit 0 iff the run report is an overall success.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import {
  Reconciler,
  SpawnCommandRunner,
  buildResources,
  closeLogger,
  createLogger,
  detectPrivilegeContext,
  isLogLevel,
  loadConfig,
  ProvisionError,
} from '@provision/core';
import type { LogLevel, Logger, ProgressCallback, ResourceFactory, RunReport } from '@provision/core';
import type { CommandRunner, PrivilegeContext } from '@provision/types';
import { describeFatalError, exitWithError } from '../utils/errorFormatter.js';
import { buildJsonReport, formatRunReport } from '../utils/reportFormatter.js';
import { ProgressRenderer } from '../utils/progressRenderer.js';

export interface ReconcileOptions {
  config?: string;
  userOnly?: boolean;
  stopOnFailure?: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  logLevel?: string;
  logFile?: string;
}

/**
 * Collaborators a caller may replace; tests pass fakes for all of them.
 */
export interface ReconcileDeps {
  runner?: CommandRunner;
  privilege?: PrivilegeContext;
  logger?: Logger;
  cwd?: string;
  factories?: Readonly<Record<string, ResourceFactory>>;
  onProgress?: ProgressCallback;
}

export interface ReconcileRun {
  report: RunReport;
  /** Config file used, or null for the built-in defaults */
  source: string | null;
}

export function resolveLogLevel(options: Pick<ReconcileOptions, 'quiet' | 'verbose' | 'logLevel'>): LogLevel {
  if (isLogLevel(options.logLevel)) {
    return options.logLevel;
  }
  if (options.quiet) return 'silent';
  if (options.verbose) return 'info';
  return 'silent'; // Default: the report says it all
}

export function exitCodeFor(report: RunReport): number {
  return report.overallSuccess ? 0 : 1;
}

/**
 * Load config, build descriptors and run the engine once.
 *
 * @throws ConfigError when the config or the dependency graph is invalid;
 * nothing has been probed at that point
 */
export async function runReconciliation(
  options: ReconcileOptions,
  dryRun: boolean,
  deps: ReconcileDeps = {}
): Promise<ReconcileRun> {
  const logger = deps.logger ?? createLogger('silent');
  const loaded = loadConfig({ configPath: options.config, cwd: deps.cwd }, logger);
  const privilege = deps.privilege ?? detectPrivilegeContext();

  const registry = buildResources(
    loaded.config.resources,
    { home: privilege.home, configDir: loaded.configDir },
    deps.factories
  );

  const reconciler = new Reconciler({
    runner: deps.runner ?? new SpawnCommandRunner(logger),
    privilege,
    logger,
    readiness: loaded.config.settings.readiness,
    dryRun,
    userOnly: options.userOnly ?? false,
    stopOnFailure: options.stopOnFailure ?? loaded.config.settings.stopOnFailure,
    onProgress: deps.onProgress,
  });

  return { report: await reconciler.run(registry), source: loaded.source };
}

async function reconcileAction(options: ReconcileOptions, dryRun: boolean): Promise<void> {
  const logFile = options.logFile ? resolve(options.logFile) : undefined;
  const logger = createLogger(resolveLogLevel(options), logFile ? { logFile } : undefined);
  const renderer = !options.json && !options.quiet && process.stderr.isTTY ? new ProgressRenderer() : null;

  let fatal: ProvisionError | undefined;
  try {
    const { report, source } = await runReconciliation(options, dryRun, {
      logger,
      onProgress: renderer ? (info) => renderer.update(info) : undefined,
    });
    renderer?.finish();

    if (options.json) {
      console.log(JSON.stringify(buildJsonReport(report, source), null, 2));
    } else if (!options.quiet || !report.overallSuccess) {
      console.log(formatRunReport(report, { source, verbose: options.verbose, color: process.stdout.isTTY === true }));
    }
    process.exitCode = exitCodeFor(report);
  } catch (err) {
    if (!(err instanceof ProvisionError)) throw err;
    fatal = err;
  } finally {
    renderer?.finish();
    await closeLogger(logger);
  }

  if (fatal) {
    const { title, nextSteps } = describeFatalError(fatal);
    exitWithError(title, nextSteps);
  }
}

function reconcileCommand(name: string, description: string, dryRun: boolean): Command {
  return new Command(name)
    .description(description)
    .option('-c, --config <path>', 'Config file (default: ./provision.yaml, else built-in defaults)')
    .option('--user-only', 'Skip root-level resources instead of failing them')
    .option('--stop-on-failure', 'Stop after the first failed resource')
    .option('-j, --json', 'Output the run report as JSON')
    .option('-q, --quiet', 'Only print the report when something went wrong')
    .option('-v, --verbose', 'Show progress logs and per-resource timings')
    .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
    .option('--log-file <path>', 'Write all log output to a file')
    .action(async (options: ReconcileOptions) => {
      await reconcileAction(options, dryRun);
    });
}

export const applyCommand = reconcileCommand('apply', 'Converge every resource to its desired state', false)
  .addHelpText('after', `
Examples:
  sudo provision apply               Apply the full profile
  provision apply --user-only        Apply what can be done without root
  provision apply --json             Machine-readable run report
`);

export const planCommand = reconcileCommand('plan', 'Show what apply would change, without changing anything', true)
  .addHelpText('after', `
Examples:
  sudo provision plan                Probe everything and list pending changes
  provision plan -c ./provision.yaml
`);
