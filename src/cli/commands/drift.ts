// Drift detection command for the infra-drift CLI

import { Command } from 'commander';
import * as fs from 'fs/promises';
import { ConfigurationError, ValidationError } from '../../core/errors.js';
import { logger, parseLogLevel } from '../../core/logger.js';
import { DriftRunOptionsSchema, formatZodError, type DriftRunOptions } from '../../core/schemas.js';
import type { MapValue } from '../../models/config-value.js';
import type { SourceLabels } from '../../models/drift.js';
import { ConfigService, type ResolvedSettings } from '../../services/config/config-service.js';
import { createDeclaredResolver } from '../../services/declared/declared-resolver.js';
import { StateSnapshotFetcher } from '../../services/declared/state-snapshot-fetcher.js';
import { SdkEc2Api, type Ec2Api } from '../../services/live/ec2-api.js';
import { Ec2InstanceFetcher } from '../../services/live/ec2-fetcher.js';
import type { LiveResourceFetcher } from '../../services/live/live-fetcher.js';
import { MetricsService } from '../../services/metrics/metrics-service.js';
import { renderReports, renderRunSummary } from '../../services/output/report-formatter.js';
import { DriftRunner, type RunSummary } from '../../services/runner/drift-runner.js';
import { TtlCache } from '../../services/storage/cache.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { ProgressReporter, type ProgressStream } from '../utils/progress.js';

/**
 * Flags as commander hands them over
 */
export interface DriftCommandFlags {
  instances?: string[];
  state?: string;
  config?: string;
  attributes?: string[];
  concurrency?: string;
  output?: string;
  region?: string;
  logLevel?: string;
  settings?: string;
  simulate?: boolean;
  targetState?: string;
  metricsOut?: string;
  progress?: boolean;
}

/**
 * Process surroundings, replaceable in tests
 */
export interface DriftCommandContext {
  stdout: ProgressStream;
  stderr: ProgressStream;
  cwd: string;
  /** Builds the EC2 port; defaults to the AWS SDK client */
  createEc2Api?: (region?: string) => Ec2Api & { destroy?: () => void };
  signal?: AbortSignal;
}

/**
 * Registers the drift command
 *
 * Supports:
 * - infra-drift drift -i <ids...> (-s <state> | -c <path>) [options]
 * - infra-drift drift -i <ids...> -s <source> -t <target> --simulate
 */
export function registerDriftCommand(program: Command): void {
  program
    .command('drift')
    .description('Detect configuration drift between live EC2 instances and Terraform')
    .requiredOption('-i, --instances <ids...>', 'Instance IDs to check (comma-separated or multiple flags)')
    .option('-s, --state <file>', 'Path to a Terraform state file')
    .option('-c, --config <path>', 'Path to a .tf file or a directory of Terraform configuration')
    .option('-a, --attributes <names...>', 'Attributes to check (comma-separated or multiple flags)')
    .option('-n, --concurrency <n>', 'Maximum number of concurrent checks')
    .option('-o, --output <format>', 'Output format: text, json or yaml')
    .option('--region <region>', 'AWS region (defaults to the SDK provider chain)')
    .option('--log-level <level>', 'Log level: debug, info, warn, error or silent')
    .option('--settings <file>', 'Settings file (default: ./.infra-drift.yaml)')
    .option('--simulate', 'Compare two state files instead of querying AWS')
    .option('-t, --target-state <file>', 'Target state file for simulation mode')
    .option('--metrics-out <file>', 'Write a metrics snapshot (.prom for Prometheus text, JSON otherwise)')
    .option('--no-progress', 'Disable the progress line')
    .addHelpText(
      'after',
      '\nSimulation mode compares two state files without AWS access:\n' +
        '  infra-drift drift -i INSTANCE_ID -s SOURCE_STATE -t TARGET_STATE --simulate'
    )
    .action(
      withErrorHandling(async (flags: DriftCommandFlags) => {
        process.exitCode = await runDriftCommand(flags, {
          stdout: process.stdout,
          stderr: process.stderr,
          cwd: process.cwd()
        });
      })
    );
}

/**
 * Runs a drift check end to end and returns the exit code: 0 when
 * every resource was checked, 1 when any failed or was cancelled.
 *
 * @throws ValidationError or ConfigurationError for unusable options
 */
export async function runDriftCommand(flags: DriftCommandFlags, context: DriftCommandContext): Promise<number> {
  const settings = await new ConfigService({ settingsPath: flags.settings, cwd: context.cwd }).resolve();
  const options = resolveOptions(flags, settings);
  logger.setLevel(parseLogLevel(options.logLevel));
  checkSources(options);

  const metrics = new MetricsService();
  const resolver = createDeclaredResolver({
    statePath: options.statePath,
    configPath: options.configPath,
    resourceType: settings.resourceType,
    matchAttribute: settings.matchAttribute
  });

  const live = createFetcher(options, settings, metrics, context);
  const sources: SourceLabels | undefined = options.simulate ? { a: 'target state', b: 'source state' } : undefined;
  const runner = new DriftRunner({
    fetcher: live.fetcher,
    resolver,
    attributes: options.attributes,
    listMatching: settings.listMatching,
    sources,
    metrics
  });

  const controller = new AbortController();
  const onSignal = (): void => {
    logger.warn('Interrupted, cancelling remaining checks');
    controller.abort();
  };
  const onExternalAbort = (): void => controller.abort();
  if (context.signal?.aborted) {
    controller.abort();
  }
  context.signal?.addEventListener('abort', onExternalAbort, { once: true });
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const progress = new ProgressReporter({ stream: context.stderr, enabled: options.progress });
  let summary: RunSummary;
  try {
    progress.start(new Set(options.instances).size);
    summary = await runner.run(options.instances, {
      concurrency: options.concurrency,
      signal: controller.signal,
      onOutcome: outcome => progress.update(outcome)
    });
  } finally {
    progress.finish();
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
    context.signal?.removeEventListener('abort', onExternalAbort);
    live.dispose();
  }

  writeResults(summary, options, context);

  if (options.metricsOut) {
    const format = options.metricsOut.endsWith('.prom') ? 'prometheus' : 'json';
    await fs.writeFile(options.metricsOut, metrics.exportMetrics(format), 'utf-8');
    logger.debug(`Wrote metrics to ${options.metricsOut}`);
  }

  return summary.succeeded ? 0 : 1;
}

/**
 * Merges flags over settings and validates the result
 */
export function resolveOptions(flags: DriftCommandFlags, settings: ResolvedSettings): DriftRunOptions {
  const instances = parseMultipleValues(flags.instances ?? []);
  if (instances.length === 0) {
    throw new ConfigurationError('At least one instance ID is required');
  }

  const candidate = {
    instances,
    statePath: flags.state,
    configPath: flags.config,
    simulate: flags.simulate ?? false,
    targetStatePath: flags.targetState,
    attributes: flags.attributes ? parseMultipleValues(flags.attributes) : [...settings.attributes],
    concurrency: flags.concurrency !== undefined ? Number(flags.concurrency) : settings.concurrency,
    output: flags.output?.toLowerCase() ?? settings.output,
    logLevel: flags.logLevel?.toLowerCase() ?? settings.logLevel,
    region: flags.region ?? settings.region,
    metricsOut: flags.metricsOut,
    progress: flags.progress ?? true
  };

  const result = DriftRunOptionsSchema.safeParse(candidate);
  if (!result.success) {
    const field = result.error.issues[0]?.path.join('.');
    throw new ValidationError(`Invalid options: ${formatZodError(result.error)}`, field || undefined);
  }
  return result.data;
}

function checkSources(options: DriftRunOptions): void {
  if (options.simulate) {
    if (!options.statePath || !options.targetStatePath) {
      throw new ConfigurationError('Both source and target state files are required for simulation mode');
    }
    if (options.configPath) {
      throw new ConfigurationError('Simulation mode compares state files; --config cannot be used with --simulate');
    }
    return;
  }

  if (options.targetStatePath) {
    throw new ConfigurationError('--target-state is only used with --simulate');
  }
  if (!options.statePath && !options.configPath) {
    throw new ConfigurationError('Either Terraform state file or HCL configuration path is required');
  }
}

interface LiveSource {
  fetcher: LiveResourceFetcher;
  dispose: () => void;
}

function createFetcher(
  options: DriftRunOptions,
  settings: ResolvedSettings,
  metrics: MetricsService,
  context: DriftCommandContext
): LiveSource {
  if (options.simulate && options.targetStatePath) {
    return {
      fetcher: new StateSnapshotFetcher(options.targetStatePath, { resourceType: settings.resourceType }),
      dispose: () => undefined
    };
  }

  const api = context.createEc2Api ? context.createEc2Api(options.region) : SdkEc2Api.forRegion(options.region);
  const fetcher = new Ec2InstanceFetcher({
    api,
    retryPolicy: settings.retry,
    cache: new TtlCache<MapValue>({
      ttl: settings.cache.ttlMs,
      maxEntries: settings.cache.maxEntries,
      enabled: settings.cache.ttlMs > 0
    }),
    metrics
  });
  return { fetcher, dispose: () => api.destroy?.() };
}

function writeResults(summary: RunSummary, options: DriftRunOptions, context: DriftCommandContext): void {
  if (options.output !== 'text' || summary.reports.length > 0) {
    const rendered = renderReports(summary.reports, options.output);
    context.stdout.write(rendered.endsWith('\n') ? rendered : `${rendered}\n`);
  }

  if (!summary.succeeded || summary.outcomes.size > 1) {
    context.stderr.write(renderRunSummary(summary));
  }
}

/**
 * Parse multiple values from command line options
 * Handles both comma-separated and multiple flag formats
 */
export function parseMultipleValues(values: readonly string[]): string[] {
  const result: string[] = [];
  for (const value of values) {
    const parts = value.split(',').map(p => p.trim()).filter(p => p.length > 0);
    result.push(...parts);
  }
  return result;
}
