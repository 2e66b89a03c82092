/**
 * Drift Runner
 *
 * Checks many resources with a fixed pool of workers pulling ids from a
 * shared queue. Each check fetches the live tree, resolves the declared
 * tree and classifies the differences. One check failing never stops the
 * others; an abort signal stops new checks from starting.
 */

import { ConfigurationError, ValidationError, errorMessage } from '../../core/errors.js';
import { logger as rootLogger, type Logger } from '../../core/logger.js';
import type { MapValue } from '../../models/config-value.js';
import {
  DEFAULT_ATTRIBUTES,
  type AttributePath,
  type DriftReport,
  type ListMatching,
  type SourceLabels
} from '../../models/drift.js';
import { detectDrift } from '../comparison/drift-classifier.js';
import type { DeclaredConfigResolver } from '../declared/declared-resolver.js';
import type { LiveResourceFetcher } from '../live/live-fetcher.js';
import type { IMetricsService } from '../metrics/metrics-service.js';

export const DEFAULT_CONCURRENCY = 5;

/** Which step of a check failed */
export type CheckStage = 'fetch' | 'resolve' | 'compare';

export interface CheckSucceeded {
  status: 'ok';
  resourceId: string;
  report: DriftReport;
}

export interface CheckFailed {
  status: 'failed';
  resourceId: string;
  stage: CheckStage;
  error: Error;
}

export interface CheckCancelled {
  status: 'cancelled';
  resourceId: string;
}

export type CheckOutcome = CheckSucceeded | CheckFailed | CheckCancelled;

export interface RunOptions {
  concurrency?: number;
  signal?: AbortSignal;
  /** Called once per id as its outcome becomes known */
  onOutcome?: (outcome: CheckOutcome) => void;
}

export interface RunSummary {
  /** Outcomes keyed by id, in submission order */
  outcomes: ReadonlyMap<string, CheckOutcome>;
  reports: DriftReport[];
  failed: CheckFailed[];
  cancelled: string[];
  /** True only when every id was checked */
  succeeded: boolean;
}

export interface DriftRunnerOptions {
  fetcher: LiveResourceFetcher;
  resolver: DeclaredConfigResolver;
  attributes?: readonly AttributePath[];
  listMatching?: ListMatching;
  /** Display labels; defaults to the fetcher's and resolver's labels */
  sources?: SourceLabels;
  metrics?: IMetricsService;
  logger?: Logger;
  now?: () => Date;
}

class StageError extends Error {
  constructor(readonly stage: CheckStage, readonly original: Error) {
    super(original.message);
  }
}

export class DriftRunner {
  private fetcher: LiveResourceFetcher;
  private resolver: DeclaredConfigResolver;
  private attributes: readonly AttributePath[];
  private listMatching?: ListMatching;
  private sources: SourceLabels;
  private metrics?: IMetricsService;
  private logger: Logger;
  private now: () => Date;

  constructor(options: DriftRunnerOptions) {
    this.fetcher = options.fetcher;
    this.resolver = options.resolver;
    this.attributes = options.attributes ?? DEFAULT_ATTRIBUTES;
    this.listMatching = options.listMatching;
    this.sources = options.sources ?? { a: options.fetcher.label, b: options.resolver.label };
    this.metrics = options.metrics;
    this.logger = options.logger ?? rootLogger.child('runner');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Check every id, at most `concurrency` at a time. Duplicate ids are
   * checked once.
   *
   * @throws ConfigurationError when no ids are given
   * @throws ValidationError when concurrency is not a positive integer
   */
  async run(resourceIds: readonly string[], options: RunOptions = {}): Promise<RunSummary> {
    const ids = [...new Set(resourceIds)];
    if (ids.length === 0) {
      throw new ConfigurationError('At least one resource id is required');
    }

    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError(`Concurrency must be a positive integer, got ${concurrency}`, 'concurrency');
    }

    const { signal, onOutcome } = options;
    const completed = new Map<string, CheckOutcome>();
    const queue = ids.values();

    const worker = async (): Promise<void> => {
      for (;;) {
        if (signal?.aborted) return;
        const next = queue.next();
        if (next.done) return;
        const outcome = await this.check(next.value, signal);
        completed.set(next.value, outcome);
        this.notify(onOutcome, outcome);
      }
    };

    const workerCount = Math.min(concurrency, ids.length);
    this.logger.debug(`Checking ${ids.length} resource(s) with ${workerCount} worker(s)`);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const outcomes = new Map<string, CheckOutcome>();
    for (const id of ids) {
      let outcome = completed.get(id);
      if (!outcome) {
        outcome = { status: 'cancelled', resourceId: id };
        this.notify(onOutcome, outcome);
      }
      outcomes.set(id, outcome);
    }

    return summarize(outcomes);
  }

  /**
   * Run one check. Never rejects: failures become outcomes.
   */
  async check(resourceId: string, signal?: AbortSignal): Promise<CheckOutcome> {
    const started = Date.now();
    try {
      const live = await this.stage('fetch', () => this.fetcher.fetch(resourceId, signal));
      signal?.throwIfAborted();
      const declared = await this.stage('resolve', () => this.resolver.resolve(resourceId));
      const report = await this.stage('compare', async () => this.compare(resourceId, live, declared));

      this.metrics?.recordDriftCheck((Date.now() - started) / 1000);
      for (const attribute of report.records.keys()) {
        this.metrics?.recordDriftDetected(attribute);
      }

      if (report.records.size > 0) {
        this.logger.warn(
          `${resourceId}: drift detected in ${report.records.size} attribute(s): ${[...report.records.keys()].join(', ')}`
        );
      } else {
        this.logger.info(`${resourceId}: no drift detected`);
      }
      return { status: 'ok', resourceId, report };
    } catch (error) {
      if (signal?.aborted) {
        this.logger.debug(`${resourceId}: cancelled`);
        return { status: 'cancelled', resourceId };
      }

      const stage = error instanceof StageError ? error.stage : 'compare';
      const cause = error instanceof StageError ? error.original : toError(error);
      this.logger.exception(`Error processing ${resourceId}: ${STAGE_PREFIX[stage]}${cause.message}`, cause);
      return { status: 'failed', resourceId, stage, error: cause };
    }
  }

  // A throwing listener must not abandon the other workers
  private notify(onOutcome: RunOptions['onOutcome'], outcome: CheckOutcome): void {
    try {
      onOutcome?.(outcome);
    } catch (error) {
      this.logger.warn(`Outcome listener failed for ${outcome.resourceId}: ${errorMessage(error)}`);
    }
  }

  private compare(resourceId: string, live: MapValue, declared: MapValue): DriftReport {
    return detectDrift(resourceId, live, declared, {
      attributes: this.attributes,
      sources: this.sources,
      listMatching: this.listMatching,
      now: this.now
    });
  }

  private async stage<T>(stage: CheckStage, step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (error) {
      throw new StageError(stage, toError(error));
    }
  }
}

const STAGE_PREFIX: Record<CheckStage, string> = {
  fetch: 'failed to get live configuration: ',
  resolve: 'failed to read declared configuration: ',
  compare: ''
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

function summarize(outcomes: ReadonlyMap<string, CheckOutcome>): RunSummary {
  const reports: DriftReport[] = [];
  const failed: CheckFailed[] = [];
  const cancelled: string[] = [];

  for (const outcome of outcomes.values()) {
    switch (outcome.status) {
      case 'ok':
        reports.push(outcome.report);
        break;
      case 'failed':
        failed.push(outcome);
        break;
      case 'cancelled':
        cancelled.push(outcome.resourceId);
        break;
    }
  }

  return {
    outcomes,
    reports,
    failed,
    cancelled,
    succeeded: failed.length === 0 && cancelled.length === 0
  };
}
