import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { HistoricalTableStore, RawRecord } from '@stratum/types';
import {
  CommitError,
  ConfigurationError,
  PipelineAbortedError,
  createLogger,
  getErrorMessage,
  isError,
} from '@stratum/shared';
import { ScdMergeEngine } from '../scd/ScdMergeEngine';
import { CleansingBuilder } from '../validation/CleansingBuilder';
import type { CleansingBuilderOptions } from '../validation/CleansingBuilder';
import type {
  BatchCommittedEvent,
  BatchFailedEvent,
  BatchStartedEvent,
  PipelineRunOptions,
  PipelineRunResult,
  TableDefinition,
} from '../types';
import { KeyedLock } from './KeyedLock';

export const PipelineOptionsSchema = z.object({
  maxAttempts: z.number().int().min(1).max(5).default(1),
  failOnIntegrityError: z.boolean().default(false),
});

export type PipelineOptions = z.output<typeof PipelineOptionsSchema>;

export interface PipelineDependencies {
  store: HistoricalTableStore;
  lock?: KeyedLock;
  cleansing?: CleansingBuilderOptions;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PipelineAbortedError(undefined, signal.reason);
  }
}

/**
 * Pipeline Orchestrator - runs one table's batches from raw records to
 * committed history
 *
 * Each batch is cleansed, the business keys it touches are locked, their
 * history is loaded and merged, and the resulting delta is committed
 * atomically. A rejected commit is retried from the cleansed batch against
 * freshly loaded history. Aborting before the commit leaves the store
 * untouched.
 *
 * Events: batchStarted, batchCommitted, batchAborted, batchFailed
 */
export class PipelineOrchestrator extends EventEmitter {
  private readonly options: PipelineOptions;
  private readonly builder: CleansingBuilder;
  private readonly engine: ScdMergeEngine;
  private readonly store: HistoricalTableStore;
  private readonly lock: KeyedLock;
  private readonly logger = createLogger('PipelineOrchestrator');

  constructor(
    readonly definition: TableDefinition,
    dependencies: PipelineDependencies,
    options: z.input<typeof PipelineOptionsSchema> = {}
  ) {
    super();

    const parsed = PipelineOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid pipeline options: ${parsed.error.message}`, parsed.error);
    }
    this.options = parsed.data;

    this.builder = new CleansingBuilder(definition.cleansing, dependencies.cleansing);
    this.engine = new ScdMergeEngine(definition.scd);
    this.store = dependencies.store;
    this.lock = dependencies.lock ?? new KeyedLock();

    this.logger.info('PipelineOrchestrator initialized', {
      table: this.engine.table,
      maxAttempts: this.options.maxAttempts,
    });
  }

  async processBatch(records: readonly RawRecord[], runOptions: PipelineRunOptions = {}): Promise<PipelineRunResult> {
    const runId = runOptions.runId ?? randomUUID();
    const table = this.engine.table;
    const { signal } = runOptions;

    const started: BatchStartedEvent = { runId, table, records: records.length };
    this.emit('batchStarted', started);

    try {
      throwIfAborted(signal);

      const { records: cleansed, summary } = this.builder.cleanse(records);
      const keys = new Set<string>();
      for (const record of cleansed) {
        const key = this.engine.businessKeyOf(record);
        if (key !== null) keys.add(key);
      }

      return await this.lock.runExclusive(keys, async () => {
        let lastError: unknown;

        for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
          throwIfAborted(signal);

          const history = await this.store.loadHistory(table, [...keys]);
          const merge = this.engine.merge(cleansed, history);

          if (this.options.failOnIntegrityError && merge.integrityErrors.length > 0) {
            throw merge.integrityErrors[0];
          }

          throwIfAborted(signal);

          try {
            if (merge.delta.inserts.length > 0 || merge.delta.closes.length > 0) {
              await this.store.commit(table, merge.delta);
            }
          } catch (error) {
            lastError = error;
            this.logger.warn('Commit attempt failed', {
              runId,
              table,
              attempt,
              error: getErrorMessage(error),
            });
            continue;
          }

          const committed: BatchCommittedEvent = {
            runId,
            table,
            attempts: attempt,
            inserted: merge.delta.inserts.length,
            closed: merge.delta.closes.length,
          };
          this.emit('batchCommitted', committed);
          this.logger.info('Batch committed', { ...committed, rejected: merge.rejected.length });

          return { runId, table, attempts: attempt, quality: summary, merge };
        }

        throw new CommitError(
          `Commit to ${table} failed after ${this.options.maxAttempts} attempt(s): ${getErrorMessage(lastError)}`,
          lastError
        );
      });
    } catch (error) {
      const failure = isError(error) ? error : new Error(getErrorMessage(error));
      const event: BatchFailedEvent = { runId, table, error: failure };

      if (failure instanceof PipelineAbortedError) {
        this.logger.error('Batch aborted before commit', { runId, table });
        this.emit('batchAborted', event);
      } else {
        this.logger.error('Batch failed', { runId, table, error: failure.message });
        this.emit('batchFailed', event);
      }
      throw failure;
    }
  }
}
