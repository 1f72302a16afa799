import pLimit from 'p-limit';
import { BatchEntry, BatchResult } from '../../types';
import { Logger } from '../../utils/logger';
import { FailureKind, ProviderRejectedError, toError } from '../../utils/errors';
import { RateLimiter } from '../../utils/rate_limiter';
import { ProviderClient } from '../providers/provider';
import { RetryPolicy, SleepFn } from '../providers/retry';
import { WordlistGenerator } from '../generators/wordlist_generator';

export interface BatchParams {
    targetLength: number;
    extraInstructions?: string;
}

export interface BatchProgress {
    completed: number;
    total: number;
    subBatch: number;
    subBatchCount: number;
}

export interface BatchOptions {
    batchSize?: number;
    /** Ceiling of outstanding provider calls. 1 = strictly sequential. */
    concurrency?: number;
    rateLimiter?: RateLimiter;
    stopOnError?: boolean;
    signal?: AbortSignal;
    /** Called in input order, once per seed set. Awaited before the next entry is emitted. */
    onResult?: (entry: BatchEntry, index: number) => void | Promise<void>;
    onProgress?: (progress: BatchProgress) => void;
    retryPolicy?: RetryPolicy;
    sleep?: SleepFn;
}

export const DEFAULT_BATCH_SIZE = 5;

function isAbortFailure(error: unknown): boolean {
    return error instanceof ProviderRejectedError && error.failure.kind === FailureKind.ABORTED;
}

/**
 * 📦 BATCH ORCHESTRATOR
 *
 * Runs one generation per seed set. A failing seed set becomes a `failed` entry
 * and never takes the rest of the batch down with it.
 */
export class BatchOrchestrator {
    constructor(
        private readonly generator: WordlistGenerator,
        private readonly provider: ProviderClient
    ) { }

    async run(seedSets: string[][], params: BatchParams, options: BatchOptions = {}): Promise<BatchResult> {
        const batchSize = Math.max(1, Math.floor(options.batchSize ?? DEFAULT_BATCH_SIZE));
        const limit = pLimit(Math.max(1, Math.floor(options.concurrency ?? 1)));
        const writeQueue = pLimit(1);
        const wordlistType = this.generator.definition.id;

        const total = seedSets.length;
        const subBatchCount = Math.ceil(total / batchSize);
        const entries = Array.from({ length: total }, (): BatchEntry | undefined => undefined);

        let nextToEmit = 0;
        let completed = 0;
        let stopped = false;
        let aborted = false;
        let callbackError: Error | undefined;

        const drain = async () => {
            while (nextToEmit < total) {
                const entry = entries[nextToEmit];
                if (!entry) return;
                const index = nextToEmit++;
                if (options.onResult && !callbackError) {
                    try {
                        await options.onResult(entry, index);
                    } catch (error) {
                        // A broken sink (disk full, closed pipe) ends the run.
                        callbackError = toError(error);
                        stopped = true;
                        Logger.logError('[Batch] Result handler failed, stopping batch', callbackError);
                    }
                }
            }
        };

        const settle = async (index: number, entry: BatchEntry) => {
            entries[index] = entry;
            completed++;
            await writeQueue(drain);
        };

        const processOne = async (index: number): Promise<void> => {
            const seeds = seedSets[index];

            if (options.signal?.aborted) {
                aborted = true;
                return settle(index, { status: 'skipped', seeds, reason: 'aborted' });
            }
            if (stopped) {
                return settle(index, { status: 'skipped', seeds, reason: 'stopped' });
            }

            if (options.rateLimiter) {
                const waitedMs = await options.rateLimiter.acquire(options.signal);
                if (waitedMs > 0) Logger.debug(`[Batch] Rate limiter held seed set ${index + 1} for ${waitedMs}ms`);
                if (options.signal?.aborted) {
                    aborted = true;
                    return settle(index, { status: 'skipped', seeds, reason: 'aborted' });
                }
            }

            try {
                const result = await this.generator.generate(
                    { wordlistType, seeds, targetLength: params.targetLength, extraInstructions: params.extraInstructions },
                    this.provider,
                    { signal: options.signal, retryPolicy: options.retryPolicy, sleep: options.sleep }
                );
                return settle(index, { status: 'fulfilled', seeds, result });
            } catch (error) {
                if (options.signal?.aborted && isAbortFailure(error)) {
                    aborted = true;
                    return settle(index, { status: 'skipped', seeds, reason: 'aborted' });
                }

                const err = toError(error);
                Logger.logError(`[Batch] Seed set ${index + 1}/${total} failed`, err, { wordlist_type: wordlistType });
                if (options.stopOnError) stopped = true;
                return settle(index, { status: 'failed', seeds, error: err });
            }
        };

        Logger.info(`📦 [Batch] ${total} seed set(s) of ${wordlistType} in ${subBatchCount} sub-batch(es)`);

        for (let subBatch = 0; subBatch < subBatchCount; subBatch++) {
            const start = subBatch * batchSize;
            const indices = Array.from({ length: Math.min(batchSize, total - start) }, (_, i) => start + i);

            await Promise.all(indices.map(index => limit(() => processOne(index))));

            options.onProgress?.({ completed, total, subBatch: subBatch + 1, subBatchCount });
            Logger.info(`[Batch] Sub-batch ${subBatch + 1}/${subBatchCount} done (${completed}/${total})`);
        }

        if (callbackError) throw callbackError;

        const done = entries.filter((entry): entry is BatchEntry => entry !== undefined);
        const result: BatchResult = {
            entries: done,
            succeeded: done.filter(entry => entry.status === 'fulfilled').length,
            failed: done.filter(entry => entry.status === 'failed').length,
            skipped: done.filter(entry => entry.status === 'skipped').length,
            aborted,
        };

        Logger.info(`🏁 [Batch] ${result.succeeded} succeeded, ${result.failed} failed, ${result.skipped} skipped`, {
            wordlist_type: wordlistType,
            aborted,
        });
        return result;
    }
}
