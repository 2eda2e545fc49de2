import { getBytes, hexlify } from 'ethers';
import { assertTuning } from './config';
import { deriveAddressBytes } from './deriver';
import { InvalidCountError, InvalidInputLengthError, SearchAbortedError, SearchExhaustedError } from './errors';
import { ADDRESS_LENGTH, checksumEncode } from './hash';
import { makeNoopLogger } from './logger';
import type { Logger } from './logger';
import { matchesPrefix, normalizePrefix } from './matcher';
import type { SearchJob, SearchResult } from './messages';
import SaltCodec from './salt';

export type { SearchJob, SearchResult } from './messages';

export const MAX_BATCH_COUNT = 10_000;

export interface SearchRequest {
    deployer: Uint8Array;
    prefix: string;
    saltPrefix?: string;
    count: number;
}

export interface SearchProgress {
    attempts: number;
    found: number;
    elapsedMs: number;
    // attempts per second
    rate: number;
}

export interface SearchReport {
    results: SearchResult[];
    attempts: number;
    elapsedMs: number;
}

export interface SearchOptions {
    batchSize: number;
    progressIntervalMs: number;
    maxAttempts?: number;
    signal?: AbortSignal;
    onProgress?: (progress: SearchProgress) => void;
    onResult?: (result: SearchResult, index: number) => void;
}

/** Where workers deliver hits and attempt counts. */
export interface SearchSink {
    accept(result: SearchResult): void;
    progress(attempts: number): void;
}

export interface WorkerPool {
    /** Resolves once every worker has stopped after `signal` aborts. */
    run(job: SearchJob, sink: SearchSink, signal: AbortSignal): Promise<void>;
}

export function tryCandidate(deployer: Uint8Array, prefix: string, saltPrefix?: string): SearchResult | undefined {
    const salt = saltPrefix === undefined ? SaltCodec.randomSaltString() : SaltCodec.withPrefix(saltPrefix);
    const saltBytes = SaltCodec.toSaltBytes(salt);
    const address = deriveAddressBytes(deployer, saltBytes);

    if (!matchesPrefix(hexlify(address), prefix)) {
        return undefined;
    }
    return { salt, address: checksumEncode(address), digestHex: hexlify(saltBytes) };
}

/**
 * Runs up to `job.batchSize` attempts, checking `shouldStop` before each one.
 * Returns the number of attempts made.
 */
export function runBatch(job: SearchJob, shouldStop: () => boolean, onHit: (result: SearchResult) => void): number {
    const deployer = getBytes(job.deployer);
    let attempts = 0;

    while (attempts < job.batchSize && !shouldStop()) {
        attempts++;
        const result = tryCandidate(deployer, job.prefix, job.saltPrefix);
        if (result !== undefined) {
            onHit(result);
        }
    }
    return attempts;
}

/** Append-only, bounded at `capacity`, one entry per salt. */
export class ResultCollector {
    private readonly results: SearchResult[] = [];
    private readonly salts = new Set<string>();

    constructor(readonly capacity: number) {}

    get size(): number {
        return this.results.length;
    }

    get full(): boolean {
        return this.results.length >= this.capacity;
    }

    offer(result: SearchResult): boolean {
        if (this.full || this.salts.has(result.salt)) {
            return false;
        }
        this.salts.add(result.salt);
        this.results.push(result);
        return true;
    }

    toArray(): SearchResult[] {
        return [...this.results];
    }
}

export function assertCount(count: number) {
    if (!Number.isInteger(count) || count < 1 || count > MAX_BATCH_COUNT) {
        throw new InvalidCountError(count, MAX_BATCH_COUNT);
    }
}

export class VanitySearchEngine {
    constructor(
        private readonly pool: WorkerPool,
        private readonly logger: Logger = makeNoopLogger(),
    ) {}

    async search(request: SearchRequest, options: SearchOptions): Promise<SearchReport> {
        if (request.deployer.length !== ADDRESS_LENGTH) {
            throw new InvalidInputLengthError('deployer', ADDRESS_LENGTH, request.deployer.length);
        }
        const prefix = normalizePrefix(request.prefix);
        assertCount(request.count);
        assertTuning({
            batchSize: options.batchSize,
            progressIntervalMs: options.progressIntervalMs,
            maxAttempts: options.maxAttempts,
        });
        if (request.saltPrefix !== undefined) {
            SaltCodec.assertSaltPrefix(request.saltPrefix);
        }
        if (options.signal?.aborted) {
            throw new SearchAbortedError(0);
        }

        const job: SearchJob = {
            deployer: hexlify(request.deployer),
            prefix,
            saltPrefix: request.saltPrefix,
            batchSize: options.batchSize,
        };
        const collector = new ResultCollector(request.count);
        const stop = new AbortController();
        const startedAt = Date.now();
        let attempts = 0;
        let exhausted = false;
        const failures: unknown[] = [];

        // A throwing callback ends the search with its error.
        const guard = (callback: () => void) => {
            try {
                callback();
            } catch (error) {
                failures.push(error);
                stop.abort();
            }
        };

        const snapshot = (): SearchProgress => {
            const elapsedMs = Date.now() - startedAt;
            return {
                attempts,
                found: collector.size,
                elapsedMs,
                rate: elapsedMs > 0 ? Math.floor((attempts / elapsedMs) * 1000) : 0,
            };
        };

        const sink: SearchSink = {
            accept: (result) => {
                if (stop.signal.aborted || !collector.offer(result)) {
                    return;
                }
                this.logger.debug({ salt: result.salt, address: result.address }, 'match found');
                const index = collector.size - 1;
                if (collector.full) {
                    stop.abort();
                }
                guard(() => options.onResult?.(result, index));
            },
            progress: (count) => {
                attempts += count;
                if (options.maxAttempts !== undefined && attempts >= options.maxAttempts && !collector.full) {
                    exhausted = true;
                    stop.abort();
                }
            },
        };

        const onCallerAbort = () => stop.abort();
        options.signal?.addEventListener('abort', onCallerAbort, { once: true });

        const timer = setInterval(() => {
            const progress = snapshot();
            this.logger.info(progress, 'search progress');
            guard(() => options.onProgress?.(progress));
        }, options.progressIntervalMs);
        timer.unref();

        this.logger.info({ deployer: job.deployer, prefix, saltPrefix: request.saltPrefix, count: request.count }, 'search started');

        try {
            await this.pool.run(job, sink, stop.signal);
        } catch (error) {
            stop.abort();
            throw error;
        } finally {
            clearInterval(timer);
            options.signal?.removeEventListener('abort', onCallerAbort);
        }

        if (failures.length > 0) {
            throw failures[0];
        }
        const { elapsedMs } = snapshot();
        if (collector.full) {
            this.logger.info({ attempts, elapsedMs, found: collector.size }, 'search finished');
            return { results: collector.toArray(), attempts, elapsedMs };
        }
        if (exhausted) {
            throw new SearchExhaustedError(attempts, collector.size, request.count);
        }
        throw new SearchAbortedError(attempts);
    }
}
