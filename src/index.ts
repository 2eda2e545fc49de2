import { getBytes } from 'ethers';
import { assertTuning, loadConfig } from './config';
import type { PoolKind } from './config';
import { derive } from './deriver';
import { InvalidInputError } from './errors';
import { makeLogger } from './logger';
import type { Logger } from './logger';
import type { SearchResult } from './messages';
import { ClusterPool } from './pool/cluster';
import { InlinePool } from './pool/inline';
import { VanitySearchEngine, assertCount } from './search';
import type { SearchProgress, SearchReport, WorkerPool } from './search';
import SaltCodec from './salt';

export * from './errors';
export { checksumEncode, keccak256 } from './hash';
export { PROXY_BYTECODE, PROXY_BYTECODE_HASH, computeChildAddress, computeProxyAddress, derive } from './deriver';
export { normalizePrefix, matchesPrefix } from './matcher';
export { ConsoleReporter, formatResult } from './report';
export type { ReportContext, ResultReporter } from './report';
export { ResultCollector, VanitySearchEngine } from './search';
export type { SearchJob, SearchProgress, SearchReport, SearchRequest, SearchResult, SearchSink, WorkerPool } from './search';
export { SaltCodec };

export interface FindOptions {
    workers?: number;
    pool?: PoolKind;
    batchSize?: number;
    maxAttempts?: number;
    progressIntervalMs?: number;
    signal?: AbortSignal;
    onProgress?: (progress: SearchProgress) => void;
    onResult?: (result: SearchResult, index: number) => void;
    logger?: Logger;
}

const DEPLOYER_HEX = /^[0-9a-fA-F]{40}$/;

/** Accepts 40 hex characters in any case, with or without a leading 0x. */
export function parseDeployer(deployerHex: string): Uint8Array {
    const hex = deployerHex.trim().replace(/^0x/i, '');
    if (!DEPLOYER_HEX.test(hex)) {
        throw new InvalidInputError('deployer address must be 40 hex characters.', { deployer: deployerHex });
    }
    return getBytes(`0x${hex}`);
}

export function createPool(kind: PoolKind, workers: number, logger: Logger): WorkerPool {
    return kind === 'cluster' ? new ClusterPool(workers, logger) : new InlinePool(workers);
}

export function deriveAddress(deployerHex: string, saltInput: string): string {
    return derive(parseDeployer(deployerHex), SaltCodec.manualSalt(saltInput));
}

async function runSearch(
    deployerHex: string,
    prefix: string,
    saltPrefix: string | undefined,
    count: number,
    options: FindOptions,
): Promise<SearchReport> {
    const deployer = parseDeployer(deployerHex);
    assertTuning(options);
    const config = loadConfig();
    const logger = options.logger ?? makeLogger({ module: 'search' }, config.logLevel);
    const pool = createPool(options.pool ?? config.pool, options.workers ?? config.workers, logger);
    const engine = new VanitySearchEngine(pool, logger);

    return engine.search(
        { deployer, prefix, saltPrefix, count },
        {
            batchSize: options.batchSize ?? config.batchSize,
            progressIntervalMs: options.progressIntervalMs ?? config.progressIntervalMs,
            maxAttempts: options.maxAttempts ?? config.maxAttempts,
            signal: options.signal,
            onProgress: options.onProgress,
            onResult: options.onResult,
        },
    );
}

export async function findVanitySalt(
    deployerHex: string,
    prefix: string,
    saltPrefix?: string,
    options: FindOptions = {},
): Promise<SearchResult> {
    const report = await runSearch(deployerHex, prefix, saltPrefix, 1, options);
    return report.results[0];
}

export async function findVanitySaltBatch(
    deployerHex: string,
    prefix: string,
    count: number,
    options: FindOptions = {},
): Promise<SearchResult[]> {
    assertCount(count);
    const report = await runSearch(deployerHex, prefix, undefined, count, options);
    return report.results;
}
