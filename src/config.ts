import os from 'os';
import { ZodError, z } from 'zod';
import { ConfigValidationError, InvalidInputError } from './errors';

const configSchema = z.object({
    CREATE3_WORKERS: z.coerce.number().int().positive().default(os.cpus().length || 1),
    CREATE3_POOL: z.enum(['cluster', 'inline']).default('cluster'),
    CREATE3_BATCH_SIZE: z.coerce.number().int().positive().default(1000),
    CREATE3_PROGRESS_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
    CREATE3_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

const positiveInt = z.number().int().positive();

const tuningSchema = z.object({
    workers: positiveInt.optional(),
    batchSize: positiveInt.optional(),
    progressIntervalMs: positiveInt.optional(),
    maxAttempts: positiveInt.optional(),
});

export type Tuning = z.infer<typeof tuningSchema>;

/** Applies the environment's numeric rules to options passed in code. */
export function assertTuning(tuning: Tuning) {
    const parsed = tuningSchema.safeParse(tuning);
    if (!parsed.success) {
        const invalid = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
        throw new InvalidInputError(`invalid options: ${invalid.join(', ')}.`, { invalid });
    }
}

export type PoolKind = z.infer<typeof configSchema>['CREATE3_POOL'];

export interface Config {
    workers: number;
    pool: PoolKind;
    batchSize: number;
    progressIntervalMs: number;
    maxAttempts: number | undefined;
    logLevel: string;
}

let cached: Config | null = null;

export function parseConfig(env: NodeJS.ProcessEnv): Config {
    try {
        const parsed = configSchema.parse(env);
        return {
            workers: parsed.CREATE3_WORKERS,
            pool: parsed.CREATE3_POOL,
            batchSize: parsed.CREATE3_BATCH_SIZE,
            progressIntervalMs: parsed.CREATE3_PROGRESS_INTERVAL_MS,
            maxAttempts: parsed.CREATE3_MAX_ATTEMPTS,
            logLevel: parsed.LOG_LEVEL,
        };
    } catch (error) {
        if (error instanceof ZodError) {
            const invalid = [...new Set(error.issues.map((issue) => issue.path.join('.')))];
            throw new ConfigValidationError({ invalid });
        }
        throw error;
    }
}

/** Reads process.env once; later calls return the same object. */
export function loadConfig(): Config {
    if (cached === null) {
        cached = parseConfig(process.env);
    }
    return cached;
}

export function resetConfig() {
    cached = null;
}
