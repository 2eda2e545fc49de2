import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export type LogTarget = 'stdout' | 'stderr';

export function logDestination(target: LogTarget) {
    return pino.destination({ dest: target === 'stderr' ? 2 : 1, sync: true });
}

/**
 * JSON logger, on stdout unless told otherwise. The CLI logs to stderr so its
 * result lines stay alone on stdout. Silent under Vitest or NODE_ENV=test;
 * pipe through pino-pretty for human-readable output.
 */
export function makeLogger(bindings?: Record<string, unknown>, level?: string, target: LogTarget = 'stdout'): Logger {
    const isTest = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

    return pino(
        {
            level: level ?? process.env.LOG_LEVEL ?? 'info',
            enabled: !isTest,
            base: { ...bindings, app: 'create3-vanity', pid: process.pid },
            messageKey: 'msg',
            timestamp: pino.stdTimeFunctions.isoTime,
        },
        logDestination(target),
    );
}

export function makeNoopLogger(): Logger {
    return pino({ enabled: false });
}
