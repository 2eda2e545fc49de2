import { describe, expect, it } from 'vitest';
import { logDestination, makeLogger, makeNoopLogger } from '../src/logger';

describe('logDestination', () => {
    it('maps targets to file descriptors', () => {
        expect(logDestination('stdout').fd).toBe(1);
        expect(logDestination('stderr').fd).toBe(2);
    });
});

describe('makeLogger', () => {
    it('stays silent in tests', () => {
        expect(makeLogger({ module: 'test' }, 'error', 'stderr').isLevelEnabled('error')).toBe(false);
        expect(makeNoopLogger().isLevelEnabled('error')).toBe(false);
    });
});
