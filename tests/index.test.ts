import { describe, expect, it } from 'vitest';
import { InvalidCountError, InvalidInputError, InvalidPrefixError } from '../src/errors';
import { deriveAddress, findVanitySalt, findVanitySaltBatch, parseDeployer } from '../src/index';

const DEPLOYER = '5e17b14ADd6c386305A32928F985b29bbA34Eff5';
const inline = { pool: 'inline', workers: 2 } as const;

describe('parseDeployer', () => {
    it('accepts 40 hex characters with or without 0x', () => {
        expect(parseDeployer(DEPLOYER)).toHaveLength(20);
        expect(parseDeployer(`0x${DEPLOYER}`)).toEqual(parseDeployer(DEPLOYER.toLowerCase()));
    });

    it('rejects anything else', () => {
        expect(() => parseDeployer('xyz')).toThrow(InvalidInputError);
        expect(() => parseDeployer(DEPLOYER.slice(2))).toThrow('deployer address must be 40 hex characters.');
        expect(() => parseDeployer(`${DEPLOYER.slice(1)}g`)).toThrow(InvalidInputError);
    });
});

describe('deriveAddress', () => {
    it('hashes word salts', () => {
        expect(deriveAddress('0fC5025C764cE34df352757e82f7B5c4Df39A836', 'a')).toBe(
            '0xBFf47440D3A5E59714F1D995F8b105E2a04AB46A',
        );
        expect(deriveAddress(`0x${DEPLOYER}`, 'nacl')).toBe('0x34c89c17Db355828521872448f13A0FCa974fd05');
    });

    it('uses 64 hex characters as the raw salt', () => {
        expect(
            deriveAddress(
                'd8b934580fcE35a11B58C6D73aDeE468a2833fa8',
                '3ac225168df54212a25c1c01fd35bebfea408fdac2e31ddd6f80a4bbf9a5f1cb',
            ),
        ).toBe('0x442188F25da4ac213D55aE81F1BFB421a4eb4562');
    });
});

describe('findVanitySalt', () => {
    it('returns a salt whose address has the prefix', async () => {
        const found = await findVanitySalt(DEPLOYER, 'Ab', undefined, inline);
        expect(found.address.toLowerCase().slice(2, 4)).toBe('ab');
        expect(deriveAddress(DEPLOYER, found.salt)).toBe(found.address);
    });

    it('keeps the salt prefix', async () => {
        const found = await findVanitySalt(DEPLOYER, '7', 'testpfx_', inline);
        expect(found.salt).toMatch(/^testpfx_[A-Za-z0-9]{7}$/);
        expect(found.address.toLowerCase().startsWith('0x7')).toBe(true);
    });

    it('returns at once for an empty prefix', async () => {
        const found = await findVanitySalt(DEPLOYER, '', undefined, inline);
        expect(deriveAddress(DEPLOYER, found.salt)).toBe(found.address);
    });

    it('rejects bad input', async () => {
        await expect(findVanitySalt(DEPLOYER, 'zz', undefined, inline)).rejects.toBeInstanceOf(InvalidPrefixError);
        await expect(findVanitySalt('nope', 'a', undefined, inline)).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('rejects tuning options outside the positive integers before any pool starts', async () => {
        await expect(findVanitySalt(DEPLOYER, 'a', undefined, { pool: 'inline', workers: 0 })).rejects.toMatchObject({
            code: 'INVALID_INPUT',
            message: 'invalid options: workers.',
        });
        await expect(findVanitySalt(DEPLOYER, 'a', undefined, { pool: 'cluster', workers: 0 })).rejects.toBeInstanceOf(
            InvalidInputError,
        );
        await expect(
            findVanitySalt(DEPLOYER, 'a', undefined, { pool: 'cluster', workers: 1, batchSize: 0 }),
        ).rejects.toMatchObject({ message: 'invalid options: batchSize.' });
        await expect(
            findVanitySalt(DEPLOYER, 'a', undefined, { ...inline, maxAttempts: -1, progressIntervalMs: 0.5 }),
        ).rejects.toMatchObject({ meta: { invalid: ['progressIntervalMs', 'maxAttempts'] } });
    });

    it('rejects a salt prefix that could read back as a raw hex salt', async () => {
        await expect(findVanitySalt(DEPLOYER, '7', 'f'.repeat(57), inline)).rejects.toBeInstanceOf(InvalidInputError);
    });
});

describe('findVanitySaltBatch', () => {
    it('returns exactly count distinct matches', async () => {
        const results = await findVanitySaltBatch(DEPLOYER, 'c', 3, inline);
        expect(results).toHaveLength(3);
        expect(new Set(results.map((r) => r.salt)).size).toBe(3);
        for (const found of results) {
            expect(found.address.toLowerCase().startsWith('0xc')).toBe(true);
        }
    });

    it('rejects a zero or fractional count', async () => {
        await expect(findVanitySaltBatch(DEPLOYER, 'c', 0, inline)).rejects.toBeInstanceOf(InvalidCountError);
        await expect(findVanitySaltBatch(DEPLOYER, 'c', 1.5, inline)).rejects.toBeInstanceOf(InvalidCountError);
        await expect(findVanitySaltBatch(DEPLOYER, 'c', 10_001, inline)).rejects.toBeInstanceOf(InvalidCountError);
    });
});
