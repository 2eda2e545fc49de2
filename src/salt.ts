import crypto from 'crypto';
import { getBytes, hexlify, toUtf8Bytes } from 'ethers';
import { InvalidInputError } from './errors';
import { keccak256 } from './hash';

export const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
export const DEFAULT_SALT_LENGTH = 10;
// Random tail appended to a user-chosen salt prefix.
export const PREFIXED_SALT_TAIL_LENGTH = 7;

const RAW_SALT = /^(0x)?[0-9a-fA-F]{64}$/;

const SaltCodec = {
    randomSaltString(length: number = DEFAULT_SALT_LENGTH, charset: string = ALPHANUMERIC): string {
        if (!Number.isInteger(length) || length <= 0) {
            throw new InvalidInputError(`salt length must be a positive integer, got ${length}.`, { length });
        }
        if (charset.length === 0) {
            throw new InvalidInputError('salt charset must not be empty.');
        }

        const bytes = crypto.randomBytes(length);
        let salt = '';
        for (const byte of bytes) {
            salt += charset[byte % charset.length];
        }
        return salt;
    },

    withPrefix(userPrefix: string): string {
        return userPrefix + SaltCodec.randomSaltString(PREFIXED_SALT_TAIL_LENGTH);
    },

    /**
     * Rejects a salt prefix whose generated salts could be 64 hex characters,
     * which `manualSalt` would read back as a raw salt instead of hashing.
     */
    assertSaltPrefix(userPrefix: string) {
        if (RAW_SALT.test(userPrefix + '0'.repeat(PREFIXED_SALT_TAIL_LENGTH))) {
            throw new InvalidInputError('salt prefix would let a salt read back as a raw 32-byte hex salt.', {
                saltPrefix: userPrefix,
            });
        }
    },

    toSaltBytes(salt: string): Uint8Array {
        return keccak256(toUtf8Bytes(salt));
    },

    /**
     * A salt typed in by hand: 64 hex characters are taken as the raw 32-byte
     * salt, anything else is hashed like a generated salt string.
     */
    manualSalt(input: string): Uint8Array {
        if (RAW_SALT.test(input)) {
            return getBytes(input.startsWith('0x') ? input : `0x${input}`);
        }
        return SaltCodec.toSaltBytes(input);
    },

    saltDigestHex(salt: string): string {
        return hexlify(SaltCodec.toSaltBytes(salt));
    },
};

export default SaltCodec;
