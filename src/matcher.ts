import { InvalidPrefixError, PrefixTooLongError } from './errors';

// An address has 40 hex digits; nothing longer can ever match.
export const MAX_PREFIX_LENGTH = 40;

const HEX_DIGITS = /^[0-9a-f]*$/;

export function normalizePrefix(prefix: string): string {
    const trimmed = prefix.trim().toLowerCase();
    if (!HEX_DIGITS.test(trimmed)) {
        throw new InvalidPrefixError(prefix);
    }
    if (trimmed.length > MAX_PREFIX_LENGTH) {
        throw new PrefixTooLongError(prefix, MAX_PREFIX_LENGTH);
    }
    return trimmed;
}

/** `address` is 0x-prefixed hex in any case; `prefix` comes from normalizePrefix. */
export function matchesPrefix(address: string, prefix: string): boolean {
    return address.slice(2, 2 + prefix.length).toLowerCase() === prefix;
}
