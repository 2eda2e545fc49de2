import { getBytes, hexlify, keccak256 as keccak256Hex, toUtf8Bytes } from 'ethers';
import type { BytesLike } from 'ethers';
import { InvalidInputLengthError } from './errors';

export const ADDRESS_LENGTH = 20;
export const HASH_LENGTH = 32;

export function keccak256(data: BytesLike): Uint8Array {
    return getBytes(keccak256Hex(data));
}

/**
 * EIP-55 mixed-case encoding. A hex letter is uppercased when the matching
 * nibble of keccak256(lowercase hex) is 8 or more.
 */
export function checksumEncode(address: Uint8Array): string {
    if (address.length !== ADDRESS_LENGTH) {
        throw new InvalidInputLengthError('address', ADDRESS_LENGTH, address.length);
    }

    const lower = hexlify(address).slice(2);
    const digest = keccak256Hex(toUtf8Bytes(lower)).slice(2);

    let result = '0x';
    for (let i = 0; i < lower.length; i++) {
        result += parseInt(digest[i], 16) >= 8 ? lower[i].toUpperCase() : lower[i];
    }
    return result;
}
