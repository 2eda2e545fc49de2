import { concat, encodeRlp, hexlify, keccak256 as keccak256Hex, toBeHex } from 'ethers';
import { InvalidInputLengthError } from './errors';
import { ADDRESS_LENGTH, HASH_LENGTH, checksumEncode, keccak256 } from './hash';

// Creation code of the CREATE3 proxy. Only its hash enters the address.
export const PROXY_BYTECODE = '0x67363d3d37363d34f03d5260086018f3' as const;
export const PROXY_BYTECODE_HASH = keccak256Hex(PROXY_BYTECODE);

const CREATE2_MARKER = '0xff';
// The proxy deploys the child as its first transaction.
const PROXY_NONCE = 1;

function assertLength(field: string, value: Uint8Array, expected: number) {
    if (value.length !== expected) {
        throw new InvalidInputLengthError(field, expected, value.length);
    }
}

/**
 * RLP scalar form of a nonce: zero is the empty string, anything else its
 * minimal big-endian bytes (so 1 encodes as the single byte 0x01).
 */
export function encodeNonce(nonce: number): string {
    return nonce === 0 ? '0x' : toBeHex(nonce);
}

/** CREATE2 hop: address of the proxy the deployer creates for `salt`. */
export function computeProxyAddress(deployer: Uint8Array, salt: Uint8Array): Uint8Array {
    assertLength('deployer', deployer, ADDRESS_LENGTH);
    assertLength('salt', salt, HASH_LENGTH);

    const digest = keccak256(concat([CREATE2_MARKER, deployer, salt, PROXY_BYTECODE_HASH]));
    return digest.slice(HASH_LENGTH - ADDRESS_LENGTH);
}

/** CREATE hop: address of the contract `proxy` deploys at `nonce`. */
export function computeChildAddress(proxy: Uint8Array, nonce: number = PROXY_NONCE): Uint8Array {
    assertLength('proxy', proxy, ADDRESS_LENGTH);

    const digest = keccak256(encodeRlp([hexlify(proxy), encodeNonce(nonce)]));
    return digest.slice(HASH_LENGTH - ADDRESS_LENGTH);
}

export function deriveAddressBytes(deployer: Uint8Array, salt: Uint8Array): Uint8Array {
    return computeChildAddress(computeProxyAddress(deployer, salt));
}

export function derive(deployer: Uint8Array, salt: Uint8Array): string {
    return checksumEncode(deriveAddressBytes(deployer, salt));
}
