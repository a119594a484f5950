import { base58 } from '@scure/base';
import { blake256 } from '@noble/hashes/blake1';
import { ripemd160 } from '@noble/hashes/ripemd160';
import type { NetworkParams } from '../config/networks';

const CHECKSUM_SIZE = 4;
const HASH160_SIZE = 20;
const PRIVATE_KEY_SIZE = 32;
const EC_TYPE_SECP256K1 = 0;

/**
 * The closed set of address kinds this wallet client understands. Each kind knows
 * how to turn itself into a version 0 output script (see script.ts `addressScript`).
 */
export type Address =
  | { kind: 'pubkeyhash'; hash160: Uint8Array }
  | { kind: 'scripthash'; hash160: Uint8Array }
  | { kind: 'pubkey'; pubKey: Uint8Array };

export function hash160(data: Uint8Array): Uint8Array {
  return ripemd160(blake256(data));
}

function checksum(payload: Uint8Array): Uint8Array {
  return blake256(blake256(payload)).subarray(0, CHECKSUM_SIZE);
}

function encodeCheck(payload: Uint8Array): string {
  const out = new Uint8Array(payload.length + CHECKSUM_SIZE);
  out.set(payload);
  out.set(checksum(payload), payload.length);
  return base58.encode(out);
}

function decodeCheck(encoded: string): Uint8Array {
  let raw: Uint8Array;
  try {
    raw = base58.decode(encoded.trim());
  } catch (err) {
    throw new Error(`invalid base58: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (raw.length <= CHECKSUM_SIZE) {
    throw new Error('invalid format: too short');
  }
  const payload = raw.subarray(0, raw.length - CHECKSUM_SIZE);
  const expected = checksum(payload);
  const actual = raw.subarray(raw.length - CHECKSUM_SIZE);
  if (!bytesEqual(expected, actual)) {
    throw new Error('checksum mismatch');
  }
  return Uint8Array.from(payload);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

function netIdMatches(payload: Uint8Array, netId: readonly [number, number]): boolean {
  return payload[0] === netId[0] && payload[1] === netId[1];
}

export function decodeAddress(encoded: string, network: NetworkParams): Address {
  const payload = decodeCheck(encoded);
  if (payload.length !== 2 + HASH160_SIZE) {
    throw new Error(`unsupported address ${encoded}`);
  }
  const hash = payload.slice(2);
  if (netIdMatches(payload, network.pubKeyHashAddrId)) {
    return { kind: 'pubkeyhash', hash160: hash };
  }
  if (netIdMatches(payload, network.scriptHashAddrId)) {
    return { kind: 'scripthash', hash160: hash };
  }
  throw new Error(`address ${encoded} is not for network ${network.name}`);
}

export function encodeAddress(address: Address, network: NetworkParams): string {
  switch (address.kind) {
    case 'pubkeyhash':
      return encodeCheck(Uint8Array.from([...network.pubKeyHashAddrId, ...address.hash160]));
    case 'scripthash':
      return encodeCheck(Uint8Array.from([...network.scriptHashAddrId, ...address.hash160]));
    case 'pubkey':
      // Wallet RPCs address keys by their pubkey hash.
      return encodeCheck(
        Uint8Array.from([...network.pubKeyHashAddrId, ...hash160(address.pubKey)]),
      );
  }
}

export function decodeWif(wif: string, network: NetworkParams): Uint8Array {
  const payload = decodeCheck(wif);
  if (payload.length !== 2 + 1 + PRIVATE_KEY_SIZE) {
    throw new Error('malformed private key');
  }
  if (!netIdMatches(payload, network.privateKeyId)) {
    throw new Error(`private key is not for network ${network.name}`);
  }
  if (payload[2] !== EC_TYPE_SECP256K1) {
    throw new Error(`unsupported private key type ${payload[2]}`);
  }
  return payload.slice(3);
}

export function encodeWif(privateKey: Uint8Array, network: NetworkParams): string {
  if (privateKey.length !== PRIVATE_KEY_SIZE) {
    throw new Error('private key must be 32 bytes');
  }
  return encodeCheck(Uint8Array.from([...network.privateKeyId, EC_TYPE_SECP256K1, ...privateKey]));
}
