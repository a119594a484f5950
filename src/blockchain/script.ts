import type { Address } from './address';

export const OP_0 = 0x00;
export const OP_DATA_20 = 0x14;
export const OP_DATA_30 = 0x1e;
export const OP_DATA_33 = 0x21;
export const OP_DATA_65 = 0x41;
export const OP_PUSHDATA1 = 0x4c;
export const OP_PUSHDATA2 = 0x4d;
export const OP_PUSHDATA4 = 0x4e;
export const OP_1 = 0x51;
export const OP_16 = 0x60;
export const OP_RETURN = 0x6a;
export const OP_DUP = 0x76;
export const OP_EQUAL = 0x87;
export const OP_EQUALVERIFY = 0x88;
export const OP_HASH160 = 0xa9;
export const OP_CHECKSIG = 0xac;
export const OP_CHECKMULTISIG = 0xae;
export const OP_SSTX = 0xba;
export const OP_SSGEN = 0xbb;
export const OP_SSRTX = 0xbc;
export const OP_SSTXCHANGE = 0xbd;

export const MAX_SCRIPT_ELEMENT_SIZE = 2048;
export const MAX_DATA_CARRIER_SIZE = 256;
const COMMITMENT_DATA_SIZE = 30;
const COMMITMENT_P2SH_FLAG = 1n << 63n;

export enum ScriptClass {
  NonStandard = 'nonstandard',
  PubKey = 'pubkey',
  PubKeyHash = 'pubkeyhash',
  ScriptHash = 'scripthash',
  MultiSig = 'multisig',
  NullData = 'nulldata',
  StakeSubmission = 'stakesubmission',
  StakeGen = 'stakegen',
  StakeRevocation = 'stakerevoke',
  StakeSubChange = 'sstxchange',
}

const STAKE_TAGS: Record<number, ScriptClass> = {
  [OP_SSTX]: ScriptClass.StakeSubmission,
  [OP_SSGEN]: ScriptClass.StakeGen,
  [OP_SSRTX]: ScriptClass.StakeRevocation,
  [OP_SSTXCHANGE]: ScriptClass.StakeSubChange,
};

export interface ParsedOpcode {
  opcode: number;
  data?: Uint8Array;
}

/**
 * Tokenize a script into opcodes and pushed data. Throws on truncated pushes.
 */
export function parseScript(script: Uint8Array): ParsedOpcode[] {
  const ops: ParsedOpcode[] = [];
  let offset = 0;
  while (offset < script.length) {
    const opcode = script[offset++];
    let length = -1;
    if (opcode > OP_0 && opcode < OP_PUSHDATA1) {
      length = opcode;
    } else if (opcode === OP_PUSHDATA1) {
      length = readLength(script, offset, 1);
      offset += 1;
    } else if (opcode === OP_PUSHDATA2) {
      length = readLength(script, offset, 2);
      offset += 2;
    } else if (opcode === OP_PUSHDATA4) {
      length = readLength(script, offset, 4);
      offset += 4;
    }
    if (length < 0) {
      ops.push({ opcode });
      continue;
    }
    if (offset + length > script.length) {
      throw new Error(`opcode 0x${opcode.toString(16)} pushes past end of script`);
    }
    ops.push({ opcode, data: script.slice(offset, offset + length) });
    offset += length;
  }
  return ops;
}

function readLength(script: Uint8Array, offset: number, size: number): number {
  if (offset + size > script.length) {
    throw new Error('truncated push length');
  }
  let length = 0;
  for (let i = size - 1; i >= 0; i--) {
    length = length * 256 + script[offset + i];
  }
  return length;
}

function isPubKeyHash(s: Uint8Array): boolean {
  return (
    s.length === 25 &&
    s[0] === OP_DUP &&
    s[1] === OP_HASH160 &&
    s[2] === OP_DATA_20 &&
    s[23] === OP_EQUALVERIFY &&
    s[24] === OP_CHECKSIG
  );
}

function isScriptHash(s: Uint8Array): boolean {
  return s.length === 23 && s[0] === OP_HASH160 && s[1] === OP_DATA_20 && s[22] === OP_EQUAL;
}

function isPubKey(s: Uint8Array): boolean {
  if (s.length === 35) {
    return s[0] === OP_DATA_33 && (s[1] === 0x02 || s[1] === 0x03) && s[34] === OP_CHECKSIG;
  }
  if (s.length === 67) {
    return s[0] === OP_DATA_65 && s[1] === 0x04 && s[66] === OP_CHECKSIG;
  }
  return false;
}

function multiSigKeys(s: Uint8Array): Uint8Array[] | null {
  let ops: ParsedOpcode[];
  try {
    ops = parseScript(s);
  } catch {
    return null;
  }
  if (ops.length < 4) return null;
  const first = ops[0].opcode;
  const last = ops[ops.length - 1].opcode;
  const nOp = ops[ops.length - 2].opcode;
  if (first < OP_1 || first > OP_16 || nOp < OP_1 || nOp > OP_16 || last !== OP_CHECKMULTISIG) {
    return null;
  }
  const required = first - OP_1 + 1;
  const keys: Uint8Array[] = [];
  for (const op of ops.slice(1, -2)) {
    if (!op.data || (op.data.length !== 33 && op.data.length !== 65)) return null;
    keys.push(op.data);
  }
  if (keys.length !== nOp - OP_1 + 1 || required > keys.length) return null;
  return keys;
}

function isNullData(s: Uint8Array): boolean {
  if (s.length === 0 || s[0] !== OP_RETURN) return false;
  if (s.length === 1) return true;
  let ops: ParsedOpcode[];
  try {
    ops = parseScript(s.subarray(1));
  } catch {
    return false;
  }
  return ops.length === 1 && ops[0].data !== undefined && ops[0].data.length <= MAX_DATA_CARRIER_SIZE;
}

function baseClass(s: Uint8Array): ScriptClass {
  if (isPubKeyHash(s)) return ScriptClass.PubKeyHash;
  if (isScriptHash(s)) return ScriptClass.ScriptHash;
  if (isPubKey(s)) return ScriptClass.PubKey;
  if (multiSigKeys(s)) return ScriptClass.MultiSig;
  if (isNullData(s)) return ScriptClass.NullData;
  return ScriptClass.NonStandard;
}

export function getScriptClass(version: number, script: Uint8Array): ScriptClass {
  if (version !== 0) return ScriptClass.NonStandard;
  if (script.length > 0) {
    const stakeClass = STAKE_TAGS[script[0]];
    if (stakeClass) {
      const nested = baseClass(script.subarray(1));
      return nested === ScriptClass.PubKeyHash || nested === ScriptClass.ScriptHash
        ? stakeClass
        : ScriptClass.NonStandard;
    }
  }
  return baseClass(script);
}

export function isStakeClass(scriptClass: ScriptClass): boolean {
  return Object.values(STAKE_TAGS).includes(scriptClass);
}

/**
 * Class of the script nested inside a stake-tagged output.
 */
export function getStakeOutSubclass(script: Uint8Array): ScriptClass {
  const scriptClass = getScriptClass(0, script);
  if (!isStakeClass(scriptClass)) {
    throw new Error(`script class ${scriptClass} is not a stake output`);
  }
  return baseClass(script.subarray(1));
}

/**
 * Addresses paid by a version 0 output script. Stake-tagged scripts resolve to
 * the address of their nested script.
 */
export function extractScriptAddresses(script: Uint8Array): {
  scriptClass: ScriptClass;
  addresses: Address[];
  requiredSigs: number;
} {
  const scriptClass = getScriptClass(0, script);
  const inner = isStakeClass(scriptClass) ? script.subarray(1) : script;
  const innerClass = isStakeClass(scriptClass) ? baseClass(inner) : scriptClass;

  switch (innerClass) {
    case ScriptClass.PubKeyHash:
      return { scriptClass, addresses: [{ kind: 'pubkeyhash', hash160: inner.slice(3, 23) }], requiredSigs: 1 };
    case ScriptClass.ScriptHash:
      return { scriptClass, addresses: [{ kind: 'scripthash', hash160: inner.slice(2, 22) }], requiredSigs: 1 };
    case ScriptClass.PubKey:
      return { scriptClass, addresses: [{ kind: 'pubkey', pubKey: inner.slice(1, -1) }], requiredSigs: 1 };
    case ScriptClass.MultiSig: {
      const keys = multiSigKeys(inner) ?? [];
      return {
        scriptClass,
        addresses: keys.map((pubKey) => ({ kind: 'pubkey' as const, pubKey })),
        requiredSigs: inner[0] - OP_1 + 1,
      };
    }
    default:
      return { scriptClass, addresses: [], requiredSigs: 0 };
  }
}

export function payToPubKeyHashScript(hash: Uint8Array): Uint8Array {
  if (hash.length !== 20) throw new Error('pubkey hash must be 20 bytes');
  return Uint8Array.from([OP_DUP, OP_HASH160, OP_DATA_20, ...hash, OP_EQUALVERIFY, OP_CHECKSIG]);
}

export function payToScriptHashScript(hash: Uint8Array): Uint8Array {
  if (hash.length !== 20) throw new Error('script hash must be 20 bytes');
  return Uint8Array.from([OP_HASH160, OP_DATA_20, ...hash, OP_EQUAL]);
}

/**
 * Version 0 output script paying an address.
 */
export function addressScript(address: Address): { pkScript: Uint8Array; version: number } {
  switch (address.kind) {
    case 'pubkeyhash':
      return { pkScript: payToPubKeyHashScript(address.hash160), version: 0 };
    case 'scripthash':
      return { pkScript: payToScriptHashScript(address.hash160), version: 0 };
    case 'pubkey':
      return {
        pkScript: Uint8Array.from([address.pubKey.length, ...address.pubKey, OP_CHECKSIG]),
        version: 0,
      };
  }
}

function stakeTagged(tag: number, address: Address): Uint8Array {
  if (address.kind === 'pubkey') {
    throw new Error('stake outputs must pay a pubkey hash or script hash');
  }
  return Uint8Array.from([tag, ...addressScript(address).pkScript]);
}

export function payToSStx(address: Address): Uint8Array {
  return stakeTagged(OP_SSTX, address);
}

export function payToSStxChange(address: Address): Uint8Array {
  return stakeTagged(OP_SSTXCHANGE, address);
}

/**
 * Ticket commitment: OP_RETURN pushing hash160 ‖ amount (LE, top bit marks a
 * script hash) ‖ fee limits (LE).
 */
export function generateSStxAddrPush(address: Address, amount: bigint, feeLimits: number): Uint8Array {
  if (address.kind === 'pubkey') {
    throw new Error('commitment must pay a pubkey hash or script hash');
  }
  if (amount < 0n || amount >= COMMITMENT_P2SH_FLAG) {
    throw new Error(`commitment amount ${amount} out of range`);
  }
  const data = Buffer.alloc(COMMITMENT_DATA_SIZE);
  Buffer.from(address.hash160).copy(data, 0);
  const encodedAmount = address.kind === 'scripthash' ? amount | COMMITMENT_P2SH_FLAG : amount;
  data.writeBigUInt64LE(encodedAmount, 20);
  data.writeUInt16LE(feeLimits & 0xffff, 28);
  return Uint8Array.from([OP_RETURN, OP_DATA_30, ...data]);
}

export interface TicketCommitment {
  address: Address;
  amount: bigint;
  feeLimits: number;
}

export function decodeCommitment(script: Uint8Array): TicketCommitment | null {
  if (script.length !== 2 + COMMITMENT_DATA_SIZE || script[0] !== OP_RETURN || script[1] !== OP_DATA_30) {
    return null;
  }
  const data = Buffer.from(script.subarray(2));
  const raw = data.readBigUInt64LE(20);
  const isScriptHash = (raw & COMMITMENT_P2SH_FLAG) !== 0n;
  const hash = Uint8Array.from(data.subarray(0, 20));
  return {
    address: isScriptHash ? { kind: 'scripthash', hash160: hash } : { kind: 'pubkeyhash', hash160: hash },
    amount: raw & (COMMITMENT_P2SH_FLAG - 1n),
    feeLimits: data.readUInt16LE(28),
  };
}

export function pushData(data: Uint8Array): Uint8Array {
  if (data.length < OP_PUSHDATA1) {
    return Uint8Array.from([data.length, ...data]);
  }
  if (data.length <= 0xff) {
    return Uint8Array.from([OP_PUSHDATA1, data.length, ...data]);
  }
  if (data.length <= 0xffff) {
    return Uint8Array.from([OP_PUSHDATA2, data.length & 0xff, data.length >> 8, ...data]);
  }
  throw new Error('push too large');
}
