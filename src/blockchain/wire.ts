import { blake256 } from '@noble/hashes/blake1';
import { Errors } from '../errors';
import {
  TxSerializeType,
  type MsgTx,
  type OutPoint,
  type TxIn,
  type TxOut,
  type TxTree,
} from './types';

export const MAX_TX_IN_SEQUENCE_NUM = 0xffffffff;
export const NULL_BLOCK_HEIGHT = 0x00000000;
export const NULL_BLOCK_INDEX = 0xffffffff;
export const HASH_SIZE = 32;

// Upper bound for any count or script length read off the wire.
const MAX_WIRE_ITEMS = 1_000_000;

export function newMsgTx(version: number): MsgTx {
  return {
    version,
    serType: TxSerializeType.Full,
    inputs: [],
    outputs: [],
    lockTime: 0,
    expiry: 0,
  };
}

export function newTxIn(
  previousOutPoint: OutPoint,
  valueIn: bigint,
  signatureScript: Uint8Array = new Uint8Array(0),
): TxIn {
  return {
    previousOutPoint,
    sequence: MAX_TX_IN_SEQUENCE_NUM,
    valueIn,
    blockHeight: NULL_BLOCK_HEIGHT,
    blockIndex: NULL_BLOCK_INDEX,
    signatureScript,
  };
}

export function newTxOut(value: bigint, pkScript: Uint8Array, version = 0): TxOut {
  return { value, version, pkScript };
}

export function cloneTx(tx: MsgTx): MsgTx {
  return {
    ...tx,
    inputs: tx.inputs.map((input) => ({
      ...input,
      previousOutPoint: {
        ...input.previousOutPoint,
        hash: Uint8Array.from(input.previousOutPoint.hash),
      },
      signatureScript: Uint8Array.from(input.signatureScript),
    })),
    outputs: tx.outputs.map((output) => ({ ...output, pkScript: Uint8Array.from(output.pkScript) })),
  };
}

/**
 * Serialize a transaction. `serType` overrides the type recorded on the transaction,
 * which is how the prefix-only form used for hashing is produced.
 */
export function serializeTx(tx: MsgTx, serType: TxSerializeType = tx.serType): Uint8Array {
  const chunks: number[] = [];
  writeUInt32LE(chunks, ((tx.version & 0xffff) | (serType << 16)) >>> 0);

  switch (serType) {
    case TxSerializeType.Full:
      writePrefix(chunks, tx);
      writeWitness(chunks, tx);
      break;
    case TxSerializeType.NoWitness:
      writePrefix(chunks, tx);
      break;
    case TxSerializeType.OnlyWitness:
      writeWitness(chunks, tx);
      break;
    default:
      throw Errors.malformedTransaction(`unsupported serialization type ${String(serType)}`);
  }
  return Uint8Array.from(chunks);
}

export function deserializeTx(bytes: Uint8Array): MsgTx {
  const reader = new WireReader(bytes);
  const combined = reader.readUInt32LE();
  const version = combined & 0xffff;
  const serType = combined >>> 16;

  const tx = newMsgTx(version);
  switch (serType) {
    case TxSerializeType.Full:
      readPrefix(reader, tx);
      readWitness(reader, tx);
      break;
    case TxSerializeType.NoWitness:
      readPrefix(reader, tx);
      break;
    default:
      throw Errors.malformedTransaction(`unsupported serialization type ${serType}`);
  }
  tx.serType = serType;

  if (!reader.done()) {
    throw Errors.malformedTransaction(`${reader.remaining()} trailing bytes after transaction`);
  }
  return tx;
}

export function serializeSize(tx: MsgTx): number {
  return serializeTx(tx, TxSerializeType.Full).length;
}

export function txOutSerializeSize(output: TxOut): number {
  return 8 + 2 + varIntSerializeSize(output.pkScript.length) + output.pkScript.length;
}

export function txHash(tx: MsgTx): Uint8Array {
  return blake256(serializeTx(tx, TxSerializeType.NoWitness));
}

export function hashToHex(hash: Uint8Array): string {
  return Buffer.from(hash).reverse().toString('hex');
}

export function hashFromHex(txid: string): Uint8Array {
  const clean = txid.trim().toLowerCase();
  if (!/^[0-9a-f]{64}$/.test(clean)) {
    throw Errors.invalidArgument(`invalid transaction hash: ${txid}`);
  }
  return Uint8Array.from(Buffer.from(clean, 'hex').reverse());
}

export function txidOf(tx: MsgTx): string {
  return hashToHex(txHash(tx));
}

export function outPointKey(outPoint: OutPoint): string {
  return `${hashToHex(outPoint.hash)}:${outPoint.index}:${outPoint.tree}`;
}

export function varIntSerializeSize(value: number): number {
  if (value < 0xfd) return 1;
  if (value <= 0xffff) return 3;
  if (value <= 0xffffffff) return 5;
  return 9;
}

function writePrefix(chunks: number[], tx: MsgTx) {
  writeVarInt(chunks, tx.inputs.length);
  for (const input of tx.inputs) {
    const { hash, index, tree } = input.previousOutPoint;
    if (hash.length !== HASH_SIZE) {
      throw Errors.malformedTransaction(`previous outpoint hash must be ${HASH_SIZE} bytes`);
    }
    chunks.push(...hash);
    writeUInt32LE(chunks, index);
    chunks.push(tree);
    writeUInt32LE(chunks, input.sequence);
  }

  writeVarInt(chunks, tx.outputs.length);
  for (const output of tx.outputs) {
    writeInt64LE(chunks, output.value);
    writeUInt16LE(chunks, output.version);
    writeVarBytes(chunks, output.pkScript);
  }

  writeUInt32LE(chunks, tx.lockTime);
  writeUInt32LE(chunks, tx.expiry);
}

function writeWitness(chunks: number[], tx: MsgTx) {
  writeVarInt(chunks, tx.inputs.length);
  for (const input of tx.inputs) {
    writeInt64LE(chunks, input.valueIn);
    writeUInt32LE(chunks, input.blockHeight);
    writeUInt32LE(chunks, input.blockIndex);
    writeVarBytes(chunks, input.signatureScript);
  }
}

function readPrefix(reader: WireReader, tx: MsgTx) {
  const inputCount = reader.readCount();
  for (let i = 0; i < inputCount; i++) {
    const hash = reader.readBytes(HASH_SIZE);
    const index = reader.readUInt32LE();
    const rawTree = reader.readUInt8();
    if (rawTree !== 0 && rawTree !== 1) {
      throw Errors.malformedTransaction(`invalid tree ${rawTree} for input ${i}`);
    }
    const tree: TxTree = rawTree === 1 ? 1 : 0;
    const sequence = reader.readUInt32LE();
    const input = newTxIn({ hash, index, tree }, 0n);
    input.sequence = sequence;
    tx.inputs.push(input);
  }

  const outputCount = reader.readCount();
  for (let i = 0; i < outputCount; i++) {
    const value = reader.readInt64LE();
    const version = reader.readUInt16LE();
    const pkScript = reader.readVarBytes();
    tx.outputs.push({ value, version, pkScript });
  }

  tx.lockTime = reader.readUInt32LE();
  tx.expiry = reader.readUInt32LE();
}

function readWitness(reader: WireReader, tx: MsgTx) {
  const count = reader.readCount();
  if (count !== tx.inputs.length) {
    throw Errors.malformedTransaction(
      `witness count ${count} does not match input count ${tx.inputs.length}`,
    );
  }
  for (let i = 0; i < count; i++) {
    const input = tx.inputs[i];
    input.valueIn = reader.readInt64LE();
    input.blockHeight = reader.readUInt32LE();
    input.blockIndex = reader.readUInt32LE();
    input.signatureScript = reader.readVarBytes();
  }
}

function writeUInt16LE(arr: number[], value: number) {
  const buf = Buffer.alloc(2);
  buf.writeUInt16LE(value & 0xffff);
  arr.push(...buf);
}

function writeUInt32LE(arr: number[], value: number) {
  const buf = Buffer.alloc(4);
  buf.writeUInt32LE(value >>> 0);
  arr.push(...buf);
}

function writeInt64LE(arr: number[], value: bigint) {
  const buf = Buffer.alloc(8);
  buf.writeBigInt64LE(value);
  arr.push(...buf);
}

export function writeVarInt(arr: number[], value: number) {
  if (value < 0xfd) {
    arr.push(value);
  } else if (value <= 0xffff) {
    arr.push(0xfd, value & 0xff, (value >> 8) & 0xff);
  } else if (value <= 0xffffffff) {
    arr.push(0xfe, value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff, (value >>> 24) & 0xff);
  } else {
    const buf = Buffer.alloc(8);
    buf.writeBigUInt64LE(BigInt(value));
    arr.push(0xff, ...buf);
  }
}

function writeVarBytes(arr: number[], bytes: Uint8Array) {
  writeVarInt(arr, bytes.length);
  arr.push(...bytes);
}

class WireReader {
  private offset = 0;
  private readonly view: Buffer;

  constructor(bytes: Uint8Array) {
    this.view = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  done(): boolean {
    return this.offset === this.view.length;
  }

  remaining(): number {
    return this.view.length - this.offset;
  }

  private ensure(size: number) {
    if (this.offset + size > this.view.length) {
      throw Errors.malformedTransaction(
        `unexpected end of data: need ${size} bytes at offset ${this.offset}`,
      );
    }
  }

  readUInt8(): number {
    this.ensure(1);
    return this.view.readUInt8(this.offset++);
  }

  readUInt16LE(): number {
    this.ensure(2);
    const value = this.view.readUInt16LE(this.offset);
    this.offset += 2;
    return value;
  }

  readUInt32LE(): number {
    this.ensure(4);
    const value = this.view.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readInt64LE(): bigint {
    this.ensure(8);
    const value = this.view.readBigInt64LE(this.offset);
    this.offset += 8;
    return value;
  }

  readVarInt(): number {
    const discriminant = this.readUInt8();
    switch (discriminant) {
      case 0xfd:
        return this.readUInt16LE();
      case 0xfe:
        return this.readUInt32LE();
      case 0xff: {
        this.ensure(8);
        const value = this.view.readBigUInt64LE(this.offset);
        this.offset += 8;
        if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
          throw Errors.malformedTransaction('varint out of range');
        }
        return Number(value);
      }
      default:
        return discriminant;
    }
  }

  readCount(): number {
    const count = this.readVarInt();
    if (count > MAX_WIRE_ITEMS || count > this.remaining()) {
      throw Errors.malformedTransaction(`count ${count} exceeds remaining data`);
    }
    return count;
  }

  readBytes(size: number): Uint8Array {
    this.ensure(size);
    const out = Uint8Array.from(this.view.subarray(this.offset, this.offset + size));
    this.offset += size;
    return out;
  }

  readVarBytes(): Uint8Array {
    const length = this.readVarInt();
    if (length > MAX_WIRE_ITEMS) {
      throw Errors.malformedTransaction(`script length ${length} too large`);
    }
    return this.readBytes(length);
  }
}
