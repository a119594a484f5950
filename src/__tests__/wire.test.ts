import { describe, expect, it } from 'vitest';
import { blake256 } from '@noble/hashes/blake1';
import { TxSerializeType } from '../blockchain/types';
import {
  cloneTx,
  deserializeTx,
  hashFromHex,
  hashToHex,
  newMsgTx,
  newTxIn,
  newTxOut,
  serializeSize,
  serializeTx,
  txHash,
  txidOf,
  varIntSerializeSize,
} from '../blockchain/wire';
import { TicketBuyerErrorCode } from '../errors';
import { p2pkhScript } from './helpers/fixtures';

function sampleTx() {
  const tx = newMsgTx(1);
  tx.inputs.push(
    newTxIn({ hash: new Uint8Array(32).fill(0xab), index: 2, tree: 1 }, 5000n, Uint8Array.from([1, 2, 3])),
  );
  tx.outputs.push(newTxOut(4000n, p2pkhScript(1)));
  tx.outputs.push(newTxOut(500n, Uint8Array.from([0x6a]), 0));
  tx.lockTime = 7;
  tx.expiry = 9;
  return tx;
}

describe('transaction wire format', () => {
  it('round-trips a full serialization', () => {
    const tx = sampleTx();
    expect(deserializeTx(serializeTx(tx))).toEqual(tx);
  });

  it('packs version and serialization type into the leading word', () => {
    const tx = sampleTx();
    expect(Array.from(serializeTx(tx).subarray(0, 4))).toEqual([1, 0, 0, 0]);
    expect(Array.from(serializeTx(tx, TxSerializeType.NoWitness).subarray(0, 4))).toEqual([1, 0, 1, 0]);
  });

  it('computes the serialized size of a single input, single output transaction', () => {
    const tx = newMsgTx(1);
    tx.inputs.push(newTxIn({ hash: new Uint8Array(32), index: 0, tree: 0 }, 0n));
    tx.outputs.push(newTxOut(1n, p2pkhScript(1)));
    expect(serializeSize(tx)).toBe(109);
  });

  it('hashes the prefix only', () => {
    const tx = sampleTx();
    expect(txHash(tx)).toEqual(blake256(serializeTx(tx, TxSerializeType.NoWitness)));

    const resigned = cloneTx(tx);
    resigned.inputs[0].signatureScript = Uint8Array.from([9, 9]);
    expect(txidOf(resigned)).toBe(txidOf(tx));
  });

  it('displays hashes byte-reversed', () => {
    const hash = new Uint8Array(32);
    hash[0] = 0x01;
    const hex = hashToHex(hash);
    expect(hex.endsWith('01')).toBe(true);
    expect(hex.startsWith('00')).toBe(true);
    expect(hashFromHex(hex)).toEqual(hash);
  });

  it('rejects malformed hashes', () => {
    expect(() => hashFromHex('xyz')).toThrow(expect.objectContaining({ code: TicketBuyerErrorCode.INVALID_ARGUMENT }));
  });

  it('decodes a prefix-only serialization without input values', () => {
    const decoded = deserializeTx(serializeTx(sampleTx(), TxSerializeType.NoWitness));
    expect(decoded.serType).toBe(TxSerializeType.NoWitness);
    expect(decoded.inputs[0].valueIn).toBe(0n);
    expect(decoded.outputs[0].value).toBe(4000n);
  });

  it('rejects trailing and truncated bytes', () => {
    const bytes = serializeTx(sampleTx());
    const trailing = Uint8Array.from([...bytes, 0]);
    expect(() => deserializeTx(trailing)).toThrow(
      expect.objectContaining({ code: TicketBuyerErrorCode.MALFORMED_TRANSACTION }),
    );
    expect(() => deserializeTx(bytes.subarray(0, bytes.length - 1))).toThrow(
      expect.objectContaining({ code: TicketBuyerErrorCode.MALFORMED_TRANSACTION }),
    );
  });

  it('sizes variable length integers', () => {
    expect(varIntSerializeSize(0xfc)).toBe(1);
    expect(varIntSerializeSize(0xfd)).toBe(3);
    expect(varIntSerializeSize(0xffff)).toBe(3);
    expect(varIntSerializeSize(0x10000)).toBe(5);
  });
});
