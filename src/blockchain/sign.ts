import { blake256 } from '@noble/hashes/blake1';
import { secp256k1 } from '@noble/curves/secp256k1';
import { pushData } from './script';
import { TxSerializeType, type MsgTx } from './types';
import { serializeTx, writeVarInt } from './wire';

export const SIG_HASH_ALL = 0x1;

/**
 * Signature hash committing to the whole transaction prefix and to the signature
 * script of input `index` only.
 */
export function calcSignatureHash(
  signScript: Uint8Array,
  hashType: number,
  tx: MsgTx,
  index: number,
): Uint8Array {
  if (hashType !== SIG_HASH_ALL) {
    throw new Error(`unsupported signature hash type ${hashType}`);
  }
  if (index < 0 || index >= tx.inputs.length) {
    throw new Error(`input index ${index} out of range (${tx.inputs.length} inputs)`);
  }

  const prefixHash = blake256(serializeTx(tx, TxSerializeType.NoWitness));

  const witness: number[] = [];
  const header = Buffer.alloc(4);
  header.writeUInt32LE(((tx.version & 0xffff) | (TxSerializeType.OnlyWitness << 16)) >>> 0);
  witness.push(...header);
  writeVarInt(witness, tx.inputs.length);
  for (let i = 0; i < tx.inputs.length; i++) {
    if (i === index) {
      writeVarInt(witness, signScript.length);
      witness.push(...signScript);
    } else {
      writeVarInt(witness, 0);
    }
  }
  const witnessHash = blake256(Uint8Array.from(witness));

  const preimage = Buffer.alloc(4 + prefixHash.length + witnessHash.length);
  preimage.writeUInt32LE(hashType);
  preimage.set(prefixHash, 4);
  preimage.set(witnessHash, 4 + prefixHash.length);
  return blake256(preimage);
}

export function compressedPubKey(privateKey: Uint8Array): Uint8Array {
  return secp256k1.getPublicKey(privateKey, true);
}

/**
 * Pay-to-pubkey-hash signature script for input `index`:
 * push(DER signature ‖ hash type) push(compressed pubkey).
 */
export function signatureScript(
  tx: MsgTx,
  index: number,
  prevScript: Uint8Array,
  privateKey: Uint8Array,
  hashType = SIG_HASH_ALL,
): Uint8Array {
  const hash = calcSignatureHash(prevScript, hashType, tx, index);
  const der = secp256k1.sign(hash, privateKey, { lowS: true }).toDERRawBytes();
  const sig = pushData(Uint8Array.from([...der, hashType]));
  const pubKey = pushData(compressedPubKey(privateKey));
  const script = new Uint8Array(sig.length + pubKey.length);
  script.set(sig);
  script.set(pubKey, sig.length);
  return script;
}
