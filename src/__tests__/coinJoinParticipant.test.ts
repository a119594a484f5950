import { describe, expect, it } from 'vitest';
import { secp256k1 } from '@noble/curves/secp256k1';
import { parseScript, payToScriptHashScript, OP_1, OP_CHECKMULTISIG } from '../blockchain/script';
import { calcSignatureHash, compressedPubKey, SIG_HASH_ALL } from '../blockchain/sign';
import type { MsgTx, TxIn } from '../blockchain/types';
import { newMsgTx, newTxIn, newTxOut, serializeTx } from '../blockchain/wire';
import { CoinJoinParticipant, ParticipantState } from '../coinjoin/CoinJoinParticipant';
import { SIMNET } from '../config/networks';
import { TicketBuyerErrorCode } from '../errors';
import { FakeWallet, p2pkhScript, privateKey } from './helpers/fixtures';

const MIX_AMOUNT = 150_000n;
const OWN_SEED = 7;

function ownInput(): TxIn {
  return newTxIn({ hash: new Uint8Array(32).fill(0x01), index: 0, tree: 0 }, 200_000n);
}

function otherInput(): TxIn {
  const input = newTxIn({ hash: new Uint8Array(32).fill(0x02), index: 5, tree: 0 }, 400_000n);
  input.signatureScript = Uint8Array.from([0xaa]);
  return input;
}

const change = () => newTxOut(49_000n, p2pkhScript(8));

async function submitted(prevScript = p2pkhScript(OWN_SEED)) {
  const wallet = new FakeWallet(SIMNET);
  wallet.addKey(OWN_SEED);
  const participant = new CoinJoinParticipant({
    wallet,
    network: SIMNET,
    mixAccount: 'mixed',
    amount: MIX_AMOUNT,
    change: change(),
  });
  participant.addInput(prevScript, ownInput());
  const [mixScript] = await participant.generateMixOutputs();
  return { wallet, participant, mixScript };
}

function joined(mixScript: Uint8Array, edit?: (tx: MsgTx) => void): Uint8Array {
  const tx = newMsgTx(1);
  tx.inputs.push(otherInput(), ownInput());
  tx.outputs.push(
    newTxOut(MIX_AMOUNT, p2pkhScript(60)),
    newTxOut(MIX_AMOUNT, mixScript),
    change(),
    newTxOut(12_345n, p2pkhScript(61)),
  );
  edit?.(tx);
  return serializeTx(tx);
}

const withCode = (code: TicketBuyerErrorCode) => expect.objectContaining({ code });

describe('CoinJoinParticipant', () => {
  it('generates one internal mixed output of the mix account', async () => {
    const { wallet, participant, mixScript } = await submitted();
    expect(mixScript).toHaveLength(25);
    expect(wallet.addressRequests).toEqual([{ account: 'mixed', internal: true }]);
    expect(participant.getState()).toBe(ParticipantState.Submitted);
  });

  it('serializes its own inputs and change before the mix', async () => {
    const { participant } = await submitted();
    const expected = newMsgTx(1);
    expected.inputs.push(ownInput());
    expected.outputs.push(change());
    expect(participant.serialize()).toEqual(serializeTx(expected));
  });

  it('confirms a joint transaction holding its inputs, change and mixed output', async () => {
    const { participant, mixScript } = await submitted();
    participant.finalize(joined(mixScript));
    expect(participant.getState()).toBe(ParticipantState.Confirmed);
    expect(participant.mixOutputIndexes()).toEqual([1]);
  });

  it('decodes the same joint transaction twice to the same state', async () => {
    const { participant, mixScript } = await submitted();
    const bytes = joined(mixScript);
    participant.deserialize(bytes);
    participant.deserialize(bytes);
    expect(participant.mixOutputIndexes()).toEqual([1]);
    expect(participant.serialize()).toEqual(bytes);
  });

  it('signs only its own input', async () => {
    const { participant, mixScript } = await submitted();
    participant.finalize(joined(mixScript));
    await participant.sign();

    expect(participant.getState()).toBe(ParticipantState.Signed);
    const tx = participant.transaction();
    expect(Array.from(tx.inputs[0].signatureScript)).toEqual([0xaa]);

    const [sigPush, keyPush] = parseScript(tx.inputs[1].signatureScript);
    const pubKey = compressedPubKey(privateKey(OWN_SEED));
    expect(keyPush.data).toEqual(pubKey);
    const sigWithType = sigPush.data ?? new Uint8Array(0);
    expect(sigWithType[sigWithType.length - 1]).toBe(SIG_HASH_ALL);

    const hash = calcSignatureHash(p2pkhScript(OWN_SEED), SIG_HASH_ALL, tx, 1);
    expect(secp256k1.verify(sigWithType.subarray(0, -1), hash, pubKey)).toBe(true);
  });

  it('aborts when one of its inputs is missing', async () => {
    const { participant, mixScript } = await submitted();
    const bytes = joined(mixScript, (tx) => {
      tx.inputs.pop();
    });
    expect(() => participant.finalize(bytes)).toThrow(withCode(TicketBuyerErrorCode.MISSING_INPUTS));
    expect(participant.getState()).toBe(ParticipantState.Aborted);
  });

  it('aborts when its input carries a different value', async () => {
    const { participant, mixScript } = await submitted();
    const bytes = joined(mixScript, (tx) => {
      tx.inputs[1].valueIn = 199_999n;
    });
    expect(() => participant.finalize(bytes)).toThrow(withCode(TicketBuyerErrorCode.MISSING_INPUTS));
  });

  it('checks inputs before change', async () => {
    const { participant, mixScript } = await submitted();
    const bytes = joined(mixScript, (tx) => {
      tx.inputs.pop();
      tx.outputs.splice(2, 1);
    });
    expect(() => participant.finalize(bytes)).toThrow(withCode(TicketBuyerErrorCode.MISSING_INPUTS));
  });

  it('aborts when its change is missing', async () => {
    const { participant, mixScript } = await submitted();
    const bytes = joined(mixScript, (tx) => {
      tx.outputs[2].value = 48_999n;
    });
    expect(() => participant.finalize(bytes)).toThrow(withCode(TicketBuyerErrorCode.MISSING_CHANGE));
  });

  it('aborts when its mixed output was replaced', async () => {
    const { participant, mixScript } = await submitted();
    const bytes = joined(mixScript, (tx) => {
      tx.outputs[1] = newTxOut(MIX_AMOUNT, p2pkhScript(62));
    });
    expect(() => participant.finalize(bytes)).toThrow(withCode(TicketBuyerErrorCode.MISSING_COMMITMENT));
    expect(participant.getState()).toBe(ParticipantState.Aborted);
  });

  it('enforces the state order', async () => {
    const { participant, mixScript } = await submitted();
    expect(() => participant.addInput(p2pkhScript(OWN_SEED), ownInput())).toThrow(
      withCode(TicketBuyerErrorCode.INVALID_STATE),
    );
    await expect(participant.sign()).rejects.toThrow('cannot sign in state submitted');
    participant.finalize(joined(mixScript));
    expect(participant.getState()).toBe(ParticipantState.Confirmed);
  });

  it('refuses to finalize before mixed outputs exist', () => {
    const participant = new CoinJoinParticipant({
      wallet: new FakeWallet(SIMNET),
      network: SIMNET,
      mixAccount: 'mixed',
      amount: MIX_AMOUNT,
    });
    expect(() => participant.finalize(new Uint8Array(0))).toThrow('cannot finalize in state built');
  });

  it('treats a multisig previous output as a bug', async () => {
    const k1 = compressedPubKey(privateKey(1));
    const k2 = compressedPubKey(privateKey(2));
    const multisig = Uint8Array.from([OP_1, 0x21, ...k1, 0x21, ...k2, OP_1 + 1, OP_CHECKMULTISIG]);
    const { participant, mixScript } = await submitted(multisig);
    participant.finalize(joined(mixScript));

    await expect(participant.sign()).rejects.toThrow(withCode(TicketBuyerErrorCode.BUG));
    expect(participant.getState()).toBe(ParticipantState.Aborted);
  });

  it('treats a script hash previous output as a bug', async () => {
    const { participant, mixScript } = await submitted(payToScriptHashScript(new Uint8Array(20).fill(4)));
    participant.finalize(joined(mixScript));
    await expect(participant.sign()).rejects.toThrow('previous output is not P2PKH');
  });
});
