import { randomInt } from 'node:crypto';
import {
  getScriptClass,
  getStakeOutSubclass,
  MAX_SCRIPT_ELEMENT_SIZE,
  ScriptClass,
} from '../blockchain/script';
import {
  estimateSerializeSize,
  feeForSerializeSize,
  isDustAmount,
  REDEEM_P2PK_SIG_SCRIPT_SIZE,
  REDEEM_P2PKH_SIG_SCRIPT_SIZE,
} from '../blockchain/txSizes';
import type { MsgTx, TxIn, TxOut, UnspentOutput } from '../blockchain/types';
import { hashFromHex, newMsgTx, newTxIn, newTxOut } from '../blockchain/wire';
import { DEFAULT_MAX_FEE_ITERATIONS, GENERATED_TX_VERSION } from '../config/constants';
import { Errors, hasErrorCode, TicketBuyerErrorCode } from '../errors';

export type RelayFeeSource = bigint | (() => bigint);

export interface FeeConvergentBuilderConfig {
  // Atoms per kB; a function is asked again on every iteration.
  relayFeePerKb: RelayFeeSource;
  // Only outputs of this account are spent; undefined spends any account.
  sourceAccount?: string;
  maxIterations?: number;
  shuffle?: <T>(items: T[]) => T[];
  txVersion?: number;
}

export interface SelectedInput {
  utxo: UnspentOutput;
  input: TxIn;
  prevScript: Uint8Array;
  redeemScriptSize: number;
}

export interface InputSelection {
  inputs: SelectedInput[];
  total: bigint;
}

export interface FundedTransaction {
  tx: MsgTx;
  inputs: SelectedInput[];
  totalIn: bigint;
  // Fee for the estimated signed size.
  requiredFee: bigint;
  // Fee actually paid, including any leftover absorbed as dust.
  fee: bigint;
  change?: TxOut;
  changeIndex: number;
  iterations: number;
}

export function shuffleInPlace<T>(items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomInt(i + 1);
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

/**
 * Signature script size needed to redeem `pkScript`. Throws
 * UNSUPPORTED_SCRIPT_CLASS when the wallet cannot spend that kind of output.
 */
export function redeemScriptSize(pkScript: Uint8Array): number {
  const scriptClass = getScriptClass(0, pkScript);
  switch (scriptClass) {
    case ScriptClass.PubKeyHash:
      return REDEEM_P2PKH_SIG_SCRIPT_SIZE;
    case ScriptClass.PubKey:
      return REDEEM_P2PK_SIG_SCRIPT_SIZE;
    case ScriptClass.StakeGen:
    case ScriptClass.StakeRevocation:
    case ScriptClass.StakeSubChange: {
      // Nested P2SH can pay to scripts the wallet does not know.
      const nested = getStakeOutSubclass(pkScript);
      if (nested !== ScriptClass.PubKeyHash) {
        throw Errors.unsupportedScriptClass(nested, true);
      }
      return REDEEM_P2PKH_SIG_SCRIPT_SIZE;
    }
    default:
      throw Errors.unsupportedScriptClass(scriptClass);
  }
}

/**
 * Picks inputs for a set of outputs, iterating until the fee implied by the
 * chosen inputs is covered, and adds change unless it would be dust.
 */
export class FeeConvergentBuilder {
  private readonly maxIterations: number;
  private readonly shuffle: <T>(items: T[]) => T[];

  constructor(private readonly config: FeeConvergentBuilderConfig) {
    this.maxIterations = config.maxIterations ?? DEFAULT_MAX_FEE_ITERATIONS;
    this.shuffle = config.shuffle ?? shuffleInPlace;
    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw Errors.invalidArgument('maxIterations must be a positive integer');
    }
  }

  private relayFee(): bigint {
    const source = this.config.relayFeePerKb;
    return typeof source === 'function' ? source() : source;
  }

  /**
   * Greedy selection over `candidates` in the given order until `target` is reached.
   */
  selectInputs(candidates: readonly UnspentOutput[], target: bigint): InputSelection {
    const inputs: SelectedInput[] = [];
    let total = 0n;
    for (const utxo of candidates) {
      if (!utxo.spendable) continue;
      if (this.config.sourceAccount !== undefined && utxo.account !== this.config.sourceAccount) continue;

      if (!/^([0-9a-f]{2})*$/i.test(utxo.scriptPubKey)) {
        throw Errors.invalidArgument(`unspent output ${utxo.txid}:${utxo.vout} has a malformed script`);
      }
      const prevScript = Uint8Array.from(Buffer.from(utxo.scriptPubKey, 'hex'));
      let size: number;
      try {
        size = redeemScriptSize(prevScript);
      } catch (err) {
        if (!hasErrorCode(err, TicketBuyerErrorCode.UNSUPPORTED_SCRIPT_CLASS)) throw err;
        console.warn(`[tkby] ${err.message}`);
        continue;
      }

      const input = newTxIn({ hash: hashFromHex(utxo.txid), index: utxo.vout, tree: utxo.tree }, utxo.amount);
      inputs.push({ utxo, input, prevScript, redeemScriptSize: size });
      total += utxo.amount;
      if (total >= target) {
        return { inputs, total };
      }
    }
    throw Errors.insufficientBalance(target, total);
  }

  /**
   * Fund `outputs` from `utxos`, paying any non-dust leftover to `changeScript`.
   */
  build(utxos: readonly UnspentOutput[], outputs: readonly TxOut[], changeScript: Uint8Array): FundedTransaction {
    if (outputs.length === 0) {
      throw Errors.invalidArgument('at least one output is required');
    }
    if (changeScript.length > MAX_SCRIPT_ELEMENT_SIZE) {
      throw Errors.invalidArgument('script size exceed maximum bytes pushable to the stack');
    }
    const amount = outputs.reduce((sum, out) => sum + out.value, 0n);
    if (amount <= 0n || outputs.some((out) => out.value < 0n)) {
      throw Errors.invalidArgument('output amounts must be positive');
    }

    const candidates = this.shuffle([...utxos]);
    const changeScriptSize = changeScript.length;

    // Seeded with a single standard input.
    let targetFee = feeForSerializeSize(
      this.relayFee(),
      estimateSerializeSize([REDEEM_P2PKH_SIG_SCRIPT_SIZE], outputs, changeScriptSize),
    );

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      const selection = this.selectInputs(candidates, amount + targetFee);

      const rate = this.relayFee();
      const maxSignedSize = estimateSerializeSize(
        selection.inputs.map((input) => input.redeemScriptSize),
        outputs,
        changeScriptSize,
      );
      const requiredFee = feeForSerializeSize(rate, maxSignedSize);
      if (selection.total - amount < requiredFee) {
        targetFee = requiredFee;
        continue;
      }

      const tx = newMsgTx(this.config.txVersion ?? GENERATED_TX_VERSION);
      tx.inputs = selection.inputs.map((selected) => selected.input);
      tx.outputs = outputs.map((out) => newTxOut(out.value, out.pkScript, out.version));

      let change: TxOut | undefined;
      let changeIndex = -1;
      const changeAmount = selection.total - amount - requiredFee;
      if (changeAmount !== 0n && !isDustAmount(changeAmount, changeScriptSize, rate)) {
        change = newTxOut(changeAmount, changeScript);
        changeIndex = tx.outputs.length;
        tx.outputs.push(change);
      }

      return {
        tx,
        inputs: selection.inputs,
        totalIn: selection.total,
        requiredFee,
        fee: selection.total - amount - (change?.value ?? 0n),
        change,
        changeIndex,
        iterations: iteration,
      };
    }

    throw Errors.feeConvergenceFailed(this.maxIterations, targetFee);
  }
}
