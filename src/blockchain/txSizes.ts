import type { TxOut } from './types';
import { varIntSerializeSize } from './wire';

// Signature script sizes: push(DER sig ‖ hashtype) [+ push(compressed pubkey)].
export const REDEEM_P2PKH_SIG_SCRIPT_SIZE = 1 + 73 + 1 + 33;
export const REDEEM_P2PK_SIG_SCRIPT_SIZE = 1 + 73;

export const P2PKH_PK_SCRIPT_SIZE = 25;
export const TICKET_COMMITMENT_SCRIPT_SIZE = 32;

// outpoint (32 + 4 + 1) + sequence (4) + value in (8) + block height (4) + block index (4)
const INPUT_FIXED_SIZE = 57;

export const REDEEM_P2PKH_INPUT_SIZE = estimateInputSize(REDEEM_P2PKH_SIG_SCRIPT_SIZE);
export const P2PKH_OUTPUT_SIZE = estimateOutputSize(P2PKH_PK_SCRIPT_SIZE);

export const MAX_AMOUNT = 21_000_000n * 100_000_000n;

export function estimateInputSize(scriptSize: number): number {
  return INPUT_FIXED_SIZE + varIntSerializeSize(scriptSize) + scriptSize;
}

export function estimateOutputSize(scriptSize: number): number {
  return 8 + 2 + varIntSerializeSize(scriptSize) + scriptSize;
}

/**
 * Worst case serialized size of a transaction spending inputs with the given
 * signature script sizes and paying `txOuts`, plus an optional change output
 * (`changeScriptSize` 0 means none).
 */
export function estimateSerializeSize(
  scriptSizes: readonly number[],
  txOuts: readonly TxOut[],
  changeScriptSize: number,
): number {
  return estimateSerializeSizeFromScriptSizes(
    scriptSizes,
    txOuts.map((txOut) => txOut.pkScript.length),
    changeScriptSize,
  );
}

export function feeForSerializeSize(relayFeePerKb: bigint, txSerializeSize: number): bigint {
  let fee = (relayFeePerKb * BigInt(txSerializeSize)) / 1000n;
  if (fee === 0n && relayFeePerKb > 0n) {
    fee = relayFeePerKb;
  }
  if (fee < 0n || fee > MAX_AMOUNT) {
    fee = MAX_AMOUNT;
  }
  return fee;
}

// Size of an output plus the input that would later spend it.
function spendCycleSize(scriptSize: number): bigint {
  return BigInt(estimateOutputSize(scriptSize) + 165);
}

/**
 * An output is dust when spending it would cost more than a third of its value
 * at the given relay fee rate.
 */
export function isDustAmount(amount: bigint, scriptSize: number, relayFeePerKb: bigint): boolean {
  return (amount * 1000n) / (3n * spendCycleSize(scriptSize)) < relayFeePerKb;
}

/**
 * Largest amount still considered dust for a script of the given size.
 */
export function dustThreshold(scriptSize: number, relayFeePerKb: bigint): bigint {
  const scaled = relayFeePerKb * 3n * spendCycleSize(scriptSize);
  return (scaled + 999n) / 1000n - 1n;
}

export function estimateSerializeSizeFromScriptSizes(
  inputScriptSizes: readonly number[],
  outputScriptSizes: readonly number[],
  changeScriptSize: number,
): number {
  const changeSize = changeScriptSize > 0 ? estimateOutputSize(changeScriptSize) : 0;
  const outputCount = outputScriptSizes.length + (changeScriptSize > 0 ? 1 : 0);
  return (
    12 +
    2 * varIntSerializeSize(inputScriptSizes.length) +
    varIntSerializeSize(outputCount) +
    inputScriptSizes.reduce((sum, size) => sum + estimateInputSize(size), 0) +
    outputScriptSizes.reduce((sum, size) => sum + estimateOutputSize(size), 0) +
    changeSize
  );
}
