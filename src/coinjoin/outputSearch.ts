import { timingSafeEqual } from 'node:crypto';
import { Errors } from '../errors';
import type { TxOut } from '../blockchain/types';

export interface ExpectedOutput {
  script: Uint8Array;
  value: bigint;
  version: number;
}

// All helpers below take and return 0 or 1 and never branch on their inputs.

function ctSelect(v: number, a: number, b: number): number {
  return (-v & a) | ((v - 1) & b);
}

function ctEqOne(x: number): number {
  return (((x ^ 1) - 1) >>> 31) & 1;
}

function ctBytesEqual(a: Uint8Array, b: Uint8Array): number {
  return Number(timingSafeEqual(a, b));
}

/**
 * Locate each expected output in `outputs` and return their indexes, in order.
 *
 * Value, version and script length are public transaction data and are used to
 * narrow the candidates. Script contents are compared in constant time, and the
 * matching index is picked without branching on the comparison. Fails with
 * MISSING_COMMITMENT unless every expected output matched exactly once; the
 * failure is reported only after every expected output has been scanned.
 */
export function constantTimeOutputSearch(
  expected: readonly ExpectedOutput[],
  outputs: readonly TxOut[],
): number[] {
  const indexes: number[] = [];
  let allFound = 1;

  for (const want of expected) {
    const candidates: number[] = [];
    outputs.forEach((output, i) => {
      if (
        output.value === want.value &&
        output.version === want.version &&
        output.pkScript.length === want.script.length
      ) {
        candidates.push(i);
      }
    });

    let index = 0;
    let matches = 0;
    for (const candidate of candidates) {
      const eq = ctBytesEqual(want.script, outputs[candidate].pkScript);
      index = ctSelect(eq, candidate, index);
      matches += eq;
    }
    allFound &= ctEqOne(matches);
    indexes.push(index);
  }

  if (allFound !== 1) {
    throw Errors.missingCommitment();
  }
  return indexes;
}
