import { TicketBuyerError, TicketBuyerErrorCode } from '../errors';
import { decodeCommitment, getScriptClass, ScriptClass } from './script';
import { TICKET_COMMITMENT_SCRIPT_SIZE } from './txSizes';
import type { MsgTx } from './types';

export const MAX_INPUTS_PER_SSTX = 64;
export const MAX_OUTPUTS_PER_SSTX = MAX_INPUTS_PER_SSTX * 2 + 1;

function invalidTicket(message: string): TicketBuyerError {
  return new TicketBuyerError(TicketBuyerErrorCode.INVALID_TICKET, message);
}

/**
 * Structural check of a stake submission (ticket purchase) transaction:
 * output 0 is the tagged submission, odd outputs are commitments and even
 * outputs after the first are tagged change.
 */
export function checkSStx(tx: MsgTx): void {
  if (tx.inputs.length === 0) {
    throw invalidTicket('SStx has no inputs');
  }
  if (tx.inputs.length > MAX_INPUTS_PER_SSTX) {
    throw invalidTicket(`SStx has too many inputs (${tx.inputs.length})`);
  }
  if (tx.outputs.length === 0) {
    throw invalidTicket('SStx has no outputs');
  }
  if (tx.outputs.length > MAX_OUTPUTS_PER_SSTX) {
    throw invalidTicket(`SStx has too many outputs (${tx.outputs.length})`);
  }
  if (tx.outputs.length !== tx.inputs.length * 2 + 1) {
    throw invalidTicket(
      `SStx has ${tx.outputs.length} outputs for ${tx.inputs.length} inputs, want ${tx.inputs.length * 2 + 1}`,
    );
  }

  for (const [index, output] of tx.outputs.entries()) {
    if (output.version !== 0) {
      throw invalidTicket(`SStx output ${index} has script version ${output.version}`);
    }
  }

  const submission = tx.outputs[0];
  if (getScriptClass(submission.version, submission.pkScript) !== ScriptClass.StakeSubmission) {
    throw invalidTicket('SStx output 0 is not a stake submission');
  }

  let committed = 0n;
  for (let i = 1; i < tx.outputs.length; i += 2) {
    const commitment = tx.outputs[i];
    if (commitment.pkScript.length !== TICKET_COMMITMENT_SCRIPT_SIZE) {
      throw invalidTicket(`SStx output ${i} commitment has length ${commitment.pkScript.length}`);
    }
    const decoded = decodeCommitment(commitment.pkScript);
    if (!decoded || getScriptClass(0, commitment.pkScript) !== ScriptClass.NullData) {
      throw invalidTicket(`SStx output ${i} is not a commitment`);
    }
    committed += decoded.amount;

    const change = tx.outputs[i + 1];
    if (getScriptClass(change.version, change.pkScript) !== ScriptClass.StakeSubChange) {
      throw invalidTicket(`SStx output ${i + 1} is not stake change`);
    }
  }

  if (committed < submission.value) {
    throw invalidTicket(
      `SStx commitments (${committed}) do not cover the submission (${submission.value})`,
    );
  }
}

export function isSStx(tx: MsgTx): boolean {
  try {
    checkSStx(tx);
    return true;
  } catch {
    return false;
  }
}
