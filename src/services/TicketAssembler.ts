import type { Address } from '../blockchain/address';
import { generateSStxAddrPush, payToSStx, payToSStxChange } from '../blockchain/script';
import { checkSStx } from '../blockchain/stake';
import {
  estimateSerializeSizeFromScriptSizes,
  P2PKH_PK_SCRIPT_SIZE,
  REDEEM_P2PKH_SIG_SCRIPT_SIZE,
  TICKET_COMMITMENT_SCRIPT_SIZE,
} from '../blockchain/txSizes';
import { TX_TREE_REGULAR, type MsgTx, type TicketFunding } from '../blockchain/types';
import { newMsgTx, newTxIn, newTxOut } from '../blockchain/wire';
import { DEFAULT_EXPIRY, DEFAULT_LOCK_TIME, DEFAULT_TICKET_FEE_LIMITS } from '../config/constants';
import { Errors } from '../errors';

export interface AssembleTicketParams {
  funding: TicketFunding;
  ticketPrice: bigint;
  votingAddress: Address;
  commitmentAddress: Address;
  changeAddress: Address;
  feeLimits?: number;
}

/**
 * Size of a ticket with one P2PKH input, a tagged P2PKH submission, one
 * commitment and tagged P2PKH change.
 */
export function estimateTicketSize(): number {
  return estimateSerializeSizeFromScriptSizes(
    [REDEEM_P2PKH_SIG_SCRIPT_SIZE],
    [P2PKH_PK_SCRIPT_SIZE + 1, TICKET_COMMITMENT_SCRIPT_SIZE, P2PKH_PK_SCRIPT_SIZE + 1],
    0,
  );
}

/**
 * Build the unsigned ticket spending the funding output. The result has
 * already passed the stake submission structure check.
 */
export function assembleTicket(params: AssembleTicketParams): MsgTx {
  const { funding, ticketPrice } = params;
  if (ticketPrice <= 0n) {
    throw Errors.invalidArgument('ticket price must be positive');
  }
  if (funding.amount < ticketPrice) {
    throw Errors.invalidArgument(
      `funding output ${funding.amount} does not cover ticket price ${ticketPrice}`,
    );
  }

  const tx = newMsgTx(1);
  tx.lockTime = DEFAULT_LOCK_TIME;
  tx.expiry = DEFAULT_EXPIRY;
  tx.inputs.push(
    newTxIn({ hash: funding.txHash, index: funding.outputIndex, tree: TX_TREE_REGULAR }, funding.amount),
  );
  tx.outputs.push(newTxOut(ticketPrice, payToSStx(params.votingAddress)));
  tx.outputs.push(
    newTxOut(
      0n,
      generateSStxAddrPush(
        params.commitmentAddress,
        funding.amount,
        params.feeLimits ?? DEFAULT_TICKET_FEE_LIMITS,
      ),
    ),
  );
  tx.outputs.push(newTxOut(0n, payToSStxChange(params.changeAddress)));

  checkSStx(tx);
  return tx;
}
