export type TxTree = 0 | 1; // regular, stake

export const TX_TREE_REGULAR: TxTree = 0;
export const TX_TREE_STAKE: TxTree = 1;

/**
 * An unspent output as listed by the wallet. Read once per attempt and never mutated.
 */
export interface UnspentOutput {
  txid: string; // display (byte-reversed) hex
  vout: number;
  tree: TxTree;
  account: string;
  amount: bigint; // atoms
  spendable: boolean;
  scriptPubKey: string; // hex
  confirmations?: number;
}

export interface OutPoint {
  hash: Uint8Array; // 32 bytes, wire order
  index: number;
  tree: TxTree;
}

export interface TxIn {
  previousOutPoint: OutPoint;
  sequence: number;
  valueIn: bigint;
  blockHeight: number;
  blockIndex: number;
  signatureScript: Uint8Array;
}

export interface TxOut {
  value: bigint;
  version: number;
  pkScript: Uint8Array;
}

export enum TxSerializeType {
  Full = 0,
  NoWitness = 1,
  OnlyWitness = 2,
}

export interface MsgTx {
  version: number;
  serType: TxSerializeType;
  inputs: TxIn[];
  outputs: TxOut[];
  lockTime: number;
  expiry: number;
}

/**
 * The verified output that pays for one ticket, consumed exactly once by the assembler.
 */
export interface TicketFunding {
  txHash: Uint8Array;
  outputIndex: number;
  amount: bigint;
  transaction: MsgTx;
  mixed: boolean;
}
