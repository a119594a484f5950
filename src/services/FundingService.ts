import { decodeAddress } from '../blockchain/address';
import { addressScript, payToPubKeyHashScript } from '../blockchain/script';
import type { MsgTx, TicketFunding } from '../blockchain/types';
import type { WalletService } from '../blockchain/walletClient';
import { deserializeTx, newTxOut, serializeTx, txHash, txidOf } from '../blockchain/wire';
import { CoinJoinParticipant, ParticipantState } from '../coinjoin/CoinJoinParticipant';
import {
  runMixSession,
  type MixConnector,
  type MixPairing,
  type MixSessionDriver,
} from '../coinjoin/session';
import { DEFAULT_EXPIRY, DEFAULT_LOCK_TIME, GENERATED_TX_VERSION } from '../config/constants';
import type { NetworkParams } from '../config/networks';
import { Errors } from '../errors';
import { FeeConvergentBuilder, type FundedTransaction } from './FeeConvergentBuilder';

export interface MixOptions {
  server: string;
  driver: MixSessionDriver;
  connect?: MixConnector;
}

export interface FundingServiceOptions {
  wallet: WalletService;
  network: NetworkParams;
  passphrase: string;
  sourceAccount: string;
  changeAccount: string;
  minConfirmations: number;
  maxFeeIterations?: number;
  mix?: MixOptions;
  shuffle?: <T>(items: T[]) => T[];
}

/**
 * Lowest index paying exactly `amount`. Several equal outputs are possible in a
 * mixed transaction; the choice is logged.
 */
export function selectFundingOutput(tx: MsgTx, amount: bigint): number {
  const matches = tx.outputs.flatMap((out, index) => (out.value === amount ? [index] : []));
  if (matches.length === 0) {
    throw Errors.malformedTransaction(`could not find an output of ${amount} atoms to fund the ticket`);
  }
  if (matches.length > 1) {
    console.warn(
      `[tkby] ${matches.length} outputs pay ${amount} atoms (indexes ${matches.join(', ')}); using ${matches[0]}`,
    );
  }
  return matches[0];
}

/**
 * Produces the output that pays for one ticket, either through a plain wallet
 * transaction or through a coin-join.
 */
export class FundingService {
  constructor(private readonly options: FundingServiceOptions) {}

  get mixed(): boolean {
    return this.options.mix !== undefined;
  }

  private async internalScript(account: string): Promise<Uint8Array> {
    const encoded = await this.options.wallet.nextAddress(account, true);
    return addressScript(decodeAddress(encoded, this.options.network)).pkScript;
  }

  async fundTicket(cost: bigint, signal?: AbortSignal): Promise<TicketFunding> {
    const { wallet } = this.options;
    if (signal?.aborted) {
      throw Errors.cancelled();
    }

    // Fresh snapshot for every attempt.
    const utxos = await wallet.listUnspent(this.options.minConfirmations);
    const relayFee = await wallet.relayFee();

    // A mixed ticket is funded from the participant's own mix output; the
    // builder only needs an output of the same size.
    const outputScript = this.options.mix
      ? payToPubKeyHashScript(new Uint8Array(20))
      : await this.internalScript(this.options.sourceAccount);
    const changeScript = await this.internalScript(this.options.changeAccount);

    const builder = new FeeConvergentBuilder({
      relayFeePerKb: relayFee,
      sourceAccount: this.options.sourceAccount,
      maxIterations: this.options.maxFeeIterations,
      shuffle: this.options.shuffle,
    });
    const funded = builder.build(utxos, [newTxOut(cost, outputScript)], changeScript);
    console.log(
      `[tkby] funding ${cost} atoms from ${funded.inputs.length} input(s), fee ${funded.fee} after ${funded.iterations} iteration(s)`,
    );

    if (!this.options.mix) {
      const signed = await wallet.signTransaction(this.options.passphrase, serializeTx(funded.tx));
      const published = await wallet.publishTransaction(signed);
      const transaction = deserializeTx(signed);
      const hash = txHash(transaction);
      if (txidOf(transaction) !== published) {
        console.warn(`[tkby] wallet reported funding hash ${published}, computed ${txidOf(transaction)}`);
      }
      console.log(`[tkby] Funding Tx Hash: ${published}`);
      return {
        txHash: hash,
        outputIndex: selectFundingOutput(transaction, cost),
        amount: cost,
        transaction,
        mixed: false,
      };
    }

    return this.fundThroughMix(cost, funded, signal);
  }

  private async fundThroughMix(
    cost: bigint,
    funded: FundedTransaction,
    signal?: AbortSignal,
  ): Promise<TicketFunding> {
    const mix = this.options.mix;
    if (!mix) {
      throw Errors.bug('mix funding requested without mix options');
    }

    const participant = new CoinJoinParticipant({
      wallet: this.options.wallet,
      network: this.options.network,
      mixAccount: this.options.sourceAccount,
      amount: cost,
      change: funded.change,
    });
    for (const selected of funded.inputs) {
      participant.addInput(selected.prevScript, selected.input);
    }

    const pairing: MixPairing = {
      scriptClass: 'P2PKHv0',
      amount: cost,
      txVersion: GENERATED_TX_VERSION,
      lockTime: DEFAULT_LOCK_TIME,
      expiry: DEFAULT_EXPIRY,
    };

    try {
      await runMixSession({
        server: mix.server,
        driver: mix.driver,
        participant,
        pairing,
        signal,
        connect: mix.connect,
      });
    } catch (err) {
      participant.abort();
      throw err;
    }

    if (participant.getState() !== ParticipantState.Signed) {
      throw Errors.invalidState('use mixed funding', participant.getState());
    }

    const transaction = participant.transaction();
    const indexes = participant.mixOutputIndexes();
    const outputIndex = Math.min(...indexes);
    console.log(`[cspp] Published Funding Tx: ${txidOf(transaction)}, Indexes: ${indexes.join(', ')}`);
    return {
      txHash: txHash(transaction),
      outputIndex,
      amount: cost,
      transaction,
      mixed: true,
    };
  }
}
