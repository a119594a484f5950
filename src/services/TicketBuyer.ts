import { decodeAddress } from '../blockchain/address';
import { addressScript } from '../blockchain/script';
import { feeForSerializeSize } from '../blockchain/txSizes';
import type { WalletService } from '../blockchain/walletClient';
import { hashToHex, newTxOut, serializeTx } from '../blockchain/wire';
import { formatAtoms } from '../config/constants';
import type { NetworkParams } from '../config/networks';
import type { PurchaseKind, PurchaseLedger } from '../db/PurchaseStore';
import { Errors, TicketBuyerErrorCode, wrapError } from '../errors';
import { FeeConvergentBuilder } from './FeeConvergentBuilder';
import type { FundingService } from './FundingService';
import { assembleTicket, estimateTicketSize } from './TicketAssembler';

export interface TicketBuyerOptions {
  wallet: WalletService;
  network: NetworkParams;
  funding: FundingService;
  passphrase: string;
  sourceAccount: string;
  changeAccount: string;
  votingAccount: string;
  minConfirmations: number;
  maxFeeIterations?: number;
  ledger?: PurchaseLedger;
  shuffle?: <T>(items: T[]) => T[];
}

export interface PurchaseResult {
  ticketHash: string;
  fundingTxHash: string;
  fundingOutputIndex: number;
  ticketPrice: bigint;
  ticketFee: bigint;
  mixed: boolean;
}

export interface BuyerStatus {
  inFlight: boolean;
  attempts: number;
  lastError: { code: string; message: string } | null;
  lastTicketHash: string | null;
}

export class TicketBuyer {
  private inFlight = false;
  private attempts = 0;
  private lastError: BuyerStatus['lastError'] = null;
  private lastTicketHash: string | null = null;

  constructor(private readonly options: TicketBuyerOptions) {}

  status(): BuyerStatus {
    return {
      inFlight: this.inFlight,
      attempts: this.attempts,
      lastError: this.lastError,
      lastTicketHash: this.lastTicketHash,
    };
  }

  private async nextAddress(account: string) {
    return decodeAddress(await this.options.wallet.nextAddress(account, true), this.options.network);
  }

  /**
   * Only one purchase or send may be in flight; both spend from the same
   * unspent output set.
   */
  private async exclusive<T>(kind: PurchaseKind, amount: () => Promise<bigint>, body: (attemptId: number | null) => Promise<T>): Promise<T> {
    if (this.inFlight) {
      throw Errors.invalidState(kind === 'ticket' ? 'purchase ticket' : 'send funds', 'in-flight');
    }
    this.inFlight = true;
    this.attempts += 1;
    let attemptId: number | null = null;
    try {
      const total = await amount();
      if (this.options.ledger) {
        attemptId = await this.options.ledger.recordStarted({
          kind,
          network: this.options.network.name,
          amount: total,
          mixed: kind === 'ticket' && this.options.funding.mixed,
        });
      }
      const result = await body(attemptId);
      this.lastError = null;
      return result;
    } catch (err) {
      const error = wrapError(err);
      this.lastError = { code: error.code, message: error.message };
      if (error.code === TicketBuyerErrorCode.PUBLISH_FAILED) {
        console.error(`[tkby] PUBLISH FAILED after signing, not retrying: ${error.message}`);
      }
      if (attemptId !== null && this.options.ledger) {
        try {
          await this.options.ledger.markFailed(attemptId, error);
        } catch (ledgerErr) {
          console.error(`[ledger] failed to record attempt ${attemptId} as failed`, ledgerErr);
        }
      }
      throw error;
    } finally {
      this.inFlight = false;
    }
  }

  async purchaseTicket(signal?: AbortSignal): Promise<PurchaseResult> {
    let ticketPrice = 0n;
    let ticketFee = 0n;

    return this.exclusive(
      'ticket',
      async () => {
        await this.printUnspentOutputs();
        ticketPrice = await this.options.wallet.ticketPrice();
        const ticketRelayFee = await this.options.wallet.ticketRelayFee();
        ticketFee = feeForSerializeSize(ticketRelayFee, estimateTicketSize());
        console.log(`[tkby] Ticket Price: ${formatAtoms(ticketPrice)}, Ticket Fee: ${formatAtoms(ticketFee)}`);
        return ticketPrice + ticketFee;
      },
      async (attemptId) => {
        const cost = ticketPrice + ticketFee;
        const votingAddress = await this.nextAddress(this.options.votingAccount);

        const funding = await this.options.funding.fundTicket(cost, signal);
        const fundingTxHash = hashToHex(funding.txHash);

        const commitmentAddress = await this.nextAddress(this.options.votingAccount);
        const changeAddress = await this.nextAddress(this.options.votingAccount);
        const ticket = assembleTicket({
          funding,
          ticketPrice,
          votingAddress,
          commitmentAddress,
          changeAddress,
        });

        if (signal?.aborted) {
          throw Errors.cancelled();
        }

        const signed = await this.options.wallet.signTransaction(this.options.passphrase, serializeTx(ticket));
        const ticketHash = await this.options.wallet.publishTransaction(signed);
        console.log(`[tkby] Tx Hash: ${ticketHash}`);

        if (attemptId !== null && this.options.ledger) {
          await this.options.ledger.markPublished(attemptId, {
            publishedTxHash: ticketHash,
            fundingTxHash,
            fundingOutputIndex: funding.outputIndex,
          });
        }
        this.lastTicketHash = ticketHash;
        return {
          ticketHash,
          fundingTxHash,
          fundingOutputIndex: funding.outputIndex,
          ticketPrice,
          ticketFee,
          mixed: funding.mixed,
        };
      },
    );
  }

  /**
   * Regular transfer of `amount` atoms to `destination`, change to the change account.
   */
  async sendFunds(destination: string, amount: bigint): Promise<string> {
    if (amount <= 0n) {
      throw Errors.invalidArgument('amount must be positive');
    }
    const destinationScript = addressScript(decodeAddress(destination, this.options.network)).pkScript;

    return this.exclusive(
      'send',
      async () => amount,
      async (attemptId) => {
        const utxos = await this.options.wallet.listUnspent(this.options.minConfirmations);
        const relayFee = await this.options.wallet.relayFee();
        const changeScript = addressScript(await this.nextAddress(this.options.changeAccount)).pkScript;

        const builder = new FeeConvergentBuilder({
          relayFeePerKb: relayFee,
          sourceAccount: this.options.sourceAccount,
          maxIterations: this.options.maxFeeIterations,
          shuffle: this.options.shuffle,
        });
        const funded = builder.build(utxos, [newTxOut(amount, destinationScript)], changeScript);

        const signed = await this.options.wallet.signTransaction(this.options.passphrase, serializeTx(funded.tx));
        const txid = await this.options.wallet.publishTransaction(signed);
        console.log(`[tkby] Sent ${formatAtoms(amount)} to ${destination} in ${txid} (fee ${formatAtoms(funded.fee)})`);

        if (attemptId !== null && this.options.ledger) {
          await this.options.ledger.markPublished(attemptId, { publishedTxHash: txid });
        }
        return txid;
      },
    );
  }

  /**
   * Buy one ticket per block notification until `signal` aborts. Attempts run
   * one at a time; recoverable failures are logged and the loop continues.
   */
  async watch(signal: AbortSignal): Promise<void> {
    console.log('[tkby] Listening for block notifications');
    for await (const notification of this.options.wallet.subscribeBlockNotifications(signal)) {
      if (signal.aborted) break;
      console.log(`[tkby] ${notification.attachedBlockCount} block(s) attached`);
      try {
        await this.purchaseTicket(signal);
      } catch (err) {
        const error = wrapError(err);
        if (error.code === TicketBuyerErrorCode.CANCELLED && signal.aborted) {
          break;
        }
        if (error.fatal) {
          console.error(`[tkby] stopping: ${error.code} ${error.message}`);
          throw error;
        }
        console.warn(`[tkby] purchase attempt failed (${error.code}): ${error.message}`);
      }
    }
  }

  async printBalance(account = this.options.sourceAccount): Promise<bigint> {
    const balance = await this.options.wallet.balance(account, this.options.minConfirmations);
    console.log(`[tkby] Spendable balance: ${formatAtoms(balance)}`);
    return balance;
  }

  async printUnspentOutputs(): Promise<void> {
    const unspent = await this.options.wallet.listUnspent(this.options.minConfirmations);
    console.log('[tkby] Unspent Outputs');
    for (const output of unspent) {
      console.log(`[tkby] ${output.txid}:${output.vout} Spendable: ${output.spendable} Amount: ${formatAtoms(output.amount)}`);
    }
  }
}
