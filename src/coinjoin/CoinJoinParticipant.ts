import { decodeAddress, decodeWif, encodeAddress, hash160 } from '../blockchain/address';
import { addressScript, extractScriptAddresses } from '../blockchain/script';
import { compressedPubKey, signatureScript } from '../blockchain/sign';
import type { MsgTx, TxIn, TxOut } from '../blockchain/types';
import { cloneTx, deserializeTx, newMsgTx, outPointKey, serializeTx } from '../blockchain/wire';
import type { NetworkParams } from '../config/networks';
import { GENERATED_TX_VERSION } from '../config/constants';
import { Errors } from '../errors';
import type { WalletService } from '../blockchain/walletClient';
import { constantTimeOutputSearch } from './outputSearch';
import type { MixParticipant } from './session';

export enum ParticipantState {
  Built = 'built',
  Submitted = 'submitted',
  Confirmed = 'confirmed',
  Signed = 'signed',
  Aborted = 'aborted',
}

export interface CoinJoinParticipantOptions {
  wallet: Pick<WalletService, 'nextAddress' | 'dumpPrivateKey'>;
  network: NetworkParams;
  // Account that receives the mixed outputs.
  mixAccount: string;
  // Value of every mixed output this participant contributes.
  amount: bigint;
  change?: TxOut;
  txVersion?: number;
}

/**
 * One participant's side of a coin-join: contributes inputs, an optional
 * change output and freshly generated mixed outputs, then verifies and signs
 * the joint transaction produced by the session.
 */
export class CoinJoinParticipant implements MixParticipant {
  private tx: MsgTx;
  private state = ParticipantState.Built;
  private readonly myIns: TxIn[] = [];
  private readonly myPrevScripts: Uint8Array[] = [];
  private genScripts: Uint8Array[] = [];
  private genIndex: number[] = [];
  // Previous outpoint key -> input index in the joint transaction.
  private txInputs = new Map<string, number>();

  private readonly wallet: CoinJoinParticipantOptions['wallet'];
  private readonly network: NetworkParams;
  private readonly mixAccount: string;
  private readonly amount: bigint;
  private readonly change?: TxOut;

  constructor(options: CoinJoinParticipantOptions) {
    this.wallet = options.wallet;
    this.network = options.network;
    this.mixAccount = options.mixAccount;
    this.amount = options.amount;
    this.change = options.change;
    this.tx = newMsgTx(options.txVersion ?? GENERATED_TX_VERSION);
    if (this.change) {
      this.tx.outputs.push(this.change);
    }
  }

  getState(): ParticipantState {
    return this.state;
  }

  addInput(prevScript: Uint8Array, input: TxIn): void {
    this.expectState('add input', ParticipantState.Built);
    this.tx.inputs.push(input);
    this.myIns.push(input);
    this.myPrevScripts.push(prevScript);
  }

  async generateMixOutputs(): Promise<Uint8Array[]> {
    this.expectState('generate mix outputs', ParticipantState.Built);
    try {
      const encoded = await this.wallet.nextAddress(this.mixAccount, true);
      const { pkScript } = addressScript(decodeAddress(encoded, this.network));
      this.genScripts = [pkScript];
      this.state = ParticipantState.Submitted;
      return this.genScripts.map((script) => Uint8Array.from(script));
    } catch (err) {
      this.abort();
      throw err;
    }
  }

  /**
   * Verify the joint transaction holds every one of our inputs, our change and
   * our mixed outputs, then adopt it.
   */
  finalize(joinedTx: Uint8Array): void {
    this.expectState('finalize', ParticipantState.Submitted, ParticipantState.Confirmed);
    try {
      const tx = deserializeTx(joinedTx);

      const txInputs = new Map<string, number>();
      tx.inputs.forEach((input, index) => txInputs.set(outPointKey(input.previousOutPoint), index));

      const allInputsPresent = this.myIns.every((mine) => {
        const index = txInputs.get(outPointKey(mine.previousOutPoint));
        if (index === undefined) return false;
        const theirs = tx.inputs[index];
        return theirs.sequence === mine.sequence && theirs.valueIn === mine.valueIn;
      });
      if (!allInputsPresent) {
        throw Errors.missingInputs();
      }

      const change = this.change;
      if (change) {
        const hasChange = tx.outputs.some(
          (out) =>
            out.value === change.value &&
            out.version === change.version &&
            Buffer.compare(out.pkScript, change.pkScript) === 0,
        );
        if (!hasChange) {
          throw Errors.missingChange();
        }
      }

      const indexes = constantTimeOutputSearch(
        this.genScripts.map((script) => ({ script, value: this.amount, version: 0 })),
        tx.outputs,
      );

      this.tx = tx;
      this.txInputs = txInputs;
      this.genIndex = indexes;
      this.state = ParticipantState.Confirmed;
    } catch (err) {
      this.abort();
      throw err;
    }
  }

  /**
   * Sign our own inputs of the confirmed joint transaction. Inputs of other
   * participants are left untouched.
   */
  async sign(): Promise<void> {
    this.expectState('sign', ParticipantState.Confirmed);
    try {
      for (const [i, mine] of this.myIns.entries()) {
        const prevScript = this.myPrevScripts[i];
        const index = this.txInputs.get(outPointKey(mine.previousOutPoint));
        if (index === undefined) {
          throw Errors.missingInputs();
        }

        const { addresses, scriptClass } = extractScriptAddresses(prevScript);
        if (addresses.length !== 1) {
          throw Errors.bug('previous output does not resolve to exactly one address', {
            input: index,
            scriptClass,
            addresses: addresses.length,
          });
        }
        const [address] = addresses;
        if (address.kind !== 'pubkeyhash') {
          throw Errors.bug('previous output is not P2PKH', { input: index, scriptClass });
        }

        const wif = await this.wallet.dumpPrivateKey(encodeAddress(address, this.network));
        const privateKey = decodeWif(wif, this.network);
        if (Buffer.compare(hash160(compressedPubKey(privateKey)), address.hash160) !== 0) {
          throw Errors.bug('wallet returned a key that does not match the previous output', { input: index });
        }

        this.tx.inputs[index].signatureScript = signatureScript(this.tx, index, prevScript, privateKey);
      }
      this.state = ParticipantState.Signed;
    } catch (err) {
      this.abort();
      throw err;
    }
  }

  serialize(): Uint8Array {
    return serializeTx(this.tx);
  }

  /**
   * Decoding always re-runs the full joint transaction checks.
   */
  deserialize(bytes: Uint8Array): void {
    this.finalize(bytes);
  }

  mixOutputIndexes(): number[] {
    return [...this.genIndex];
  }

  transaction(): MsgTx {
    return cloneTx(this.tx);
  }

  abort(): void {
    if (this.state !== ParticipantState.Signed) {
      this.state = ParticipantState.Aborted;
    }
  }

  private expectState(operation: string, ...allowed: ParticipantState[]): void {
    if (!allowed.includes(this.state)) {
      throw Errors.invalidState(operation, this.state);
    }
  }
}
