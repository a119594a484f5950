import { encodeAddress, encodeWif, hash160, type Address } from '../../blockchain/address';
import { payToPubKeyHashScript } from '../../blockchain/script';
import { compressedPubKey } from '../../blockchain/sign';
import type { TxTree, UnspentOutput } from '../../blockchain/types';
import type { BlockNotification, WalletService } from '../../blockchain/walletClient';
import { deserializeTx, txidOf } from '../../blockchain/wire';
import { SIMNET, type NetworkParams } from '../../config/networks';
import { TicketBuyerError, TicketBuyerErrorCode } from '../../errors';

export function privateKey(seed: number): Uint8Array {
  return new Uint8Array(32).fill(seed);
}

export function pkhAddress(seed: number): Extract<Address, { kind: 'pubkeyhash' }> {
  return { kind: 'pubkeyhash', hash160: hash160(compressedPubKey(privateKey(seed))) };
}

export function p2pkhScript(seed: number): Uint8Array {
  return payToPubKeyHashScript(hash160(compressedPubKey(privateKey(seed))));
}

export function fakeTxid(n: number): string {
  return n.toString(16).padStart(64, '0');
}

export function hex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function makeUtxo(overrides: Partial<UnspentOutput> & { amount: bigint }): UnspentOutput {
  const tree: TxTree = 0;
  return {
    txid: fakeTxid(1),
    vout: 0,
    tree,
    account: 'default',
    spendable: true,
    scriptPubKey: hex(p2pkhScript(1)),
    confirmations: 6,
    ...overrides,
  };
}

/**
 * In-memory wallet. Addresses are derived from sequential private key seeds so
 * that their keys can be dumped later.
 */
export class FakeWallet implements WalletService {
  readonly network: NetworkParams;
  utxos: UnspentOutput[] = [];
  price = 100_000_000n;
  walletFee = 10_000n;
  ticketFee = 10_000n;
  passphrase = 'test-pass';
  notifications: BlockNotification[] = [];
  // 1-based publish call that fails.
  failPublishAt: number | null = null;

  readonly published: Uint8Array[] = [];
  readonly addressRequests: Array<{ account: string; internal: boolean }> = [];
  private readonly keys = new Map<string, Uint8Array>();
  private nextSeed = 100;
  private publishCalls = 0;

  constructor(network: NetworkParams = SIMNET) {
    this.network = network;
  }

  addKey(seed: number): string {
    const address = encodeAddress(pkhAddress(seed), this.network);
    this.keys.set(address, privateKey(seed));
    return address;
  }

  async nextAddress(account: string, internal: boolean): Promise<string> {
    this.addressRequests.push({ account, internal });
    return this.addKey(this.nextSeed++);
  }

  async balance(): Promise<bigint> {
    return this.utxos.filter((u) => u.spendable).reduce((sum, u) => sum + u.amount, 0n);
  }

  async listUnspent(): Promise<UnspentOutput[]> {
    return this.utxos.map((u) => ({ ...u }));
  }

  async ticketPrice(): Promise<bigint> {
    return this.price;
  }

  async relayFee(): Promise<bigint> {
    return this.walletFee;
  }

  async ticketRelayFee(): Promise<bigint> {
    return this.ticketFee;
  }

  async dumpPrivateKey(address: string): Promise<string> {
    const key = this.keys.get(address);
    if (!key) {
      throw new TicketBuyerError(TicketBuyerErrorCode.RPC_ERROR, `unknown address ${address}`);
    }
    return encodeWif(key, this.network);
  }

  async signTransaction(passphrase: string, rawTx: Uint8Array): Promise<Uint8Array> {
    if (passphrase !== this.passphrase) {
      throw new TicketBuyerError(TicketBuyerErrorCode.RPC_ERROR, 'invalid passphrase');
    }
    return Uint8Array.from(rawTx);
  }

  async publishTransaction(signedTx: Uint8Array): Promise<string> {
    this.publishCalls += 1;
    if (this.failPublishAt === this.publishCalls) {
      throw new TicketBuyerError(TicketBuyerErrorCode.PUBLISH_FAILED, 'publish failed: rejected');
    }
    this.published.push(signedTx);
    return txidOf(deserializeTx(signedTx));
  }

  async *subscribeBlockNotifications(signal?: AbortSignal): AsyncGenerator<BlockNotification> {
    for (const notification of this.notifications) {
      if (signal?.aborted) return;
      yield notification;
    }
  }
}
