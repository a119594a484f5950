import https from 'node:https';
import { coinsToAtoms, DEFAULT_POLL_INTERVAL_MS } from '../config/constants';
import { Errors, hasErrorCode, TicketBuyerError, TicketBuyerErrorCode } from '../errors';
import { TX_TREE_REGULAR, TX_TREE_STAKE, type UnspentOutput } from './types';

export interface BlockNotification {
  attachedBlockCount: number;
}

/**
 * Everything the purchase flow needs from the wallet. Amounts are atoms.
 */
export interface WalletService {
  nextAddress(account: string, internal: boolean): Promise<string>;
  balance(account: string, minConfirmations: number): Promise<bigint>;
  listUnspent(minConfirmations: number): Promise<UnspentOutput[]>;
  ticketPrice(): Promise<bigint>;
  relayFee(): Promise<bigint>;
  ticketRelayFee(): Promise<bigint>;
  dumpPrivateKey(address: string): Promise<string>;
  signTransaction(passphrase: string, rawTx: Uint8Array): Promise<Uint8Array>;
  publishTransaction(signedTx: Uint8Array): Promise<string>;
  subscribeBlockNotifications(signal?: AbortSignal): AsyncIterable<BlockNotification>;
}

export interface RpcRequest {
  jsonrpc: '1.0';
  id: number;
  method: string;
  params: unknown[];
}

/**
 * Sends one JSON-RPC request and resolves with the decoded response body.
 */
export type RpcTransport = (request: RpcRequest) => Promise<unknown>;

export interface HttpsTransportOptions {
  host: string;
  port: number;
  user: string;
  pass: string;
  ca?: string | Buffer;
  timeoutMs?: number;
}

export function createHttpsTransport(options: HttpsTransportOptions): RpcTransport {
  const auth = Buffer.from(`${options.user}:${options.pass}`).toString('base64');
  const timeoutMs = options.timeoutMs ?? 30_000;

  return (request) =>
    new Promise<unknown>((resolve, reject) => {
      const body = JSON.stringify(request);
      const req = https.request(
        {
          host: options.host,
          port: options.port,
          method: 'POST',
          path: '/',
          ca: options.ca,
          headers: {
            'Content-Type': 'application/json',
            'Content-Length': Buffer.byteLength(body),
            Authorization: `Basic ${auth}`,
          },
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('error', reject);
          res.on('end', () => {
            const text = Buffer.concat(chunks).toString('utf8');
            if (res.statusCode === 401) {
              reject(new Error('wallet rejected credentials (401)'));
              return;
            }
            try {
              resolve(JSON.parse(text));
            } catch {
              reject(new Error(`non-JSON response (status ${res.statusCode}): ${text.slice(0, 120)}`));
            }
          });
        },
      );
      req.setTimeout(timeoutMs, () => req.destroy(new Error(`timed out after ${timeoutMs}ms`)));
      req.on('error', reject);
      req.end(body);
    });
}

export interface WalletRpcClientOptions {
  transport: RpcTransport;
  pollIntervalMs?: number;
  unlockTimeoutSeconds?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectNumber(value: unknown, what: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw Errors.malformedRpcResult(what);
  }
  return value;
}

function expectString(value: unknown, what: string): string {
  if (typeof value !== 'string') {
    throw Errors.malformedRpcResult(what);
  }
  return value;
}

/**
 * Wallet JSON-RPC client. Accounts are addressed by name.
 */
export class WalletRpcClient implements WalletService {
  private nextId = 1;
  private readonly transport: RpcTransport;
  private readonly pollIntervalMs: number;
  private readonly unlockTimeoutSeconds: number;

  constructor(options: WalletRpcClientOptions) {
    this.transport = options.transport;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.unlockTimeoutSeconds = options.unlockTimeoutSeconds ?? 60;
  }

  async call(method: string, params: unknown[] = []): Promise<unknown> {
    const request: RpcRequest = { jsonrpc: '1.0', id: this.nextId++, method, params };
    let response: unknown;
    try {
      response = await this.transport(request);
    } catch (err) {
      throw new TicketBuyerError(
        TicketBuyerErrorCode.TRANSPORT,
        `rpc ${method} failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
    if (!isRecord(response)) {
      throw Errors.malformedRpcResult(method);
    }
    const { error } = response;
    if (error !== null && error !== undefined) {
      const code = isRecord(error) && typeof error.code === 'number' ? error.code : undefined;
      const message = isRecord(error) && typeof error.message === 'string' ? error.message : String(error);
      console.error(`[tkby] RPC error ${method}:`, message);
      throw new TicketBuyerError(TicketBuyerErrorCode.RPC_ERROR, `rpc ${method}: ${message}`, {
        details: { method, code },
      });
    }
    return response.result;
  }

  async nextAddress(account: string, internal: boolean): Promise<string> {
    const result = internal
      ? await this.call('getrawchangeaddress', [account])
      : await this.call('getnewaddress', [account, 'wrap']);
    return expectString(result, internal ? 'getrawchangeaddress' : 'getnewaddress');
  }

  async balance(account: string, minConfirmations: number): Promise<bigint> {
    const result = await this.call('getbalance', [account, minConfirmations]);
    if (typeof result === 'number') {
      return coinsToAtoms(result);
    }
    if (isRecord(result) && Array.isArray(result.balances)) {
      const entry = result.balances.find(
        (item): item is Record<string, unknown> => isRecord(item) && item.accountname === account,
      );
      if (!entry) {
        throw Errors.invalidArgument(`wallet has no account named ${account}`);
      }
      return coinsToAtoms(expectNumber(entry.spendable, 'getbalance spendable'));
    }
    throw Errors.malformedRpcResult('getbalance');
  }

  async listUnspent(minConfirmations: number): Promise<UnspentOutput[]> {
    const result = await this.call('listunspent', [minConfirmations]);
    if (!Array.isArray(result)) {
      throw Errors.malformedRpcResult('listunspent');
    }
    return result.map((item: unknown, i): UnspentOutput => {
      if (!isRecord(item)) {
        throw Errors.malformedRpcResult(`listunspent[${i}]`);
      }
      return {
        txid: expectString(item.txid, `listunspent[${i}].txid`),
        vout: expectNumber(item.vout, `listunspent[${i}].vout`),
        tree: item.tree === 1 ? TX_TREE_STAKE : TX_TREE_REGULAR,
        account: typeof item.account === 'string' ? item.account : '',
        amount: coinsToAtoms(expectNumber(item.amount, `listunspent[${i}].amount`)),
        spendable: item.spendable === true,
        scriptPubKey: expectString(item.scriptPubKey, `listunspent[${i}].scriptPubKey`),
        confirmations: typeof item.confirmations === 'number' ? item.confirmations : undefined,
      };
    });
  }

  async ticketPrice(): Promise<bigint> {
    const result = await this.call('getstakedifficulty');
    if (!isRecord(result)) {
      throw Errors.malformedRpcResult('getstakedifficulty');
    }
    return coinsToAtoms(expectNumber(result.current, 'getstakedifficulty current'));
  }

  async relayFee(): Promise<bigint> {
    return coinsToAtoms(expectNumber(await this.call('getwalletfee'), 'getwalletfee'));
  }

  async ticketRelayFee(): Promise<bigint> {
    return coinsToAtoms(expectNumber(await this.call('getticketfee'), 'getticketfee'));
  }

  async dumpPrivateKey(address: string): Promise<string> {
    return expectString(await this.call('dumpprivkey', [address]), 'dumpprivkey');
  }

  async signTransaction(passphrase: string, rawTx: Uint8Array): Promise<Uint8Array> {
    await this.call('walletpassphrase', [passphrase, this.unlockTimeoutSeconds]);
    const result = await this.call('signrawtransaction', [Buffer.from(rawTx).toString('hex')]);
    if (!isRecord(result)) {
      throw Errors.malformedRpcResult('signrawtransaction');
    }
    if (result.complete !== true) {
      throw new TicketBuyerError(TicketBuyerErrorCode.RPC_ERROR, 'wallet could not sign every input', {
        details: { errors: result.errors },
      });
    }
    return Uint8Array.from(Buffer.from(expectString(result.hex, 'signrawtransaction hex'), 'hex'));
  }

  async publishTransaction(signedTx: Uint8Array): Promise<string> {
    try {
      const txid = await this.call('sendrawtransaction', [Buffer.from(signedTx).toString('hex')]);
      return expectString(txid, 'sendrawtransaction');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new TicketBuyerError(TicketBuyerErrorCode.PUBLISH_FAILED, `publish failed: ${message}`, {
        cause: err,
      });
    }
  }

  async blockCount(): Promise<number> {
    return expectNumber(await this.call('getblockcount'), 'getblockcount');
  }

  // A failed poll is skipped; the next interval polls again.
  private async pollBlockCount(): Promise<number | null> {
    try {
      return await this.blockCount();
    } catch (err) {
      if (hasErrorCode(err, TicketBuyerErrorCode.TRANSPORT) || hasErrorCode(err, TicketBuyerErrorCode.RPC_ERROR)) {
        console.warn(`[tkby] block count poll failed, retrying: ${err.message}`);
        return null;
      }
      throw err;
    }
  }

  /**
   * Polls the block count and reports how many blocks were attached since the
   * previous report. Ends when `signal` aborts.
   */
  async *subscribeBlockNotifications(signal?: AbortSignal): AsyncGenerator<BlockNotification> {
    let last = await this.pollBlockCount();
    while (!signal?.aborted) {
      await delay(this.pollIntervalMs, signal);
      if (signal?.aborted) return;
      const count = await this.pollBlockCount();
      if (count === null) continue;
      if (last !== null && count > last) {
        yield { attachedBlockCount: count - last };
      }
      last = count;
    }
  }
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
