import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseArgs } from 'node:util';
import { decodeAddress } from '../blockchain/address';
import { MAX_AMOUNT } from '../blockchain/txSizes';
import { Errors } from '../errors';
import {
  coinsToAtoms,
  DEFAULT_ACCOUNT_NAME,
  DEFAULT_CSPP_SERVER,
  DEFAULT_MAX_FEE_ITERATIONS,
  DEFAULT_POLL_INTERVAL_MS,
  parsePositiveIntegerEnv,
} from './constants';
import { networkByName, type NetworkParams } from './networks';

export type Action = 'sendtx' | 'purchaseticket';

export interface AppConfig {
  network: NetworkParams;
  action: Action;
  destinationAddress?: string;
  amount?: bigint;
  minConfirmations: number;
  sourceAccount: string;
  changeAccount: string;
  votingAccount: string;
  rpcServer: string;
  rpcUser: string;
  rpcPass: string;
  rpcCert: string;
  walletPassphrase: string;
  mix: boolean;
  csppServer: string;
  mixDriver?: string;
  watch: boolean;
  pollIntervalMs: number;
  maxFeeIterations: number;
  statusPort?: number;
  dbPath?: string;
}

const DEFAULT_NETWORK = 'testnet3';
const DEFAULT_RPC_USER = 'dcrwallet';
const DEFAULT_RPC_PASS = 'dcrwallet';
const ENV_PREFIX = 'TICKETMIX_';

const OPTIONS = {
  help: { type: 'boolean' },
  network: { type: 'string' },
  sendtx: { type: 'boolean' },
  purchaseticket: { type: 'boolean' },
  destaddr: { type: 'string' },
  amount: { type: 'string' },
  spendunconfirmed: { type: 'boolean' },
  sourceaccount: { type: 'string' },
  changeaccount: { type: 'string' },
  votingaccount: { type: 'string' },
  rpcserver: { type: 'string' },
  rpcuser: { type: 'string' },
  rpcpass: { type: 'string' },
  rpccert: { type: 'string' },
  walletpass: { type: 'string' },
  mix: { type: 'boolean' },
  csppserver: { type: 'string' },
  mixdriver: { type: 'string' },
  watch: { type: 'boolean' },
  pollinterval: { type: 'string' },
  maxfeeiterations: { type: 'string' },
  statusport: { type: 'string' },
  dbpath: { type: 'string' },
} as const;

export const USAGE = `Usage: ticketmix (--sendtx --destaddr ADDR --amount COINS | --purchaseticket [--mix] [--watch]) [options]

  --network NAME          mainnet, testnet3 or simnet (default ${DEFAULT_NETWORK})
  --spendunconfirmed      allow use of unconfirmed outputs
  --sourceaccount NAME    account funding transfers and tickets (default ${DEFAULT_ACCOUNT_NAME})
  --changeaccount NAME    account receiving change (default ${DEFAULT_ACCOUNT_NAME})
  --votingaccount NAME    account holding voting rights (default ${DEFAULT_ACCOUNT_NAME})
  --rpcserver HOST[:PORT] wallet JSON-RPC server
  --rpcuser, --rpcpass    wallet JSON-RPC credentials
  --rpccert FILE          wallet RPC certificate
  --walletpass PASS       wallet passphrase (required)
  --mix                   fund tickets through a coin-join
  --csppserver HOST:PORT  mix coordinator (default ${DEFAULT_CSPP_SERVER})
  --mixdriver MODULE      module exporting createMixDriver()
  --watch                 buy a ticket on every new block
  --pollinterval MS       block polling interval (default ${DEFAULT_POLL_INTERVAL_MS})
  --maxfeeiterations N    fee convergence ceiling (default ${DEFAULT_MAX_FEE_ITERATIONS})
  --statusport PORT       serve the status API while watching
  --dbpath FILE           purchase ledger database

Every option can also be set as ${ENV_PREFIX}<OPTION> in the environment.`;

/**
 * Returns host:port, adding `defaultPort` when the address carries none.
 */
export function normalizeAddress(addr: string, defaultPort: string): string {
  const trimmed = addr.trim();
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
  if (bracketed) {
    return `[${bracketed[1]}]:${bracketed[2] ?? defaultPort}`;
  }
  const colons = (trimmed.match(/:/g) ?? []).length;
  if (colons > 1) {
    // Bare IPv6 literal.
    return `[${trimmed}]:${defaultPort}`;
  }
  const [host, port] = trimmed.split(':');
  if (!host || /\s/.test(host)) {
    throw new Error(`invalid address: ${addr}`);
  }
  if (port === undefined) {
    return `${host}:${defaultPort}`;
  }
  if (!/^\d+$/.test(port) || Number(port) > 65535) {
    throw new Error(`invalid port in address: ${addr}`);
  }
  return `${host}:${port}`;
}

export function splitHostPort(server: string): { host: string; port: number } {
  const match = /^\[?([^\]]+?)\]?:(\d+)$/.exec(server);
  if (!match) {
    throw Errors.invalidArgument(`${server} must be host:port`);
  }
  return { host: match[1], port: Number(match[2]) };
}

/**
 * Copy KEY=VALUE lines from a .env file into `env` without overriding what is
 * already set.
 */
export function loadDotEnv(envPath = path.resolve(process.cwd(), '.env'), env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(envPath)) {
    return;
  }
  for (const line of fs.readFileSync(envPath, 'utf8').split(/\r?\n/)) {
    const trimmed = line.trim();
    const separatorIndex = trimmed.indexOf('=');
    if (trimmed.startsWith('#') || separatorIndex < 1) {
      continue;
    }
    const key = trimmed.slice(0, separatorIndex).trim();
    const value = trimmed.slice(separatorIndex + 1).trim().replace(/^(["'])(.*)\1$/, '$2');
    if (key && env[key] === undefined) {
      env[key] = value;
    }
  }
}

function envName(option: string): string {
  return `${ENV_PREFIX}${option.toUpperCase()}`;
}

function envFlag(raw: string | undefined): boolean {
  return raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

export function isHelpRequested(argv: readonly string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function parseOptions(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: false }).values;
  } catch (err) {
    throw Errors.invalidArgument(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parse and validate command-line options, falling back to TICKETMIX_*
 * environment variables.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): AppConfig {
  const values = parseOptions(argv);

  const str = (name: keyof typeof OPTIONS): string | undefined => {
    const fromArgs = values[name];
    if (typeof fromArgs === 'string') return fromArgs;
    const fromEnv = env[envName(name)]?.trim();
    return fromEnv ? fromEnv : undefined;
  };
  const flag = (name: keyof typeof OPTIONS): boolean => values[name] === true || envFlag(env[envName(name)]);

  const sendTx = flag('sendtx');
  const purchaseTicket = flag('purchaseticket');
  if (sendTx === purchaseTicket) {
    throw Errors.invalidArgument('Specify either --sendtx or --purchaseticket');
  }

  let network: NetworkParams;
  try {
    network = networkByName(str('network') ?? DEFAULT_NETWORK);
  } catch (err) {
    throw Errors.invalidArgument(err instanceof Error ? err.message : String(err));
  }

  let rpcServer: string;
  try {
    rpcServer = normalizeAddress(str('rpcserver') ?? 'localhost', network.walletRpcPort);
  } catch (err) {
    throw Errors.invalidArgument(`invalid json-rpc server address: ${err instanceof Error ? err.message : String(err)}`);
  }

  const walletPassphrase = str('walletpass');
  if (!walletPassphrase) {
    throw Errors.invalidArgument('wallet passphrase must be set');
  }

  const sourceAccount = str('sourceaccount') ?? DEFAULT_ACCOUNT_NAME;
  const changeAccount = str('changeaccount') ?? DEFAULT_ACCOUNT_NAME;
  const votingAccount = str('votingaccount') ?? DEFAULT_ACCOUNT_NAME;

  let destinationAddress: string | undefined;
  let amount: bigint | undefined;
  if (sendTx) {
    destinationAddress = str('destaddr');
    if (!destinationAddress) {
      throw Errors.invalidArgument('destination address must be set when using --sendtx');
    }
    try {
      decodeAddress(destinationAddress, network);
    } catch (err) {
      throw Errors.invalidArgument(`decode destaddr error: ${err instanceof Error ? err.message : String(err)}`);
    }

    const rawAmount = Number(str('amount') ?? '0');
    if (!Number.isFinite(rawAmount) || rawAmount <= 0) {
      throw Errors.invalidArgument('amount must be a >0');
    }
    amount = coinsToAtoms(rawAmount);
    if (amount <= 0n || amount > MAX_AMOUNT) {
      throw Errors.invalidArgument(`amount error: ${rawAmount} is out of range`);
    }
  }

  const statusPortRaw = str('statusport');
  let statusPort: number | undefined;
  if (statusPortRaw !== undefined) {
    statusPort = Number(statusPortRaw);
    if (!Number.isInteger(statusPort) || statusPort < 1 || statusPort > 65535) {
      throw Errors.invalidArgument(`invalid status port: ${statusPortRaw}`);
    }
  }

  const mix = flag('mix');
  let csppServer: string;
  try {
    csppServer = normalizeAddress(str('csppserver') ?? DEFAULT_CSPP_SERVER, '15760');
  } catch (err) {
    throw Errors.invalidArgument(`invalid mix server address: ${err instanceof Error ? err.message : String(err)}`);
  }
  const mixDriver = str('mixdriver');
  if (mix && !mixDriver) {
    throw Errors.invalidArgument('--mix requires --mixdriver');
  }

  return {
    network,
    action: sendTx ? 'sendtx' : 'purchaseticket',
    destinationAddress,
    amount,
    minConfirmations: flag('spendunconfirmed') ? 0 : 1,
    sourceAccount,
    changeAccount,
    votingAccount,
    rpcServer,
    rpcUser: str('rpcuser') ?? DEFAULT_RPC_USER,
    rpcPass: str('rpcpass') ?? DEFAULT_RPC_PASS,
    rpcCert: str('rpccert') ?? path.join(os.homedir(), '.dcrwallet', 'rpc.cert'),
    walletPassphrase,
    mix,
    csppServer,
    mixDriver,
    watch: flag('watch'),
    pollIntervalMs: parsePositiveIntegerEnv(str('pollinterval'), DEFAULT_POLL_INTERVAL_MS),
    maxFeeIterations: parsePositiveIntegerEnv(str('maxfeeiterations'), DEFAULT_MAX_FEE_ITERATIONS),
    statusPort,
    dbPath: str('dbpath'),
  };
}
