import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { encodeAddress } from '../blockchain/address';
import { loadConfig, loadDotEnv, normalizeAddress, splitHostPort } from '../config/options';
import { MAINNET, TESTNET3 } from '../config/networks';
import { TicketBuyerErrorCode } from '../errors';
import { pkhAddress } from './helpers/fixtures';

const purchase = ['--purchaseticket', '--walletpass', 'test-pass'];

describe('loadConfig', () => {
  it('applies defaults for a ticket purchase', () => {
    const config = loadConfig(purchase, {});
    expect(config).toMatchObject({
      action: 'purchaseticket',
      minConfirmations: 1,
      sourceAccount: 'default',
      changeAccount: 'default',
      votingAccount: 'default',
      rpcServer: 'localhost:19110',
      rpcUser: 'dcrwallet',
      walletPassphrase: 'test-pass',
      mix: false,
      csppServer: 'cspp.decred.org:15760',
      watch: false,
      pollIntervalMs: 15_000,
      maxFeeIterations: 32,
    });
    expect(config.network.name).toBe('testnet3');
    expect(config.amount).toBeUndefined();
  });

  it('requires exactly one action', () => {
    expect(() => loadConfig(['--walletpass', 'test-pass'], {})).toThrow('Specify either --sendtx or --purchaseticket');
    expect(() => loadConfig([...purchase, '--sendtx'], {})).toThrow('Specify either --sendtx or --purchaseticket');
  });

  it('selects the requested network and its wallet port', () => {
    const config = loadConfig([...purchase, '--network', 'mainnet'], {});
    expect(config.network.name).toBe('mainnet');
    expect(config.rpcServer).toBe('localhost:9110');
  });

  it('rejects unknown networks', () => {
    expect(() => loadConfig([...purchase, '--network', 'regnet'], {})).toThrow(
      expect.objectContaining({
        code: TicketBuyerErrorCode.INVALID_ARGUMENT,
        message: 'network must be one of mainnet, testnet3, simnet',
      }),
    );
  });

  it('requires the wallet passphrase', () => {
    expect(() => loadConfig(['--purchaseticket'], {})).toThrow('wallet passphrase must be set');
  });

  it('parses a transfer', () => {
    const destaddr = encodeAddress(pkhAddress(3), TESTNET3);
    const config = loadConfig(['--sendtx', '--destaddr', destaddr, '--amount', '1.5', '--walletpass', 'test-pass'], {});
    expect(config.action).toBe('sendtx');
    expect(config.destinationAddress).toBe(destaddr);
    expect(config.amount).toBe(150_000_000n);
  });

  it('validates transfers', () => {
    const destaddr = encodeAddress(pkhAddress(3), TESTNET3);
    const base = ['--sendtx', '--walletpass', 'test-pass'];
    expect(() => loadConfig([...base, '--amount', '1'], {})).toThrow(
      'destination address must be set when using --sendtx',
    );
    expect(() => loadConfig([...base, '--destaddr', destaddr, '--amount', '0'], {})).toThrow('amount must be a >0');
    expect(() =>
      loadConfig([...base, '--destaddr', encodeAddress(pkhAddress(3), MAINNET), '--amount', '1'], {}),
    ).toThrow(/^decode destaddr error: address \S+ is not for network testnet3$/);
  });

  it('falls back to the environment', () => {
    const config = loadConfig([], {
      TICKETMIX_PURCHASETICKET: 'true',
      TICKETMIX_WALLETPASS: 'test-pass',
      TICKETMIX_RPCSERVER: '10.0.0.5',
      TICKETMIX_SPENDUNCONFIRMED: '1',
    });
    expect(config.rpcServer).toBe('10.0.0.5:19110');
    expect(config.minConfirmations).toBe(0);
  });

  it('prefers arguments over the environment', () => {
    const config = loadConfig([...purchase, '--votingaccount', 'voting'], { TICKETMIX_VOTINGACCOUNT: 'cold' });
    expect(config.votingAccount).toBe('voting');
  });

  it('requires a driver module for mixing', () => {
    expect(() => loadConfig([...purchase, '--mix'], {})).toThrow('--mix requires --mixdriver');
    const config = loadConfig([...purchase, '--mix', '--mixdriver', './driver.js', '--csppserver', 'mix.test'], {});
    expect(config.mix).toBe(true);
    expect(config.csppServer).toBe('mix.test:15760');
  });

  it('rejects unknown options and bad status ports', () => {
    expect(() => loadConfig([...purchase, '--bogus'], {})).toThrow(
      expect.objectContaining({ code: TicketBuyerErrorCode.INVALID_ARGUMENT }),
    );
    expect(() => loadConfig([...purchase, '--statusport', '70000'], {})).toThrow('invalid status port: 70000');
  });
});

describe('normalizeAddress', () => {
  it('adds the default port', () => {
    expect(normalizeAddress('localhost', '19110')).toBe('localhost:19110');
    expect(normalizeAddress('host:1234', '19110')).toBe('host:1234');
    expect(normalizeAddress('::1', '19110')).toBe('[::1]:19110');
    expect(normalizeAddress('[::1]:5', '19110')).toBe('[::1]:5');
  });

  it('rejects malformed addresses', () => {
    expect(() => normalizeAddress('', '19110')).toThrow('invalid address: ');
    expect(() => normalizeAddress('host:port', '19110')).toThrow('invalid port in address: host:port');
  });
});

describe('splitHostPort', () => {
  it('splits host and numeric port', () => {
    expect(splitHostPort('mix.test:15760')).toEqual({ host: 'mix.test', port: 15760 });
    expect(splitHostPort('[::1]:15760')).toEqual({ host: '::1', port: 15760 });
    expect(() => splitHostPort('mix.test')).toThrow('mix.test must be host:port');
  });
});

describe('loadDotEnv', () => {
  it('fills unset variables from a .env file', () => {
    const envPath = path.join(os.tmpdir(), `ticketmix-env-${Date.now()}.env`);
    fs.writeFileSync(
      envPath,
      ['# wallet', 'TICKETMIX_WALLETPASS="test-pass"', "TICKETMIX_NETWORK='simnet'", 'TICKETMIX_RPCUSER=other', 'not a pair', '=orphan'].join('\n'),
    );
    const env: NodeJS.ProcessEnv = { TICKETMIX_RPCUSER: 'kept' };
    try {
      loadDotEnv(envPath, env);
    } finally {
      fs.rmSync(envPath, { force: true });
    }
    expect(env).toEqual({
      TICKETMIX_WALLETPASS: 'test-pass',
      TICKETMIX_NETWORK: 'simnet',
      TICKETMIX_RPCUSER: 'kept',
    });
  });

  it('ignores a missing file', () => {
    const env: NodeJS.ProcessEnv = {};
    loadDotEnv(path.join(os.tmpdir(), 'ticketmix-missing.env'), env);
    expect(env).toEqual({});
  });
});
