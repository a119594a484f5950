#!/usr/bin/env node
import fs from 'fs';
import type { Server } from 'http';
import { createApp } from './app';
import { createHttpsTransport, WalletRpcClient } from './blockchain/walletClient';
import { loadMixDriver } from './coinjoin/session';
import { formatAtoms } from './config/constants';
import { isHelpRequested, loadConfig, loadDotEnv, splitHostPort, USAGE } from './config/options';
import { PurchaseStore } from './db/PurchaseStore';
import { Errors, TicketBuyerErrorCode, wrapError } from './errors';
import { FundingService } from './services/FundingService';
import { TicketBuyer } from './services/TicketBuyer';

async function main(argv: string[]): Promise<void> {
  if (isHelpRequested(argv)) {
    console.log(USAGE);
    return;
  }

  loadDotEnv();
  const config = loadConfig(argv);
  const { host, port } = splitHostPort(config.rpcServer);

  const wallet = new WalletRpcClient({
    transport: createHttpsTransport({
      host,
      port,
      user: config.rpcUser,
      pass: config.rpcPass,
      ca: fs.readFileSync(config.rpcCert),
    }),
    pollIntervalMs: config.pollIntervalMs,
  });

  const mixDriver = config.mix && config.mixDriver ? await loadMixDriver(config.mixDriver) : undefined;
  const funding = new FundingService({
    wallet,
    network: config.network,
    passphrase: config.walletPassphrase,
    sourceAccount: config.sourceAccount,
    changeAccount: config.changeAccount,
    minConfirmations: config.minConfirmations,
    maxFeeIterations: config.maxFeeIterations,
    mix: mixDriver ? { server: config.csppServer, driver: mixDriver } : undefined,
  });

  const store = await PurchaseStore.open(config.dbPath);
  const buyer = new TicketBuyer({
    wallet,
    network: config.network,
    funding,
    passphrase: config.walletPassphrase,
    sourceAccount: config.sourceAccount,
    changeAccount: config.changeAccount,
    votingAccount: config.votingAccount,
    minConfirmations: config.minConfirmations,
    maxFeeIterations: config.maxFeeIterations,
    ledger: store,
  });

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  let server: Server | undefined;
  try {
    console.log(`[config] network=${config.network.name} rpcserver=${config.rpcServer} mix=${config.mix}`);
    await buyer.printBalance();

    if (config.action === 'sendtx') {
      if (!config.destinationAddress || config.amount === undefined) {
        throw Errors.invalidArgument('--sendtx needs --destaddr and --amount');
      }
      await buyer.sendFunds(config.destinationAddress, config.amount);
      return;
    }

    if (!config.watch) {
      const result = await buyer.purchaseTicket(controller.signal);
      console.log(
        `[tkby] Purchased ticket ${result.ticketHash} for ${formatAtoms(result.ticketPrice + result.ticketFee)}`,
      );
      return;
    }

    if (config.statusPort !== undefined) {
      const app = createApp({ network: config.network.name, mixed: config.mix, buyer, store });
      const statusPort = config.statusPort;
      server = app.listen(statusPort, '127.0.0.1', () => {
        console.log(`[status] listening on http://127.0.0.1:${statusPort}`);
      });
    }
    await buyer.watch(controller.signal);
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    server?.close();
    await store.close();
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  const error = wrapError(err);
  console.error(`[tkby] ${error.code}: ${error.message}`);
  if (error.code === TicketBuyerErrorCode.INVALID_ARGUMENT) {
    console.error(USAGE);
  }
  process.exitCode = 1;
});
