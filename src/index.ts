export * from './errors';
export * from './config/networks';
export * from './config/constants';
export { loadConfig, normalizeAddress, type AppConfig } from './config/options';
export * from './blockchain/types';
export * from './blockchain/wire';
export * from './blockchain/address';
export * from './blockchain/script';
export * from './blockchain/txSizes';
export * from './blockchain/stake';
export * from './blockchain/sign';
export * from './blockchain/walletClient';
export * from './coinjoin/outputSearch';
export * from './coinjoin/CoinJoinParticipant';
export * from './coinjoin/session';
export * from './services/FeeConvergentBuilder';
export * from './services/TicketAssembler';
export * from './services/FundingService';
export * from './services/TicketBuyer';
export * from './db/PurchaseStore';
export { createApp } from './app';
