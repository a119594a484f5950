export type NetworkName = 'mainnet' | 'testnet3' | 'simnet';

export interface NetworkParams {
  name: NetworkName;
  pubKeyHashAddrId: readonly [number, number];
  scriptHashAddrId: readonly [number, number];
  privateKeyId: readonly [number, number];
  walletRpcPort: string;
}

export const MAINNET: NetworkParams = {
  name: 'mainnet',
  pubKeyHashAddrId: [0x07, 0x3f], // Ds
  scriptHashAddrId: [0x07, 0x1a], // Dc
  privateKeyId: [0x22, 0xde], // Pm
  walletRpcPort: '9110',
};

export const TESTNET3: NetworkParams = {
  name: 'testnet3',
  pubKeyHashAddrId: [0x0f, 0x21], // Ts
  scriptHashAddrId: [0x0e, 0xfc], // Tc
  privateKeyId: [0x23, 0x0e], // Pt
  walletRpcPort: '19110',
};

export const SIMNET: NetworkParams = {
  name: 'simnet',
  pubKeyHashAddrId: [0x0e, 0x91], // Ss
  scriptHashAddrId: [0x0e, 0x6c], // Sc
  privateKeyId: [0x23, 0x07], // Ps
  walletRpcPort: '19557',
};

const NETWORKS: Record<NetworkName, NetworkParams> = {
  mainnet: MAINNET,
  testnet3: TESTNET3,
  simnet: SIMNET,
};

export function isNetworkName(value: string): value is NetworkName {
  return Object.prototype.hasOwnProperty.call(NETWORKS, value);
}

export function networkByName(name: string): NetworkParams {
  const normalized = name.trim().toLowerCase();
  if (!isNetworkName(normalized)) {
    throw new Error(`network must be one of ${Object.keys(NETWORKS).join(', ')}`);
  }
  return NETWORKS[normalized];
}
