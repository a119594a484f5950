export const ATOMS_PER_COIN = 100_000_000n;

// Byte pattern of the default fee limits carried by a ticket commitment.
export const DEFAULT_TICKET_FEE_LIMITS = 0x5800;

export const GENERATED_TX_VERSION = 1;
export const DEFAULT_LOCK_TIME = 0;
export const DEFAULT_EXPIRY = 0;

export const DEFAULT_CSPP_SERVER = 'cspp.decred.org:15760';
export const DEFAULT_MAX_FEE_ITERATIONS = 32;
export const DEFAULT_POLL_INTERVAL_MS = 15_000;
export const DEFAULT_ACCOUNT_NAME = 'default';

export function parsePositiveIntegerEnv(raw: string | undefined, fallback: number): number {
  if (!raw || !raw.trim()) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0 || !Number.isInteger(parsed)) {
    return fallback;
  }
  return parsed;
}

/**
 * Convert a floating coin amount reported by the wallet into atoms.
 */
export function coinsToAtoms(amount: number): bigint {
  if (!Number.isFinite(amount)) {
    throw new Error(`invalid coin amount: ${amount}`);
  }
  return BigInt(Math.round(amount * 1e8));
}

export function formatAtoms(atoms: bigint): string {
  const negative = atoms < 0n;
  const abs = negative ? -atoms : atoms;
  const whole = abs / ATOMS_PER_COIN;
  const fraction = (abs % ATOMS_PER_COIN).toString().padStart(8, '0').replace(/0+$/, '');
  return `${negative ? '-' : ''}${whole}${fraction ? `.${fraction}` : ''} DCR`;
}
