import path from 'node:path';
import tls from 'node:tls';
import type { Duplex } from 'node:stream';
import { splitHostPort } from '../config/options';
import { Errors, hasErrorCode, TicketBuyerErrorCode, wrapError } from '../errors';

/**
 * Callbacks a mixing session invokes on the local participant.
 */
export interface MixParticipant {
  generateMixOutputs(): Promise<Uint8Array[]>;
  finalize(joinedTx: Uint8Array): void;
  sign(): Promise<void>;
  serialize(): Uint8Array;
  deserialize(bytes: Uint8Array): void;
}

/**
 * Describes which transactions a participant is willing to be paired with.
 */
export interface MixPairing {
  scriptClass: 'P2PKHv0';
  amount: bigint;
  txVersion: number;
  lockTime: number;
  expiry: number;
}

export function encodePairing(pairing: MixPairing): Uint8Array {
  const tag = Buffer.from(pairing.scriptClass, 'ascii');
  const out = Buffer.alloc(1 + tag.length + 8 + 2 + 4 + 4);
  let offset = out.writeUInt8(tag.length, 0);
  offset += tag.copy(out, offset);
  offset = out.writeBigInt64LE(pairing.amount, offset);
  offset = out.writeUInt16LE(pairing.txVersion, offset);
  offset = out.writeUInt32LE(pairing.lockTime, offset);
  out.writeUInt32LE(pairing.expiry, offset);
  return Uint8Array.from(out);
}

/**
 * Runs the multi-round mixing protocol over an established connection, calling
 * back into the participant. Resolves once the joint transaction is published.
 */
export interface MixSessionDriver {
  run(conn: Duplex, participant: MixParticipant, pairing: MixPairing, signal: AbortSignal): Promise<void>;
}

export type MixConnector = (server: string, signal: AbortSignal) => Promise<Duplex>;

export const tlsConnector: MixConnector = (server, signal) =>
  new Promise<Duplex>((resolve, reject) => {
    const { host, port } = splitHostPort(server);
    const socket = tls.connect({ host, port, servername: host });
    const onAbort = () => {
      socket.destroy();
      reject(Errors.cancelled('mix session cancelled while connecting'));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    socket.once('secureConnect', () => {
      signal.removeEventListener('abort', onAbort);
      console.log(`[cspp] Dialed ${server} -> ${socket.remoteAddress ?? host}:${socket.remotePort ?? port}`);
      resolve(socket);
    });
    socket.once('error', (err) => {
      signal.removeEventListener('abort', onAbort);
      reject(err);
    });
  });

export interface RunMixSessionOptions {
  server: string;
  driver: MixSessionDriver;
  participant: MixParticipant;
  pairing: MixPairing;
  signal?: AbortSignal;
  connect?: MixConnector;
}

/**
 * Dial the coordinator and run one mix. Aborting `signal` releases the
 * connection and rejects with CANCELLED; the connection is always released
 * when the session ends.
 */
export async function runMixSession(options: RunMixSessionOptions): Promise<void> {
  const controller = new AbortController();
  const outer = options.signal;
  const forwardAbort = () => controller.abort(outer?.reason);
  if (outer?.aborted) {
    throw Errors.cancelled('mix session cancelled');
  }
  outer?.addEventListener('abort', forwardAbort, { once: true });

  const connect = options.connect ?? tlsConnector;
  let conn: Duplex | undefined;
  try {
    try {
      conn = await connect(options.server, controller.signal);
    } catch (err) {
      if (controller.signal.aborted) {
        throw hasErrorCode(err, TicketBuyerErrorCode.CANCELLED) ? err : Errors.cancelled('mix session cancelled');
      }
      throw wrapError(err, TicketBuyerErrorCode.TRANSPORT);
    }

    const cancelled = new Promise<never>((_, reject) => {
      const onAbort = () => reject(Errors.cancelled('mix session cancelled'));
      if (controller.signal.aborted) onAbort();
      controller.signal.addEventListener('abort', onAbort, { once: true });
    });
    // The race loser must not surface as an unhandled rejection.
    cancelled.catch(() => undefined);

    try {
      await Promise.race([
        options.driver.run(conn, options.participant, options.pairing, controller.signal),
        cancelled,
      ]);
    } catch (err) {
      if (controller.signal.aborted) {
        throw hasErrorCode(err, TicketBuyerErrorCode.CANCELLED) ? err : Errors.cancelled('mix session cancelled');
      }
      throw wrapError(err, TicketBuyerErrorCode.TRANSPORT);
    }
  } finally {
    outer?.removeEventListener('abort', forwardAbort);
    controller.abort();
    conn?.destroy();
  }
}

function isMixDriver(value: unknown): value is MixSessionDriver {
  return typeof value === 'object' && value !== null && 'run' in value && typeof value.run === 'function';
}

/**
 * Load a session driver from a module exporting `createMixDriver()`.
 */
export async function loadMixDriver(modulePath: string): Promise<MixSessionDriver> {
  const resolved = path.resolve(modulePath);
  const mod: unknown = await import(resolved);
  if (
    typeof mod !== 'object' ||
    mod === null ||
    !('createMixDriver' in mod) ||
    typeof mod.createMixDriver !== 'function'
  ) {
    throw Errors.invalidArgument(`${resolved} does not export createMixDriver()`);
  }
  const driver: unknown = await mod.createMixDriver();
  if (!isMixDriver(driver)) {
    throw Errors.invalidArgument(`createMixDriver() in ${resolved} did not return a driver with run()`);
  }
  return driver;
}
