import fs from 'fs';
import path from 'path';
import sqlite3 from 'sqlite3';
import { Database, open } from 'sqlite';
import { isTicketBuyerError } from '../errors';

export type PurchaseKind = 'ticket' | 'send';
export type PurchaseStatus = 'started' | 'published' | 'failed';

export type PurchaseAttempt = {
  id: number;
  kind: PurchaseKind;
  status: PurchaseStatus;
  network: string;
  amount: string; // atoms
  mixed: boolean;
  fundingTxHash: string | null;
  fundingOutputIndex: number | null;
  publishedTxHash: string | null;
  errorCode: string | null;
  errorMessage: string | null;
  startedAt: string;
  finishedAt: string | null;
};

export type StartAttempt = {
  kind: PurchaseKind;
  network: string;
  amount: bigint;
  mixed: boolean;
};

export type PublishedAttempt = {
  publishedTxHash: string;
  fundingTxHash?: string;
  fundingOutputIndex?: number;
};

/**
 * What the purchase flow records about each attempt.
 */
export interface PurchaseLedger {
  recordStarted(attempt: StartAttempt): Promise<number>;
  markPublished(id: number, published: PublishedAttempt): Promise<void>;
  markFailed(id: number, error: unknown): Promise<void>;
}

const DEFAULT_DB_FILENAME = 'purchases.db';

export function getDefaultDbPath(): string {
  const dataDir = path.join(process.cwd(), 'data');
  fs.mkdirSync(dataDir, { recursive: true });
  return path.join(dataDir, DEFAULT_DB_FILENAME);
}

export async function openDatabase(dbPath?: string): Promise<Database> {
  const envPath = process.env.TICKETMIX_DB_PATH?.trim();
  const filename = dbPath ?? (envPath && envPath.length > 0 ? envPath : getDefaultDbPath());
  return open({ filename, driver: sqlite3.Database });
}

export async function initializeDatabase(db: Database): Promise<void> {
  await db.exec(`
    CREATE TABLE IF NOT EXISTS purchase_attempts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      kind TEXT NOT NULL,
      status TEXT NOT NULL,
      network TEXT NOT NULL,
      amount TEXT NOT NULL,
      mixed INTEGER NOT NULL DEFAULT 0,
      fundingTxHash TEXT,
      fundingOutputIndex INTEGER,
      publishedTxHash TEXT,
      errorCode TEXT,
      errorMessage TEXT,
      startedAt TEXT NOT NULL,
      finishedAt TEXT
    )
  `);
  await db.exec(
    'CREATE INDEX IF NOT EXISTS purchase_attempts_started ON purchase_attempts (startedAt)',
  );
}

type PurchaseRow = Omit<PurchaseAttempt, 'kind' | 'status' | 'mixed'> & {
  kind: string;
  status: string;
  mixed: number;
};

function mapRow(row: PurchaseRow): PurchaseAttempt {
  return {
    ...row,
    kind: row.kind === 'send' ? 'send' : 'ticket',
    status: row.status === 'published' || row.status === 'failed' ? row.status : 'started',
    mixed: row.mixed === 1,
  };
}

export class PurchaseStore implements PurchaseLedger {
  constructor(private readonly db: Database) {}

  static async open(dbPath?: string): Promise<PurchaseStore> {
    const db = await openDatabase(dbPath);
    await initializeDatabase(db);
    return new PurchaseStore(db);
  }

  async recordStarted(attempt: StartAttempt): Promise<number> {
    const result = await this.db.run(
      `INSERT INTO purchase_attempts (kind, status, network, amount, mixed, startedAt)
       VALUES (?, 'started', ?, ?, ?, ?)`,
      [attempt.kind, attempt.network, attempt.amount.toString(), attempt.mixed ? 1 : 0, new Date().toISOString()],
    );
    if (result.lastID === undefined) {
      throw new Error('sqlite-insert-attempt-failed');
    }
    return result.lastID;
  }

  async markPublished(id: number, published: PublishedAttempt): Promise<void> {
    await this.db.run(
      `UPDATE purchase_attempts
       SET status = 'published', publishedTxHash = ?, fundingTxHash = ?, fundingOutputIndex = ?, finishedAt = ?
       WHERE id = ?`,
      [
        published.publishedTxHash,
        published.fundingTxHash ?? null,
        published.fundingOutputIndex ?? null,
        new Date().toISOString(),
        id,
      ],
    );
  }

  async markFailed(id: number, error: unknown): Promise<void> {
    const code = isTicketBuyerError(error) ? error.code : null;
    const message = error instanceof Error ? error.message : String(error);
    await this.db.run(
      `UPDATE purchase_attempts
       SET status = 'failed', errorCode = ?, errorMessage = ?, finishedAt = ?
       WHERE id = ?`,
      [code, message, new Date().toISOString(), id],
    );
  }

  async listRecent(limit = 20): Promise<PurchaseAttempt[]> {
    const rows = await this.db.all<PurchaseRow[]>(
      'SELECT * FROM purchase_attempts ORDER BY id DESC LIMIT ?',
      [Math.max(1, Math.floor(limit))],
    );
    return rows.map(mapRow);
  }

  async lastAttempt(): Promise<PurchaseAttempt | null> {
    const row = await this.db.get<PurchaseRow>('SELECT * FROM purchase_attempts ORDER BY id DESC LIMIT 1');
    return row ? mapRow(row) : null;
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
