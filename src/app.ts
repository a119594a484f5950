import express from 'express';
import cors from 'cors';
import type { PurchaseAttempt } from './db/PurchaseStore';
import type { BuyerStatus } from './services/TicketBuyer';

export interface StatusSource {
  network: string;
  mixed: boolean;
  buyer: { status(): BuyerStatus };
  store?: {
    listRecent(limit?: number): Promise<PurchaseAttempt[]>;
    lastAttempt(): Promise<PurchaseAttempt | null>;
  };
}

// Narrowest request and response shapes the handlers use; express supplies both.
export interface StatusRequest {
  query: Record<string, unknown>;
}

export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

const MAX_PURCHASES_LIMIT = 200;

export function createApp(source: StatusSource) {
  const app = express();

  const isProduction = process.env.NODE_ENV === 'production';
  const allowedOrigins = (process.env.CORS_ORIGINS || '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  const devLocalhostRegex = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/;

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      if (!origin) {
        callback(null, true);
        return;
      }
      const isAllowed = allowedOrigins.includes(origin) || (!isProduction && devLocalhostRegex.test(origin));
      callback(null, isAllowed);
    },
    methods: ['GET', 'OPTIONS'],
    optionsSuccessStatus: 204,
  };

  app.use(cors(corsOptions));

  app.get('/health', healthHandler);
  app.get('/api/status', createStatusHandler(source));
  app.get('/api/purchases', createPurchasesHandler(source));

  return app;
}

export function healthHandler(_req: StatusRequest, res: JsonResponse) {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
}

export function createStatusHandler(source: StatusSource) {
  return async (_req: StatusRequest, res: JsonResponse) => {
    try {
      const lastAttempt = source.store ? await source.store.lastAttempt() : null;
      res.json({
        network: source.network,
        mixed: source.mixed,
        ...source.buyer.status(),
        lastAttempt,
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      console.error('[status] failed to read purchase ledger', err);
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  };
}

export function createPurchasesHandler(source: StatusSource) {
  return async (req: StatusRequest, res: JsonResponse) => {
    const rawLimit = typeof req.query.limit === 'string' ? Number(req.query.limit) : 20;
    if (!Number.isInteger(rawLimit) || rawLimit < 1) {
      res.status(400).json({ error: 'limit must be a positive integer' });
      return;
    }
    if (!source.store) {
      res.json({ purchases: [] });
      return;
    }
    try {
      const purchases = await source.store.listRecent(Math.min(rawLimit, MAX_PURCHASES_LIMIT));
      res.json({ purchases });
    } catch (err) {
      console.error('[status] failed to list purchases', err);
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  };
}
