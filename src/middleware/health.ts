/**
 * Health check HTTP endpoint + polling state tracker.
 *
 * Exposes a tiny HTTP server that returns JSON with:
 * - Telegram polling status (connected/disconnected/connecting)
 * - Uptime in seconds
 * - Last inbound update timestamp
 * - Last scheduler tick and process counters
 * - Memory usage
 */

import { createServer, type Server } from 'http';
import { logger } from './logger.js';
import { getStats } from './stats.js';

// ── Connection state ────────────────────────────────────────────────

export type ConnectionStatus = 'connected' | 'disconnected' | 'connecting';

interface ConnectionState {
  status: ConnectionStatus;
  connectedAt: number | null;
  lastUpdateAt: number | null;
  reconnectCount: number;
  startedAt: number;
}

const state: ConnectionState = {
  status: 'connecting',
  connectedAt: null,
  lastUpdateAt: null,
  reconnectCount: 0,
  startedAt: Date.now(),
};

/** Call when a getUpdates poll succeeds after a failure (or for the first time) */
export function markConnected(): void {
  if (state.status === 'connected') return;
  if (state.connectedAt !== null) state.reconnectCount++;
  state.status = 'connected';
  state.connectedAt = Date.now();
}

/** Call when polling fails or stops */
export function markDisconnected(): void {
  state.status = 'disconnected';
}

/** Call on every inbound update to track freshness */
export function markUpdateReceived(): void {
  state.lastUpdateAt = Date.now();
}

export function getConnectionState(): ConnectionState {
  return { ...state };
}

// ── Health payload ──────────────────────────────────────────────────

export interface HealthPayload {
  status: ConnectionStatus;
  uptime: number;
  connectedFor: number | null;
  lastUpdateAgo: number | null;
  reconnectCount: number;
  scheduler: {
    lastTickAt: number | null;
    lastTickDurationMs: number | null;
    evaluated: number;
    sent: number;
    failed: number;
    skipped: number;
  };
  counters: {
    promptsSent: number;
    promptsFailed: number;
    repliesAttributed: number;
    repliesUnattributed: number;
    rateLimitRejections: number;
    broadcastsRun: number;
  };
  memory: { rss: number; heapUsed: number; heapTotal: number };
}

export function buildHealthPayload(now: number = Date.now()): HealthPayload {
  const stats = getStats();
  const tick = stats.lastTick;
  const mem = process.memoryUsage();

  return {
    status: state.status,
    uptime: Math.floor((now - state.startedAt) / 1000),
    connectedFor: state.connectedAt ? Math.floor((now - state.connectedAt) / 1000) : null,
    lastUpdateAgo: state.lastUpdateAt ? Math.floor((now - state.lastUpdateAt) / 1000) : null,
    reconnectCount: state.reconnectCount,
    scheduler: {
      lastTickAt: tick?.at ?? null,
      lastTickDurationMs: tick?.durationMs ?? null,
      evaluated: tick?.evaluated ?? 0,
      sent: tick?.sent ?? 0,
      failed: tick?.failed ?? 0,
      skipped: tick?.skipped ?? 0,
    },
    counters: {
      promptsSent: stats.promptsSent,
      promptsFailed: stats.promptsFailed,
      repliesAttributed: stats.repliesAttributed,
      repliesUnattributed: stats.repliesUnattributed,
      rateLimitRejections: stats.rateLimitRejections,
      broadcastsRun: stats.broadcastsRun,
    },
    memory: {
      rss: Math.round(mem.rss / 1024 / 1024),
      heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
      heapTotal: Math.round(mem.heapTotal / 1024 / 1024),
    },
  };
}

// ── Health HTTP server ──────────────────────────────────────────────

let server: Server | null = null;

const HEALTH_RATE_WINDOW_MS = 60_000;
const HEALTH_RATE_LIMIT = 120;

const healthRateWindow = new Map<string, { windowStart: number; count: number }>();

export function isHealthRequestRateLimited(ip: string, now: number): boolean {
  const existing = healthRateWindow.get(ip);
  if (!existing || now - existing.windowStart >= HEALTH_RATE_WINDOW_MS) {
    healthRateWindow.set(ip, { windowStart: now, count: 1 });
    return false;
  }

  existing.count += 1;
  return existing.count > HEALTH_RATE_LIMIT;
}

/**
 * Start the HTTP health endpoint (`/health`) with lightweight abuse protection.
 */
export function startHealthServer(port: number = 3001, host: string = '127.0.0.1'): void {
  server = createServer((req, res) => {
    if (req.url === '/health' && req.method === 'GET') {
      const now = Date.now();
      const ip = req.socket.remoteAddress ?? 'unknown';

      if (isHealthRequestRateLimited(ip, now)) {
        res.writeHead(429, { 'content-type': 'application/json' });
        res.end(JSON.stringify({ error: 'rate_limited', message: 'Too many health requests' }));
        return;
      }

      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(JSON.stringify(buildHealthPayload(now)));
    } else {
      res.writeHead(404);
      res.end();
    }
  });

  server.listen(port, host, () => {
    logger.info({ port, url: `http://${host}:${port}/health` }, 'Health check server started');
  });

  server.on('error', (err) => {
    logger.error({ err, port }, 'Health check server error');
  });
}

export function stopHealthServer(): void {
  if (server) {
    server.close();
    server = null;
  }
  healthRateWindow.clear();
}
