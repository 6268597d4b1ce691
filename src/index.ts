/**
 * File Share Application Entry Point
 *
 * Wires together all services, starts the cleanup worker and the Hono server.
 */

import 'dotenv/config';
import { constants } from 'fs';
import { access, mkdir } from 'fs/promises';

import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import {
  createStaticPrincipalResolver,
  createSupabasePrincipalResolver,
} from './api/middleware/auth.js';
import type { RateLimiter } from './api/middleware/rateLimit.js';
import {
  createInMemoryRateLimiter,
  createUpstashRateLimiter,
} from './api/middleware/rateLimit.js';
import type { AppConfig } from './config.js';
import { loadConfig } from './config.js';
import { createSupabaseAdmin, createUpstashRatelimit } from './lib/index.js';
import {
  createLocalShareStorage,
  createShareAccessService,
  createShareDb,
  createShareService,
  createTokenIssuer,
  createUploadProgressTracker,
} from './services/index.js';
import { createShareCleanupWorker } from './workers/index.js';

// Validate environment
function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

const config = readConfig();

// Create Supabase client
const supabase = createSupabaseAdmin(
  config.supabase.url,
  config.supabase.serviceKey
);

// Wire adapters
const db = createShareDb(supabase);
const storage = createLocalShareStorage({
  root: config.storageRoot,
  maxBytes: config.policy.maxUploadBytes,
});
await mkdir(config.storageRoot, { recursive: true });

// Wire services
const progress = createUploadProgressTracker();

const shareService = createShareService({
  db,
  storage,
  tokens: createTokenIssuer(),
  policy: config.policy,
  progress,
});

const accessService = createShareAccessService({ db, storage });

const downloadLimiter: RateLimiter =
  config.redis !== null
    ? createUpstashRateLimiter(
        createUpstashRatelimit(
          config.redis,
          config.downloadRateLimit.limit,
          config.downloadRateLimit.windowSeconds
        )
      )
    : createInMemoryRateLimiter({
        limit: config.downloadRateLimit.limit,
        window: config.downloadRateLimit.windowSeconds,
      });

if (config.auth.disabled) {
  console.error(
    `AUTH_DISABLED: every request acts as "${config.auth.devOwnerId}"`
  );
}

// Create the API application
const app = createApp({
  services: { shareService, accessService, progress },
  principalResolver: config.auth.disabled
    ? createStaticPrincipalResolver(config.auth.devOwnerId)
    : createSupabasePrincipalResolver(supabase),
  policy: config.policy,
  branding: config.branding,
  authDisabled: config.auth.disabled,
  publicBaseUrl: config.publicBaseUrl,
  allowedOrigins: config.allowedOrigins,
  downloadRateLimit: {
    limiter: downloadLimiter,
    config: {
      limit: config.downloadRateLimit.limit,
      window: config.downloadRateLimit.windowSeconds,
      trustProxy: config.downloadRateLimit.trustProxy,
    },
  },
  storageCheck: () => access(config.storageRoot, constants.W_OK),
});

// Cleanup: one sweep at startup, then every interval
const cleanupWorker = createShareCleanupWorker({
  db,
  storage,
  intervalMs: config.cleanupIntervalMs,
  onSweep: (summary) => {
    if (summary.reclaimed > 0 || summary.failed > 0) {
      console.error(
        `Cleanup: reclaimed ${summary.reclaimed}, failed ${summary.failed}, staging removed ${summary.stagingRemoved}`
      );
    }
  },
});
cleanupWorker.start();

console.error(`Server starting on port ${config.port}`);
console.error(`Storage root: ${config.storageRoot}`);

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

function shutdown(signal: string): void {
  console.error(`${signal} received, shutting down`);
  cleanupWorker.stop();
  server.close();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export { app };
