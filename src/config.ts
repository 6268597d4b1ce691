/**
 * Application Configuration
 * Parsed once from process.env at startup
 */

import { z } from 'zod';

import type { SharePolicy } from './types/index.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    SUPABASE_URL: z.string().url(),
    SUPABASE_SERVICE_KEY: z.string().min(1),
    STORAGE_ROOT: z.string().min(1).default('uploads'),
    MAX_UPLOAD_BYTES: z.coerce
      .number()
      .int()
      .positive()
      .default(100 * 1024 * 1024),
    MIN_RETENTION_DAYS: z.coerce.number().int().positive().default(1),
    MAX_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
    CLEANUP_INTERVAL_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(60 * 60 * 1000),
    PUBLIC_BASE_URL: z.string().url().optional(),
    ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
    AUTH_DISABLED: booleanFlag,
    DEV_OWNER_ID: z.string().min(1).default('local-user'),
    UPSTASH_REDIS_URL: z.string().url().optional(),
    UPSTASH_REDIS_TOKEN: z.string().min(1).optional(),
    TRUST_PROXY: booleanFlag,
    DOWNLOAD_RATE_LIMIT: z.coerce.number().int().positive().default(60),
    DOWNLOAD_RATE_WINDOW_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(60),
    APP_TITLE: z.string().default('File Share'),
    APP_SUBTITLE: z.string().default('Expiring links for your files'),
  })
  .refine((env) => env.MIN_RETENTION_DAYS <= env.MAX_RETENTION_DAYS, {
    message: 'MIN_RETENTION_DAYS must not exceed MAX_RETENTION_DAYS',
    path: ['MIN_RETENTION_DAYS'],
  })
  .refine(
    (env) =>
      (env.UPSTASH_REDIS_URL === undefined) ===
      (env.UPSTASH_REDIS_TOKEN === undefined),
    {
      message: 'UPSTASH_REDIS_URL and UPSTASH_REDIS_TOKEN must be set together',
      path: ['UPSTASH_REDIS_URL'],
    }
  );

/**
 * Typed application configuration
 */
export interface AppConfig {
  port: number;
  supabase: {
    url: string;
    serviceKey: string;
  };
  storageRoot: string;
  policy: SharePolicy;
  cleanupIntervalMs: number;
  publicBaseUrl: string | null;
  allowedOrigins: string[];
  auth: {
    disabled: boolean;
    devOwnerId: string;
  };
  redis: {
    url: string;
    token: string;
  } | null;
  downloadRateLimit: {
    limit: number;
    windowSeconds: number;
    /** Key clients by X-Forwarded-For (behind a reverse proxy only) */
    trustProxy: boolean;
  };
  branding: {
    title: string;
    subtitle: string;
  };
}

/**
 * Parse configuration from an environment map.
 * Empty strings count as unset. Throws with every problem listed.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] =>
        entry[1] !== undefined && entry[1] !== ''
    )
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    supabase: {
      url: values.SUPABASE_URL,
      serviceKey: values.SUPABASE_SERVICE_KEY,
    },
    storageRoot: values.STORAGE_ROOT,
    policy: {
      maxUploadBytes: values.MAX_UPLOAD_BYTES,
      minRetentionDays: values.MIN_RETENTION_DAYS,
      maxRetentionDays: values.MAX_RETENTION_DAYS,
    },
    cleanupIntervalMs: values.CLEANUP_INTERVAL_MS,
    publicBaseUrl: values.PUBLIC_BASE_URL?.replace(/\/+$/, '') ?? null,
    allowedOrigins: values.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    auth: {
      disabled: values.AUTH_DISABLED,
      devOwnerId: values.DEV_OWNER_ID,
    },
    redis:
      values.UPSTASH_REDIS_URL !== undefined &&
      values.UPSTASH_REDIS_TOKEN !== undefined
        ? { url: values.UPSTASH_REDIS_URL, token: values.UPSTASH_REDIS_TOKEN }
        : null,
    downloadRateLimit: {
      limit: values.DOWNLOAD_RATE_LIMIT,
      windowSeconds: values.DOWNLOAD_RATE_WINDOW_SECONDS,
      trustProxy: values.TRUST_PROXY,
    },
    branding: {
      title: values.APP_TITLE,
      subtitle: values.APP_SUBTITLE,
    },
  };
}
