/**
 * Configuration - environment read once at startup, validated with zod,
 * then passed down as a plain object
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { splitAddress } from './services/notifier.service.js';

const EnvSchema = z.object({
  MAIL_FROM: z.string().trim().min(1),
  MAIL_TO: z.string().optional(),
  API_BASE: z.string().trim().url(),
  API_USER: z.string().min(1),
  API_PASS: z.string().min(1),
  DATABASE_URL: z.string().trim().min(1),
  API_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  MAX_VARIATION_DEPTH: z.coerce.number().int().positive().default(8),
  MAX_VARIATION_NODES: z.coerce.number().int().positive().default(5000),
  LOW_STOCK_THRESHOLD: z.coerce.number().nonnegative().default(2),
  SMTP_HOST: z.string().trim().min(1).default('localhost'),
  SMTP_PORT: z.coerce.number().int().positive().default(25),
  SMTP_SECURE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
});

export interface CatalogConfig {
  apiBase: string;
  apiUser: string;
  apiPass: string;
  timeoutMs: number;
  maxDepth: number;
  maxNodes: number;
}

export interface DatabaseConfig {
  connectionString: string;
}

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  auth?: { user: string; pass: string };
}

export interface MailConfig {
  from: string;
  to: string[];
  smtp: SmtpConfig;
}

export interface AppConfig {
  catalog: CatalogConfig;
  database: DatabaseConfig;
  mail: MailConfig;
  lowStockThreshold: number;
}

/** Blank values count as unset so `FOO=` in .env behaves like a missing line */
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

/** Build AppConfig from an env map; ConfigError lists every bad variable */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((i) => String(i.path[0])))];
    const detail = parsed.error.issues
      .map((i) => `${String(i.path[0])}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration (${detail})`, variables);
  }
  const e = parsed.data;

  const apiBase = e.API_BASE.endsWith('/') ? e.API_BASE : `${e.API_BASE}/`;
  const to = e.MAIL_TO
    ? e.MAIL_TO.split(',').map((s) => s.trim()).filter((s) => s.length > 0)
    : [splitAddress(e.MAIL_FROM)[0]];

  return {
    catalog: {
      apiBase,
      apiUser: e.API_USER,
      apiPass: e.API_PASS,
      timeoutMs: e.API_TIMEOUT_MS,
      maxDepth: e.MAX_VARIATION_DEPTH,
      maxNodes: e.MAX_VARIATION_NODES,
    },
    database: { connectionString: e.DATABASE_URL },
    mail: {
      from: e.MAIL_FROM,
      to,
      smtp: {
        host: e.SMTP_HOST,
        port: e.SMTP_PORT,
        secure: e.SMTP_SECURE,
        auth: e.SMTP_USER && e.SMTP_PASS ? { user: e.SMTP_USER, pass: e.SMTP_PASS } : undefined,
      },
    },
    lowStockThreshold: e.LOW_STOCK_THRESHOLD,
  };
}
