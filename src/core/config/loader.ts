import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { AppConfig } from '../../types/index.js';

export const DEFAULT_SCOPES = ['https://www.googleapis.com/auth/youtube'];
export const DEFAULT_REDIRECT_URI = 'http://127.0.0.1:8765/oauth2callback';

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return fallback;
      const normalized = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
      if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
      return z.NEVER;
    });

const envSchema = z.object({
  GOOGLE_CLIENT_ID: z.string().trim().min(1, 'is required'),
  GOOGLE_CLIENT_SECRET: z.string().trim().optional(),
  GOOGLE_REDIRECT_URI: z.string().trim().url().default(DEFAULT_REDIRECT_URI),
  YT_PRUNER_SCOPES: z.string().optional(),
  YT_PRUNER_CREDENTIALS_FILE: z.string().trim().min(1).default('.yt-pruner/credentials.json'),
  YT_PRUNER_SESSION_ONLY: booleanFlag(false),
  YT_PRUNER_AUDIT_DB: z.string().trim().min(1).default('.yt-pruner/audit.db'),
  YT_PRUNER_RESET_ON_ERROR: booleanFlag(true),
});

export function parseScopes(raw: string | undefined): string[] {
  if (!raw) return [...DEFAULT_SCOPES];
  const scopes = raw
    .split(/[\s,]+/)
    .map((scope) => scope.trim())
    .filter(Boolean);
  return scopes.length > 0 ? [...new Set(scopes)] : [...DEFAULT_SCOPES];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration (${details})`, keys);
  }

  const values = parsed.data;
  return {
    clientId: values.GOOGLE_CLIENT_ID,
    clientSecret: values.GOOGLE_CLIENT_SECRET || undefined,
    redirectUri: values.GOOGLE_REDIRECT_URI,
    scopes: parseScopes(values.YT_PRUNER_SCOPES),
    credentialsFile: values.YT_PRUNER_CREDENTIALS_FILE,
    sessionOnly: values.YT_PRUNER_SESSION_ONLY,
    auditDb: values.YT_PRUNER_AUDIT_DB,
    resetOnError: values.YT_PRUNER_RESET_ON_ERROR,
  };
}
