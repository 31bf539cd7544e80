import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_SHOPIFY_API_VERSION = '2025-10';
export const DEFAULT_REPORT_TIMEZONE = 'America/Chicago';
// Slack rejects section text above 3000 characters.
export const SLACK_SECTION_LIMIT = 3000;

const REQUIRED_ENV_VARS = [
  'SHOPIFY_STORE_DOMAIN',
  'SHOPIFY_ADMIN_TOKEN',
  'SLACK_BOT_TOKEN',
  'SLACK_CHANNEL_ID',
] as const;

const envSchema = z.object({
  SHOPIFY_STORE_DOMAIN: z
    .string()
    .transform((value) => value.replace(/^https?:\/\//, '').replace(/\/+$/, '')),
  SHOPIFY_ADMIN_TOKEN: z.string(),
  SHOPIFY_API_VERSION: z.string().default(DEFAULT_SHOPIFY_API_VERSION),
  SHOPIFY_ADMIN_STORE_HANDLE: z.string().optional(),
  SLACK_BOT_TOKEN: z.string(),
  SLACK_CHANNEL_ID: z.string(),
  REPORT_TIMEZONE: z
    .string()
    .refine(isValidTimeZone, { message: 'must be an IANA time zone, e.g. America/Chicago' })
    .default(DEFAULT_REPORT_TIMEZONE),
  SLACK_POST_DELAY_MS: z.coerce.number().int().nonnegative().default(600),
  SLACK_MAX_SECTION_CHARS: z.coerce.number().int().positive().max(SLACK_SECTION_LIMIT).default(2900),
});

export type NotifierConfig = Readonly<{
  storeDomain: string;
  shopifyToken: string;
  shopifyApiVersion: string;
  adminStoreHandle: string | undefined;
  slackToken: string;
  slackChannelId: string;
  timeZone: string;
  postDelayMs: number;
  maxSectionChars: number;
}>;

/**
 * Build the immutable notifier configuration from the environment.
 * Empty strings are treated as unset so optional values fall back to defaults.
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): NotifierConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const missing = REQUIRED_ENV_VARS.filter((key) => !(key in cleaned));
  if (missing.length) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`, {
      missing,
    });
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join('; ')}`, {
      issues,
    });
  }

  const parsed = result.data;
  return Object.freeze({
    storeDomain: parsed.SHOPIFY_STORE_DOMAIN,
    shopifyToken: parsed.SHOPIFY_ADMIN_TOKEN,
    shopifyApiVersion: parsed.SHOPIFY_API_VERSION,
    adminStoreHandle: parsed.SHOPIFY_ADMIN_STORE_HANDLE,
    slackToken: parsed.SLACK_BOT_TOKEN,
    slackChannelId: parsed.SLACK_CHANNEL_ID,
    timeZone: parsed.REPORT_TIMEZONE,
    postDelayMs: parsed.SLACK_POST_DELAY_MS,
    maxSectionChars: parsed.SLACK_MAX_SECTION_CHARS,
  });
}

/**
 * The bearer secret Vercel cron sends, read on its own so a request can be
 * rejected before the rest of the configuration is validated.
 */
export function getCronSecret(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const secret = env.CRON_SECRET?.trim();
  return secret ? secret : undefined;
}

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}
