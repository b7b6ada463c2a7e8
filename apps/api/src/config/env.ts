/**
 * Application Configuration
 *
 * Parses environment variables once at startup into an immutable config
 * value that is passed explicitly to every component.
 */

import { z } from 'zod';
import type { HandlerKind } from '../../../../packages/shared-types/src';
import { ConfigError } from '../errors';

// Blank handler URLs are treated as unset
const optionalUrl = z.union([z.string().url(), z.literal('').transform(() => undefined)]).optional();

const timeoutMs = (defaultMs: number) => z.coerce.number().int().positive().default(defaultMs);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  DB_DEBUG: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),

  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  CLASSIFIER_MODEL: z.string().min(1).optional(),
  CLASSIFIER_TIMEOUT_MS: timeoutMs(15_000),

  TIMEZONE: z
    .string()
    .default('Asia/Kolkata')
    .refine(isValidTimeZone, { message: 'Unknown IANA time zone' }),
  AGENT_SOURCE: z.string().min(1).default('Parent Agent'),
  FALLBACK_EMAIL: z.string().email().default('me@example.com'),
  EMAIL_LINK_BASE: z.string().url().default('https://mail.google.com/mail/u/0/#inbox/'),

  CALENDAR_HANDLER_URL: optionalUrl,
  EMAIL_HANDLER_URL: optionalUrl,
  RESEARCH_HANDLER_URL: optionalUrl,
  MESSAGE_HANDLER_URL: optionalUrl,
  EXPERIENCE_HANDLER_URL: optionalUrl,

  CALENDAR_HANDLER_TIMEOUT_MS: timeoutMs(20_000),
  EMAIL_HANDLER_TIMEOUT_MS: timeoutMs(20_000),
  RESEARCH_HANDLER_TIMEOUT_MS: timeoutMs(35_000),
  MESSAGE_HANDLER_TIMEOUT_MS: timeoutMs(6_000),
  EXPERIENCE_HANDLER_TIMEOUT_MS: timeoutMs(10_000),
});

export interface HandlerEndpoint {
  url?: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  dbDebug: boolean;
  classifier: {
    apiKey?: string;
    model?: string;
    timeoutMs: number;
  };
  /** IANA zone used to resolve relative dates and naive timestamps */
  timeZone: string;
  agentSource: string;
  fallbackEmail: string;
  emailLinkBase: string;
  handlers: Record<HandlerKind, HandlerEndpoint>;
}

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Build the application config from an environment map.
 *
 * @throws ConfigError listing every invalid key
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(issues);
  }

  const e = parsed.data;

  return Object.freeze({
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    dbDebug: e.DB_DEBUG,
    classifier: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.CLASSIFIER_MODEL,
      timeoutMs: e.CLASSIFIER_TIMEOUT_MS,
    },
    timeZone: e.TIMEZONE,
    agentSource: e.AGENT_SOURCE,
    fallbackEmail: e.FALLBACK_EMAIL,
    emailLinkBase: e.EMAIL_LINK_BASE,
    handlers: {
      calendar: { url: e.CALENDAR_HANDLER_URL, timeoutMs: e.CALENDAR_HANDLER_TIMEOUT_MS },
      email: { url: e.EMAIL_HANDLER_URL, timeoutMs: e.EMAIL_HANDLER_TIMEOUT_MS },
      research: { url: e.RESEARCH_HANDLER_URL, timeoutMs: e.RESEARCH_HANDLER_TIMEOUT_MS },
      message: { url: e.MESSAGE_HANDLER_URL, timeoutMs: e.MESSAGE_HANDLER_TIMEOUT_MS },
      experience: { url: e.EXPERIENCE_HANDLER_URL, timeoutMs: e.EXPERIENCE_HANDLER_TIMEOUT_MS },
    },
  });
}
