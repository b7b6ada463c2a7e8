/**
 * Configuration Tests
 */

import { describe, test, expect } from 'vitest';
import { ConfigError } from '../errors';
import { loadConfig } from './env';

function configErrorFor(env: Record<string, string>): ConfigError | null {
  try {
    loadConfig(env);
    return null;
  } catch (error) {
    return error instanceof ConfigError ? error : null;
  }
}

describe('loadConfig', () => {
  test('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.databaseUrl).toBeUndefined();
    expect(config.dbDebug).toBe(false);
    expect(config.classifier).toEqual({ apiKey: undefined, model: undefined, timeoutMs: 15_000 });
    expect(config.timeZone).toBe('Asia/Kolkata');
    expect(config.agentSource).toBe('Parent Agent');
    expect(config.fallbackEmail).toBe('me@example.com');
    expect(config.emailLinkBase).toBe('https://mail.google.com/mail/u/0/#inbox/');
    expect(config.handlers).toEqual({
      calendar: { url: undefined, timeoutMs: 20_000 },
      email: { url: undefined, timeoutMs: 20_000 },
      research: { url: undefined, timeoutMs: 35_000 },
      message: { url: undefined, timeoutMs: 6_000 },
      experience: { url: undefined, timeoutMs: 10_000 },
    });
  });

  test('reads handler endpoints and numeric settings', () => {
    const config = loadConfig({
      PORT: '8080',
      DB_DEBUG: 'true',
      CLASSIFIER_TIMEOUT_MS: '5000',
      RESEARCH_HANDLER_URL: 'http://research.test/query',
      RESEARCH_HANDLER_TIMEOUT_MS: '1000',
    });

    expect(config.port).toBe(8080);
    expect(config.dbDebug).toBe(true);
    expect(config.classifier.timeoutMs).toBe(5000);
    expect(config.handlers.research).toEqual({ url: 'http://research.test/query', timeoutMs: 1000 });
  });

  test('treats a blank handler URL as unset', () => {
    expect(loadConfig({ MESSAGE_HANDLER_URL: '' }).handlers.message.url).toBeUndefined();
  });

  test('returns a frozen value', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  test('rejects a non-numeric port', () => {
    const error = configErrorFor({ PORT: 'abc' });

    expect(error?.code).toBe('CONFIG_INVALID');
    expect(error?.issues).toHaveLength(1);
    expect(error?.issues[0]).toMatch(/^PORT: /);
  });

  test('rejects an unknown time zone', () => {
    expect(configErrorFor({ TIMEZONE: 'Mars/Base' })?.issues).toEqual(['TIMEZONE: Unknown IANA time zone']);
  });

  test('reports every invalid key at once', () => {
    const error = configErrorFor({ CALENDAR_HANDLER_URL: 'not a url', FALLBACK_EMAIL: 'nobody' });

    expect(error?.issues.map((issue) => issue.split(':')[0])).toEqual(['FALLBACK_EMAIL', 'CALENDAR_HANDLER_URL']);
  });
});
