import { describe, expect, it } from 'vitest';
import { envSchema, envSchemaWithRefinements } from '@libs/core';
import fs from 'fs';
import path from 'path';

const readEnvExample = (): Record<string, string> => {
  const content = fs.readFileSync(path.join(process.cwd(), '.env.example'), 'utf8');
  const entries: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq < 0) continue;
    entries[trimmed.slice(0, eq)] = trimmed.slice(eq + 1);
  }

  return entries;
};

describe('.env.example', () => {
  it('lists every schema key', () => {
    const documented = new Set(Object.keys(readEnvExample()));

    expect(Object.keys(envSchema.shape).filter((key) => !documented.has(key))).toEqual([]);
  });

  it('documents no key the schema does not know', () => {
    const known = new Set(Object.keys(envSchema.shape));

    expect(Object.keys(readEnvExample()).filter((key) => !known.has(key))).toEqual([]);
  });

  it('parses as a polling bot with autopost off', () => {
    const env = envSchemaWithRefinements.parse(readEnvExample());

    expect(env.TELEGRAM_USE_POLLING).toBe(true);
    expect(env.TELEGRAM_WEBHOOK_SECRET).toBe('');
    expect(env.TELEGRAM_DISABLE_WEB_PAGE_PREVIEW).toBe(false);
    expect(env.DASHBOARD_AUTOPOST_ENABLED).toBe(false);
    expect(env.DASHBOARD_AUTOPOST_CRON).toBe('0 8 * * *');
    expect(env.REPORT_CHUNK_PAUSE_MS).toBe(1000);
  });

  it('matches the schema defaults for the report settings', () => {
    const example = envSchemaWithRefinements.parse(readEnvExample());
    const defaults = envSchemaWithRefinements.parse({
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHANNEL_ID: '@test_channel',
      TELEGRAM_ADMIN_ID: '1001',
    });

    expect(example.REPORT_TIMEZONE).toBe(defaults.REPORT_TIMEZONE);
    expect(example.REPORT_CHUNK_MAX_LENGTH).toBe(defaults.REPORT_CHUNK_MAX_LENGTH);
    expect(example.HTTP_TIMEOUT_MS).toBe(defaults.HTTP_TIMEOUT_MS);
    expect(example.TELEGRAM_DISABLE_WEB_PAGE_PREVIEW).toBe(defaults.TELEGRAM_DISABLE_WEB_PAGE_PREVIEW);
  });
});
