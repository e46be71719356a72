import { z } from 'zod';
import { booleanFromEnv, numberFromEnv } from './env.utils';

const toInt = (def?: number) =>
  z.preprocess((v) => numberFromEnv(v) ?? def, z.number().int());

const toBool = (def?: boolean) =>
  z.preprocess((v) => (v === undefined || v === null || v === '' ? def : booleanFromEnv(v)), z.boolean());

const nonEmpty = z.string().trim().min(1);

/**
 * Base object first, passthrough right away, refinements afterwards:
 * `envSchema.shape` must stay reachable for the .env.example check.
 */
const envObject = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
    APP_NAME: z.string().trim().default('market-dashboard-bot'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

    PORT: toInt(3000).pipe(z.number().int().min(1).max(65535)),

    TELEGRAM_BOT_TOKEN: nonEmpty,
    TELEGRAM_CHANNEL_ID: nonEmpty,
    TELEGRAM_ADMIN_ID: z.preprocess(numberFromEnv, z.number().int().positive()),
    TELEGRAM_DISABLE_WEB_PAGE_PREVIEW: toBool(false),
    TELEGRAM_USE_POLLING: toBool(true),
    TELEGRAM_WEBHOOK_SECRET: z.string().trim().optional(),

    COINGLASS_API_KEY: z.string().trim().default(''),
    COINGLASS_BASE_URL: z.string().trim().default('https://open-api.coinglass.com/api/pro/v1'),
    COINGECKO_BASE_URL: z.string().trim().default('https://api.coingecko.com/api/v3'),
    FEAR_GREED_BASE_URL: z.string().trim().default('https://api.alternative.me'),
    HTTP_TIMEOUT_MS: toInt(0).pipe(z.number().int().min(0).max(300_000)),

    REPORT_TIMEZONE: z.string().trim().default('Europe/Moscow'),
    REPORT_TIMEZONE_LABEL: z.string().trim().default('MSK'),
    REPORT_CHUNK_MAX_LENGTH: toInt(4000).pipe(z.number().int().min(100).max(4096)),
    REPORT_CHUNK_PAUSE_MS: toInt(1000).pipe(z.number().int().min(0).max(60_000)),

    DASHBOARD_AUTOPOST_ENABLED: toBool(false),
    DASHBOARD_AUTOPOST_CRON: z.string().trim().default('0 8 * * *'),

    MANUAL_INPUT_TTL_MINUTES: toInt(30).pipe(z.number().int().min(1).max(1440)),
    BOT_ABOUT_TEXT: z
      .string()
      .trim()
      .default('This is the market dashboard bot of the channel. Please contact the channel administrator with any questions.'),
  })
  .passthrough();

export const envSchema = envObject;

export const envSchemaWithRefinements = envObject.superRefine((env, ctx) => {
  if (!env.TELEGRAM_USE_POLLING && !env.TELEGRAM_WEBHOOK_SECRET) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['TELEGRAM_WEBHOOK_SECRET'],
      message: 'TELEGRAM_WEBHOOK_SECRET is required when TELEGRAM_USE_POLLING=false',
    });
  }
});
