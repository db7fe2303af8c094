import dotenv from 'dotenv';
import { z } from 'zod';
import { MIN_PURCHASE_SPACING_MS } from '../services/acquisition/purchase-limiter.js';
import type { AcquisitionSettings } from '../services/acquisition/types.js';
import { ConfigurationError } from '../utils/errors.js';
import { parseChatId, parseRanges } from './ranges.js';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const booleanFlag = z
  .string()
  .default('false')
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', '']))
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'is required'),
  TELEGRAM_CHAT_ID: z.string().optional().transform(parseChatId),
  GIFT_RANGES: z
    .string({ required_error: 'is required' })
    .transform((value, ctx) => {
      const { ranges, errors } = parseRanges(value);
      for (const message of errors) ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      if (errors.length === 0 && ranges.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must define at least one range' });
      }
      return ranges;
    }),
  PURCHASE_ONLY_UPGRADABLE_GIFTS: booleanFlag,
  PRIORITIZE_LOW_SUPPLY: booleanFlag,
  POLL_INTERVAL_SECONDS: z.preprocess(emptyToUndefined, z.coerce.number().positive().default(15)),
  PURCHASE_SPACING_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().min(MIN_PURCHASE_SPACING_MS).default(MIN_PURCHASE_SPACING_MS),
  ),
  SNAPSHOT_PATH: z.preprocess(emptyToUndefined, z.string().default('data/history.json')),
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional()),
  NODE_ENV: z.preprocess(emptyToUndefined, z.enum(['development', 'production', 'test']).default('development')),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  telegram: {
    botToken: string;
    /** Where operator notifications go. null disables them. */
    notifyChatId: number | string | null;
  };
  acquisition: AcquisitionSettings;
  snapshotPath: string;
  databaseUrl: string | null;
  port: number | null;
  nodeEnv: Env['NODE_ENV'];
}

/**
 * Validate the environment once at startup. The result is passed explicitly
 * to everything that needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration:\n${issues.map((i) => `- ${i}`).join('\n')}`, issues);
  }

  const e = parsed.data;
  return {
    telegram: {
      botToken: e.TELEGRAM_BOT_TOKEN,
      notifyChatId: e.TELEGRAM_CHAT_ID,
    },
    acquisition: {
      ranges: e.GIFT_RANGES,
      purchaseOnlyUpgradable: e.PURCHASE_ONLY_UPGRADABLE_GIFTS,
      prioritizeLowSupply: e.PRIORITIZE_LOW_SUPPLY,
      pollIntervalMs: e.POLL_INTERVAL_SECONDS * 1000,
      purchaseSpacingMs: e.PURCHASE_SPACING_MS,
    },
    snapshotPath: e.SNAPSHOT_PATH,
    databaseUrl: e.DATABASE_URL ?? null,
    port: e.PORT ?? null,
    nodeEnv: e.NODE_ENV,
  };
}
