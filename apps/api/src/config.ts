import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .optional()
  .transform((v) => v === '1' || v === 'true' || v === 'yes');

const optionalTrimmed = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  DATABASE_URL: optionalTrimmed.pipe(z.string().url().optional()),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HOST: z.string().trim().min(1).default('127.0.0.1'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  TRUST_PROXY: booleanFlag,
  MENU_PATH: z.string().trim().min(1).default('menu.json'),
});

export type AppConfig = {
  botToken: string;
  databaseUrl: string | null;
  port: number;
  host: string;
  logLevel: (typeof LOG_LEVELS)[number];
  trustProxy: boolean;
  menuPath: string;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    botToken: e.TELEGRAM_BOT_TOKEN,
    databaseUrl: e.DATABASE_URL ?? null,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    trustProxy: e.TRUST_PROXY,
    menuPath: e.MENU_PATH,
  };
}

/** Warnings for settings that work but degrade behavior, logged at startup. */
export function startupWarnings(config: AppConfig): string[] {
  const warnings: string[] = [];
  if (!config.databaseUrl) warnings.push('DATABASE_URL missing (orders are kept in memory and lost on restart)');
  if (!config.trustProxy) warnings.push('TRUST_PROXY off (rate limiting keys on the socket address)');
  return warnings;
}
