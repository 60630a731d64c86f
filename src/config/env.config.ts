import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const optionalString = () =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), z.string().optional());

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: toNumber(8080),
  LOG_LEVEL: LogLevel.default('info'),

  WHATSAPP_VERIFY_TOKEN: z.string().default('change-me'),
  WHATSAPP_ACCESS_TOKEN: optionalString(),
  WHATSAPP_APP_SECRET: optionalString(),
  WHATSAPP_API_VERSION: z.string().default('v24.0'),
  WHATSAPP_FORCE_TO: optionalString(),

  TENANT_BY_PHONE_NUMBER_ID: z.string().default(''),
  DEFAULT_TENANT: z.string().min(1).default('broker'),
  CONFIG_ROOT: z.string().min(1).default('configs'),

  TIMEZONE: z.string().default('America/Argentina/Buenos_Aires'),
  GOOGLE_APPLICATION_CREDENTIALS: optionalString(),
  GOOGLE_CALENDAR_ID: optionalString(),

  SESSION_IDLE_TTL_MINUTES: toNumber(60),
  SESSION_SWEEP_INTERVAL_SECONDS: toNumber(300),
  FALLBACK_CONTACT_NAME: z.string().default('ahí'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function loadEnv(): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = loadEnv();

export const isProduction = (): boolean => config.NODE_ENV === 'production';
