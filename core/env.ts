import { z } from 'zod';

const booleanString = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((val) => val === 'true');

const integerString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().nonnegative());

const envSchema = z.object({
  // Node Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  PORT: integerString('8000'),
  HOST: z.string().default('0.0.0.0'),
  API_TOKEN: z.string().optional(),
  CONFIG_FILE: z.string().optional(),

  // Browser
  BROWSER_HEADLESS: booleanString('true'),
  BROWSER_NO_SANDBOX: booleanString('true'),
  BROWSER_EXECUTABLE_PATH: z.string().optional(),
  BROWSER_STEALTH_MODE: booleanString('true'),
  NAVIGATION_TIMEOUT: integerString('30000'),

  // Proxies
  USE_PROXIES: booleanString('false'),
  PROXY_LIST: z.string().optional(),
  PROXY_FILE: z.string().optional(),

  // Search
  SEARCH_TIMEOUT: integerString('90'),
  SEARCH_RATE_LIMIT: integerString('10'),
  SEARCH_COOLDOWN: integerString('60'),
  GOOGLE_DEFAULT_LANG: z.string().default('it'),
  GOOGLE_DEFAULT_TIMEZONE: z.string().default('Europe/Rome'),
  GOOGLE_MAX_RESULTS: integerString('20'),
  GOOGLE_MAX_PAGES: integerString('10'),
  GOOGLE_SLEEP_INTERVAL: z
    .string()
    .default('2.0')
    .transform((val) => parseFloat(val))
    .pipe(z.number().nonnegative()),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * 解析环境变量（测试时可传入自定义来源）
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
  return envSchema.parse(source);
}
