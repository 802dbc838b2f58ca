/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';
import { parseIsoDate } from '../utils/dates.js';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine((value) => parseIsoDate(value) !== null, 'Not a calendar date');

// Unset and empty values both mean "no bound"
const optionalIsoDate = z
  .union([isoDate, z.literal('')])
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z
  .object({
    // Crawl
    KEYWORDS: z.string().default(''),
    SOURCES: z.string().default('detik'),
    CONCURRENCY: z.coerce.number().int().positive().default(12),
    START_DATE: optionalIsoDate,
    END_DATE: optionalIsoDate,
    MAX_PAGES: z.coerce.number().int().nonnegative().default(0),
    RESULT_BUFFER_SIZE: z.coerce.number().int().positive().default(100),

    // HTTP
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    USER_AGENT: z
      .string()
      .default(
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
      ),

    // Sources
    DETIK_BASE_URL: z.string().url().default('https://www.detik.com'),

    // Logging
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    LOG_FILE: z.string().default('./logs/crawler.log'),

    // Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .refine((value) => !value.START_DATE || !value.END_DATE || value.START_DATE <= value.END_DATE, {
    message: 'START_DATE must not be after END_DATE',
    path: ['START_DATE'],
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = parseEnv(process.env);
