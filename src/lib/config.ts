import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '@/lib/errors';
import type { ErrorPolicy } from '@/types/post';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  CONTENT_DIR: z.string().min(1).default('content/posts'),
  POST_EXTENSIONS: z.string().default('.md,.markdown'),
  FRONT_MATTER_DELIMITER: z.string().trim().min(1).default('---'),
  ON_PARSE_ERROR: z.enum(['abort', 'skip']).default('abort'),
});

export type ContentConfig = {
  env: string;
  logLevel: (typeof LOG_LEVELS)[number];
  contentDir: string;
  extensions: readonly string[];
  delimiter: string;
  onError: ErrorPolicy;
};

export function loadConfig(env: NodeJS.ProcessEnv): ContentConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const vars = parsed.data;
  const extensions = vars.POST_EXTENSIONS.split(',')
    .map(ext => ext.trim().toLowerCase())
    .filter(Boolean)
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
  if (extensions.length === 0) throw new ConfigError(['POST_EXTENSIONS: at least one extension is required']);

  return {
    env: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL ?? (vars.NODE_ENV === 'production' ? 'info' : 'debug'),
    contentDir: vars.CONTENT_DIR,
    extensions,
    delimiter: vars.FRONT_MATTER_DELIMITER,
    onError: vars.ON_PARSE_ERROR,
  };
}

let current: ContentConfig | undefined;

/** Reads `.env` and the process environment on first use. */
export function getConfig(): ContentConfig {
  if (!current) {
    dotenv.config();
    current = loadConfig(process.env);
  }
  return current;
}
