/**
 * Environment configuration, validated with zod.
 * Import `getConfig` instead of reading process.env directly.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';

const defaultGhostscript = process.platform === 'win32' ? 'gswin64c' : 'gs';

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),

  /** `pretty` for terminals, `json` for machine consumption */
  LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty'),

  GHOSTSCRIPT_PATH: z.string().min(1).default(defaultGhostscript),
  PDFTOPPM_PATH: z.string().min(1).default('pdftoppm'),
  PDFINFO_PATH: z.string().min(1).default('pdfinfo'),
});

export type Env = z.infer<typeof envSchema>;

export interface Config {
  logLevel: Env['LOG_LEVEL'];
  logFormat: Env['LOG_FORMAT'];
  tools: {
    ghostscript: string;
    pdftoppm: string;
    pdfinfo: string;
  };
}

/**
 * Parse configuration from an environment map.
 * Empty strings count as unset.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = envSchema.safeParse(cleaned);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(`Environment validation failed:\n${errors}`, {
      fields: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }

  const env = result.data;
  return {
    logLevel: env.LOG_LEVEL,
    logFormat: env.LOG_FORMAT,
    tools: {
      ghostscript: env.GHOSTSCRIPT_PATH,
      pdftoppm: env.PDFTOPPM_PATH,
      pdfinfo: env.PDFINFO_PATH,
    },
  };
}

let cached: Config | undefined;

export function getConfig(): Config {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
