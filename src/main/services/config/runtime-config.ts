import { z } from 'zod';
import type { UpdateProviderKind } from '@shared/contracts';
import type { LogLevel } from '@main/services/logging/Logger';

export const DEFAULT_UPDATE_URL = 'https://updates.quickfill.app/latest-version.json';
export const DEFAULT_UPDATE_TIMEOUT_MS = 10_000;

export interface RuntimeConfig {
  applicationDir: string | null;
  updateProvider: UpdateProviderKind;
  updateUrl: string;
  updateTimeoutMs: number;
  logLevel: LogLevel;
  debugLogMirrorPath: string | null;
}

export interface RuntimeConfigResult {
  config: RuntimeConfig;
  warnings: string[];
}

const optionalText = z
  .string()
  .transform((value) => value.trim())
  .transform((value) => (value ? value : null));

const updateProviderSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['http', 'none']));

const logLevelSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['debug', 'info', 'warn', 'error']));

export function readRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfigResult {
  const warnings: string[] = [];

  function read<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }

    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      return parsed.data;
    }

    warnings.push(`${name} invalido (${JSON.stringify(raw)}); usando ${JSON.stringify(fallback)}.`);
    return fallback;
  }

  return {
    config: {
      applicationDir: read('QUICKFILL_APP_DIR', optionalText, null),
      updateProvider: read('QUICKFILL_UPDATE_PROVIDER', updateProviderSchema, 'http'),
      updateUrl: read('QUICKFILL_UPDATE_URL', z.string().trim().url(), DEFAULT_UPDATE_URL),
      updateTimeoutMs: read('QUICKFILL_UPDATE_TIMEOUT_MS', z.coerce.number().int().positive(), DEFAULT_UPDATE_TIMEOUT_MS),
      logLevel: read('QUICKFILL_LOG_LEVEL', logLevelSchema, 'info'),
      debugLogMirrorPath: read('QUICKFILL_DEBUG_LOG_MIRROR', optionalText, null)
    },
    warnings
  };
}
