import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from './errors';

/**
 * Reads certificate material referenced by a TLS block.
 */
export type CertificateLoader = (path: string) => Buffer;

/**
 * Loads certificate files from the local file system.
 */
export const fileCertificateLoader: CertificateLoader = (path) => readFileSync(path);

export const DEFAULT_MAX_STREAM_IN_ITEMS = 10_000;

/**
 * Settings shared by every remote model an initializer builds.
 */
export interface InitializerSettings {
  /**
   * Deadline applied to calls whose connection sets no `timeoutMs`.
   */
  defaultTimeoutMs?: number;

  /**
   * Largest input sequence the HTTP protocol will buffer for a stream-in call.
   * @default 10000
   */
  maxStreamInItems: number;

  /**
   * Source of CA, certificate and key bytes.
   */
  certificateLoader: CertificateLoader;
}

const envSchema = z.object({
  REMOTE_MODEL_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  REMOTE_MODEL_MAX_STREAM_IN_ITEMS: z.coerce.number().int().positive().default(DEFAULT_MAX_STREAM_IN_ITEMS)
});

/**
 * Builds initializer settings, filling anything not given from defaults.
 */
export function createInitializerSettings(overrides: Partial<InitializerSettings> = {}): InitializerSettings {
  const settings: InitializerSettings = {
    defaultTimeoutMs: overrides.defaultTimeoutMs,
    maxStreamInItems: overrides.maxStreamInItems ?? DEFAULT_MAX_STREAM_IN_ITEMS,
    certificateLoader: overrides.certificateLoader ?? fileCertificateLoader
  };
  if (!Number.isInteger(settings.maxStreamInItems) || settings.maxStreamInItems < 1) {
    throw new ConfigurationError(`maxStreamInItems must be a positive integer, got ${settings.maxStreamInItems}`);
  }
  if (
    settings.defaultTimeoutMs !== undefined &&
    (!Number.isInteger(settings.defaultTimeoutMs) || settings.defaultTimeoutMs <= 0)
  ) {
    throw new ConfigurationError(`defaultTimeoutMs must be a positive integer, got ${settings.defaultTimeoutMs}`);
  }
  return settings;
}

/**
 * Reads initializer settings from environment variables.
 *
 * - `REMOTE_MODEL_TIMEOUT_MS`: default per-call deadline
 * - `REMOTE_MODEL_MAX_STREAM_IN_ITEMS`: bound on buffered HTTP stream-in input
 */
export function loadInitializerSettings(env: NodeJS.ProcessEnv = process.env): InitializerSettings {
  const result = envSchema.safeParse({
    REMOTE_MODEL_TIMEOUT_MS: env.REMOTE_MODEL_TIMEOUT_MS || undefined,
    REMOTE_MODEL_MAX_STREAM_IN_ITEMS: env.REMOTE_MODEL_MAX_STREAM_IN_ITEMS || undefined
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Invalid environment variable ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'invalid value'}`,
      { cause: result.error }
    );
  }
  return createInitializerSettings({
    defaultTimeoutMs: result.data.REMOTE_MODEL_TIMEOUT_MS,
    maxStreamInItems: result.data.REMOTE_MODEL_MAX_STREAM_IN_ITEMS
  });
}
