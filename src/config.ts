/**
 * Settings
 *
 * Explicit, code-supplied configuration validated with zod. The package never
 * reads the process environment; callers pass every value they want to change.
 */

import { z } from 'zod';
import { ConfigError } from './types';
import { componentLogger, type Logger } from './logger';
import { validateTlsBypassConfig } from './security';

export const SettingsSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((url) => url.startsWith('https://'), {
      message: 'baseUrl must use HTTPS for secure communication',
    })
    .transform((url) => url.replace(/\/+$/, '')),
  authToken: z
    .string()
    .trim()
    .min(1, 'authToken must not be empty')
    .transform((token) => (token.startsWith('Bearer ') ? token : `Bearer ${token}`)),

  /** Connect timeout, in seconds */
  httpTimeout: z.number().int().min(1).max(300).default(30),
  /** Read/write timeout of a single request, in seconds */
  maxTimeoutSeconds: z.number().int().min(1).max(3600).default(30),
  /** Retries after the first attempt; 3 means up to 4 attempts */
  httpMaxRetries: z.number().int().min(0).max(10).default(3),
  /** SECURITY RISK - never enabled in production */
  skipTlsVerify: z.boolean().default(false),

  defaultPollTimeoutMs: z.number().int().min(1000).max(3_600_000).default(30_000),
  defaultPollIntervalMs: z.number().int().min(50).max(5000).default(100),

  maxQueryResults: z.number().int().min(1).max(100_000).default(10_000),
  queryTtlSeconds: z.number().int().min(30).max(3600).default(300),

  /** Environment name used for security checks, e.g. 'development' or 'production' */
  environment: z.string().min(1).default('production'),
});

export type LakeQuerySettings = Readonly<z.output<typeof SettingsSchema>>;
export type LakeQuerySettingsInput = z.input<typeof SettingsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate settings and apply defaults.
 *
 * @throws ConfigError when a value is out of bounds
 * @throws SecurityConfigError when TLS bypass is requested in production
 *
 * @example
 * ```ts
 * const settings = createSettings({
 *   baseUrl: 'https://lake.example.com',
 *   authToken: 'Bearer my-token',
 *   defaultPollTimeoutMs: 60_000,
 * });
 * ```
 */
export function createSettings(
  input: LakeQuerySettingsInput,
  options: { logger?: Logger } = {}
): LakeQuerySettings {
  const logger = componentLogger('config', options.logger);

  const parsed = SettingsSchema.safeParse(input);
  if (!parsed.success) {
    const details = describeIssues(parsed.error);
    logger.fatal({ issues: details }, 'Failed to create query client configuration');
    throw new ConfigError('Invalid query client settings', { details, cause: parsed.error });
  }

  const settings = parsed.data;
  validateTlsBypassConfig(settings.skipTlsVerify, settings.environment, logger);

  logger.info(
    {
      baseUrl: settings.baseUrl,
      httpTimeout: settings.httpTimeout,
      maxTimeoutSeconds: settings.maxTimeoutSeconds,
      httpMaxRetries: settings.httpMaxRetries,
      tlsVerify: !settings.skipTlsVerify,
      pollTimeoutMs: settings.defaultPollTimeoutMs,
      pollIntervalMs: settings.defaultPollIntervalMs,
      maxQueryResults: settings.maxQueryResults,
      environment: settings.environment,
    },
    'Query client configuration loaded'
  );

  return Object.freeze(settings);
}
