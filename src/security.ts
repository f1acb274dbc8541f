/**
 * TLS security checks shared by settings construction and the HTTP client.
 *
 * All functions take the environment explicitly; nothing here reads the
 * process environment.
 */

import { SecurityConfigError } from './types';
import type { Logger } from './logger';

export const PRODUCTION_ENVIRONMENTS: readonly string[] = ['production', 'prod'];
export const DEVELOPMENT_ENVIRONMENTS: readonly string[] = ['development', 'dev', 'test', 'testing'];

const WARNING_TYPE = 'SecurityWarning';
const WARNING_CODE = 'LAKEQUERY_TLS_BYPASS';

export const TLS_BYPASS_VALIDATION_ERROR =
  'TLS verification bypass is FORBIDDEN in production environments. ' +
  'This is a critical security risk that could expose sensitive data.';

const TLS_BYPASS_WARNING_MESSAGE =
  'SECURITY WARNING: TLS certificate verification is DISABLED! ' +
  'This creates a security vulnerability allowing man-in-the-middle attacks. ' +
  'Only use this in development/testing environments with trusted networks.';

const TLS_BYPASS_CRITICAL_LOG =
  'TLS CERTIFICATE VERIFICATION IS DISABLED! ' +
  'This is a CRITICAL SECURITY RISK that should NEVER be used in production. ' +
  'All HTTPS connections are vulnerable to man-in-the-middle attacks.';

const TLS_BYPASS_CLIENT_LOG =
  'Query client initialized with TLS verification DISABLED! ' +
  'This is a CRITICAL SECURITY RISK - all HTTPS connections are vulnerable to interception.';

const NON_DEV_ENVIRONMENT_WARNING =
  'TLS verification disabled in this environment! ' +
  'This configuration should only be used in development/testing.';

export function isProductionEnvironment(environment: string): boolean {
  return PRODUCTION_ENVIRONMENTS.includes(environment.toLowerCase());
}

export function isDevelopmentEnvironment(environment: string): boolean {
  return DEVELOPMENT_ENVIRONMENTS.includes(environment.toLowerCase());
}

/**
 * Check a TLS bypass request while settings are built.
 *
 * @throws SecurityConfigError in production-like environments
 */
export function validateTlsBypassConfig(
  skipTlsVerify: boolean,
  environment: string,
  logger: Logger
): void {
  if (!skipTlsVerify) return;

  if (isProductionEnvironment(environment)) {
    throw new SecurityConfigError(TLS_BYPASS_VALIDATION_ERROR);
  }

  process.emitWarning(TLS_BYPASS_WARNING_MESSAGE, { type: WARNING_TYPE, code: WARNING_CODE });

  logger.warn(
    'TLS certificate verification is DISABLED - SECURITY RISK! ' +
      'This should NEVER be used in production environments.'
  );
  logger.fatal({ environment }, TLS_BYPASS_CRITICAL_LOG);

  if (!isDevelopmentEnvironment(environment)) {
    logger.error({ environment }, NON_DEV_ENVIRONMENT_WARNING);
  }
}

/**
 * Check a TLS bypass request when an HTTP client is created, so settings
 * objects built by hand are caught too.
 *
 * @throws SecurityConfigError in production-like environments
 */
export function validateTlsBypassClient(
  skipTlsVerify: boolean,
  targetUrl: string,
  environment: string,
  logger: Logger
): void {
  if (!skipTlsVerify) return;

  if (isProductionEnvironment(environment)) {
    throw new SecurityConfigError(
      'SECURITY ERROR: TLS verification bypass is FORBIDDEN in production environments. ' +
        `Current environment: ${environment}. This is a critical security vulnerability.`
    );
  }

  process.emitWarning(
    `SECURITY WARNING: Creating query client for ${targetUrl} with TLS verification DISABLED! ` +
      'This creates a security vulnerability allowing man-in-the-middle attacks. ' +
      'Only use this in development/testing environments with trusted networks.',
    { type: WARNING_TYPE, code: WARNING_CODE }
  );

  logger.fatal({ targetUrl, environment }, TLS_BYPASS_CLIENT_LOG);
}

export function logTlsBypassInitialization(targetUrl: string, environment: string, logger: Logger): void {
  logger.fatal(
    { targetUrl, environment },
    'Initializing HTTP client with TLS verification DISABLED - vulnerable to man-in-the-middle attacks'
  );
}

export function logTlsBypassRequest(method: string, path: string, logger: Logger): void {
  logger.warn({ method, path }, 'TLS bypass request made');
}

export interface SecurityContext {
  environment: string;
  isProduction: boolean;
  isDevelopment: boolean;
  tlsBypassAllowed: boolean;
}

export function getSecurityContext(environment: string): SecurityContext {
  return {
    environment,
    isProduction: isProductionEnvironment(environment),
    isDevelopment: isDevelopmentEnvironment(environment),
    tlsBypassAllowed: !isProductionEnvironment(environment),
  };
}
