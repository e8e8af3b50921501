import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Server configuration.
 *
 * Credential variables are not part of this object: the credential
 * resolver reads them straight from the environment so that resolution
 * stays a function of its inputs.
 */

export type Env = Readonly<Record<string, string | undefined>>;

export interface ServerConfig {
  /** Base URL of the RADKit gateway the device client talks to */
  gatewayUrl: string;
  /** RADKit cloud domain used to namespace local identities */
  cloudDomain: string;
  /** Root of the local RADKit state (identities live below it) */
  radkitHome: string;
  /** Where materialized certificate files are written */
  tempRoot: string;
  /** Upper bound for a single gateway request, in milliseconds */
  requestTimeoutMs: number;
  /** Pino log level */
  logLevel: string;
  /** "development" | "production" | "test" */
  nodeEnv: string;
}

export const DEFAULT_CLOUD_DOMAIN = 'prod.radkit-cloud.cisco.com';

/**
 * Credential variables, canonical name first, then the accepted alias.
 */
export const CREDENTIAL_ENV = {
  identity: ['RADKIT_IDENTITY', 'RADKIT_SERVICE_USERNAME'],
  defaultServiceSerial: ['RADKIT_DEFAULT_SERVICE_SERIAL', 'RADKIT_SERVICE_CODE'],
  certB64: ['RADKIT_CERT_B64'],
  keyB64: ['RADKIT_KEY_B64'],
  caB64: ['RADKIT_CA_B64'],
  keyPasswordB64: ['RADKIT_KEY_PASSWORD_B64', 'RADKIT_CLIENT_PRIVATE_KEY_PASSWORD_BASE64'],
} as const;

export type CredentialField = keyof typeof CREDENTIAL_ENV;

/** First non-blank value among `keys`, trimmed. */
export function envValue(env: Env, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const raw = env[key]?.trim();
    if (raw) return raw;
  }
  return undefined;
}

export function credentialValue(env: Env, field: CredentialField): string | undefined {
  return envValue(env, CREDENTIAL_ENV[field]);
}

function envStr(env: Env, key: string, fallback: string): string {
  return envValue(env, [key]) ?? fallback;
}

function envInt(env: Env, key: string, fallback: number): number {
  const raw = envValue(env, [key]);
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    gatewayUrl: envStr(env, 'RADKIT_GATEWAY_URL', 'https://localhost:8443'),
    cloudDomain: envStr(env, 'RADKIT_CLOUD_DOMAIN', DEFAULT_CLOUD_DOMAIN),
    radkitHome: envStr(env, 'RADKIT_HOME', join(homedir(), '.radkit')),
    tempRoot: envStr(env, 'RADKIT_TMPDIR', tmpdir()),
    requestTimeoutMs: envInt(env, 'RADKIT_REQUEST_TIMEOUT_MS', 60_000),
    logLevel: envStr(env, 'LOG_LEVEL', 'info'),
    nodeEnv: envStr(env, 'NODE_ENV', 'production'),
  };
}
