import { readdirSync } from 'node:fs';
import { join } from 'node:path';
import { CREDENTIAL_ENV, credentialValue, type CredentialField, type Env } from '../config.js';
import { ErrorKind, RadkitMcpError, errorMessage } from '../errors.js';
import type { CredentialProfile, EnvBundleProfile } from './types.js';

/** File names the RADKit onboarding leaves in an identity directory. */
export const CREDENTIAL_FILE_NAMES = ['certificate.pem', 'private_key_encrypted.pem', 'chain.pem'] as const;

export interface DirectoryEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
}

/**
 * Read-only view of the filesystem. `listEntries` returns null when the
 * path does not exist or is not a directory.
 */
export interface FsProbe {
  listEntries(directory: string): DirectoryEntry[] | null;
}

export const nodeFsProbe: FsProbe = {
  listEntries(directory) {
    try {
      return readdirSync(directory, { withFileTypes: true }).map((entry) => ({
        name: entry.name,
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory(),
      }));
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return null;
      }
      throw new RadkitMcpError(
        ErrorKind.FilesystemError,
        `Cannot read ${directory}: ${errorMessage(error)}`,
        { path: directory },
        { cause: error },
      );
    }
  },
};

export interface ResolveOptions {
  radkitHome: string;
  cloudDomain: string;
}

const BUNDLE_FIELDS: readonly CredentialField[] = [
  'identity',
  'defaultServiceSerial',
  'certB64',
  'keyB64',
  'caB64',
  'keyPasswordB64',
];

export function identitiesRoot(options: ResolveOptions): string {
  return join(options.radkitHome, 'identities', options.cloudDomain);
}

function resolveEnvBundle(env: Env): EnvBundleProfile {
  const values = new Map<CredentialField, string>();
  const missing: string[] = [];
  for (const field of BUNDLE_FIELDS) {
    const value = credentialValue(env, field);
    if (value === undefined) {
      missing.push(CREDENTIAL_ENV[field][0]);
    } else {
      values.set(field, value);
    }
  }

  const read = (field: CredentialField): string => values.get(field) ?? '';
  if (missing.length > 0) {
    throw new RadkitMcpError(
      ErrorKind.IncompleteEnvBundle,
      `RADKIT_CERT_B64 is set but the credential bundle is incomplete; missing: ${missing.join(', ')}`,
      { missing },
    );
  }

  return {
    kind: 'env-bundle',
    identity: read('identity'),
    defaultServiceSerial: read('defaultServiceSerial'),
    certB64: read('certB64'),
    keyB64: read('keyB64'),
    caB64: read('caB64'),
    keyPasswordB64: read('keyPasswordB64'),
  };
}

/**
 * The onboarded identity to use when none is configured: the only
 * identity directory present, if there is exactly one.
 */
function defaultIdentity(probe: FsProbe, options: ResolveOptions): string | undefined {
  const entries = probe.listEntries(identitiesRoot(options));
  const identities = (entries ?? []).filter((entry) => entry.isDirectory);
  return identities.length === 1 ? identities[0].name : undefined;
}

/**
 * Picks exactly one credential source. Order: environment bundle, local
 * identity directory, interactive login. Never prompts and never writes.
 */
export function resolveCredentials(env: Env, probe: FsProbe, options: ResolveOptions): CredentialProfile {
  if (credentialValue(env, 'certB64') !== undefined) {
    return resolveEnvBundle(env);
  }

  const configuredIdentity = credentialValue(env, 'identity');
  const defaultServiceSerial = credentialValue(env, 'defaultServiceSerial');

  const localIdentity = configuredIdentity ?? defaultIdentity(probe, options);
  if (localIdentity !== undefined) {
    const searchPath = join(identitiesRoot(options), localIdentity);
    const entries = probe.listEntries(searchPath);
    const known: readonly string[] = CREDENTIAL_FILE_NAMES;
    const credentialFiles = (entries ?? [])
      .filter((entry) => entry.isFile && known.includes(entry.name))
      .map((entry) => entry.name);

    if (credentialFiles.length > 0) {
      return {
        kind: 'local-directory',
        identity: localIdentity,
        searchPath,
        credentialFiles,
        defaultServiceSerial,
        keyPasswordB64: credentialValue(env, 'keyPasswordB64'),
      };
    }
  }

  if (configuredIdentity !== undefined) {
    return { kind: 'interactive-login', identity: configuredIdentity, defaultServiceSerial };
  }

  throw new RadkitMcpError(
    ErrorKind.NoCredentialsAvailable,
    'No authentication method available. Set RADKIT_CERT_B64 with its companion variables, ' +
      `onboard an identity under ${identitiesRoot(options)}, or set RADKIT_IDENTITY.`,
  );
}
