import { rmSync, rmdirSync } from 'node:fs';
import { mkdtemp, rm, rmdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ErrorKind, RadkitMcpError, errorMessage } from '../errors.js';
import type { CleanupReport, EnvBundleProfile, MaterializedCredential } from './types.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Strict base64 decode. Whitespace is ignored and padding is optional, but
 * any other character outside the standard alphabet is rejected.
 */
export function decodeBase64Field(field: string, value: string): Buffer {
  const compact = value.replace(/\s+/g, '');
  const unpadded = compact.replace(/=+$/, '');
  if (!compact || !BASE64_PATTERN.test(compact) || unpadded.length % 4 === 1) {
    throw new RadkitMcpError(
      ErrorKind.CorruptCredentialEncoding,
      `${field} is not valid base64`,
      { field },
    );
  }
  return Buffer.from(compact, 'base64');
}

export function decodePassword(field: string, value: string): string {
  const bytes = decodeBase64Field(field, value);
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new RadkitMcpError(
      ErrorKind.CorruptCredentialEncoding,
      `${field} does not decode to UTF-8 text`,
      { field },
      { cause: error },
    );
  }
}

export interface MaterializeOptions {
  /** Parent directory for the per-process credential directory */
  tempRoot: string;
}

/**
 * Writes the certificate, key and CA chain of an environment bundle to a
 * private temporary directory. Either all three files exist afterwards or
 * none do.
 */
export async function materialize(
  bundle: EnvBundleProfile,
  options: MaterializeOptions,
): Promise<MaterializedCredential> {
  // Decode everything up front so a corrupt field never leaves a file behind.
  const cert = decodeBase64Field('RADKIT_CERT_B64', bundle.certB64);
  const key = decodeBase64Field('RADKIT_KEY_B64', bundle.keyB64);
  const ca = decodeBase64Field('RADKIT_CA_B64', bundle.caB64);
  const keyPassword = decodePassword('RADKIT_KEY_PASSWORD_B64', bundle.keyPasswordB64);

  let directory: string;
  try {
    directory = await mkdtemp(join(options.tempRoot, 'radkit-mcp-'));
  } catch (error) {
    throw new RadkitMcpError(
      ErrorKind.FilesystemError,
      `Cannot create credential directory under ${options.tempRoot}: ${errorMessage(error)}`,
      { path: options.tempRoot },
      { cause: error },
    );
  }

  const certPath = join(directory, 'certificate.pem');
  const keyPath = join(directory, 'private_key_encrypted.pem');
  const caPath = join(directory, 'chain.pem');

  try {
    await writeFile(certPath, cert, { mode: 0o600, flag: 'wx' });
    await writeFile(keyPath, key, { mode: 0o600, flag: 'wx' });
    await writeFile(caPath, ca, { mode: 0o600, flag: 'wx' });
  } catch (error) {
    const details: Record<string, unknown> = { path: directory };
    try {
      await rm(directory, { recursive: true, force: true });
    } catch (rollbackError) {
      details.rollbackError = errorMessage(rollbackError);
    }
    throw new RadkitMcpError(
      ErrorKind.FilesystemError,
      `Cannot write certificate material to ${directory}: ${errorMessage(error)}`,
      details,
      { cause: error },
    );
  }

  return {
    directory,
    certPath,
    keyPath,
    caPath,
    keyPassword,
    files: [certPath, keyPath, caPath],
  };
}

/**
 * Deletes every materialized file, then the directory. A failure on one
 * file does not stop the others; failures are collected in the report.
 */
export async function releaseMaterialized(credential: MaterializedCredential): Promise<CleanupReport> {
  const report: CleanupReport = { removed: [], failures: [] };
  for (const path of [...credential.files, credential.directory]) {
    try {
      if (path === credential.directory) {
        await rmdir(path);
      } else {
        await rm(path);
      }
      report.removed.push(path);
    } catch (error) {
      if (isMissing(error)) continue;
      report.failures.push({ path, message: errorMessage(error) });
    }
  }
  return report;
}

/** Synchronous variant for the process `exit` event. */
export function releaseMaterializedSync(credential: MaterializedCredential): CleanupReport {
  const report: CleanupReport = { removed: [], failures: [] };
  for (const path of [...credential.files, credential.directory]) {
    try {
      if (path === credential.directory) {
        rmdirSync(path);
      } else {
        rmSync(path);
      }
      report.removed.push(path);
    } catch (error) {
      if (isMissing(error)) continue;
      report.failures.push({ path, message: errorMessage(error) });
    }
  }
  return report;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
