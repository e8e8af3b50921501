import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ErrorKind, RadkitMcpError } from '../errors.js';
import { identitiesRoot, resolveCredentials, type DirectoryEntry, type FsProbe } from './credential-resolver.js';

const options = { radkitHome: '/home/ops/.radkit', cloudDomain: 'prod.radkit-cloud.cisco.com' };
const root = identitiesRoot(options);

function file(name: string): DirectoryEntry {
  return { name, isFile: true, isDirectory: false };
}

function dir(name: string): DirectoryEntry {
  return { name, isFile: false, isDirectory: true };
}

function probeOf(tree: Record<string, DirectoryEntry[]>): FsProbe {
  return {
    listEntries: (directory) => tree[directory] ?? null,
  };
}

const emptyProbe = probeOf({});

const completeBundle = {
  RADKIT_IDENTITY: 'ops@example.test',
  RADKIT_DEFAULT_SERVICE_SERIAL: 'abcd-1234-efgh',
  RADKIT_CERT_B64: 'Y2VydA==',
  RADKIT_KEY_B64: 'a2V5',
  RADKIT_CA_B64: 'Y2E=',
  RADKIT_KEY_PASSWORD_B64: 'cGFzc3dvcmQ=',
};

function captureError(fn: () => unknown): RadkitMcpError {
  try {
    fn();
  } catch (error) {
    if (error instanceof RadkitMcpError) return error;
    throw error;
  }
  throw new Error('expected resolveCredentials to throw');
}

describe('resolveCredentials', () => {
  describe('environment bundle', () => {
    it('returns the bundle when all six variables are set', () => {
      expect(resolveCredentials(completeBundle, emptyProbe, options)).toEqual({
        kind: 'env-bundle',
        identity: 'ops@example.test',
        defaultServiceSerial: 'abcd-1234-efgh',
        certB64: 'Y2VydA==',
        keyB64: 'a2V5',
        caB64: 'Y2E=',
        keyPasswordB64: 'cGFzc3dvcmQ=',
      });
    });

    it.each([
      ['canonical names', completeBundle],
      [
        'identity alias',
        { ...completeBundle, RADKIT_IDENTITY: undefined, RADKIT_SERVICE_USERNAME: 'ops@example.test' },
      ],
      [
        'service serial alias',
        { ...completeBundle, RADKIT_DEFAULT_SERVICE_SERIAL: undefined, RADKIT_SERVICE_CODE: 'abcd-1234-efgh' },
      ],
      [
        'password alias',
        {
          ...completeBundle,
          RADKIT_KEY_PASSWORD_B64: undefined,
          RADKIT_CLIENT_PRIVATE_KEY_PASSWORD_BASE64: 'cGFzc3dvcmQ=',
        },
      ],
    ])('accepts a complete bundle using %s', (_label, env) => {
      const profile = resolveCredentials(env, emptyProbe, options);
      expect(profile.kind).toBe('env-bundle');
      expect(profile.identity).toBe('ops@example.test');
      expect(profile.defaultServiceSerial).toBe('abcd-1234-efgh');
    });

    it('names exactly the missing variables', () => {
      const error = captureError(() =>
        resolveCredentials(
          { RADKIT_CERT_B64: 'Y2VydA==', RADKIT_KEY_B64: 'a2V5', RADKIT_IDENTITY: 'ops@example.test' },
          emptyProbe,
          options,
        ),
      );
      expect(error.kind).toBe(ErrorKind.IncompleteEnvBundle);
      expect(error.details).toEqual({
        missing: ['RADKIT_DEFAULT_SERVICE_SERIAL', 'RADKIT_CA_B64', 'RADKIT_KEY_PASSWORD_B64'],
      });
    });

    it.each(['RADKIT_IDENTITY', 'RADKIT_DEFAULT_SERVICE_SERIAL', 'RADKIT_KEY_B64', 'RADKIT_CA_B64', 'RADKIT_KEY_PASSWORD_B64'])(
      'fails when only %s is missing',
      (missing) => {
        const error = captureError(() =>
          resolveCredentials({ ...completeBundle, [missing]: '' }, emptyProbe, options),
        );
        expect(error.kind).toBe(ErrorKind.IncompleteEnvBundle);
        expect(error.details).toEqual({ missing: [missing] });
      },
    );

    it('does not fall through to a local directory when the bundle is incomplete', () => {
      const probe = probeOf({ [join(root, 'ops@example.test')]: [file('certificate.pem')] });
      const error = captureError(() =>
        resolveCredentials({ RADKIT_CERT_B64: 'Y2VydA==', RADKIT_IDENTITY: 'ops@example.test' }, probe, options),
      );
      expect(error.kind).toBe(ErrorKind.IncompleteEnvBundle);
    });

    it('ignores companion variables when the certificate blob is absent', () => {
      const { RADKIT_CERT_B64: _cert, ...rest } = completeBundle;
      expect(resolveCredentials(rest, emptyProbe, options)).toEqual({
        kind: 'interactive-login',
        identity: 'ops@example.test',
        defaultServiceSerial: 'abcd-1234-efgh',
      });
    });
  });

  describe('local identity directory', () => {
    it('uses the configured identity directory when it holds credential files', () => {
      const searchPath = join(root, 'ops@example.test');
      const probe = probeOf({
        [searchPath]: [file('certificate.pem'), file('private_key_encrypted.pem'), file('notes.txt')],
      });

      expect(
        resolveCredentials(
          { RADKIT_IDENTITY: 'ops@example.test', RADKIT_KEY_PASSWORD_B64: 'cGFzc3dvcmQ=' },
          probe,
          options,
        ),
      ).toEqual({
        kind: 'local-directory',
        identity: 'ops@example.test',
        searchPath,
        credentialFiles: ['certificate.pem', 'private_key_encrypted.pem'],
        defaultServiceSerial: undefined,
        keyPasswordB64: 'cGFzc3dvcmQ=',
      });
    });

    it('falls back to the single onboarded identity when none is configured', () => {
      const searchPath = join(root, 'lab@example.test');
      const probe = probeOf({
        [root]: [dir('lab@example.test')],
        [searchPath]: [file('chain.pem')],
      });

      const profile = resolveCredentials({}, probe, options);
      expect(profile.kind).toBe('local-directory');
      expect(profile.identity).toBe('lab@example.test');
    });

    it('has no default identity when several are onboarded', () => {
      const probe = probeOf({
        [root]: [dir('a@example.test'), dir('b@example.test')],
        [join(root, 'a@example.test')]: [file('certificate.pem')],
      });

      expect(captureError(() => resolveCredentials({}, probe, options)).kind).toBe(ErrorKind.NoCredentialsAvailable);
    });

    it('treats an empty directory with a configured identity as interactive login', () => {
      const probe = probeOf({ [join(root, 'ops@example.test')]: [] });

      expect(resolveCredentials({ RADKIT_IDENTITY: 'ops@example.test' }, probe, options)).toEqual({
        kind: 'interactive-login',
        identity: 'ops@example.test',
        defaultServiceSerial: undefined,
      });
    });

    it('ignores subdirectories named like credential files', () => {
      const probe = probeOf({ [join(root, 'ops@example.test')]: [dir('certificate.pem')] });

      expect(resolveCredentials({ RADKIT_IDENTITY: 'ops@example.test' }, probe, options).kind).toBe(
        'interactive-login',
      );
    });
  });

  describe('interactive login', () => {
    it('uses the identity alone when no directory exists', () => {
      expect(
        resolveCredentials({ RADKIT_SERVICE_USERNAME: 'ops@example.test', RADKIT_SERVICE_CODE: 'svc-1' }, emptyProbe, options),
      ).toEqual({ kind: 'interactive-login', identity: 'ops@example.test', defaultServiceSerial: 'svc-1' });
    });
  });

  it('fails with NoCredentialsAvailable when nothing is configured', () => {
    const error = captureError(() => resolveCredentials({}, emptyProbe, options));
    expect(error.kind).toBe(ErrorKind.NoCredentialsAvailable);
    expect(error.retryable).toBe(false);
  });
});
