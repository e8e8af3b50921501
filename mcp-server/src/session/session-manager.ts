import { join } from 'node:path';
import {
  decodePassword,
  materialize,
  releaseMaterialized,
  releaseMaterializedSync,
  type MaterializeOptions,
} from '../auth/certificate-materializer.js';
import { resolveCredentials, nodeFsProbe, type FsProbe, type ResolveOptions } from '../auth/credential-resolver.js';
import type { CleanupReport, CredentialProfile, CredentialProfileKind, EnvBundleProfile, MaterializedCredential } from '../auth/types.js';
import type { ConnectCredentials, ConnectionHandle, DeviceClient } from '../clients/device-client.js';
import type { Env } from '../config.js';
import { ErrorKind, RadkitMcpError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';

export type SessionState = 'uninitialized' | 'establishing' | 'ready' | 'failed' | 'torn_down';

export interface Session {
  readonly handle: ConnectionHandle;
  readonly identity: string;
  readonly defaultServiceSerial?: string;
  readonly profileKind: CredentialProfileKind;
  readonly establishedAt: Date;
}

export interface TeardownReport {
  /** False when there was nothing to tear down */
  performed: boolean;
  closeError?: string;
  cleanup: CleanupReport;
}

export interface SessionManagerOptions {
  client: DeviceClient;
  env: Env;
  logger: Logger;
  resolve: ResolveOptions;
  materialize: MaterializeOptions;
  probe?: FsProbe;
  /** Replaceable for tests */
  materializer?: (bundle: EnvBundleProfile, options: MaterializeOptions) => Promise<MaterializedCredential>;
}

const EMPTY_CLEANUP: CleanupReport = { removed: [], failures: [] };

/**
 * Owns the one authenticated connection of the process. The first
 * `getSession()` call establishes it; concurrent callers share the same
 * attempt. Materialized certificate files live exactly as long as the
 * session does.
 */
export class SessionManager {
  private currentState: SessionState = 'uninitialized';
  private session: Session | null = null;
  private credential: MaterializedCredential | null = null;
  private pending: Promise<Session> | null = null;
  private failure: RadkitMcpError | null = null;
  private closing: Promise<TeardownReport> | null = null;
  /** Bumped on every teardown so a stale establishment can tell it lost. */
  private generation = 0;
  private readonly logger: Logger;

  constructor(private readonly options: SessionManagerOptions) {
    this.logger = options.logger.child({ component: 'session' });
  }

  get state(): SessionState {
    return this.currentState;
  }

  getSession(): Promise<Session> {
    switch (this.currentState) {
      case 'ready':
        if (this.session) return Promise.resolve(this.session);
        break;
      case 'establishing':
        if (this.pending) return this.pending;
        break;
      case 'failed':
        return Promise.reject(this.failure ?? sessionUnavailable('Session establishment failed'));
      case 'torn_down':
        return Promise.reject(this.failure ?? sessionUnavailable('Session has been torn down; reset it first'));
      case 'uninitialized':
        break;
    }

    this.currentState = 'establishing';
    const attempt: Promise<Session> = this.establish(this.generation).finally(() => {
      if (this.pending === attempt) this.pending = null;
    });
    this.pending = attempt;
    return attempt;
  }

  /**
   * Marks the shared connection as dead. Later callers see
   * `SessionUnavailable` until `reset()`.
   */
  async invalidate(cause: unknown): Promise<TeardownReport> {
    this.logger.error({ err: cause }, 'Session invalidated by a fatal connection error');
    const report = await this.teardown();
    this.failure = sessionUnavailable(`Connection lost: ${errorMessage(cause)}; reset the session to reconnect`);
    return report;
  }

  /**
   * Closes the connection and deletes materialized files. Safe to call
   * any number of times; only the first call does work.
   */
  teardown(): Promise<TeardownReport> {
    if (this.closing) {
      return this.closing;
    }
    if (this.currentState === 'torn_down') {
      return Promise.resolve({ performed: false, cleanup: EMPTY_CLEANUP });
    }
    this.closing = this.runTeardown().finally(() => {
      this.closing = null;
    });
    return this.closing;
  }

  /**
   * Synchronous teardown for the `exit` event: the connection cannot be
   * closed politely there, but the files still have to go.
   */
  teardownSync(): CleanupReport {
    const credential = this.credential;
    this.generation += 1;
    this.credential = null;
    this.session = null;
    this.pending = null;
    this.currentState = 'torn_down';
    if (!credential) {
      return EMPTY_CLEANUP;
    }
    const report = releaseMaterializedSync(credential);
    this.logCleanup(report);
    return report;
  }

  /** Tears down whatever is held and starts over from `uninitialized`. */
  async reset(): Promise<void> {
    if (this.closing || this.currentState !== 'torn_down') {
      await this.teardown();
    }
    this.failure = null;
    this.currentState = 'uninitialized';
  }

  private async establish(generation: number): Promise<Session> {
    const { client, env, probe = nodeFsProbe } = this.options;
    let credential: MaterializedCredential | null = null;
    try {
      const profile = resolveCredentials(env, probe, this.options.resolve);
      this.logger.info({ mode: profile.kind, identity: profile.identity }, 'Resolved credential source');

      if (profile.kind === 'env-bundle') {
        const materializer = this.options.materializer ?? materialize;
        credential = await materializer(profile, this.options.materialize);
        this.credential = credential;
        this.logger.debug({ directory: credential.directory }, 'Materialized certificate files');
        this.assertCurrent(generation);
      }

      const handle = await client.connect(connectCredentials(profile, credential));
      if (generation !== this.generation) {
        await client.close(handle);
        throw sessionUnavailable('Session was torn down during establishment');
      }
      const session: Session = Object.freeze({
        handle,
        identity: profile.identity,
        defaultServiceSerial: profile.defaultServiceSerial,
        profileKind: profile.kind,
        establishedAt: new Date(),
      });

      this.session = session;
      this.currentState = 'ready';
      this.logger.info({ identity: session.identity, mode: session.profileKind }, 'Authentication successful');
      return session;
    } catch (error) {
      const failure = asEstablishmentError(error);
      if (credential && this.credential === credential) {
        this.credential = null;
        this.logCleanup(await releaseMaterialized(credential));
      }
      if (generation === this.generation) {
        this.currentState = 'failed';
        this.failure = cachedFailure(failure);
      }
      this.logger.error({ kind: failure.kind, err: failure }, 'Session establishment failed');
      throw failure;
    }
  }

  private assertCurrent(generation: number): void {
    if (generation !== this.generation) {
      throw sessionUnavailable('Session was torn down during establishment');
    }
  }

  private async runTeardown(): Promise<TeardownReport> {
    this.generation += 1;
    this.failure = null;
    // Set before the first await so getSession() cannot start a new attempt mid-teardown.
    this.currentState = 'torn_down';
    if (this.pending) {
      const inFlight = this.pending;
      this.pending = null;
      // Let the in-flight attempt notice and release what it acquired.
      await inFlight.catch(() => undefined);
    }

    const session = this.session;
    const credential = this.credential;
    this.session = null;
    this.credential = null;

    let closeError: string | undefined;
    if (session) {
      try {
        await this.options.client.close(session.handle);
        this.logger.info({ identity: session.identity }, 'Connection closed');
      } catch (error) {
        closeError = errorMessage(error);
        this.logger.warn({ err: error }, 'Closing the connection failed');
      }
    }

    const cleanup = credential ? await releaseMaterialized(credential) : EMPTY_CLEANUP;
    this.logCleanup(cleanup);
    return { performed: true, closeError, cleanup };
  }

  private logCleanup(report: CleanupReport): void {
    if (report.removed.length > 0) {
      this.logger.info({ removed: report.removed.length }, 'Removed temporary certificate files');
    }
    for (const failure of report.failures) {
      this.logger.warn({ path: failure.path, reason: failure.message }, 'Failed to remove temporary file');
    }
  }
}

function connectCredentials(profile: CredentialProfile, credential: MaterializedCredential | null): ConnectCredentials {
  switch (profile.kind) {
    case 'env-bundle':
      if (!credential) {
        throw new RadkitMcpError(ErrorKind.FilesystemError, 'Certificate material was not materialized');
      }
      return {
        mode: 'certificate',
        identity: profile.identity,
        certPath: credential.certPath,
        keyPath: credential.keyPath,
        caPath: credential.caPath,
        keyPassword: credential.keyPassword,
      };
    case 'local-directory':
      return {
        mode: 'certificate',
        identity: profile.identity,
        certPath: join(profile.searchPath, 'certificate.pem'),
        keyPath: join(profile.searchPath, 'private_key_encrypted.pem'),
        caPath: join(profile.searchPath, 'chain.pem'),
        keyPassword:
          profile.keyPasswordB64 === undefined
            ? undefined
            : decodePassword('RADKIT_KEY_PASSWORD_B64', profile.keyPasswordB64),
      };
    case 'interactive-login':
      return { mode: 'interactive', identity: profile.identity };
  }
}

function sessionUnavailable(message: string): RadkitMcpError {
  return new RadkitMcpError(ErrorKind.SessionUnavailable, message);
}

/**
 * What later callers see after a failed establishment. Nothing reconnects
 * until `reset()`, so a retryable failure is not passed on as retryable.
 */
function cachedFailure(failure: RadkitMcpError): RadkitMcpError {
  if (!failure.retryable) {
    return failure;
  }
  return new RadkitMcpError(
    ErrorKind.SessionUnavailable,
    `Session establishment failed: ${failure.message}; reset the session to retry`,
    { cause: failure.kind },
    { cause: failure },
  );
}

function asEstablishmentError(error: unknown): RadkitMcpError {
  if (error instanceof RadkitMcpError) {
    return error;
  }
  return new RadkitMcpError(ErrorKind.AuthError, `Authentication failed: ${errorMessage(error)}`, undefined, {
    cause: error,
  });
}
