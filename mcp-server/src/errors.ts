/**
 * Error kinds surfaced to the calling agent. Every failure a tool reports
 * carries one of these so the agent can branch on it (retry a timeout,
 * give up on a rejected login).
 */
export enum ErrorKind {
  // Credentials
  IncompleteEnvBundle = 'IncompleteEnvBundle',
  CorruptCredentialEncoding = 'CorruptCredentialEncoding',
  NoCredentialsAvailable = 'NoCredentialsAvailable',
  FilesystemError = 'FilesystemError',

  // Session
  AuthError = 'AuthError',
  SessionUnavailable = 'SessionUnavailable',
  ConnectionLost = 'ConnectionLost',

  // Tool calls
  InvalidArgument = 'InvalidArgument',
  NoServiceSelected = 'NoServiceSelected',
  DeviceNotFound = 'DeviceNotFound',
  RemoteTimeout = 'RemoteTimeout',
  RemoteUnavailable = 'RemoteUnavailable',
  RemoteError = 'RemoteError',
}

const RETRYABLE: ReadonlySet<ErrorKind> = new Set([
  ErrorKind.RemoteTimeout,
  ErrorKind.RemoteUnavailable,
]);

export class RadkitMcpError extends Error {
  public readonly kind: ErrorKind;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    kind: ErrorKind,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RadkitMcpError';
    this.kind = kind;
    this.retryable = RETRYABLE.has(kind);
    this.details = details;

    Object.setPrototypeOf(this, RadkitMcpError.prototype);
  }
}

export interface ErrorPayload {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export function isRadkitMcpError(error: unknown, kind?: ErrorKind): error is RadkitMcpError {
  return error instanceof RadkitMcpError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Shapes any thrown value for the wire. Anything that is not one of ours
 * is reported as a generic remote failure.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof RadkitMcpError) {
    return {
      kind: error.kind,
      message: error.message,
      retryable: error.retryable,
      ...(error.details ? { details: error.details } : {}),
    };
  }
  return {
    kind: ErrorKind.RemoteError,
    message: errorMessage(error),
    retryable: false,
  };
}
