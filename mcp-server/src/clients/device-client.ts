/**
 * The RADKit capability the tools are built on. Implementations own the
 * wire protocol; everything above this interface only sees these calls.
 */

export type ConnectCredentials =
  | {
      mode: 'certificate';
      identity: string;
      certPath: string;
      keyPath: string;
      caPath: string;
      keyPassword?: string;
    }
  | {
      mode: 'interactive';
      identity: string;
    };

/** Opaque handle for an authenticated connection. */
export interface ConnectionHandle {
  readonly sessionId: string;
}

export type AttributeRecord = Record<string, unknown>;

export interface ExecOptions {
  /** Seconds; 0 means the remote side applies no limit */
  timeoutSeconds: number;
  resetBefore: boolean;
  resetAfter: boolean;
  sudo: boolean;
  signal?: AbortSignal;
}

export interface CommandOutput {
  command: string;
  output: string;
  status: string;
}

export interface ExecResult {
  /** Device-level status; anything but SUCCESS is a failure */
  status: string;
  statusMessage?: string;
  results: CommandOutput[];
}

export interface SnmpRow {
  oid: string;
  value: unknown;
  type: string;
  error?: boolean;
}

export interface RequestOptions {
  timeoutSeconds?: number;
  signal?: AbortSignal;
}

export interface DeviceClient {
  connect(credentials: ConnectCredentials): Promise<ConnectionHandle>;
  inventory(handle: ConnectionHandle, serviceSerial: string, options?: RequestOptions): Promise<string[]>;
  describe(
    handle: ConnectionHandle,
    serviceSerial: string,
    device: string,
    options?: RequestOptions,
  ): Promise<AttributeRecord>;
  exec(
    handle: ConnectionHandle,
    serviceSerial: string,
    device: string,
    commands: string[],
    options: ExecOptions,
  ): Promise<ExecResult>;
  snmpGet(
    handle: ConnectionHandle,
    serviceSerial: string,
    device: string,
    oids: string[],
    options?: RequestOptions,
  ): Promise<SnmpRow[]>;
  close(handle: ConnectionHandle): Promise<void>;
}
