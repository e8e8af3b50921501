import { readFile } from 'node:fs/promises';
import {
  Agent as HttpAgent,
  request as httpRequest,
  type IncomingMessage,
  type RequestOptions as HttpRequestOptions,
} from 'node:http';
import { Agent as HttpsAgent, request as httpsRequest } from 'node:https';
import { z } from 'zod';
import { ErrorKind, RadkitMcpError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type {
  AttributeRecord,
  ConnectCredentials,
  ConnectionHandle,
  DeviceClient,
  ExecOptions,
  ExecResult,
  RequestOptions,
  SnmpRow,
} from './device-client.js';

const SessionResponseSchema = z.object({ session_id: z.string().min(1) });

const InventoryResponseSchema = z.object({ devices: z.array(z.string()) });

const DescribeResponseSchema = z.object({ attributes: z.record(z.unknown()) });

const ExecResponseSchema = z.object({
  status: z.string(),
  status_message: z.string().optional(),
  results: z.array(
    z.object({
      command: z.string(),
      output: z.string(),
      status: z.string(),
    }),
  ),
});

const SnmpResponseSchema = z.object({
  rows: z.array(
    z.object({
      oid: z.string(),
      value: z.unknown(),
      type: z.string(),
      error: z.boolean().optional(),
    }),
  ),
});

const ErrorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});

export interface GatewayClientOptions {
  baseUrl: string;
  /** Upper bound for any single request */
  requestTimeoutMs: number;
  logger: Logger;
}

interface GatewaySession {
  agent: HttpAgent;
  token: string;
}

interface SendOptions {
  agent: HttpAgent;
  token?: string;
  body?: unknown;
  signal?: AbortSignal;
}

/**
 * Device client speaking JSON to a RADKit gateway. With certificate
 * credentials the material becomes the TLS client identity of every
 * request made on the session.
 */
export class GatewayDeviceClient implements DeviceClient {
  private readonly baseUrl: URL;
  private readonly sessions = new Map<string, GatewaySession>();
  private readonly logger: Logger;

  constructor(private readonly options: GatewayClientOptions) {
    this.baseUrl = new URL(options.baseUrl);
    this.logger = options.logger.child({ component: 'gateway-client' });
  }

  async connect(credentials: ConnectCredentials): Promise<ConnectionHandle> {
    const agent = await this.createAgent(credentials);
    try {
      const response = await this.send('POST', '/v1/sessions', SessionResponseSchema, {
        agent,
        body: { identity: credentials.identity, mode: credentials.mode },
      });
      this.sessions.set(response.session_id, { agent, token: response.session_id });
      this.logger.info({ identity: credentials.identity, mode: credentials.mode }, 'Gateway session opened');
      return { sessionId: response.session_id };
    } catch (error) {
      agent.destroy();
      throw error;
    }
  }

  async inventory(handle: ConnectionHandle, serviceSerial: string, options: RequestOptions = {}): Promise<string[]> {
    const response = await this.call(
      handle,
      'GET',
      `/v1/services/${encodeURIComponent(serviceSerial)}/devices`,
      InventoryResponseSchema,
      { signal: options.signal },
    );
    return response.devices;
  }

  async describe(
    handle: ConnectionHandle,
    serviceSerial: string,
    device: string,
    options: RequestOptions = {},
  ): Promise<AttributeRecord> {
    const response = await this.call(handle, 'GET', devicePath(serviceSerial, device), DescribeResponseSchema, {
      signal: options.signal,
    });
    return response.attributes;
  }

  async exec(
    handle: ConnectionHandle,
    serviceSerial: string,
    device: string,
    commands: string[],
    options: ExecOptions,
  ): Promise<ExecResult> {
    const response = await this.call(handle, 'POST', `${devicePath(serviceSerial, device)}/exec`, ExecResponseSchema, {
      signal: options.signal,
      body: {
        commands,
        timeout: options.timeoutSeconds,
        reset_before: options.resetBefore,
        reset_after: options.resetAfter,
        sudo: options.sudo,
      },
    });
    return {
      status: response.status,
      statusMessage: response.status_message,
      results: response.results,
    };
  }

  async snmpGet(
    handle: ConnectionHandle,
    serviceSerial: string,
    device: string,
    oids: string[],
    options: RequestOptions = {},
  ): Promise<SnmpRow[]> {
    const response = await this.call(
      handle,
      'POST',
      `${devicePath(serviceSerial, device)}/snmp/get`,
      SnmpResponseSchema,
      { signal: options.signal, body: { oids, timeout: options.timeoutSeconds ?? 0 } },
    );
    return response.rows.map((row) => ({ oid: row.oid, value: row.value, type: row.type, error: row.error }));
  }

  async close(handle: ConnectionHandle): Promise<void> {
    const session = this.sessions.get(handle.sessionId);
    if (!session) {
      return;
    }
    this.sessions.delete(handle.sessionId);
    try {
      await this.send('DELETE', `/v1/sessions/${encodeURIComponent(handle.sessionId)}`, z.unknown(), {
        agent: session.agent,
        token: session.token,
      });
    } finally {
      session.agent.destroy();
    }
  }

  private async createAgent(credentials: ConnectCredentials): Promise<HttpAgent> {
    if (this.baseUrl.protocol === 'http:') {
      if (credentials.mode === 'certificate') {
        this.logger.warn('Gateway URL is plain http; certificate material is not sent');
      }
      return new HttpAgent({ keepAlive: true });
    }
    if (credentials.mode === 'interactive') {
      return new HttpsAgent({ keepAlive: true });
    }

    try {
      const [cert, key, ca] = await Promise.all([
        readFile(credentials.certPath),
        readFile(credentials.keyPath),
        readFile(credentials.caPath),
      ]);
      return new HttpsAgent({ keepAlive: true, cert, key, ca, passphrase: credentials.keyPassword });
    } catch (error) {
      throw new RadkitMcpError(
        ErrorKind.FilesystemError,
        `Cannot load certificate material: ${errorMessage(error)}`,
        { certPath: credentials.certPath, keyPath: credentials.keyPath, caPath: credentials.caPath },
        { cause: error },
      );
    }
  }

  private call<T>(
    handle: ConnectionHandle,
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { body?: unknown; signal?: AbortSignal },
  ): Promise<T> {
    const session = this.sessions.get(handle.sessionId);
    if (!session) {
      return Promise.reject(
        new RadkitMcpError(ErrorKind.SessionUnavailable, 'Gateway session is closed', {
          sessionId: handle.sessionId,
        }),
      );
    }
    return this.send(method, path, schema, { ...options, agent: session.agent, token: session.token });
  }

  private send<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: SendOptions,
  ): Promise<T> {
    const url = new URL(this.baseUrl.pathname.replace(/\/$/, '') + path, this.baseUrl);
    const payload = options.body === undefined ? undefined : JSON.stringify(options.body);
    const headers: Record<string, string> = { accept: 'application/json' };
    if (payload !== undefined) {
      headers['content-type'] = 'application/json';
      headers['content-length'] = String(Buffer.byteLength(payload));
    }
    if (options.token) {
      headers.authorization = `Bearer ${options.token}`;
    }
    const requestOptions: HttpRequestOptions = {
      method,
      headers,
      agent: options.agent,
      signal: options.signal,
      timeout: this.options.requestTimeoutMs,
    };

    return new Promise<T>((resolve, reject) => {
      const onResponse = (res: IncomingMessage): void => {
        readBody(res)
          .then((text) => resolve(parseResponse(method, url, res.statusCode ?? 0, text, schema)))
          .catch(reject);
      };
      const req =
        url.protocol === 'http:'
          ? httpRequest(url, requestOptions, onResponse)
          : httpsRequest(url, requestOptions, onResponse);

      req.on('timeout', () => {
        req.destroy(
          new RadkitMcpError(ErrorKind.RemoteTimeout, `${method} ${url.pathname} timed out`, {
            timeoutMs: this.options.requestTimeoutMs,
          }),
        );
      });
      req.on('error', (error) => reject(toTransportError(method, url, error)));

      if (payload !== undefined) {
        req.write(payload);
      }
      req.end();
    });
  }
}

function devicePath(serviceSerial: string, device: string): string {
  return `/v1/services/${encodeURIComponent(serviceSerial)}/devices/${encodeURIComponent(device)}`;
}

function readBody(res: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    res.on('data', (chunk: Buffer) => chunks.push(chunk));
    res.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    res.on('error', reject);
  });
}

function parseJson(text: string): unknown {
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    return { message: text.trim() };
  }
}

function parseResponse<T>(
  method: string,
  url: URL,
  status: number,
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  const body = parseJson(text);

  if (status >= 400) {
    const parsed = ErrorBodySchema.safeParse(body);
    const detail = parsed.success ? parsed.data.error ?? parsed.data.message : undefined;
    const message = `${method} ${url.pathname} failed with ${status}${detail ? `: ${detail}` : ''}`;
    throw new RadkitMcpError(statusKind(status), message, { status });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new RadkitMcpError(ErrorKind.RemoteError, `Malformed gateway response for ${method} ${url.pathname}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

function statusKind(status: number): ErrorKind {
  if (status === 401 || status === 403) return ErrorKind.AuthError;
  if (status === 404) return ErrorKind.DeviceNotFound;
  if (status === 410) return ErrorKind.ConnectionLost;
  if (status === 408 || status === 504) return ErrorKind.RemoteTimeout;
  return ErrorKind.RemoteError;
}

function toTransportError(method: string, url: URL, error: Error): RadkitMcpError {
  if (error instanceof RadkitMcpError) {
    return error;
  }
  if (error.name === 'AbortError') {
    return new RadkitMcpError(ErrorKind.RemoteTimeout, `${method} ${url.pathname} was aborted`, undefined, {
      cause: error,
    });
  }
  return new RadkitMcpError(
    ErrorKind.RemoteUnavailable,
    `Gateway unreachable at ${url.origin}: ${error.message}`,
    { url: url.origin },
    { cause: error },
  );
}
