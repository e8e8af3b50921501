import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ErrorKind, RadkitMcpError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { GatewayDeviceClient } from './gateway-client.js';

interface SeenRequest {
  method: string;
  url: string;
  authorization?: string;
  body: unknown;
}

type Route = (req: SeenRequest) => { status: number; body?: unknown };

const credentials = { mode: 'interactive', identity: 'ops@example.test' } as const;

function readJson(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const text = Buffer.concat(chunks).toString('utf-8');
      resolve(text ? JSON.parse(text) : undefined);
    });
    req.on('error', reject);
  });
}

async function listen(server: Server): Promise<number> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  return address.port;
}

async function rejection(promise: Promise<unknown>): Promise<RadkitMcpError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RadkitMcpError) return error;
    throw error;
  }
  throw new Error('expected a rejection');
}

describe('GatewayDeviceClient', () => {
  let server: Server;
  let baseUrl: string;
  let seen: SeenRequest[];
  let route: Route;

  const defaultRoute: Route = (req) => {
    if (req.method === 'POST' && req.url.endsWith('/v1/sessions')) {
      return { status: 201, body: { session_id: 'gw-1' } };
    }
    if (req.method === 'DELETE') {
      return { status: 204 };
    }
    return { status: 500, body: { error: 'unexpected request' } };
  };

  beforeEach(async () => {
    seen = [];
    route = defaultRoute;
    server = createServer((req: IncomingMessage, res: ServerResponse) => {
      readJson(req).then(
        (body) => {
          const request: SeenRequest = {
            method: req.method ?? '',
            url: req.url ?? '',
            authorization: req.headers.authorization,
            body,
          };
          seen.push(request);
          const { status, body: reply } = route(request);
          res.writeHead(status, { 'content-type': 'application/json' });
          res.end(reply === undefined ? '' : JSON.stringify(reply));
        },
        (error: unknown) => {
          res.writeHead(400);
          res.end(String(error));
        },
      );
    });
    baseUrl = `http://127.0.0.1:${await listen(server)}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  const gateway = (url = baseUrl): GatewayDeviceClient =>
    new GatewayDeviceClient({ baseUrl: url, requestTimeoutMs: 5000, logger: silentLogger() });

  it('opens a session and lists the inventory with its token', async () => {
    route = (req) =>
      req.url === '/v1/services/svc-1/devices' ? { status: 200, body: { devices: ['r1', 'r2'] } } : defaultRoute(req);
    const client = gateway();

    const handle = await client.connect(credentials);
    const devices = await client.inventory(handle, 'svc-1');
    await client.close(handle);

    expect(handle).toEqual({ sessionId: 'gw-1' });
    expect(devices).toEqual(['r1', 'r2']);
    expect(seen).toEqual([
      { method: 'POST', url: '/v1/sessions', authorization: undefined, body: { identity: 'ops@example.test', mode: 'interactive' } },
      { method: 'GET', url: '/v1/services/svc-1/devices', authorization: 'Bearer gw-1', body: undefined },
      { method: 'DELETE', url: '/v1/sessions/gw-1', authorization: 'Bearer gw-1', body: undefined },
    ]);
  });

  it('keeps the path prefix of the gateway URL', async () => {
    const client = gateway(`${baseUrl}/radkit/`);

    await client.connect(credentials);

    expect(seen[0].url).toBe('/radkit/v1/sessions');
  });

  it('sends exec options in the request body', async () => {
    route = (req) =>
      req.url.endsWith('/exec')
        ? {
            status: 200,
            body: {
              status: 'SUCCESS',
              results: [{ command: 'show clock', output: '12:00', status: 'SUCCESS' }],
            },
          }
        : defaultRoute(req);
    const client = gateway();
    const handle = await client.connect(credentials);

    const result = await client.exec(handle, 'svc-1', 'core router', ['show clock'], {
      timeoutSeconds: 30,
      resetBefore: true,
      resetAfter: false,
      sudo: false,
    });

    expect(result).toEqual({
      status: 'SUCCESS',
      statusMessage: undefined,
      results: [{ command: 'show clock', output: '12:00', status: 'SUCCESS' }],
    });
    expect(seen[1]).toMatchObject({
      url: '/v1/services/svc-1/devices/core%20router/exec',
      body: { commands: ['show clock'], timeout: 30, reset_before: true, reset_after: false, sudo: false },
    });
  });

  it.each([
    [401, ErrorKind.AuthError],
    [403, ErrorKind.AuthError],
    [404, ErrorKind.DeviceNotFound],
    [410, ErrorKind.ConnectionLost],
    [504, ErrorKind.RemoteTimeout],
    [500, ErrorKind.RemoteError],
  ])('maps status %i to %s', async (status, kind) => {
    route = (req) => (req.method === 'GET' ? { status, body: { error: 'nope' } } : defaultRoute(req));
    const client = gateway();
    const handle = await client.connect(credentials);

    const error = await rejection(client.describe(handle, 'svc-1', 'r1'));

    expect(error.kind).toBe(kind);
    expect(error.message).toBe(`GET /v1/services/svc-1/devices/r1 failed with ${status}: nope`);
  });

  it('rejects a login the gateway refuses', async () => {
    route = () => ({ status: 401, body: { message: 'certificate not trusted' } });

    const error = await rejection(gateway().connect(credentials));

    expect(error.kind).toBe(ErrorKind.AuthError);
    expect(error.message).toBe('POST /v1/sessions failed with 401: certificate not trusted');
  });

  it('flags a response that does not match the expected shape', async () => {
    route = (req) => (req.method === 'GET' ? { status: 200, body: { names: ['r1'] } } : defaultRoute(req));
    const client = gateway();
    const handle = await client.connect(credentials);

    const error = await rejection(client.inventory(handle, 'svc-1'));

    expect(error.kind).toBe(ErrorKind.RemoteError);
    expect(error.message).toBe('Malformed gateway response for GET /v1/services/svc-1/devices');
  });

  it('refuses calls on a closed session', async () => {
    const client = gateway();
    const handle = await client.connect(credentials);
    await client.close(handle);

    const error = await rejection(client.inventory(handle, 'svc-1'));

    expect(error.kind).toBe(ErrorKind.SessionUnavailable);
    expect(seen).toHaveLength(2);
  });

  it('reports an unreachable gateway as retryable', async () => {
    const idle = createServer();
    const port = await listen(idle);
    await new Promise<void>((resolve) => idle.close(() => resolve()));

    const error = await rejection(gateway(`http://127.0.0.1:${port}`).connect(credentials));

    expect(error.kind).toBe(ErrorKind.RemoteUnavailable);
    expect(error.retryable).toBe(true);
  });

  it('reports an aborted request as a timeout', async () => {
    route = (req) => (req.method === 'GET' ? { status: 200, body: { devices: [] } } : defaultRoute(req));
    const client = gateway();
    const handle = await client.connect(credentials);
    const controller = new AbortController();
    controller.abort();

    const error = await rejection(client.inventory(handle, 'svc-1', { signal: controller.signal }));

    expect(error.kind).toBe(ErrorKind.RemoteTimeout);
  });
});
