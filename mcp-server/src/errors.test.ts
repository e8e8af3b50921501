import { describe, expect, it } from 'vitest';
import { ErrorKind, RadkitMcpError, isRadkitMcpError, toErrorPayload } from './errors.js';

describe('RadkitMcpError', () => {
  it('marks only timeouts and unreachable remotes as retryable', () => {
    const retryable = Object.values(ErrorKind).filter((kind) => new RadkitMcpError(kind, 'x').retryable);

    expect(retryable).toEqual([ErrorKind.RemoteTimeout, ErrorKind.RemoteUnavailable]);
  });

  it('narrows by kind', () => {
    const error = new RadkitMcpError(ErrorKind.ConnectionLost, 'gone');

    expect(isRadkitMcpError(error)).toBe(true);
    expect(isRadkitMcpError(error, ErrorKind.ConnectionLost)).toBe(true);
    expect(isRadkitMcpError(error, ErrorKind.AuthError)).toBe(false);
    expect(isRadkitMcpError(new Error('gone'))).toBe(false);
  });
});

describe('toErrorPayload', () => {
  it('carries kind and details of our own errors', () => {
    const error = new RadkitMcpError(ErrorKind.IncompleteEnvBundle, 'incomplete', { missing: ['RADKIT_CA_B64'] });

    expect(toErrorPayload(error)).toEqual({
      kind: ErrorKind.IncompleteEnvBundle,
      message: 'incomplete',
      retryable: false,
      details: { missing: ['RADKIT_CA_B64'] },
    });
  });

  it('reports anything else as a non-retryable RemoteError', () => {
    expect(toErrorPayload('plain string')).toEqual({
      kind: ErrorKind.RemoteError,
      message: 'plain string',
      retryable: false,
    });
  });
});
