import { pino, destination, type Logger } from 'pino';

export type { Logger };

/**
 * Stdout carries the MCP stream, so logs always go to stderr (fd 2).
 */
export function createLogger(level: string): Logger {
  return pino(
    {
      name: 'radkit-mcp',
      level,
      redact: ['keyPassword', 'credentials.keyPassword', '*.keyPassword'],
    },
    destination(2),
  );
}

/** Logger for tests and embedders that want no output. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
