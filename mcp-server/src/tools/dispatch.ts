import { z } from 'zod';
import { ErrorKind, RadkitMcpError, isRadkitMcpError, toErrorPayload, type ErrorPayload } from '../errors.js';
import type { Logger } from '../logger.js';
import type { DeviceClient } from '../clients/device-client.js';
import type { Session, SessionManager } from '../session/session-manager.js';

export const DEFAULT_MAX_LINES = 800;

export interface ToolContext {
  sessions: SessionManager;
  client: DeviceClient;
  logger: Logger;
}

export type RawResult = { kind: 'raw'; text: string };

export type StructuredResult<R> = {
  kind: 'structured';
  records: R[];
  truncated: boolean;
  totalLines: number;
};

export type ToolCallResult<R> = RawResult | StructuredResult<R>;

export type Targets<T> = { kind: 'single'; value: T } | { kind: 'many'; values: T[] };

export type TargetOutcome<T> =
  | { target: string; status: 'ok'; result: T }
  | { target: string; status: 'error'; error: ErrorPayload };

/** What a tool hands back to the server: text as-is, anything else as JSON. */
export type ToolOutput = RawResult | { kind: 'json'; value: unknown };

export interface ToolDefinition {
  description: string;
  inputSchema: z.AnyZodObject;
  execute(args: unknown, context: ToolContext): Promise<ToolOutput>;
}

// Shared argument schemas

export const targetInput = (what: string) =>
  z
    .union([z.string().trim().min(1), z.array(z.string().trim().min(1)).min(1)])
    .describe(`A single ${what} or a non-empty list of them`);

export const serviceSerialInput = z
  .string()
  .trim()
  .min(1)
  .optional()
  .describe('Service serial to use instead of the default one');

export const timeoutInput = (fallback: number) =>
  z
    .number()
    .min(0)
    .optional()
    .describe(`Timeout in seconds, 0 for none (default: ${fallback})`);

export const maxLinesInput = (fallback: number) =>
  z
    .number()
    .int()
    .min(0)
    .optional()
    .describe(`Maximum lines to return, 0 for unlimited (default: ${fallback})`);

/**
 * Validates tool arguments. The first problem found is reported as
 * `InvalidArgument` naming the offending field.
 */
export function parseArguments<S extends z.AnyZodObject>(schema: S, args: unknown): z.infer<S> {
  const parsed = schema.safeParse(args ?? {});
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(arguments)';
  throw new RadkitMcpError(ErrorKind.InvalidArgument, `Invalid argument ${field}: ${issue?.message ?? 'invalid input'}`, {
    field,
    reason: issue?.message ?? 'invalid input',
  });
}

export function toTargets<T>(input: T | T[]): Targets<T> {
  return Array.isArray(input) ? { kind: 'many', values: [...input] } : { kind: 'single', value: input };
}

export function targetList<T>(targets: Targets<T>): T[] {
  return targets.kind === 'single' ? [targets.value] : targets.values;
}

export function resolveServiceSerial(override: string | undefined, session: Session): string {
  const serial = override ?? session.defaultServiceSerial;
  if (!serial) {
    throw new RadkitMcpError(
      ErrorKind.NoServiceSelected,
      'No service_serial given and no default service configured (RADKIT_DEFAULT_SERVICE_SERIAL)',
    );
  }
  return serial;
}

/**
 * Runs `operation` with an abort signal that fires after `timeoutSeconds`.
 * A zero timeout means no timer at all.
 */
export function withTimeout<T>(
  target: string,
  timeoutSeconds: number,
  operation: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  if (timeoutSeconds <= 0) {
    return operation(controller.signal);
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(
        new RadkitMcpError(ErrorKind.RemoteTimeout, `Timed out after ${timeoutSeconds}s waiting for ${target}`, {
          target,
          timeoutSeconds,
        }),
      );
    }, timeoutSeconds * 1000);

    operation(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/**
 * Applies one remote operation to every target concurrently. A failing or
 * timed-out target becomes an error outcome; its siblings are unaffected.
 * Outcomes keep the input order.
 */
export async function runBatch<T>(
  targets: string[],
  timeoutSeconds: number,
  operation: (target: string, signal: AbortSignal) => Promise<T>,
): Promise<TargetOutcome<T>[]> {
  return Promise.all(
    targets.map(async (target): Promise<TargetOutcome<T>> => {
      try {
        const result = await withTimeout(target, timeoutSeconds, (signal) => operation(target, signal));
        return { target, status: 'ok', result };
      } catch (error) {
        return { target, status: 'error', error: toErrorPayload(error) };
      }
    }),
  );
}

/**
 * A lost connection is the one remote failure that takes the shared
 * session down for everyone.
 */
export async function checkConnectionLoss(outcomes: TargetOutcome<unknown>[], context: ToolContext): Promise<void> {
  const lost = outcomes.find((outcome) => outcome.status === 'error' && outcome.error.kind === ErrorKind.ConnectionLost);
  if (lost && lost.status === 'error') {
    await context.sessions.invalidate(new RadkitMcpError(ErrorKind.ConnectionLost, lost.error.message));
  }
}

/** Single-call counterpart of `checkConnectionLoss`, rethrowing the error. */
export async function guardConnection<T>(context: ToolContext, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (isRadkitMcpError(error, ErrorKind.ConnectionLost)) {
      await context.sessions.invalidate(error);
    }
    throw error;
  }
}

export function truncateRecords<R>(records: R[], maxLines: number): StructuredResult<R> {
  const totalLines = records.length;
  if (maxLines > 0 && totalLines > maxLines) {
    return { kind: 'structured', records: records.slice(0, maxLines), truncated: true, totalLines };
  }
  return { kind: 'structured', records, truncated: false, totalLines };
}

/** Splits text into lines, each keeping its line ending. */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function truncateText(text: string, maxLines: number): { text: string; truncated: boolean; totalLines: number } {
  const lines = splitLines(text);
  const totalLines = lines.length;
  if (maxLines <= 0 || totalLines <= maxLines) {
    return { text, truncated: false, totalLines };
  }
  const omitted = totalLines - maxLines;
  const kept = lines.slice(0, maxLines).join('');
  return {
    text: `${kept}\n[OUTPUT TRUNCATED: ${omitted} lines omitted, showing first ${maxLines} of ${totalLines} lines]`,
    truncated: true,
    totalLines,
  };
}

export function errorMarker(error: ErrorPayload): string {
  return `[ERROR ${error.kind}] ${error.message}`;
}

/**
 * Joins per-target raw sections. A lone target is returned bare; several
 * get a `=== target ===` header each.
 */
export function renderRawOutcomes(outcomes: TargetOutcome<string>[]): string {
  const body = (outcome: TargetOutcome<string>): string =>
    outcome.status === 'ok' ? outcome.result : errorMarker(outcome.error);
  if (outcomes.length === 1) {
    return body(outcomes[0]);
  }
  return outcomes.map((outcome) => `=== ${outcome.target} ===\n${body(outcome)}`).join('\n\n');
}
