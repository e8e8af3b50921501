import { z } from 'zod';
import type { ExecResult } from '../clients/device-client.js';
import { ErrorKind, RadkitMcpError } from '../errors.js';
import type { Session } from '../session/session-manager.js';
import {
  checkConnectionLoss,
  maxLinesInput,
  parseArguments,
  renderRawOutcomes,
  resolveServiceSerial,
  runBatch,
  serviceSerialInput,
  splitLines,
  targetInput,
  targetList,
  timeoutInput,
  toTargets,
  truncateRecords,
  truncateText,
  type StructuredResult,
  type TargetOutcome,
  type ToolContext,
  type ToolDefinition,
} from './dispatch.js';

const DEFAULT_TIMEOUT_SECONDS = 0;
const DEFAULT_RAW_MAX_LINES = 0;
const DEFAULT_STRUCTURED_MAX_LINES = 2000;

const terminalOptions = {
  reset_before: z.boolean().optional().describe('Reset the device terminal before executing'),
  reset_after: z.boolean().optional().describe('Reset the device terminal after executing'),
  sudo: z.boolean().optional().describe('Execute the commands with sudo privileges'),
};

const ExecCliInputSchema = z.object({
  target_device: targetInput('device name'),
  cli_commands: targetInput('CLI command'),
  timeout: timeoutInput(DEFAULT_TIMEOUT_SECONDS),
  max_lines: maxLinesInput(DEFAULT_RAW_MAX_LINES),
  service_serial: serviceSerialInput,
  ...terminalOptions,
});

const ExecCommandInputSchema = z.object({
  device_name: targetInput('device name'),
  commands: targetInput('CLI command'),
  service_serial: serviceSerialInput,
  timeout: timeoutInput(DEFAULT_TIMEOUT_SECONDS),
  max_lines: maxLinesInput(DEFAULT_STRUCTURED_MAX_LINES),
  ...terminalOptions,
});

interface ExecRequest {
  devices: string[];
  commands: string[];
  serviceSerial?: string;
  timeoutSeconds: number;
  resetBefore: boolean;
  resetAfter: boolean;
  sudo: boolean;
}

export interface ExecOutputLine {
  command: string;
  /** 1-based line number within the command's output */
  line: number;
  text: string;
}

export type DeviceExecResult = StructuredResult<ExecOutputLine> & {
  status: string;
  commands: { command: string; status: string }[];
};

async function runExec(
  request: ExecRequest,
  context: ToolContext,
): Promise<{ service: string; outcomes: TargetOutcome<ExecResult>[] }> {
  const session: Session = await context.sessions.getSession();
  const service = resolveServiceSerial(request.serviceSerial, session);

  context.logger.debug({ service, devices: request.devices, commands: request.commands.length }, 'Executing commands');
  const outcomes = await runBatch(request.devices, request.timeoutSeconds, async (device, signal) => {
    const result = await context.client.exec(session.handle, service, device, request.commands, {
      timeoutSeconds: request.timeoutSeconds,
      resetBefore: request.resetBefore,
      resetAfter: request.resetAfter,
      sudo: request.sudo,
      signal,
    });
    if (result.status !== 'SUCCESS') {
      throw new RadkitMcpError(
        ErrorKind.RemoteError,
        `Command execution failed on ${device}: ${result.statusMessage ?? result.status}`,
        { device, status: result.status },
      );
    }
    return result;
  });
  await checkConnectionLoss(outcomes, context);
  return { service, outcomes };
}

export function renderRawExec(result: ExecResult): string {
  if (result.results.length === 1) {
    return result.results[0].output;
  }
  return result.results.map((entry) => `# Command: ${entry.command}\n${entry.output}`).join('\n\n');
}

export function toStructuredExec(result: ExecResult, maxLines: number): DeviceExecResult {
  const lines: ExecOutputLine[] = result.results.flatMap((entry) =>
    splitLines(entry.output).map((text, index) => ({
      command: entry.command,
      line: index + 1,
      text: text.replace(/\r?\n$/, ''),
    })),
  );
  return {
    status: result.status,
    commands: result.results.map((entry) => ({ command: entry.command, status: entry.status })),
    ...truncateRecords(lines, maxLines),
  };
}

export const execCliCommandsInDeviceTool: ToolDefinition = {
  description:
    'Execute one or more CLI commands on one or more devices and return the raw text output. ' +
    'Pick commands that suit the device type (e.g. "show version" on Cisco IOS). ' +
    'Use this only when get_device_attributes does not have the answer or the user asks to run a command. ' +
    'An "Access denied" error means RBAC is enabled and the user lacks permission.',
  inputSchema: ExecCliInputSchema.strict(),

  async execute(args, context) {
    const input = parseArguments(ExecCliInputSchema.strict(), args);
    const { outcomes } = await runExec(
      {
        devices: targetList(toTargets(input.target_device)),
        commands: targetList(toTargets(input.cli_commands)),
        serviceSerial: input.service_serial,
        timeoutSeconds: input.timeout ?? DEFAULT_TIMEOUT_SECONDS,
        resetBefore: input.reset_before ?? false,
        resetAfter: input.reset_after ?? false,
        sudo: input.sudo ?? false,
      },
      context,
    );

    const rendered = outcomes.map(
      (outcome): TargetOutcome<string> =>
        outcome.status === 'ok' ? { ...outcome, result: renderRawExec(outcome.result) } : outcome,
    );
    // The line limit covers the whole reply, not each device or command.
    const maxLines = input.max_lines ?? DEFAULT_RAW_MAX_LINES;
    return { kind: 'raw', text: truncateText(renderRawOutcomes(rendered), maxLines).text };
  },
};

export const execCommandTool: ToolDefinition = {
  description:
    'Execute one or more CLI commands on one or more devices and return structured results: ' +
    'per device, the command statuses and the output lines, truncated to max_lines.',
  inputSchema: ExecCommandInputSchema.strict(),

  async execute(args, context) {
    const input = parseArguments(ExecCommandInputSchema.strict(), args);
    const maxLines = input.max_lines ?? DEFAULT_STRUCTURED_MAX_LINES;
    const { service, outcomes } = await runExec(
      {
        devices: targetList(toTargets(input.device_name)),
        commands: targetList(toTargets(input.commands)),
        serviceSerial: input.service_serial,
        timeoutSeconds: input.timeout ?? DEFAULT_TIMEOUT_SECONDS,
        resetBefore: input.reset_before ?? false,
        resetAfter: input.reset_after ?? false,
        sudo: input.sudo ?? false,
      },
      context,
    );

    const results = outcomes.map(
      (outcome): TargetOutcome<DeviceExecResult> =>
        outcome.status === 'ok' ? { ...outcome, result: toStructuredExec(outcome.result, maxLines) } : outcome,
    );
    return { kind: 'json', value: { service, results } };
  },
};
