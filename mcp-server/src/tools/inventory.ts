import { z } from 'zod';
import {
  DEFAULT_MAX_LINES,
  guardConnection,
  maxLinesInput,
  parseArguments,
  renderRawOutcomes,
  resolveServiceSerial,
  runBatch,
  checkConnectionLoss,
  serviceSerialInput,
  targetInput,
  targetList,
  timeoutInput,
  toTargets,
  truncateRecords,
  truncateText,
  withTimeout,
  type ToolDefinition,
} from './dispatch.js';

const DEFAULT_TIMEOUT_SECONDS = 30;

const InventoryInputSchema = z.object({
  service_serial: serviceSerialInput,
  timeout: timeoutInput(DEFAULT_TIMEOUT_SECONDS),
  max_lines: maxLinesInput(DEFAULT_MAX_LINES),
});

export const getDeviceInventoryNamesTool: ToolDefinition = {
  description:
    'List the names of the devices onboarded in the RADKit service inventory. ' +
    'Use this first when the user asks about "devices", "the network" or "all devices".',
  inputSchema: InventoryInputSchema.strict(),

  async execute(args, context) {
    const input = parseArguments(InventoryInputSchema.strict(), args);
    const session = await context.sessions.getSession();
    const service = resolveServiceSerial(input.service_serial, session);

    const devices = await guardConnection(context, () =>
      withTimeout(service, input.timeout ?? DEFAULT_TIMEOUT_SECONDS, (signal) =>
        context.client.inventory(session.handle, service, { signal }),
      ),
    );
    const names = [...new Set(devices)].sort((a, b) => a.localeCompare(b));

    return {
      kind: 'json',
      value: { service, ...truncateRecords(names, input.max_lines ?? DEFAULT_MAX_LINES) },
    };
  },
};

const AttributesInputSchema = z.object({
  target_device: targetInput('device name'),
  service_serial: serviceSerialInput,
  timeout: timeoutInput(DEFAULT_TIMEOUT_SECONDS),
  max_lines: maxLinesInput(DEFAULT_MAX_LINES),
});

export const getDeviceAttributesTool: ToolDefinition = {
  description:
    'Return the attributes of one or more devices as JSON: host, device type, description, ' +
    'terminal/NETCONF/SNMP/HTTP configuration and terminal capabilities. ' +
    'Try this first when the user asks about a specific device.',
  inputSchema: AttributesInputSchema.strict(),

  async execute(args, context) {
    const input = parseArguments(AttributesInputSchema.strict(), args);
    const devices = targetList(toTargets(input.target_device));
    const session = await context.sessions.getSession();
    const service = resolveServiceSerial(input.service_serial, session);

    const outcomes = await runBatch(devices, input.timeout ?? DEFAULT_TIMEOUT_SECONDS, async (device, signal) => {
      const attributes = await context.client.describe(session.handle, service, device, { signal });
      return JSON.stringify({ name: device, ...attributes }, null, 2);
    });
    await checkConnectionLoss(outcomes, context);

    return { kind: 'raw', text: truncateText(renderRawOutcomes(outcomes), input.max_lines ?? DEFAULT_MAX_LINES).text };
  },
};
