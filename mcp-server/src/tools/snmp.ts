import { z } from 'zod';
import { ErrorKind, RadkitMcpError } from '../errors.js';
import {
  DEFAULT_MAX_LINES,
  checkConnectionLoss,
  maxLinesInput,
  parseArguments,
  resolveServiceSerial,
  runBatch,
  serviceSerialInput,
  targetInput,
  targetList,
  timeoutInput,
  toTargets,
  truncateRecords,
  type ToolDefinition,
} from './dispatch.js';

const DEFAULT_TIMEOUT_SECONDS = 10;

const OID_PATTERN = /^\.?\d+(\.\d+)*$/;

const SnmpGetInputSchema = z.object({
  device_name: targetInput('device name'),
  oid: z
    .union([
      z.string().trim().regex(OID_PATTERN, 'must be a numeric OID such as 1.3.6.1.2.1.1.1.0'),
      z.array(z.string().trim().regex(OID_PATTERN, 'must be a numeric OID such as 1.3.6.1.2.1.1.1.0')).min(1),
    ])
    .describe('A single OID or a non-empty list of OIDs'),
  service_serial: serviceSerialInput,
  timeout: timeoutInput(DEFAULT_TIMEOUT_SECONDS),
  max_lines: maxLinesInput(DEFAULT_MAX_LINES),
});

export interface SnmpRecord {
  oid: string;
  value: unknown;
  type: string;
}

export const snmpGetTool: ToolDefinition = {
  description:
    'Perform an SNMP GET for one or more OIDs on one or more devices. ' +
    'Example OIDs: 1.3.6.1.2.1.1.1.0 (sysDescr), 1.3.6.1.2.1.1.3.0 (sysUpTime).',
  inputSchema: SnmpGetInputSchema.strict(),

  async execute(args, context) {
    const input = parseArguments(SnmpGetInputSchema.strict(), args);
    const devices = targetList(toTargets(input.device_name));
    const oids = targetList(toTargets(input.oid));
    const timeoutSeconds = input.timeout ?? DEFAULT_TIMEOUT_SECONDS;
    const maxLines = input.max_lines ?? DEFAULT_MAX_LINES;

    const session = await context.sessions.getSession();
    const service = resolveServiceSerial(input.service_serial, session);

    const outcomes = await runBatch(devices, timeoutSeconds, async (device, signal) => {
      const rows = await context.client.snmpGet(session.handle, service, device, oids, { timeoutSeconds, signal });
      const records: SnmpRecord[] = rows
        .filter((row) => !row.error)
        .map((row) => ({ oid: row.oid, value: row.value, type: row.type }));
      if (records.length === 0) {
        throw new RadkitMcpError(
          ErrorKind.RemoteError,
          `SNMP GET returned no valid results for ${device}; check the device SNMP configuration`,
          { device, oids },
        );
      }
      return truncateRecords(records, maxLines);
    });
    await checkConnectionLoss(outcomes, context);

    return { kind: 'json', value: { service, results: outcomes } };
  },
};
