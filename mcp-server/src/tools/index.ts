import { execCliCommandsInDeviceTool, execCommandTool } from './exec.js';
import { getDeviceAttributesTool, getDeviceInventoryNamesTool } from './inventory.js';
import { snmpGetTool } from './snmp.js';
import type { ToolDefinition } from './dispatch.js';

export const tools: Record<string, ToolDefinition> = {
  get_device_inventory_names: getDeviceInventoryNamesTool,
  get_device_attributes: getDeviceAttributesTool,
  exec_cli_commands_in_device: execCliCommandsInDeviceTool,
  exec_command: execCommandTool,
  snmp_get: snmpGetTool,
};
