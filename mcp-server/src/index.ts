#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { GatewayDeviceClient } from './clients/gateway-client.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createServer, SERVER_NAME, SERVER_VERSION } from './server.js';
import { SessionManager } from './session/session-manager.js';
import { registerShutdownHooks } from './session/shutdown.js';

const program = new Command();

program
  .name('radkit-mcp')
  .description('MCP server exposing RADKit device inventory, CLI execution and SNMP tools over stdio')
  .version(SERVER_VERSION)
  .option('--env-file <path>', 'Load environment variables from this file instead of ./.env')
  .option('--log-level <level>', 'Log level (overrides LOG_LEVEL)');

async function main(): Promise<void> {
  program.parse();
  const options = program.opts<{ envFile?: string; logLevel?: string }>();

  // Load environment variables from .env (or the file given on the command line)
  dotenv.config(options.envFile ? { path: options.envFile } : {});

  const config = loadConfig(process.env);
  const logger = createLogger(options.logLevel ?? config.logLevel);

  const client = new GatewayDeviceClient({
    baseUrl: config.gatewayUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    logger,
  });

  const sessions = new SessionManager({
    client,
    env: process.env,
    logger,
    resolve: { radkitHome: config.radkitHome, cloudDomain: config.cloudDomain },
    materialize: { tempRoot: config.tempRoot },
  });
  registerShutdownHooks(sessions, logger);

  const server = createServer({ sessions, client, logger });
  server.onclose = () => {
    sessions.teardown().catch((error: unknown) => {
      logger.error({ err: error }, 'Teardown after transport close failed');
    });
  };

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ name: SERVER_NAME, version: SERVER_VERSION, gateway: config.gatewayUrl }, 'MCP server started on stdio');
}

main().catch((error: unknown) => {
  console.error('Server error:', error);
  process.exit(1);
});
