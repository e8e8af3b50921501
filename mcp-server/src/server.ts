import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { RadkitMcpError, toErrorPayload } from './errors.js';
import type { ToolContext, ToolDefinition, ToolOutput } from './tools/dispatch.js';
import { tools as defaultTools } from './tools/index.js';

export const SERVER_NAME = 'radkit-mcp-server';
export const SERVER_VERSION = '1.0.0';

function toCallToolResult(output: ToolOutput): CallToolResult {
  const text = output.kind === 'raw' ? output.text : JSON.stringify(output.value, null, 2);
  return { content: [{ type: 'text', text }] };
}

function toolSchema(tool: ToolDefinition): { type: 'object'; [key: string]: unknown } {
  const entries = Object.entries(zodToJsonSchema(tool.inputSchema, { target: 'jsonSchema7' })).filter(
    ([key]) => key !== '$schema',
  );
  return { ...Object.fromEntries(entries), type: 'object' };
}

/**
 * Builds the MCP server. The session manager travels inside `context`, so
 * every tool call shares the one session without a module-level global.
 */
export function createServer(context: ToolContext, tools: Record<string, ToolDefinition> = defaultTools): Server {
  const logger = context.logger.child({ component: 'server' });

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: Object.entries(tools).map(([name, tool]) => ({
        name,
        description: tool.description,
        inputSchema: toolSchema(tool),
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const tool = Object.hasOwn(tools, name) ? tools[name] : undefined;
    if (!tool) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool ${name} not found`);
    }

    const started = Date.now();
    try {
      const output = await tool.execute(args, context);
      logger.info({ tool: name, durationMs: Date.now() - started }, 'Tool call completed');
      return toCallToolResult(output);
    } catch (error) {
      if (error instanceof McpError) {
        throw error;
      }
      const payload = toErrorPayload(error);
      const details = { tool: name, kind: payload.kind, err: error, durationMs: Date.now() - started };
      if (error instanceof RadkitMcpError) {
        logger.warn(details, 'Tool call failed');
      } else {
        logger.error(details, 'Tool call failed');
      }
      return {
        isError: true,
        content: [{ type: 'text', text: JSON.stringify({ error: payload }, null, 2) }],
      };
    }
  });

  return server;
}
