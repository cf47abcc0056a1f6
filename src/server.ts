import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { EmailClient } from "./mail/index.js";
import { tools, handleToolCall } from "./tools/index.js";

export const SERVER_NAME = "mailbox-mcp";
export const SERVER_VERSION = "0.1.0";

/**
 * Create and configure the MCP server.
 *
 * Exposes 4 tools:
 *   - read_emails
 *   - filter_emails
 *   - send_email
 *   - get_unread_count
 */
export function createServer(client: EmailClient): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: [...tools] };
  });

  // Dispatch tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      return await handleToolCall(client, name, args || {});
    } catch (error) {
      const message =
        error instanceof Error ? error.message : String(error);
      return {
        content: [
          {
            type: "text" as const,
            text: `Error executing ${name}: ${message}`,
          },
        ],
        isError: true,
      };
    }
  });

  return server;
}
