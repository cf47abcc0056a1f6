/**
 * MCP tool definitions for the mailbox server.
 *
 * Each tool co-locates its schema, argument parser and the operation it maps
 * to. The operation set is closed: four tools, four MailOperation variants.
 */

import { z } from "zod";
import type { EmailClient, MailOperation } from "../mail/index.js";
import {
  DEFAULT_FOLDER,
  DEFAULT_READ_COUNT,
  MailError,
  describeError,
  runOperation,
} from "../mail/index.js";

// ---------------------------------------------------------------------------
// Tool registry types and helpers
// ---------------------------------------------------------------------------

interface ToolResult {
  content: { type: "text"; text: string }[];
  isError?: true;
  [key: string]: unknown;
}

interface ToolRegistration {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: readonly string[];
  };
  /** Validate raw arguments into an operation; throws ZodError on bad input. */
  parse: (args: Record<string, unknown>) => MailOperation;
}

function jsonResult(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function errorResult(message: string): ToolResult {
  return {
    content: [{ type: "text", text: message }],
    isError: true,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}

// ---------------------------------------------------------------------------
// Argument schemas
// ---------------------------------------------------------------------------

const folderArg = z.string().trim().min(1).default(DEFAULT_FOLDER);

const FOLDER_SCHEMA = {
  folder: {
    type: "string",
    description: `Email folder to use. Default: "${DEFAULT_FOLDER}".`,
    default: DEFAULT_FOLDER,
  },
};

const readArgs = z.object({
  count: z.number().int().positive().default(DEFAULT_READ_COUNT),
  folder: folderArg,
});

// A blank filter field places no constraint.
const filterText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const filterArgs = z.object({
  sender: filterText,
  subject: filterText,
  is_unread: z.boolean().optional(),
  folder: folderArg,
});

// Empty strings pass here so that the send pipeline reports them itself.
const sendArgs = z.object({
  to: z.string(),
  subject: z.string(),
  body: z.string(),
  cc: z.string().optional(),
});

const unreadArgs = z.object({
  folder: folderArg,
});

const EMAIL_FIELDS_SUFFIX =
  "Returns {count, emails} where each email has id, subject, from, to, date, body (a preview) and isUnread, newest first. " +
  "The id is only valid for the duration of the call.";

// ---------------------------------------------------------------------------
// Tool registry
// ---------------------------------------------------------------------------

const registry: ToolRegistration[] = [
  {
    name: "read_emails",
    description:
      "Read the most recent emails from the inbox or a specified folder. " +
      EMAIL_FIELDS_SUFFIX,
    inputSchema: {
      type: "object",
      properties: {
        count: {
          type: "number",
          description: `Number of emails to retrieve. Default: ${DEFAULT_READ_COUNT}.`,
          default: DEFAULT_READ_COUNT,
        },
        ...FOLDER_SCHEMA,
      },
    },
    parse: (args) => {
      const { count, folder } = readArgs.parse(args);
      return { kind: "read", count, folder };
    },
  },

  {
    name: "filter_emails",
    description:
      "Search emails by sender, subject or unread status. All given criteria must match. " +
      "Sender and subject are substring matches performed by the mail server. " +
      EMAIL_FIELDS_SUFFIX,
    inputSchema: {
      type: "object",
      properties: {
        sender: {
          type: "string",
          description: 'Sender address or part of it (e.g. "alice@example.com").',
        },
        subject: {
          type: "string",
          description: "Text the subject must contain (case-insensitive).",
        },
        is_unread: {
          type: "boolean",
          description: "true for unread emails only, false for read emails only.",
        },
        ...FOLDER_SCHEMA,
      },
    },
    parse: (args) => {
      const parsed = filterArgs.parse(args);
      return {
        kind: "filter",
        criteria: {
          sender: parsed.sender,
          subject: parsed.subject,
          isUnread: parsed.is_unread,
          folder: parsed.folder,
        },
      };
    },
  },

  {
    name: "send_email",
    description:
      "Send a plain-text email from the configured account. Can optionally include CC. " +
      "Success means the server accepted the message for delivery.",
    inputSchema: {
      type: "object",
      properties: {
        to: {
          type: "string",
          description: "Recipient email address. Separate multiple addresses with commas.",
        },
        subject: {
          type: "string",
          description: "Email subject line.",
        },
        body: {
          type: "string",
          description: "Email body content (plain text).",
        },
        cc: {
          type: "string",
          description: "CC recipient email address(es) (optional).",
        },
      },
      required: ["to", "subject", "body"],
    },
    parse: (args) => {
      const message = sendArgs.parse(args);
      return { kind: "send", message };
    },
  },

  {
    name: "get_unread_count",
    description: "Get the number of unread emails in the inbox or a specified folder.",
    inputSchema: {
      type: "object",
      properties: { ...FOLDER_SCHEMA },
    },
    parse: (args) => {
      const { folder } = unreadArgs.parse(args);
      return { kind: "unread_count", folder };
    },
  },
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Tool schemas for MCP ListTools response. */
export const tools = registry.map(({ name, description, inputSchema }) => ({
  name,
  description,
  inputSchema,
}));

const parserMap = new Map(registry.map((t) => [t.name, t.parse]));

/**
 * Run one tool call. Bad arguments and mail failures come back as
 * `isError` results; anything else propagates to the server.
 */
export async function handleToolCall(
  client: EmailClient,
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  const parse = parserMap.get(name);
  if (!parse) return errorResult(`Unknown tool: ${name}`);

  let operation: MailOperation;
  try {
    operation = parse(args);
  } catch (error) {
    if (error instanceof z.ZodError) {
      return errorResult(`Invalid arguments for ${name}: ${formatIssues(error)}`);
    }
    throw error;
  }

  try {
    const { kind, ...result } = await runOperation(client, operation);
    return jsonResult(result);
  } catch (error) {
    if (error instanceof MailError) {
      return errorResult(describeError(error));
    }
    throw error;
  }
}
