#!/usr/bin/env node

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { EmailClient, loadConfigFromEnv } from "./mail/index.js";
import { createServer, SERVER_NAME } from "./server.js";

// Keep the process alive on unexpected errors: log to stderr so the
// MCP client can surface the message in its logs.
function formatError(label: string, err: unknown): string {
  const lines = [`[${SERVER_NAME}] ${label}`];
  if (err instanceof Error) {
    lines.push(`  Message: ${err.message}`);
    lines.push(`  Name:    ${err.name}`);
    if ("code" in err && err.code) lines.push(`  Code:    ${String(err.code)}`);
    if (err.cause) lines.push(`  Cause:   ${String(err.cause)}`);
    if (err.stack) lines.push(`  Stack:\n${err.stack}`);
  } else {
    lines.push(`  Value: ${JSON.stringify(err)}`);
  }
  lines.push(`  Time:  ${new Date().toISOString()}`);
  lines.push(`  PID:   ${process.pid}`);
  lines.push(`  Node:  ${process.version}`);
  lines.push(`  Env:   IMAP_HOST=${process.env.IMAP_HOST} IMAP_PORT=${process.env.IMAP_PORT} SMTP_HOST=${process.env.SMTP_HOST} SMTP_PORT=${process.env.SMTP_PORT}`);
  return lines.join("\n") + "\n";
}

process.on("uncaughtException", (err) => {
  process.stderr.write(formatError("UNCAUGHT EXCEPTION", err));
});
process.on("unhandledRejection", (reason) => {
  process.stderr.write(formatError("UNHANDLED REJECTION", reason));
});

async function main() {
  // Missing credentials are fatal here, not per call
  const config = loadConfigFromEnv();

  // Sessions are opened per tool call, so there is nothing to tear down on exit
  const server = createServer(new EmailClient(config));

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = () => {
    void server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        process.stderr.write(formatError("SHUTDOWN FAILED", error));
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  process.stderr.write(formatError("FATAL", error));
  process.exit(1);
});
