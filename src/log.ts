// stdout carries the MCP stream, so diagnostics go to stderr.
export function log(message: string): void {
  process.stderr.write(`[mailbox-mcp] ${message}\n`);
}
