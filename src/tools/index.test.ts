import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { tools, handleToolCall } from "./index.js";
import { EmailClient } from "../mail/index.js";
import type { MailConfig } from "../mail/index.js";
import { FakeMailbox, FakeSessions } from "../mail/testing.js";

const testConfig: MailConfig = {
  user: "me@example.com",
  pass: "test-secret",
  imap: { host: "imap.example.com", port: 993, secure: true, tlsRejectUnauthorized: true },
  smtp: { host: "smtp.example.com", port: 587, secure: false },
  timeoutMs: 5000,
  previewLength: 300,
};

function setup() {
  const sessions = new FakeSessions({
    INBOX: new FakeMailbox([
      { from: "a@x.com", subject: "First", body: "one", seen: true },
      { from: "b@y.com", subject: "Second", body: "two" },
      { from: "a@x.com", subject: "Third", body: "three" },
    ]),
    Archive: new FakeMailbox([{ from: "c@z.com", subject: "Old", body: "old", seen: true }]),
  });
  return { sessions, client: new EmailClient(testConfig, sessions) };
}

function textOf(result: { content: { text: string }[] }): string {
  return result.content[0].text;
}

beforeEach(() => {
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Tool metadata
// ---------------------------------------------------------------------------

describe("tool definitions", () => {
  it("exposes exactly the four mail tools", () => {
    expect(tools.map((t) => t.name)).toEqual([
      "read_emails",
      "filter_emails",
      "send_email",
      "get_unread_count",
    ]);
  });

  it("send_email requires to, subject and body", () => {
    const tool = tools.find((t) => t.name === "send_email");
    expect(tool?.inputSchema.required).toEqual(["to", "subject", "body"]);
  });

  it("read, filter and unread tools take an optional folder", () => {
    for (const name of ["read_emails", "filter_emails", "get_unread_count"]) {
      const tool = tools.find((t) => t.name === name);
      expect(tool?.inputSchema.properties).toHaveProperty("folder");
      expect(tool?.inputSchema.required).toBeUndefined();
    }
  });
});

// ---------------------------------------------------------------------------
// handleToolCall
// ---------------------------------------------------------------------------

describe("handleToolCall", () => {
  it("read_emails returns the newest messages first", async () => {
    const { client } = setup();

    const result = await handleToolCall(client, "read_emails", { count: 2 });
    const data = JSON.parse(textOf(result));

    expect(result.isError).toBeUndefined();
    expect(data.folder).toBe("INBOX");
    expect(data.count).toBe(2);
    expect(data.emails.map((e: { subject: string }) => e.subject)).toEqual(["Third", "Second"]);
    expect(data.kind).toBeUndefined();
  });

  it("read_emails honours the folder argument", async () => {
    const { client } = setup();

    const data = JSON.parse(
      textOf(await handleToolCall(client, "read_emails", { folder: "Archive" }))
    );

    expect(data.folder).toBe("Archive");
    expect(data.emails).toHaveLength(1);
    expect(data.emails[0]).toMatchObject({ subject: "Old", from: "c@z.com", isUnread: false });
  });

  it("filter_emails maps is_unread and sender", async () => {
    const { client } = setup();

    const data = JSON.parse(
      textOf(
        await handleToolCall(client, "filter_emails", { sender: "a@x.com", is_unread: true })
      )
    );

    expect(data.filters).toBe("sender: a@x.com, unread: true");
    expect(data.emails.map((e: { subject: string }) => e.subject)).toEqual(["Third"]);
  });

  it("filter_emails without arguments reports no filters", async () => {
    const { client } = setup();

    const data = JSON.parse(textOf(await handleToolCall(client, "filter_emails", {})));

    expect(data.filters).toBe("no filters");
    expect(data.count).toBe(3);
  });

  it("filter_emails treats blank sender and subject as absent", async () => {
    const { client, sessions } = setup();

    const result = await handleToolCall(client, "filter_emails", { sender: "", subject: "  " });
    const data = JSON.parse(textOf(result));

    expect(result.isError).toBeUndefined();
    expect(data.filters).toBe("no filters");
    expect(data.count).toBe(3);
    expect(sessions.folders.INBOX.searches).toEqual([{ all: true }]);
  });

  it("get_unread_count returns the count", async () => {
    const { client } = setup();

    const data = JSON.parse(textOf(await handleToolCall(client, "get_unread_count", {})));

    expect(data).toEqual({ folder: "INBOX", unread: 2 });
  });

  it("send_email returns a success marker", async () => {
    const { client, sessions } = setup();

    const data = JSON.parse(
      textOf(
        await handleToolCall(client, "send_email", {
          to: "friend@example.com",
          subject: "Hi",
          body: "Hello",
        })
      )
    );

    expect(data.success).toBe(true);
    expect(data.message).toBe("Email sent successfully to friend@example.com");
    expect(data.result.messageId).toBe("<fake-1@example.com>");
    expect(sessions.transport.sent).toHaveLength(1);
  });

  it("send_email reports an invalid recipient as an error result", async () => {
    const { client } = setup();

    const result = await handleToolCall(client, "send_email", {
      to: "bad-address",
      subject: "Hi",
      body: "Hello",
    });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('SendError: Invalid recipient address: "bad-address".');
  });

  it("reports a missing folder as an error result", async () => {
    const { client } = setup();

    const result = await handleToolCall(client, "get_unread_count", { folder: "Nope" });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('FolderError: Folder "Nope" does not exist or cannot be selected.');
  });

  it("rejects arguments of the wrong type", async () => {
    const { client } = setup();

    const result = await handleToolCall(client, "read_emails", { count: "ten" });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toMatch(/^Invalid arguments for read_emails: count: /);
  });

  it("rejects a missing required argument", async () => {
    const { client, sessions } = setup();

    const result = await handleToolCall(client, "send_email", { to: "a@x.com", body: "Hello" });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toMatch(/^Invalid arguments for send_email: subject: /);
    expect(sessions.sendSessions).toHaveLength(0);
  });

  it("returns an error for unknown tools", async () => {
    const { client } = setup();

    const result = await handleToolCall(client, "delete_everything", {});

    expect(result).toEqual({
      content: [{ type: "text", text: "Unknown tool: delete_everything" }],
      isError: true,
    });
  });
});
