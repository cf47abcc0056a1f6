import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import { openReadSession, openSendSession, withSession } from "./session.js";
import type { Session } from "./session.js";
import { AuthError, ConnectError, FolderError } from "./errors.js";
import type { MailConfig } from "./types.js";

// We mock the library constructors at the module level
vi.mock("imapflow", () => ({
  ImapFlow: vi.fn(),
}));
vi.mock("nodemailer", () => ({
  default: { createTransport: vi.fn() },
}));

const testConfig: MailConfig = {
  user: "user@example.com",
  pass: "test-secret",
  imap: { host: "imap.example.com", port: 993, secure: true, tlsRejectUnauthorized: true },
  smtp: { host: "smtp.example.com", port: 587, secure: false },
  timeoutMs: 5000,
  previewLength: 300,
};

beforeEach(() => {
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// openReadSession
// ---------------------------------------------------------------------------

describe("openReadSession", () => {
  let mockFlow: any;
  let ImapFlowMock: Mock;

  function createMockFlow(overrides: Record<string, any> = {}) {
    const listeners: Record<string, Function[]> = {};
    return {
      usable: true,
      connect: vi.fn().mockResolvedValue(undefined),
      logout: vi.fn().mockResolvedValue(undefined),
      close: vi.fn(),
      mailboxOpen: vi.fn().mockResolvedValue({ path: "INBOX" }),
      on: vi.fn((event: string, cb: Function) => {
        listeners[event] = listeners[event] || [];
        listeners[event].push(cb);
      }),
      _emit(event: string, ...args: unknown[]) {
        (listeners[event] || []).forEach((cb) => cb(...args));
      },
      ...overrides,
    };
  }

  beforeEach(async () => {
    const mod = await import("imapflow");
    ImapFlowMock = mod.ImapFlow as unknown as Mock;
    mockFlow = createMockFlow();
    // Must use a regular function (not arrow) so it works with `new`
    ImapFlowMock.mockImplementation(function () {
      return mockFlow;
    });
  });

  it("connects with the account settings and timeouts", async () => {
    await openReadSession(testConfig, "INBOX");

    expect(ImapFlowMock).toHaveBeenCalledWith(
      expect.objectContaining({
        host: "imap.example.com",
        port: 993,
        secure: true,
        auth: { user: "user@example.com", pass: "test-secret" },
        logger: false,
        connectionTimeout: 5000,
        greetingTimeout: 5000,
        socketTimeout: 5000,
        tls: { rejectUnauthorized: true },
      })
    );
    expect(mockFlow.connect).toHaveBeenCalledTimes(1);
  });

  it("selects the folder read-only", async () => {
    const session = await openReadSession(testConfig, "Archive");

    expect(mockFlow.mailboxOpen).toHaveBeenCalledWith("Archive", { readOnly: true });
    expect(session.folder).toBe("Archive");
    expect(session.mailbox).toBe(mockFlow);
    expect(session.closed).toBe(false);
  });

  it("raises AuthError when the login is rejected", async () => {
    mockFlow.connect.mockRejectedValue(
      Object.assign(new Error("Authentication failed"), { authenticationFailed: true })
    );
    mockFlow.usable = false;

    await expect(openReadSession(testConfig, "INBOX")).rejects.toBeInstanceOf(AuthError);
    expect(mockFlow.close).toHaveBeenCalledTimes(1);
    expect(mockFlow.mailboxOpen).not.toHaveBeenCalled();
  });

  it("raises ConnectError when the server is unreachable", async () => {
    mockFlow.connect.mockRejectedValue(
      Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" })
    );
    mockFlow.usable = false;

    await expect(openReadSession(testConfig, "INBOX")).rejects.toThrow(
      "Cannot reach IMAP server at imap.example.com:993: connection refused. Is the server running?"
    );
  });

  it("raises FolderError and logs out when the folder cannot be selected", async () => {
    mockFlow.mailboxOpen.mockRejectedValue(new Error("Command failed"));

    const error = await openReadSession(testConfig, "Missing").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FolderError);
    expect(error).toHaveProperty("folder", "Missing");
    expect(error).toHaveProperty(
      "message",
      'Folder "Missing" does not exist or cannot be selected.'
    );
    expect(mockFlow.logout).toHaveBeenCalledTimes(1);
  });

  it("raises ConnectError when the connection drops during select", async () => {
    mockFlow.mailboxOpen.mockRejectedValue(
      Object.assign(new Error("socket hang up"), { code: "ECONNRESET" })
    );

    await expect(openReadSession(testConfig, "INBOX")).rejects.toBeInstanceOf(ConnectError);
  });

  it("closes exactly once", async () => {
    const session = await openReadSession(testConfig, "INBOX");

    await session.close();
    await session.close();

    expect(mockFlow.logout).toHaveBeenCalledTimes(1);
    expect(session.closed).toBe(true);
  });

  it("drops a dead connection instead of logging out", async () => {
    const session = await openReadSession(testConfig, "INBOX");
    mockFlow.usable = false;

    await session.close();

    expect(mockFlow.logout).not.toHaveBeenCalled();
    expect(mockFlow.close).toHaveBeenCalledTimes(1);
  });

  it("never throws from close", async () => {
    const session = await openReadSession(testConfig, "INBOX");
    mockFlow.logout.mockRejectedValue(new Error("Connection not available"));

    await expect(session.close()).resolves.toBeUndefined();
    expect(process.stderr.write).toHaveBeenCalledWith(
      "[mailbox-mcp] IMAP close failed: Connection not available\n"
    );
  });

  it("logs connection error events", async () => {
    await openReadSession(testConfig, "INBOX");

    mockFlow._emit("error", Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }));

    expect(process.stderr.write).toHaveBeenCalledWith(
      "[mailbox-mcp] IMAP connection error: socket hang up\n"
    );
  });
});

// ---------------------------------------------------------------------------
// openSendSession
// ---------------------------------------------------------------------------

describe("openSendSession", () => {
  let mockTransport: any;
  let createTransportMock: Mock;

  beforeEach(async () => {
    const mod = await import("nodemailer");
    createTransportMock = mod.default.createTransport as unknown as Mock;
    mockTransport = {
      verify: vi.fn().mockResolvedValue(true),
      sendMail: vi.fn(),
      close: vi.fn(),
    };
    createTransportMock.mockReturnValue(mockTransport);
  });

  it("upgrades with STARTTLS on the submission port and verifies the login", async () => {
    const session = await openSendSession(testConfig);

    expect(createTransportMock).toHaveBeenCalledWith(
      expect.objectContaining({
        host: "smtp.example.com",
        port: 587,
        secure: false,
        requireTLS: true,
        auth: { user: "user@example.com", pass: "test-secret" },
        connectionTimeout: 5000,
      })
    );
    expect(mockTransport.verify).toHaveBeenCalledTimes(1);
    expect(session.transport).toBe(mockTransport);
  });

  it("uses implicit TLS when configured", async () => {
    await openSendSession({
      ...testConfig,
      smtp: { host: "smtp.example.com", port: 465, secure: true },
    });

    expect(createTransportMock).toHaveBeenCalledWith(
      expect.objectContaining({ port: 465, secure: true, requireTLS: false })
    );
  });

  it("raises AuthError and closes the transport when the login is rejected", async () => {
    mockTransport.verify.mockRejectedValue(
      Object.assign(new Error("Invalid login: 535"), { code: "EAUTH" })
    );

    await expect(openSendSession(testConfig)).rejects.toBeInstanceOf(AuthError);
    expect(mockTransport.close).toHaveBeenCalledTimes(1);
  });

  it("closes exactly once", async () => {
    const session = await openSendSession(testConfig);

    await session.close();
    await session.close();

    expect(mockTransport.close).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// withSession
// ---------------------------------------------------------------------------

describe("withSession", () => {
  function fakeSession(): Session & { close: Mock } {
    return { closed: false, close: vi.fn().mockResolvedValue(undefined) };
  }

  it("returns the result and closes the session", async () => {
    const session = fakeSession();
    const result = await withSession(async () => session, async () => 42);

    expect(result).toBe(42);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it("closes the session when the body throws", async () => {
    const session = fakeSession();
    const failure = new Error("mid-operation failure");

    await expect(
      withSession(async () => session, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it("does not run the body when opening fails", async () => {
    const use = vi.fn();
    await expect(
      withSession(async () => {
        throw new AuthError("rejected");
      }, use)
    ).rejects.toBeInstanceOf(AuthError);
    expect(use).not.toHaveBeenCalled();
  });
});
