import { ImapFlow } from "imapflow";
import type { FetchMessageObject, FetchQueryObject, SearchObject } from "imapflow";
import nodemailer from "nodemailer";
import { log } from "../log.js";
import {
  FolderError,
  classifyConnectionError,
  describeError,
  isConnectionError,
} from "./errors.js";
import { DEFAULT_FOLDER } from "./types.js";
import type { MailConfig } from "./types.js";

/**
 * The part of an IMAP connection the fetch pipeline needs.
 * ImapFlow satisfies it; tests supply an in-process mailbox.
 */
export interface MailboxReader {
  search(query: SearchObject): Promise<number[] | false>;
  fetch(range: string, query: FetchQueryObject): AsyncIterable<FetchMessageObject>;
  /** Stream one body part, transfer-decoded, text converted to UTF-8. */
  download(range: string, part?: string): Promise<{ content: AsyncIterable<unknown> }>;
}

type Recipient = string | { address: string };

/** The part of an SMTP transport the send pipeline needs. */
export interface MailTransport {
  sendMail(options: {
    envelope: { from: string; to: string[] };
    raw: string;
  }): Promise<{ messageId: string; accepted: Recipient[]; rejected: Recipient[] }>;
}

export interface Session {
  readonly closed: boolean;
  /** Idempotent; never throws. */
  close(): Promise<void>;
}

export interface ReadSession extends Session {
  readonly folder: string;
  readonly mailbox: MailboxReader;
}

export interface SendSession extends Session {
  readonly transport: MailTransport;
}

/**
 * Opens sessions for one account. Each call yields a fresh connection that
 * belongs to exactly one operation.
 */
export interface SessionFactory {
  openReadSession(folder: string): Promise<ReadSession>;
  openSendSession(): Promise<SendSession>;
}

/**
 * Wrap a teardown function so that it runs at most once and reports, rather
 * than raises, any failure.
 */
function closeOnce(label: string, teardown: () => Promise<void> | void) {
  let closed = false;
  return {
    get closed() {
      return closed;
    },
    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      try {
        await teardown();
      } catch (error) {
        log(`${label} close failed: ${describeError(error)}`);
      }
    },
  };
}

/**
 * Connect and authenticate to the IMAP server, then select `folder`
 * read-only (EXAMINE) so nothing done in the session can change flags.
 */
export async function openReadSession(
  config: MailConfig,
  folder: string = DEFAULT_FOLDER
): Promise<ReadSession> {
  const endpoint = { host: config.imap.host, port: config.imap.port };
  const client = new ImapFlow({
    host: config.imap.host,
    port: config.imap.port,
    secure: config.imap.secure,
    auth: { user: config.user, pass: config.pass },
    logger: false,
    disableAutoIdle: true,
    connectionTimeout: config.timeoutMs,
    greetingTimeout: config.timeoutMs,
    socketTimeout: config.timeoutMs,
    tls: {
      rejectUnauthorized: config.imap.tlsRejectUnauthorized,
    },
  });

  // EventEmitter requires handling "error" events, otherwise Node throws.
  // The command in flight rejects on its own; this only records the cause.
  client.on("error", (error: unknown) => {
    log(`IMAP connection error: ${describeError(error)}`);
  });

  const lifecycle = closeOnce("IMAP", async () => {
    if (client.usable) {
      await client.logout();
    } else {
      client.close();
    }
  });

  const session: ReadSession = {
    folder,
    mailbox: client,
    get closed() {
      return lifecycle.closed;
    },
    close: lifecycle.close,
  };

  try {
    await client.connect();
  } catch (error) {
    await session.close();
    throw classifyConnectionError(error, "IMAP", endpoint);
  }

  try {
    await client.mailboxOpen(folder, { readOnly: true });
  } catch (error) {
    await session.close();
    if (isConnectionError(error)) {
      throw classifyConnectionError(error, "IMAP", endpoint);
    }
    throw new FolderError(
      folder,
      `Folder "${folder}" does not exist or cannot be selected.`,
      { cause: error }
    );
  }

  return session;
}

/**
 * Create an SMTP transport and prove it works by connecting and
 * authenticating once. Submission ports upgrade with STARTTLS before AUTH;
 * `secure` ports speak TLS from the start.
 */
export async function openSendSession(config: MailConfig): Promise<SendSession> {
  const endpoint = { host: config.smtp.host, port: config.smtp.port };
  const transport = nodemailer.createTransport({
    host: config.smtp.host,
    port: config.smtp.port,
    secure: config.smtp.secure,
    requireTLS: !config.smtp.secure,
    auth: { user: config.user, pass: config.pass },
    connectionTimeout: config.timeoutMs,
    greetingTimeout: config.timeoutMs,
    socketTimeout: config.timeoutMs,
  });

  const lifecycle = closeOnce("SMTP", () => transport.close());
  const session: SendSession = {
    transport,
    get closed() {
      return lifecycle.closed;
    },
    close: lifecycle.close,
  };

  try {
    await transport.verify();
  } catch (error) {
    await session.close();
    throw classifyConnectionError(error, "SMTP", endpoint);
  }

  return session;
}

export function createSessionFactory(config: MailConfig): SessionFactory {
  return {
    openReadSession: (folder) => openReadSession(config, folder),
    openSendSession: () => openSendSession(config),
  };
}

/**
 * Scoped acquisition: open a session, hand it to `use`, and close it on
 * every exit path, including a rejection from `use`.
 */
export async function withSession<S extends Session, T>(
  open: () => Promise<S>,
  use: (session: S) => Promise<T>
): Promise<T> {
  const session = await open();
  try {
    return await use(session);
  } finally {
    await session.close();
  }
}
