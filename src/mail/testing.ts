/**
 * In-process stand-ins for an IMAP folder and an SMTP transport.
 * Used by the tests to drive the real pipelines without a network.
 */

import type {
  FetchMessageObject,
  FetchQueryObject,
  MessageStructureObject,
  SearchObject,
} from "imapflow";
import { FolderError } from "./errors.js";
import type {
  MailTransport,
  MailboxReader,
  ReadSession,
  SendSession,
  SessionFactory,
} from "./session.js";

/** One MIME leaf, already decoded. */
export interface FakePart {
  type: string;
  content: string;
}

export interface FakeMessageInput {
  from: string;
  subject: string;
  /** Shorthand for a single text/plain part */
  body?: string;
  /** Leaves of a multipart/mixed message, in order; overrides `body` */
  parts?: FakePart[];
  to?: string;
  /** A string is written to the Date header verbatim */
  date?: Date | string;
  seen?: boolean;
  /** Fetch returns no headers for this message */
  corrupt?: boolean;
}

interface StoredMessage {
  seq: number;
  from: string;
  subject: string;
  seen: boolean;
  headers?: Buffer;
  structure: MessageStructureObject;
  parts: FakePart[];
}

export function rawHeaders(input: FakeMessageInput, parts: FakePart[]): string {
  const date = input.date ?? new Date("2026-01-01T10:00:00Z");
  const headers = [
    `From: ${input.from}`,
    `To: ${input.to ?? "me@example.com"}`,
    `Subject: ${input.subject}`,
    `Date: ${typeof date === "string" ? date : date.toUTCString()}`,
    "MIME-Version: 1.0",
    parts.length === 1
      ? `Content-Type: ${parts[0].type}; charset=utf-8`
      : 'Content-Type: multipart/mixed; boundary="fake"',
  ];
  return `${headers.join("\r\n")}\r\n\r\n`;
}

/** Body structure the way imapflow reports it; a single part has no part number. */
function structureOf(parts: FakePart[]): MessageStructureObject {
  if (parts.length === 1) {
    return { type: parts[0].type, childNodes: [] };
  }
  return {
    type: "multipart/mixed",
    childNodes: parts.map((p, index) => ({
      part: String(index + 1),
      type: p.type,
      childNodes: [],
    })),
  };
}

async function* chunksOf(data: Buffer): AsyncGenerator<Buffer> {
  yield data;
}

function contains(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

/** One folder: sequence numbers start at 1 in insertion order. */
export class FakeMailbox implements MailboxReader {
  readonly searches: SearchObject[] = [];
  readonly fetches: { range: string; query: FetchQueryObject }[] = [];
  readonly downloads: { range: string; part?: string }[] = [];
  /** Make search reject with this error */
  searchError?: Error;
  /** Make the fetch stream throw just before yielding this sequence number */
  failFetchAtSeq?: number;
  /** Make the download of this message's body reject */
  failDownload?: { seq: number; error: Error };

  private readonly messages: StoredMessage[];

  constructor(inputs: FakeMessageInput[] = []) {
    this.messages = inputs.map((input, index) => {
      const parts = input.parts ?? [{ type: "text/plain", content: input.body ?? "" }];
      return {
        seq: index + 1,
        from: input.from,
        subject: input.subject,
        seen: input.seen ?? false,
        headers: input.corrupt
          ? undefined
          : Buffer.from(rawHeaders(input, parts), "utf-8"),
        structure: structureOf(parts),
        parts,
      };
    });
  }

  isSeen(seq: number): boolean {
    return this.messages.some((m) => m.seq === seq && m.seen);
  }

  async search(query: SearchObject): Promise<number[]> {
    this.searches.push(query);
    if (this.searchError) throw this.searchError;

    return this.messages
      .filter((m) => {
        if (query.seen !== undefined && m.seen !== query.seen) return false;
        if (query.from !== undefined && !contains(m.from, query.from)) return false;
        if (query.subject !== undefined && !contains(m.subject, query.subject)) return false;
        return true;
      })
      .map((m) => m.seq);
  }

  async *fetch(
    range: string,
    query: FetchQueryObject
  ): AsyncGenerator<FetchMessageObject> {
    this.fetches.push({ range, query });
    const wanted = new Set(range.split(",").map(Number));

    // Like a real server, answer in mailbox order regardless of range order.
    for (const m of this.messages) {
      if (!wanted.has(m.seq)) continue;
      if (m.seq === this.failFetchAtSeq) {
        throw new Error("Connection closed unexpectedly");
      }
      yield {
        seq: m.seq,
        uid: 1000 + m.seq,
        flags: query.flags ? new Set(m.seen ? ["\\Seen"] : []) : undefined,
        headers: query.headers ? m.headers : undefined,
        bodyStructure: query.bodyStructure ? m.structure : undefined,
      };
    }
  }

  async download(range: string, part = "1"): Promise<{ content: AsyncIterable<Buffer> }> {
    this.downloads.push({ range, part });
    const seq = Number(range);
    if (this.failDownload?.seq === seq) throw this.failDownload.error;

    const leaf = this.messages.find((m) => m.seq === seq)?.parts[Number(part) - 1];
    if (!leaf) throw new Error(`No part ${part} in message ${range}`);

    return { content: chunksOf(Buffer.from(leaf.content, "utf-8")) };
  }
}

export interface SentRecord {
  envelope: { from: string; to: string[] };
  raw: string;
}

export class FakeTransport implements MailTransport {
  readonly sent: SentRecord[] = [];
  /** Make sendMail reject with this error */
  failWith?: Error;

  async sendMail(options: SentRecord) {
    if (this.failWith) throw this.failWith;
    this.sent.push(options);
    return {
      messageId: `<fake-${this.sent.length}@example.com>`,
      accepted: [...options.envelope.to],
      rejected: [],
    };
  }
}

/** A session whose close() calls are counted. */
class CountingSession {
  closeCalls = 0;

  get closed(): boolean {
    return this.closeCalls > 0;
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

class FakeReadSession extends CountingSession implements ReadSession {
  constructor(
    readonly folder: string,
    readonly mailbox: FakeMailbox
  ) {
    super();
  }
}

class FakeSendSession extends CountingSession implements SendSession {
  constructor(readonly transport: FakeTransport) {
    super();
  }
}

/**
 * Session factory over a set of fake folders and one fake transport.
 * Records every session it hands out.
 */
export class FakeSessions implements SessionFactory {
  readonly readSessions: FakeReadSession[] = [];
  readonly sendSessions: FakeSendSession[] = [];
  readonly transport = new FakeTransport();
  /** Make openSendSession reject with this error */
  sendOpenError?: Error;

  constructor(readonly folders: Record<string, FakeMailbox>) {}

  async openReadSession(folder: string): Promise<FakeReadSession> {
    const mailbox = this.folders[folder];
    if (!mailbox) {
      throw new FolderError(
        folder,
        `Folder "${folder}" does not exist or cannot be selected.`
      );
    }
    const session = new FakeReadSession(folder, mailbox);
    this.readSessions.push(session);
    return session;
  }

  async openSendSession(): Promise<FakeSendSession> {
    if (this.sendOpenError) throw this.sendOpenError;
    const session = new FakeSendSession(this.transport);
    this.sendSessions.push(session);
    return session;
  }
}
