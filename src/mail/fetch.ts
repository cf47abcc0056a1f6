import { simpleParser } from "mailparser";
import type { AddressObject, HeaderLines } from "mailparser";
import type { FetchMessageObject, MessageStructureObject } from "imapflow";
import { log } from "../log.js";
import { FetchError, describeError, isConnectionError } from "./errors.js";
import type { ProtocolQuery } from "./query.js";
import type { MailboxReader, ReadSession } from "./session.js";
import type { Message } from "./types.js";

export interface FetchOptions {
  /** Keep only the newest `limit` matches. Omit to keep every match. */
  limit?: number;
  previewLength: number;
}

/** The MIME part a preview is read from. */
export interface BodyPart {
  part: string;
  type: string;
}

const TRUNCATION_MARKER = "...";

/**
 * Take the newest `limit` ids. Servers return search hits oldest-first,
 * so that is the tail of the list.
 */
export function selectRecent(ids: number[], limit?: number): number[] {
  if (limit === undefined) return ids;
  if (limit <= 0) return [];
  return ids.slice(-limit);
}

/**
 * Cut a body down to `length` characters. Cut bodies have their whitespace
 * collapsed and end in "...".
 */
export function preview(body: string, length: number): string {
  const text = body.trim();
  if (text.length <= length) return text;
  return text.slice(0, length).replace(/\s+/g, " ").trim() + TRUNCATION_MARKER;
}

function addressText(addr: AddressObject | AddressObject[] | undefined): string {
  if (!addr) return "";
  if (Array.isArray(addr)) return addr.map((a) => a.text).join(", ");
  return addr.text;
}

/** Unfolded value of the first `key` header, or "" when there is none. */
function rawHeader(lines: HeaderLines, key: string): string {
  const entry = lines.find((h) => h.key === key);
  if (!entry) return "";
  return entry.line
    .slice(entry.line.indexOf(":") + 1)
    .replace(/\r?\n[ \t]+/g, " ")
    .trim();
}

function leaves(node: MessageStructureObject): MessageStructureObject[] {
  if (!node.childNodes || node.childNodes.length === 0) return [node];
  return node.childNodes.flatMap(leaves);
}

/**
 * Pick the part to preview: the first text/plain leaf in document order,
 * otherwise the first leaf of any type. A single-part message is part "1".
 */
export function selectBodyPart(
  structure: MessageStructureObject | undefined
): BodyPart | undefined {
  if (!structure) return undefined;
  const all = leaves(structure);
  const chosen = all.find((node) => node.type === "text/plain") ?? all[0];
  if (!chosen) return undefined;
  return { part: chosen.part ?? "1", type: chosen.type };
}

async function htmlToText(html: string): Promise<string> {
  const parsed = await simpleParser(`Content-Type: text/html; charset=utf-8\r\n\r\n${html}`);
  return parsed.text ?? "";
}

/**
 * Download one part and return it as text. imapflow undoes the transfer
 * encoding and converts text parts to UTF-8; HTML goes through mailparser's
 * html-to-text conversion.
 */
export async function readBodyPart(
  mailbox: MailboxReader,
  seq: number,
  body: BodyPart
): Promise<string> {
  const { content } = await mailbox.download(String(seq), body.part);
  const chunks: Buffer[] = [];
  for await (const chunk of content) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const text = Buffer.concat(chunks).toString("utf-8");
  return body.type === "text/html" ? htmlToText(text) : text;
}

/**
 * Turn one fetched message and its body text into a Message.
 * Encoded header words are decoded by mailparser; the Date header is
 * passed through as sent.
 */
export async function decodeMessage(
  msg: FetchMessageObject,
  body: string,
  previewLength: number
): Promise<Message> {
  if (!msg.headers) {
    throw new Error("server returned no message headers");
  }

  const parsed = await simpleParser(msg.headers);

  return Object.freeze({
    id: String(msg.seq),
    subject: parsed.subject ?? "",
    from: parsed.from?.text ?? "",
    to: addressText(parsed.to),
    date: rawHeader(parsed.headerLines, "date"),
    body: preview(body, previewLength),
    isUnread: !(msg.flags?.has("\\Seen") ?? false),
  });
}

async function search(session: ReadSession, query: ProtocolQuery): Promise<number[]> {
  try {
    const ids = await session.mailbox.search(query.search);
    return ids || [];
  } catch (error) {
    throw new FetchError(
      `Search failed in "${session.folder}": ${describeError(error)}`,
      { cause: error }
    );
  }
}

/**
 * Run `query` on the session's folder and return the decoded matches in
 * server order (oldest-first), limited to the newest `limit`.
 *
 * Headers and the preview part are fetched with BODY.PEEK, and the folder
 * is opened read-only, so \Seen is never set as a side effect.
 *
 * A message that fails to decode is logged and skipped. A failed search or
 * fetch command, or a connection lost mid-download, aborts the call with a
 * FetchError.
 */
export async function fetchMessages(
  session: ReadSession,
  query: ProtocolQuery,
  options: FetchOptions
): Promise<Message[]> {
  const selected = selectRecent(await search(session, query), options.limit);
  if (selected.length === 0) {
    return [];
  }

  // FETCH responses may come back in any order; index them by sequence number.
  const fetched = new Map<number, FetchMessageObject>();
  try {
    for await (const msg of session.mailbox.fetch(selected.join(","), {
      headers: true,
      flags: true,
      bodyStructure: true,
    })) {
      fetched.set(msg.seq, msg);
    }
  } catch (error) {
    throw new FetchError(
      `Fetching messages from "${session.folder}" failed: ${describeError(error)}`,
      { cause: error }
    );
  }

  const messages: Message[] = [];
  for (const seq of selected) {
    const msg = fetched.get(seq);
    if (!msg) {
      log(`Message ${seq} in "${session.folder}" was not returned by the server; skipping`);
      continue;
    }
    try {
      const part = selectBodyPart(msg.bodyStructure);
      const body = part ? await readBodyPart(session.mailbox, seq, part) : "";
      messages.push(await decodeMessage(msg, body, options.previewLength));
    } catch (error) {
      if (isConnectionError(error)) {
        throw new FetchError(
          `Fetching message ${seq} from "${session.folder}" failed: ${describeError(error)}`,
          { cause: error }
        );
      }
      log(`Skipping message ${seq} in "${session.folder}": ${describeError(error)}`);
    }
  }
  return messages;
}

/** Number of messages matching `query`, without fetching any of them. */
export async function countMatching(
  session: ReadSession,
  query: ProtocolQuery
): Promise<number> {
  const ids = await search(session, query);
  return ids.length;
}
