import { createMimeMessage } from "mimetext";
import addressparser from "nodemailer/lib/addressparser/index.js";
import { SendError, describeError, errorCode } from "./errors.js";
import type { SendSession } from "./session.js";
import type { OutgoingMessage, SendResult } from "./types.js";

const ADDRESS_PATTERN = /^[^\s@<>(),;:"]+@[^\s@<>(),;:"]+\.[^\s@<>(),;:"]+$/;

/** One recipient; `name` is "" when the entry had no display name. */
export interface ParsedAddress {
  name: string;
  address: string;
}

/** Recipients of a validated message. */
export interface Recipients {
  to: ParsedAddress[];
  cc: ParsedAddress[];
}

/**
 * Split an address list the way RFC 5322 reads it, so quoted display
 * names may contain commas: `"Doe, John" <j@x.com>, a@x.com`.
 */
export function parseRecipients(value: string | undefined): ParsedAddress[] {
  if (!value) return [];
  return addressparser(value, { flatten: true }).filter(
    (entry) => entry.address.length > 0 || entry.name.length > 0
  );
}

/** Checks a bare address such as `alice@example.com`. */
export function isValidAddress(address: string): boolean {
  return ADDRESS_PATTERN.test(address);
}

/**
 * Check an outgoing message before anything touches the network.
 * Throws SendError("validation") for missing fields and
 * SendError("invalid-recipient") for malformed addresses.
 */
export function validateOutgoing(msg: OutgoingMessage): Recipients {
  const missing = (["to", "subject", "body"] as const).filter(
    (field) => msg[field].trim().length === 0
  );
  if (missing.length > 0) {
    throw new SendError(
      "validation",
      `Missing required field${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}.`
    );
  }

  const to = parseRecipients(msg.to);
  const cc = parseRecipients(msg.cc);
  if (to.length === 0) {
    throw new SendError("validation", "Missing required field: to.");
  }

  const invalid = [...to, ...cc].filter((entry) => !isValidAddress(entry.address));
  if (invalid.length > 0) {
    throw new SendError(
      "invalid-recipient",
      `Invalid recipient address: ${invalid
        .map((entry) => `"${entry.address || entry.name}"`)
        .join(", ")}.`
    );
  }

  return { to, cc };
}

function toMailbox(entry: ParsedAddress): { addr: string; name?: string } {
  return entry.name ? { addr: entry.address, name: entry.name } : { addr: entry.address };
}

/**
 * Build a raw RFC 5322 message: the account as sender, To, Cc when given,
 * Subject, and the body as a single text/plain part.
 */
export function buildMessage(
  sender: string,
  msg: OutgoingMessage,
  recipients: Recipients = validateOutgoing(msg)
): string {
  const mime = createMimeMessage();

  mime.setSender(sender);
  mime.setTo(recipients.to.map(toMailbox));
  if (recipients.cc.length > 0) {
    mime.setCc(recipients.cc.map(toMailbox));
  }
  mime.setSubject(msg.subject);

  mime.addMessage({
    contentType: "text/plain",
    data: msg.body,
  });

  return mime.asRaw();
}

function toAddress(recipient: string | { address: string }): string {
  return typeof recipient === "string" ? recipient : recipient.address;
}

function classifySendFailure(error: unknown): SendError {
  const code = errorCode(error);
  if (code === "EAUTH") {
    return new SendError(
      "auth",
      "SMTP authentication failed. Check EMAIL_USER and EMAIL_PASS credentials.",
      { cause: error }
    );
  }
  if (code === "EENVELOPE") {
    return new SendError(
      "invalid-recipient",
      `The server rejected the recipients: ${describeError(error)}`,
      { cause: error }
    );
  }
  return new SendError("transport", `Failed to send email: ${describeError(error)}`, {
    cause: error,
  });
}

/**
 * Validate, build and submit one message. The server only queues it;
 * delivery is not observed.
 */
export async function sendMessage(
  session: SendSession,
  sender: string,
  msg: OutgoingMessage
): Promise<SendResult> {
  const recipients = validateOutgoing(msg);
  const raw = buildMessage(sender, msg, recipients);

  try {
    const info = await session.transport.sendMail({
      envelope: {
        from: sender,
        to: [...recipients.to, ...recipients.cc].map((entry) => entry.address),
      },
      raw,
    });
    return {
      messageId: info.messageId,
      accepted: info.accepted.map(toAddress),
      rejected: info.rejected.map(toAddress),
      timestamp: new Date().toISOString(),
    };
  } catch (error) {
    throw classifySendFailure(error);
  }
}
