/**
 * Connection settings for one mail account.
 * Loaded once at startup and passed by reference; never logged or returned
 * from a tool call.
 */
export interface MailConfig {
  user: string;
  pass: string;
  imap: {
    host: string;
    port: number;
    secure: boolean;
    tlsRejectUnauthorized: boolean;
  };
  smtp: {
    host: string;
    port: number;
    secure: boolean;
  };
  /** Upper bound for every connect, greeting and socket wait */
  timeoutMs: number;
  /** Body preview cutoff in characters */
  previewLength: number;
}

/**
 * One email as returned to the agent.
 *
 * The `id` is the IMAP sequence number. It is only meaningful within the
 * session that produced it and must not be reused across calls.
 */
export type Message = Readonly<{
  id: string;
  subject: string;
  from: string;
  to: string;
  /** Date header exactly as sent, or "" when the message has none */
  date: string;
  /** Body preview, cut at the configured length */
  body: string;
  /** Unread state as observed at fetch time */
  isUnread: boolean;
}>;

export interface FilterCriteria {
  /** Substring of the From header */
  sender?: string;
  /** Substring of the Subject header */
  subject?: string;
  /** true = unread only, false = read only, undefined = either */
  isUnread?: boolean;
  folder?: string;
}

export interface OutgoingMessage {
  /** One or more comma-separated recipient addresses */
  to: string;
  subject: string;
  /** Plain text body */
  body: string;
  cc?: string;
}

export interface SendResult {
  messageId: string;
  accepted: string[];
  rejected: string[];
  /** ISO 8601 time the server accepted the message for delivery */
  timestamp: string;
}

export const DEFAULT_FOLDER = "INBOX";
export const DEFAULT_READ_COUNT = 10;
