export type MailErrorKind = "connect" | "auth" | "folder" | "fetch" | "send";

/**
 * Base class for every failure the email core reports.
 * The message is meant to be shown to the agent as-is, so it never carries
 * credential material. The underlying library error is kept as `cause`.
 */
export abstract class MailError extends Error {
  abstract readonly kind: MailErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network-level failure (DNS, refused, TLS, timeout). The caller may retry. */
export class ConnectError extends MailError {
  readonly kind = "connect";
}

/** The server rejected the credentials. Retrying will not help. */
export class AuthError extends MailError {
  readonly kind = "auth";
}

/** The requested folder does not exist or cannot be selected. */
export class FolderError extends MailError {
  readonly kind = "folder";

  constructor(
    readonly folder: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Search or retrieval failed after the session was established. */
export class FetchError extends MailError {
  readonly kind = "fetch";
}

export type SendFailureReason =
  | "validation"
  | "invalid-recipient"
  | "auth"
  | "connect"
  | "transport";

export class SendError extends MailError {
  readonly kind = "send";

  constructor(
    readonly reason: SendFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type Protocol = "IMAP" | "SMTP";

export interface Endpoint {
  host: string;
  port: number;
}

const CONNECTION_ERROR_CODES = [
  "ECONNRESET",
  "EPIPE",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  // nodemailer
  "ECONNECTION",
  "ESOCKET",
  "EDNS",
  "ETLS",
  // imapflow
  "CONNECT_TIMEOUT",
  "GREETING_TIMEOUT",
  "NoConnection",
];

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isAuthFailure(error: Error): boolean {
  if ("authenticationFailed" in error && error.authenticationFailed === true) {
    return true;
  }
  return errorCode(error) === "EAUTH";
}

/**
 * True when the error looks like the connection itself broke, as opposed to
 * the server answering a command with NO/BAD.
 */
export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const code = errorCode(error);
  if (code && CONNECTION_ERROR_CODES.includes(code)) {
    return true;
  }

  return /connection|socket|not connected|closed|broken pipe|timeout|timed out/i.test(
    error.message
  );
}

/**
 * Classify a failure raised while connecting or authenticating into an
 * AuthError or a ConnectError with a message the agent can act on.
 */
export function classifyConnectionError(
  error: unknown,
  protocol: Protocol,
  endpoint: Endpoint
): AuthError | ConnectError {
  if (!(error instanceof Error)) {
    return new ConnectError(`${protocol} error: ${String(error)}`);
  }

  if (isAuthFailure(error)) {
    return new AuthError(
      `${protocol} authentication failed. Check EMAIL_USER and EMAIL_PASS credentials.`,
      { cause: error }
    );
  }

  const code = errorCode(error);

  if (code === "ECONNREFUSED" || /ECONNREFUSED/.test(error.message)) {
    return new ConnectError(
      `Cannot reach ${protocol} server at ${endpoint.host}:${endpoint.port}: connection refused. Is the server running?`,
      { cause: error }
    );
  }

  if (code === "ENOTFOUND" || code === "EDNS" || /ENOTFOUND/.test(error.message)) {
    return new ConnectError(
      `Cannot resolve ${protocol} server hostname '${endpoint.host}'. Check ${protocol}_HOST.`,
      { cause: error }
    );
  }

  if (
    code === "ETIMEDOUT" ||
    code === "CONNECT_TIMEOUT" ||
    code === "GREETING_TIMEOUT" ||
    /timed? ?out/i.test(error.message)
  ) {
    return new ConnectError(
      `Connection to ${protocol} server timed out. The server may be slow or unreachable.`,
      { cause: error }
    );
  }

  if (
    code === "ETLS" ||
    code?.startsWith("ERR_TLS") ||
    /tls|certificate/i.test(error.message)
  ) {
    return new ConnectError(
      `TLS/SSL error connecting to ${protocol} server. Check ${protocol}_PORT and ${protocol}_SECURE.`,
      { cause: error }
    );
  }

  return new ConnectError(`${protocol} error: ${error.message}`, {
    cause: error,
  });
}

/** Render any thrown value as a single line for the agent or the log. */
export function describeError(error: unknown): string {
  if (error instanceof MailError) {
    return `${error.name}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
