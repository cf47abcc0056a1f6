import { log } from "../log.js";
import { AuthError, ConnectError, SendError } from "./errors.js";
import { sendMessage, validateOutgoing } from "./compose.js";
import { countMatching, fetchMessages } from "./fetch.js";
import { UNREAD_QUERY, toSearchString, translate } from "./query.js";
import { createSessionFactory, withSession } from "./session.js";
import type { SessionFactory } from "./session.js";
import { DEFAULT_FOLDER, DEFAULT_READ_COUNT } from "./types.js";
import type {
  FilterCriteria,
  MailConfig,
  Message,
  OutgoingMessage,
  SendResult,
} from "./types.js";

export interface ReadOptions {
  count?: number;
  folder?: string;
}

/**
 * The email operations exposed to the agent.
 *
 * Every call opens its own session, runs strictly sequential protocol
 * steps, and closes the session before returning, whether the call
 * succeeded or failed. Nothing but the configuration is shared between
 * calls, so concurrent calls never touch the same connection.
 */
export class EmailClient {
  private readonly sessions: SessionFactory;

  constructor(
    private readonly config: MailConfig,
    sessions?: SessionFactory
  ) {
    this.sessions = sessions ?? createSessionFactory(config);
  }

  /** The newest `count` messages in `folder`, newest first. */
  async readEmails(options: ReadOptions = {}): Promise<Message[]> {
    const count = options.count ?? DEFAULT_READ_COUNT;
    const folder = options.folder || DEFAULT_FOLDER;

    const messages = await withSession(
      () => this.sessions.openReadSession(folder),
      (session) =>
        fetchMessages(session, translate(), {
          limit: count,
          previewLength: this.config.previewLength,
        })
    );
    return messages.reverse();
  }

  /** Every message in the folder matching all given criteria, newest first. */
  async filterEmails(criteria: FilterCriteria = {}): Promise<Message[]> {
    const folder = criteria.folder || DEFAULT_FOLDER;
    const query = translate(criteria);
    log(`SEARCH ${toSearchString(query)} in "${folder}"`);

    const messages = await withSession(
      () => this.sessions.openReadSession(folder),
      (session) =>
        fetchMessages(session, query, {
          previewLength: this.config.previewLength,
        })
    );
    return messages.reverse();
  }

  /**
   * Submit one message from the configured account.
   * Every failure, including a rejected login, is reported as a SendError.
   */
  async sendEmail(msg: OutgoingMessage): Promise<SendResult> {
    // Fail on bad input before any connection is attempted.
    validateOutgoing(msg);

    return withSession(
      () => this.openSendSession(),
      (session) => sendMessage(session, this.config.user, msg)
    );
  }

  async getUnreadCount(folder: string = DEFAULT_FOLDER): Promise<number> {
    return withSession(
      () => this.sessions.openReadSession(folder || DEFAULT_FOLDER),
      (session) => countMatching(session, UNREAD_QUERY)
    );
  }

  private async openSendSession() {
    try {
      return await this.sessions.openSendSession();
    } catch (error) {
      if (error instanceof AuthError) {
        throw new SendError("auth", error.message, { cause: error });
      }
      if (error instanceof ConnectError) {
        throw new SendError("connect", error.message, { cause: error });
      }
      throw error;
    }
  }
}
