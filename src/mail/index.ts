export { EmailClient } from "./client.js";
export type { ReadOptions } from "./client.js";
export { loadConfigFromEnv } from "./config.js";
export {
  MailError,
  ConnectError,
  AuthError,
  FolderError,
  FetchError,
  SendError,
  classifyConnectionError,
  describeError,
} from "./errors.js";
export type { MailErrorKind, SendFailureReason } from "./errors.js";
export { translate, toSearchString } from "./query.js";
export type { ProtocolQuery } from "./query.js";
export { fetchMessages, countMatching, preview } from "./fetch.js";
export { validateOutgoing, buildMessage, sendMessage } from "./compose.js";
export {
  openReadSession,
  openSendSession,
  createSessionFactory,
  withSession,
} from "./session.js";
export type { ReadSession, SendSession, SessionFactory } from "./session.js";
export { runOperation, describeCriteria } from "./operations.js";
export type { MailOperation, OperationResult } from "./operations.js";
export { DEFAULT_FOLDER, DEFAULT_READ_COUNT } from "./types.js";
export type {
  MailConfig,
  Message,
  FilterCriteria,
  OutgoingMessage,
  SendResult,
} from "./types.js";
