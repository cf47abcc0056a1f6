import type { EmailClient } from "./client.js";
import { DEFAULT_FOLDER } from "./types.js";
import type {
  FilterCriteria,
  Message,
  OutgoingMessage,
  SendResult,
} from "./types.js";

/** The fixed set of operations the core performs. */
export type MailOperation =
  | { kind: "read"; count: number; folder: string }
  | { kind: "filter"; criteria: FilterCriteria }
  | { kind: "send"; message: OutgoingMessage }
  | { kind: "unread_count"; folder: string };

export type OperationResult =
  | { kind: "read"; folder: string; count: number; emails: Message[] }
  | {
      kind: "filter";
      folder: string;
      filters: string;
      count: number;
      emails: Message[];
    }
  | { kind: "send"; success: true; message: string; result: SendResult }
  | { kind: "unread_count"; folder: string; unread: number };

/** Human-readable summary of the criteria, e.g. `sender: a@x.com, unread: true`. */
export function describeCriteria(criteria: FilterCriteria): string {
  const parts: string[] = [];
  if (criteria.sender) parts.push(`sender: ${criteria.sender}`);
  if (criteria.subject) parts.push(`subject contains: ${criteria.subject}`);
  if (criteria.isUnread !== undefined) parts.push(`unread: ${criteria.isUnread}`);
  return parts.length > 0 ? parts.join(", ") : "no filters";
}

export async function runOperation(
  client: EmailClient,
  op: MailOperation
): Promise<OperationResult> {
  switch (op.kind) {
    case "read": {
      const emails = await client.readEmails({ count: op.count, folder: op.folder });
      return { kind: "read", folder: op.folder, count: emails.length, emails };
    }
    case "filter": {
      const emails = await client.filterEmails(op.criteria);
      return {
        kind: "filter",
        folder: op.criteria.folder || DEFAULT_FOLDER,
        filters: describeCriteria(op.criteria),
        count: emails.length,
        emails,
      };
    }
    case "send": {
      const result = await client.sendEmail(op.message);
      return {
        kind: "send",
        success: true,
        message: `Email sent successfully to ${op.message.to}`,
        result,
      };
    }
    case "unread_count": {
      const unread = await client.getUnreadCount(op.folder);
      return { kind: "unread_count", folder: op.folder, unread };
    }
    default: {
      const unknownOp: never = op;
      throw new Error(`Unhandled operation: ${JSON.stringify(unknownOp)}`);
    }
  }
}
