import type { SearchObject } from "imapflow";
import type { FilterCriteria } from "./types.js";

/**
 * A single composite IMAP SEARCH. Every key set on `search` is one
 * predicate; imapflow joins them with spaces, which IMAP reads as AND.
 */
export interface ProtocolQuery {
  search: SearchObject;
}

/**
 * Translate filter criteria into one search query.
 * The folder is not part of the query; it is selected on the session.
 */
export function translate(criteria: Omit<FilterCriteria, "folder"> = {}): ProtocolQuery {
  const search: SearchObject = {};

  if (criteria.isUnread !== undefined) {
    search.seen = !criteria.isUnread;
  }
  if (criteria.sender) {
    search.from = criteria.sender;
  }
  if (criteria.subject) {
    search.subject = criteria.subject;
  }

  if (Object.keys(search).length === 0) {
    return { search: { all: true } };
  }
  return { search };
}

export const UNREAD_QUERY: ProtocolQuery = translate({ isUnread: true });

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Render the query in IMAP SEARCH grammar, e.g. `UNSEEN FROM "a@x.com"`.
 * Only covers the predicates `translate` produces.
 */
export function toSearchString(query: ProtocolQuery): string {
  const { search } = query;
  const terms: string[] = [];

  if (search.all) terms.push("ALL");
  if (search.seen === true) terms.push("SEEN");
  if (search.seen === false) terms.push("UNSEEN");
  if (search.from) terms.push(`FROM ${quote(search.from)}`);
  if (search.subject) terms.push(`SUBJECT ${quote(search.subject)}`);

  return terms.length > 0 ? terms.join(" ") : "ALL";
}
