// src/lifecycle.ts
//
// pending -> sent -> read -> archived. Transitions only move forward; each
// returns a new metadata object and leaves unrelated keys where they were.

import { InvalidTransitionError } from "./errors.js";
import { isYes, metaString } from "./frontmatter.js";
import type { ArticleRecord, ArticleState, Metadata, ReadFeedback } from "./types.js";

export const NOTES_SEPARATOR = " | ";

export function isSent(metadata: Metadata): boolean {
  return isYes(metadata["sent-to-kindle"]);
}

export function isRead(metadata: Metadata): boolean {
  return metaString(metadata["read-status"])?.toLowerCase() === "read";
}

export function stateOf(record: Pick<ArticleRecord, "metadata" | "collection">): ArticleState {
  if (record.collection === "archived") return "archived";
  if (isRead(record.metadata)) return "read";
  if (isSent(record.metadata)) return "sent";
  return "pending";
}

export function markSent(metadata: Metadata, id?: string): Metadata {
  if (isSent(metadata)) {
    throw new InvalidTransitionError("Record is already marked as sent", id);
  }
  return { ...metadata, "sent-to-kindle": true };
}

export function appendNote(existing: Metadata[string] | undefined, note: string): string {
  const prior = metaString(existing);
  return prior ? `${prior}${NOTES_SEPARATOR}${note}` : note;
}

/**
 * Applies reading feedback. The first call moves a sent record to read and
 * stamps `date-read`; later calls on a read record only add feedback.
 */
export function markRead(metadata: Metadata, feedback: ReadFeedback, today: string, id?: string): Metadata {
  if (!isSent(metadata)) {
    throw new InvalidTransitionError("Record has not been sent yet", id);
  }

  const next: Metadata = { ...metadata };
  if (!isRead(metadata) || !metaString(metadata["date-read"])) {
    next["read-status"] = "read";
    next["date-read"] = today;
  }
  if (feedback.liked) next.liked = true;

  const note = feedback.notes.trim();
  if (note) next.notes = appendNote(metadata.notes, note);

  return next;
}

/** A record may only enter the archived collection once it is read and dated. */
export function assertArchivable(record: Pick<ArticleRecord, "metadata" | "id">): void {
  if (!isRead(record.metadata) || !metaString(record.metadata["date-read"])) {
    throw new InvalidTransitionError("Record must be read before it is archived", record.id);
  }
}

export function today(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const d = String(now.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}
