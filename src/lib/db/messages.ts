import { randomUUID } from "node:crypto";

import { asc, eq, inArray, max } from "drizzle-orm";

import { getErrorMessage, RecordCreationError } from "@/lib/errors";

import type { DbExecutor } from "./client";
import { touchThread } from "./threads";
import { messages, type MessageRole, type MessageRow } from "./tables";

export type StoredMessage = MessageRow;

export type MessageRecordInput = {
  id?: string;
  role: MessageRole;
  rawPayload: string;
};

/**
 * Next free `created_at` for a thread. Never goes backwards, even when the
 * wall clock does or two writes land in the same millisecond.
 */
function nextCreatedAt(tx: DbExecutor, threadId: string): number {
  const latest = tx
    .select({ value: max(messages.createdAt) })
    .from(messages)
    .where(eq(messages.threadId, threadId))
    .get();
  const floor = latest?.value == null ? 0 : latest.value + 1;
  return Math.max(Date.now(), floor);
}

export function createMessage(
  tx: DbExecutor,
  threadId: string,
  input: MessageRecordInput
): StoredMessage {
  const [created] = createMessagesBatch(tx, threadId, [input]);
  if (!created) {
    throw new RecordCreationError("Failed to create message - no result returned");
  }
  return created;
}

/**
 * Inserts all records in a single statement and returns them ordered by
 * `created_at`. Runs inside the caller's transaction.
 */
export function createMessagesBatch(
  tx: DbExecutor,
  threadId: string,
  records: MessageRecordInput[]
): StoredMessage[] {
  if (records.length === 0) {
    return [];
  }

  const baseCreatedAt = nextCreatedAt(tx, threadId);
  const values = records.map((record, index) => ({
    id: record.id ?? randomUUID(),
    threadId,
    role: record.role,
    rawPayload: record.rawPayload,
    createdAt: baseCreatedAt + index,
  }));

  try {
    tx.insert(messages).values(values).run();
  } catch (error) {
    throw new RecordCreationError(`Failed to create messages: ${getErrorMessage(error)}`);
  }

  const created = tx
    .select()
    .from(messages)
    .where(
      inArray(
        messages.id,
        values.map((value) => value.id)
      )
    )
    .orderBy(asc(messages.createdAt))
    .all();

  if (created.length === 0) {
    throw new RecordCreationError("Failed to create messages - no results returned");
  }

  touchThread(tx, threadId);
  return created;
}

export function getMessagesByThread(db: DbExecutor, threadId: string): StoredMessage[] {
  return db
    .select()
    .from(messages)
    .where(eq(messages.threadId, threadId))
    .orderBy(asc(messages.createdAt))
    .all();
}
