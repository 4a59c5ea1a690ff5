import { randomUUID } from "node:crypto";

import { desc, eq } from "drizzle-orm";

import { getErrorMessage, RecordCreationError, ThreadNotFoundError } from "@/lib/errors";

import type { DbExecutor } from "./client";
import { threads, type AgentType, type ThreadRow } from "./tables";

export type Thread = ThreadRow;

export type CreateThreadInput = {
  userId: string;
  agentType: AgentType;
};

export function createThread(tx: DbExecutor, input: CreateThreadInput): Thread {
  const id = randomUUID();
  const now = Date.now();

  try {
    tx.insert(threads)
      .values({
        id,
        userId: input.userId,
        agentType: input.agentType,
        createdAt: now,
        updatedAt: now,
      })
      .run();
  } catch (error) {
    throw new RecordCreationError(`Failed to create thread: ${getErrorMessage(error)}`);
  }

  const created = tx.select().from(threads).where(eq(threads.id, id)).get();
  if (!created) {
    throw new RecordCreationError("Failed to create thread - no result returned");
  }
  return created;
}

export function getThread(db: DbExecutor, threadId: string): Thread {
  const thread = db.select().from(threads).where(eq(threads.id, threadId)).get();
  if (!thread) {
    throw new ThreadNotFoundError(threadId);
  }
  return thread;
}

export function listThreadsByUser(db: DbExecutor, userId: string): Thread[] {
  return db
    .select()
    .from(threads)
    .where(eq(threads.userId, userId))
    .orderBy(desc(threads.createdAt), desc(threads.id))
    .all();
}

export function touchThread(tx: DbExecutor, threadId: string, now = Date.now()): void {
  tx.update(threads).set({ updatedAt: now }).where(eq(threads.id, threadId)).run();
}
