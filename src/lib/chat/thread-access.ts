import { getDrizzleDb, type DbExecutor } from "@/lib/db/client";
import { getThread, type Thread } from "@/lib/db/threads";
import { ThreadPermissionError } from "@/lib/errors";

function normalizeId(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Loads a thread and checks that `userId` owns it.
 * Throws ThreadNotFoundError or ThreadPermissionError.
 */
export function verifyThreadAccess(
  threadId: string,
  userId: string,
  db: DbExecutor = getDrizzleDb()
): Thread {
  const thread = getThread(db, threadId);
  if (normalizeId(thread.userId) !== normalizeId(userId)) {
    throw new ThreadPermissionError(userId, threadId);
  }
  return thread;
}
