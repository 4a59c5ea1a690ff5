import type { ModelMessage } from "ai";

import { withTransaction } from "@/lib/db/client";
import {
  createMessage,
  createMessagesBatch,
  type StoredMessage,
} from "@/lib/db/messages";
import { EmptyResponseError, getErrorMessage } from "@/lib/errors";

import { encodeForStorage } from "./message-codec";

/**
 * Stores the new messages of an agent run in one transaction and returns the
 * last stored row, which the caller reports as the answer.
 */
export function saveAgentMessages(
  threadId: string,
  messages: ModelMessage[],
  assistantMessageId?: string
): StoredMessage {
  const records = encodeForStorage(messages, assistantMessageId);
  const rows =
    records.length > 0
      ? withTransaction((tx) => createMessagesBatch(tx, threadId, records))
      : [];
  console.info(`Stored ${rows.length} agent messages for thread ${threadId}`);

  const last = rows.at(-1);
  if (!last) {
    throw new EmptyResponseError();
  }
  return last;
}

/**
 * Keeps the user's query when a streamed run fails or is cancelled.
 * Failures here are logged and never replace the original error.
 */
export function storeUserMessageOnError(
  threadId: string,
  userMessageId: string,
  query: string
): void {
  const message: ModelMessage = { role: "user", content: query };
  try {
    withTransaction((tx) =>
      createMessage(tx, threadId, {
        id: userMessageId,
        role: "user",
        rawPayload: JSON.stringify([message]),
      })
    );
  } catch (error) {
    console.warn(
      `Failed to store user message ${userMessageId} for thread ${threadId}: ${getErrorMessage(error)}`
    );
  }
}
