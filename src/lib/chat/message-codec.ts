import { modelMessageSchema } from "ai";
import type { ModelMessage } from "ai";

import { getDrizzleDb, type DbExecutor } from "@/lib/db/client";
import { getMessagesByThread, type MessageRecordInput } from "@/lib/db/messages";
import { MESSAGE_ROLES, type MessageRole } from "@/lib/db/tables";
import { getErrorMessage } from "@/lib/errors";

type ToolModelMessage = Extract<ModelMessage, { role: "tool" }>;
type ToolResultPart = Extract<ToolModelMessage["content"][number], { type: "tool-result" }>;
type ToolResultOutput = ToolResultPart["output"];

const DISPLAY_SEPARATOR = "\n\n";

/**
 * Parses a stored payload: a JSON array of provider messages.
 * Throws when the JSON or any message fails validation.
 */
export function parseRawPayload(rawPayload: string): ModelMessage[] {
  const parsed: unknown = JSON.parse(rawPayload);
  if (!Array.isArray(parsed)) {
    throw new Error("Message payload must be a JSON array");
  }
  const items: unknown[] = parsed;

  return items.map((item, index) => {
    const result = modelMessageSchema.safeParse(item);
    if (!result.success) {
      throw new Error(`Invalid message at index ${index}: ${result.error.message}`);
    }
    return result.data;
  });
}

export function classifyRole(message: { role: string }): MessageRole | null {
  return MESSAGE_ROLES.find((role) => role === message.role) ?? null;
}

/**
 * Turns the new messages of one agent run into insertable records, one per
 * message. The first assistant message takes `assistantMessageId` so a
 * streamed answer keeps the id announced to the client.
 */
export function encodeForStorage(
  messages: ModelMessage[],
  assistantMessageId?: string
): MessageRecordInput[] {
  const records: MessageRecordInput[] = [];
  let assistantIdUsed = false;

  for (const message of messages) {
    const role = classifyRole(message);
    if (!role) {
      continue;
    }

    const record: MessageRecordInput = {
      role,
      rawPayload: JSON.stringify([message]),
    };
    if (role === "assistant" && assistantMessageId && !assistantIdUsed) {
      record.id = assistantMessageId;
      assistantIdUsed = true;
    }
    records.push(record);
  }

  return records;
}

/**
 * Rebuilds the provider history of a thread in stored order. Rows whose
 * payload no longer parses are skipped.
 */
export function decodeHistory(
  threadId: string,
  db: DbExecutor = getDrizzleDb()
): ModelMessage[] {
  const history: ModelMessage[] = [];

  for (const row of getMessagesByThread(db, threadId)) {
    try {
      history.push(...parseRawPayload(row.rawPayload));
    } catch (error) {
      console.warn(
        `Skipping unreadable message ${row.id} in thread ${threadId}: ${getErrorMessage(error)}`
      );
    }
  }

  return history;
}

function stringifyValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function renderToolOutput(output: ToolResultOutput): string {
  switch (output.type) {
    case "text":
    case "error-text":
      return output.value;
    case "json":
    case "error-json":
      return stringifyValue(output.value);
    case "content":
      return output.value
        .flatMap((item) => (item.type === "text" ? [item.text] : []))
        .join("");
    default:
      return "";
  }
}

function collectDisplayParts(message: ModelMessage): string[] {
  switch (message.role) {
    case "system":
      return [];
    case "user":
      if (typeof message.content === "string") {
        return [message.content];
      }
      return message.content.flatMap((part) => (part.type === "text" ? [part.text] : []));
    case "assistant":
      if (typeof message.content === "string") {
        return [message.content];
      }
      return message.content.flatMap((part) => {
        switch (part.type) {
          case "text":
            return [part.text];
          case "tool-call":
            return [stringifyValue(part.input)];
          case "tool-result":
            return [renderToolOutput(part.output)];
          default:
            return [];
        }
      });
    case "tool":
      return message.content.flatMap((part) =>
        part.type === "tool-result" ? [renderToolOutput(part.output)] : []
      );
    default:
      return [];
  }
}

/** Human-readable text for a stored payload; "" when there is nothing to show. */
export function renderDisplayText(rawPayload: string | null | undefined): string {
  if (!rawPayload) {
    return "";
  }

  let messages: ModelMessage[];
  try {
    messages = parseRawPayload(rawPayload);
  } catch (error) {
    console.warn(`Unable to render message payload: ${getErrorMessage(error)}`);
    return "";
  }

  return messages
    .flatMap(collectDisplayParts)
    .filter((text) => text.length > 0)
    .join(DISPLAY_SEPARATOR);
}
