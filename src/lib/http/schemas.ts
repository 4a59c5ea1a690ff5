import { z } from "zod";

import { agentTypeSchema } from "@/lib/agents/registry";
import type { AgentResponse } from "@/lib/chat/agent-query";
import { renderDisplayText } from "@/lib/chat/message-codec";
import type { StoredMessage } from "@/lib/db/messages";
import type { Thread } from "@/lib/db/threads";
import type { MessageRole } from "@/lib/db/tables";

export const createThreadRequestSchema = z.object(
  { agent_type: agentTypeSchema },
  { error: "Request body must be a JSON object" }
);

export const agentRequestSchema = z.object(
  {
    thread_id: z.uuid({ error: "thread_id must be a UUID" }),
    query: z
      .string({ error: "query is required" })
      .trim()
      .min(1, "query must not be empty"),
  },
  { error: "Request body must be a JSON object" }
);

export type ThreadJson = {
  id: string;
  user_id: string;
  agent_type: string;
  created_at: string;
  updated_at: string;
};

export type MessageJson = {
  id: string;
  thread_id: string;
  role: MessageRole;
  content: string;
  created_at: string;
};

export type ThreadDetailJson = ThreadJson & { messages: MessageJson[] };

export type AgentResponseJson = {
  thread_id: string;
  message_id: string;
  response: string;
};

function toIsoString(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

export function toThreadJson(thread: Thread): ThreadJson {
  return {
    id: thread.id,
    user_id: thread.userId,
    agent_type: thread.agentType,
    created_at: toIsoString(thread.createdAt),
    updated_at: toIsoString(thread.updatedAt),
  };
}

export function toMessageJson(message: StoredMessage): MessageJson {
  return {
    id: message.id,
    thread_id: message.threadId,
    role: message.role,
    content: renderDisplayText(message.rawPayload),
    created_at: toIsoString(message.createdAt),
  };
}

export function toThreadDetailJson(
  thread: Thread,
  messages: StoredMessage[]
): ThreadDetailJson {
  return { ...toThreadJson(thread), messages: messages.map(toMessageJson) };
}

export function toAgentResponseJson(response: AgentResponse): AgentResponseJson {
  return {
    thread_id: response.threadId,
    message_id: response.messageId,
    response: response.response,
  };
}
