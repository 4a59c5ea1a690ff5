import { randomUUID } from "node:crypto";

import { resolveAgent, type AgentTable } from "@/lib/agents/registry";
import type { AgentDefinition } from "@/lib/agents/types";
import type { Thread } from "@/lib/db/threads";

import { decodeHistory } from "./message-codec";
import { saveAgentMessages, storeUserMessageOnError } from "./persistence";
import type { AgentResponseChunk } from "./stream-chunks";

export type AgentQueryInput = {
  thread: Thread;
  query: string;
  agents?: AgentTable;
};

export type StreamAgentQueryInput = AgentQueryInput & {
  signal?: AbortSignal;
};

export type AgentResponse = {
  threadId: string;
  messageId: string;
  /** JSON text of the agent's structured output. */
  response: string;
};

export async function runAgentQuery({
  thread,
  query,
  agents,
}: AgentQueryInput): Promise<AgentResponse> {
  const agent = resolveAgent(thread.agentType, agents);
  const history = decodeHistory(thread.id);
  const deps = agent.buildDependencies(thread.userId);

  const result = await agent.capability.run(query, history, deps);
  const last = saveAgentMessages(thread.id, result.newMessages);

  return {
    threadId: last.threadId,
    messageId: last.id,
    response: JSON.stringify(result.output),
  };
}

async function* runAgentStream(
  agent: AgentDefinition,
  thread: Thread,
  query: string,
  signal: AbortSignal | undefined
): AsyncGenerator<AgentResponseChunk> {
  const userMessageId = randomUUID();
  const assistantMessageId = randomUUID();
  let completed = false;

  try {
    yield { event: "message_created", message: { id: userMessageId, role: "user" } };

    const history = decodeHistory(thread.id);
    const deps = agent.buildDependencies(thread.userId);

    yield { event: "message_started", message_id: assistantMessageId };

    const run = agent.capability.runStream(query, history, deps, { abortSignal: signal });
    let previous: string | undefined;
    for await (const partial of run.partialOutputs) {
      const serialized = JSON.stringify(partial);
      if (serialized === previous) {
        continue;
      }
      previous = serialized;
      yield { event: "token", message_id: assistantMessageId, token: partial };
    }

    const result = await run.result();
    saveAgentMessages(thread.id, result.newMessages, assistantMessageId);
    completed = true;

    yield { event: "message_complete", message_id: assistantMessageId };
  } finally {
    if (!completed) {
      storeUserMessageOnError(thread.id, userMessageId, query);
    }
  }
}

/**
 * Streams one agent turn as chunks. The agent type is resolved eagerly, so an
 * unsupported type throws here instead of inside the stream. Errors raised
 * while streaming propagate to the consumer after the user's query has been
 * stored.
 */
export function streamAgentQuery({
  thread,
  query,
  agents,
  signal,
}: StreamAgentQueryInput): AsyncGenerator<AgentResponseChunk> {
  const agent = resolveAgent(thread.agentType, agents);
  return runAgentStream(agent, thread, query, signal);
}
