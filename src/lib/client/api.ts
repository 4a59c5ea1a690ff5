import { NIL as NIL_UUID, v5 as uuidv5 } from "uuid";

import { parseChunkLine, type AgentResponseChunk } from "@/lib/chat/stream-chunks";
import type { AgentType } from "@/lib/db/tables";
import type {
  AgentResponseJson,
  ThreadDetailJson,
  ThreadJson,
} from "@/lib/http/schemas";

export type ApiClientOptions = {
  baseUrl: string;
  apiKey: string;
  apiKeyHeader?: string;
};

export type ApiClient = ReturnType<typeof createApiClient>;

/**
 * Stable user id for callers that only know an e-mail address. The address is
 * trimmed and lowercased first, so ids differ from a plain hash of mixed-case input.
 */
export function userIdFromEmail(email: string): string {
  return uuidv5(email.trim().toLowerCase(), NIL_UUID);
}

async function readErrorMessage(response: Response): Promise<string> {
  const body: unknown = await response.json().catch(() => null);
  if (body && typeof body === "object" && "error" in body) {
    return String(body.error);
  }
  return `Request failed (${response.status})`;
}

/** Splits a byte stream into NDJSON lines, buffering partial lines across reads. */
export async function* readNdjsonLines(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }
      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf("\n");
      while (newline >= 0) {
        const line = buffer.slice(0, newline).trim();
        buffer = buffer.slice(newline + 1);
        if (line) {
          yield line;
        }
        newline = buffer.indexOf("\n");
      }
    }

    const rest = (buffer + decoder.decode()).trim();
    if (rest) {
      yield rest;
    }
  } finally {
    // Stopping early must close the body so the server sees the disconnect.
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

export function createApiClient({
  baseUrl,
  apiKey,
  apiKeyHeader = "X-API-Key",
}: ApiClientOptions) {
  const root = baseUrl.replace(/\/+$/, "");

  function request(path: string, userId: string | null, init?: RequestInit): Promise<Response> {
    const headers = new Headers(init?.headers);
    headers.set("Content-Type", "application/json");
    headers.set(apiKeyHeader, apiKey);
    if (userId) {
      headers.set("X-User-ID", userId);
    }
    return fetch(`${root}${path}`, { ...init, headers });
  }

  async function fetchJson<T>(path: string, userId: string | null, init?: RequestInit): Promise<T> {
    const response = await request(path, userId, init);
    if (!response.ok) {
      throw new Error(await readErrorMessage(response));
    }
    return (await response.json()) as T;
  }

  return {
    createThread(userId: string, agentType: AgentType): Promise<ThreadJson> {
      return fetchJson<ThreadJson>("/api/v1/threads", userId, {
        method: "POST",
        body: JSON.stringify({ agent_type: agentType }),
      });
    },

    listThreads(userId: string): Promise<ThreadJson[]> {
      return fetchJson<ThreadJson[]>("/api/v1/threads", userId);
    },

    getThread(userId: string, threadId: string): Promise<ThreadDetailJson> {
      return fetchJson<ThreadDetailJson>(
        `/api/v1/threads/${encodeURIComponent(threadId)}`,
        userId
      );
    },

    queryAgent(userId: string, threadId: string, query: string): Promise<AgentResponseJson> {
      return fetchJson<AgentResponseJson>("/api/v1/agent/query", userId, {
        method: "POST",
        body: JSON.stringify({ thread_id: threadId, query }),
      });
    },

    async *streamAgentQuery(
      userId: string,
      threadId: string,
      query: string,
      signal?: AbortSignal
    ): AsyncGenerator<AgentResponseChunk> {
      const response = await request("/api/v1/agent/stream", userId, {
        method: "POST",
        body: JSON.stringify({ thread_id: threadId, query }),
        signal,
      });
      if (!response.ok) {
        throw new Error(await readErrorMessage(response));
      }
      if (!response.body) {
        throw new Error("Stream response has no body");
      }

      for await (const line of readNdjsonLines(response.body)) {
        yield parseChunkLine(line);
      }
    },

    async checkHealth(): Promise<boolean> {
      try {
        const response = await request("/api/v1/health", null);
        return response.ok;
      } catch (error) {
        console.warn("Health check failed", error);
        return false;
      }
    },
  };
}
