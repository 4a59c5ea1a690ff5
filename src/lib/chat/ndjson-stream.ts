import {
  AgentTypeError,
  EmptyResponseError,
  getErrorMessage,
  ModelResponseFormatError,
  RecordCreationError,
  ThreadNotFoundError,
  ThreadPermissionError,
} from "@/lib/errors";

import type { AgentResponseChunk, ErrorChunk } from "./stream-chunks";

export const NDJSON_HEADERS = {
  "Content-Type": "application/x-ndjson",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
} as const;

export function toErrorChunk(error: unknown): ErrorChunk {
  if (error instanceof ThreadNotFoundError) {
    return { event: "error", error: error.message, error_type: "THREAD_NOT_FOUND" };
  }
  if (error instanceof ThreadPermissionError) {
    return { event: "error", error: error.message, error_type: "PERMISSION_DENIED" };
  }
  if (error instanceof EmptyResponseError) {
    return { event: "error", error: error.message, error_type: "EMPTY_RESPONSE" };
  }
  if (error instanceof ModelResponseFormatError) {
    return { event: "error", error: error.message, error_type: "FORMAT_ERROR" };
  }
  if (error instanceof AgentTypeError || error instanceof RecordCreationError) {
    return { event: "error", error: error.message, error_type: "AGENT_ERROR" };
  }

  console.error("Agent stream failed", error);
  return {
    event: "error",
    error: `Unexpected error: ${getErrorMessage(error)}`,
    error_type: "SYSTEM_ERROR",
  };
}

/**
 * Passes chunks through, turns a thrown error into one `error` chunk and
 * always ends with `done`.
 */
export async function* withTerminalChunks(
  source: AsyncIterable<AgentResponseChunk>
): AsyncGenerator<AgentResponseChunk> {
  try {
    yield* source;
  } catch (error) {
    yield toErrorChunk(error);
  }
  yield { event: "done" };
}

export type NdjsonStreamOptions = {
  /** Called when the consumer goes away before the stream ends. */
  onCancel?: () => void;
};

/** Serializes chunks one JSON object per line, pulling only on demand. */
export function createNdjsonStream(
  chunks: AsyncGenerator<AgentResponseChunk>,
  options: NdjsonStreamOptions = {}
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let cancelled = false;

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const next = await chunks.next();
      if (cancelled) {
        return;
      }
      if (next.done) {
        controller.close();
        return;
      }
      controller.enqueue(encoder.encode(`${JSON.stringify(next.value)}\n`));
    },
    async cancel() {
      cancelled = true;
      options.onCancel?.();
      await chunks.return(undefined);
    },
  });
}

export function createNdjsonResponse(
  chunks: AsyncGenerator<AgentResponseChunk>,
  options: NdjsonStreamOptions = {}
): Response {
  return new Response(createNdjsonStream(chunks, options), {
    status: 200,
    headers: NDJSON_HEADERS,
  });
}
