import { afterEach, describe, expect, it, vi } from "vitest";

import {
  createNdjsonResponse,
  createNdjsonStream,
  toErrorChunk,
  withTerminalChunks,
} from "@/lib/chat/ndjson-stream";
import { parseChunkLine, type AgentResponseChunk } from "@/lib/chat/stream-chunks";
import {
  AgentTypeError,
  EmptyResponseError,
  ModelResponseFormatError,
  RecordCreationError,
  ThreadNotFoundError,
  ThreadPermissionError,
} from "@/lib/errors";

async function* fromArray(
  chunks: AgentResponseChunk[],
  failure?: Error
): AsyncGenerator<AgentResponseChunk> {
  for (const chunk of chunks) {
    yield chunk;
  }
  if (failure) {
    throw failure;
  }
}

describe("toErrorChunk", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("tags domain errors", () => {
    expect(toErrorChunk(new ThreadNotFoundError("t1")).error_type).toBe("THREAD_NOT_FOUND");
    expect(toErrorChunk(new ThreadPermissionError("u1", "t1")).error_type).toBe(
      "PERMISSION_DENIED"
    );
    expect(toErrorChunk(new EmptyResponseError()).error_type).toBe("EMPTY_RESPONSE");
    expect(toErrorChunk(new ModelResponseFormatError()).error_type).toBe("FORMAT_ERROR");
    expect(toErrorChunk(new AgentTypeError()).error_type).toBe("AGENT_ERROR");
    expect(toErrorChunk(new RecordCreationError()).error_type).toBe("AGENT_ERROR");
  });

  it("keeps the domain error's message", () => {
    expect(toErrorChunk(new ThreadNotFoundError("t1"))).toEqual({
      event: "error",
      error: "Thread with ID t1 not found",
      error_type: "THREAD_NOT_FOUND",
    });
  });

  it("wraps anything else as a system error and logs it", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(toErrorChunk(new Error("disk full"))).toEqual({
      event: "error",
      error: "Unexpected error: disk full",
      error_type: "SYSTEM_ERROR",
    });
    expect(toErrorChunk("boom").error).toBe("Unexpected error: boom");
    expect(error).toHaveBeenCalledTimes(2);
  });
});

describe("withTerminalChunks", () => {
  it("appends done after a successful stream", async () => {
    const chunks: AgentResponseChunk[] = [];
    for await (const chunk of withTerminalChunks(
      fromArray([{ event: "message_started", message_id: "a1" }])
    )) {
      chunks.push(chunk);
    }

    expect(chunks).toEqual([{ event: "message_started", message_id: "a1" }, { event: "done" }]);
  });

  it("converts a failure into one error chunk followed by done", async () => {
    const chunks: AgentResponseChunk[] = [];
    for await (const chunk of withTerminalChunks(
      fromArray([{ event: "message_started", message_id: "a1" }], new EmptyResponseError())
    )) {
      chunks.push(chunk);
    }

    expect(chunks).toEqual([
      { event: "message_started", message_id: "a1" },
      { event: "error", error: "Failed to generate agent response", error_type: "EMPTY_RESPONSE" },
      { event: "done" },
    ]);
  });
});

describe("NDJSON transport", () => {
  it("writes one JSON object per line with streaming headers", async () => {
    const response = createNdjsonResponse(
      fromArray([
        { event: "message_created", message: { id: "u1", role: "user" } },
        { event: "token", message_id: "a1", token: { supportAdvice: "Hi" } },
        { event: "done" },
      ])
    );

    expect(response.headers.get("Content-Type")).toBe("application/x-ndjson");
    expect(response.headers.get("Cache-Control")).toBe("no-cache");
    expect(response.headers.get("X-Accel-Buffering")).toBe("no");

    const text = await response.text();
    expect(text).toBe(
      [
        '{"event":"message_created","message":{"id":"u1","role":"user"}}',
        '{"event":"token","message_id":"a1","token":{"supportAdvice":"Hi"}}',
        '{"event":"done"}',
        "",
      ].join("\n")
    );
    expect(text.trim().split("\n").map(parseChunkLine).at(-1)).toEqual({ event: "done" });
  });

  it("finalises the source and notifies when the consumer cancels", async () => {
    const onCancel = vi.fn();
    let finalised = false;

    async function* source(): AsyncGenerator<AgentResponseChunk> {
      try {
        yield { event: "message_created", message: { id: "u1", role: "user" } };
        yield { event: "message_started", message_id: "a1" };
        yield { event: "done" };
      } finally {
        finalised = true;
      }
    }

    const reader = createNdjsonStream(source(), { onCancel }).getReader();
    const first = await reader.read();
    expect(first.done).toBe(false);

    await reader.cancel();

    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(finalised).toBe(true);
  });
});
