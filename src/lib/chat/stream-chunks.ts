import { z } from "zod";

import { MESSAGE_ROLES } from "@/lib/db/tables";

export const STREAM_ERROR_TYPES = [
  "THREAD_NOT_FOUND",
  "PERMISSION_DENIED",
  "EMPTY_RESPONSE",
  "FORMAT_ERROR",
  "AGENT_ERROR",
  "SYSTEM_ERROR",
] as const;
export type StreamErrorType = (typeof STREAM_ERROR_TYPES)[number];

export const agentResponseChunkSchema = z.discriminatedUnion("event", [
  z.object({
    event: z.literal("message_created"),
    message: z.object({ id: z.string(), role: z.enum(MESSAGE_ROLES) }),
  }),
  z.object({ event: z.literal("message_started"), message_id: z.string() }),
  z.object({
    event: z.literal("token"),
    message_id: z.string(),
    token: z.unknown(),
  }),
  z.object({ event: z.literal("message_complete"), message_id: z.string() }),
  z.object({
    event: z.literal("error"),
    error: z.string(),
    error_type: z.enum(STREAM_ERROR_TYPES),
  }),
  z.object({ event: z.literal("done") }),
]);

export type AgentResponseChunk = z.infer<typeof agentResponseChunkSchema>;
export type ErrorChunk = Extract<AgentResponseChunk, { event: "error" }>;

/** Parses one NDJSON line into a chunk. Throws on malformed lines. */
export function parseChunkLine(line: string): AgentResponseChunk {
  return agentResponseChunkSchema.parse(JSON.parse(line));
}
