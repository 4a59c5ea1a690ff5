import { streamAgentQuery } from "@/lib/chat/agent-query";
import { createNdjsonResponse, withTerminalChunks } from "@/lib/chat/ndjson-stream";
import { verifyThreadAccess } from "@/lib/chat/thread-access";
import { errorResponse } from "@/lib/http/api-response";
import { getUserId, parseJsonBody } from "@/lib/http/request";
import { agentRequestSchema } from "@/lib/http/schemas";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export async function POST(request: Request): Promise<Response> {
  try {
    const userId = getUserId(request);
    const body = await parseJsonBody(request, agentRequestSchema);
    const thread = verifyThreadAccess(body.thread_id, userId);

    const abortController = new AbortController();
    const chunks = streamAgentQuery({
      thread,
      query: body.query,
      signal: abortController.signal,
    });

    return createNdjsonResponse(withTerminalChunks(chunks), {
      onCancel: () => abortController.abort(),
    });
  } catch (error) {
    return errorResponse(
      error,
      "POST /api/v1/agent/stream",
      "Failed to start agent stream"
    );
  }
}
