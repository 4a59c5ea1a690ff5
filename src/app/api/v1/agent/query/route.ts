import { NextResponse } from "next/server";

import { runAgentQuery } from "@/lib/chat/agent-query";
import { verifyThreadAccess } from "@/lib/chat/thread-access";
import { errorResponse } from "@/lib/http/api-response";
import { getUserId, parseJsonBody } from "@/lib/http/request";
import { agentRequestSchema, toAgentResponseJson } from "@/lib/http/schemas";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export async function POST(request: Request): Promise<Response> {
  try {
    const userId = getUserId(request);
    const body = await parseJsonBody(request, agentRequestSchema);
    const thread = verifyThreadAccess(body.thread_id, userId);

    const result = await runAgentQuery({ thread, query: body.query });
    return NextResponse.json(toAgentResponseJson(result), { status: 200 });
  } catch (error) {
    return errorResponse(
      error,
      "POST /api/v1/agent/query",
      "Failed to process agent query"
    );
  }
}
