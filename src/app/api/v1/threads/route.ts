import { NextResponse } from "next/server";

import { getDrizzleDb, withTransaction } from "@/lib/db/client";
import { createThread, listThreadsByUser } from "@/lib/db/threads";
import { errorResponse } from "@/lib/http/api-response";
import { getUserId, parseJsonBody } from "@/lib/http/request";
import { createThreadRequestSchema, toThreadJson } from "@/lib/http/schemas";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export async function GET(request: Request): Promise<Response> {
  try {
    const userId = getUserId(request);
    const threads = listThreadsByUser(getDrizzleDb(), userId);
    return NextResponse.json(threads.map(toThreadJson), { status: 200 });
  } catch (error) {
    return errorResponse(error, "GET /api/v1/threads", "Failed to list threads");
  }
}

export async function POST(request: Request): Promise<Response> {
  try {
    const userId = getUserId(request);
    const body = await parseJsonBody(request, createThreadRequestSchema);
    const thread = withTransaction((tx) =>
      createThread(tx, { userId, agentType: body.agent_type })
    );
    return NextResponse.json(toThreadJson(thread), { status: 201 });
  } catch (error) {
    return errorResponse(error, "POST /api/v1/threads", "Failed to create thread");
  }
}
