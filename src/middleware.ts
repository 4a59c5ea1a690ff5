import { NextResponse, type NextRequest } from "next/server";

import { env } from "@/lib/env";

export function middleware(request: NextRequest): NextResponse {
  const apiKey = request.headers.get(env.API_KEY_NAME);
  if (!apiKey || apiKey !== env.API_KEY) {
    return NextResponse.json({ error: "Invalid or missing API key" }, { status: 401 });
  }
  return NextResponse.next();
}

export const config = {
  matcher: "/api/:path*",
};
