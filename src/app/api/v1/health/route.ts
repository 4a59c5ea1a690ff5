import os from "node:os";

import { NextResponse } from "next/server";

import { env } from "@/lib/env";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export type HealthJson = {
  status: "ok";
  timestamp: string;
  hostname: string;
  version: string;
};

export async function GET(): Promise<Response> {
  const body: HealthJson = {
    status: "ok",
    timestamp: new Date().toISOString(),
    hostname: os.hostname(),
    version: env.SERVICE_VERSION,
  };
  return NextResponse.json(body, { status: 200 });
}
