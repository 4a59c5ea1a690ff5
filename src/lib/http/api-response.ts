import { NextResponse } from "next/server";

import { AppError } from "@/lib/errors";

export function errorResponse(
  error: unknown,
  label: string,
  fallbackMessage: string,
): Response {
  if (error instanceof AppError) {
    return NextResponse.json(
      { error: error.message, code: error.code },
      { status: error.statusCode },
    );
  }

  console.error(`${label} failed`, error);
  return NextResponse.json(
    { error: fallbackMessage, code: "INTERNAL_SERVER_ERROR" },
    { status: 500 },
  );
}
