import { z } from "zod";

import { ValidationError } from "@/lib/errors";

export const USER_ID_HEADER = "x-user-id";

const uuidSchema = z.uuid();

/** Reads the caller's id from the `X-User-ID` header, lowercased. */
export function getUserId(request: Request): string {
  const parsed = uuidSchema.safeParse(request.headers.get(USER_ID_HEADER)?.trim());
  if (!parsed.success) {
    throw new ValidationError("Invalid User ID format in X-User-ID header");
  }
  return parsed.data.toLowerCase();
}

export function parseThreadId(value: string): string {
  const parsed = uuidSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid thread id: ${value}`);
  }
  return parsed.data;
}

export async function parseJsonBody<T>(
  request: Request,
  schema: z.ZodType<T>
): Promise<T> {
  let json: unknown;
  try {
    json = await request.json();
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const messages = new Set(parsed.error.issues.map((issue) => issue.message));
    throw new ValidationError(Array.from(messages).join("; "));
  }
  return parsed.data;
}
