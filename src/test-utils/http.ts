import { getDb } from "@/lib/db/client";

export const TEST_USER_ID = "11111111-1111-4111-8111-111111111111";
export const OTHER_USER_ID = "22222222-2222-4222-8222-222222222222";

type ApiRequestInit = {
  method?: string;
  userId?: string | null;
  body?: unknown;
};

export function apiRequest(path: string, init: ApiRequestInit = {}): Request {
  const headers = new Headers({ "Content-Type": "application/json" });
  const userId = init.userId === undefined ? TEST_USER_ID : init.userId;
  if (userId) {
    headers.set("X-User-ID", userId);
  }

  return new Request(`http://localhost${path}`, {
    method: init.method ?? "GET",
    headers,
    body:
      init.body === undefined
        ? undefined
        : typeof init.body === "string"
          ? init.body
          : JSON.stringify(init.body),
  });
}

export function resetDatabase(): void {
  const db = getDb();
  db.exec("DELETE FROM messages;");
  db.exec("DELETE FROM threads;");
}
