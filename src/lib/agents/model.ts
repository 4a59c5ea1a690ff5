import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";

import { env } from "@/lib/env";

const DEFAULT_MODEL = "gpt-4o";

function buildExtraHeaders(): Record<string, string> | undefined {
  const headers: Record<string, string> = {};
  const referer = env.OPENAI_REFERER;
  const title = env.OPENAI_TITLE;

  if (referer) {
    headers["HTTP-Referer"] = referer;
  }

  if (title) {
    headers["X-Title"] = title;
  }

  return Object.keys(headers).length > 0 ? headers : undefined;
}

export function getChatModel(): LanguageModel {
  const baseURL = env.OPENAI_BASE_URL;
  const openai = createOpenAI({
    apiKey: env.OPENAI_API_KEY,
    baseURL,
    headers: buildExtraHeaders(),
  });

  const modelId = env.OPENAI_MODEL ?? DEFAULT_MODEL;

  // `openai(modelId)` targets the Responses API; most OpenAI-compatible
  // gateways only speak Chat Completions.
  const apiMode = env.OPENAI_API_MODE;
  const useChatCompletions = apiMode === "chat" || (apiMode == null && baseURL != null);
  return useChatCompletions ? openai.chat(modelId) : openai(modelId);
}
