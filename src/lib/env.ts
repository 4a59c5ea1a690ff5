import { createEnv } from "@t3-oss/env-nextjs";
import { z } from "zod";

export const env = createEnv({
  server: {
    API_KEY: z.string().trim().min(1),
    API_KEY_NAME: z.string().trim().min(1).default("X-API-Key"),
    DB_PATH: z.string().trim().min(1).optional(),

    OPENAI_API_KEY: z.string().trim().min(1).optional(),
    OPENAI_BASE_URL: z.string().trim().min(1).optional(),
    OPENAI_MODEL: z.string().trim().min(1).optional(),
    OPENAI_API_MODE: z.enum(["chat", "responses"]).optional(),
    OPENAI_REFERER: z.string().trim().min(1).optional(),
    OPENAI_TITLE: z.string().trim().min(1).optional(),

    MOCK_AGENT: z.enum(["1"]).optional(),
    SERVICE_VERSION: z.string().trim().min(1).default("1.0.0"),
  },
  client: {},
  runtimeEnv: {
    API_KEY: process.env.API_KEY,
    API_KEY_NAME: process.env.API_KEY_NAME,
    DB_PATH: process.env.DB_PATH,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OPENAI_BASE_URL: process.env.OPENAI_BASE_URL,
    OPENAI_MODEL: process.env.OPENAI_MODEL,
    OPENAI_API_MODE: process.env.OPENAI_API_MODE,
    OPENAI_REFERER: process.env.OPENAI_REFERER,
    OPENAI_TITLE: process.env.OPENAI_TITLE,
    MOCK_AGENT: process.env.MOCK_AGENT,
    SERVICE_VERSION: process.env.SERVICE_VERSION,
  },
  emptyStringAsUndefined: true,
  skipValidation: process.env.SKIP_ENV_VALIDATION === "1",
  isServer: true,
});
