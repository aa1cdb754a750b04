// src/config.ts
import dotenv from "dotenv";
import { z } from "zod";

// Load env vars from .env file
dotenv.config();

// Define schema
const configSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  MONKEYTYPE_SCOREBOARD_URL: z
    .string()
    .includes("{username}", {
      message: "MONKEYTYPE_SCOREBOARD_URL must contain a {username} placeholder.",
    })
    .default("https://monkeytype.com/api/scoreboard?user={username}"),
  MONKEYTYPE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  MONKEYTYPE_USER_AGENT: z
    .string()
    .min(1)
    .default("github-action/monkeytype-badge"),
});

// Validate and parse
const config = configSchema.parse(process.env);

export default config;
