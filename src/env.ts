import * as dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_MAX_RESULTS, DEFAULT_MAX_RETRIES, MAX_RESULTS_PER_PAGE } from "./constants";
import { ConfigError } from "./errors";
import type { SearchCredentials } from "./types";

const required = (name: string) =>
  z
    .string({ required_error: `Environment variable ${name} is not set. Check your .env file.` })
    .trim()
    .min(1, `Environment variable ${name} is not set. Check your .env file.`);

const EnvSchema = z.object({
  API_KEY: required("API_KEY"),
  CSE_ID: required("CSE_ID"),
  SEARCH_MAX_RESULTS: z.coerce.number().int().min(1).max(MAX_RESULTS_PER_PAGE).default(DEFAULT_MAX_RESULTS),
  SEARCH_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(DEFAULT_MAX_RETRIES),
});

export type AppConfig = {
  credentials: SearchCredentials;
  maxResults: number;
  maxRetries: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue ? issue.path.join(".") : "environment";
    const message = issue?.message.startsWith("Environment variable")
      ? issue.message
      : `Invalid value for ${name}: ${issue?.message ?? "unknown error"}. Check your .env file.`;
    throw new ConfigError(message);
  }

  const { API_KEY, CSE_ID, SEARCH_MAX_RESULTS, SEARCH_MAX_RETRIES } = parsed.data;
  return {
    credentials: { apiKey: API_KEY, cseId: CSE_ID },
    maxResults: SEARCH_MAX_RESULTS,
    maxRetries: SEARCH_MAX_RETRIES,
  };
}

export function loadDotenv(): void {
  dotenv.config();
}
