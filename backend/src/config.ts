import path from "node:path";
import type { ModelCandidate } from "./types";
import { getEnv, getIntEnv, getListEnv } from "./utils/env";

/** Fastest and cheapest first, most capable and experimental last. */
export const DEFAULT_MODEL_ROSTER: readonly ModelCandidate[] = [
  "gemini-2.0-flash-lite",
  "gemini-2.0-flash",
  "gemini-2.5-flash",
  "gemini-2.5-pro",
  "gemini-2.0-flash-exp"
];

export type AppConfig = {
  host: string;
  port: number;
  geminiApiKey: string | undefined;
  roster: readonly ModelCandidate[];
  providerTimeoutMs: number;
  databasePath: string;
};

export function loadConfig(): AppConfig {
  return {
    host: getEnv("HOST") ?? "0.0.0.0",
    port: getIntEnv("PORT", 3000),
    geminiApiKey: getEnv("GEMINI_API_KEY"),
    roster: Object.freeze(getListEnv("MODEL_ROSTER", DEFAULT_MODEL_ROSTER)),
    providerTimeoutMs: getIntEnv("PROVIDER_TIMEOUT_MS", 60000),
    databasePath: getEnv("DATABASE_PATH") ?? path.resolve(process.cwd(), "data", "assessments.db")
  };
}

export function getVersion(): string {
  return process.env.npm_package_version ?? process.env.APP_VERSION ?? "dev";
}
