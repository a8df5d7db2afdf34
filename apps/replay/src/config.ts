import "dotenv/config";
import { fileURLToPath } from "node:url";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value?.toLowerCase());
  return level ?? "info";
}

export const config = {
  // Scenario replayed when no --scenario argument is given.
  scenarioPath:
    process.env.PT_SCENARIO ??
    fileURLToPath(new URL("../scenarios/maturity.json", import.meta.url)),

  logLevel: parseLogLevel(process.env.LOG_LEVEL),
} as const;
