import { existsSync } from "node:fs";
import { resolve } from "node:path";

// Load .env file at the top
const envPath = resolve(process.cwd(), ".env");
if (existsSync(envPath)) {
  process.loadEnvFile(envPath);
}

export interface Config {
  logLevel: string; // "debug" | "info" | "warn" | "error"
  logDir: string; // Directory for log files
  knowledgeCutoffYear: number; // Citations dated after this year are treated as fabricated
  rehashThreshold: number; // Repetitions before a claim or question pattern is flagged
  driftThreshold: number; // Net drifting messages before a refocus intervention
  qualityDbPath: string; // SQLite file for persisted quality reports
  persistReports: boolean;
}

function getEnvVar(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value === undefined || value.trim() === "" ? defaultValue : value.trim();
}

function getIntEnvVar(key: string, defaultValue: number): number {
  const raw = getEnvVar(key, String(defaultValue));
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`Invalid value for environment variable ${key}: "${raw}" (expected a non-negative integer)`);
  }
  return value;
}

function getBoolEnvVar(key: string, defaultValue: boolean): boolean {
  const raw = getEnvVar(key, defaultValue ? "true" : "false").toLowerCase();
  return raw === "true" || raw === "1" || raw === "yes";
}

export function loadConfig(): Config {
  return {
    logLevel: getEnvVar("LOG_LEVEL", "info"),
    logDir: getEnvVar("LOG_DIR", "logs"),
    knowledgeCutoffYear: getIntEnvVar("KNOWLEDGE_CUTOFF_YEAR", 2023),
    rehashThreshold: getIntEnvVar("REHASH_THRESHOLD", 3),
    driftThreshold: getIntEnvVar("DRIFT_THRESHOLD", 2),
    qualityDbPath: getEnvVar("QUALITY_DB_PATH", "quality-reports.db"),
    persistReports: getBoolEnvVar("PERSIST_REPORTS", false),
  };
}
