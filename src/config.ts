import dotenv from "dotenv";

// Load environment variables from .env
dotenv.config();

export const DEFAULT_DATASET_URL =
  "https://raw.githubusercontent.com/sapics/ip-location-db/refs/heads/main/dbip-city/dbip-city-ipv4-num.csv.gz";
export const DEFAULT_DATASET_PATH = "dbip-city-ipv4-num.csv";

export interface AppConfig {
  datasetPath: string;
  datasetUrl: string;
  /** Maximum simultaneous resolutions, 0 for no limit */
  resolveConcurrency: number;
  /** Per-hostname resolution timeout, 0 for none */
  resolveTimeoutMs: number;
  port: number;
  verbose: boolean;
}

function parseNonNegativeInt(value: string | undefined, fallback: number) {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    datasetPath: env.GEO_DB_PATH || DEFAULT_DATASET_PATH,
    datasetUrl: env.GEO_DB_URL || DEFAULT_DATASET_URL,
    resolveConcurrency: parseNonNegativeInt(env.RESOLVE_CONCURRENCY, 50),
    resolveTimeoutMs: parseNonNegativeInt(env.RESOLVE_TIMEOUT_MS, 0),
    port: parseNonNegativeInt(env.PORT, 3001),
    verbose: Boolean(env.DEBUG),
  };
}
