export type CheckpointBackend = "file" | "mongo";

export type Env = {
  CATALOG_BASE_URL: string;
  CATALOG_CONSUMER_KEY: string;
  CATALOG_CONSUMER_SECRET: string;
  CHECKPOINT_BACKEND: CheckpointBackend;
  CHECKPOINT_FILE: string;
  MONGO_URI: string;
  AUDIT_LOG_DIR: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const parseCheckpointBackend = (value: string | undefined): CheckpointBackend => {
  const normalized = value?.trim().toLowerCase() || "file";
  if (normalized !== "file" && normalized !== "mongo") {
    throw new Error(`CHECKPOINT_BACKEND must be "file" or "mongo". Received: ${value ?? ""}`);
  }
  return normalized;
};

const nonEmptyOr = (value: string | undefined, fallback: string): string =>
  value != null && value.trim() !== "" ? value.trim() : fallback;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const CATALOG_BASE_URL = validateHttpUrl(
    "CATALOG_BASE_URL",
    env.CATALOG_BASE_URL ?? "http://localhost:3999/wp-json/wc/v3"
  );
  const CATALOG_CONSUMER_KEY = env.CATALOG_CONSUMER_KEY ?? "";
  const CATALOG_CONSUMER_SECRET = env.CATALOG_CONSUMER_SECRET ?? "";
  const CHECKPOINT_BACKEND = parseCheckpointBackend(env.CHECKPOINT_BACKEND);
  const CHECKPOINT_FILE = nonEmptyOr(env.CHECKPOINT_FILE, "checkpoint.json");
  const MONGO_URI = nonEmptyOr(env.MONGO_URI, "mongodb://localhost:27017/catalog_migration");
  const AUDIT_LOG_DIR = nonEmptyOr(env.AUDIT_LOG_DIR, "logs");

  return {
    CATALOG_BASE_URL,
    CATALOG_CONSUMER_KEY,
    CATALOG_CONSUMER_SECRET,
    CHECKPOINT_BACKEND,
    CHECKPOINT_FILE,
    MONGO_URI,
    AUDIT_LOG_DIR
  };
};
