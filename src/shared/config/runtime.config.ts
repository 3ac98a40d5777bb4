import {
  defaultMigrationConfig,
  type MigrationConfig,
  migrationCaps,
  resolveMigrationConfig
} from "../../application/migrate-images/migration.config";
import { defaultRestartBackoffMs } from "../../application/supervisor/superviseMigration";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 60000 },
  restartBackoffMs: { min: 0, max: 600000 },
  statusPort: { min: 0, max: 65535 },
  maxRestarts: { min: 0, max: 10000 }
} as const;

export type RuntimeConfig = {
  migrationConfig: MigrationConfig;
  timeoutMs: number;
  restartBackoffMs: number;
  statusPort: number;
  // undefined restarts forever
  maxRestarts: number | undefined;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalString = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const rule = defaultMigrationConfig.rewriteRule;
  const migrationConfig = resolveMigrationConfig({
    pageSize: parseOptionalIntInRange(env, "MIGRATION_PAGE_SIZE", migrationCaps.pageSize) ?? defaultMigrationConfig.pageSize,
    startPage: parseOptionalIntInRange(env, "MIGRATION_START_PAGE", migrationCaps.page) ?? defaultMigrationConfig.startPage,
    endPage: parseOptionalIntInRange(env, "MIGRATION_END_PAGE", migrationCaps.page) ?? defaultMigrationConfig.endPage,
    pageDelayMs: parseOptionalIntInRange(env, "MIGRATION_PAGE_DELAY_MS", migrationCaps.delayMs) ?? defaultMigrationConfig.pageDelayMs,
    itemDelayMs: parseOptionalIntInRange(env, "MIGRATION_ITEM_DELAY_MS", migrationCaps.delayMs) ?? defaultMigrationConfig.itemDelayMs,
    metaKey: parseOptionalString(env, "MIGRATION_META_KEY") ?? defaultMigrationConfig.metaKey,
    rewriteRule: {
      host: parseOptionalString(env, "IMAGE_URL_HOST") ?? rule.host,
      fromPath: parseOptionalString(env, "IMAGE_URL_FROM_PATH") ?? rule.fromPath,
      toPath: parseOptionalString(env, "IMAGE_URL_TO_PATH") ?? rule.toPath,
      fromExtension: parseOptionalString(env, "IMAGE_URL_FROM_EXTENSION") ?? rule.fromExtension,
      toExtension: parseOptionalString(env, "IMAGE_URL_TO_EXTENSION") ?? rule.toExtension
    }
  });

  const timeoutMs = parseOptionalIntInRange(env, "CATALOG_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 8000;
  const restartBackoffMs =
    parseOptionalIntInRange(env, "MIGRATION_RESTART_BACKOFF_MS", runtimeCaps.restartBackoffMs) ?? defaultRestartBackoffMs;
  const statusPort = parseOptionalIntInRange(env, "STATUS_PORT", runtimeCaps.statusPort) ?? 0;
  const maxRestarts = parseOptionalIntInRange(env, "MIGRATION_MAX_RESTARTS", runtimeCaps.maxRestarts);

  return { migrationConfig, timeoutMs, restartBackoffMs, statusPort, maxRestarts };
};
