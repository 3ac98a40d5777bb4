import type { Server } from "http";
import { migrateImages, type MigrationRunSummary } from "../application/migrate-images/migrateImages.usecase";
import { createMigrationProgress, type MigrationProgress } from "../application/migrate-images/migration.progress";
import { superviseMigration } from "../application/supervisor/superviseMigration";
import { FileCheckpointStore } from "../infrastructure/checkpoint/FileCheckpointStore";
import { CsvAuditLog } from "../infrastructure/csv/CsvAuditLog";
import { MongoCheckpointStore } from "../infrastructure/mongo/MongoCheckpointStore";
import { WooCommerceHttpClient } from "../infrastructure/woocommerce/WooCommerceHttpClient";
import type { CheckpointStore } from "../ports/CheckpointStore";
import { createServer } from "../server";
import { type Env, loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

type ClosableCheckpointStore = CheckpointStore & { close?: () => Promise<void> };

const createCheckpointStore = (env: Env): ClosableCheckpointStore =>
  env.CHECKPOINT_BACKEND === "mongo"
    ? new MongoCheckpointStore(env.MONGO_URI)
    : new FileCheckpointStore(env.CHECKPOINT_FILE);

const startStatusServer = async (
  port: number,
  checkpoints: CheckpointStore,
  progress: MigrationProgress
): Promise<Server> => {
  const server = createServer({ checkpoints, progress });
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });
  console.log(JSON.stringify({ event: "status_server.listening", port }));
  return server;
};

const closeServer = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });

export const runMigration = async (processEnv: NodeJS.ProcessEnv = process.env): Promise<MigrationRunSummary> => {
  const env = loadEnv(processEnv);
  const runtime = loadRuntimeConfigFromEnv(processEnv);

  const client = new WooCommerceHttpClient(
    env.CATALOG_BASE_URL,
    { consumerKey: env.CATALOG_CONSUMER_KEY, consumerSecret: env.CATALOG_CONSUMER_SECRET },
    runtime.timeoutMs
  );
  const checkpoints = createCheckpointStore(env);
  const audit = CsvAuditLog.inDirectory(env.AUDIT_LOG_DIR);
  const progress = createMigrationProgress();

  const server =
    runtime.statusPort > 0 ? await startStatusServer(runtime.statusPort, checkpoints, progress) : undefined;

  try {
    const summary = await superviseMigration({
      run: () => migrateImages({ client, checkpoints, audit, config: runtime.migrationConfig, progress }),
      backoffMs: runtime.restartBackoffMs,
      maxRestarts: runtime.maxRestarts,
      progress
    });
    console.log(JSON.stringify({ event: "migration.audit_log", path: audit.filePath }));
    return summary;
  } finally {
    if (server) await closeServer(server);
    await checkpoints.close?.();
  }
};
