#!/usr/bin/env node
import {
  type MigrationErrorContext,
  type MigrationFailureCode,
  MigrationFatalError
} from "../application/migrate-images/migration.error-handler";
import { runMigration } from "../composition/root";

/**
 * What reaches this point: invalid configuration, or the last run's error once
 * `MIGRATION_MAX_RESTARTS` is used up.
 */
type CliErrorEnvelope = {
  event: "migration.failed";
  name: string;
  message: string;
  code?: MigrationFailureCode;
  context?: MigrationErrorContext;
  stack?: string;
};

const positionOf = (context: MigrationErrorContext): MigrationErrorContext => {
  const position: MigrationErrorContext = { page: context.page };
  if (context.index !== undefined) position.index = context.index;
  if (context.itemId !== undefined) position.itemId = context.itemId;
  return position;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));

  const envelope: CliErrorEnvelope = {
    event: "migration.failed",
    name: error.name || "Error",
    message: error.message
  };

  // cause is left out: it can hold driver or response internals
  if (err instanceof MigrationFatalError) {
    envelope.code = err.code;
    envelope.context = positionOf(err.context);
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeMigrationCli = async (): Promise<void> => {
  try {
    await runMigration();
  } catch (err) {
    console.error(JSON.stringify(buildCliErrorEnvelope(err, isDebugMode())));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeMigrationCli();
}
