import { retry, type Sleep } from "../../shared/retry/retry";
import type { MigrationProgress } from "../migrate-images/migration.progress";
import { toErrorMessage } from "../migrate-images/migration.error-handler";

export const defaultRestartBackoffMs = 30000;

export type SuperviseOptions<T> = {
  run: () => Promise<T>;
  backoffMs?: number;
  maxRestarts?: number;
  progress?: MigrationProgress;
  sleep?: Sleep;
};

const errorName = (error: unknown): string => (error instanceof Error ? error.name : typeof error);

/**
 * Keeps the migration alive: whenever a run rejects, waits a fixed backoff and
 * starts a fresh run, which picks up from the stored checkpoint. Resolves with
 * the first run that resolves; without `maxRestarts` it never gives up.
 */
export const superviseMigration = async <T>(options: SuperviseOptions<T>): Promise<T> => {
  const { run, progress } = options;
  const backoffMs = options.backoffMs ?? defaultRestartBackoffMs;

  return retry(run, {
    retries: options.maxRestarts ?? Number.POSITIVE_INFINITY,
    delayMs: backoffMs,
    sleep: options.sleep,
    onRetry: ({ attempt, delayMs, error }) => {
      const message = toErrorMessage(error);
      progress?.markRestarting(message);
      console.error(JSON.stringify({
        event: "migration.restart_scheduled",
        attempt,
        delayMs,
        name: errorName(error),
        message
      }));
    },
    onGiveUp: ({ attempt, error }) => {
      console.error(JSON.stringify({
        event: "migration.gave_up",
        attempts: attempt,
        name: errorName(error),
        message: toErrorMessage(error)
      }));
    }
  });
};
