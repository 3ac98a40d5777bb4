import type { Checkpoint } from "../../core/checkpoint/checkpoint";

export type RunCounters = {
  checked: number;
  updated: number;
  skipped: number;
  failed: number;
  pagesProcessed: number;
  pageErrors: number;
};

export type MigrationState = "idle" | "running" | "restarting" | "completed";

export type MigrationProgressSnapshot = Readonly<{
  state: MigrationState;
  run: number;
  resumedFrom: Checkpoint | null;
  currentPage: number | null;
  counters: Readonly<RunCounters>;
  lastError: string | null;
  updatedAt: string;
}>;

export type MigrationProgress = ReturnType<typeof createMigrationProgress>;

const emptyCounters = (): RunCounters => ({
  checked: 0,
  updated: 0,
  skipped: 0,
  failed: 0,
  pagesProcessed: 0,
  pageErrors: 0
});

/**
 * Progress shared between the migration worker and the status endpoint.
 *
 * The worker is the only writer. Every change swaps in a new frozen snapshot,
 * so a reader holding a snapshot never observes it half-updated.
 */
export const createMigrationProgress = (now: () => Date = () => new Date()) => {
  const freeze = (snapshot: MigrationProgressSnapshot): MigrationProgressSnapshot => Object.freeze(snapshot);

  let current = freeze({
    state: "idle",
    run: 0,
    resumedFrom: null,
    currentPage: null,
    counters: Object.freeze(emptyCounters()),
    lastError: null,
    updatedAt: now().toISOString()
  });

  const swap = (patch: Partial<Omit<MigrationProgressSnapshot, "updatedAt">>) => {
    current = freeze({ ...current, ...patch, updatedAt: now().toISOString() });
  };

  const count = (key: keyof RunCounters) => {
    swap({ counters: Object.freeze({ ...current.counters, [key]: current.counters[key] + 1 }) });
  };

  return {
    snapshot: (): MigrationProgressSnapshot => current,
    beginRun: (resumedFrom: Checkpoint) => {
      swap({
        state: "running",
        run: current.run + 1,
        resumedFrom,
        currentPage: null,
        counters: Object.freeze(emptyCounters())
      });
    },
    enterPage: (page: number) => swap({ currentPage: page }),
    addChecked: () => count("checked"),
    addUpdated: () => count("updated"),
    addSkipped: () => count("skipped"),
    addFailed: () => count("failed"),
    addProcessedPage: () => count("pagesProcessed"),
    addPageError: () => count("pageErrors"),
    markRestarting: (reason: string) => swap({ state: "restarting", lastError: reason }),
    markCompleted: () => swap({ state: "completed", currentPage: null })
  };
};
