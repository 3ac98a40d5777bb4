import type { Checkpoint } from "../../core/checkpoint/checkpoint";
import type { CheckpointStore } from "../../ports/CheckpointStore";

export type ResumePoint = {
  page: number;
  // items on `page` with an id <= this were updated by an earlier run
  skipThroughItemId: number | null;
  checkpoint: Checkpoint;
};

/**
 * Stored checkpoint, or `{ lastPage: startPage, lastItemId: null }` when there is none.
 */
export const loadCheckpoint = async (store: CheckpointStore, startPage: number): Promise<Checkpoint> =>
  (await store.read()) ?? { lastPage: startPage, lastItemId: null };

/**
 * A checkpoint resumes at its own page: `{ P, null }` re-walks page P so items
 * whose update failed there are retried; already migrated items come back as
 * unchanged. A configured start page past the checkpoint wins and disables the
 * item filter.
 */
export const resolveResumePoint = (checkpoint: Checkpoint, startPage: number): ResumePoint => {
  if (checkpoint.lastPage < startPage) {
    return { page: startPage, skipThroughItemId: null, checkpoint };
  }
  return { page: checkpoint.lastPage, skipThroughItemId: checkpoint.lastItemId, checkpoint };
};
