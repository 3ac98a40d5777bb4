/**
 * Durable resume cursor.
 *
 * `{ lastPage: P, lastItemId: X }` means every page before P is done and every
 * item on P with id <= X has been updated. `lastItemId: null` marks the whole
 * page P as walked.
 */
export type Checkpoint = {
  lastPage: number;
  lastItemId: number | null;
};

export type PersistedCheckpoint = {
  last_page: number;
  last_item_id: number | null;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isSafeInteger(value) && value > 0;

export const toPersistedCheckpoint = (checkpoint: Checkpoint): PersistedCheckpoint => ({
  last_page: checkpoint.lastPage,
  last_item_id: checkpoint.lastItemId
});

/**
 * Returns null for anything that is not a well-formed persisted checkpoint.
 */
export const parsePersistedCheckpoint = (value: unknown): Checkpoint | null => {
  if (!isRecord(value)) return null;

  const lastPage = value.last_page;
  if (!isPositiveInteger(lastPage)) return null;

  const lastItemId = value.last_item_id;
  if (lastItemId == null) return { lastPage, lastItemId: null };
  if (!isPositiveInteger(lastItemId)) return null;

  return { lastPage, lastItemId };
};

/**
 * Lexicographic order on (lastPage, lastItemId); a null item id sorts after
 * every item on the same page.
 */
export const compareCheckpoints = (a: Checkpoint, b: Checkpoint): number => {
  if (a.lastPage !== b.lastPage) return a.lastPage - b.lastPage;
  if (a.lastItemId === b.lastItemId) return 0;
  if (a.lastItemId === null) return 1;
  if (b.lastItemId === null) return -1;
  return a.lastItemId - b.lastItemId;
};
