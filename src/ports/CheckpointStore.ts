import type { Checkpoint } from "../core/checkpoint/checkpoint";

/**
 * Single durable cursor for the migration.
 * `read` resolves null when nothing usable is stored; `save` resolves only once
 * the checkpoint is durable.
 */
export interface CheckpointStore {
  read(): Promise<Checkpoint | null>;
  save(checkpoint: Checkpoint): Promise<void>;
}
