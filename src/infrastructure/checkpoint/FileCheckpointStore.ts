import { promises as fs } from "fs";
import path from "path";
import {
  type Checkpoint,
  parsePersistedCheckpoint,
  toPersistedCheckpoint
} from "../../core/checkpoint/checkpoint";
import type { CheckpointStore } from "../../ports/CheckpointStore";

/**
 * JSON file checkpoint, rewritten whole on every save.
 *
 * Saves go to a sibling temp file that is fsynced and renamed over the target,
 * so a reader (the status endpoint) sees either the previous or the new
 * checkpoint, never a torn write.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly tmpPath: string;

  constructor(private readonly filePath: string) {
    this.tmpPath = `${filePath}.tmp`;
  }

  async read(): Promise<Checkpoint | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch {
      return null;
    }

    try {
      return parsePersistedCheckpoint(JSON.parse(content));
    } catch {
      return null;
    }
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const handle = await fs.open(this.tmpPath, "w");
    try {
      await handle.writeFile(JSON.stringify(toPersistedCheckpoint(checkpoint)), "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }

    await fs.rename(this.tmpPath, this.filePath);
  }
}
