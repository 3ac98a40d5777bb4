import { MongoClient, type Collection } from "mongodb";
import { type Checkpoint, parsePersistedCheckpoint } from "../../core/checkpoint/checkpoint";
import type { CheckpointStore } from "../../ports/CheckpointStore";

export type CheckpointDoc = {
  _id: string;
  last_page: number;
  last_item_id: number | null;
  updatedAt: Date;
};

/**
 * Mongo-backed checkpoint: one document per migration, replaced on every save
 * with a journaled majority write.
 */
export class MongoCheckpointStore implements CheckpointStore {
  private client?: MongoClient;
  // shared by concurrent callers (worker and status endpoint) so only one client is ever opened
  private connecting?: Promise<Collection<CheckpointDoc>>;

  constructor(
    private readonly mongoUri: string,
    private readonly checkpointId = "image-url-migration",
    private readonly dbName = "catalog_migration",
    private readonly collectionName = "checkpoints"
  ) {}

  private getCollection(): Promise<Collection<CheckpointDoc>> {
    this.connecting ??= this.connect();
    return this.connecting;
  }

  private async connect(): Promise<Collection<CheckpointDoc>> {
    const client = new MongoClient(this.mongoUri);
    this.client = client;
    try {
      await client.connect();
    } catch (err) {
      if (this.client === client) {
        this.client = undefined;
        this.connecting = undefined;
      }
      await client.close().catch((closeErr: unknown) => {
        console.warn(JSON.stringify({ event: "checkpoint_store.close_failed", message: String(closeErr) }));
      });
      throw err;
    }
    return client.db(this.dbName).collection<CheckpointDoc>(this.collectionName);
  }

  async read(): Promise<Checkpoint | null> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: this.checkpointId });
    return parsePersistedCheckpoint(doc);
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    const col = await this.getCollection();
    await col.replaceOne(
      { _id: this.checkpointId },
      {
        last_page: checkpoint.lastPage,
        last_item_id: checkpoint.lastItemId,
        updatedAt: new Date()
      },
      { upsert: true, writeConcern: { w: "majority", journal: true } }
    );
  }

  async close(): Promise<void> {
    const pending = this.connecting;
    this.connecting = undefined;
    // let an in-flight connect settle so its client is the one closed
    await pending?.catch(() => undefined);
    const client = this.client;
    this.client = undefined;
    await client?.close();
  }
}
