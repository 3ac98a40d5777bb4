import { migrateImages } from "../../src/application/migrate-images/migrateImages.usecase";
import { MigrationFatalError } from "../../src/application/migrate-images/migration.error-handler";
import type { Checkpoint } from "../../src/core/checkpoint/checkpoint";
import type { MetaDataEntry, RawProduct } from "../../src/core/catalog/product";
import type { AuditLog, AuditRecord } from "../../src/ports/AuditLog";
import { CatalogRequestError, type CatalogClient } from "../../src/ports/CatalogClient";
import type { CheckpointStore } from "../../src/ports/CheckpointStore";

const oldUrl = (id: number) => `https://static.recar.lt/images/${id}/1.jpg`;
const newUrl = (id: number) => `https://static.recar.lt/pictures/${id}/1.webp`;

const product = (id: number): RawProduct => ({
  id,
  name: `Part ${id}`,
  meta_data: [{ id: id * 10, key: "product_images_url", value: JSON.stringify([oldUrl(id)]) }]
});

const serverError = (path: string) =>
  new CatalogRequestError({ message: "Catalog request failed: 500", requestUrl: `http://127.0.0.1${path}`, status: 500 });

/**
 * Catalog that applies updates to its own records, so a second run sees the
 * result of the first.
 */
const createFlakyCatalog = (opts: { products: RawProduct[]; failingPages?: number[]; failingUpdatesOnce?: number[] }) => {
  const records = opts.products.map((raw) => ({ ...raw }));
  const failingPages = new Set(opts.failingPages ?? []);
  const pendingUpdateFailures = new Set(opts.failingUpdatesOnce ?? []);
  const pagesRequested: number[] = [];
  const updated: number[] = [];

  const client: CatalogClient = {
    fetchProducts: async ({ page, perPage }) => {
      pagesRequested.push(page);
      if (failingPages.has(page)) throw serverError(`/products?page=${page}`);
      return records.slice((page - 1) * perPage, page * perPage);
    },
    updateProductMetaData: async (productId: number, metaData: MetaDataEntry[]) => {
      if (pendingUpdateFailures.delete(productId)) throw serverError(`/products/${productId}`);
      const record = records.find((raw) => raw.id === productId);
      if (record) record.meta_data = metaData;
      updated.push(productId);
    }
  };

  return { client, pagesRequested, updated };
};

const createMemoryCheckpoints = (opts: { failOnSave?: number } = {}) => {
  const saved: Checkpoint[] = [];
  let current: Checkpoint | null = null;
  let saves = 0;

  const checkpoints: CheckpointStore = {
    read: async () => current,
    save: async (checkpoint) => {
      saves += 1;
      if (saves === opts.failOnSave) throw new Error("disk full");
      saved.push(checkpoint);
      current = checkpoint;
    }
  };

  return { checkpoints, saved };
};

const createMemoryAudit = (opts: { failing?: boolean } = {}) => {
  const rows: AuditRecord[] = [];
  const audit: AuditLog = {
    append: async (record) => {
      if (opts.failing) throw new Error("read-only file system");
      rows.push(record);
    }
  };
  return { audit, rows };
};

const noSleep = async () => undefined;

describe("migrateImages resilience", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it("records a failed page fetch and moves on to the next page", async () => {
    const products = Array.from({ length: 8 }, (_, index) => product(index + 1));
    const { client, pagesRequested, updated } = createFlakyCatalog({ products, failingPages: [7] });
    const { checkpoints, saved } = createMemoryCheckpoints();
    const { audit, rows } = createMemoryAudit();

    const summary = await migrateImages({
      client,
      checkpoints,
      audit,
      config: { pageSize: 1, startPage: 7, endPage: 8 },
      sleep: noSleep
    });

    expect(pagesRequested).toEqual([7, 8]);
    expect(updated).toEqual([8]);
    expect(rows).toEqual([
      { page: 7, itemId: "-", itemName: "-", oldUrl: "-", newUrl: "-", status: "ERROR 500" },
      { page: 8, itemId: 8, itemName: "Part 8", oldUrl: oldUrl(8), newUrl: newUrl(8), status: "UPDATED" }
    ]);
    expect(saved).toEqual([
      { lastPage: 8, lastItemId: 8 },
      { lastPage: 8, lastItemId: null }
    ]);
    expect(summary).toMatchObject({ pageErrors: 1, pagesProcessed: 1, updated: 1 });
    expect(warnSpy).toHaveBeenCalledWith(JSON.stringify({ event: "migration.page_failed", page: 7, detail: "500" }));
  });

  it("records a failed update, holds item checkpoints and retries the item on the next run", async () => {
    const { client, updated } = createFlakyCatalog({
      products: [product(41), product(42), product(43)],
      failingUpdatesOnce: [42]
    });
    const { checkpoints, saved } = createMemoryCheckpoints();
    const { audit, rows } = createMemoryAudit();
    const config = { pageSize: 3, startPage: 1, endPage: 1 };

    const first = await migrateImages({ client, checkpoints, audit, config, sleep: noSleep });

    expect(updated).toEqual([41, 43]);
    expect(rows.map((row) => [row.itemId, row.status])).toEqual([
      [41, "UPDATED"],
      [42, "UPDATED"],
      [42, "FAILED 500"],
      [43, "UPDATED"]
    ]);
    expect(rows[2]).toEqual({ page: 1, itemId: 42, itemName: "Part 42", oldUrl: "-", newUrl: "-", status: "FAILED 500" });
    expect(saved).toEqual([
      { lastPage: 1, lastItemId: 41 },
      { lastPage: 1, lastItemId: null }
    ]);
    expect(first).toMatchObject({ checked: 3, updated: 3, failed: 1, skipped: 0 });
    expect(warnSpy).toHaveBeenCalledWith(JSON.stringify({
      event: "migration.product_update_failed",
      page: 1,
      productId: 42,
      detail: "500"
    }));

    const second = await migrateImages({ client, checkpoints, audit, config, sleep: noSleep });

    expect(updated).toEqual([41, 43, 42]);
    expect(second).toMatchObject({
      checked: 3,
      updated: 1,
      skipped: 2,
      failed: 0,
      resumedFrom: { lastPage: 1, lastItemId: null }
    });
  });

  it("fails the run when a checkpoint cannot be written and resumes after the last saved item", async () => {
    const products = [1, 2, 3, 4].map(product);
    const { client, updated } = createFlakyCatalog({ products });
    const { checkpoints, saved } = createMemoryCheckpoints({ failOnSave: 2 });
    const { audit } = createMemoryAudit();
    const config = { pageSize: 4, startPage: 1, endPage: 1 };

    const failure = migrateImages({ client, checkpoints, audit, config, sleep: noSleep });
    await expect(failure).rejects.toBeInstanceOf(MigrationFatalError);
    await expect(failure).rejects.toMatchObject({
      code: "checkpoint_write_failed",
      message: "Checkpoint write failed at page=1, itemId=2: disk full",
      context: { page: 1, itemId: 2 }
    });
    expect(saved).toEqual([{ lastPage: 1, lastItemId: 1 }]);
    expect(updated).toEqual([1, 2]);

    const summary = await migrateImages({ client, checkpoints, audit, config, sleep: noSleep });

    expect(updated).toEqual([1, 2, 3, 4]);
    expect(summary).toMatchObject({ checked: 3, updated: 2, skipped: 1, resumedFrom: { lastPage: 1, lastItemId: 1 } });
  });

  it("fails the run when the audit log cannot be written", async () => {
    const { client } = createFlakyCatalog({ products: [product(1)] });
    const { checkpoints } = createMemoryCheckpoints();
    const { audit } = createMemoryAudit({ failing: true });

    await expect(
      migrateImages({ client, checkpoints, audit, config: { pageSize: 1, endPage: 1 }, sleep: noSleep })
    ).rejects.toMatchObject({
      code: "audit_write_failed",
      message: "Audit log write failed at page=1: read-only file system"
    });
  });

  it("propagates a checkpoint store that cannot be read", async () => {
    const { client, pagesRequested } = createFlakyCatalog({ products: [product(1)] });
    const checkpoints: CheckpointStore = {
      read: async () => {
        throw new Error("connect ECONNREFUSED 127.0.0.1:27017");
      },
      save: async () => undefined
    };
    const { audit } = createMemoryAudit();

    await expect(
      migrateImages({ client, checkpoints, audit, config: { pageSize: 1, endPage: 1 }, sleep: noSleep })
    ).rejects.toThrow("connect ECONNREFUSED 127.0.0.1:27017");
    expect(pagesRequested).toEqual([]);
  });
});
