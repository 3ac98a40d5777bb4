import { planImageUrlUpdate } from "../../core/catalog/planImageUrlUpdate";
import { type CatalogProduct, parseCatalogProduct, type RawProduct } from "../../core/catalog/product";
import type { Checkpoint } from "../../core/checkpoint/checkpoint";
import type { AuditLog, AuditRecord } from "../../ports/AuditLog";
import type { CatalogClient } from "../../ports/CatalogClient";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import { sleep as defaultSleep, type Sleep } from "../../shared/retry/retry";
import type { MigrationConfigInput } from "./migration.config";
import { resolveMigrationConfig } from "./migration.config";
import {
  classifyProductFailure,
  describeRequestFailure,
  wrapAuditFailure,
  wrapCheckpointFailure
} from "./migration.error-handler";
import { createMigrationProgress, type MigrationProgress, type RunCounters } from "./migration.progress";
import { loadCheckpoint, resolveResumePoint } from "./resume";

export type MigrateImagesDeps = {
  client: CatalogClient;
  checkpoints: CheckpointStore;
  audit: AuditLog;
  config: MigrationConfigInput;
  progress?: MigrationProgress;
  sleep?: Sleep;
};

export type MigrationRunSummary = RunCounters & {
  startPage: number;
  endPage: number;
  resumedFrom: Checkpoint;
};

const pageRecord = (page: number, status: AuditRecord["status"]): AuditRecord => ({
  page,
  itemId: "-",
  itemName: "-",
  oldUrl: "-",
  newUrl: "-",
  status
});

/**
 * Walks catalog pages from the stored checkpoint to `endPage`, rewriting image
 * URLs one product at a time.
 *
 * Fetch and update failures are written to the audit log and the walk goes on;
 * only checkpoint and audit write failures escape, for the supervisor to
 * restart from the last checkpoint.
 */
export const migrateImages = async (deps: MigrateImagesDeps): Promise<MigrationRunSummary> => {
  const { client, checkpoints, audit } = deps;
  const config = resolveMigrationConfig(deps.config);
  const progress = deps.progress ?? createMigrationProgress();
  const sleep = deps.sleep ?? defaultSleep;

  const saveCheckpoint = async (checkpoint: Checkpoint) => {
    try {
      await checkpoints.save(checkpoint);
    } catch (error) {
      throw wrapCheckpointFailure(error, {
        page: checkpoint.lastPage,
        itemId: checkpoint.lastItemId ?? undefined
      });
    }
  };

  const appendAudit = async (record: AuditRecord) => {
    try {
      await audit.append(record);
    } catch (error) {
      throw wrapAuditFailure(error, {
        page: record.page,
        itemId: typeof record.itemId === "number" ? record.itemId : undefined
      });
    }
  };

  const checkpoint = await loadCheckpoint(checkpoints, config.startPage);
  const resume = resolveResumePoint(checkpoint, config.startPage);
  progress.beginRun(checkpoint);

  console.log(JSON.stringify({
    event: "migration.started",
    resumePage: resume.page,
    skipThroughItemId: resume.skipThroughItemId,
    endPage: config.endPage,
    pageSize: config.pageSize
  }));

  for (let page = resume.page; page <= config.endPage; page += 1) {
    progress.enterPage(page);

    let rawProducts: RawProduct[];
    try {
      rawProducts = await client.fetchProducts({ page, perPage: config.pageSize });
    } catch (error) {
      const detail = describeRequestFailure(error);
      progress.addPageError();
      console.warn(JSON.stringify({ event: "migration.page_failed", page, detail }));
      await appendAudit(pageRecord(page, `ERROR ${detail}`));
      await sleep(config.pageDelayMs);
      continue;
    }

    if (rawProducts.length === 0) {
      console.warn(JSON.stringify({ event: "migration.page_empty", page }));
      await appendAudit(pageRecord(page, "EMPTY PAGE"));
      await saveCheckpoint({ lastPage: page, lastItemId: null });
      progress.addProcessedPage();
      await sleep(config.pageDelayMs);
      continue;
    }

    const skipThroughItemId = page === resume.page ? resume.skipThroughItemId : null;
    // once an update on this page fails, item checkpoints stop so a restart retries it
    let itemCheckpointsHeld = false;

    for (const [index, raw] of rawProducts.entries()) {
      let product: CatalogProduct;
      try {
        product = parseCatalogProduct(raw);
      } catch (reason) {
        const decision = classifyProductFailure(reason, { page, index });
        if (decision.action === "fail") throw decision.error;
        progress.addSkipped();
        console.warn(JSON.stringify(decision.log));
        continue;
      }

      if (skipThroughItemId != null && product.id <= skipThroughItemId) continue;

      progress.addChecked();
      const plan = planImageUrlUpdate(product, { metaKey: config.metaKey, rule: config.rewriteRule });
      if (plan.action === "skip") {
        progress.addSkipped();
        continue;
      }

      progress.addUpdated();
      for (const change of plan.changes) {
        await appendAudit({
          page,
          itemId: product.id,
          itemName: product.name,
          oldUrl: change.oldUrl,
          newUrl: change.newUrl,
          status: "UPDATED"
        });
      }

      let updateFailure: string | undefined;
      try {
        await client.updateProductMetaData(product.id, plan.metaData);
      } catch (error) {
        updateFailure = describeRequestFailure(error);
      }

      if (updateFailure === undefined) {
        console.log(JSON.stringify({
          event: "migration.product_updated",
          page,
          productId: product.id,
          changed: plan.changes.length
        }));
        if (!itemCheckpointsHeld) {
          await saveCheckpoint({ lastPage: page, lastItemId: product.id });
        }
      } else {
        progress.addFailed();
        itemCheckpointsHeld = true;
        console.warn(JSON.stringify({
          event: "migration.product_update_failed",
          page,
          productId: product.id,
          detail: updateFailure
        }));
        await appendAudit({
          page,
          itemId: product.id,
          itemName: product.name,
          oldUrl: "-",
          newUrl: "-",
          status: `FAILED ${updateFailure}`
        });
      }

      await sleep(config.itemDelayMs);
    }

    await saveCheckpoint({ lastPage: page, lastItemId: null });
    progress.addProcessedPage();
    await sleep(config.pageDelayMs);
  }

  progress.markCompleted();
  const summary: MigrationRunSummary = {
    ...progress.snapshot().counters,
    startPage: resume.page,
    endPage: config.endPage,
    resumedFrom: checkpoint
  };
  console.log(JSON.stringify({ event: "migration.completed", ...summary }));
  return summary;
};
