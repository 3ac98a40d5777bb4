import { promises as fs } from "fs";
import path from "path";
import { createObjectCsvWriter } from "csv-writer";
import type { AuditLog, AuditRecord } from "../../ports/AuditLog";

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * `image_update_log_YYYYMMDD_HHMMSS.csv`, local time.
 */
export const auditLogFileName = (startedAt: Date): string => {
  const date = `${startedAt.getFullYear()}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}`;
  const time = `${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`;
  return `image_update_log_${date}_${time}.csv`;
};

export const auditLogHeader = [
  { id: "page", title: "page" },
  { id: "itemId", title: "item_id" },
  { id: "itemName", title: "item_name" },
  { id: "oldUrl", title: "old_url" },
  { id: "newUrl", title: "new_url" },
  { id: "status", title: "status" }
];

/**
 * Append-only CSV audit trail, one file per process run. The header row is
 * written together with the first record.
 */
export class CsvAuditLog implements AuditLog {
  private readonly writer;
  private directoryReady = false;

  constructor(readonly filePath: string) {
    this.writer = createObjectCsvWriter({ path: filePath, header: auditLogHeader });
  }

  static inDirectory(directory: string, startedAt: Date = new Date()): CsvAuditLog {
    return new CsvAuditLog(path.join(directory, auditLogFileName(startedAt)));
  }

  async append(record: AuditRecord): Promise<void> {
    if (!this.directoryReady) {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      this.directoryReady = true;
    }
    await this.writer.writeRecords([record]);
  }
}
