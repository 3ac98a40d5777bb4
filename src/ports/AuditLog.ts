export type AuditStatus = "UPDATED" | "EMPTY PAGE" | `FAILED ${string}` | `ERROR ${string}`;

export type AuditRecord = {
  page: number;
  itemId: number | "-";
  itemName: string;
  oldUrl: string;
  newUrl: string;
  status: AuditStatus;
};

export interface AuditLog {
  append(record: AuditRecord): Promise<void>;
}
