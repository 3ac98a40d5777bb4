import { InvalidProductError } from "../../core/catalog/product";
import { CatalogRequestError } from "../../ports/CatalogClient";

export type MigrationFailureCode = "product_unreadable" | "checkpoint_write_failed" | "audit_write_failed";

export type MigrationErrorContext = {
  page: number;
  index?: number;
  itemId?: number;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class MigrationFatalError extends Error {
  readonly code: MigrationFailureCode;
  readonly context: MigrationErrorContext;

  constructor(args: { code: MigrationFailureCode; message: string; context: MigrationErrorContext; cause?: unknown }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "MigrationFatalError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Short detail for `ERROR` / `FAILED` audit rows: the HTTP status when the
 * catalog answered, `timeout` when it did not answer in time, else the message.
 */
export const describeRequestFailure = (reason: unknown): string => {
  if (reason instanceof CatalogRequestError) {
    if (reason.status != null) return String(reason.status);
    if (reason.isTimeout) return "timeout";
  }
  return toErrorMessage(reason);
};

type ProductSkippedLog = {
  event: "migration.product_skipped";
  reason: string;
  page: number;
  index: number;
};

export type ProductFailureDecision =
  | {
      action: "skip";
      log: ProductSkippedLog;
    }
  | {
      action: "fail";
      error: MigrationFatalError;
    };

export const classifyProductFailure = (
  reason: unknown,
  context: Required<Pick<MigrationErrorContext, "page" | "index">>
): ProductFailureDecision => {
  if (reason instanceof InvalidProductError) {
    return {
      action: "skip",
      log: {
        event: "migration.product_skipped",
        reason: reason.message,
        page: context.page,
        index: context.index
      }
    };
  }

  return {
    action: "fail",
    error: new MigrationFatalError({
      code: "product_unreadable",
      message: `Unexpected product read failure at page=${context.page}, index=${context.index}: ${toErrorMessage(reason)}`,
      context,
      cause: reason
    })
  };
};

export const wrapCheckpointFailure = (reason: unknown, context: MigrationErrorContext): MigrationFatalError =>
  new MigrationFatalError({
    code: "checkpoint_write_failed",
    message: `Checkpoint write failed at page=${context.page}${context.itemId != null ? `, itemId=${context.itemId}` : ""}: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });

export const wrapAuditFailure = (reason: unknown, context: MigrationErrorContext): MigrationFatalError =>
  new MigrationFatalError({
    code: "audit_write_failed",
    message: `Audit log write failed at page=${context.page}: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });
