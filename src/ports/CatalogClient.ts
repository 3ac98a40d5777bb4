import type { MetaDataEntry, RawProduct } from "../core/catalog/product";

export type FetchProductsParams = {
  page: number;
  perPage: number;
};

export interface CatalogClient {
  fetchProducts(params: FetchProductsParams): Promise<RawProduct[]>;
  updateProductMetaData(productId: number, metaData: MetaDataEntry[]): Promise<void>;
}

export class CatalogRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly requestUrl: string;

  constructor(args: { message: string; requestUrl: string; status?: number; isTimeout?: boolean; cause?: unknown }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "CatalogRequestError";
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.requestUrl = args.requestUrl;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
