import type { MetaDataEntry, RawProduct } from "../../core/catalog/product";
import { CatalogRequestError, type CatalogClient, type FetchProductsParams } from "../../ports/CatalogClient";

export type CatalogCredentials = {
  consumerKey: string;
  consumerSecret: string;
};

const isRecord = (value: unknown): value is RawProduct =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * WooCommerce REST client over native fetch (Node 20).
 *
 * Credentials travel in a Basic authorization header only, so request URLs are
 * safe to put in errors and logs. There is no retry here: a failed call is
 * reported to the caller, which decides whether the page or product is lost.
 */
export class WooCommerceHttpClient implements CatalogClient {
  private readonly authorization: string;

  constructor(
    private readonly baseUrl: string,
    credentials: CatalogCredentials,
    private readonly timeoutMs = 8000
  ) {
    const token = Buffer.from(`${credentials.consumerKey}:${credentials.consumerSecret}`).toString("base64");
    this.authorization = `Basic ${token}`;
  }

  async fetchProducts(params: FetchProductsParams): Promise<RawProduct[]> {
    const url = this.collectionUrl();
    url.searchParams.set("per_page", String(params.perPage));
    url.searchParams.set("page", String(params.page));

    const res = await this.send(url, { method: "GET" });
    const requestUrl = url.toString();

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new CatalogRequestError({ message: "Catalog response is not valid JSON", requestUrl, cause: err });
    }
    if (!Array.isArray(json)) {
      throw new CatalogRequestError({ message: "Catalog response is not an array", requestUrl });
    }
    return json.filter(isRecord);
  }

  async updateProductMetaData(productId: number, metaData: MetaDataEntry[]): Promise<void> {
    const url = this.collectionUrl(String(productId));
    const res = await this.send(url, {
      method: "PUT",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ meta_data: metaData })
    });
    await res.text().catch(() => "");
  }

  private collectionUrl(...segments: string[]): URL {
    const url = new URL(this.baseUrl);
    const base = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
    url.pathname = `${base}${["products", ...segments].join("/")}`;
    return url;
  }

  private async send(url: URL, init: { method: string; headers?: Record<string, string>; body?: string }): Promise<Response> {
    const requestUrl = url.toString();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await fetch(requestUrl, {
        method: init.method,
        body: init.body,
        headers: {
          accept: "application/json",
          authorization: this.authorization,
          ...init.headers
        },
        signal: controller.signal
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new CatalogRequestError({
          message: `Catalog request timeout after ${this.timeoutMs}ms`,
          requestUrl,
          isTimeout: true
        });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new CatalogRequestError({ message: `Catalog request failed: ${reason}`, requestUrl, cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (!res.ok) {
      // drained to release the socket; never surfaced in errors or logs
      await res.text().catch(() => "");
      throw new CatalogRequestError({
        message: `Catalog request failed: ${res.status}`,
        requestUrl,
        status: res.status
      });
    }

    return res;
  }
}
