import http from "http";

/**
 * In-memory stand-in for the WooCommerce products collection.
 * - GET  <basePath>/products?per_page=..&page=..
 * - PUT  <basePath>/products/:id   body { meta_data: [...] }
 *
 * Pages listed in `failingPages` answer 500, ids in `failingUpdates` reject
 * their PUT with 500. Requests without the expected Basic credentials get 401.
 */
export type FakeProduct = {
  id: number;
  name: string;
  meta_data: Array<{ id?: number; key: string; value: unknown }>;
};

export type FakeCatalogOptions = {
  products: FakeProduct[];
  basePath?: string;
  credentials?: { consumerKey: string; consumerSecret: string };
  failingPages?: number[];
  failingUpdates?: number[];
};

export type FakeCatalog = {
  server: http.Server;
  products: Map<number, FakeProduct>;
  requests: Array<{ method: string; path: string }>;
  listen: (port?: number) => Promise<string>;
  close: () => Promise<void>;
};

export const makeFakeProduct = (id: number, urls: string[] = [`https://static.recar.lt/images/${id}/1.jpg`]): FakeProduct => ({
  id,
  name: `Product ${id}`,
  meta_data: [
    { id: id * 10, key: "_sku", value: `SKU-${id}` },
    { id: id * 10 + 1, key: "product_images_url", value: JSON.stringify(urls) }
  ]
});

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

export const createFakeCatalogServer = (options: FakeCatalogOptions): FakeCatalog => {
  const basePath = options.basePath ?? "/wp-json/wc/v3";
  const products = new Map(options.products.map((product) => [product.id, product]));
  const failingPages = new Set(options.failingPages ?? []);
  const failingUpdates = new Set(options.failingUpdates ?? []);
  const requests: FakeCatalog["requests"] = [];
  const expectedAuth = options.credentials
    ? `Basic ${Buffer.from(`${options.credentials.consumerKey}:${options.credentials.consumerSecret}`).toString("base64")}`
    : undefined;

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    requests.push({ method, path: `${url.pathname}${url.search}` });

    if (expectedAuth && req.headers.authorization !== expectedAuth) {
      return sendJson(res, 401, { code: "woocommerce_rest_cannot_view" });
    }

    const collection = `${basePath}/products`;
    if (method === "GET" && url.pathname === collection) {
      const page = Number(url.searchParams.get("page") ?? "1");
      const perPage = Number(url.searchParams.get("per_page") ?? "10");
      if (failingPages.has(page)) {
        return sendJson(res, 500, { code: "internal_server_error" });
      }

      const sorted = Array.from(products.values()).sort((a, b) => a.id - b.id);
      return sendJson(res, 200, sorted.slice((page - 1) * perPage, page * perPage));
    }

    const match = new RegExp(`^${collection}/(\\d+)$`).exec(url.pathname);
    if (method === "PUT" && match) {
      const id = Number(match[1]);
      const product = products.get(id);
      if (!product) return sendJson(res, 404, { code: "woocommerce_rest_product_invalid_id" });
      if (failingUpdates.has(id)) return sendJson(res, 500, { code: "internal_server_error" });

      const body: unknown = JSON.parse(await readBody(req));
      if (typeof body === "object" && body !== null && "meta_data" in body && Array.isArray(body.meta_data)) {
        product.meta_data = body.meta_data;
      }
      return sendJson(res, 200, product);
    }

    sendJson(res, 404, { code: "rest_no_route" });
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch(() => sendJson(res, 400, { code: "rest_invalid_json" }));
  });

  return {
    server,
    products,
    requests,
    listen: (port = 0) =>
      new Promise<string>((resolve, reject) => {
        server.listen(port, "127.0.0.1", () => {
          const address = server.address();
          if (address === null || typeof address === "string") {
            reject(new Error("fake catalog is not bound to a TCP port"));
            return;
          }
          resolve(`http://127.0.0.1:${address.port}${basePath}`);
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_CATALOG_PORT ?? 3999);
  const total = Number(process.env.FAKE_CATALOG_PRODUCTS ?? 120);
  const products = Array.from({ length: total }, (_, index) => makeFakeProduct(index + 1));
  const fake = createFakeCatalogServer({ products });

  fake.listen(port).then((baseUrl) => {
    console.log(JSON.stringify({ event: "fake_catalog.listening", baseUrl, products: total }));
  }).catch((err: unknown) => {
    console.error(JSON.stringify({ event: "fake_catalog.failed", message: String(err) }));
    process.exit(1);
  });
}
