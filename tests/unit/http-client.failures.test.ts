import http from "http";
import type { AddressInfo } from "net";
import { CatalogRequestError } from "../../src/ports/CatalogClient";
import { WooCommerceHttpClient } from "../../src/infrastructure/woocommerce/WooCommerceHttpClient";

type TestServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

const startServer = async (
  handler: (req: http.IncomingMessage, res: http.ServerResponse) => void
): Promise<TestServer> => {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address() as AddressInfo;
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

const credentials = { consumerKey: "test-key", consumerSecret: "test-secret" };

const captureError = async (promise: Promise<unknown>): Promise<CatalogRequestError> => {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CatalogRequestError) return err;
    throw err;
  }
  throw new Error("expected a CatalogRequestError");
};

describe("WooCommerceHttpClient failures", () => {
  it("reports non-2xx responses with their status and without retrying", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      res.writeHead(500, { "content-type": "application/json" });
      res.end(JSON.stringify({ code: "internal_server_error", message: "do-not-print-this" }));
    });

    const client = new WooCommerceHttpClient(server.baseUrl, credentials);
    const error = await captureError(client.fetchProducts({ page: 7, perPage: 20 }));

    expect(error.message).toBe("Catalog request failed: 500");
    expect(error.status).toBe(500);
    expect(error.isTimeout).toBe(false);
    expect(error.requestUrl).toBe(`${server.baseUrl}/products?per_page=20&page=7`);
    expect(requests).toBe(1);

    await server.close();
  });

  it("reports a rejected update with its status", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(404, { "content-type": "application/json" });
      res.end(JSON.stringify({ code: "woocommerce_rest_product_invalid_id" }));
    });

    const client = new WooCommerceHttpClient(server.baseUrl, credentials);
    const error = await captureError(client.updateProductMetaData(9, []));

    expect(error.message).toBe("Catalog request failed: 404");
    expect(error.status).toBe(404);

    await server.close();
  });

  it("aborts requests that exceed the timeout", async () => {
    const server = await startServer((_req, res) => {
      setTimeout(() => {
        res.writeHead(200, { "content-type": "application/json" });
        res.end(JSON.stringify([]));
      }, 200);
    });

    const client = new WooCommerceHttpClient(server.baseUrl, credentials, 20);
    const error = await captureError(client.fetchProducts({ page: 1, perPage: 1 }));

    expect(error.message).toBe("Catalog request timeout after 20ms");
    expect(error.isTimeout).toBe(true);
    expect(error.status).toBeUndefined();

    await server.close();
  });

  it("wraps transport errors", async () => {
    const server = await startServer((_req, res) => {
      res.end();
    });
    const { baseUrl } = server;
    await server.close();

    const client = new WooCommerceHttpClient(baseUrl, credentials);
    const error = await captureError(client.fetchProducts({ page: 1, perPage: 1 }));

    expect(error.message).toMatch(/^Catalog request failed: /);
    expect(error.status).toBeUndefined();
    expect(error.isTimeout).toBe(false);
  });
});
