import type http from "http";
import { AnimalHttpClient } from "../../src/infrastructure/animals-api/AnimalHttpClient";
import type { AnimalPayload } from "../../src/core/animal/animal.types";
import { ValidationError } from "../../src/shared/errors/pipeline.errors";
import { createRetryPolicy } from "../../src/shared/retry/retry";
import { silentLogger } from "../support/capture-logger";
import { readBody, sendJson, startServer, type TestServer } from "../support/test-server";

type SeenRequest = {
  method?: string;
  url?: string;
  headers: http.IncomingHttpHeaders;
  body: string;
};

const payload = (id: number): AnimalPayload => ({ id, name: `Animal ${id}`, friends: ["Ann"], born_at: null });

describe("AnimalHttpClient request shape", () => {
  let server: TestServer | undefined;
  let client: AnimalHttpClient | undefined;
  let seen: SeenRequest[];

  const start = async (respond: (req: http.IncomingMessage, res: http.ServerResponse) => void) => {
    server = await startServer((req, res) => {
      void readBody(req).then((body) => {
        seen.push({ method: req.method, url: req.url, headers: req.headers, body });
        respond(req, res);
      });
    });
    return server;
  };

  beforeEach(() => {
    seen = [];
  });

  afterEach(async () => {
    await client?.close();
    await server?.close();
    client = undefined;
    server = undefined;
  });

  it("lists a page with page and per_page query parameters", async () => {
    const { baseUrl } = await start((_req, res) => sendJson(res, 200, { page: 2, total_pages: 4, items: [{ id: 3 }] }));
    client = new AnimalHttpClient(`${baseUrl}/`, { logger: silentLogger() });

    const page = await client.listPage(2, 25);

    expect(page).toEqual({ page: 2, total_pages: 4, items: [{ id: 3 }] });
    expect(seen).toHaveLength(1);
    expect(seen[0]?.method).toBe("GET");
    expect(seen[0]?.url).toBe("/animals/v1/animals?page=2&per_page=25");
    expect(seen[0]?.headers.accept).toBe("application/json");
  });

  it("fetches details by id", async () => {
    const { baseUrl } = await start((_req, res) => sendJson(res, 200, { id: 11, name: "Rex", friends: "Ann" }));
    client = new AnimalHttpClient(baseUrl, { logger: silentLogger() });

    await expect(client.fetchDetail(11)).resolves.toEqual({ id: 11, name: "Rex", friends: "Ann" });
    expect(seen[0]?.url).toBe("/animals/v1/animals/11");
  });

  it("posts a JSON array to the home endpoint", async () => {
    const { baseUrl } = await start((_req, res) => sendJson(res, 200, { message: "Helped 2 find home" }));
    client = new AnimalHttpClient(baseUrl, { logger: silentLogger() });

    const result = await client.loadBatch([payload(1), { ...payload(2), born_at: "2020-01-01T00:00:00Z" }]);

    expect(result).toEqual({ loaded: 2, response: { message: "Helped 2 find home" } });
    expect(seen[0]?.method).toBe("POST");
    expect(seen[0]?.url).toBe("/animals/v1/home");
    expect(seen[0]?.headers["content-type"]).toBe("application/json");
    expect(JSON.parse(seen[0]?.body ?? "")).toEqual([
      { id: 1, name: "Animal 1", friends: ["Ann"], born_at: null },
      { id: 2, name: "Animal 2", friends: ["Ann"], born_at: "2020-01-01T00:00:00Z" }
    ]);
  });

  it("rejects batches above 100 records before sending anything", async () => {
    const { baseUrl } = await start((_req, res) => sendJson(res, 200, {}));
    client = new AnimalHttpClient(baseUrl, { logger: silentLogger() });

    const batch = Array.from({ length: 101 }, (_, index) => payload(index + 1));
    const failure = client.loadBatch(batch);

    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toThrow("Cannot load more than 100 animals at once. Got 101");
    expect(seen).toHaveLength(0);
  });

  it("accepts exactly 100 records", async () => {
    const { baseUrl } = await start((_req, res) => sendJson(res, 200, { message: "ok" }));
    client = new AnimalHttpClient(baseUrl, { logger: silentLogger() });

    const batch = Array.from({ length: 100 }, (_, index) => payload(index + 1));

    await expect(client.loadBatch(batch)).resolves.toEqual({ loaded: 100, response: { message: "ok" } });
    expect(JSON.parse(seen[0]?.body ?? "")).toHaveLength(100);
  });

  it("does not send an empty batch", async () => {
    const { baseUrl } = await start((_req, res) => sendJson(res, 200, {}));
    client = new AnimalHttpClient(baseUrl, { logger: silentLogger() });

    await expect(client.loadBatch([])).resolves.toEqual({ loaded: 0, response: undefined });
    expect(seen).toHaveLength(0);
  });

  it("treats any 200 from the docs page as healthy", async () => {
    const { baseUrl } = await start((_req, res) => {
      res.writeHead(200, { "content-type": "text/html" });
      res.end("<html>docs</html>");
    });
    client = new AnimalHttpClient(baseUrl, { logger: silentLogger() });

    await expect(client.healthCheck()).resolves.toBe(true);
    expect(seen[0]?.url).toBe("/docs");
  });

  it("retries a transient docs failure before reporting healthy", async () => {
    let calls = 0;
    const { baseUrl } = await start((_req, res) => {
      calls += 1;
      res.writeHead(calls === 1 ? 503 : 200);
      res.end();
    });
    client = new AnimalHttpClient(baseUrl, { logger: silentLogger(), sleep: async () => undefined });

    await expect(client.healthCheck()).resolves.toBe(true);
    expect(seen).toHaveLength(2);
  });

  it("reports unhealthy once the retry budget is spent", async () => {
    const { baseUrl } = await start((_req, res) => {
      res.writeHead(503);
      res.end();
    });
    client = new AnimalHttpClient(baseUrl, {
      logger: silentLogger(),
      retryPolicy: createRetryPolicy({ maxAttempts: 2 }),
      sleep: async () => undefined
    });

    await expect(client.healthCheck()).resolves.toBe(false);
    expect(seen).toHaveLength(2);
  });

  it("reacquires the connection pool lazily after close", async () => {
    const { baseUrl } = await start((_req, res) => sendJson(res, 200, { items: [] }));
    client = new AnimalHttpClient(baseUrl, { logger: silentLogger() });

    await client.open();
    await client.close();

    await expect(client.listPage(1, 10)).resolves.toEqual({ items: [] });
  });

  it("keeps at most maxConnections requests in flight", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    server = await startServer((req, res) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      const id = Number(req.url?.split("/").pop());
      setTimeout(() => {
        inFlight -= 1;
        sendJson(res, 200, { id, name: `Animal ${id}` });
      }, 40);
    });
    client = new AnimalHttpClient(server.baseUrl, { logger: silentLogger(), maxConnections: 2 });

    const ids = [1, 2, 3, 4, 5, 6];
    const animals = await Promise.all(ids.map((id) => client?.fetchDetail(id)));

    expect(animals.map((animal) => animal?.id)).toEqual(ids);
    expect(maxInFlight).toBe(2);
  });
});
