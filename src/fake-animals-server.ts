import http from "http";
import { URL } from "url";
import { rootLogger } from "./shared/logging/logger";

/**
 * Fake animals service for local runs and e2e tests.
 * - GET  /animals/v1/animals?page=&per_page=   -> { page, total_pages, items: [{ id, name }] }
 * - GET  /animals/v1/animals/:id               -> detail with mixed friends/born_at encodings
 * - POST /animals/v1/home                      -> accepts up to 100 normalized animals
 * - GET  /docs                                 -> liveness page
 */
export type FakeAnimalsServerOptions = {
  total?: number;
  /** Answer 503 to the first request for every path, so each call needs one retry. */
  failFirstRequestPerPath?: boolean;
  /** Ids whose detail endpoint always answers 404. */
  missingIds?: readonly number[];
};

export type FakeAnimalsServer = {
  baseUrl: string;
  loadedBatches: unknown[][];
  requestCount: () => number;
  close: () => Promise<void>;
};

const FRIEND_NAMES = ["Ann", "Bob", "Cid", "Dee", "Eve"];

export const makeFakeAnimal = (id: number): Record<string, unknown> => {
  const first = FRIEND_NAMES[id % FRIEND_NAMES.length];
  const second = FRIEND_NAMES[(id + 1) % FRIEND_NAMES.length];
  const friends = [` ${first}, ${second} ,,`, [first, ` ${second} `], ""][id % 3];
  const day = String((id % 28) + 1).padStart(2, "0");
  const bornAt = [null, `2020-01-${day}T10:00:00+02:00`, Date.UTC(2019, 5, id % 28 + 1), `2018/03/${day}`][id % 4];
  return { id, name: `Animal ${id}`, friends, born_at: bornAt, species: "fox" };
};

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });

const isLoadable = (value: unknown): boolean => {
  if (typeof value !== "object" || value === null) return false;
  const friends = "friends" in value ? value.friends : undefined;
  const bornAt = "born_at" in value ? value.born_at : undefined;
  return (
    Array.isArray(friends) &&
    friends.every((friend) => typeof friend === "string") &&
    (bornAt === null || typeof bornAt === "string")
  );
};

export const createFakeAnimalsServer = (options: FakeAnimalsServerOptions = {}) => {
  const total = options.total ?? 25;
  const missing = new Set(options.missingIds ?? []);
  const seenPaths = new Set<string>();
  const loadedBatches: unknown[][] = [];
  let requests = 0;

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    requests += 1;
    const url = new URL(req.url ?? "/", "http://localhost");
    const key = `${req.method ?? "GET"} ${url.pathname}${url.search}`;
    if (options.failFirstRequestPerPath && !seenPaths.has(key)) {
      seenPaths.add(key);
      return sendJson(res, 503, { error: "unavailable" });
    }

    if (req.method === "GET" && url.pathname === "/docs") {
      res.writeHead(200, { "content-type": "text/html" });
      return res.end("<html><body>animals api</body></html>");
    }

    if (req.method === "GET" && url.pathname === "/animals/v1/animals") {
      const page = Number(url.searchParams.get("page") ?? "1");
      const perPage = Number(url.searchParams.get("per_page") ?? "10");
      const start = (page - 1) * perPage + 1;
      const end = Math.min(total, page * perPage);
      const items: Array<{ id: number; name: string }> = [];
      for (let id = start; id <= end; id += 1) items.push({ id, name: `Animal ${id}` });
      return sendJson(res, 200, { page, total_pages: Math.ceil(total / perPage), items });
    }

    const detail = /^\/animals\/v1\/animals\/(\d+)$/.exec(url.pathname);
    if (req.method === "GET" && detail) {
      const id = Number(detail[1]);
      if (id < 1 || id > total || missing.has(id)) return sendJson(res, 404, { detail: "Not Found" });
      return sendJson(res, 200, makeFakeAnimal(id));
    }

    if (req.method === "POST" && url.pathname === "/animals/v1/home") {
      const body: unknown = JSON.parse(await readBody(req));
      if (!Array.isArray(body) || body.length > 100) return sendJson(res, 400, { detail: "invalid batch" });
      if (!body.every(isLoadable)) return sendJson(res, 422, { detail: "unprocessable animal" });
      loadedBatches.push(body);
      return sendJson(res, 200, { message: `Helped ${body.length} find home` });
    }

    return sendJson(res, 404, { detail: "Not Found" });
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      rootLogger.error({ event: "fake_server.failed", err }, "fake animals server request failed");
      sendJson(res, 500, { error: "internal" });
    });
  });

  return { server, loadedBatches, requestCount: () => requests };
};

export const startFakeAnimalsServer = async (
  options: FakeAnimalsServerOptions = {},
  port = 0
): Promise<FakeAnimalsServer> => {
  const { server, loadedBatches, requestCount } = createFakeAnimalsServer(options);
  await new Promise<void>((resolve) => {
    server.listen(port, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  const boundPort = typeof address === "object" && address !== null ? address.port : port;
  return {
    baseUrl: `http://127.0.0.1:${boundPort}`,
    loadedBatches,
    requestCount,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_ANIMALS_PORT ?? 3123);
  void startFakeAnimalsServer({ total: Number(process.env.FAKE_ANIMALS_TOTAL ?? 250) }, port).then((fake) => {
    rootLogger.info({ event: "fake_server.listening", baseUrl: fake.baseUrl }, "fake animals server listening");
  });
}
