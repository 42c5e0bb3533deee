import { runPipeline } from "../../src/application/run-pipeline/runPipeline.usecase";
import { AnimalTransformer } from "../../src/core/animal/transformAnimal";
import { ClientRequestError } from "../../src/shared/errors/pipeline.errors";
import { createCapturingLogger, silentLogger } from "../support/capture-logger";
import { createFakeAnimalClient, idPages } from "../support/fake-animal-client";

describe("runPipeline resilience", () => {
  it("stops producing when a page cannot be listed and keeps the work already queued", async () => {
    const fake = createFakeAnimalClient({
      pages: idPages(30, 10),
      listPage: (page) => (page === 2 ? Promise.reject(new Error("down")) : undefined)
    });
    const { logger, events } = createCapturingLogger();

    const stats = await runPipeline({ client: fake.client, logger });

    expect(fake.listCalls).toEqual([1, 2]);
    expect(stats).toMatchObject({
      state: "completed_with_errors",
      pagesProduced: 1,
      loaded: 10,
      errors: ["Failed to list page 2: down"]
    });
    expect(events("producer.failed")).toEqual([expect.objectContaining({ page: 2, reason: "down" })]);
  });

  it("records failed batch loads and continues with the next page", async () => {
    const fake = createFakeAnimalClient({
      pages: [[{ id: 1 }], [{ id: 2 }]],
      onLoad: async (animals) => {
        if (animals[0]?.id === 2) {
          throw new ClientRequestError({ message: "Client error 422: POST /animals/v1/home", status: 422 });
        }
      }
    });

    const stats = await runPipeline({ client: fake.client, config: { concurrency: 1 }, logger: silentLogger() });

    expect(stats).toMatchObject({
      state: "completed_with_errors",
      fetched: 2,
      transformed: 2,
      loaded: 1,
      batchesProcessed: 1,
      errors: ["Failed to load batch of 1 animals from page 2: Client error 422: POST /animals/v1/home"]
    });
  });

  it("records invalid list items and processes the rest of the page", async () => {
    const fake = createFakeAnimalClient({ pages: [[{ id: 1 }, { name: "x" }]] });

    const stats = await runPipeline({ client: fake.client, logger: silentLogger() });

    expect(stats.errors).toEqual(["Invalid item on page 1 at index 1: Invalid animal: missing id"]);
    expect(stats).toMatchObject({ pagesProduced: 1, fetched: 1, loaded: 1 });
    expect(fake.detailCalls).toEqual([1]);
  });

  it("skips pages whose items are all invalid without stopping", async () => {
    const fake = createFakeAnimalClient({ pages: [[{ name: "x" }], [{ id: 2 }]] });

    const stats = await runPipeline({ client: fake.client, logger: silentLogger() });

    expect(fake.listCalls).toEqual([1, 2, 3]);
    expect(stats).toMatchObject({ pagesProduced: 2, fetched: 1, loaded: 1 });
    expect(stats.errors).toEqual(["Invalid item on page 1 at index 0: Invalid animal: missing id"]);
  });

  it("records animals that fail validation and loads the others", async () => {
    const fake = createFakeAnimalClient({
      pages: [[{ id: 4 }, { id: 5 }]],
      detail: async (id) => (id === 5 ? { id } : { id, name: `Animal ${id}` })
    });

    const stats = await runPipeline({ client: fake.client, logger: silentLogger() });

    expect(stats).toMatchObject({ fetched: 2, transformed: 1, loaded: 1 });
    expect(stats.errors).toEqual(["Failed to transform animal 5: Invalid animal: name: missing name"]);
    expect(fake.loadedBatches).toEqual([[{ id: 4, name: "Animal 4", friends: [], born_at: null }]]);
  });

  it("records a client that cannot be opened and still closes it", async () => {
    const fake = createFakeAnimalClient({
      pages: idPages(3, 3),
      open: async () => {
        throw new Error("no pool");
      }
    });

    const stats = await runPipeline({ client: fake.client, logger: silentLogger() });

    expect(stats).toMatchObject({ state: "completed_with_errors", pagesProduced: 0, errors: ["Failed to open client: no pool"] });
    expect(fake.listCalls).toEqual([]);
    expect(fake.closeCalls()).toBe(1);
  });

  it("records a client that cannot be closed", async () => {
    const fake = createFakeAnimalClient({ pages: idPages(1, 1) });
    fake.client.close = async () => {
      throw new Error("still busy");
    };

    const stats = await runPipeline({ client: fake.client, logger: silentLogger() });

    expect(stats).toMatchObject({ state: "completed_with_errors", loaded: 1, errors: ["Failed to close client: still busy"] });
  });

  it("finishes with errors instead of hanging when every consumer fails", async () => {
    const fake = createFakeAnimalClient({ pages: idPages(100, 1) });
    const { logger, events } = createCapturingLogger();

    const stats = await runPipeline({
      client: fake.client,
      config: { concurrency: 2 },
      logger,
      createTransformer: () => {
        throw new Error("no transformer");
      }
    });

    expect(stats).toMatchObject({
      state: "completed_with_errors",
      loaded: 0,
      errors: ["Consumer 0 failed: no transformer", "Consumer 1 failed: no transformer"]
    });
    expect(events("consumer.failed")).toHaveLength(2);
    expect(events("producer.cancelled")).toHaveLength(1);
    expect(fake.closeCalls()).toBe(1);
  });

  it("keeps loading with the surviving consumers when one fails", async () => {
    const fake = createFakeAnimalClient({ pages: idPages(20, 2) });

    const stats = await runPipeline({
      client: fake.client,
      config: { concurrency: 2 },
      logger: silentLogger(),
      createTransformer: (workerId, workerLogger) => {
        if (workerId === 0) throw new Error("no transformer");
        return new AnimalTransformer(workerLogger);
      }
    });

    expect(stats).toMatchObject({
      state: "completed_with_errors",
      loaded: 20,
      errors: ["Consumer 0 failed: no transformer"]
    });
  });
});
