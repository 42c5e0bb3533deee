import { PipelineOrchestrator } from "../../src/application/run-pipeline/runPipeline.usecase";
import { silentLogger } from "../support/capture-logger";
import { createFakeAnimalClient, idPages } from "../support/fake-animal-client";

const settle = () => new Promise<void>((resolve) => setTimeout(resolve, 50));

describe("PipelineOrchestrator concurrency", () => {
  it("loads every animal exactly once across workers and drains fully", async () => {
    const fake = createFakeAnimalClient({ pages: idPages(500, 50), detailDelayMs: 1 });
    const orchestrator = new PipelineOrchestrator({
      client: fake.client,
      config: { concurrency: 5, pageSize: 50 },
      logger: silentLogger()
    });

    const stats = await orchestrator.run();

    const loadedIds = fake.loadedBatches.flat().map((animal) => animal.id);
    expect(new Set(loadedIds).size).toBe(500);
    expect(loadedIds).toHaveLength(500);
    expect(stats).toMatchObject({ state: "completed", pagesProduced: 10, fetched: 500, loaded: 500, errors: [] });
    expect(fake.detailCalls).toHaveLength(500);
    expect(fake.maxInFlightDetails()).toBeLessThanOrEqual(50);
    expect(orchestrator.inspect()).toEqual({ state: "completed", activeConsumers: 0, queuePending: 0 });
  });

  it("caps concurrent detail fetches per worker", async () => {
    const fake = createFakeAnimalClient({ pages: idPages(10, 10), detailDelayMs: 10 });

    await new PipelineOrchestrator({
      client: fake.client,
      config: { concurrency: 1, detailConcurrency: 3 },
      logger: silentLogger()
    }).run();

    expect(fake.maxInFlightDetails()).toBe(3);
    expect(fake.detailCalls).toHaveLength(10);
  });

  it("blocks the producer while the queue is full", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const fake = createFakeAnimalClient({
      pages: idPages(6, 1),
      detail: async (id) => {
        await gate;
        return { id, name: `Animal ${id}` };
      }
    });
    const orchestrator = new PipelineOrchestrator({
      client: fake.client,
      config: { concurrency: 1 },
      logger: silentLogger()
    });

    const running = orchestrator.run();
    await settle();

    // One page in the worker, two queued, one waiting to be queued.
    expect(fake.listCalls).toEqual([1, 2, 3, 4]);
    expect(orchestrator.inspect()).toEqual({ state: "running", activeConsumers: 1, queuePending: 3 });

    release();
    const stats = await running;

    expect(fake.listCalls).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(stats.loaded).toBe(6);
    expect(orchestrator.inspect()).toEqual({ state: "completed", activeConsumers: 0, queuePending: 0 });
  });

  it("refuses to run twice", async () => {
    const orchestrator = new PipelineOrchestrator({
      client: createFakeAnimalClient({ pages: [] }).client,
      logger: silentLogger()
    });

    expect(orchestrator.inspect().state).toBe("idle");
    await orchestrator.run();

    await expect(orchestrator.run()).rejects.toThrow("Pipeline has already been started (state=completed)");
  });
});
