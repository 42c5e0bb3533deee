import { extractAnimalId, parseAnimal, toAnimalPayload } from "../../core/animal/animal.model";
import type { NormalizedAnimal, RawAnimal } from "../../core/animal/animal.types";
import { AnimalTransformer } from "../../core/animal/transformAnimal";
import type { AnimalApiClient } from "../../ports/AnimalApiClient";
import { createLimiter, type Limiter } from "../../shared/concurrency/limiter";
import { BoundedWorkQueue } from "../../shared/concurrency/work-queue";
import { describeError } from "../../shared/errors/pipeline.errors";
import { rootLogger, type Logger } from "../../shared/logging/logger";
import { chunk, describeRawId, failureMessages } from "./pipeline.error-handler";
import { resolvePipelineConfig, type PipelineConfig, type PipelineConfigInput } from "./pipeline.config";
import {
  addTransformerStats,
  createRunStatisticsRecorder,
  type PipelineState,
  type RunStatistics,
  type RunStatisticsRecorder
} from "./run-statistics";

/** One page of identifiers, the unit carried from the producer to the consumers. */
export type WorkItem = {
  page: number;
  ids: readonly number[];
};

export type PipelineDeps = {
  client: AnimalApiClient;
  config?: PipelineConfigInput;
  logger?: Logger;
  statistics?: RunStatisticsRecorder;
  createTransformer?: (workerId: number, logger: Logger) => AnimalTransformer;
};

export type PipelineInspection = {
  state: PipelineState;
  activeConsumers: number;
  queuePending: number;
};

/**
 * Pages through the source with one producer and feeds `concurrency` consumers
 * through a bounded queue. Each consumer fetches details, normalizes the
 * animals and loads them in batches. Per-animal and per-batch failures end up
 * in `RunStatistics.errors`; they never abort the run.
 */
export class PipelineOrchestrator {
  private readonly client: AnimalApiClient;
  private readonly config: PipelineConfig;
  private readonly logger: Logger;
  private readonly statistics: RunStatisticsRecorder;
  private readonly createTransformer: (workerId: number, logger: Logger) => AnimalTransformer;
  private state: PipelineState = "idle";
  private activeConsumers = 0;
  private queue?: BoundedWorkQueue<WorkItem>;

  constructor(deps: PipelineDeps) {
    this.client = deps.client;
    this.config = resolvePipelineConfig(deps.config);
    this.logger = deps.logger ?? rootLogger.child({ component: "pipeline" });
    this.statistics = deps.statistics ?? createRunStatisticsRecorder();
    this.createTransformer = deps.createTransformer ?? ((_workerId, logger) => new AnimalTransformer(logger));
  }

  inspect(): PipelineInspection {
    return {
      state: this.state,
      activeConsumers: this.activeConsumers,
      queuePending: this.queue?.pending ?? 0
    };
  }

  async run(): Promise<RunStatistics> {
    if (this.state !== "idle") {
      throw new Error(`Pipeline has already been started (state=${this.state})`);
    }

    this.state = "running";
    await this.statistics.start();
    this.logger.info({ event: "pipeline.started", ...this.config }, "starting animal ETL pipeline");

    try {
      if (await this.openClient()) {
        await this.pump();
      }
    } finally {
      await this.closeClient();
    }

    const stats = await this.statistics.finish();
    this.state = stats.state;
    this.logger.info(
      {
        event: "pipeline.completed",
        state: stats.state,
        durationMs: stats.durationMs,
        pagesProduced: stats.pagesProduced,
        fetched: stats.fetched,
        transformed: stats.transformed,
        loaded: stats.loaded,
        batchesProcessed: stats.batchesProcessed,
        errorCount: stats.errors.length
      },
      "pipeline finished"
    );
    return stats;
  }

  private async openClient(): Promise<boolean> {
    try {
      await this.client.open();
      return true;
    } catch (err) {
      this.logger.error({ event: "pipeline.open_failed", reason: describeError(err) }, "cannot acquire HTTP client");
      await this.statistics.recordError(failureMessages.openClient(err));
      return false;
    }
  }

  private async closeClient(): Promise<void> {
    try {
      await this.client.close();
    } catch (err) {
      this.logger.error({ event: "pipeline.close_failed", reason: describeError(err) }, "cannot release HTTP client");
      await this.statistics.recordError(failureMessages.closeClient(err));
    }
  }

  private async pump(): Promise<void> {
    const queue = new BoundedWorkQueue<WorkItem>(2 * this.config.concurrency);
    this.queue = queue;
    const cancel = new AbortController();
    const consumers = Promise.all(
      Array.from({ length: this.config.concurrency }, (_, workerId) =>
        this.consume(workerId, queue, cancel.signal).catch((err: unknown) =>
          this.onConsumerFailed(workerId, err, cancel)
        )
      )
    );

    try {
      await this.produce(queue, cancel.signal);

      if (!cancel.signal.aborted) {
        // Everything pushed must be acknowledged before the consumers are stopped.
        this.state = "draining";
        await this.statistics.update((stats) => {
          stats.state = "draining";
        });
        this.logger.info({ event: "pipeline.draining", pending: queue.pending }, "producer done, draining queue");
        await queue.join(cancel.signal);
      }
    } finally {
      cancel.abort();
      await consumers;
    }
  }

  private async onConsumerFailed(workerId: number, err: unknown, cancel: AbortController): Promise<void> {
    // With no consumer left the producer would block on a full queue forever.
    if (this.activeConsumers === 0) cancel.abort();
    this.logger.error(
      { event: "consumer.failed", workerId, remaining: this.activeConsumers, reason: describeError(err) },
      "consumer stopped unexpectedly"
    );
    await this.statistics.recordError(failureMessages.consumerFailed(workerId, err));
  }

  private async produce(queue: BoundedWorkQueue<WorkItem>, signal: AbortSignal): Promise<void> {
    const { pageSize, maxPages } = this.config;

    for (let page = 1; page <= maxPages; page += 1) {
      if (signal.aborted) {
        this.logger.warn({ event: "producer.cancelled", page }, "no consumers left, stopping producer");
        return;
      }

      let items: unknown[];
      try {
        ({ items } = await this.client.listPage(page, pageSize));
      } catch (err) {
        this.logger.error({ event: "producer.failed", page, reason: describeError(err) }, "stopping producer");
        await this.statistics.recordError(failureMessages.listPage(page, err));
        return;
      }

      if (items.length === 0) {
        this.logger.info({ event: "producer.exhausted", page }, "no more pages");
        return;
      }

      const ids: number[] = [];
      const errors: string[] = [];
      items.forEach((item, index) => {
        try {
          ids.push(extractAnimalId(item));
        } catch (err) {
          errors.push(failureMessages.invalidItem(page, index, err));
        }
      });

      await this.statistics.update((stats) => {
        stats.pagesProduced += 1;
        stats.errors.push(...errors);
      });
      if (ids.length > 0 && !(await queue.push({ page, ids }, signal))) {
        this.logger.warn({ event: "producer.cancelled", page }, "no consumers left, stopping producer");
        return;
      }
      this.logger.info({ event: "producer.page", page, ids: ids.length, invalid: errors.length }, "queued page");
    }

    this.logger.warn({ event: "producer.max_pages_reached", maxPages }, "stopping at page limit");
  }

  private async consume(workerId: number, queue: BoundedWorkQueue<WorkItem>, signal: AbortSignal): Promise<void> {
    const logger = this.logger.child({ workerId });
    const transformer = this.createTransformer(workerId, logger);
    const detailLimit = createLimiter(this.config.detailConcurrency);
    this.activeConsumers += 1;

    try {
      while (!signal.aborted) {
        const item = await queue.pop(signal);
        if (item === undefined) break;

        try {
          await this.processItem(item, transformer, detailLimit, logger);
        } catch (err) {
          logger.error({ event: "consumer.item_failed", page: item.page, reason: describeError(err) }, "work item failed");
          await this.statistics.recordError(failureMessages.processItem(item.page, err));
        } finally {
          queue.taskDone();
        }
      }
    } finally {
      this.activeConsumers -= 1;
      const transformerStats = transformer.getStats();
      await this.statistics.update((stats) => addTransformerStats(stats.transformer, transformerStats));
      logger.debug({ event: "consumer.stopped" }, "consumer stopped");
    }
  }

  private async processItem(
    item: WorkItem,
    transformer: AnimalTransformer,
    detailLimit: Limiter,
    logger: Logger
  ): Promise<void> {
    const errors: string[] = [];

    const settled = await Promise.allSettled(item.ids.map((id) => detailLimit(() => this.client.fetchDetail(id))));
    const fetched: RawAnimal[] = [];
    settled.forEach((result, index) => {
      if (result.status === "fulfilled") {
        fetched.push(result.value);
        return;
      }
      const id = item.ids[index];
      logger.error({ event: "consumer.fetch_failed", id, reason: describeError(result.reason) }, "detail fetch failed");
      errors.push(failureMessages.fetchDetail(id, result.reason));
    });

    const transformed: NormalizedAnimal[] = [];
    for (const raw of fetched) {
      try {
        transformed.push(transformer.transform(parseAnimal(raw)));
      } catch (err) {
        const id = describeRawId(raw);
        logger.warn({ event: "consumer.transform_failed", id, reason: describeError(err) }, "skipping animal");
        errors.push(failureMessages.transform(id, err));
      }
    }

    let loaded = 0;
    let batches = 0;
    for (const batch of chunk(transformed, this.config.batchSize)) {
      try {
        const result = await this.client.loadBatch(batch.map(toAnimalPayload));
        loaded += result.loaded;
        batches += 1;
      } catch (err) {
        logger.error(
          { event: "consumer.load_failed", page: item.page, size: batch.length, reason: describeError(err) },
          "batch load failed"
        );
        errors.push(failureMessages.loadBatch(batch.length, item.page, err));
      }
    }

    await this.statistics.update((stats) => {
      stats.fetched += fetched.length;
      stats.transformed += transformed.length;
      stats.loaded += loaded;
      stats.batchesProcessed += batches;
      stats.errors.push(...errors);
    });
    logger.info(
      {
        event: "consumer.item_done",
        page: item.page,
        ids: item.ids.length,
        fetched: fetched.length,
        transformed: transformed.length,
        loaded,
        failures: errors.length
      },
      "work item processed"
    );
  }
}

export const runPipeline = (deps: PipelineDeps): Promise<RunStatistics> => new PipelineOrchestrator(deps).run();
