import { MAX_LOAD_BATCH_SIZE } from "../../ports/AnimalApiClient";

export type PipelineConfig = {
  concurrency: number;
  detailConcurrency: number;
  pageSize: number;
  batchSize: number;
  maxPages: number;
};

export type PipelineConfigInput = Partial<PipelineConfig>;

export const defaultPipelineConfig: PipelineConfig = {
  concurrency: 5,
  detailConcurrency: 10,
  pageSize: 50,
  batchSize: MAX_LOAD_BATCH_SIZE,
  maxPages: 100000
};

export const pipelineCaps = {
  concurrency: { min: 1, max: 50 },
  detailConcurrency: { min: 1, max: 100 },
  pageSize: { min: 1, max: 500 },
  batchSize: { min: 1, max: MAX_LOAD_BATCH_SIZE },
  maxPages: { min: 1, max: 1000000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  assertIntegerInRange("concurrency", config.concurrency, pipelineCaps.concurrency.min, pipelineCaps.concurrency.max);
  assertIntegerInRange(
    "detailConcurrency",
    config.detailConcurrency,
    pipelineCaps.detailConcurrency.min,
    pipelineCaps.detailConcurrency.max
  );
  assertIntegerInRange("pageSize", config.pageSize, pipelineCaps.pageSize.min, pipelineCaps.pageSize.max);
  assertIntegerInRange("batchSize", config.batchSize, pipelineCaps.batchSize.min, pipelineCaps.batchSize.max);
  assertIntegerInRange("maxPages", config.maxPages, pipelineCaps.maxPages.min, pipelineCaps.maxPages.max);
  return config;
};

export const resolvePipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig =>
  validatePipelineConfig({ ...defaultPipelineConfig, ...input });
