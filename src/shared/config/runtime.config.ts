import {
  defaultPipelineConfig,
  pipelineCaps,
  type PipelineConfig,
  validatePipelineConfig
} from "../../application/run-pipeline/pipeline.config";
import { createRetryPolicy, defaultRetryPolicy, type RetryPolicy } from "../retry/retry";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 120000 },
  maxConnections: { min: 1, max: 1000 },
  maxConnectionsPerHost: { min: 1, max: 1000 },
  maxAttempts: { min: 1, max: 20 },
  baseDelaySeconds: { min: 0, max: 60 },
  maxDelaySeconds: { min: 0, max: 600 },
  backoffFactor: { min: 1, max: 10 }
} as const;

export type HttpRuntimeConfig = {
  timeoutMs: number;
  maxConnections: number;
  maxConnectionsPerHost: number;
};

export type RuntimeConfig = {
  pipelineConfig: PipelineConfig;
  retryPolicy: RetryPolicy;
  http: HttpRuntimeConfig;
};

type Range = { min: number; max: number };

const readRaw = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;
  return raw.trim();
};

const parseOptionalIntInRange = (env: NodeJS.ProcessEnv, name: string, range: Range): number | undefined => {
  const raw = readRaw(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalNumberInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: Range & { exclusiveMin?: boolean }
): number | undefined => {
  const raw = readRaw(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  const belowMin = range.exclusiveMin ? value <= range.min : value < range.min;
  if (!Number.isFinite(value) || belowMin || value > range.max) {
    const open = range.exclusiveMin ? "(" : "[";
    throw new Error(`${name}=${raw} is out of allowed range ${open}${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = readRaw(env, name)?.toLowerCase();
  if (raw === undefined) return undefined;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`${name}=${raw} must be one of true, false, 1, 0`);
};

const secondsToMs = (seconds: number | undefined): number | undefined =>
  seconds === undefined ? undefined : Math.round(seconds * 1000);

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const pipelineConfig = validatePipelineConfig({
    concurrency: parseOptionalIntInRange(env, "CONCURRENCY", pipelineCaps.concurrency) ?? defaultPipelineConfig.concurrency,
    detailConcurrency:
      parseOptionalIntInRange(env, "DETAIL_CONCURRENCY", pipelineCaps.detailConcurrency) ??
      defaultPipelineConfig.detailConcurrency,
    pageSize: parseOptionalIntInRange(env, "PAGE_SIZE", pipelineCaps.pageSize) ?? defaultPipelineConfig.pageSize,
    batchSize: parseOptionalIntInRange(env, "BATCH_SIZE", pipelineCaps.batchSize) ?? defaultPipelineConfig.batchSize,
    maxPages: parseOptionalIntInRange(env, "MAX_PAGES", pipelineCaps.maxPages) ?? defaultPipelineConfig.maxPages
  });

  const retryPolicy = createRetryPolicy({
    maxAttempts: parseOptionalIntInRange(env, "MAX_ATTEMPTS", runtimeCaps.maxAttempts) ?? defaultRetryPolicy.maxAttempts,
    baseDelayMs:
      secondsToMs(parseOptionalNumberInRange(env, "BASE_DELAY", runtimeCaps.baseDelaySeconds)) ??
      defaultRetryPolicy.baseDelayMs,
    maxDelayMs:
      secondsToMs(parseOptionalNumberInRange(env, "MAX_DELAY", runtimeCaps.maxDelaySeconds)) ??
      defaultRetryPolicy.maxDelayMs,
    backoffFactor:
      parseOptionalNumberInRange(env, "BACKOFF_FACTOR", { ...runtimeCaps.backoffFactor, exclusiveMin: true }) ??
      defaultRetryPolicy.backoffFactor,
    jitter: parseOptionalBoolean(env, "RETRY_JITTER") ?? defaultRetryPolicy.jitter
  });

  const http: HttpRuntimeConfig = {
    timeoutMs: parseOptionalIntInRange(env, "REQUEST_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 30000,
    maxConnections: parseOptionalIntInRange(env, "MAX_CONNECTIONS", runtimeCaps.maxConnections) ?? 100,
    maxConnectionsPerHost:
      parseOptionalIntInRange(env, "MAX_CONNECTIONS_PER_HOST", runtimeCaps.maxConnectionsPerHost) ?? 20
  };

  return { pipelineConfig, retryPolicy, http };
};
