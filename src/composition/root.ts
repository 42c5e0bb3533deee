import { runPipeline } from "../application/run-pipeline/runPipeline.usecase";
import type { RunStatistics } from "../application/run-pipeline/run-statistics";
import { AnimalHttpClient } from "../infrastructure/animals-api/AnimalHttpClient";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { rootLogger } from "../shared/logging/logger";

export const runEtl = async (env: NodeJS.ProcessEnv = process.env): Promise<RunStatistics> => {
  const { BASE_URL, LOG_LEVEL } = loadEnv(env);
  const runtime = loadRuntimeConfigFromEnv(env);
  rootLogger.level = LOG_LEVEL;

  const client = new AnimalHttpClient(BASE_URL, {
    retryPolicy: runtime.retryPolicy,
    timeoutMs: runtime.http.timeoutMs,
    maxConnections: runtime.http.maxConnections,
    maxConnectionsPerHost: runtime.http.maxConnectionsPerHost
  });

  if (!(await client.healthCheck())) {
    rootLogger.warn({ event: "etl.unhealthy", baseUrl: BASE_URL }, "animals API health check failed, running anyway");
  }

  return runPipeline({ client, config: runtime.pipelineConfig });
};
