import type { RunStatistics } from "../application/run-pipeline/run-statistics";
import { runEtl } from "../composition/root";
import { withDotEnv } from "../shared/config/env";
import { rootLogger, type Logger } from "../shared/logging/logger";

type ErrorContext = Partial<{
  page: number;
  id: number;
  batchSize: number;
  status: number;
  attempt: number;
}>;

type CliErrorEnvelope = {
  event: "etl.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const allowedContextKeys: Array<keyof ErrorContext> = ["page", "id", "batchSize", "status", "attempt"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of allowedContextKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) {
      sanitizedContext[key] = raw;
    }
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "etl.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const MAX_LOGGED_ERRORS = 20;

export const logRunSummary = (stats: RunStatistics, logger: Logger): void => {
  logger.info(
    {
      event: "pipeline.summary",
      state: stats.state,
      fetched: stats.fetched,
      transformed: stats.transformed,
      loaded: stats.loaded,
      batchesProcessed: stats.batchesProcessed,
      durationSeconds: Number(((stats.durationMs ?? 0) / 1000).toFixed(2)),
      errorCount: stats.errors.length
    },
    "pipeline execution summary"
  );
  if (stats.errors.length > 0) {
    logger.error(
      { event: "pipeline.errors", errorCount: stats.errors.length, errors: stats.errors.slice(0, MAX_LOGGED_ERRORS) },
      `errors encountered: ${stats.errors.length}`
    );
  }
};

/**
 * Reads `.env` from the working directory unless `deps.env` is given.
 * Exit code 0 whenever the run returns statistics, recorded errors included;
 * 1 when it throws before producing them.
 */
export const executeEtlCli = async (
  deps: { env?: NodeJS.ProcessEnv; logger?: Logger } = {}
): Promise<number> => {
  const env = deps.env ?? withDotEnv(process.env);
  const logger = deps.logger ?? rootLogger;
  try {
    const stats = await runEtl(env);
    logRunSummary(stats, logger);
    return 0;
  } catch (err) {
    logger.error(buildCliErrorEnvelope(err, isDebugMode(env)), "pipeline execution failed");
    return 1;
  }
};

if (require.main === module) {
  void executeEtlCli().then((code) => process.exit(code));
}
