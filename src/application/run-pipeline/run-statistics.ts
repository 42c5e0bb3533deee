import type { TransformerStats } from "../../core/animal/transformAnimal";
import { createExclusiveGuard } from "../../shared/concurrency/limiter";

export type PipelineState = "idle" | "running" | "draining" | "completed" | "completed_with_errors";

export type RunStatistics = {
  state: PipelineState;
  startedAt?: string;
  endedAt?: string;
  durationMs?: number;
  pagesProduced: number;
  fetched: number;
  transformed: number;
  loaded: number;
  batchesProcessed: number;
  errors: string[];
  transformer: TransformerStats;
};

export type RunStatisticsRecorder = {
  /** The only way to mutate the aggregate; mutations run one at a time. */
  update: (mutate: (stats: RunStatistics) => void) => Promise<void>;
  recordError: (message: string) => Promise<void>;
  start: () => Promise<void>;
  finish: () => Promise<RunStatistics>;
  snapshot: () => RunStatistics;
};

const copyStatistics = (stats: RunStatistics): RunStatistics => ({
  ...stats,
  errors: [...stats.errors],
  transformer: { ...stats.transformer }
});

export const addTransformerStats = (target: TransformerStats, delta: TransformerStats): void => {
  target.friendsTransformed += delta.friendsTransformed;
  target.bornAtTransformed += delta.bornAtTransformed;
  target.transformationErrors += delta.transformationErrors;
};

export const createRunStatisticsRecorder = (now: () => Date = () => new Date()): RunStatisticsRecorder => {
  const guard = createExclusiveGuard();
  let startedAtMs = 0;
  const stats: RunStatistics = {
    state: "idle",
    pagesProduced: 0,
    fetched: 0,
    transformed: 0,
    loaded: 0,
    batchesProcessed: 0,
    errors: [],
    transformer: { friendsTransformed: 0, bornAtTransformed: 0, transformationErrors: 0 }
  };

  const update = (mutate: (target: RunStatistics) => void) => guard(() => mutate(stats));

  return {
    update,
    recordError: (message) => update((target) => void target.errors.push(message)),
    start: () =>
      update((target) => {
        const startedAt = now();
        startedAtMs = startedAt.getTime();
        target.startedAt = startedAt.toISOString();
        target.state = "running";
      }),
    finish: async () => {
      await update((target) => {
        const endedAt = now();
        target.endedAt = endedAt.toISOString();
        target.durationMs = endedAt.getTime() - startedAtMs;
        target.state = target.errors.length > 0 ? "completed_with_errors" : "completed";
      });
      return copyStatistics(stats);
    },
    snapshot: () => copyStatistics(stats)
  };
};
