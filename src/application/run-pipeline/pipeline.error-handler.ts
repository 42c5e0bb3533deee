import { describeError } from "../../shared/errors/pipeline.errors";

/**
 * Entries written to `RunStatistics.errors`. Each names the unit of work that was skipped.
 */
export const failureMessages = {
  openClient: (reason: unknown) => `Failed to open client: ${describeError(reason)}`,
  closeClient: (reason: unknown) => `Failed to close client: ${describeError(reason)}`,
  listPage: (page: number, reason: unknown) => `Failed to list page ${page}: ${describeError(reason)}`,
  invalidItem: (page: number, index: number, reason: unknown) =>
    `Invalid item on page ${page} at index ${index}: ${describeError(reason)}`,
  fetchDetail: (id: number, reason: unknown) => `Failed to fetch details for animal ${id}: ${describeError(reason)}`,
  transform: (id: string, reason: unknown) => `Failed to transform animal ${id}: ${describeError(reason)}`,
  loadBatch: (size: number, page: number, reason: unknown) =>
    `Failed to load batch of ${size} animals from page ${page}: ${describeError(reason)}`,
  processItem: (page: number, reason: unknown) => `Failed to process page ${page}: ${describeError(reason)}`,
  consumerFailed: (workerId: number, reason: unknown) => `Consumer ${workerId} failed: ${describeError(reason)}`
} as const;

export const describeRawId = (raw: unknown): string => {
  if (typeof raw !== "object" || raw === null || !("id" in raw)) return "unknown";
  const { id } = raw;
  return typeof id === "number" || typeof id === "string" ? String(id) : "unknown";
};

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
};
