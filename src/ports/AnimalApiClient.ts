import type { AnimalPayload, RawAnimal } from "../core/animal/animal.types";

export const MAX_LOAD_BATCH_SIZE = 100;

export type AnimalListPage = {
  items: unknown[];
  [extra: string]: unknown;
};

export type LoadBatchResult = {
  loaded: number;
  response: unknown;
};

export interface AnimalApiClient {
  /** Acquires the pooled connection context; calls acquire it lazily otherwise. */
  open(): Promise<void>;
  listPage(page: number, perPage: number): Promise<AnimalListPage>;
  fetchDetail(id: number): Promise<RawAnimal>;
  /** Rejects more than {@link MAX_LOAD_BATCH_SIZE} records without sending anything. */
  loadBatch(animals: readonly AnimalPayload[]): Promise<LoadBatchResult>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
