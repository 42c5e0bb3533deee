export type RawAnimal = Record<string, unknown>;

/**
 * One animal as parsed from the source service. `friends` and `born_at` keep
 * whatever encoding the source used until the transformer normalizes them.
 */
export type AnimalRecord = Readonly<{
  id: number;
  name: string;
  friends: string | readonly string[];
  born_at?: string | Date;
  [extra: string]: unknown;
}>;

/**
 * An animal after normalization, ready for the home endpoint.
 */
export type NormalizedAnimal = Readonly<{
  id: number;
  name: string;
  friends: readonly string[];
  born_at?: string;
  [extra: string]: unknown;
}>;

/**
 * Wire shape sent to the home endpoint: an absent `born_at` goes out as `null`.
 */
export type AnimalPayload = {
  id: number;
  name: string;
  friends: string[];
  born_at: string | null;
  [extra: string]: unknown;
};
