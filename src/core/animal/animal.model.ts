import { z } from "zod";
import { ValidationError } from "../../shared/errors/pipeline.errors";
import type { AnimalPayload, AnimalRecord, NormalizedAnimal } from "./animal.types";

export const BORN_AT_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

// The source emits ids both as numbers and as numeric strings.
const coerceNumericString = (value: unknown): unknown =>
  typeof value === "string" && /^\s*-?\d+\s*$/.test(value) ? Number(value.trim()) : value;

export const animalIdSchema = z.preprocess(
  coerceNumericString,
  z
    .number({ required_error: "missing id", invalid_type_error: "id is not numeric" })
    .int("id must be an integer")
    .refine(Number.isSafeInteger, "id must be a safe integer")
);

// Epoch numbers above this are milliseconds, below it seconds.
const EPOCH_MILLIS_THRESHOLD = 2e10;

const epochToDate = (value: number): Date =>
  new Date(Math.abs(value) > EPOCH_MILLIS_THRESHOLD ? value : value * 1000);

const animalSchema = z
  .object({
    id: animalIdSchema,
    name: z.string({ required_error: "missing name", invalid_type_error: "name must be a string" }),
    friends: z
      .union([z.string(), z.array(z.string())])
      .nullish()
      .transform((value) => value ?? []),
    born_at: z
      .union([z.string(), z.date(), z.number().finite().transform(epochToDate)])
      .nullish()
      .transform((value) => (value == null || value === "" ? undefined : value))
  })
  .passthrough();

const normalizedAnimalSchema = z
  .object({
    id: animalIdSchema,
    name: z.string({ required_error: "missing name", invalid_type_error: "name must be a string" }),
    friends: z.array(
      z
        .string()
        .min(1, "friends entries must be non-empty")
        .refine((friend) => friend === friend.trim(), "friends entries must be trimmed")
    ),
    born_at: z.string().regex(BORN_AT_PATTERN, "born_at must be YYYY-MM-DDTHH:MM:SSZ").optional()
  })
  .passthrough();

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

const idOf = (raw: unknown): number | undefined => {
  if (typeof raw !== "object" || raw === null || !("id" in raw)) return undefined;
  const parsed = animalIdSchema.safeParse(raw.id);
  return parsed.success ? parsed.data : undefined;
};

const invalidAnimal = (raw: unknown, error: z.ZodError) =>
  new ValidationError({
    message: `Invalid animal: ${formatIssues(error)}`,
    context: { id: idOf(raw) }
  });

/**
 * Builds an immutable record from decoded JSON, keeping unknown fields as they are.
 */
export const parseAnimal = (raw: unknown): AnimalRecord => {
  const parsed = animalSchema.safeParse(raw);
  if (!parsed.success) throw invalidAnimal(raw, parsed.error);

  const { friends } = parsed.data;
  return Object.freeze({
    ...parsed.data,
    friends: typeof friends === "string" ? friends : Object.freeze([...friends])
  });
};

export const parseNormalizedAnimal = (raw: unknown): NormalizedAnimal => {
  const parsed = normalizedAnimalSchema.safeParse(raw);
  if (!parsed.success) throw invalidAnimal(raw, parsed.error);

  return Object.freeze({ ...parsed.data, friends: Object.freeze([...parsed.data.friends]) });
};

/**
 * Reads the identifier of a list item; list pages carry at least `id`.
 */
export const extractAnimalId = (item: unknown): number => {
  if (typeof item !== "object" || item === null) {
    throw new ValidationError({ message: "Invalid animal: list item is not an object" });
  }
  const parsed = animalIdSchema.safeParse("id" in item ? item.id : undefined);
  if (!parsed.success) {
    throw new ValidationError({ message: `Invalid animal: ${formatIssues(parsed.error)}` });
  }
  return parsed.data;
};

export const toAnimalPayload = (animal: NormalizedAnimal): AnimalPayload => ({
  ...animal,
  friends: [...animal.friends],
  born_at: animal.born_at ?? null
});

export const describeAnimal = (animal: Pick<AnimalRecord, "id" | "name">): string => `Animal[${animal.id}]: ${animal.name}`;
