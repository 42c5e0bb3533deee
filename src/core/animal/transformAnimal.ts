import { DateTime } from "luxon";
import { TransformationError, describeError } from "../../shared/errors/pipeline.errors";
import { rootLogger, type Logger } from "../../shared/logging/logger";
import { BORN_AT_PATTERN, parseNormalizedAnimal } from "./animal.model";
import type { AnimalRecord, NormalizedAnimal } from "./animal.types";

export type FriendsInput =
  | { kind: "missing" }
  | { kind: "list"; value: readonly unknown[] }
  | { kind: "csv"; value: string }
  | { kind: "other"; value: unknown };

export type BornAtInput =
  | { kind: "missing" }
  | { kind: "timestamp"; value: Date }
  | { kind: "text"; value: string }
  | { kind: "other"; value: unknown };

export type TransformerStats = {
  friendsTransformed: number;
  bornAtTransformed: number;
  transformationErrors: number;
};

// Created per call so it follows the root level set at start-up.
const defaultLogger = (): Logger => rootLogger.child({ component: "transformer" });

const BORN_AT_OUTPUT_FORMAT = "yyyy-LL-dd'T'HH:mm:ss'Z'";

// Month-first shapes come before day-first ones, so "01/02/2020" is January 2
// and "15/01/2020" only parses as day-first.
const LOOSE_DATE_PATTERNS = [
  "yyyy/M/d",
  "yyyy.M.d",
  "yyyy-M-d",
  "M/d/yyyy",
  "M-d-yyyy",
  "M.d.yyyy",
  "d/M/yyyy",
  "d-M-yyyy",
  "d.M.yyyy",
  "d MMM yyyy",
  "d MMMM yyyy",
  "d-MMM-yyyy",
  "d-MMMM-yyyy",
  "MMM d, yyyy",
  "MMM d yyyy",
  "MMMM d, yyyy",
  "MMMM d yyyy",
  "EEE MMM d yyyy",
  "EEE, MMM d, yyyy"
] as const;

const LOOSE_TIME_PATTERNS = ["H:mm", "H:mm:ss", "h:mm a", "h:mma", "h:mm:ss a", "h:mm:ssa", "h a", "ha"] as const;

// Tried in order after ISO 8601, RFC 2822, HTTP and SQL forms.
const LOOSE_DATE_FORMATS: readonly string[] = [
  ...LOOSE_DATE_PATTERNS.flatMap((date) => [date, ...LOOSE_TIME_PATTERNS.map((time) => `${date} ${time}`)]),
  ...LOOSE_TIME_PATTERNS.map((time) => `${time} yyyy-M-d`),
  "EEE MMM d HH:mm:ss yyyy"
];

export const classifyFriends = (input: unknown): FriendsInput => {
  if (!input || (Array.isArray(input) && input.length === 0)) return { kind: "missing" };
  if (Array.isArray(input)) return { kind: "list", value: input };
  if (typeof input === "string") return { kind: "csv", value: input };
  return { kind: "other", value: input };
};

export const classifyBornAt = (input: unknown): BornAtInput => {
  if (input == null) return { kind: "missing" };
  if (input instanceof Date) return { kind: "timestamp", value: input };
  if (typeof input === "string") {
    return input.trim() === "" ? { kind: "missing" } : { kind: "text", value: input };
  }
  return { kind: "other", value: input };
};

const splitCsv = (value: string): string[] =>
  value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

const cleanList = (value: readonly unknown[]): string[] =>
  value
    .filter((entry) => entry != null)
    .map((entry) => (typeof entry === "string" ? entry : String(entry)).trim())
    .filter((entry) => entry.length > 0);

const normalizeFriendsInput = (input: FriendsInput, logger: Logger): string[] => {
  switch (input.kind) {
    case "missing":
      return [];
    case "list":
      return cleanList(input.value);
    case "csv":
      return splitCsv(input.value);
    case "other":
      logger.warn({ event: "transform.friends_unexpected_type", type: typeof input.value }, "converting friends to string");
      return splitCsv(String(input.value));
  }
};

/**
 * CSV string or list of strings to an ordered list of trimmed, non-empty names.
 * Never throws.
 */
export const normalizeFriends = (input: unknown, logger: Logger = defaultLogger()): string[] => {
  try {
    return normalizeFriendsInput(classifyFriends(input), logger);
  } catch (err) {
    logger.error(
      {
        event: "transform.friends_failed",
        err: new TransformationError({ message: `Cannot normalize friends: ${describeError(err)}`, field: "friends", cause: err })
      },
      "defaulting friends to an empty list"
    );
    return [];
  }
};

const parseLooseDate = (text: string): DateTime | undefined => {
  const opts = { zone: "utc", locale: "en-US" };

  if (/^\d{10}$/.test(text)) return DateTime.fromSeconds(Number(text), opts);
  if (/^\d{13}$/.test(text)) return DateTime.fromMillis(Number(text), opts);

  const candidates = [
    () => DateTime.fromISO(text, opts),
    () => DateTime.fromRFC2822(text, opts),
    () => DateTime.fromHTTP(text, opts),
    () => DateTime.fromSQL(text, opts),
    ...LOOSE_DATE_FORMATS.map((format) => () => DateTime.fromFormat(text, format, opts))
  ];
  for (const attempt of candidates) {
    const parsed = attempt();
    if (parsed.isValid) return parsed;
  }
  return undefined;
};

const formatUtc = (value: DateTime): string | undefined => {
  const formatted = value.toUTC().toFormat(BORN_AT_OUTPUT_FORMAT);
  return BORN_AT_PATTERN.test(formatted) ? formatted : undefined;
};

const normalizeBornAtInput = (input: BornAtInput, logger: Logger): string | undefined => {
  switch (input.kind) {
    case "missing":
      return undefined;
    case "timestamp": {
      // A Date is an absolute instant, so it only needs formatting in UTC.
      const formatted = Number.isNaN(input.value.getTime()) ? undefined : formatUtc(DateTime.fromJSDate(input.value));
      if (formatted === undefined) {
        logger.warn({ event: "transform.born_at_unparsed", value: String(input.value) }, "dropping born_at");
      }
      return formatted;
    }
    case "text": {
      const text = input.value.trim();
      const parsed = parseLooseDate(text);
      const formatted = parsed ? formatUtc(parsed) : undefined;
      if (formatted === undefined) {
        logger.warn({ event: "transform.born_at_unparsed", value: text }, "dropping born_at");
      }
      return formatted;
    }
    case "other":
      logger.warn({ event: "transform.born_at_unexpected_type", type: typeof input.value }, "converting born_at to string");
      return normalizeBornAtInput(classifyBornAt(String(input.value)), logger);
  }
};

/**
 * String or timestamp to `YYYY-MM-DDTHH:MM:SSZ`; zone-less input is read as UTC.
 * Unparseable input yields `undefined`. Never throws.
 */
export const normalizeBornAt = (input: unknown, logger: Logger = defaultLogger()): string | undefined => {
  try {
    return normalizeBornAtInput(classifyBornAt(input), logger);
  } catch (err) {
    logger.error(
      {
        event: "transform.born_at_failed",
        err: new TransformationError({ message: `Cannot normalize born_at: ${describeError(err)}`, field: "born_at", cause: err })
      },
      "dropping born_at"
    );
    return undefined;
  }
};

const emptyStats = (): TransformerStats => ({
  friendsTransformed: 0,
  bornAtTransformed: 0,
  transformationErrors: 0
});

/**
 * Normalizes animals for the home endpoint. Counters are per instance, so each
 * pipeline worker owns its own transformer.
 */
export class AnimalTransformer {
  private stats: TransformerStats = emptyStats();

  constructor(private readonly logger: Logger = defaultLogger()) {}

  transformFriends(input: unknown): string[] {
    const friends = normalizeFriends(input, this.logger);
    if (classifyFriends(input).kind === "csv") this.stats.friendsTransformed += 1;
    return friends;
  }

  transformBornAt(input: unknown): string | undefined {
    const bornAt = normalizeBornAt(input, this.logger);
    if (bornAt !== undefined) this.stats.bornAtTransformed += 1;
    return bornAt;
  }

  /**
   * Returns a new record; throws `ValidationError` when the rebuilt record is invalid.
   */
  transform(animal: AnimalRecord): NormalizedAnimal {
    try {
      const { friends, born_at: bornAt, ...rest } = animal;
      const normalizedBornAt = this.transformBornAt(bornAt);
      return parseNormalizedAnimal({
        ...rest,
        friends: this.transformFriends(friends),
        ...(normalizedBornAt === undefined ? {} : { born_at: normalizedBornAt })
      });
    } catch (err) {
      this.stats.transformationErrors += 1;
      this.logger.error({ event: "transform.failed", id: animal.id, reason: describeError(err) }, "animal transform failed");
      throw err;
    }
  }

  transformBatch(animals: readonly AnimalRecord[]): NormalizedAnimal[] {
    return animals.flatMap((animal) => {
      try {
        return [this.transform(animal)];
      } catch (err) {
        this.logger.warn({ event: "transform.skipped", id: animal.id, reason: describeError(err) }, "skipping animal");
        return [];
      }
    });
  }

  validateTransformation(original: AnimalRecord, transformed: NormalizedAnimal): boolean {
    if (original.id !== transformed.id || original.name !== transformed.name) return false;
    if (!Array.isArray(transformed.friends)) return false;
    if (transformed.born_at === undefined) return true;
    return BORN_AT_PATTERN.test(transformed.born_at) && !Number.isNaN(Date.parse(transformed.born_at));
  }

  getStats(): TransformerStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }
}
