import { Agent, fetch, type Response } from "undici";
import type { AnimalPayload, RawAnimal } from "../../core/animal/animal.types";
import type { AnimalApiClient, AnimalListPage, LoadBatchResult } from "../../ports/AnimalApiClient";
import { MAX_LOAD_BATCH_SIZE } from "../../ports/AnimalApiClient";
import { createLimiter, type Limiter } from "../../shared/concurrency/limiter";
import {
  ClientRequestError,
  TransientServerError,
  ValidationError,
  describeError,
  isRetryableError
} from "../../shared/errors/pipeline.errors";
import { rootLogger, type Logger } from "../../shared/logging/logger";
import { defaultRetryPolicy, retry, type RetryPolicy } from "../../shared/retry/retry";

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([500, 502, 503, 504]);

export type RequestRetryContext = {
  method: HttpMethod;
  url: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
};

export type AnimalHttpClientOptions = {
  retryPolicy?: RetryPolicy;
  timeoutMs?: number;
  maxConnections?: number;
  maxConnectionsPerHost?: number;
  logger?: Logger;
  onRetry?: (ctx: RequestRetryContext) => void;
  sleep?: (ms: number) => Promise<void>;
  randomFn?: () => number;
};

type HttpMethod = "GET" | "POST";

type RequestPlan = {
  method: HttpMethod;
  path: string;
  query?: Record<string, number | string>;
  body?: unknown;
  parse: "json" | "none";
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Animals API client on a pooled undici agent.
 *
 * Transport failures, timeouts and 500/502/503/504 are retried with exponential
 * backoff; other non-200 statuses and undecodable bodies fail on the spot.
 */
export class AnimalHttpClient implements AnimalApiClient {
  private agent?: Agent;
  private readonly baseUrl: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly maxConnectionsPerHost: number;
  private readonly inFlight: Limiter;
  private readonly logger: Logger;

  constructor(baseUrl: string, private readonly options: AnimalHttpClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.retryPolicy = options.retryPolicy ?? defaultRetryPolicy;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxConnectionsPerHost = options.maxConnectionsPerHost ?? 20;
    this.inFlight = createLimiter(options.maxConnections ?? 100);
    this.logger = options.logger ?? rootLogger.child({ component: "animal-http-client" });
  }

  async open(): Promise<void> {
    this.acquireAgent();
  }

  async close(): Promise<void> {
    const agent = this.agent;
    this.agent = undefined;
    await agent?.close();
  }

  async listPage(page: number, perPage: number): Promise<AnimalListPage> {
    this.logger.info({ event: "http.list_page", page, perPage }, "fetching animals page");
    const json = await this.request({
      method: "GET",
      path: "/animals/v1/animals",
      query: { page, per_page: perPage },
      parse: "json"
    });
    if (!isRecord(json) || !Array.isArray(json.items)) {
      throw new ClientRequestError({ message: `Malformed list response for page ${page}`, context: { page } });
    }
    return { ...json, items: json.items };
  }

  async fetchDetail(id: number): Promise<RawAnimal> {
    this.logger.debug({ event: "http.fetch_detail", id }, "fetching animal details");
    const json = await this.request({ method: "GET", path: `/animals/v1/animals/${id}`, parse: "json" });
    if (!isRecord(json)) {
      throw new ClientRequestError({ message: `Malformed detail response for animal ${id}`, context: { id } });
    }
    return json;
  }

  async loadBatch(animals: readonly AnimalPayload[]): Promise<LoadBatchResult> {
    if (animals.length > MAX_LOAD_BATCH_SIZE) {
      throw new ValidationError({
        message: `Cannot load more than ${MAX_LOAD_BATCH_SIZE} animals at once. Got ${animals.length}`,
        context: { batchSize: animals.length }
      });
    }
    if (animals.length === 0) return { loaded: 0, response: undefined };

    this.logger.info({ event: "http.load_batch", size: animals.length }, "loading animals to home endpoint");
    const response = await this.request({ method: "POST", path: "/animals/v1/home", body: animals, parse: "json" });
    return { loaded: animals.length, response };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.request({ method: "GET", path: "/docs", parse: "none" });
      return true;
    } catch (err) {
      this.logger.warn({ event: "http.health_check_failed", reason: describeError(err) }, "health check failed");
      return false;
    }
  }

  private acquireAgent(): Agent {
    this.agent ??= new Agent({
      connections: this.maxConnectionsPerHost,
      connect: { timeout: this.timeoutMs }
    });
    return this.agent;
  }

  private buildUrl(plan: RequestPlan): URL {
    const url = new URL(`${this.baseUrl}${plan.path}`);
    for (const [key, value] of Object.entries(plan.query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url;
  }

  private async request(plan: RequestPlan): Promise<unknown> {
    const url = this.buildUrl(plan);
    const safeUrl = `${url.origin}${url.pathname}${url.search}`;
    const policy = this.retryPolicy;
    return retry((attempt) => this.inFlight(() => this.attempt(plan, url, safeUrl, attempt, policy.maxAttempts)), {
      policy,
      shouldRetry: isRetryableError,
      randomFn: this.options.randomFn,
      sleep: this.options.sleep,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        this.logger.warn(
          {
            event: "http.retry",
            method: plan.method,
            url: safeUrl,
            status: error instanceof TransientServerError ? error.status ?? null : null,
            attempt,
            maxAttempts,
            delayMs: Math.round(delayMs)
          },
          `waiting ${(delayMs / 1000).toFixed(2)}s before retry`
        );
        this.options.onRetry?.({ method: plan.method, url: safeUrl, attempt, maxAttempts, delayMs, error });
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        this.logger.error(
          {
            event: "http.give_up",
            method: plan.method,
            url: safeUrl,
            status: error instanceof TransientServerError ? error.status ?? null : null,
            attempt,
            maxAttempts
          },
          `all ${maxAttempts} attempts failed`
        );
      }
    });
  }

  private async attempt(
    plan: RequestPlan,
    url: URL,
    safeUrl: string,
    attempt: number,
    maxAttempts: number
  ): Promise<unknown> {
    this.logger.debug({ event: "http.request", method: plan.method, url: safeUrl, attempt, maxAttempts }, "sending request");

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const transportError = (err: unknown) =>
      controller.signal.aborted
        ? new TransientServerError({
            message: `Request timeout after ${this.timeoutMs}ms: ${plan.method} ${safeUrl}`,
            isTimeout: true,
            cause: err
          })
        : new TransientServerError({
            message: `Transport failure: ${plan.method} ${safeUrl}: ${describeError(err)}`,
            cause: err
          });

    try {
      let res: Response;
      try {
        res = await fetch(url, {
          method: plan.method,
          headers:
            plan.body === undefined
              ? { accept: "application/json" }
              : { accept: "application/json", "content-type": "application/json" },
          body: plan.body === undefined ? undefined : JSON.stringify(plan.body),
          dispatcher: this.acquireAgent(),
          signal: controller.signal
        });
      } catch (err) {
        throw transportError(err);
      }

      return await this.readResponse(res, plan, safeUrl, transportError);
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readResponse(
    res: Response,
    plan: RequestPlan,
    safeUrl: string,
    transportError: (err: unknown) => TransientServerError
  ): Promise<unknown> {
    const { status } = res;
    const readBody = async (): Promise<string> => {
      try {
        return await res.text();
      } catch (err) {
        throw transportError(err);
      }
    };

    if (status === 200) {
      const text = await readBody();
      if (plan.parse === "none") return undefined;
      try {
        return JSON.parse(text);
      } catch (err) {
        throw new ClientRequestError({
          message: `Invalid JSON response: ${plan.method} ${safeUrl}: ${describeError(err)}`,
          status,
          cause: err
        });
      }
    }

    // Drain the body so the pooled connection can be reused; its content is not reported.
    await res.text().catch(() => "");

    if (RETRYABLE_STATUS_CODES.has(status)) {
      throw new TransientServerError({ message: `Server error ${status}: ${plan.method} ${safeUrl}`, status });
    }
    if (status >= 400 && status < 500) {
      throw new ClientRequestError({ message: `Client error ${status}: ${plan.method} ${safeUrl}`, status });
    }
    throw new ClientRequestError({ message: `Unexpected status ${status}: ${plan.method} ${safeUrl}`, status });
  }
}
