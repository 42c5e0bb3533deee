export type PipelineErrorCode = "transient_server" | "client_request" | "validation" | "transformation";

export type PipelineErrorContext = Partial<{
  page: number;
  id: number;
  batchSize: number;
  status: number;
  attempt: number;
}>;

type PipelineErrorArgs = {
  message: string;
  context?: PipelineErrorContext;
  cause?: unknown;
};

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  abstract readonly retryable: boolean;
  readonly context?: PipelineErrorContext;
  readonly cause?: unknown;

  protected constructor(args: PipelineErrorArgs) {
    super(args.message);
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 5xx responses from the retryable set, timeouts and transport failures.
 */
export class TransientServerError extends PipelineError {
  readonly code = "transient_server";
  readonly retryable = true;
  readonly status?: number;
  readonly isTimeout: boolean;

  constructor(args: PipelineErrorArgs & { status?: number; isTimeout?: boolean }) {
    super(args);
    this.name = "TransientServerError";
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
  }
}

/**
 * 4xx responses, unexpected statuses and malformed bodies. Never retried.
 */
export class ClientRequestError extends PipelineError {
  readonly code = "client_request";
  readonly retryable = false;
  readonly status?: number;

  constructor(args: PipelineErrorArgs & { status?: number }) {
    super(args);
    this.name = "ClientRequestError";
    this.status = args.status;
  }
}

export class ValidationError extends PipelineError {
  readonly code = "validation";
  readonly retryable = false;

  constructor(args: PipelineErrorArgs) {
    super(args);
    this.name = "ValidationError";
  }
}

export class TransformationError extends PipelineError {
  readonly code = "transformation";
  readonly retryable = false;
  readonly field: string;

  constructor(args: PipelineErrorArgs & { field: string }) {
    super(args);
    this.name = "TransformationError";
    this.field = args.field;
  }
}

export const isRetryableError = (err: unknown): boolean => err instanceof PipelineError && err.retryable;

export const describeError = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
