import type { JsonValue, ProviderError, ProviderErrorCode, ProviderOperation } from "./types";

const NETWORK_MESSAGE_RE = /(ECONNRESET|ECONNREFUSED|EAI_AGAIN|ENOTFOUND|socket hang up|fetch failed|network)/i;
const RATE_LIMIT_RE = /(rate limit|too many requests|429)/i;
const TIMEOUT_RE = /(timeout|timed out|abort)/i;

type ErrorOptions = {
  retryable?: boolean;
  provider?: string;
  operation?: ProviderOperation;
  details?: Record<string, JsonValue>;
  cause?: unknown;
};

export const isRetryableByCode = (code: ProviderErrorCode): boolean => {
  return code === "timeout"
    || code === "network"
    || code === "upstream"
    || code === "rate_limit_exceeded";
};

export class ProviderRuntimeError extends Error {
  readonly code: ProviderErrorCode;
  readonly retryable: boolean;
  readonly provider?: string;
  readonly operation?: ProviderOperation;
  readonly details?: Record<string, JsonValue>;

  constructor(code: ProviderErrorCode, message: string, options: ErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "ProviderRuntimeError";
    this.code = code;
    this.retryable = options.retryable ?? isRetryableByCode(code);
    this.provider = options.provider;
    this.operation = options.operation;
    this.details = options.details;
  }
}

/** Capability absent: hide the affordance, do not retry. */
export class UnsupportedOperationError extends ProviderRuntimeError {
  constructor(provider: string, operation: ProviderOperation, options: Omit<ErrorOptions, "provider" | "operation"> = {}) {
    super("unsupported_operation", `Provider ${provider} does not support ${operation}`, {
      ...options,
      provider,
      operation,
      retryable: false
    });
    this.name = "UnsupportedOperationError";
  }
}

export type UpstreamErrorCode = Extract<ProviderErrorCode, "upstream" | "timeout" | "network">;

/** Non-2xx, timeout, transport failure or malformed body from an upstream service. */
export class UpstreamError extends ProviderRuntimeError {
  declare readonly code: UpstreamErrorCode;
  readonly status?: number;

  constructor(message: string, options: ErrorOptions & { code?: UpstreamErrorCode; status?: number } = {}) {
    const { code = "upstream", status, ...rest } = options;
    super(code, message, {
      ...rest,
      details: {
        ...(rest.details ?? {}),
        ...(typeof status === "number" ? { status } : {})
      }
    });
    this.name = "UpstreamError";
    this.status = status;
  }
}

export class RateLimitExceededError extends ProviderRuntimeError {
  constructor(provider: string, maxQueueDepth: number) {
    super("rate_limit_exceeded", `Rate governor queue for ${provider} is full (${maxQueueDepth} waiting)`, {
      provider,
      retryable: true,
      details: { maxQueueDepth }
    });
    this.name = "RateLimitExceededError";
  }
}

export class UnknownProviderError extends ProviderRuntimeError {
  constructor(provider: string) {
    super("unknown_provider", provider ? `Unknown provider: ${provider}` : "No provider registered", {
      provider: provider || undefined,
      retryable: false
    });
    this.name = "UnknownProviderError";
  }
}

export class DuplicateProviderError extends ProviderRuntimeError {
  constructor(provider: string) {
    super("duplicate_provider", `Provider already registered: ${provider}`, {
      provider,
      retryable: false
    });
    this.name = "DuplicateProviderError";
  }
}

export const invalidInput = (
  message: string,
  options: Omit<ErrorOptions, "retryable"> = {}
): ProviderRuntimeError => {
  return new ProviderRuntimeError("invalid_input", message, { ...options, retryable: false });
};

export const cancelledError = (reason = "Caller abandoned the request"): ProviderRuntimeError => {
  return new ProviderRuntimeError("cancelled", reason, { retryable: false });
};

export const isProviderRuntimeError = (value: unknown): value is ProviderRuntimeError => {
  return value instanceof ProviderRuntimeError;
};

/** Failures that another provider might serve; the fallback policy keys off this. */
export const isUpstreamFailure = (value: unknown): value is UpstreamError => {
  return value instanceof UpstreamError;
};

export const createProviderError = (
  code: ProviderErrorCode,
  message: string,
  options: Omit<ErrorOptions, "cause"> = {}
): ProviderError => {
  return {
    code,
    message,
    retryable: options.retryable ?? isRetryableByCode(code),
    ...(options.provider ? { provider: options.provider } : {}),
    ...(options.operation ? { operation: options.operation } : {}),
    ...(options.details && Object.keys(options.details).length > 0 ? { details: options.details } : {})
  };
};

export const toProviderError = (
  error: unknown,
  options: {
    provider?: string;
    operation?: ProviderOperation;
    defaultCode?: ProviderErrorCode;
  } = {}
): ProviderError => {
  if (isProviderRuntimeError(error)) {
    return createProviderError(error.code, error.message, {
      retryable: error.retryable,
      provider: error.provider ?? options.provider,
      operation: error.operation ?? options.operation,
      details: error.details
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = classifyErrorCode(message, options.defaultCode ?? "internal");
  return createProviderError(code, message || "Unknown provider failure", {
    provider: options.provider,
    operation: options.operation
  });
};

const classifyErrorCode = (message: string, fallback: ProviderErrorCode): ProviderErrorCode => {
  if (!message) return fallback;
  if (TIMEOUT_RE.test(message)) return "timeout";
  if (RATE_LIMIT_RE.test(message)) return "rate_limit_exceeded";
  if (NETWORK_MESSAGE_RE.test(message)) return "network";
  if (/not supported|unsupported|not implemented/i.test(message)) return "unsupported_operation";
  return fallback;
};
