import { ZodError } from "zod";
import { toProviderError } from "../providers/errors";
import type { ProviderError, ProviderErrorCode } from "../providers/types";

export const HTTP_STATUS_BY_CODE: Record<ProviderErrorCode, number> = {
  invalid_input: 400,
  unknown_provider: 404,
  duplicate_provider: 409,
  rate_limit_exceeded: 429,
  // Client closed the request before it settled.
  cancelled: 499,
  internal: 500,
  unsupported_operation: 501,
  upstream: 502,
  network: 502,
  timeout: 504
};

export type Envelope = {
  status_code: number;
  message: string;
  data: unknown;
  [paging: string]: unknown;
};

export type ErrorEnvelope = Envelope & { error: ProviderError };

export const successEnvelope = (data: unknown, extra: Record<string, unknown> = {}, message = "success"): Envelope => {
  return {
    status_code: 200,
    message,
    data,
    ...extra
  };
};

/** Maps any thrown value to the wire envelope; the HTTP status equals `status_code`. */
export const errorEnvelope = (error: unknown): ErrorEnvelope => {
  const providerError: ProviderError = error instanceof ZodError
    ? {
      code: "invalid_input",
      message: error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; "),
      retryable: false
    }
    : toProviderError(error);
  return {
    status_code: HTTP_STATUS_BY_CODE[providerError.code],
    message: providerError.message,
    data: null,
    error: providerError
  };
};
