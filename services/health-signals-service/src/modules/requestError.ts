import axios from "axios";
import { FailureReason, SourceFailure } from "../interfaces/connector";

/**
 * Raised when an upstream answered 2xx with a body we cannot use.
 */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export function classifyRequestError(err: unknown): { reason: FailureReason; status?: number } {
  if (err instanceof MalformedResponseError) {
    return { reason: "malformed_response" };
  }

  if (axios.isAxiosError(err)) {
    const status = err.response?.status;

    if (status === 429) return { reason: "rate_limited", status };
    if (status !== undefined) return { reason: "http_error", status };

    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
      return { reason: "timeout" };
    }
  }

  return { reason: "network_error" };
}

export function toSourceFailure(source: string, url: string, err: unknown): SourceFailure {
  const { reason, status } = classifyRequestError(err);
  const message = err instanceof Error ? err.message : String(err);

  return status === undefined
    ? { source, url, reason, message }
    : { source, url, reason, message, status };
}

/**
 * Whether the failure says something about the upstream's health,
 * as opposed to the content of one response.
 */
export function isUpstreamFailure(reason: FailureReason): boolean {
  return reason === "network_error" || reason === "timeout" || reason === "http_error" || reason === "rate_limited";
}
