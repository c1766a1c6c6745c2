import { Agent } from "node:https";
import axios, { type AxiosAdapter, type AxiosInstance, isAxiosError } from "axios";
import type { z } from "zod";
import { ComponentError, type ComponentErrorCode } from "../lifecycle/errors.js";

export interface HttpClientOpts {
  baseURL: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  auth?: { username: string; password: string };
  /** Self-signed appliance and BMC certificates are the norm; verification is opt-in. */
  verifyTls?: boolean;
  /** Replaces the transport. Tests pass an in-process adapter here. */
  adapter?: AxiosAdapter;
}

export function createHttpClient(opts: HttpClientOpts): AxiosInstance {
  return axios.create({
    baseURL: opts.baseURL,
    timeout: opts.timeoutMs,
    headers: {
      "Content-Type": "application/json",
      Accept: "application/json",
      ...opts.headers,
    },
    auth: opts.auth,
    httpsAgent: new Agent({ rejectUnauthorized: opts.verifyTls ?? false }),
    adapter: opts.adapter,
  });
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export interface HttpFailure {
  status?: number;
  /** Response body flattened to text, for matching vendor error messages. */
  body: string;
  timedOut: boolean;
}

/** Status and body of a failed request, or undefined when err is not an HTTP error. */
export function httpFailure(err: unknown): HttpFailure | undefined {
  if (!isAxiosError(err)) return undefined;
  const data: unknown = err.response?.data;
  return {
    status: err.response?.status,
    body: typeof data === "string" ? data : JSON.stringify(data ?? ""),
    timedOut: err.code !== undefined && TIMEOUT_CODES.has(err.code),
  };
}

/**
 * Map a transport error to a ComponentError.
 * Timeouts → TIMEOUT, no response or 401/403 → CONNECTIVITY, anything else → fallback.
 */
export function toComponentError(
  err: unknown,
  action: string,
  fallback: ComponentErrorCode = "INTERNAL",
  details: ComponentError["details"] = {},
): ComponentError {
  if (err instanceof ComponentError) return err;

  const failure = httpFailure(err);
  const reason = err instanceof Error ? err.message : String(err);
  if (!failure) {
    return new ComponentError(fallback, `${action}: ${reason}`, { ...details, cause: err });
  }
  if (failure.timedOut) {
    return new ComponentError("TIMEOUT", `${action}: timed out`, { ...details, cause: err });
  }
  if (failure.status === undefined) {
    return new ComponentError("CONNECTIVITY", `${action}: ${reason}`, { ...details, cause: err });
  }
  if (failure.status === 401 || failure.status === 403) {
    return new ComponentError(
      "CONNECTIVITY",
      `${action}: authentication rejected (HTTP ${failure.status})`,
      { ...details, status: failure.status, cause: err },
    );
  }
  return new ComponentError(
    fallback,
    `${action}: HTTP ${failure.status} ${failure.body}`.trim(),
    { ...details, status: failure.status, cause: err },
  );
}

/** True for a 404 response. Existence queries use it to mean "absent". */
export function isNotFound(err: unknown): boolean {
  return httpFailure(err)?.status === 404;
}

/** Narrow an untrusted response body. A mismatch is reported, never cast. */
export function parseResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  action: string,
): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first?.path.join(".") || "(root)";
    throw new ComponentError(
      "INTERNAL",
      `${action}: unexpected response shape at ${where}: ${first?.message ?? "invalid"}`,
    );
  }
  return parsed.data;
}
