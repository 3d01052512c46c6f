/**
 * Error taxonomy shared by the WooCommerce client, the tool handlers and the
 * dispatcher.
 *
 * Store and validation failures travel as values (`Result`) from the client
 * through the handlers to the dispatcher. Only startup problems
 * (`ConfigError`, `ToolRegistryError`) are thrown.
 */

export type WooErrorKind =
  | "ValidationError"
  | "AuthError"
  | "NotFoundError"
  | "TransientError"
  | "Cancelled";

/** Kinds a caller can see in a failed tool result. */
export type ToolErrorKind = Exclude<WooErrorKind, "Cancelled"> | "UnknownTool" | "Unavailable";

export interface WooFailure {
  kind: WooErrorKind;
  message: string;
  /** HTTP status, when the store answered at all. */
  status?: number;
  /** WooCommerce error code, e.g. `woocommerce_rest_product_invalid_id`. */
  code?: string;
  method?: string;
  endpoint?: string;
}

export type Result<T, E = WooFailure> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Maps an HTTP status from the store to a failure kind.
 *
 * 429 is treated as transient: the request itself was fine, the store is
 * rate limiting. Remaining 4xx statuses mean the store rejected the request.
 */
export function classifyStatus(status: number): Exclude<WooErrorKind, "Cancelled"> {
  if (status === 401 || status === 403) return "AuthError";
  if (status === 404) return "NotFoundError";
  if (status === 429 || status >= 500) return "TransientError";
  return "ValidationError";
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ToolRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolRegistryError";
  }
}
