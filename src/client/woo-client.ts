/**
 * WooCommerce REST API client.
 *
 * Handles authentication (HTTP Basic or query-string credentials), endpoint
 * construction, list paging parameters and failure classification.
 *
 * Every call resolves to a `Result`; nothing here throws for a store or
 * network failure. One method call issues exactly one HTTP request: list
 * pages are never followed automatically and nothing is retried.
 */

import { fetch, type Response } from "undici";
import type { AdapterConfig } from "../config.js";
import { classifyStatus, err, ok, type Result, type WooFailure } from "../errors.js";
import { childLogger } from "../logger.js";
import type {
  DeleteOptions,
  ListFilters,
  QueryValue,
  WooCredentials,
  WooErrorBody,
  WooRecord,
  WooResourceName,
} from "../types/woocommerce.js";

export const DEFAULT_PER_PAGE = 10;
export const MAX_PER_PAGE = 100;

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
}

const log = childLogger("woo-client");

function isRecord(value: unknown): value is WooRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRecordArray(value: unknown): value is WooRecord[] {
  return Array.isArray(value) && value.every(isRecord);
}

/** Keeps the string-valued entries of an object, e.g. per-field reasons in an error body. */
function stringEntries(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const entries: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") entries[key] = entry;
  }
  return entries;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}

/**
 * Operations on one WooCommerce collection, e.g. `products`.
 */
export class WooResource {
  constructor(
    private readonly client: WooClient,
    readonly name: WooResourceName,
  ) {}

  list(filters: ListFilters = {}, signal?: AbortSignal): Promise<Result<WooRecord[]>> {
    const query: Record<string, QueryValue> = {
      ...filters,
      page: filters.page ?? 1,
      per_page: filters.per_page ?? DEFAULT_PER_PAGE,
    };
    return this.client.request("GET", this.name, isRecordArray, { query, signal });
  }

  get(id: number, signal?: AbortSignal): Promise<Result<WooRecord>> {
    return this.client.request("GET", this.path(id), isRecord, { signal });
  }

  create(body: WooRecord, signal?: AbortSignal): Promise<Result<WooRecord>> {
    return this.client.request("POST", this.name, isRecord, { body, signal });
  }

  update(id: number, body: WooRecord, signal?: AbortSignal): Promise<Result<WooRecord>> {
    return this.client.request("PUT", this.path(id), isRecord, { body, signal });
  }

  delete(id: number, options: DeleteOptions = {}, signal?: AbortSignal): Promise<Result<WooRecord>> {
    const query: Record<string, QueryValue> = {};
    if (options.force) query.force = true;
    if (options.reassign !== undefined) query.reassign = options.reassign;
    return this.client.request("DELETE", this.path(id), isRecord, { query, signal });
  }

  private path(id: number): string {
    return `${this.name}/${encodeURIComponent(String(id))}`;
  }
}

export class WooClient {
  readonly products: WooResource;
  readonly orders: WooResource;
  readonly customers: WooResource;
  readonly productCategories: WooResource;

  private readonly credentials: WooCredentials;
  private readonly timeout: number;
  private readonly queryStringAuth: boolean;
  private readonly headers: Record<string, string>;

  constructor(config: AdapterConfig) {
    this.credentials = config.credentials;
    this.timeout = config.timeoutMs;
    this.queryStringAuth = config.queryStringAuth;

    this.headers = { Accept: "application/json" };
    if (!this.queryStringAuth) {
      const pair = `${this.credentials.consumerKey}:${this.credentials.consumerSecret}`;
      this.headers["Authorization"] = `Basic ${Buffer.from(pair, "utf8").toString("base64")}`;
    }

    this.products = new WooResource(this, "products");
    this.orders = new WooResource(this, "orders");
    this.customers = new WooResource(this, "customers");
    this.productCategories = new WooResource(this, "products/categories");
  }

  /** Store environment, versions and settings, from `GET system_status`. */
  systemStatus(signal?: AbortSignal): Promise<Result<WooRecord>> {
    return this.request("GET", "system_status", isRecord, { signal });
  }

  buildUrl(endpoint: string, query: Record<string, QueryValue> = {}): string {
    const { storeUrl, apiVersion } = this.credentials;
    const url = new URL(`${storeUrl}/wp-json/${apiVersion}/${endpoint.replace(/^\//, "")}`);

    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) continue;
      url.searchParams.set(key, Array.isArray(value) ? value.join(",") : String(value));
    }

    if (this.queryStringAuth) {
      url.searchParams.set("consumer_key", this.credentials.consumerKey);
      url.searchParams.set("consumer_secret", this.credentials.consumerSecret);
    }

    return url.toString();
  }

  async request<T>(
    method: HttpMethod,
    endpoint: string,
    accept: (value: unknown) => value is T,
    options: RequestOptions = {},
  ): Promise<Result<T>> {
    const url = this.buildUrl(endpoint, options.query);
    const headers = { ...this.headers };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.body);
    }

    const timeoutSignal = AbortSignal.timeout(this.timeout);
    const signal = options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal;
    const failure = (kind: WooFailure["kind"], message: string, extra: Partial<WooFailure> = {}): WooFailure => ({
      kind,
      message,
      method,
      endpoint,
      ...extra,
    });

    const started = Date.now();
    let response: Response;
    try {
      response = await fetch(url, { method, headers, body, signal });
    } catch (error: unknown) {
      if (options.signal?.aborted) {
        log.debug({ method, endpoint }, "request cancelled");
        return err(failure("Cancelled", `${method} ${endpoint} was cancelled`));
      }
      const message = timeoutSignal.aborted
        ? `${method} ${endpoint} timed out after ${this.timeout}ms`
        : `${method} ${endpoint} failed: ${describeError(error)}`;
      log.warn({ method, endpoint, err: describeError(error) }, "request failed");
      return err(failure("TransientError", message));
    }

    const durationMs = Date.now() - started;
    log.debug({ method, endpoint, status: response.status, durationMs }, "request completed");

    if (!response.ok) {
      const detail = await this.readErrorBody(response);
      const kind = classifyStatus(response.status);
      log.warn({ method, endpoint, status: response.status, code: detail.code, kind }, "store rejected request");
      return err(
        failure(kind, `WooCommerce API error: ${method} ${endpoint} returned ${response.status}. ${detail.message}`, {
          status: response.status,
          code: detail.code,
        }),
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error: unknown) {
      return err(
        failure("TransientError", `${method} ${endpoint} returned a body that is not JSON: ${describeError(error)}`, {
          status: response.status,
        }),
      );
    }

    if (!accept(payload)) {
      return err(
        failure("TransientError", `${method} ${endpoint} returned an unexpected response shape`, {
          status: response.status,
        }),
      );
    }

    return ok(payload);
  }

  private async readErrorBody(response: Response): Promise<{ message: string; code?: string }> {
    let text: string;
    try {
      text = await response.text();
    } catch (error: unknown) {
      return { message: `Detail unavailable: ${describeError(error)}` };
    }

    const verbatim = { message: `Detail: ${text.slice(0, 500) || response.statusText}` };
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      // HTML error pages from proxies or PHP fatals are reported as-is.
      return verbatim;
    }

    if (!isRecord(body)) return verbatim;
    const { code, message, data } = body;
    const woo: WooErrorBody = {
      code: typeof code === "string" ? code : undefined,
      message: typeof message === "string" ? message : undefined,
      data: isRecord(data) ? { params: stringEntries(data.params) } : undefined,
    };
    if (!woo.message) return { ...verbatim, code: woo.code };

    const reasons = Object.entries(woo.data?.params ?? {}).map(([field, reason]) => `${field}: ${reason}`);
    const detail = reasons.length > 0 ? `${woo.message} (${reasons.join("; ")})` : woo.message;
    return { message: `Detail: ${detail}`, code: woo.code };
  }
}
