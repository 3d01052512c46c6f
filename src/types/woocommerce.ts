/**
 * Type definitions for the WooCommerce REST API v3 surface this server uses.
 *
 * Store records are kept opaque: the server never interprets their fields
 * beyond the `id` used to build URLs. Field names follow WooCommerce's
 * snake_case convention exactly.
 */

export interface WooCredentials {
  readonly storeUrl: string;
  readonly consumerKey: string;
  readonly consumerSecret: string;
  readonly apiVersion: string;
}

/** A product, order, customer or category exactly as the store returned it. */
export interface WooRecord {
  [field: string]: unknown;
}

export type WooResourceName = "products" | "orders" | "customers" | "products/categories";

export type QueryValue = string | number | boolean | ReadonlyArray<string | number> | undefined;

export interface ListFilters {
  page?: number;
  per_page?: number;
  [filter: string]: QueryValue;
}

export interface DeleteOptions {
  force?: boolean;
  /** Customers only: user ID that receives the deleted customer's posts. */
  reassign?: number;
}

/**
 * WooCommerce's error body: `{ code, message, data: { status, params } }`.
 * `params` maps each rejected field to its reason on `rest_invalid_param`.
 */
export interface WooErrorBody {
  code?: string;
  message?: string;
  data?: { status?: number; params?: Record<string, string> };
}
