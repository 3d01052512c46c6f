/**
 * Shared parameter schemas and result helpers for the WooCommerce tools:
 * - Paging (`page`, `per_page`) and sort order, as WooCommerce names them
 * - Positive integer resource IDs
 * - Billing/shipping address shape
 * - Success/failure content blocks
 */

import { z } from "zod";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { MAX_PER_PAGE, DEFAULT_PER_PAGE } from "../client/woo-client.js";
import type { ToolErrorKind } from "../errors.js";

export const idSchema = z.number().int().positive();

export const paginationSchema = {
  page: z.number().int().min(1).optional().describe("Page of the collection to return (default: 1)"),
  per_page: z
    .number()
    .int()
    .min(1)
    .max(MAX_PER_PAGE)
    .optional()
    .describe(`Maximum number of items per page (default: ${DEFAULT_PER_PAGE}, max: ${MAX_PER_PAGE})`),
  order: z.enum(["asc", "desc"]).optional().describe("Sort direction"),
};

export const forceSchema = z
  .boolean()
  .optional()
  .describe("Delete permanently instead of moving to the trash");

export const addressSchema = z.looseObject({
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  company: z.string().optional(),
  address_1: z.string().optional(),
  address_2: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  postcode: z.string().optional(),
  country: z.string().optional().describe("ISO 3166-1 alpha-2 country code"),
  email: z.email().optional(),
  phone: z.string().optional(),
});

export const metaDataSchema = z.array(
  z.object({
    key: z.string(),
    value: z.unknown(),
  }),
);

export function successResult(payload: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
}

export function errorResult(error: { kind: ToolErrorKind; message: string; status?: number; code?: string }): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ success: false, error }) }],
    isError: true,
  };
}
