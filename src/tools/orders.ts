/**
 * Order tools: list, get, create, update, delete.
 */

import { z } from "zod";
import type { WooClient } from "../client/woo-client.js";
import { defineTool, type RegisteredTool } from "./registry.js";
import { addressSchema, forceSchema, idSchema, metaDataSchema, paginationSchema } from "./_helpers.js";

const orderStatusSchema = z.enum([
  "pending",
  "processing",
  "on-hold",
  "completed",
  "cancelled",
  "refunded",
  "failed",
  "trash",
]);

const lineItemSchema = z.looseObject({
  id: idSchema.optional().describe("Existing line item ID (updates only)"),
  product_id: idSchema.optional(),
  variation_id: idSchema.optional(),
  quantity: z.number().int().min(0),
  sku: z.string().optional(),
  subtotal: z.string().optional(),
  total: z.string().optional(),
  meta_data: metaDataSchema.optional(),
});

const orderFields = {
  status: orderStatusSchema.optional(),
  currency: z.string().length(3).optional(),
  customer_id: z.number().int().min(0).optional().describe("Customer ID, 0 for guests"),
  customer_note: z.string().optional(),
  billing: addressSchema.optional(),
  shipping: addressSchema.optional(),
  payment_method: z.string().optional(),
  payment_method_title: z.string().optional(),
  transaction_id: z.string().optional(),
  set_paid: z.boolean().optional(),
  line_items: z.array(lineItemSchema).optional(),
  shipping_lines: z.array(z.looseObject({ method_id: z.string(), method_title: z.string().optional(), total: z.string().optional() })).optional(),
  fee_lines: z.array(z.looseObject({ name: z.string(), total: z.string().optional() })).optional(),
  coupon_lines: z.array(z.looseObject({ code: z.string() })).optional(),
  meta_data: metaDataSchema.optional(),
};

export function orderTools(client: WooClient): RegisteredTool[] {
  const orders = client.orders;

  return [
    defineTool({
      name: "list_orders",
      description:
        "List orders, one page at a time. Filter by status, customer, product, search text or creation date range.",
      resource: "orders",
      operation: "list",
      schema: z.object({
        ...paginationSchema,
        search: z.string().optional(),
        status: z.array(z.union([orderStatusSchema, z.literal("any")])).optional().describe("Order statuses to include"),
        customer: z.number().int().min(0).optional().describe("Customer ID"),
        product: idSchema.optional().describe("Only orders containing this product ID"),
        after: z.string().optional().describe("ISO 8601 date: orders created after this moment"),
        before: z.string().optional().describe("ISO 8601 date: orders created before this moment"),
        orderby: z.enum(["date", "id", "include", "title", "slug"]).optional(),
      }),
      handler: (params, { signal }) => orders.list(params, signal),
    }),

    defineTool({
      name: "get_order",
      description: "Retrieve a single order by ID, including line items, billing and shipping details, and totals.",
      resource: "orders",
      operation: "get",
      schema: z.object({ id: idSchema.describe("Order ID") }),
      handler: (params, { signal }) => orders.get(params.id, signal),
    }),

    defineTool({
      name: "create_order",
      description:
        "Create an order from line items, with optional billing and shipping addresses and payment details. Returns the order with its new ID.",
      resource: "orders",
      operation: "create",
      schema: z.object({
        order: z.looseObject({
          ...orderFields,
          line_items: z
            .array(lineItemSchema.refine((item) => item.product_id !== undefined || item.sku !== undefined, {
              error: "Each line item needs a product_id or sku",
            }))
            .min(1)
            .describe("Products to order"),
        }),
      }),
      handler: (params, { signal }) => orders.create(params.order, signal),
    }),

    defineTool({
      name: "update_order",
      description: "Update an order, e.g. change its status, addresses, customer note or line items.",
      resource: "orders",
      operation: "update",
      schema: z.object({
        id: idSchema.describe("Order ID"),
        updates: z
          .looseObject(orderFields)
          .refine((updates) => Object.keys(updates).length > 0, { error: "Provide at least one field to update" }),
      }),
      handler: (params, { signal }) => orders.update(params.id, params.updates, signal),
    }),

    defineTool({
      name: "delete_order",
      description: "Delete an order. Moves it to the trash unless force is true.",
      resource: "orders",
      operation: "delete",
      schema: z.object({ id: idSchema.describe("Order ID"), force: forceSchema }),
      handler: (params, { signal }) => orders.delete(params.id, { force: params.force }, signal),
    }),
  ];
}
