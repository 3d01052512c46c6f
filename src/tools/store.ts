/**
 * Store-level read tools: product categories and system status.
 */

import { z } from "zod";
import type { WooClient } from "../client/woo-client.js";
import { defineTool, type RegisteredTool } from "./registry.js";
import { idSchema, paginationSchema } from "./_helpers.js";

export function storeTools(client: WooClient): RegisteredTool[] {
  return [
    defineTool({
      name: "list_product_categories",
      description: "List product categories with their product counts, one page at a time.",
      resource: "products/categories",
      operation: "list",
      schema: z.object({
        ...paginationSchema,
        search: z.string().optional(),
        parent: z.number().int().min(0).optional().describe("Only children of this category ID"),
        hide_empty: z.boolean().optional().describe("Skip categories with no products"),
        orderby: z.enum(["id", "include", "name", "slug", "term_group", "description", "count"]).optional(),
      }),
      handler: (params, { signal }) => client.productCategories.list(params, signal),
    }),

    defineTool({
      name: "get_product_category",
      description: "Retrieve a single product category by ID.",
      resource: "products/categories",
      operation: "get",
      schema: z.object({ id: idSchema.describe("Category ID") }),
      handler: (params, { signal }) => client.productCategories.get(params.id, signal),
    }),

    defineTool({
      name: "get_system_status",
      description: "Report the store's environment: WordPress and WooCommerce versions, active plugins, theme and settings.",
      resource: "system_status",
      operation: "read",
      schema: z.object({}),
      handler: (_params, { signal }) => client.systemStatus(signal),
    }),
  ];
}
