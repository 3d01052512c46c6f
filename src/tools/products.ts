/**
 * Product tools: list, get, create, update, delete.
 *
 * `update_product` also accepts `meta_title` / `meta_description`, written to
 * the Yoast SEO meta keys WooCommerce stores in `meta_data`.
 */

import { z } from "zod";
import type { WooClient } from "../client/woo-client.js";
import { defineTool, type RegisteredTool } from "./registry.js";
import { forceSchema, idSchema, metaDataSchema, paginationSchema } from "./_helpers.js";

export const SEO_TITLE_META_KEY = "_yoast_wpseo_title";
export const SEO_DESCRIPTION_META_KEY = "_yoast_wpseo_metadesc";

const productFields = {
  name: z.string().min(1).optional(),
  type: z.enum(["simple", "grouped", "external", "variable"]).optional(),
  status: z.enum(["draft", "pending", "private", "publish"]).optional(),
  sku: z.string().optional(),
  regular_price: z.string().optional().describe("Regular price as a decimal string, e.g. \"19.99\""),
  sale_price: z.string().optional(),
  description: z.string().optional(),
  short_description: z.string().optional(),
  manage_stock: z.boolean().optional(),
  stock_quantity: z.number().int().nullable().optional(),
  stock_status: z.enum(["instock", "outofstock", "onbackorder"]).optional(),
  categories: z.array(z.object({ id: idSchema })).optional(),
  images: z.array(z.looseObject({ src: z.string().optional(), alt: z.string().optional() })).optional(),
  meta_data: metaDataSchema.optional(),
};

const listProductsSchema = z.object({
  ...paginationSchema,
  search: z.string().optional().describe("Limit results to those matching a string"),
  status: z.enum(["any", "draft", "pending", "private", "publish"]).optional(),
  type: z.enum(["simple", "grouped", "external", "variable"]).optional(),
  sku: z.string().optional().describe("Limit results to products with this SKU"),
  category: idSchema.optional().describe("Limit results to products in this category ID"),
  tag: idSchema.optional().describe("Limit results to products with this tag ID"),
  featured: z.boolean().optional(),
  on_sale: z.boolean().optional(),
  stock_status: z.enum(["instock", "outofstock", "onbackorder"]).optional(),
  min_price: z.string().optional(),
  max_price: z.string().optional(),
  include: z.array(idSchema).optional().describe("Limit results to these product IDs"),
  orderby: z.enum(["date", "id", "include", "title", "slug", "price", "popularity", "rating"]).optional(),
});

const updateProductSchema = z
  .object({
    id: idSchema.describe("Product ID"),
    updates: z.looseObject(productFields).optional().describe("Product fields to change"),
    meta_title: z.string().optional().describe("SEO title"),
    meta_description: z.string().optional().describe("SEO meta description"),
  })
  .refine(
    (params) =>
      Object.keys(params.updates ?? {}).length > 0 || params.meta_title !== undefined || params.meta_description !== undefined,
    { error: "Provide updates, meta_title or meta_description", path: ["updates"] },
  );

type UpdateProductParams = z.output<typeof updateProductSchema>;

export function buildProductUpdate(params: UpdateProductParams): Record<string, unknown> {
  const body: Record<string, unknown> = { ...params.updates };
  const seoMeta: Array<{ key: string; value: string }> = [];
  if (params.meta_title !== undefined) seoMeta.push({ key: SEO_TITLE_META_KEY, value: params.meta_title });
  if (params.meta_description !== undefined) seoMeta.push({ key: SEO_DESCRIPTION_META_KEY, value: params.meta_description });

  if (seoMeta.length > 0) {
    const existing = params.updates?.meta_data ?? [];
    body.meta_data = [...existing.filter((entry) => !seoMeta.some((m) => m.key === entry.key)), ...seoMeta];
  }
  return body;
}

export function productTools(client: WooClient): RegisteredTool[] {
  const products = client.products;

  return [
    defineTool({
      name: "list_products",
      description:
        "List catalog products, one page at a time. Filter by search text, status, type, SKU, category, tag, stock status or price range.",
      resource: "products",
      operation: "list",
      schema: listProductsSchema,
      handler: (params, { signal }) => products.list(params, signal),
    }),

    defineTool({
      name: "get_product",
      description: "Retrieve a single product by ID, including prices, stock, categories, images and meta data.",
      resource: "products",
      operation: "get",
      schema: z.object({ id: idSchema.describe("Product ID") }),
      handler: (params, { signal }) => products.get(params.id, signal),
    }),

    defineTool({
      name: "create_product",
      description: "Create a product. Returns the created product with its new ID.",
      resource: "products",
      operation: "create",
      schema: z.object({
        product: z.looseObject({ ...productFields, name: z.string().min(1).describe("Product name") }),
      }),
      handler: (params, { signal }) => products.create(params.product, signal),
    }),

    defineTool({
      name: "update_product",
      description:
        "Update a product's fields, e.g. description, short_description, prices or stock. meta_title and meta_description set the product's SEO metadata.",
      resource: "products",
      operation: "update",
      schema: updateProductSchema,
      handler: (params, { signal }) => products.update(params.id, buildProductUpdate(params), signal),
    }),

    defineTool({
      name: "delete_product",
      description: "Delete a product. Moves it to the trash unless force is true.",
      resource: "products",
      operation: "delete",
      schema: z.object({ id: idSchema.describe("Product ID"), force: forceSchema }),
      handler: (params, { signal }) => products.delete(params.id, { force: params.force }, signal),
    }),
  ];
}
