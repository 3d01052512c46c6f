/**
 * Customer tools: list, get, create, update, delete.
 *
 * WooCommerce cannot trash customers, so `delete_customer` always deletes
 * permanently.
 */

import { z } from "zod";
import type { WooClient } from "../client/woo-client.js";
import { defineTool, type RegisteredTool } from "./registry.js";
import { addressSchema, idSchema, metaDataSchema, paginationSchema } from "./_helpers.js";

const customerFields = {
  email: z.email().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  billing: addressSchema.optional(),
  shipping: addressSchema.optional(),
  meta_data: metaDataSchema.optional(),
};

export function customerTools(client: WooClient): RegisteredTool[] {
  const customers = client.customers;

  return [
    defineTool({
      name: "list_customers",
      description: "List customers, one page at a time. Filter by search text, email or role.",
      resource: "customers",
      operation: "list",
      schema: z.object({
        ...paginationSchema,
        search: z.string().optional(),
        email: z.email().optional().describe("Limit results to this email address"),
        role: z.string().optional().describe("Limit results to a user role, e.g. customer or all"),
        orderby: z.enum(["id", "include", "name", "registered_date"]).optional(),
      }),
      handler: (params, { signal }) => customers.list(params, signal),
    }),

    defineTool({
      name: "get_customer",
      description: "Retrieve a single customer by ID, including billing and shipping addresses.",
      resource: "customers",
      operation: "get",
      schema: z.object({ id: idSchema.describe("Customer ID") }),
      handler: (params, { signal }) => customers.get(params.id, signal),
    }),

    defineTool({
      name: "create_customer",
      description: "Create a customer account. Returns the customer with its new ID.",
      resource: "customers",
      operation: "create",
      schema: z.object({
        customer: z.looseObject({ ...customerFields, email: z.email().describe("Customer email address") }),
      }),
      handler: (params, { signal }) => customers.create(params.customer, signal),
    }),

    defineTool({
      name: "update_customer",
      description: "Update a customer's email, name or addresses.",
      resource: "customers",
      operation: "update",
      schema: z.object({
        id: idSchema.describe("Customer ID"),
        updates: z
          .looseObject(customerFields)
          .refine((updates) => Object.keys(updates).length > 0, { error: "Provide at least one field to update" }),
      }),
      handler: (params, { signal }) => customers.update(params.id, params.updates, signal),
    }),

    defineTool({
      name: "delete_customer",
      description: "Permanently delete a customer. Optionally reassign their posts to another user ID.",
      resource: "customers",
      operation: "delete",
      schema: z.object({
        id: idSchema.describe("Customer ID"),
        reassign: idSchema.optional().describe("User ID to reassign the customer's posts to"),
      }),
      handler: (params, { signal }) => customers.delete(params.id, { force: true, reassign: params.reassign }, signal),
    }),
  ];
}
