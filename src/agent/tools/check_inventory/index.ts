import { z } from "zod";
import type { InventoryRow } from "../../../store/repositories.js";
import { normalizeSize } from "../../../utils/size.js";
import type { ToolPackage } from "../types.js";
import { fail, ok } from "../util.js";

const inputSchema = z
  .object({
    product_id: z.string().min(1).optional(),
    sku: z.string().min(1).optional(),
    size: z.string().min(1).optional()
  })
  .refine((value) => value.product_id !== undefined || value.sku !== undefined, {
    message: "product_id or sku is required",
    path: ["product_id"]
  });

export type InventoryResult = {
  product_id: string;
  product_name: string | null;
  sku: string | null;
  size: string | null;
  available: boolean;
  quantity: number;
  location: string | null;
  sizes: string[];
};

/**
 * With a size: that size's row. Without one: availability across all sizes,
 * reporting the location of the first row that has stock.
 */
export const summarizeInventory = (
  productId: string,
  productName: string | null,
  rows: InventoryRow[],
  size?: string
): InventoryResult => {
  const inStockSizes = rows.filter((row) => row.quantity > 0).map((row) => normalizeSize(row.size));

  if (size !== undefined) {
    const wanted = normalizeSize(size);
    const row = rows.find((candidate) => normalizeSize(candidate.size) === wanted);
    return {
      product_id: productId,
      product_name: productName,
      sku: row?.sku ?? rows[0]?.sku ?? null,
      size: wanted,
      available: (row?.quantity ?? 0) > 0,
      quantity: row?.quantity ?? 0,
      location: row?.location ?? null,
      sizes: inStockSizes
    };
  }

  const firstInStock = rows.find((row) => row.quantity > 0);
  const quantity = rows.reduce((sum, row) => sum + Math.max(row.quantity, 0), 0);
  return {
    product_id: productId,
    product_name: productName,
    sku: rows[0]?.sku ?? null,
    size: null,
    available: quantity > 0,
    quantity,
    location: firstInStock?.location ?? null,
    sizes: inStockSizes
  };
};

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "check_inventory",
    description: "Stock level for a product (by product_id or sku), optionally for one size.",
    inputSchema,
    safety: { sideEffects: "none" }
  },
  runtime: {
    run: async (input, ctx) => {
      const rows = input.sku !== undefined ? ctx.repos.inventory.bySku(input.sku) : ctx.repos.inventory.byProduct(input.product_id ?? "");
      const productId = rows[0]?.product_id ?? input.product_id;
      const product = productId !== undefined ? ctx.repos.products.findById(productId) : undefined;
      if (!product) {
        return fail("PRODUCT_NOT_FOUND", `No product matches ${input.sku !== undefined ? `sku ${input.sku}` : `product_id ${input.product_id ?? ""}`}`);
      }
      return ok(summarizeInventory(product.product_id, product.name, rows, input.size));
    }
  }
};
