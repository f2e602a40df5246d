import { z } from "zod";
import type { ProductRepository, ProductRow } from "../../../store/repositories.js";
import { genderFromTokens, normalizeGender, type Gender } from "../../../utils/gender.js";
import { tokenSet, tokenize } from "../../../utils/text.js";
import type { ToolPackage } from "../types.js";
import { ok } from "../util.js";

export const MAX_RECOMMENDATIONS = 10;

const inputSchema = z.object({
  category: z.string().trim().min(1),
  gender: z.string().optional(),
  price_range: z.string().optional(),
  limit: z.number().int().positive().max(MAX_RECOMMENDATIONS).default(MAX_RECOMMENDATIONS)
});

export type PriceRange = { min: number; max: number };

/** "100-500" → bounds; "any", blank or malformed ranges mean no filter. */
export const parsePriceRange = (value: string | undefined): PriceRange | undefined => {
  if (!value) return undefined;
  const match = /^\s*(\d+(?:\.\d+)?)\s*-\s*(\d+(?:\.\d+)?)\s*$/.exec(value);
  if (!match) return undefined;
  const min = Number(match[1]);
  const max = Number(match[2]);
  return min <= max ? { min, max } : { min: max, max: min };
};

/** Unisex products (no gendered words in name or category) carry no gender. */
export const productGender = (product: ProductRow): Gender | undefined =>
  genderFromTokens(tokenSet(`${product.name} ${product.category}`));

const singular = (token: string): string => (token.length > 4 && token.endsWith("s") ? token.slice(0, -1) : token);

const GENERIC_TOKENS = new Set(["women", "womens", "men", "mens", "for", "and", "the", "with"]);

/** Containment on category or name, then per-word containment. */
export const findCandidates = (products: ProductRepository, category: string): ProductRow[] => {
  const contained = products.search(category);
  if (contained.length > 0) return contained;

  const seen = new Map<string, ProductRow>();
  tokenize(category)
    .filter((token) => token.length >= 3 && !GENERIC_TOKENS.has(token))
    .map(singular)
    .forEach((token) => {
      products.search(token).forEach((row) => {
        if (!seen.has(row.product_id)) seen.set(row.product_id, row);
      });
    });
  return [...seen.values()].sort((a, b) => a.base_price - b.base_price || a.product_id.localeCompare(b.product_id));
};

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "recommend_products",
    description: "Products matching a category or product type, optionally filtered by gender and a min-max price range, cheapest first.",
    inputSchema,
    safety: { sideEffects: "none" }
  },
  runtime: {
    run: async (input, ctx) => {
      // "Men's Fashion" also matches "Women's Fashion" by containment, so a gendered category implies the filter.
      const gender = (input.gender !== undefined ? normalizeGender(input.gender) : undefined) ?? normalizeGender(input.category);
      const range = parsePriceRange(input.price_range);

      const items = findCandidates(ctx.repos.products, input.category)
        .filter((product) => {
          if (gender === undefined) return true;
          const own = productGender(product);
          return own === undefined || own === gender;
        })
        .filter((product) => !range || (product.base_price >= range.min && product.base_price <= range.max))
        .slice(0, input.limit);

      return ok(items);
    }
  }
};
