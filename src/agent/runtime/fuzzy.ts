export type RecommendedItem = { product_id: string; name: string };

/** "PROD-Men's Shirt" → "mens-shirt". */
export const slugify = (value: string): string =>
  value
    .toLowerCase()
    .replace(/^prod/, "")
    .replace(/['’]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

/** Exact (case-insensitive) name first, then containment either way. */
export const matchByName = (items: readonly RecommendedItem[], name: string): RecommendedItem | undefined => {
  const wanted = name.trim().toLowerCase();
  if (wanted.length === 0) return undefined;
  const exact = items.find((item) => item.name.toLowerCase() === wanted);
  if (exact) return exact;
  return items.find((item) => {
    const candidate = item.name.toLowerCase();
    return candidate.includes(wanted) || wanted.includes(candidate);
  });
};

const slugMatches = (a: string, b: string): boolean =>
  a.length > 0 && b.length > 0 && (a === b || a.startsWith(b) || b.startsWith(a) || a.endsWith(b) || b.endsWith(a));

/**
 * Maps a product_id the planner made up onto one that was actually recommended.
 * Known ids pass through; a slug match on names wins; otherwise the first item.
 */
export const reconcileProductId = (productId: string, items: readonly RecommendedItem[]): string => {
  if (items.length === 0) return productId;
  const known = items.find((item) => item.product_id.toLowerCase() === productId.toLowerCase());
  if (known) return known.product_id;

  const wanted = slugify(productId);
  const bySlug = items.find((item) => slugMatches(wanted, slugify(item.name)));
  return (bySlug ?? items[0]).product_id;
};
