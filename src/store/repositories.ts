import type { RetailDatabase } from "./database.js";

export type ProductRow = {
  product_id: string;
  name: string;
  category: string;
  base_price: number;
};

export type InventoryRow = {
  sku: string;
  product_id: string;
  size: string;
  quantity: number;
  location: string;
};

export type UserRow = {
  user_id: string;
  name: string;
  loyalty_tier: string;
};

export type OrderRow = {
  order_id: string;
  user_id: string;
  total_amount: number;
  status: string;
  created_at: string;
};

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (ch) => `\\${ch}`);

export const likePattern = (value: string): string => `%${escapeLike(value.trim().toLowerCase())}%`;

/** Read-only name lookups the parameter resolver falls back to. */
export interface ProductLookup {
  findByExactName(name: string): ProductRow | undefined;
  findByNameLike(name: string): ProductRow | undefined;
}

export class ProductRepository implements ProductLookup {
  constructor(private readonly db: RetailDatabase) {}

  findById(productId: string): ProductRow | undefined {
    return this.db
      .prepare<[string], ProductRow>("SELECT product_id, name, category, base_price FROM products WHERE product_id = ?")
      .get(productId);
  }

  findByExactName(name: string): ProductRow | undefined {
    return this.db
      .prepare<[string], ProductRow>(
        "SELECT product_id, name, category, base_price FROM products WHERE lower(name) = lower(?) ORDER BY product_id LIMIT 1"
      )
      .get(name.trim());
  }

  findByNameLike(name: string): ProductRow | undefined {
    return this.db
      .prepare<[string], ProductRow>(
        "SELECT product_id, name, category, base_price FROM products WHERE lower(name) LIKE ? ESCAPE '\\' ORDER BY length(name), product_id LIMIT 1"
      )
      .get(likePattern(name));
  }

  /** Category or name containment, cheapest first. */
  search(term: string): ProductRow[] {
    const pattern = likePattern(term);
    return this.db
      .prepare<[string, string], ProductRow>(
        `SELECT product_id, name, category, base_price FROM products
         WHERE lower(category) LIKE ? ESCAPE '\\' OR lower(name) LIKE ? ESCAPE '\\'
         ORDER BY base_price ASC, product_id ASC`
      )
      .all(pattern, pattern);
  }
}

export class InventoryRepository {
  constructor(private readonly db: RetailDatabase) {}

  byProduct(productId: string): InventoryRow[] {
    return this.db
      .prepare<[string], InventoryRow>(
        "SELECT sku, product_id, size, quantity, location FROM inventory WHERE product_id = ? ORDER BY rowid"
      )
      .all(productId);
  }

  bySku(sku: string): InventoryRow[] {
    return this.db
      .prepare<[string], InventoryRow>("SELECT sku, product_id, size, quantity, location FROM inventory WHERE upper(sku) = upper(?) ORDER BY rowid")
      .all(sku.trim());
  }
}

export class UserRepository {
  constructor(private readonly db: RetailDatabase) {}

  find(userId: string): UserRow | undefined {
    return this.db.prepare<[string], UserRow>("SELECT user_id, name, loyalty_tier FROM users WHERE user_id = ?").get(userId);
  }

  exists(userId: string): boolean {
    return this.find(userId) !== undefined;
  }

  upsert(user: UserRow): void {
    this.db
      .prepare("INSERT OR REPLACE INTO users (user_id, name, loyalty_tier) VALUES (@user_id, @name, @loyalty_tier)")
      .run(user);
  }

  updateName(userId: string, name: string): number {
    return this.db.prepare("UPDATE users SET name = ? WHERE user_id = ?").run(name, userId).changes;
  }
}

export class OrderRepository {
  constructor(private readonly db: RetailDatabase) {}

  byUser(userId: string): OrderRow[] {
    return this.db
      .prepare<[string], OrderRow>(
        "SELECT order_id, user_id, total_amount, status, created_at FROM orders WHERE user_id = ? ORDER BY created_at DESC"
      )
      .all(userId);
  }
}

export type Repositories = {
  products: ProductRepository;
  inventory: InventoryRepository;
  users: UserRepository;
  orders: OrderRepository;
};

export const createRepositories = (db: RetailDatabase): Repositories => ({
  products: new ProductRepository(db),
  inventory: new InventoryRepository(db),
  users: new UserRepository(db),
  orders: new OrderRepository(db)
});
