import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";

export type RetailDatabase = Database.Database;

const seedSchema = z.object({
  loyalty_tiers: z.array(z.object({ tier: z.string(), display_name: z.string(), sort_order: z.number().int() })),
  users: z.array(z.object({ user_id: z.string(), name: z.string(), loyalty_tier: z.string() })),
  categories: z.array(z.object({ category_id: z.string(), name: z.string() })),
  products: z.array(
    z.object({
      product_id: z.string(),
      name: z.string(),
      category: z.string(),
      base_price: z.number(),
      category_id: z.string().nullable()
    })
  ),
  inventory: z.array(
    z.object({
      sku: z.string(),
      product_id: z.string(),
      size: z.string(),
      quantity: z.number().int(),
      location: z.string()
    })
  ),
  orders: z.array(
    z.object({
      order_id: z.string(),
      user_id: z.string(),
      total_amount: z.number(),
      status: z.string(),
      created_at: z.string()
    })
  )
});

export type SeedData = z.infer<typeof seedSchema>;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS loyalty_tiers (
    tier TEXT PRIMARY KEY,
    display_name TEXT NOT NULL,
    sort_order INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS users (
    user_id TEXT PRIMARY KEY,
    name TEXT,
    loyalty_tier TEXT
  );

  CREATE TABLE IF NOT EXISTS categories (
    category_id TEXT PRIMARY KEY,
    name TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS products (
    product_id TEXT PRIMARY KEY,
    name TEXT,
    category TEXT,
    base_price REAL,
    category_id TEXT,
    FOREIGN KEY (category_id) REFERENCES categories(category_id)
  );

  CREATE TABLE IF NOT EXISTS inventory (
    sku TEXT,
    product_id TEXT,
    size TEXT,
    quantity INTEGER,
    location TEXT,
    PRIMARY KEY (sku, size),
    FOREIGN KEY (product_id) REFERENCES products(product_id)
  );

  CREATE TABLE IF NOT EXISTS orders (
    order_id TEXT PRIMARY KEY,
    user_id TEXT,
    total_amount REAL,
    status TEXT,
    created_at TEXT,
    FOREIGN KEY (user_id) REFERENCES users(user_id)
  );

  CREATE INDEX IF NOT EXISTS idx_inventory_product ON inventory(product_id);
  CREATE INDEX IF NOT EXISTS idx_orders_user ON orders(user_id);
`;

export const initSchema = (db: RetailDatabase): void => {
  db.exec(SCHEMA_SQL);
};

export const openDatabase = (path: string): RetailDatabase => {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  if (path !== ":memory:") db.pragma("journal_mode = WAL");
  initSchema(db);
  return db;
};

export const loadSeedData = (url = new URL("../../data/seed.json", import.meta.url)): SeedData =>
  seedSchema.parse(JSON.parse(readFileSync(url, "utf8")) as unknown);

const isEmpty = (db: RetailDatabase, table: string): boolean => {
  const row = db.prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${table}`).get();
  return (row?.c ?? 0) === 0;
};

/** Inserts seed rows into each table that is still empty; existing data is left alone. */
export const seedDatabase = (db: RetailDatabase, seed: SeedData = loadSeedData()): Record<keyof SeedData, number> => {
  const inserted: Record<keyof SeedData, number> = {
    loyalty_tiers: 0,
    users: 0,
    categories: 0,
    products: 0,
    inventory: 0,
    orders: 0
  };

  const run = db.transaction(() => {
    if (isEmpty(db, "loyalty_tiers")) {
      const stmt = db.prepare("INSERT INTO loyalty_tiers (tier, display_name, sort_order) VALUES (@tier, @display_name, @sort_order)");
      seed.loyalty_tiers.forEach((row) => stmt.run(row));
      inserted.loyalty_tiers = seed.loyalty_tiers.length;
    }
    if (isEmpty(db, "users")) {
      const stmt = db.prepare("INSERT INTO users (user_id, name, loyalty_tier) VALUES (@user_id, @name, @loyalty_tier)");
      seed.users.forEach((row) => stmt.run(row));
      inserted.users = seed.users.length;
    }
    if (isEmpty(db, "categories")) {
      const stmt = db.prepare("INSERT INTO categories (category_id, name) VALUES (@category_id, @name)");
      seed.categories.forEach((row) => stmt.run(row));
      inserted.categories = seed.categories.length;
    }
    if (isEmpty(db, "products")) {
      const stmt = db.prepare(
        "INSERT INTO products (product_id, name, category, base_price, category_id) VALUES (@product_id, @name, @category, @base_price, @category_id)"
      );
      seed.products.forEach((row) => stmt.run(row));
      inserted.products = seed.products.length;
    }
    if (isEmpty(db, "inventory")) {
      const stmt = db.prepare(
        "INSERT INTO inventory (sku, product_id, size, quantity, location) VALUES (@sku, @product_id, @size, @quantity, @location)"
      );
      seed.inventory.forEach((row) => stmt.run(row));
      inserted.inventory = seed.inventory.length;
    }
    if (isEmpty(db, "orders")) {
      const stmt = db.prepare(
        "INSERT INTO orders (order_id, user_id, total_amount, status, created_at) VALUES (@order_id, @user_id, @total_amount, @status, @created_at)"
      );
      seed.orders.forEach((row) => stmt.run(row));
      inserted.orders = seed.orders.length;
    }
  });
  run();

  return inserted;
};
