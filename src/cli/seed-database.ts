/**
 * Demo warehouse seeder: a small SQLite sales database filled with Faker
 * data, for trying questions without a real warehouse.
 */

import { faker } from '@faker-js/faker';
import Database from 'better-sqlite3';
import * as logger from './logger.js';

const CATEGORIES = ['Electronics', 'Furniture', 'Kitchen', 'Clothing', 'Books', 'Toys', 'Sports'];
const ORDER_STATUSES = ['pending', 'shipped', 'delivered', 'cancelled'];
const SEGMENTS = ['AUTOMOBILE', 'BUILDING', 'FURNITURE', 'HOUSEHOLD', 'MACHINERY'];

export interface SeedCounts {
  customers: number;
  products: number;
  orders: number;
}

export const DEFAULT_SEED_COUNTS: SeedCounts = {
  customers: 200,
  products: 100,
  orders: 1500,
};

/**
 * Row count from a command-line option.
 *
 * @throws Error unless the value is a positive integer
 */
export function parseCount(value: number | string, option: string): number {
  const count = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(count) || count <= 0) {
    throw new Error(`${option} must be a positive integer (got "${value}")`);
  }
  return count;
}

const SCHEMA = `
  DROP VIEW IF EXISTS customer_revenue;
  DROP TABLE IF EXISTS order_items;
  DROP TABLE IF EXISTS orders;
  DROP TABLE IF EXISTS products;
  DROP TABLE IF EXISTS customers;

  CREATE TABLE customers (
    customer_id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    email TEXT NOT NULL,
    city TEXT,
    market_segment TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE products (
    product_id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    category TEXT NOT NULL,
    price NUMERIC NOT NULL
  );

  CREATE TABLE orders (
    order_id INTEGER PRIMARY KEY,
    customer_id INTEGER NOT NULL REFERENCES customers(customer_id),
    order_date TEXT NOT NULL,
    status TEXT NOT NULL,
    total_price NUMERIC NOT NULL
  );

  CREATE TABLE order_items (
    order_id INTEGER NOT NULL REFERENCES orders(order_id),
    product_id INTEGER NOT NULL REFERENCES products(product_id),
    quantity INTEGER NOT NULL,
    unit_price NUMERIC NOT NULL
  );

  CREATE VIEW customer_revenue AS
    SELECT c.customer_id, c.name, SUM(o.total_price) AS revenue
    FROM customers c JOIN orders o ON o.customer_id = c.customer_id
    GROUP BY c.customer_id, c.name;
`;

/**
 * Create the demo schema in `dbPath`, replacing any previous demo tables.
 * Seeded with a fixed Faker seed so repeated runs produce the same data.
 */
export function seedDemoDatabase(dbPath: string, counts: SeedCounts = DEFAULT_SEED_COUNTS): void {
  const db = new Database(dbPath);
  faker.seed(42);

  try {
    db.exec(SCHEMA);

    const insertCustomer = db.prepare(
      `INSERT INTO customers (customer_id, name, email, city, market_segment, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`
    );
    const insertProduct = db.prepare(
      'INSERT INTO products (product_id, name, category, price) VALUES (?, ?, ?, ?)'
    );
    const insertOrder = db.prepare(
      `INSERT INTO orders (order_id, customer_id, order_date, status, total_price)
       VALUES (?, ?, ?, ?, ?)`
    );
    const insertItem = db.prepare(
      'INSERT INTO order_items (order_id, product_id, quantity, unit_price) VALUES (?, ?, ?, ?)'
    );

    const prices: number[] = [];

    const seedAll = db.transaction(() => {
      for (let id = 1; id <= counts.customers; id++) {
        insertCustomer.run(
          id,
          `Customer#${String(id).padStart(4, '0')}`,
          faker.internet.email().toLowerCase(),
          faker.location.city(),
          faker.helpers.arrayElement(SEGMENTS),
          faker.date.past({ years: 3 }).toISOString()
        );
      }

      for (let id = 1; id <= counts.products; id++) {
        const price = Number(faker.commerce.price({ min: 5, max: 900 }));
        prices.push(price);
        insertProduct.run(
          id,
          faker.commerce.productName(),
          faker.helpers.arrayElement(CATEGORIES),
          price
        );
      }

      for (let id = 1; id <= counts.orders; id++) {
        const items = Array.from({ length: faker.number.int({ min: 1, max: 4 }) }, () => {
          const productId = faker.number.int({ min: 1, max: counts.products });
          return {
            productId,
            quantity: faker.number.int({ min: 1, max: 5 }),
            unitPrice: prices[productId - 1] ?? 0,
          };
        });
        const total = items.reduce((sum, item) => sum + item.unitPrice * item.quantity, 0);

        insertOrder.run(
          id,
          faker.number.int({ min: 1, max: counts.customers }),
          faker.date.past({ years: 2 }).toISOString().slice(0, 10),
          faker.helpers.arrayElement(ORDER_STATUSES),
          Math.round(total * 100) / 100
        );
        for (const item of items) {
          insertItem.run(id, item.productId, item.quantity, item.unitPrice);
        }
      }
    });

    const spinner = logger.spinner('Seeding demo warehouse...');
    seedAll();
    spinner.succeed(
      `Seeded ${counts.customers} customers, ${counts.products} products, ${counts.orders} orders`
    );
  } finally {
    db.close();
  }
}
