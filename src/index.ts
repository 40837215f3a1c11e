import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { serve } from '@hono/node-server';
import { z } from 'zod';
import { env } from './config/env.js';
import { logger } from './lib/logger.js';
import { InMemoryCatalog, type BookSeed } from './clients/catalogClient.js';
import { InMemoryUserDirectory } from './clients/userDirectory.js';
import { createCommerceStore } from './repositories/store.js';
import { CartService } from './services/cart.service.js';
import { CheckoutService } from './services/checkout.service.js';
import { OrderService } from './services/order.service.js';
import { CollectionService } from './services/collection.service.js';
import { createApp } from './app.js';

const seedSchema = z.object({
  users: z.array(z.string().min(1)).default([]),
  books: z
    .array(
      z.object({
        id: z.string().min(1),
        title: z.string(),
        author: z.string().optional(),
        price: z.union([z.string(), z.number()]),
        available: z.boolean().optional(),
      })
    )
    .default([]),
});

/**
 * Books and users for the dev server, read from SEED_FILE or data/seed.json
 */
function loadSeed(): { users: string[]; books: BookSeed[] } {
  const path = env.SEED_FILE ?? resolve(process.cwd(), 'data/seed.json');
  return seedSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

const seed = loadSeed();

// Initialize components
const store = createCommerceStore();
const catalog = new InMemoryCatalog(seed.books);
const users = new InMemoryUserDirectory(seed.users);
const txTimeoutMs = env.TX_TIMEOUT_MS;

const app = createApp({
  carts: new CartService(store, catalog, users, { txTimeoutMs }),
  checkout: new CheckoutService(store, {
    txTimeoutMs,
    estimatedDeliveryDays: env.ESTIMATED_DELIVERY_DAYS,
  }),
  orders: new OrderService(store, { txTimeoutMs }),
  collections: new CollectionService(store, catalog, users, {
    txTimeoutMs,
    bulkTimeoutMs: env.BULK_TIMEOUT_MS,
  }),
});

serve({
  fetch: app.fetch,
  port: env.PORT,
});

logger.info(
  {
    port: env.PORT,
    books: catalog.size(),
    txTimeoutMs,
    bulkTimeoutMs: env.BULK_TIMEOUT_MS,
  },
  `Server running at http://localhost:${env.PORT}`
);
