import type { Hono } from 'hono';
import type { MemoryStore } from '../src/clients/memoryStore.js';
import type { CommerceTables } from '../src/models/types.js';
import { createApp } from '../src/app.js';
import { CartService } from '../src/services/cart.service.js';
import { CheckoutService } from '../src/services/checkout.service.js';
import { OrderService } from '../src/services/order.service.js';
import { CollectionService } from '../src/services/collection.service.js';
import { createFixture } from './fixtures.js';

interface RequestOptions {
  user?: string;
  role?: string;
  body?: unknown;
  rawBody?: string;
}

export function buildApp(): { app: Hono; store: MemoryStore<CommerceTables> } {
  const { store, catalog, users } = createFixture();
  const app = createApp({
    carts: new CartService(store, catalog, users),
    checkout: new CheckoutService(store),
    orders: new OrderService(store),
    collections: new CollectionService(store, catalog, users),
  });
  return { app, store };
}

export function call(
  app: Hono,
  method: string,
  path: string,
  { user = 'user-1', role, body, rawBody }: RequestOptions = {}
): Promise<Response> {
  const headers = new Headers({ 'content-type': 'application/json' });
  if (user) {
    headers.set('x-user-id', user);
  }
  if (role) {
    headers.set('x-user-role', role);
  }
  const payload = rawBody ?? (body === undefined ? undefined : JSON.stringify(body));
  return Promise.resolve(
    app.fetch(new Request(`http://localhost${path}`, { method, headers, body: payload }))
  );
}
