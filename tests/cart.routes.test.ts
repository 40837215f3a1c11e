import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Hono } from 'hono';
import type { MemoryStore } from '../src/clients/memoryStore.js';
import type { CommerceTables } from '../src/models/types.js';
import { buildApp, call } from './http.js';

describe('Cart Routes', () => {
  let app: Hono;
  let store: MemoryStore<CommerceTables>;

  beforeEach(() => {
    ({ app, store } = buildApp());
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('GET /health', () => {
    it('reports ok', async () => {
      const res = await call(app, 'GET', '/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok' });
    });
  });

  describe('GET /cart', () => {
    it('returns 404 before the first add', async () => {
      const res = await call(app, 'GET', '/cart');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: 'CART_NOT_FOUND', message: 'Cart not found for user user-1' },
      });
    });

    it('returns 401 without a caller identity', async () => {
      const res = await call(app, 'GET', '/cart', { user: '' });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ error: { code: 'UNAUTHORIZED' } });
    });
  });

  describe('POST /cart/items', () => {
    it('adds a book and returns the cart', async () => {
      const res = await call(app, 'POST', '/cart/items', {
        body: { bookId: 'book-a', quantity: 2 },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        cart: {
          ownerId: 'user-1',
          items: [{ bookId: 'book-a', quantity: 2, unitPrice: '10.00', lineTotal: '20.00' }],
          totalPrice: '20.00',
          totalItems: 1,
          totalQuantity: 2,
        },
      });
    });

    it('returns 400 for an invalid quantity', async () => {
      const res = await call(app, 'POST', '/cart/items', {
        body: { bookId: 'book-a', quantity: 0 },
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
    });

    it('returns 400 for a malformed body', async () => {
      const res = await call(app, 'POST', '/cart/items', { rawBody: '{not json' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Request body must be valid JSON' },
      });
    });

    it('returns 404 for an unknown book', async () => {
      const res = await call(app, 'POST', '/cart/items', { body: { bookId: 'missing' } });

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: { code: 'BOOK_NOT_FOUND' } });
    });
  });

  describe('PUT and DELETE /cart/items/:bookId', () => {
    it('updates and removes lines', async () => {
      await call(app, 'POST', '/cart/items', { body: { bookId: 'book-a' } });
      await call(app, 'POST', '/cart/items', { body: { bookId: 'book-b' } });

      const updated = await call(app, 'PUT', '/cart/items/book-b', { body: { quantity: 3 } });
      expect(updated.status).toBe(200);
      expect(await updated.json()).toMatchObject({ cart: { totalPrice: '25.00' } });

      const removed = await call(app, 'DELETE', '/cart/items/book-a');
      expect(await removed.json()).toMatchObject({ cart: { totalPrice: '15.00', totalItems: 1 } });

      const again = await call(app, 'DELETE', '/cart/items/book-a');
      expect(again.status).toBe(404);
      expect(await again.json()).toMatchObject({ error: { code: 'ITEM_NOT_IN_CART' } });
    });
  });

  describe('DELETE /cart', () => {
    it('clears the cart', async () => {
      await call(app, 'POST', '/cart/items', { body: { bookId: 'book-a' } });
      const res = await call(app, 'DELETE', '/cart');

      expect(await res.json()).toMatchObject({ cart: { items: [], totalPrice: '0.00' } });
    });
  });

  describe('POST /cart/checkout', () => {
    it('places an order', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-10T12:00:00.000Z'));
      await call(app, 'POST', '/cart/items', { body: { bookId: 'book-a', quantity: 2 } });
      await call(app, 'POST', '/cart/items', { body: { bookId: 'book-b' } });

      const res = await call(app, 'POST', '/cart/checkout', {
        body: { shippingAddress: '1 Main St' },
      });

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        success: true,
        message: 'Order placed successfully',
        orderId: store.rows('orders')[0].id,
        totalAmount: '25.00',
        estimatedDeliveryDate: '2026-03-17',
      });
    });

    it('returns 422 for an empty cart', async () => {
      await call(app, 'POST', '/cart/items', { body: { bookId: 'book-a' } });
      await call(app, 'DELETE', '/cart');

      const res = await call(app, 'POST', '/cart/checkout', {
        body: { shippingAddress: '1 Main St' },
      });

      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({ error: { code: 'CART_EMPTY' } });
    });

    it('returns 400 for a blank address', async () => {
      const res = await call(app, 'POST', '/cart/checkout', { body: { shippingAddress: ' ' } });

      expect(res.status).toBe(400);
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await call(app, 'GET', '/nowhere');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });
});
