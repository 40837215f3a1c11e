import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import type { MemoryStore } from '../src/clients/memoryStore.js';
import type { CommerceTables } from '../src/models/types.js';
import { buildApp, call } from './http.js';

describe('Order Routes', () => {
  let app: Hono;
  let store: MemoryStore<CommerceTables>;
  let orderId: string;

  beforeEach(async () => {
    ({ app, store } = buildApp());
    await call(app, 'POST', '/cart/items', { body: { bookId: 'book-a', quantity: 2 } });
    await call(app, 'POST', '/cart/checkout', { body: { shippingAddress: '1 Main St' } });
    orderId = store.rows('orders')[0].id;
  });

  describe('GET /orders', () => {
    it('lists the caller orders', async () => {
      const res = await call(app, 'GET', '/orders');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        orders: [{ id: orderId, status: 'PENDING', totalAmount: '20.00' }],
      });
    });

    it('filters by status', async () => {
      const res = await call(app, 'GET', '/orders?status=shipped');

      expect(await res.json()).toEqual({ orders: [] });
    });

    it('returns 400 for an unknown status', async () => {
      const res = await call(app, 'GET', '/orders?status=lost');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'INVALID_STATUS' } });
    });
  });

  describe('GET /orders/:id', () => {
    it('returns the order with its lines', async () => {
      const res = await call(app, 'GET', `/orders/${orderId}`);

      expect(await res.json()).toMatchObject({
        order: {
          id: orderId,
          shippingAddress: '1 Main St',
          items: [{ bookId: 'book-a', quantity: 2, unitPrice: '10.00', lineTotal: '20.00' }],
        },
      });
    });

    it('returns 403 for another user', async () => {
      const res = await call(app, 'GET', `/orders/${orderId}`, { user: 'user-2' });

      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({ error: { code: 'NOT_OWNER' } });
    });

    it('returns 404 for an unknown order', async () => {
      const res = await call(app, 'GET', '/orders/missing');

      expect(res.status).toBe(404);
    });
  });

  describe('PUT /orders/:id/cancel', () => {
    it('cancels once and then returns 422', async () => {
      const first = await call(app, 'PUT', `/orders/${orderId}/cancel`);
      expect(await first.json()).toMatchObject({ order: { status: 'CANCELLED' } });

      const second = await call(app, 'PUT', `/orders/${orderId}/cancel`);
      expect(second.status).toBe(422);
      expect(await second.json()).toEqual({
        error: {
          code: 'INVALID_ORDER_STATE',
          message: `Cannot cancel order ${orderId} in status CANCELLED`,
        },
      });
    });
  });

  describe('admin routes', () => {
    it('require the admin role', async () => {
      const res = await call(app, 'GET', '/orders/admin/all');

      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({ error: { code: 'ADMIN_ONLY' } });
    });

    it('list every order', async () => {
      const res = await call(app, 'GET', '/orders/admin/all', { user: 'admin-1', role: 'admin' });

      expect(await res.json()).toMatchObject({ orders: [{ id: orderId, ownerId: 'user-1' }] });
    });

    it('override the status', async () => {
      const res = await call(app, 'PUT', '/orders/admin/status', {
        user: 'admin-1',
        role: 'admin',
        body: { orderId, status: 'delivered' },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ order: { id: orderId, status: 'DELIVERED' } });
    });

    it('reject an unknown status with the valid values', async () => {
      const res = await call(app, 'PUT', '/orders/admin/status', {
        user: 'admin-1',
        role: 'admin',
        body: { orderId, status: 'LOST' },
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: 'INVALID_STATUS',
          message:
            'Invalid order status: LOST. Valid values are: PENDING, CONFIRMED, SHIPPED, DELIVERED, CANCELLED',
        },
      });
    });
  });
});
