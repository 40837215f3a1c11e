import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MemoryStore } from '../src/clients/memoryStore.js';
import type { CommerceTables } from '../src/models/types.js';
import { CartService } from '../src/services/cart.service.js';
import { CheckoutService } from '../src/services/checkout.service.js';
import { OrderService } from '../src/services/order.service.js';
import {
  InvalidOrderStateError,
  InvalidStatusError,
  NotOwnerError,
  OrderNotFoundError,
} from '../src/lib/errors.js';
import { createFixture } from './fixtures.js';

describe('OrderService', () => {
  let store: MemoryStore<CommerceTables>;
  let carts: CartService;
  let checkout: CheckoutService;
  let service: OrderService;

  beforeEach(() => {
    const fixture = createFixture();
    store = fixture.store;
    carts = new CartService(store, fixture.catalog, fixture.users);
    checkout = new CheckoutService(store);
    service = new OrderService(store);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  async function placeOrder(ownerId: string, bookId = 'book-a'): Promise<string> {
    await carts.addToCart(ownerId, bookId, 1);
    const { orderId } = await checkout.checkout(ownerId, '1 Main St');
    return orderId;
  }

  describe('getOrder', () => {
    it('returns the owner order', async () => {
      const orderId = await placeOrder('user-1');
      const order = await service.getOrder('user-1', orderId);

      expect(order.id).toBe(orderId);
      expect(order.status).toBe('PENDING');
      expect(order.totalAmount).toBe('10.00');
    });

    it('throws NotOwnerError for another user', async () => {
      const orderId = await placeOrder('user-1');

      await expect(service.getOrder('user-2', orderId)).rejects.toThrow(NotOwnerError);
    });

    it('throws OrderNotFoundError for an unknown id', async () => {
      await expect(service.getOrder('user-1', 'missing')).rejects.toThrow(OrderNotFoundError);
    });
  });

  describe('listOrders', () => {
    it('lists the owner orders newest first', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-04-01T10:00:00.000Z'));
      const first = await placeOrder('user-1', 'book-a');
      vi.setSystemTime(new Date('2026-04-02T10:00:00.000Z'));
      const second = await placeOrder('user-1', 'book-b');
      await placeOrder('user-2');

      const orders = await service.listOrders('user-1');

      expect(orders.map((order) => order.id)).toEqual([second, first]);
    });

    it('filters by status case-insensitively', async () => {
      const pending = await placeOrder('user-1', 'book-a');
      const cancelled = await placeOrder('user-1', 'book-b');
      await service.cancelOrder('user-1', cancelled);

      const orders = await service.listOrders('user-1', 'pending');

      expect(orders.map((order) => order.id)).toEqual([pending]);
    });

    it('rejects an unknown status filter', async () => {
      await expect(service.listOrders('user-1', 'lost')).rejects.toThrow(InvalidStatusError);
    });
  });

  describe('listAllOrders', () => {
    it('returns every owner order', async () => {
      await placeOrder('user-1');
      await placeOrder('user-2');

      const orders = await service.listAllOrders();

      expect(orders.map((order) => order.ownerId).sort()).toEqual(['user-1', 'user-2']);
    });
  });

  describe('cancelOrder', () => {
    it('cancels a pending order', async () => {
      const orderId = await placeOrder('user-1');
      const order = await service.cancelOrder('user-1', orderId);

      expect(order.status).toBe('CANCELLED');
      expect(store.rows('orders')[0].status).toBe('CANCELLED');
    });

    it('refuses a second cancel and echoes the status', async () => {
      const orderId = await placeOrder('user-1');
      await service.cancelOrder('user-1', orderId);

      await expect(service.cancelOrder('user-1', orderId)).rejects.toThrow(
        `Cannot cancel order ${orderId} in status CANCELLED`
      );
    });

    it('refuses to cancel a shipped order', async () => {
      const orderId = await placeOrder('user-1');
      await service.adminSetOrderStatus(orderId, 'CONFIRMED');
      await service.adminSetOrderStatus(orderId, 'SHIPPED');

      await expect(service.cancelOrder('user-1', orderId)).rejects.toThrow(InvalidOrderStateError);
      expect((await service.getOrder('user-1', orderId)).status).toBe('SHIPPED');
    });

    it('refuses to cancel another user order', async () => {
      const orderId = await placeOrder('user-1');

      await expect(service.cancelOrder('user-2', orderId)).rejects.toThrow(NotOwnerError);
      expect((await service.getOrder('user-1', orderId)).status).toBe('PENDING');
    });
  });

  describe('adminSetOrderStatus', () => {
    it('accepts lowercase status names', async () => {
      const orderId = await placeOrder('user-1');
      const order = await service.adminSetOrderStatus(orderId, 'shipped');

      expect(order.status).toBe('SHIPPED');
    });

    it('is not limited by the lifecycle', async () => {
      const orderId = await placeOrder('user-1');
      await service.adminSetOrderStatus(orderId, 'DELIVERED');
      const order = await service.adminSetOrderStatus(orderId, 'PENDING');

      expect(order.status).toBe('PENDING');
      expect(order.totalAmount).toBe('10.00');
    });

    it('rejects an unknown status before touching the store', async () => {
      const orderId = await placeOrder('user-1');
      const spy = vi.spyOn(store, 'withTransaction');

      await expect(service.adminSetOrderStatus(orderId, 'LOST')).rejects.toThrow(
        'Invalid order status: LOST. Valid values are: PENDING, CONFIRMED, SHIPPED, DELIVERED, CANCELLED'
      );
      expect(spy).not.toHaveBeenCalled();
    });

    it('throws OrderNotFoundError for an unknown id', async () => {
      await expect(service.adminSetOrderStatus('missing', 'SHIPPED')).rejects.toThrow(
        OrderNotFoundError
      );
    });
  });
});
