import { describe, it, expect } from 'vitest';
import {
  canTransition,
  cancelOrder,
  createOrderFromCart,
  estimateDeliveryDate,
  parseOrderStatus,
  toOrderView,
  withStatus,
} from '../src/models/order.js';
import { addLine, createCart } from '../src/models/cart.js';
import { formatMoney, money } from '../src/lib/money.js';
import { InvalidOrderStateError, InvalidStatusError } from '../src/lib/errors.js';
import type { Book } from '../src/models/types.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');

function book(id: string, price: string): Book {
  return { id, title: `Title ${id}`, author: 'Someone', price: money(price), available: true };
}

function sampleOrder() {
  let cart = createCart('cart-1', 'user-1', NOW);
  cart = addLine(cart, book('book-a', '10.00'), 2, NOW);
  cart = addLine(cart, book('book-b', '5.00'), 1, NOW);
  return createOrderFromCart('order-1', cart, '1 Main St', NOW);
}

describe('Order Model', () => {
  describe('parseOrderStatus', () => {
    it('accepts known statuses in any case', () => {
      expect(parseOrderStatus('shipped')).toBe('SHIPPED');
      expect(parseOrderStatus(' Pending ')).toBe('PENDING');
    });

    it('rejects unknown statuses and lists the valid ones', () => {
      expect(() => parseOrderStatus('LOST')).toThrow(
        'Invalid order status: LOST. Valid values are: PENDING, CONFIRMED, SHIPPED, DELIVERED, CANCELLED'
      );
      expect(() => parseOrderStatus('LOST')).toThrow(InvalidStatusError);
    });
  });

  describe('transitions', () => {
    it('follows the order lifecycle', () => {
      expect(canTransition('PENDING', 'CONFIRMED')).toBe(true);
      expect(canTransition('PENDING', 'CANCELLED')).toBe(true);
      expect(canTransition('CONFIRMED', 'SHIPPED')).toBe(true);
      expect(canTransition('SHIPPED', 'DELIVERED')).toBe(true);
      expect(canTransition('CONFIRMED', 'CANCELLED')).toBe(false);
      expect(canTransition('DELIVERED', 'PENDING')).toBe(false);
    });

    it('allows no transition out of delivered or cancelled', () => {
      expect(canTransition('DELIVERED', 'CANCELLED')).toBe(false);
      expect(canTransition('CANCELLED', 'PENDING')).toBe(false);
    });
  });

  describe('createOrderFromCart', () => {
    it('copies lines with their snapshotted prices', () => {
      const order = sampleOrder();

      expect(order.status).toBe('PENDING');
      expect(order.ownerId).toBe('user-1');
      expect(order.lines.map((line) => [line.bookId, line.quantity])).toEqual([
        ['book-a', 2],
        ['book-b', 1],
      ]);
      expect(formatMoney(order.totalAmount)).toBe('25.00');
    });
  });

  describe('cancelOrder', () => {
    it('cancels a pending order', () => {
      const later = new Date('2026-03-11T08:00:00.000Z');
      const cancelled = cancelOrder(sampleOrder(), later);

      expect(cancelled.status).toBe('CANCELLED');
      expect(cancelled.updatedAt).toBe(later);
    });

    it('refuses to cancel outside PENDING and names the status', () => {
      const shipped = withStatus(sampleOrder(), 'SHIPPED', NOW);

      expect(() => cancelOrder(shipped)).toThrow(InvalidOrderStateError);
      expect(() => cancelOrder(shipped)).toThrow('Cannot cancel order order-1 in status SHIPPED');
    });
  });

  describe('withStatus', () => {
    it('sets any status without consulting the lifecycle', () => {
      const delivered = withStatus(sampleOrder(), 'DELIVERED', NOW);
      const reopened = withStatus(delivered, 'PENDING', NOW);

      expect(reopened.status).toBe('PENDING');
      expect(formatMoney(reopened.totalAmount)).toBe('25.00');
    });
  });

  describe('estimateDeliveryDate', () => {
    it('adds the given number of days', () => {
      expect(estimateDeliveryDate(NOW, 7)).toBe('2026-03-17');
    });

    it('crosses month boundaries', () => {
      expect(estimateDeliveryDate(new Date('2026-01-28T23:30:00.000Z'), 7)).toBe('2026-02-04');
    });
  });

  describe('toOrderView', () => {
    it('serializes amounts as strings', () => {
      const view = toOrderView(sampleOrder());

      expect(view.totalAmount).toBe('25.00');
      expect(view.items[0]).toEqual({
        bookId: 'book-a',
        title: 'Title book-a',
        unitPrice: '10.00',
        quantity: 2,
        lineTotal: '20.00',
      });
      expect(view.orderDate).toBe('2026-03-10T12:00:00.000Z');
    });
  });
});
