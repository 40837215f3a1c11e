import {
  ORDER_STATUSES,
  type Cart,
  type Order,
  type OrderLine,
  type OrderStatus,
  type OrderView,
} from './types.js';
import { formatMoney, lineTotal, sumLines } from '../lib/money.js';
import { InvalidOrderStateError, InvalidStatusError } from '../lib/errors.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Forward transitions of the order lifecycle. The administrative override
 * does not consult this table.
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  PENDING: ['CONFIRMED', 'CANCELLED'],
  CONFIRMED: ['SHIPPED'],
  SHIPPED: ['DELIVERED'],
  DELIVERED: [],
  CANCELLED: [],
};

export function isOrderStatus(value: string): value is OrderStatus {
  return ORDER_STATUSES.some((status) => status === value);
}

/**
 * Parse a status name case-insensitively
 */
export function parseOrderStatus(value: string): OrderStatus {
  const normalized = value.trim().toUpperCase();
  if (!isOrderStatus(normalized)) {
    throw new InvalidStatusError(value, ORDER_STATUSES);
  }
  return normalized;
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

/**
 * Build a PENDING order from the cart's lines, keeping each line's
 * snapshotted price. The total is fixed here and never recomputed.
 */
export function createOrderFromCart(
  id: string,
  cart: Cart,
  shippingAddress: string,
  now = new Date()
): Order {
  const lines: OrderLine[] = cart.lines.map((line) => ({
    bookId: line.bookId,
    title: line.title,
    quantity: line.quantity,
    unitPrice: line.unitPrice,
  }));

  return {
    id,
    ownerId: cart.ownerId,
    lines,
    totalAmount: sumLines(lines),
    status: 'PENDING',
    shippingAddress,
    orderDate: now,
    updatedAt: now,
  };
}

export function cancelOrder(order: Order, now = new Date()): Order {
  if (!canTransition(order.status, 'CANCELLED')) {
    throw new InvalidOrderStateError(order.id, order.status, 'cancel');
  }
  return { ...order, status: 'CANCELLED', updatedAt: now };
}

/**
 * Administrative override: any recognized status is accepted
 */
export function withStatus(order: Order, status: OrderStatus, now = new Date()): Order {
  return { ...order, status, updatedAt: now };
}

/**
 * Calendar date `days` after the order date, as YYYY-MM-DD (UTC)
 */
export function estimateDeliveryDate(orderDate: Date, days: number): string {
  return new Date(orderDate.getTime() + days * MS_PER_DAY).toISOString().slice(0, 10);
}

export function toOrderView(order: Order): OrderView {
  return {
    id: order.id,
    ownerId: order.ownerId,
    status: order.status,
    totalAmount: formatMoney(order.totalAmount),
    shippingAddress: order.shippingAddress,
    orderDate: order.orderDate.toISOString(),
    updatedAt: order.updatedAt.toISOString(),
    items: order.lines.map((line) => ({
      bookId: line.bookId,
      title: line.title,
      unitPrice: formatMoney(line.unitPrice),
      quantity: line.quantity,
      lineTotal: formatMoney(lineTotal(line.unitPrice, line.quantity)),
    })),
  };
}
