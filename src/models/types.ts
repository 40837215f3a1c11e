/**
 * Core domain types for the order-processing core
 */

import type { Money } from '../lib/money.js';

export interface Book {
  id: string;
  title: string;
  author: string;
  price: Money;
  available: boolean;
}

export interface CartLine {
  readonly bookId: string;
  readonly title: string;
  readonly quantity: number;
  // Captured when the book was first added; later catalog changes never touch it
  readonly unitPrice: Money;
}

export interface Cart {
  readonly id: string;
  readonly ownerId: string;
  readonly lines: readonly CartLine[];
  readonly totalPrice: Money;
  readonly checkedOut: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export const ORDER_STATUSES = [
  'PENDING',
  'CONFIRMED',
  'SHIPPED',
  'DELIVERED',
  'CANCELLED',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface OrderLine {
  readonly bookId: string;
  readonly title: string;
  readonly quantity: number;
  readonly unitPrice: Money;
}

export interface Order {
  readonly id: string;
  readonly ownerId: string;
  readonly lines: readonly OrderLine[];
  readonly totalAmount: Money;
  readonly status: OrderStatus;
  readonly shippingAddress: string;
  readonly orderDate: Date;
  readonly updatedAt: Date;
}

export interface Collection {
  readonly id: string;
  readonly ownerId: string;
  readonly name: string;
  readonly bookIds: readonly string[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * Rows kept by the transactional store, one table per aggregate
 */
export interface CommerceTables {
  carts: Cart;
  orders: Order;
  collections: Collection;
}

// --- bulk mutation -----------------------------------------------------------

export type BulkItemStatus = 'SUCCESS' | 'SKIPPED' | 'FAILED';

export type BulkAction = 'add' | 'remove';

export interface BulkOperationDetail {
  bookId: string;
  status: BulkItemStatus;
  reason: string;
  bookDescription?: string;
}

export interface BulkOperationResult {
  success: boolean;
  message: string;
  totalRequested: number;
  successfullyProcessed: number;
  skipped: number;
  failed: number;
  timedOut: boolean;
  details: BulkOperationDetail[];
}

// --- views returned to callers -------------------------------------------------

export interface CartItemView {
  bookId: string;
  title: string;
  unitPrice: string;
  quantity: number;
  lineTotal: string;
}

export interface CartView {
  id: string;
  ownerId: string;
  items: CartItemView[];
  totalPrice: string;
  totalItems: number;
  totalQuantity: number;
  checkedOut: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface OrderItemView {
  bookId: string;
  title: string;
  unitPrice: string;
  quantity: number;
  lineTotal: string;
}

export interface OrderView {
  id: string;
  ownerId: string;
  status: OrderStatus;
  totalAmount: string;
  shippingAddress: string;
  orderDate: string;
  updatedAt: string;
  items: OrderItemView[];
}

export interface CollectionView {
  id: string;
  ownerId: string;
  name: string;
  bookIds: string[];
  bookCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface CheckoutConfirmation {
  success: true;
  message: string;
  orderId: string;
  totalAmount: string;
  // ISO calendar date (YYYY-MM-DD)
  estimatedDeliveryDate: string;
}
