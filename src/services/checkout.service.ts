import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { CheckoutConfirmation } from '../models/types.js';
import { clearLines } from '../models/cart.js';
import { createOrderFromCart, estimateDeliveryDate } from '../models/order.js';
import { CartRepository } from '../repositories/cart.repository.js';
import { OrderRepository } from '../repositories/order.repository.js';
import type { CommerceStore } from '../repositories/store.js';
import { CartAlreadyCheckedOutError, CartEmptyError, CartNotFoundError } from '../lib/errors.js';
import { formatMoney } from '../lib/money.js';
import { validateShippingAddress } from '../lib/validation.js';
import { getLogger, logRollback } from '../lib/logger.js';

export interface CheckoutServiceOptions {
  carts?: CartRepository;
  orders?: OrderRepository;
  txTimeoutMs?: number;
  estimatedDeliveryDays?: number;
  logger?: Logger;
}

/**
 * Turns a cart into an order. Order creation and clearing the cart commit
 * together or not at all.
 */
export class CheckoutService {
  private readonly carts: CartRepository;
  private readonly orders: OrderRepository;
  private readonly txTimeoutMs: number;
  private readonly deliveryDays: number;
  private readonly log: Logger;

  constructor(
    private readonly store: CommerceStore,
    options: CheckoutServiceOptions = {}
  ) {
    this.carts = options.carts ?? new CartRepository();
    this.orders = options.orders ?? new OrderRepository();
    this.txTimeoutMs = options.txTimeoutMs ?? 5_000;
    this.deliveryDays = options.estimatedDeliveryDays ?? 7;
    this.log = options.logger ?? getLogger('checkout');
  }

  async checkout(ownerId: string, shippingAddress: string): Promise<CheckoutConfirmation> {
    const address = validateShippingAddress(shippingAddress);

    try {
      return await this.store.withTransaction(
        { isolation: 'REPEATABLE_READ', timeoutMs: this.txTimeoutMs, label: 'checkout' },
        async (tx) => {
          const cart = await this.carts.findByOwnerForUpdate(tx, ownerId);
          if (!cart) {
            throw new CartNotFoundError(ownerId);
          }
          if (cart.checkedOut) {
            throw new CartAlreadyCheckedOutError(cart.id);
          }
          if (cart.lines.length === 0) {
            throw new CartEmptyError(ownerId);
          }

          const now = new Date();
          const order = createOrderFromCart(randomUUID(), cart, address, now);
          this.orders.insert(tx, order);

          // The cart is kept for the next purchase
          this.carts.save(tx, clearLines(cart, now));

          this.log.info(
            {
              ownerId,
              orderId: order.id,
              lines: order.lines.length,
              totalAmount: formatMoney(order.totalAmount),
            },
            'Checked out cart'
          );

          const confirmation: CheckoutConfirmation = {
            success: true,
            message: 'Order placed successfully',
            orderId: order.id,
            totalAmount: formatMoney(order.totalAmount),
            estimatedDeliveryDate: estimateDeliveryDate(order.orderDate, this.deliveryDays),
          };
          return confirmation;
        }
      );
    } catch (error) {
      logRollback(this.log, error, { ownerId }, 'checkout');
      throw error;
    }
  }
}
