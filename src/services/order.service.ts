import type { Logger } from 'pino';
import type { Order, OrderStatus, OrderView } from '../models/types.js';
import { cancelOrder, parseOrderStatus, toOrderView, withStatus } from '../models/order.js';
import { OrderRepository } from '../repositories/order.repository.js';
import type { CommerceStore, CommerceTx } from '../repositories/store.js';
import { NotOwnerError, OrderNotFoundError } from '../lib/errors.js';
import { getLogger, logRollback } from '../lib/logger.js';

export interface OrderServiceOptions {
  orders?: OrderRepository;
  txTimeoutMs?: number;
  logger?: Logger;
}

export class OrderService {
  private readonly orders: OrderRepository;
  private readonly txTimeoutMs: number;
  private readonly log: Logger;

  constructor(
    private readonly store: CommerceStore,
    options: OrderServiceOptions = {}
  ) {
    this.orders = options.orders ?? new OrderRepository();
    this.txTimeoutMs = options.txTimeoutMs ?? 5_000;
    this.log = options.logger ?? getLogger('orders');
  }

  async getOrder(ownerId: string, orderId: string): Promise<OrderView> {
    return this.store.withTransaction(
      { isolation: 'READ_COMMITTED', timeoutMs: this.txTimeoutMs, label: 'order.get' },
      async (tx) => toOrderView(await this.requireOwned(tx, ownerId, orderId))
    );
  }

  /**
   * The owner's orders, newest first. `status` is matched case-insensitively.
   */
  async listOrders(ownerId: string, status?: string): Promise<OrderView[]> {
    const filter = parseFilter(status);
    return this.store.withTransaction(
      { isolation: 'READ_COMMITTED', timeoutMs: this.txTimeoutMs, label: 'order.list' },
      async (tx) => (await this.orders.findByOwner(tx, ownerId, filter)).map(toOrderView)
    );
  }

  /**
   * Every order in the store (administrative view)
   */
  async listAllOrders(status?: string): Promise<OrderView[]> {
    const filter = parseFilter(status);
    return this.store.withTransaction(
      { isolation: 'READ_COMMITTED', timeoutMs: this.txTimeoutMs, label: 'order.listAll' },
      async (tx) => (await this.orders.findAll(tx, filter)).map(toOrderView)
    );
  }

  /**
   * Cancel a PENDING order on behalf of its owner
   */
  async cancelOrder(ownerId: string, orderId: string): Promise<OrderView> {
    return this.mutate('order.cancel', { ownerId, orderId }, async (tx) => {
      const order = await this.requireOwned(tx, ownerId, orderId, true);
      const cancelled = cancelOrder(order);

      this.log.info({ ownerId, orderId, from: order.status }, 'Cancelled order');
      return cancelled;
    });
  }

  /**
   * Administrative override. Any known status may be set from any status;
   * the lifecycle table is not consulted.
   */
  async adminSetOrderStatus(orderId: string, newStatus: string): Promise<OrderView> {
    const status = parseOrderStatus(newStatus);

    return this.mutate('order.setStatus', { orderId, status }, async (tx) => {
      const order = await this.orders.findById(tx, orderId, true);
      if (!order) {
        throw new OrderNotFoundError(orderId);
      }

      this.log.info({ orderId, from: order.status, to: status }, 'Order status overridden');
      return withStatus(order, status);
    });
  }

  private async requireOwned(
    tx: CommerceTx,
    ownerId: string,
    orderId: string,
    forUpdate = false
  ): Promise<Order> {
    const order = await this.orders.findById(tx, orderId, forUpdate);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    if (order.ownerId !== ownerId) {
      throw new NotOwnerError(orderId);
    }
    return order;
  }

  private async mutate(
    label: string,
    context: Record<string, unknown>,
    change: (tx: CommerceTx) => Promise<Order>
  ): Promise<OrderView> {
    try {
      return await this.store.withTransaction(
        { isolation: 'READ_COMMITTED', timeoutMs: this.txTimeoutMs, label },
        async (tx) => {
          const updated = await change(tx);
          this.orders.save(tx, updated);
          return toOrderView(updated);
        }
      );
    } catch (error) {
      logRollback(this.log, error, context, label);
      throw error;
    }
  }
}

function parseFilter(status: string | undefined): OrderStatus | undefined {
  return status === undefined || status.trim() === '' ? undefined : parseOrderStatus(status);
}
