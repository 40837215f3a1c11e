import type { Order, OrderStatus } from '../models/types.js';
import type { CommerceTx } from './store.js';

function newestFirst(a: Order, b: Order): number {
  return b.orderDate.getTime() - a.orderDate.getTime();
}

export class OrderRepository {
  findById(tx: CommerceTx, orderId: string, forUpdate = false): Promise<Order | null> {
    return tx.get('orders', orderId, { forUpdate });
  }

  async findByOwner(tx: CommerceTx, ownerId: string, status?: OrderStatus): Promise<Order[]> {
    const orders = await tx.find(
      'orders',
      (order) => order.ownerId === ownerId && (status === undefined || order.status === status)
    );
    return orders.sort(newestFirst);
  }

  async findAll(tx: CommerceTx, status?: OrderStatus): Promise<Order[]> {
    const orders = await tx.find(
      'orders',
      (order) => status === undefined || order.status === status
    );
    return orders.sort(newestFirst);
  }

  insert(tx: CommerceTx, order: Order): void {
    tx.insert('orders', order);
  }

  save(tx: CommerceTx, order: Order): void {
    tx.put('orders', order);
  }
}
