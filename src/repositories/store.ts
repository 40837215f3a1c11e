import { MemoryStore, type Transaction, type TransactionalStore } from '../clients/memoryStore.js';
import type { CommerceTables } from '../models/types.js';

export type CommerceStore = TransactionalStore<CommerceTables>;

export type CommerceTx = Transaction<CommerceTables>;

export function createCommerceStore(): MemoryStore<CommerceTables> {
  return new MemoryStore<CommerceTables>();
}
