import type { Cart } from '../models/types.js';
import type { CommerceTx } from './store.js';

/**
 * Store access for carts. A user has at most one cart, looked up by owner.
 */
export class CartRepository {
  async findByOwner(tx: CommerceTx, ownerId: string): Promise<Cart | null> {
    const [cart] = await tx.find('carts', (row) => row.ownerId === ownerId);
    return cart ?? null;
  }

  /**
   * Serialize on the owner before reading, so concurrent mutations of one
   * cart (and concurrent first-time creation) run one after another
   */
  async findByOwnerForUpdate(tx: CommerceTx, ownerId: string): Promise<Cart | null> {
    await tx.lock(`cart-owner:${ownerId}`);
    const cart = await this.findByOwner(tx, ownerId);
    if (!cart) {
      return null;
    }
    return tx.get('carts', cart.id, { forUpdate: true });
  }

  insert(tx: CommerceTx, cart: Cart): void {
    tx.insert('carts', cart);
  }

  save(tx: CommerceTx, cart: Cart): void {
    tx.put('carts', cart);
  }
}
