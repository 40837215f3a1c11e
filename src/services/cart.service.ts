import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { CatalogLookup } from '../clients/catalogClient.js';
import type { UserDirectory } from '../clients/userDirectory.js';
import type { Book, Cart, CartView } from '../models/types.js';
import { addLine, clearLines, createCart, removeLine, setLineQuantity, toCartView } from '../models/cart.js';
import { cartMembership } from '../models/membership.js';
import { CartRepository } from '../repositories/cart.repository.js';
import type { CommerceStore, CommerceTx } from '../repositories/store.js';
import {
  BookNotFoundError,
  CartNotFoundError,
  ItemNotInCartError,
  OwnerNotFoundError,
  ValidationError,
} from '../lib/errors.js';
import { validateBookId, validateQuantity } from '../lib/validation.js';
import { getLogger, logRollback } from '../lib/logger.js';
import { MAX_QUANTITY } from '../config/limits.js';

export interface CartServiceOptions {
  carts?: CartRepository;
  txTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Cart aggregate: one cart per user, created lazily on the first add.
 * Each mutation is one READ_COMMITTED transaction serialized on the owner.
 */
export class CartService {
  private readonly carts: CartRepository;
  private readonly txTimeoutMs: number;
  private readonly log: Logger;

  constructor(
    private readonly store: CommerceStore,
    private readonly catalog: CatalogLookup,
    private readonly users: UserDirectory,
    options: CartServiceOptions = {}
  ) {
    this.carts = options.carts ?? new CartRepository();
    this.txTimeoutMs = options.txTimeoutMs ?? 5_000;
    this.log = options.logger ?? getLogger('cart');
  }

  /**
   * Get the owner's cart
   */
  async getCart(ownerId: string): Promise<CartView> {
    return this.store.withTransaction(
      { isolation: 'READ_COMMITTED', timeoutMs: this.txTimeoutMs, label: 'cart.get' },
      async (tx) => {
        const cart = await this.carts.findByOwner(tx, ownerId);
        if (!cart) {
          throw new CartNotFoundError(ownerId);
        }
        return toCartView(cart);
      }
    );
  }

  /**
   * Return the owner's cart, creating an empty one if there is none.
   * Must run inside the caller's transaction.
   */
  async getOrCreate(tx: CommerceTx, ownerId: string): Promise<Cart> {
    const existing = await this.carts.findByOwnerForUpdate(tx, ownerId);
    if (existing) {
      return existing;
    }

    if (!(await this.users.resolveOwner(ownerId))) {
      throw new OwnerNotFoundError(ownerId);
    }

    const cart = createCart(randomUUID(), ownerId);
    this.carts.insert(tx, cart);
    this.log.info({ ownerId, cartId: cart.id }, 'Created cart');
    return cart;
  }

  /**
   * Add a book to the cart. A book already in the cart only grows in
   * quantity; its price stays the one captured on the first add.
   */
  async addToCart(ownerId: string, bookId: string, quantity = 1): Promise<CartView> {
    validateBookId(bookId);
    validateQuantity(quantity);

    return this.mutate('cart.add', ownerId, async (tx) => {
      const cart = await this.getOrCreate(tx, ownerId);
      const held = cart.lines.find((line) => line.bookId === bookId)?.quantity ?? 0;
      if (held + quantity > MAX_QUANTITY) {
        throw new ValidationError(`Quantity must be at most ${MAX_QUANTITY}`);
      }
      const book = await this.requireBook(bookId, tx.signal);
      const updated = addLine(cart, book, quantity);

      this.log.info(
        { ownerId, bookId, quantity, cartId: cart.id },
        cartMembership.contains(cart, bookId) ? 'Increased book quantity in cart' : 'Added book to cart'
      );
      return updated;
    });
  }

  /**
   * Replace the quantity of a book already in the cart
   */
  async updateCartItem(ownerId: string, bookId: string, quantity: number): Promise<CartView> {
    validateBookId(bookId);
    validateQuantity(quantity);

    return this.mutate('cart.update', ownerId, async (tx) => {
      const cart = await this.requireCart(tx, ownerId);
      this.requireLine(cart, bookId);

      this.log.info({ ownerId, bookId, quantity }, 'Updated cart item quantity');
      return setLineQuantity(cart, bookId, quantity);
    });
  }

  async removeFromCart(ownerId: string, bookId: string): Promise<CartView> {
    validateBookId(bookId);

    return this.mutate('cart.remove', ownerId, async (tx) => {
      const cart = await this.requireCart(tx, ownerId);
      this.requireLine(cart, bookId);

      this.log.info({ ownerId, bookId }, 'Removed book from cart');
      return removeLine(cart, bookId);
    });
  }

  async clearCart(ownerId: string): Promise<CartView> {
    return this.mutate('cart.clear', ownerId, async (tx) => {
      const cart = await this.requireCart(tx, ownerId);

      this.log.info({ ownerId, cartId: cart.id }, 'Cleared cart');
      return clearLines(cart);
    });
  }

  /**
   * Load the owner's cart for update or fail with CartNotFound
   */
  async requireCart(tx: CommerceTx, ownerId: string): Promise<Cart> {
    const cart = await this.carts.findByOwnerForUpdate(tx, ownerId);
    if (!cart) {
      throw new CartNotFoundError(ownerId);
    }
    return cart;
  }

  private requireLine(cart: Cart, bookId: string): void {
    if (!cartMembership.contains(cart, bookId)) {
      throw new ItemNotInCartError(bookId, cart.id);
    }
  }

  private async requireBook(bookId: string, signal: AbortSignal): Promise<Book> {
    const book = await this.catalog.lookupBook(bookId, signal);
    if (!book) {
      throw new BookNotFoundError(bookId);
    }
    return book;
  }

  /**
   * Run a read-modify-write on the owner's cart and persist the result
   */
  private async mutate(
    label: string,
    ownerId: string,
    change: (tx: CommerceTx) => Promise<Cart>
  ): Promise<CartView> {
    try {
      return await this.store.withTransaction(
        { isolation: 'READ_COMMITTED', timeoutMs: this.txTimeoutMs, label },
        async (tx) => {
          const updated = await change(tx);
          this.carts.save(tx, updated);
          return toCartView(updated);
        }
      );
    } catch (error) {
      logRollback(this.log, error, { ownerId }, label);
      throw error;
    }
  }
}
