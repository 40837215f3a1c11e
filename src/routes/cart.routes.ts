import { Hono } from 'hono';
import type { CartService } from '../services/cart.service.js';
import type { CheckoutService } from '../services/checkout.service.js';
import { callerId, jsonError, readJson } from '../lib/http.js';
import {
  validateAddItemRequest,
  validateCheckoutRequest,
  validateQuantityRequest,
} from '../lib/validation.js';

/**
 * Create cart routes. Every route acts on the caller's own cart.
 */
export function createCartRoutes(carts: CartService, checkout: CheckoutService): Hono {
  const app = new Hono();

  /**
   * GET /cart - Get the caller's cart
   */
  app.get('/', async (c) => {
    try {
      const cart = await carts.getCart(callerId(c));
      return c.json({ cart });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * DELETE /cart - Remove every line
   */
  app.delete('/', async (c) => {
    try {
      const cart = await carts.clearCart(callerId(c));
      return c.json({ cart });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * POST /cart/items - Add a book (the cart is created on first use)
   */
  app.post('/items', async (c) => {
    try {
      const ownerId = callerId(c);
      const { bookId, quantity } = validateAddItemRequest(await readJson(c));

      const cart = await carts.addToCart(ownerId, bookId, quantity);
      return c.json({ cart });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * PUT /cart/items/:bookId - Replace a line's quantity
   */
  app.put('/items/:bookId', async (c) => {
    try {
      const ownerId = callerId(c);
      const { quantity } = validateQuantityRequest(await readJson(c));

      const cart = await carts.updateCartItem(ownerId, c.req.param('bookId'), quantity);
      return c.json({ cart });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * DELETE /cart/items/:bookId - Remove a line
   */
  app.delete('/items/:bookId', async (c) => {
    try {
      const cart = await carts.removeFromCart(callerId(c), c.req.param('bookId'));
      return c.json({ cart });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * POST /cart/checkout - Place an order from the cart
   */
  app.post('/checkout', async (c) => {
    try {
      const ownerId = callerId(c);
      const { shippingAddress } = validateCheckoutRequest(await readJson(c));

      const result = await checkout.checkout(ownerId, shippingAddress);
      return c.json(result, 201);
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}
