import { Hono } from 'hono';
import type { OrderService } from '../services/order.service.js';
import { callerId, jsonError, readJson, requireAdmin } from '../lib/http.js';
import { validateStatusRequest } from '../lib/validation.js';

export function createOrderRoutes(service: OrderService): Hono {
  const app = new Hono();

  /**
   * GET /orders/admin/all?status= - Every order (admin)
   */
  app.get('/admin/all', async (c) => {
    try {
      requireAdmin(c);
      const orders = await service.listAllOrders(c.req.query('status'));
      return c.json({ orders });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * PUT /orders/admin/status - Override an order's status (admin)
   */
  app.put('/admin/status', async (c) => {
    try {
      requireAdmin(c);
      const { orderId, status } = validateStatusRequest(await readJson(c));

      const order = await service.adminSetOrderStatus(orderId, status);
      return c.json({ order });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /orders?status= - The caller's orders, newest first
   */
  app.get('/', async (c) => {
    try {
      const orders = await service.listOrders(callerId(c), c.req.query('status'));
      return c.json({ orders });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  app.get('/:id', async (c) => {
    try {
      const order = await service.getOrder(callerId(c), c.req.param('id'));
      return c.json({ order });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * PUT /orders/:id/cancel - Cancel a pending order
   */
  app.put('/:id/cancel', async (c) => {
    try {
      const order = await service.cancelOrder(callerId(c), c.req.param('id'));
      return c.json({ order });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}
