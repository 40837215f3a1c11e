import { Hono } from 'hono';
import type { CartService } from './services/cart.service.js';
import type { CheckoutService } from './services/checkout.service.js';
import type { OrderService } from './services/order.service.js';
import type { CollectionService } from './services/collection.service.js';
import { createCartRoutes } from './routes/cart.routes.js';
import { createOrderRoutes } from './routes/order.routes.js';
import { createCollectionRoutes } from './routes/collection.routes.js';
import { pinoLogger } from './middlewares/pino-logger.js';
import { jsonError } from './lib/http.js';

export interface AppServices {
  carts: CartService;
  checkout: CheckoutService;
  orders: OrderService;
  collections: CollectionService;
}

export function createApp(services: AppServices): Hono {
  const app = new Hono();

  app.use(pinoLogger());

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok' });
  });

  app.route('/cart', createCartRoutes(services.carts, services.checkout));
  app.route('/orders', createOrderRoutes(services.orders));
  app.route('/collections', createCollectionRoutes(services.collections));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Route not found',
        },
      },
      404
    );
  });

  app.onError((error, c) => jsonError(c, error));

  return app;
}
