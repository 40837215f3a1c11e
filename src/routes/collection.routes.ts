import { Hono } from 'hono';
import type { CollectionService } from '../services/collection.service.js';
import { callerId, jsonError, readJson } from '../lib/http.js';
import { validateBulkRequest, validateCollectionRequest } from '../lib/validation.js';

/**
 * Create collection (wishlist) routes
 */
export function createCollectionRoutes(service: CollectionService): Hono {
  const app = new Hono();

  app.get('/', async (c) => {
    try {
      const collections = await service.listCollections(callerId(c));
      return c.json({ collections });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  app.post('/', async (c) => {
    try {
      const ownerId = callerId(c);
      const { name } = validateCollectionRequest(await readJson(c));

      const collection = await service.createCollection(ownerId, name);
      return c.json({ collection }, 201);
    } catch (error) {
      return jsonError(c, error);
    }
  });

  app.get('/:id', async (c) => {
    try {
      const collection = await service.getCollection(callerId(c), c.req.param('id'));
      return c.json({ collection });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  app.put('/:id', async (c) => {
    try {
      const ownerId = callerId(c);
      const { name } = validateCollectionRequest(await readJson(c));

      const collection = await service.renameCollection(ownerId, c.req.param('id'), name);
      return c.json({ collection });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  app.delete('/:id', async (c) => {
    try {
      await service.deleteCollection(callerId(c), c.req.param('id'));
      return c.body(null, 204);
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * POST /collections/:id/books/bulk-add - Add up to 50 books, reporting each
   */
  app.post('/:id/books/bulk-add', async (c) => {
    try {
      const ownerId = callerId(c);
      const { bookIds } = validateBulkRequest(await readJson(c));

      const result = await service.bulkAddMembers(ownerId, c.req.param('id'), bookIds);
      return c.json(result);
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * POST /collections/:id/books/bulk-remove - Remove up to 50 books, reporting each
   */
  app.post('/:id/books/bulk-remove', async (c) => {
    try {
      const ownerId = callerId(c);
      const { bookIds } = validateBulkRequest(await readJson(c));

      const result = await service.bulkRemoveMembers(ownerId, c.req.param('id'), bookIds);
      return c.json(result);
    } catch (error) {
      return jsonError(c, error);
    }
  });

  app.post('/:id/books/:bookId', async (c) => {
    try {
      const collection = await service.addMember(
        callerId(c),
        c.req.param('id'),
        c.req.param('bookId')
      );
      return c.json({ collection });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  app.delete('/:id/books/:bookId', async (c) => {
    try {
      const collection = await service.removeMember(
        callerId(c),
        c.req.param('id'),
        c.req.param('bookId')
      );
      return c.json({ collection });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}
