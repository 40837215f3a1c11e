import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { CatalogLookup } from '../clients/catalogClient.js';
import type { UserDirectory } from '../clients/userDirectory.js';
import type { IsolationLevel } from '../clients/memoryStore.js';
import type {
  Book,
  BulkAction,
  BulkOperationResult,
  Collection,
  CollectionView,
} from '../models/types.js';
import {
  addBook,
  createCollection,
  hasBook,
  removeBook,
  renameCollection,
  toCollectionView,
} from '../models/collection.js';
import { collectionMembership } from '../models/membership.js';
import { CollectionRepository } from '../repositories/collection.repository.js';
import type { CommerceStore, CommerceTx } from '../repositories/store.js';
import {
  BookAlreadyInCollectionError,
  BookNotFoundError,
  BookNotInCollectionError,
  CollectionNotFoundError,
  DuplicateCollectionNameError,
  OwnerNotFoundError,
} from '../lib/errors.js';
import { validateBookId, validateCollectionName } from '../lib/validation.js';
import { getLogger, logRollback } from '../lib/logger.js';
import { BulkMembershipMutator } from './bulkMutation.js';

export interface CollectionServiceOptions {
  collections?: CollectionRepository;
  txTimeoutMs?: number;
  bulkTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Named wishlists of books, unique by name per owner. A collection that
 * belongs to another user is reported as not found.
 */
export class CollectionService {
  private readonly collections: CollectionRepository;
  private readonly txTimeoutMs: number;
  private readonly bulk: BulkMembershipMutator;
  private readonly log: Logger;

  constructor(
    private readonly store: CommerceStore,
    private readonly catalog: CatalogLookup,
    private readonly users: UserDirectory,
    options: CollectionServiceOptions = {}
  ) {
    this.collections = options.collections ?? new CollectionRepository();
    this.txTimeoutMs = options.txTimeoutMs ?? 5_000;
    this.log = options.logger ?? getLogger('collections');
    this.bulk = new BulkMembershipMutator(
      store,
      catalog,
      options.bulkTimeoutMs ?? 60_000,
      this.log
    );
  }

  async listCollections(ownerId: string): Promise<CollectionView[]> {
    return this.read('collection.list', async (tx) =>
      (await this.collections.findByOwner(tx, ownerId)).map(toCollectionView)
    );
  }

  async getCollection(ownerId: string, collectionId: string): Promise<CollectionView> {
    return this.read('collection.get', async (tx) =>
      toCollectionView(await this.requireOwned(tx, ownerId, collectionId))
    );
  }

  async createCollection(ownerId: string, name: string): Promise<CollectionView> {
    const trimmed = validateCollectionName(name);

    return this.write('collection.create', { ownerId, name: trimmed }, async (tx) => {
      if (!(await this.users.resolveOwner(ownerId))) {
        throw new OwnerNotFoundError(ownerId);
      }
      if (await this.collections.nameTaken(tx, ownerId, trimmed)) {
        throw new DuplicateCollectionNameError(trimmed);
      }

      const collection = createCollection(randomUUID(), ownerId, trimmed);
      this.collections.insert(tx, collection);

      this.log.info({ ownerId, collectionId: collection.id }, 'Created collection');
      return toCollectionView(collection);
    });
  }

  async renameCollection(
    ownerId: string,
    collectionId: string,
    name: string
  ): Promise<CollectionView> {
    const trimmed = validateCollectionName(name);

    return this.write('collection.rename', { ownerId, collectionId }, async (tx) => {
      const collection = await this.requireOwned(tx, ownerId, collectionId, true);
      if (await this.collections.nameTaken(tx, ownerId, trimmed, collection.id)) {
        throw new DuplicateCollectionNameError(trimmed);
      }

      const renamed = renameCollection(collection, trimmed);
      this.collections.save(tx, renamed);

      this.log.info({ ownerId, collectionId, name: trimmed }, 'Renamed collection');
      return toCollectionView(renamed);
    });
  }

  async deleteCollection(ownerId: string, collectionId: string): Promise<void> {
    await this.write(
      'collection.delete',
      { ownerId, collectionId },
      async (tx) => {
        await this.requireOwned(tx, ownerId, collectionId, true);
        this.collections.delete(tx, collectionId);
        this.log.info({ ownerId, collectionId }, 'Deleted collection');
      },
      'REPEATABLE_READ'
    );
  }

  async addMember(ownerId: string, collectionId: string, bookId: string): Promise<CollectionView> {
    validateBookId(bookId);

    return this.write('collection.addBook', { ownerId, collectionId, bookId }, async (tx) => {
      const collection = await this.requireOwned(tx, ownerId, collectionId, true);
      await this.requireBook(bookId, tx.signal);
      if (hasBook(collection, bookId)) {
        throw new BookAlreadyInCollectionError(bookId, collectionId);
      }

      const updated = addBook(collection, bookId);
      this.collections.save(tx, updated);

      this.log.info({ ownerId, collectionId, bookId }, 'Added book to collection');
      return toCollectionView(updated);
    });
  }

  async removeMember(
    ownerId: string,
    collectionId: string,
    bookId: string
  ): Promise<CollectionView> {
    validateBookId(bookId);

    return this.write('collection.removeBook', { ownerId, collectionId, bookId }, async (tx) => {
      const collection = await this.requireOwned(tx, ownerId, collectionId, true);
      await this.requireBook(bookId, tx.signal);
      if (!hasBook(collection, bookId)) {
        throw new BookNotInCollectionError(bookId, collectionId);
      }

      const updated = removeBook(collection, bookId);
      this.collections.save(tx, updated);

      this.log.info({ ownerId, collectionId, bookId }, 'Removed book from collection');
      return toCollectionView(updated);
    });
  }

  bulkAddMembers(
    ownerId: string,
    collectionId: string,
    bookIds: readonly string[]
  ): Promise<BulkOperationResult> {
    return this.runBulk('add', ownerId, collectionId, bookIds);
  }

  bulkRemoveMembers(
    ownerId: string,
    collectionId: string,
    bookIds: readonly string[]
  ): Promise<BulkOperationResult> {
    return this.runBulk('remove', ownerId, collectionId, bookIds);
  }

  private runBulk(
    action: BulkAction,
    ownerId: string,
    collectionId: string,
    bookIds: readonly string[]
  ): Promise<BulkOperationResult> {
    return this.bulk.run<Collection>({
      action,
      bookIds,
      membership: collectionMembership,
      context: { ownerId, collectionId },
      target: {
        load: (tx) => this.requireOwned(tx, ownerId, collectionId, true),
        save: (tx, collection) => this.collections.save(tx, collection),
      },
    });
  }

  private async requireOwned(
    tx: CommerceTx,
    ownerId: string,
    collectionId: string,
    forUpdate = false
  ): Promise<Collection> {
    const collection = await this.collections.findOwned(tx, ownerId, collectionId, forUpdate);
    if (!collection) {
      throw new CollectionNotFoundError(collectionId);
    }
    return collection;
  }

  private async requireBook(bookId: string, signal: AbortSignal): Promise<Book> {
    const book = await this.catalog.lookupBook(bookId, signal);
    if (!book) {
      throw new BookNotFoundError(bookId);
    }
    return book;
  }

  private read<R>(label: string, fn: (tx: CommerceTx) => Promise<R>): Promise<R> {
    return this.store.withTransaction(
      { isolation: 'READ_COMMITTED', timeoutMs: this.txTimeoutMs, label },
      fn
    );
  }

  private async write<R>(
    label: string,
    context: Record<string, unknown>,
    fn: (tx: CommerceTx) => Promise<R>,
    isolation: IsolationLevel = 'READ_COMMITTED'
  ): Promise<R> {
    try {
      return await this.store.withTransaction(
        { isolation, timeoutMs: this.txTimeoutMs, label },
        fn
      );
    } catch (error) {
      logRollback(this.log, error, context, label);
      throw error;
    }
  }
}
