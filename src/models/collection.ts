import type { Collection, CollectionView } from './types.js';

export function createCollection(
  id: string,
  ownerId: string,
  name: string,
  now = new Date()
): Collection {
  return {
    id,
    ownerId,
    name,
    bookIds: [],
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Key used for the per-owner uniqueness check on names
 */
export function nameKey(name: string): string {
  return name.trim().toLowerCase();
}

export function sameName(a: string, b: string): boolean {
  return nameKey(a) === nameKey(b);
}

export function renameCollection(
  collection: Collection,
  name: string,
  now = new Date()
): Collection {
  return { ...collection, name, updatedAt: now };
}

export function hasBook(collection: Collection, bookId: string): boolean {
  return collection.bookIds.includes(bookId);
}

/**
 * Append a book; a book already present leaves the collection unchanged
 */
export function addBook(collection: Collection, bookId: string, now = new Date()): Collection {
  if (hasBook(collection, bookId)) {
    return collection;
  }
  return { ...collection, bookIds: [...collection.bookIds, bookId], updatedAt: now };
}

export function removeBook(
  collection: Collection,
  bookId: string,
  now = new Date()
): Collection {
  if (!hasBook(collection, bookId)) {
    return collection;
  }
  return {
    ...collection,
    bookIds: collection.bookIds.filter((id) => id !== bookId),
    updatedAt: now,
  };
}

export function toCollectionView(collection: Collection): CollectionView {
  return {
    id: collection.id,
    ownerId: collection.ownerId,
    name: collection.name,
    bookIds: [...collection.bookIds],
    bookCount: collection.bookIds.length,
    createdAt: collection.createdAt.toISOString(),
    updatedAt: collection.updatedAt.toISOString(),
  };
}
