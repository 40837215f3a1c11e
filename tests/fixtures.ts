import { InMemoryCatalog, type BookSeed, type CatalogLookup } from '../src/clients/catalogClient.js';
import { InMemoryUserDirectory } from '../src/clients/userDirectory.js';
import { createCommerceStore } from '../src/repositories/store.js';
import type { Book } from '../src/models/types.js';

export const TEST_BOOKS: BookSeed[] = [
  { id: 'book-a', title: 'Book A', author: 'Author A', price: '10.00' },
  { id: 'book-b', title: 'Book B', author: 'Author B', price: '5.00' },
  { id: 'book-c', title: 'Book C', author: 'Author C', price: '0.10' },
  { id: 'book-d', title: 'Book D', author: 'Author D', price: '0.20' },
];

export const TEST_USERS = ['user-1', 'user-2'];

export function createFixture() {
  return {
    store: createCommerceStore(),
    catalog: new InMemoryCatalog(TEST_BOOKS),
    users: new InMemoryUserDirectory(TEST_USERS),
  };
}

/**
 * Catalog whose lookups of `hangingIds` only settle when the caller's signal
 * aborts, and whose lookups of `failingIds` reject
 */
export class ScriptedCatalog implements CatalogLookup {
  constructor(
    private readonly inner: CatalogLookup,
    private readonly hangingIds: readonly string[] = [],
    private readonly failingIds: readonly string[] = []
  ) {}

  lookupBook(bookId: string, signal?: AbortSignal): Promise<Book | null> {
    if (this.failingIds.includes(bookId)) {
      return Promise.reject(new Error('catalog offline'));
    }
    if (this.hangingIds.includes(bookId)) {
      return new Promise<Book | null>((_resolve, reject) => {
        if (signal) {
          signal.addEventListener('abort', () => reject(signal.reason), { once: true });
        }
      });
    }
    return this.inner.lookupBook(bookId, signal);
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => undefined;
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
