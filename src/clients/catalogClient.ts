import type { Book } from '../models/types.js';
import { money } from '../lib/money.js';

/**
 * Catalog lookup contract: resolves a book id to its current price,
 * availability and title. `null` means the catalog does not know the id.
 */
export interface CatalogLookup {
  lookupBook(bookId: string, signal?: AbortSignal): Promise<Book | null>;
}

export interface BookSeed {
  id: string;
  title: string;
  author?: string;
  price: string | number;
  available?: boolean;
}

/**
 * In-memory catalog used by the dev server and tests
 */
export class InMemoryCatalog implements CatalogLookup {
  private books = new Map<string, Book>();

  constructor(seed: readonly BookSeed[] = [], private readonly latencyMs = 0) {
    for (const book of seed) {
      this.upsert(book);
    }
  }

  async lookupBook(bookId: string, signal?: AbortSignal): Promise<Book | null> {
    if (this.latencyMs > 0) {
      await delay(this.latencyMs, signal);
    }
    signal?.throwIfAborted();
    return this.books.get(bookId) ?? null;
  }

  /**
   * Add a book or replace its catalog entry (e.g. a price change)
   */
  upsert(seed: BookSeed): Book {
    const book: Book = {
      id: seed.id,
      title: seed.title,
      author: seed.author ?? 'Unknown',
      price: money(seed.price),
      available: seed.available ?? true,
    };
    this.books.set(book.id, book);
    return book;
  }

  remove(bookId: string): void {
    this.books.delete(bookId);
  }

  size(): number {
    return this.books.size;
  }
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
