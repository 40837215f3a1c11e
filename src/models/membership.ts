import type { Book, Cart, Collection } from './types.js';
import { addLine, findLine, removeLine } from './cart.js';
import { addBook, hasBook, removeBook } from './collection.js';

/**
 * Book-membership capability shared by carts and collections. Each aggregate
 * implements it on its own; there is no common base state.
 */
export interface BookMembershipSet<S> {
  members(set: S): readonly string[];
  contains(set: S, bookId: string): boolean;
  add(set: S, book: Book, now: Date): S;
  remove(set: S, bookId: string, now: Date): S;
}

export const cartMembership: BookMembershipSet<Cart> = {
  members: (cart) => cart.lines.map((line) => line.bookId),
  contains: (cart, bookId) => findLine(cart, bookId) !== undefined,
  // A membership add on a cart means one more copy
  add: (cart, book, now) => addLine(cart, book, 1, now),
  remove: (cart, bookId, now) => removeLine(cart, bookId, now),
};

export const collectionMembership: BookMembershipSet<Collection> = {
  members: (collection) => collection.bookIds,
  contains: (collection, bookId) => hasBook(collection, bookId),
  add: (collection, book, now) => addBook(collection, book.id, now),
  remove: (collection, bookId, now) => removeBook(collection, bookId, now),
};
