import type { Book, Cart, CartLine, CartView } from './types.js';
import { ZERO, formatMoney, lineTotal, sumLines, type Money } from '../lib/money.js';

/**
 * Cart total, always recomputed from the full line set
 */
export function calculateTotal(lines: readonly CartLine[]): Money {
  return sumLines(lines);
}

/**
 * Create an empty cart for an owner
 */
export function createCart(id: string, ownerId: string, now = new Date()): Cart {
  return {
    id,
    ownerId,
    lines: [],
    totalPrice: ZERO,
    checkedOut: false,
    createdAt: now,
    updatedAt: now,
  };
}

function withLines(cart: Cart, lines: readonly CartLine[], now: Date): Cart {
  return {
    ...cart,
    lines,
    totalPrice: calculateTotal(lines),
    updatedAt: now,
  };
}

export function findLine(cart: Cart, bookId: string): CartLine | undefined {
  return cart.lines.find((line) => line.bookId === bookId);
}

/**
 * Merge a book into the cart. An existing line keeps its snapshotted price
 * and only grows in quantity; a new line snapshots the book's current price.
 */
export function addLine(
  cart: Cart,
  book: Book,
  quantity: number,
  now = new Date()
): Cart {
  const existingIndex = cart.lines.findIndex((line) => line.bookId === book.id);
  let updatedLines: CartLine[];

  if (existingIndex >= 0) {
    updatedLines = [...cart.lines];
    updatedLines[existingIndex] = {
      ...updatedLines[existingIndex],
      quantity: updatedLines[existingIndex].quantity + quantity,
    };
  } else {
    const newLine: CartLine = {
      bookId: book.id,
      title: book.title,
      quantity,
      unitPrice: book.price,
    };
    updatedLines = [...cart.lines, newLine];
  }

  return withLines(cart, updatedLines, now);
}

/**
 * Replace the quantity of an existing line. Callers check membership first;
 * an absent book leaves the lines untouched.
 */
export function setLineQuantity(
  cart: Cart,
  bookId: string,
  quantity: number,
  now = new Date()
): Cart {
  const updatedLines = cart.lines.map((line) =>
    line.bookId === bookId ? { ...line, quantity } : line
  );
  return withLines(cart, updatedLines, now);
}

export function removeLine(cart: Cart, bookId: string, now = new Date()): Cart {
  const updatedLines = cart.lines.filter((line) => line.bookId !== bookId);
  return withLines(cart, updatedLines, now);
}

export function clearLines(cart: Cart, now = new Date()): Cart {
  return withLines(cart, [], now);
}

export function toCartView(cart: Cart): CartView {
  return {
    id: cart.id,
    ownerId: cart.ownerId,
    items: cart.lines.map((line) => ({
      bookId: line.bookId,
      title: line.title,
      unitPrice: formatMoney(line.unitPrice),
      quantity: line.quantity,
      lineTotal: formatMoney(lineTotal(line.unitPrice, line.quantity)),
    })),
    totalPrice: formatMoney(cart.totalPrice),
    totalItems: cart.lines.length,
    totalQuantity: cart.lines.reduce((sum, line) => sum + line.quantity, 0),
    checkedOut: cart.checkedOut,
    createdAt: cart.createdAt.toISOString(),
    updatedAt: cart.updatedAt.toISOString(),
  };
}
