import { ValidationError } from './errors.js';
import {
  MAX_BULK_ITEMS,
  MAX_COLLECTION_NAME_LENGTH,
  MAX_QUANTITY,
  MAX_SHIPPING_ADDRESS_LENGTH,
} from '../config/limits.js';

/**
 * Validate a book id is a non-empty string
 */
export function validateBookId(bookId: string): void {
  if (!bookId || bookId.trim().length === 0) {
    throw new ValidationError('Book ID must be non-empty');
  }
}

/**
 * Validate quantity is an integer >= 1
 */
export function validateQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError('Quantity must be an integer >= 1');
  }
  if (quantity > MAX_QUANTITY) {
    throw new ValidationError(`Quantity must be at most ${MAX_QUANTITY}`);
  }
}

/**
 * Validate the id list of a bulk request (1..MAX_BULK_ITEMS ids)
 */
export function validateBookIds(bookIds: readonly string[]): void {
  if (bookIds.length === 0) {
    throw new ValidationError('Book IDs list cannot be empty');
  }
  if (bookIds.length > MAX_BULK_ITEMS) {
    throw new ValidationError(`Can process between 1 and ${MAX_BULK_ITEMS} books at once`);
  }
  for (const bookId of bookIds) {
    validateBookId(bookId);
  }
}

export function validateShippingAddress(address: string): string {
  const trimmed = address.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Shipping address cannot be blank');
  }
  if (trimmed.length > MAX_SHIPPING_ADDRESS_LENGTH) {
    throw new ValidationError(
      `Shipping address must be at most ${MAX_SHIPPING_ADDRESS_LENGTH} characters`
    );
  }
  return trimmed;
}

export function validateCollectionName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Collection name cannot be blank');
  }
  if (trimmed.length > MAX_COLLECTION_NAME_LENGTH) {
    throw new ValidationError(
      `Collection name must be between 1 and ${MAX_COLLECTION_NAME_LENGTH} characters`
    );
  }
  return trimmed;
}

// --- request bodies ------------------------------------------------------------

function asObject(body: unknown): Record<string, unknown> {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    throw new ValidationError('Request body must be an object');
  }
  return Object.fromEntries(Object.entries(body));
}

/**
 * Validate add-to-cart request; quantity defaults to 1
 */
export function validateAddItemRequest(body: unknown): {
  bookId: string;
  quantity: number;
} {
  const { bookId, quantity = 1 } = asObject(body);

  if (typeof bookId !== 'string') {
    throw new ValidationError('bookId must be a string');
  }

  if (typeof quantity !== 'number') {
    throw new ValidationError('quantity must be a number');
  }

  validateBookId(bookId);
  validateQuantity(quantity);

  return { bookId, quantity };
}

export function validateQuantityRequest(body: unknown): { quantity: number } {
  const { quantity } = asObject(body);

  if (typeof quantity !== 'number') {
    throw new ValidationError('quantity must be a number');
  }
  validateQuantity(quantity);

  return { quantity };
}

export function validateCheckoutRequest(body: unknown): { shippingAddress: string } {
  const { shippingAddress } = asObject(body);

  if (typeof shippingAddress !== 'string') {
    throw new ValidationError('shippingAddress must be a string');
  }

  return { shippingAddress: validateShippingAddress(shippingAddress) };
}

export function validateCollectionRequest(body: unknown): { name: string } {
  const { name } = asObject(body);

  if (typeof name !== 'string') {
    throw new ValidationError('name must be a string');
  }

  return { name: validateCollectionName(name) };
}

export function validateBulkRequest(body: unknown): { bookIds: string[] } {
  const { bookIds } = asObject(body);

  if (!Array.isArray(bookIds)) {
    throw new ValidationError('bookIds must be an array');
  }

  const ids: string[] = [];
  for (const id of bookIds) {
    if (typeof id !== 'string') {
      throw new ValidationError('bookIds must contain strings');
    }
    ids.push(id);
  }
  validateBookIds(ids);

  return { bookIds: ids };
}

export function validateStatusRequest(body: unknown): { orderId: string; status: string } {
  const { orderId, status } = asObject(body);

  if (typeof orderId !== 'string' || orderId.trim().length === 0) {
    throw new ValidationError('orderId must be a non-empty string');
  }

  if (typeof status !== 'string') {
    throw new ValidationError('status must be a string');
  }

  return { orderId, status };
}
