/**
 * Error classes for the order-processing core.
 *
 * Every error the core raises on purpose extends CommerceError and carries a
 * stable code plus the HTTP status the outer surface maps it to.
 */

export class CommerceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: 400 | 401 | 403 | 404 | 409 | 422 | 500 | 503
  ) {
    super(message);
    this.name = 'CommerceError';
  }
}

// --- not found -------------------------------------------------------------

export class NotFoundError extends CommerceError {
  constructor(message = 'Resource not found', code = 'NOT_FOUND') {
    super(message, code, 404);
    this.name = 'NotFoundError';
  }
}

export class CartNotFoundError extends NotFoundError {
  constructor(ownerId: string) {
    super(`Cart not found for user ${ownerId}`, 'CART_NOT_FOUND');
    this.name = 'CartNotFoundError';
  }
}

export class BookNotFoundError extends NotFoundError {
  constructor(bookId: string) {
    super(`Book ${bookId} not found`, 'BOOK_NOT_FOUND');
    this.name = 'BookNotFoundError';
  }
}

export class OwnerNotFoundError extends NotFoundError {
  constructor(ownerId: string) {
    super(`User ${ownerId} not found`, 'OWNER_NOT_FOUND');
    this.name = 'OwnerNotFoundError';
  }
}

export class OrderNotFoundError extends NotFoundError {
  constructor(orderId: string) {
    super(`Order ${orderId} not found`, 'ORDER_NOT_FOUND');
    this.name = 'OrderNotFoundError';
  }
}

export class CollectionNotFoundError extends NotFoundError {
  constructor(collectionId: string) {
    super(`Collection ${collectionId} not found`, 'COLLECTION_NOT_FOUND');
    this.name = 'CollectionNotFoundError';
  }
}

export class ItemNotInCartError extends NotFoundError {
  constructor(bookId: string, cartId: string) {
    super(`Book ${bookId} is not in cart ${cartId}`, 'ITEM_NOT_IN_CART');
    this.name = 'ItemNotInCartError';
  }
}

export class BookNotInCollectionError extends NotFoundError {
  constructor(bookId: string, collectionId: string) {
    super(
      `Book ${bookId} is not in collection ${collectionId}`,
      'BOOK_NOT_IN_COLLECTION'
    );
    this.name = 'BookNotInCollectionError';
  }
}

// --- access ----------------------------------------------------------------

export class UnauthorizedError extends CommerceError {
  constructor(message = 'Caller identity is missing') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends CommerceError {
  constructor(message = 'Operation not permitted', code = 'FORBIDDEN') {
    super(message, code, 403);
    this.name = 'ForbiddenError';
  }
}

export class NotOwnerError extends ForbiddenError {
  constructor(orderId: string) {
    super(`Order ${orderId} does not belong to the caller`, 'NOT_OWNER');
    this.name = 'NotOwnerError';
  }
}

// --- conflicts -------------------------------------------------------------

export class ConflictError extends CommerceError {
  constructor(message = 'Conflict', code = 'CONFLICT') {
    super(message, code, 409);
    this.name = 'ConflictError';
  }
}

export class CartAlreadyCheckedOutError extends ConflictError {
  constructor(cartId: string) {
    super(`Cart ${cartId} is already checked out`, 'CART_ALREADY_CHECKED_OUT');
    this.name = 'CartAlreadyCheckedOutError';
  }
}

export class DuplicateCollectionNameError extends ConflictError {
  constructor(name: string) {
    super(`A collection named '${name}' already exists`, 'DUPLICATE_COLLECTION_NAME');
    this.name = 'DuplicateCollectionNameError';
  }
}

export class BookAlreadyInCollectionError extends ConflictError {
  constructor(bookId: string, collectionId: string) {
    super(
      `Book ${bookId} is already in collection ${collectionId}`,
      'BOOK_ALREADY_IN_COLLECTION'
    );
    this.name = 'BookAlreadyInCollectionError';
  }
}

export class TransactionConflictError extends ConflictError {
  constructor(message = 'Concurrent update detected, transaction rolled back') {
    super(message, 'TRANSACTION_CONFLICT');
    this.name = 'TransactionConflictError';
  }
}

// --- invalid state ---------------------------------------------------------

export class CartEmptyError extends CommerceError {
  constructor(ownerId: string) {
    super(`Cannot check out an empty cart for user ${ownerId}`, 'CART_EMPTY', 422);
    this.name = 'CartEmptyError';
  }
}

export class InvalidOrderStateError extends CommerceError {
  constructor(
    orderId: string,
    public readonly currentStatus: string,
    action: string
  ) {
    super(
      `Cannot ${action} order ${orderId} in status ${currentStatus}`,
      'INVALID_ORDER_STATE',
      422
    );
    this.name = 'InvalidOrderStateError';
  }
}

export class InvalidStatusError extends CommerceError {
  constructor(
    public readonly value: string,
    validValues: readonly string[]
  ) {
    super(
      `Invalid order status: ${value}. Valid values are: ${validValues.join(', ')}`,
      'INVALID_STATUS',
      400
    );
    this.name = 'InvalidStatusError';
  }
}

// --- validation / infrastructure -------------------------------------------

export class ValidationError extends CommerceError {
  constructor(message = 'Validation failed') {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class TransactionTimeoutError extends CommerceError {
  constructor(label: string, timeoutMs: number) {
    super(`Transaction '${label}' exceeded ${timeoutMs}ms`, 'TRANSACTION_TIMEOUT', 503);
    this.name = 'TransactionTimeoutError';
  }
}

/**
 * Error envelope for API responses
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
  };
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof CommerceError) {
    return {
      error: {
        code: error.code,
        message: error.message,
      },
    };
  }

  return {
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
