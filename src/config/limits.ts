/**
 * Fixed business limits. Unlike the values in env.ts these are part of the
 * public contract and do not vary per deployment.
 */

export const MAX_BULK_ITEMS = 50;

export const MAX_COLLECTION_NAME_LENGTH = 100;

export const MAX_SHIPPING_ADDRESS_LENGTH = 500;

export const MAX_QUANTITY = 10_000;
