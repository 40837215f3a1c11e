import type { Logger } from 'pino';
import type { CatalogLookup } from '../clients/catalogClient.js';
import type {
  Book,
  BulkAction,
  BulkOperationDetail,
  BulkOperationResult,
} from '../models/types.js';
import type { BookMembershipSet } from '../models/membership.js';
import type { CommerceStore, CommerceTx } from '../repositories/store.js';
import { errorMessage } from '../lib/errors.js';
import { validateBookIds } from '../lib/validation.js';
import { logRollback } from '../lib/logger.js';

export const BULK_TIMEOUT_REASON = 'Bulk operation timed out';

/**
 * Where the membership set lives: how to load it for update and write it back
 */
export interface MembershipTarget<S> {
  load(tx: CommerceTx): Promise<S>;
  save(tx: CommerceTx, set: S): void;
}

export interface BulkMutationRequest<S> {
  action: BulkAction;
  bookIds: readonly string[];
  membership: BookMembershipSet<S>;
  target: MembershipTarget<S>;
  context: Record<string, unknown>;
}

interface Outcome<S> {
  set: S;
  detail: BulkOperationDetail;
}

/**
 * Applies a list of membership changes in one transaction. Every id gets a
 * detail entry; a bad id never stops the batch. Successes decided before the
 * transaction deadline are written once and committed.
 */
export class BulkMembershipMutator {
  constructor(
    private readonly store: CommerceStore,
    private readonly catalog: CatalogLookup,
    private readonly timeoutMs: number,
    private readonly log: Logger
  ) {}

  async run<S>(request: BulkMutationRequest<S>): Promise<BulkOperationResult> {
    const { action, bookIds, membership, target, context } = request;
    validateBookIds(bookIds);

    const label = `bulk.${action}`;
    this.log.info({ ...context, count: bookIds.length }, `Bulk ${action} started`);

    try {
      return await this.store.withTransaction(
        { isolation: 'READ_COMMITTED', timeoutMs: this.timeoutMs, label },
        async (tx) => {
          let set: S = await target.load(tx);
          const details: BulkOperationDetail[] = [];
          let timedOut = false;

          for (const bookId of bookIds) {
            if (timedOut || tx.signal.aborted) {
              timedOut = true;
              details.push({ bookId, status: 'FAILED', reason: BULK_TIMEOUT_REASON });
              continue;
            }

            try {
              const outcome = await this.apply(tx, action, membership, set, bookId);
              set = outcome.set;
              details.push(outcome.detail);
            } catch (error) {
              if (tx.signal.aborted) {
                timedOut = true;
                details.push({ bookId, status: 'FAILED', reason: BULK_TIMEOUT_REASON });
              } else {
                this.log.warn({ ...context, bookId, err: error }, 'Bulk item failed');
                details.push({
                  bookId,
                  status: 'FAILED',
                  reason: `Unexpected error: ${errorMessage(error)}`,
                });
              }
            }
          }

          const result = summarize(action, bookIds.length, details, timedOut);
          if (result.successfullyProcessed > 0) {
            target.save(tx, set);
          }

          if (timedOut) {
            this.log.warn({ ...context, result: result.message }, `Bulk ${action} timed out`);
          } else {
            this.log.info({ ...context, result: result.message }, `Bulk ${action} completed`);
          }
          return result;
        }
      );
    } catch (error) {
      logRollback(this.log, error, context, label);
      throw error;
    }
  }

  private async apply<S>(
    tx: CommerceTx,
    action: BulkAction,
    membership: BookMembershipSet<S>,
    set: S,
    bookId: string
  ): Promise<Outcome<S>> {
    const book = await lookupWithin(this.catalog, bookId, tx.signal);
    if (!book) {
      return {
        set,
        detail: {
          bookId,
          status: 'FAILED',
          reason: 'Book not found',
          bookDescription: 'Unknown book',
        },
      };
    }

    const present = membership.contains(set, bookId);
    const now = new Date();

    if (action === 'add') {
      if (present) {
        return { set, detail: skipped(book, 'Book already exists in collection') };
      }
      return {
        set: membership.add(set, book, now),
        detail: succeeded(book, 'Book added successfully'),
      };
    }

    if (!present) {
      return { set, detail: skipped(book, 'Book not in collection') };
    }
    return {
      set: membership.remove(set, bookId, now),
      detail: succeeded(book, 'Book removed successfully'),
    };
  }
}

function skipped(book: Book, reason: string): BulkOperationDetail {
  return { bookId: book.id, status: 'SKIPPED', reason, bookDescription: book.title };
}

function succeeded(book: Book, reason: string): BulkOperationDetail {
  return { bookId: book.id, status: 'SUCCESS', reason, bookDescription: book.title };
}

/**
 * Catalog lookup bounded by the transaction's deadline, even when the
 * catalog itself ignores the signal
 */
function lookupWithin(
  catalog: CatalogLookup,
  bookId: string,
  signal: AbortSignal
): Promise<Book | null> {
  signal.throwIfAborted();

  return new Promise<Book | null>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    void catalog.lookupBook(bookId, signal).then(
      (book) => {
        signal.removeEventListener('abort', onAbort);
        resolve(book);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export function summarize(
  action: BulkAction,
  totalRequested: number,
  details: BulkOperationDetail[],
  timedOut = false
): BulkOperationResult {
  const count = (status: BulkOperationDetail['status']): number =>
    details.filter((detail) => detail.status === status).length;

  const successCount = count('SUCCESS');
  const skippedCount = count('SKIPPED');
  const failedCount = count('FAILED');
  const verb = action === 'add' ? 'added' : 'removed';

  return {
    success: successCount > 0 || (skippedCount > 0 && failedCount === 0),
    message: `Processed ${totalRequested} books: ${successCount} ${verb}, ${skippedCount} skipped, ${failedCount} failed`,
    totalRequested,
    successfullyProcessed: successCount,
    skipped: skippedCount,
    failed: failedCount,
    timedOut,
    details,
  };
}
