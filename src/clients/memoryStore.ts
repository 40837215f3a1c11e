import type { Logger } from 'pino';
import { TransactionConflictError, TransactionTimeoutError } from '../lib/errors.js';
import { getLogger } from '../lib/logger.js';

/**
 * In-memory transactional store
 *
 * Stands in for the relational store behind the core. It keeps one table per
 * aggregate and gives each transaction:
 * - staged writes, applied together at commit and dropped on rollback
 * - exclusive row locks for `forUpdate` reads and advisory `lock(key)` calls,
 *   held until the transaction ends, granted FIFO
 * - an abort signal that fires when the transaction's timeout elapses;
 *   reads and lock waits fail with TransactionTimeoutError after that
 *
 * Isolation levels:
 * - READ_COMMITTED: every read sees the latest committed row
 * - REPEATABLE_READ: the first read of a row is pinned; committing a write to
 *   a row that changed since it was read fails with TransactionConflictError
 * - SERIALIZABLE: as above, and every pinned row is validated at commit
 */

export type IsolationLevel = 'READ_COMMITTED' | 'REPEATABLE_READ' | 'SERIALIZABLE';

export interface TransactionOptions {
  isolation: IsolationLevel;
  timeoutMs: number;
  label?: string;
}

export interface ReadOptions {
  forUpdate?: boolean;
}

export type TableMap<T> = { [K in keyof T]: { readonly id: string } };

export interface Transaction<T extends TableMap<T>> {
  readonly label: string;
  readonly isolation: IsolationLevel;
  readonly signal: AbortSignal;
  get<K extends keyof T>(table: K, id: string, options?: ReadOptions): Promise<T[K] | null>;
  find<K extends keyof T>(table: K, predicate: (row: T[K]) => boolean): Promise<T[K][]>;
  insert<K extends keyof T>(table: K, row: T[K]): void;
  put<K extends keyof T>(table: K, row: T[K]): void;
  delete<K extends keyof T>(table: K, id: string): void;
  lock(key: string): Promise<void>;
}

export interface TransactionalStore<T extends TableMap<T>> {
  withTransaction<R>(
    options: TransactionOptions,
    fn: (tx: Transaction<T>) => Promise<R>
  ): Promise<R>;
}

interface VersionedRow<R> {
  version: number;
  // null marks a deleted row; its version keeps counting
  value: R | null;
}

type StagedWrite<R> =
  | { kind: 'insert'; value: R }
  | { kind: 'put'; value: R }
  | { kind: 'delete' };

type Tables<T> = Partial<{ [K in keyof T]: Map<string, VersionedRow<T[K]>> }>;
type Writes<T> = Partial<{ [K in keyof T]: Map<string, StagedWrite<T[K]>> }>;

// --- locks -------------------------------------------------------------------

interface Waiter {
  txId: number;
  grant: () => void;
}

interface LockState {
  holder: number;
  queue: Waiter[];
}

class LockManager {
  private locks = new Map<string, LockState>();

  acquire(key: string, txId: number, signal: AbortSignal, onAbort: () => Error): Promise<void> {
    const state = this.locks.get(key);
    if (!state) {
      this.locks.set(key, { holder: txId, queue: [] });
      return Promise.resolve();
    }
    if (state.holder === txId) {
      return Promise.resolve();
    }
    if (signal.aborted) {
      return Promise.reject(onAbort());
    }

    return new Promise<void>((resolve, reject) => {
      const abort = (): void => {
        const index = state.queue.indexOf(waiter);
        if (index >= 0) {
          state.queue.splice(index, 1);
        }
        reject(onAbort());
      };
      const waiter: Waiter = {
        txId,
        grant: () => {
          signal.removeEventListener('abort', abort);
          resolve();
        },
      };
      signal.addEventListener('abort', abort, { once: true });
      state.queue.push(waiter);
    });
  }

  release(key: string, txId: number): void {
    const state = this.locks.get(key);
    if (!state || state.holder !== txId) {
      return;
    }
    const next = state.queue.shift();
    if (next) {
      state.holder = next.txId;
      next.grant();
    } else {
      this.locks.delete(key);
    }
  }

  heldCount(): number {
    return this.locks.size;
  }
}

// --- store ---------------------------------------------------------------------

export class MemoryStore<T extends TableMap<T>> implements TransactionalStore<T> {
  private tables: Tables<T> = {};
  private readonly lockManager = new LockManager();
  private txCounter = 0;
  private readonly log: Logger;

  constructor(log: Logger = getLogger('store')) {
    this.log = log;
  }

  async withTransaction<R>(
    options: TransactionOptions,
    fn: (tx: Transaction<T>) => Promise<R>
  ): Promise<R> {
    const tx = new MemoryTransaction<T>(this, this.lockManager, ++this.txCounter, options);
    this.log.debug({ tx: tx.label, isolation: options.isolation }, 'transaction started');

    try {
      const result = await fn(tx);
      tx.commit();
      this.log.debug({ tx: tx.label }, 'transaction committed');
      return result;
    } catch (error) {
      tx.rollback();
      this.log.debug({ tx: tx.label, err: error }, 'transaction rolled back');
      throw error;
    } finally {
      tx.close();
    }
  }

  /**
   * Committed rows map of a table, created on first use
   */
  table<K extends keyof T>(name: K): Map<string, VersionedRow<T[K]>> {
    let rows = this.tables[name];
    if (!rows) {
      rows = new Map<string, VersionedRow<T[K]>>();
      this.tables[name] = rows;
    }
    return rows;
  }

  /**
   * Committed, non-deleted rows of a table (for inspection and tests)
   */
  rows<K extends keyof T>(name: K): T[K][] {
    const result: T[K][] = [];
    for (const row of this.table(name).values()) {
      if (row.value !== null) {
        result.push(row.value);
      }
    }
    return result;
  }

  size<K extends keyof T>(name: K): number {
    return this.rows(name).length;
  }

  /**
   * Number of row and advisory locks currently held
   */
  heldLocks(): number {
    return this.lockManager.heldCount();
  }

  /**
   * Drop every table (for tests)
   */
  clear(): void {
    this.tables = {};
  }
}

// --- transaction ---------------------------------------------------------------

class MemoryTransaction<T extends TableMap<T>> implements Transaction<T> {
  readonly label: string;
  readonly isolation: IsolationLevel;
  readonly signal: AbortSignal;

  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly timeoutMs: number;
  private state: 'active' | 'committed' | 'rolledBack' = 'active';
  private writes: Writes<T> = {};
  private pins: Tables<T> = {};
  private readonly touched = new Set<keyof T>();
  private readonly heldLocks = new Set<string>();

  constructor(
    private readonly store: MemoryStore<T>,
    private readonly locks: LockManager,
    private readonly id: number,
    options: TransactionOptions
  ) {
    this.label = `${options.label ?? 'tx'}#${id}`;
    this.isolation = options.isolation;
    this.timeoutMs = options.timeoutMs;
    this.signal = this.controller.signal;
    this.timer = setTimeout(() => {
      this.controller.abort(this.timeoutError());
    }, options.timeoutMs);
  }

  async get<K extends keyof T>(
    table: K,
    id: string,
    options: ReadOptions = {}
  ): Promise<T[K] | null> {
    this.ensureReadable();
    if (options.forUpdate) {
      await this.acquire(`${String(table)}/${id}`);
      this.ensureReadable();
      return this.readLatest(table, id);
    }
    return this.readVisible(table, id);
  }

  async find<K extends keyof T>(table: K, predicate: (row: T[K]) => boolean): Promise<T[K][]> {
    this.ensureReadable();
    const ids = new Set<string>(this.store.table(table).keys());
    for (const id of this.stagedFor(table).keys()) {
      ids.add(id);
    }

    const result: T[K][] = [];
    for (const id of ids) {
      const row = this.readVisible(table, id);
      if (row !== null && predicate(row)) {
        result.push(row);
      }
    }
    return result;
  }

  insert<K extends keyof T>(table: K, row: T[K]): void {
    this.ensureOpen();
    const staged = this.stagedFor(table);
    const existing = staged.get(row.id);
    if (existing && existing.kind !== 'delete') {
      throw new TransactionConflictError(`Duplicate ${String(table)} id ${row.id}`);
    }
    staged.set(row.id, { kind: 'insert', value: row });
  }

  put<K extends keyof T>(table: K, row: T[K]): void {
    this.ensureOpen();
    const staged = this.stagedFor(table);
    // a put after an insert in the same transaction is still an insert
    const kind = staged.get(row.id)?.kind === 'insert' ? 'insert' : 'put';
    staged.set(row.id, { kind, value: row });
  }

  delete<K extends keyof T>(table: K, id: string): void {
    this.ensureOpen();
    this.stagedFor(table).set(id, { kind: 'delete' });
  }

  async lock(key: string): Promise<void> {
    this.ensureReadable();
    await this.acquire(`advisory/${key}`);
  }

  commit(): void {
    this.ensureOpen();
    for (const table of this.touched) {
      this.validate(table);
    }
    for (const table of this.touched) {
      this.apply(table);
    }
    this.state = 'committed';
  }

  rollback(): void {
    this.writes = {};
    this.pins = {};
    this.state = 'rolledBack';
  }

  close(): void {
    clearTimeout(this.timer);
    for (const key of this.heldLocks) {
      this.locks.release(key, this.id);
    }
    this.heldLocks.clear();
    if (this.state === 'active') {
      this.rollback();
    }
  }

  // --- internals ---

  private timeoutError(): TransactionTimeoutError {
    return new TransactionTimeoutError(this.label, this.timeoutMs);
  }

  private ensureOpen(): void {
    if (this.state !== 'active') {
      throw new Error(`Transaction ${this.label} is already ${this.state}`);
    }
  }

  private ensureReadable(): void {
    this.ensureOpen();
    if (this.signal.aborted) {
      throw this.timeoutError();
    }
  }

  private async acquire(key: string): Promise<void> {
    await this.locks.acquire(key, this.id, this.signal, () => this.timeoutError());
    this.heldLocks.add(key);
  }

  private stagedFor<K extends keyof T>(table: K): Map<string, StagedWrite<T[K]>> {
    let staged = this.writes[table];
    if (!staged) {
      staged = new Map<string, StagedWrite<T[K]>>();
      this.writes[table] = staged;
      this.touched.add(table);
    }
    return staged;
  }

  private pinsFor<K extends keyof T>(table: K): Map<string, VersionedRow<T[K]>> {
    let pinned = this.pins[table];
    if (!pinned) {
      pinned = new Map<string, VersionedRow<T[K]>>();
      this.pins[table] = pinned;
      this.touched.add(table);
    }
    return pinned;
  }

  private committed<K extends keyof T>(table: K, id: string): VersionedRow<T[K]> {
    return this.store.table(table).get(id) ?? { version: 0, value: null };
  }

  private staged<K extends keyof T>(table: K, id: string): StagedWrite<T[K]> | undefined {
    return this.writes[table]?.get(id);
  }

  /**
   * Staged write first, then the pinned snapshot (above READ_COMMITTED),
   * then the latest committed row
   */
  private readVisible<K extends keyof T>(table: K, id: string): T[K] | null {
    const write = this.staged(table, id);
    if (write) {
      return write.kind === 'delete' ? null : write.value;
    }

    const pinned = this.pins[table]?.get(id);
    if (pinned && this.isolation !== 'READ_COMMITTED') {
      return pinned.value;
    }

    const row = this.committed(table, id);
    this.pinsFor(table).set(id, row);
    return row.value;
  }

  /**
   * Locked read: always the latest committed row. Above READ_COMMITTED a row
   * that moved since this transaction pinned it is a conflict.
   */
  private readLatest<K extends keyof T>(table: K, id: string): T[K] | null {
    const write = this.staged(table, id);
    if (write) {
      return write.kind === 'delete' ? null : write.value;
    }

    const row = this.committed(table, id);
    const pinned = this.pins[table]?.get(id);
    if (pinned && this.isolation !== 'READ_COMMITTED' && pinned.version !== row.version) {
      throw new TransactionConflictError(
        `${String(table)} ${id} changed since it was read in ${this.label}`
      );
    }
    this.pinsFor(table).set(id, row);
    return row.value;
  }

  private validate<K extends keyof T>(table: K): void {
    const writes = this.writes[table] ?? new Map<string, StagedWrite<T[K]>>();
    const pinned = this.pins[table] ?? new Map<string, VersionedRow<T[K]>>();

    for (const [id, write] of writes) {
      const current = this.committed(table, id);
      if (write.kind === 'insert' && current.value !== null) {
        throw new TransactionConflictError(`Duplicate ${String(table)} id ${id}`);
      }
      const readVersion = pinned.get(id)?.version;
      if (
        this.isolation !== 'READ_COMMITTED' &&
        readVersion !== undefined &&
        readVersion !== current.version
      ) {
        throw new TransactionConflictError(
          `${String(table)} ${id} was modified by a concurrent transaction`
        );
      }
    }

    if (this.isolation === 'SERIALIZABLE') {
      for (const [id, row] of pinned) {
        if (this.committed(table, id).version !== row.version) {
          throw new TransactionConflictError(
            `${String(table)} ${id} read by ${this.label} was modified concurrently`
          );
        }
      }
    }
  }

  private apply<K extends keyof T>(table: K): void {
    const writes = this.writes[table];
    if (!writes) {
      return;
    }
    const rows = this.store.table(table);
    for (const [id, write] of writes) {
      const version = (rows.get(id)?.version ?? 0) + 1;
      rows.set(id, { version, value: write.kind === 'delete' ? null : write.value });
    }
  }
}
