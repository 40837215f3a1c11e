import type { Collection } from '../models/types.js';
import { sameName } from '../models/collection.js';
import type { CommerceTx } from './store.js';

export class CollectionRepository {
  /**
   * Load a collection owned by `ownerId`; another owner's collection reads
   * as absent
   */
  async findOwned(
    tx: CommerceTx,
    ownerId: string,
    collectionId: string,
    forUpdate = false
  ): Promise<Collection | null> {
    const collection = await tx.get('collections', collectionId, { forUpdate });
    if (!collection || collection.ownerId !== ownerId) {
      return null;
    }
    return collection;
  }

  async findByOwner(tx: CommerceTx, ownerId: string): Promise<Collection[]> {
    const collections = await tx.find('collections', (row) => row.ownerId === ownerId);
    return collections.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  /**
   * Serialize name checks per owner and report whether `name` is taken by
   * any collection other than `exceptId`
   */
  async nameTaken(
    tx: CommerceTx,
    ownerId: string,
    name: string,
    exceptId?: string
  ): Promise<boolean> {
    await tx.lock(`collection-names:${ownerId}`);
    const owned = await this.findByOwner(tx, ownerId);
    return owned.some((row) => row.id !== exceptId && sameName(row.name, name));
  }

  insert(tx: CommerceTx, collection: Collection): void {
    tx.insert('collections', collection);
  }

  save(tx: CommerceTx, collection: Collection): void {
    tx.put('collections', collection);
  }

  delete(tx: CommerceTx, collectionId: string): void {
    tx.delete('collections', collectionId);
  }
}
