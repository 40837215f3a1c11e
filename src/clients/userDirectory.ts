/**
 * User directory contract. The core only needs to know whether an owner id
 * refers to a real user.
 */
export interface UserDirectory {
  resolveOwner(ownerId: string): Promise<boolean>;
}

export class InMemoryUserDirectory implements UserDirectory {
  private users: Set<string>;

  constructor(userIds: Iterable<string> = []) {
    this.users = new Set(userIds);
  }

  async resolveOwner(ownerId: string): Promise<boolean> {
    return this.users.has(ownerId);
  }

  register(ownerId: string): void {
    this.users.add(ownerId);
  }
}
