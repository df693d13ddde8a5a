/**
 * In-memory account directory
 */

import { randomUUID } from 'node:crypto';

import type { Address, IAccountDirectory, User } from '../interfaces/account.interface.ts';

export interface InMemoryAccountDirectoryOptions {
  now?: (() => Date) | undefined;
  generateId?: (() => string) | undefined;
}

export class InMemoryAccountDirectory implements IAccountDirectory {
  private readonly users = new Map<string, User>();
  private readonly addresses = new Map<string, Address>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: InMemoryAccountDirectoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  getUser(userId: string): Promise<User | null> {
    return Promise.resolve(this.users.get(userId) ?? null);
  }

  findUserByName(name: string): Promise<User | null> {
    for (const user of this.users.values()) {
      if (user.name === name) {
        return Promise.resolve(user);
      }
    }
    return Promise.resolve(null);
  }

  createUser(name: string): Promise<User> {
    const user: User = Object.freeze({ id: this.generateId(), name, createdAt: this.now() });
    this.users.set(user.id, user);
    return Promise.resolve(user);
  }

  getAddress(address: string): Promise<Address | null> {
    return Promise.resolve(this.addresses.get(address) ?? null);
  }

  listAddresses(userId: string): Promise<Address[]> {
    return Promise.resolve(
      [...this.addresses.values()].filter((address) => address.userId === userId),
    );
  }

  /**
   * Insert or re-assign an address, keeping its original creation time
   */
  saveAddress(address: string, userId: string | null): Promise<Address> {
    const existing = this.addresses.get(address);
    const saved: Address = Object.freeze({
      address,
      userId,
      createdAt: existing?.createdAt ?? this.now(),
    });
    this.addresses.set(address, saved);
    return Promise.resolve(saved);
  }
}
