/**
 * Account Directory Interface
 * Users and pool address ownership
 */

export interface User {
  readonly id: string;
  readonly name: string;
  readonly createdAt: Date;
}

export interface Address {
  readonly address: string;
  /** null for pool-only addresses */
  readonly userId: string | null;
  readonly createdAt: Date;
}

export interface IAccountDirectory {
  getUser(userId: string): Promise<User | null>;
  findUserByName(name: string): Promise<User | null>;
  createUser(name: string): Promise<User>;
  getAddress(address: string): Promise<Address | null>;
  /**
   * Addresses owned by the user, oldest first
   */
  listAddresses(userId: string): Promise<Address[]>;
  saveAddress(address: string, userId: string | null): Promise<Address>;
}
