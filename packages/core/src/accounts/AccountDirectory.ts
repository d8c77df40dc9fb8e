import { DuplicateAccountError } from '../errors.js';
import type { AccountRecord, AccountRepository } from '../stores/interfaces.js';
import { type AccountRole, type Clock, systemClock } from '../types.js';
import { KeyedMutex } from '../utils/KeyedMutex.js';
import { logger } from '../utils/logger.js';

/**
 * Known developers and players.
 *
 * Identities only: authentication happens outside the core, which trusts
 * the identity it is given and checks it against this directory.
 */
export class AccountDirectory {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly accounts: AccountRepository,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Register a new account.
   * @throws {DuplicateAccountError} if the id is taken for that role
   */
  register(role: AccountRole, id: string): Promise<AccountRecord> {
    return this.locks.runExclusive(`${role}:${id}`, () => {
      if (this.accounts.get(role, id)) {
        throw new DuplicateAccountError(role, id);
      }
      const account: AccountRecord = { role, id, registeredAt: this.clock() };
      this.accounts.save(account);
      logger.info('Account registered', { role, id });
      return account;
    });
  }

  has(role: AccountRole, id: string): boolean {
    return this.accounts.get(role, id) !== undefined;
  }

  list(role: AccountRole): AccountRecord[] {
    return this.accounts.list(role);
  }
}
