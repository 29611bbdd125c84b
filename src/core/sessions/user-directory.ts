/**
 * UserDirectory - User Identity and Activity
 */

import type { DrillStore } from '../../storage/store';
import { NotFoundError } from '../errors';
import type { User, UserProfile } from '../models';
import { createLogger } from '../../logger';

const log = createLogger('Users');

export class UserDirectory {
  constructor(
    private readonly store: DrillStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Registers the user on first contact; afterwards refreshes the profile
   * and `lastActiveAt`.
   */
  async touch(profile: UserProfile): Promise<{ user: User; isNew: boolean }> {
    const at = this.now();
    const result = await this.store.write('users.touch', (repos) => repos.users.touch(profile, at));

    if (result.isNew) {
      log.info(`New user ${profile.uid} (${profile.fullName})`);
    }
    return result;
  }

  async get(uid: number): Promise<User | null> {
    return this.store.read('users.get', (repos) => repos.users.findById(uid));
  }

  /**
   * @throws {NotFoundError} If the user does not exist
   */
  async markActive(uid: number, at: Date = this.now()): Promise<void> {
    const found = await this.store.write('users.markActive', (repos) => repos.users.setLastActive(uid, at));
    if (!found) {
      throw new NotFoundError('user', uid);
    }
  }
}
