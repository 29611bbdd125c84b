/**
 * User Repository Implementation
 *
 * Data access for `user_info`. Users are keyed by the transport-assigned uid.
 */

import { eq } from 'drizzle-orm';
import type { StoreExecutor } from '../db';
import { userInfo } from '../schema';
import type { UserInfoRow } from '../schema';
import type { User, UserProfile } from '../../core/models';
import type { Repository } from './base';

function mapToDomain(row: UserInfoRow): User {
  return {
    uid: row.uid,
    username: row.username,
    fullName: row.fullName,
    createdAt: row.createdAt,
    lastActiveAt: row.lastActiveAt,
  };
}

export class UserRepository implements Repository<User> {
  constructor(private readonly db: StoreExecutor) {}

  findById(uid: number): User | null {
    const row = this.db.select().from(userInfo).where(eq(userInfo.uid, uid)).get();
    return row ? mapToDomain(row) : null;
  }

  /**
   * Creates the user, or refreshes the profile and last activity of an
   * existing one.
   */
  touch(profile: UserProfile, at: Date): { user: User; isNew: boolean } {
    const created: UserInfoRow | undefined = this.db
      .insert(userInfo)
      .values({
        uid: profile.uid,
        username: profile.username ?? null,
        fullName: profile.fullName,
        createdAt: at,
        lastActiveAt: at,
      })
      .onConflictDoNothing({ target: userInfo.uid })
      .returning()
      .get();

    if (created) {
      return { user: mapToDomain(created), isNew: true };
    }

    const updated: UserInfoRow | undefined = this.db
      .update(userInfo)
      .set({
        fullName: profile.fullName,
        lastActiveAt: at,
        // An absent handle keeps the stored one; null clears it
        ...(profile.username !== undefined && { username: profile.username }),
      })
      .where(eq(userInfo.uid, profile.uid))
      .returning()
      .get();

    if (!updated) {
      throw new Error(`User ${profile.uid} vanished during touch`);
    }
    return { user: mapToDomain(updated), isNew: false };
  }

  /**
   * @returns false if the user does not exist
   */
  setLastActive(uid: number, at: Date): boolean {
    return this.db.update(userInfo).set({ lastActiveAt: at }).where(eq(userInfo.uid, uid)).run().changes > 0;
  }
}
