/**
 * User Domain Types
 *
 * Users are identified by the numeric id the chat transport assigns them.
 * The directory only tracks identity and activity; everything the user did
 * lives in the answer history.
 */

export interface User {
  uid: number;
  /** Optional handle (without the leading @) */
  username: string | null;
  fullName: string;
  createdAt: Date;
  /** Refreshed on every touch and on every graded answer */
  lastActiveAt: Date;
}

/**
 * Identity as reported by the transport with each inbound event.
 */
export interface UserProfile {
  uid: number;
  username?: string | null;
  fullName: string;
}
