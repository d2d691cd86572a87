/**
 * @file identity.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Authenticated user behind a connection, as produced by the token verifier.
 */
export interface Identity {
  readonly userId: string;
  readonly username: string;
}
