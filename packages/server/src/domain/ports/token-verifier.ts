/**
 * @file token-verifier.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Identity } from '../value-objects/identity.js';

/**
 * Port for validating bearer credentials.
 */
export interface TokenVerifier {
  /**
   * Resolves the identity behind a token, or rejects with UnauthorizedError.
   */
  verify(token: string): Promise<Identity>;
}
