/**
 * @file jwt-token-verifier.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { jwtVerify, errors } from 'jose';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { TokenVerifier } from '../../domain/ports/token-verifier.js';
import type { Identity } from '../../domain/value-objects/identity.js';
import { UnauthorizedError } from '../../domain/errors/domain-errors.js';

/**
 * Claims issued by the auth service for access tokens.
 */
const AccessTokenClaimsSchema = z.object({
  user: z.object({
    user_id: z.union([z.string().min(1), z.number().int()]),
    username: z.string().min(1),
  }),
  jti: z.string().min(1),
  refresh: z.boolean().optional(),
});

export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface JwtTokenVerifierConfig {
  secret: string;
  algorithm: JwtAlgorithm;
}

/**
 * Verifies HMAC-signed access tokens minted by the auth service.
 * Expiry is enforced through the `exp` claim; refresh tokens are refused.
 */
export class JwtTokenVerifier implements TokenVerifier {
  private readonly key: Uint8Array;
  private readonly algorithm: JwtAlgorithm;
  private readonly logger: Logger;

  constructor(config: JwtTokenVerifierConfig, logger: Logger) {
    this.key = new TextEncoder().encode(config.secret);
    this.algorithm = config.algorithm;
    this.logger = logger.child({ component: 'JwtTokenVerifier' });
  }

  async verify(token: string): Promise<Identity> {
    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, this.key, { algorithms: [this.algorithm] }));
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        throw new UnauthorizedError('Token has expired');
      }
      if (error instanceof errors.JOSEError) {
        this.logger.debug({ code: error.code }, 'Token rejected');
        throw new UnauthorizedError('Invalid token');
      }
      throw error;
    }

    const claims = AccessTokenClaimsSchema.safeParse(payload);
    if (!claims.success) {
      throw new UnauthorizedError('Token is missing required claims');
    }
    if (claims.data.refresh === true) {
      throw new UnauthorizedError('Refresh tokens cannot open connections');
    }

    return {
      userId: String(claims.data.user.user_id),
      username: claims.data.user.username,
    };
  }
}
