/**
 * @file errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import {
  DomainError,
  InternalError,
  InvalidPayloadError,
} from '../domain/errors/domain-errors.js';
import type { ErrorCode, ErrorMessage } from './messages.js';

/**
 * Creates an error message in the protocol format.
 */
export function createErrorMessage(
  code: ErrorCode,
  message: string,
  details?: unknown
): ErrorMessage {
  const result: ErrorMessage = {
    type: 'error',
    payload: {
      code,
      message,
    },
  };

  if (details !== undefined) {
    result.payload.details = details;
  }

  return result;
}

export const ProtocolErrors = {
  /**
   * Maps any thrown value to an error message. Non-domain errors become INTERNAL_ERROR.
   */
  fromError: (error: unknown): ErrorMessage => {
    const domainError = error instanceof DomainError ? error : new InternalError();
    const details = domainError instanceof InvalidPayloadError ? domainError.details : undefined;
    return createErrorMessage(domainError.code, domainError.message, details);
  },
} as const;
