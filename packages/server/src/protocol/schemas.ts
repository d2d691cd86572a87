/**
 * @file schemas.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';

// ============================================================================
// Chat Message Schema
// ============================================================================

/**
 * Builds the inbound chat message schema for a given content limit.
 * Unknown keys are rejected.
 */
export function createChatMessageSchema(maxContentLength: number) {
  return z
    .object({
      content: z
        .string({ required_error: 'Message content is required' })
        .max(maxContentLength, `Message content must be at most ${maxContentLength} characters`)
        .refine((content) => content.trim().length > 0, 'Message content cannot be empty'),
    })
    .strict();
}

// ============================================================================
// Validation Helper
// ============================================================================

/**
 * Parses a raw text frame as JSON.
 * Returns undefined if the frame is not valid JSON.
 */
export function parseFrame(data: string): unknown {
  try {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  } catch {
    return undefined;
  }
}
