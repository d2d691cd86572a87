/**
 * @file request-parser.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { ChatroomId } from '../../domain/value-objects/chatroom-id.js';

export interface ConnectionRequest {
  chatroomId: ChatroomId;
  token: string | undefined;
}

const BEARER_PREFIX = /^Bearer\s+(.+)$/i;

/**
 * Extracts the bearer token from an Authorization header value.
 */
export function extractBearerToken(authorization: string | undefined): string | undefined {
  if (!authorization) {
    return undefined;
  }
  const match = BEARER_PREFIX.exec(authorization.trim());
  return match?.[1];
}

/**
 * Parses an upgrade request for `${pathPrefix}/${chatroomId}`.
 * The credential comes from the Authorization header, falling back to the
 * `token` query parameter for browser clients.
 * Returns undefined when the path does not address a chatroom.
 */
export function parseConnectionRequest(
  url: string,
  authorization: string | undefined,
  pathPrefix: string
): ConnectionRequest | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url, 'http://localhost');
  } catch {
    return undefined;
  }

  const prefix = `${pathPrefix}/`;
  if (!parsed.pathname.startsWith(prefix)) {
    return undefined;
  }

  const segment = parsed.pathname.slice(prefix.length);
  if (segment.length === 0 || segment.includes('/')) {
    return undefined;
  }

  let chatroomId: ChatroomId;
  try {
    chatroomId = ChatroomId.create(decodeURIComponent(segment));
  } catch {
    return undefined;
  }

  const token =
    extractBearerToken(authorization) ?? (parsed.searchParams.get('token') || undefined);

  return { chatroomId, token };
}
