/**
 * @file transport.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Port over a single live socket.
 */
export interface Transport {
  /**
   * Writes a text frame. Resolves once the frame is flushed, rejects on socket failure.
   */
  send(data: string): Promise<void>;

  /**
   * Closes the socket with a close code and reason.
   */
  close(code: number, reason: string): void;

  /**
   * Sends a heartbeat ping; the peer answers through `onPong`.
   */
  ping(): void;

  onMessage(handler: (data: string) => void): void;
  onClose(handler: () => void): void;
  onError(handler: (error: Error) => void): void;
  onPong(handler: () => void): void;
}
