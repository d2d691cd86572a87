/**
 * @file fake-transport.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Transport } from '../../src/domain/ports/transport.js';

export type SendMode = 'immediate' | 'hang' | 'reject';

/**
 * In-process transport. Records what the server writes and lets a test play the peer.
 */
export class FakeTransport implements Transport {
  readonly sent: string[] = [];
  readonly closes: { code: number; reason: string }[] = [];
  pings = 0;
  sendMode: SendMode = 'immediate';

  private messageHandler: ((data: string) => void) | undefined;
  private closeHandler: (() => void) | undefined;
  private errorHandler: ((error: Error) => void) | undefined;
  private pongHandler: (() => void) | undefined;

  send(data: string): Promise<void> {
    switch (this.sendMode) {
      case 'hang':
        return new Promise<void>(() => undefined);
      case 'reject':
        return Promise.reject(new Error('socket write failed'));
      default:
        this.sent.push(data);
        return Promise.resolve();
    }
  }

  close(code: number, reason: string): void {
    this.closes.push({ code, reason });
  }

  ping(): void {
    this.pings++;
  }

  onMessage(handler: (data: string) => void): void {
    this.messageHandler = handler;
  }

  onClose(handler: () => void): void {
    this.closeHandler = handler;
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandler = handler;
  }

  onPong(handler: () => void): void {
    this.pongHandler = handler;
  }

  /** Peer sends a text frame */
  receive(data: string): void {
    this.messageHandler?.(data);
  }

  /** Peer sends `{ content }` */
  say(content: string): void {
    this.receive(JSON.stringify({ content }));
  }

  /** Peer closes the socket */
  peerClose(): void {
    this.closeHandler?.();
  }

  fail(error: Error): void {
    this.errorHandler?.(error);
  }

  pong(): void {
    this.pongHandler?.();
  }

  /** Parsed frames written so far */
  frames(): unknown[] {
    return this.sent.map((frame): unknown => JSON.parse(frame));
  }

  get lastClose(): { code: number; reason: string } | undefined {
    return this.closes[this.closes.length - 1];
  }
}
