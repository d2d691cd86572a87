/**
 * @file ws-transport.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { WebSocket, type RawData } from 'ws';
import type { Transport } from '../../domain/ports/transport.js';

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(new Uint8Array(data)).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * Transport backed by a `ws` socket.
 */
export class WsTransport implements Transport {
  private readonly socket: WebSocket;

  constructor(socket: WebSocket) {
    this.socket = socket;
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error('WebSocket is not open'));
        return;
      }
      this.socket.send(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(code: number, reason: string): void {
    if (
      this.socket.readyState === WebSocket.CLOSING ||
      this.socket.readyState === WebSocket.CLOSED
    ) {
      return;
    }
    this.socket.close(code, reason);
  }

  ping(): void {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.ping();
    }
  }

  onMessage(handler: (data: string) => void): void {
    this.socket.on('message', (data: RawData) => {
      handler(rawDataToString(data));
    });
  }

  onClose(handler: () => void): void {
    this.socket.on('close', handler);
  }

  onError(handler: (error: Error) => void): void {
    this.socket.on('error', handler);
  }

  onPong(handler: () => void): void {
    this.socket.on('pong', handler);
  }
}
