/**
 * @file connection.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { ChatroomId } from '../value-objects/chatroom-id.js';
import type { Identity } from '../value-objects/identity.js';
import { OutboundChannel } from './outbound-channel.js';

export type ConnectionState =
  | 'connecting'
  | 'authenticating'
  | 'admitted'
  | 'active'
  | 'closing'
  | 'closed';

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  connecting: ['authenticating', 'closing'],
  authenticating: ['admitted', 'closing'],
  admitted: ['active', 'closing'],
  active: ['closing'],
  closing: ['closed'],
  closed: [],
};

export type CloseRequestHandler = (code: number, reason: string) => void;

export interface ConnectionProps {
  id: string;
  chatroomId: ChatroomId;
  outboundCapacity: number;
}

/**
 * Entity representing a live transport session bound to one chatroom.
 * Owned by its lifecycle; the registry and room sessions only reference it.
 */
export class Connection {
  private readonly _id: string;
  private readonly _chatroomId: ChatroomId;
  private readonly _outbound: OutboundChannel<string>;
  private readonly _connectedAt: Date;
  private _identity: Identity | undefined;
  private _state: ConnectionState = 'connecting';
  private _lastPongAt: Date;
  private _consecutiveDrops = 0;
  private _closeRequestHandler: CloseRequestHandler | undefined;

  constructor(props: ConnectionProps) {
    this._id = props.id;
    this._chatroomId = props.chatroomId;
    this._outbound = new OutboundChannel<string>(props.outboundCapacity);
    this._connectedAt = new Date();
    this._lastPongAt = new Date();
  }

  get id(): string {
    return this._id;
  }

  get chatroomId(): ChatroomId {
    return this._chatroomId;
  }

  get outbound(): OutboundChannel<string> {
    return this._outbound;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get connectedAt(): Date {
    return this._connectedAt;
  }

  get lastPongAt(): Date {
    return this._lastPongAt;
  }

  get consecutiveDrops(): number {
    return this._consecutiveDrops;
  }

  get isAlive(): boolean {
    return this._state !== 'closing' && this._state !== 'closed';
  }

  get isActive(): boolean {
    return this._state === 'active';
  }

  get isSlow(): boolean {
    return this._consecutiveDrops > 0;
  }

  /**
   * Identity of the authenticated user.
   * Throws when read before authentication completed.
   */
  get identity(): Identity {
    if (!this._identity) {
      throw new Error(`Connection ${this._id} is not authenticated`);
    }
    return this._identity;
  }

  beginAuthentication(): void {
    this.transition('authenticating');
  }

  markAuthenticated(identity: Identity): void {
    this.transition('admitted');
    this._identity = identity;
  }

  activate(): void {
    this.transition('active');
  }

  /**
   * Moves the connection to `closing`.
   * Returns false when it is already closing or closed.
   */
  beginClosing(): boolean {
    if (!this.isAlive) {
      return false;
    }
    this.transition('closing');
    return true;
  }

  markClosed(): void {
    this.transition('closed');
  }

  /**
   * Offers a serialized frame to the outbound channel and tracks consecutive drops.
   */
  enqueue(frame: string): boolean {
    if (!this.isAlive) {
      return false;
    }
    if (this._outbound.offer(frame)) {
      this._consecutiveDrops = 0;
      return true;
    }
    this._consecutiveDrops++;
    return false;
  }

  recordPong(): void {
    this._lastPongAt = new Date();
  }

  hasTimedOut(timeoutMs: number): boolean {
    return Date.now() - this._lastPongAt.getTime() > timeoutMs;
  }

  onCloseRequested(handler: CloseRequestHandler): void {
    this._closeRequestHandler = handler;
  }

  /**
   * Asks the owning lifecycle to close this connection.
   */
  requestClose(code: number, reason: string): void {
    if (!this.isAlive) {
      return;
    }
    this._closeRequestHandler?.(code, reason);
  }

  private transition(next: ConnectionState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`Invalid connection transition: ${this._state} -> ${next}`);
    }
    this._state = next;
  }
}
