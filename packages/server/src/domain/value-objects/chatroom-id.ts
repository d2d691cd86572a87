/**
 * @file chatroom-id.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/**
 * Value object representing a chatroom identifier.
 * The id is an opaque key owned by the external chatroom store.
 */
export class ChatroomId {
  private readonly _value: string;

  private constructor(value: string) {
    this._value = value;
  }

  get value(): string {
    return this._value;
  }

  static create(value: string): ChatroomId {
    if (!value || value.trim().length === 0) {
      throw new Error('ChatroomId cannot be empty');
    }
    return new ChatroomId(value.trim());
  }

  equals(other: ChatroomId): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
