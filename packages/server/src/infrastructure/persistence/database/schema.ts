/**
 * @file schema.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/**
 * Chatrooms table - owned by the chatroom management service, read here for existence checks.
 */
export const chatrooms = sqliteTable('chatrooms', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  isPrivate: integer('is_private', { mode: 'boolean' }).notNull().default(false),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Messages table - stores chatroom history.
 */
export const messages = sqliteTable('messages', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  chatroomId: text('chatroom_id')
    .notNull()
    .references(() => chatrooms.id),
  senderId: text('sender_id').notNull(),
  content: text('content').notNull(),
  isEdited: integer('is_edited', { mode: 'boolean' }).notNull().default(false),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Type definitions for database rows.
 */
export type ChatroomRow = typeof chatrooms.$inferSelect;
export type NewChatroomRow = typeof chatrooms.$inferInsert;

export type MessageRow = typeof messages.$inferSelect;
export type NewMessageRow = typeof messages.$inferInsert;
