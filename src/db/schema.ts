import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export interface StoredSessionCommand {
  asset_name: string;
  command: string;
  result: string;
  timestamp: string;
}

export interface StoredSessionMessage {
  role: 'user' | 'assistant';
  content: string;
  commands?: StoredSessionCommand[];
}

export const assetGroups = sqliteTable('asset_groups', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  sortOrder: integer('sort_order').notNull().default(0),
  remark: text('remark').notNull().default(''),
  parentId: integer('parent_id'),
  createdAt: text('created_at')
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
});

export const assets = sqliteTable('assets', {
  name: text('name').primaryKey(),
  host: text('host').notNull(),
  port: integer('port').notNull().default(22),
  username: text('username').notNull(),
  password: text('password'),
  privateKeyPath: text('private_key_path'),
  description: text('description'),
  groupId: integer('group_id'),
  metadata: text('metadata', { mode: 'json' })
    .$type<Record<string, string>>()
    .notNull()
    .default({}),
  createdAt: text('created_at')
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at')
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
});

export const sessions = sqliteTable('sessions', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  messages: text('messages', { mode: 'json' })
    .$type<StoredSessionMessage[]>()
    .notNull()
    .default([]),
  createdAt: text('created_at')
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at')
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
});
