import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { StatusLabel } from '../types/status.js';

export const wires = sqliteTable('wires', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  /** NULL when cleared; an empty string read from the store is treated as null */
  description: text('description'),
  status: text('status').$type<StatusLabel>().notNull(),
  createdAt: integer('created_at').notNull(),
  updatedAt: integer('updated_at').notNull(),
  priority: integer('priority').notNull().default(0),
}, (table) => [
  index('idx_status').on(table.status),
  index('idx_priority').on(table.priority),
]);
