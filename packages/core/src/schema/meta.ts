import { sqliteTable, text } from 'drizzle-orm/sqlite-core';

/** Repository-level key/value settings (schema version) */
export const meta = sqliteTable('meta', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});
