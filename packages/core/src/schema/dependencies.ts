import { sqliteTable, text, primaryKey, check, index } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import { wires } from './wires.js';

/** Edge (wire_id -> depends_on): wire_id is not ready until depends_on is DONE */
export const dependencies = sqliteTable('dependencies', {
  wireId: text('wire_id').notNull().references(() => wires.id, { onDelete: 'cascade' }),
  dependsOn: text('depends_on').notNull().references(() => wires.id, { onDelete: 'cascade' }),
}, (table) => [
  primaryKey({ columns: [table.wireId, table.dependsOn] }),
  check('no_self_dependency', sql`${table.wireId} != ${table.dependsOn}`),
  index('idx_deps_wire').on(table.wireId),
  index('idx_deps_on').on(table.dependsOn),
]);
