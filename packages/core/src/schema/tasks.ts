import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey(),
  description: text('description').notNull(),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  createdAt: text('created_at').notNull(),
  /** Insertion order; display order follows it ascending */
  position: integer('position').notNull(),
}, (table) => [
  index('idx_tasks_position').on(table.position),
]);
