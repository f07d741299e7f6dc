import { sqliteTable, text } from 'drizzle-orm/sqlite-core';

/** Key-value rows stored beside the tasks (currently only next_id) */
export const storeMeta = sqliteTable('store_meta', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});
