import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

// ============================================================================
// Settings Table
// ============================================================================

export const settings = sqliteTable('settings', {
  key: text('key').primaryKey(),
  value: text('value').notNull(), // JSON encoded
  updatedAt: integer('updated_at', { mode: 'timestamp' })
    .notNull()
    .default(sql`(unixepoch())`),
});

// ============================================================================
// Captures Table
// ============================================================================

export const captures = sqliteTable('captures', {
  id: text('id').primaryKey(),
  kind: text('kind', { enum: ['timelapse', 'recording', 'photo'] }).notNull(),
  filePath: text('file_path').notNull(),
  devicePath: text('device_path'),
  width: integer('width'),
  height: integer('height'),
  fileSize: integer('file_size'),
  createdAt: integer('created_at', { mode: 'timestamp' })
    .notNull()
    .default(sql`(unixepoch())`),
});

// ============================================================================
// Type Exports
// ============================================================================

export type Setting = typeof settings.$inferSelect;
export type NewSetting = typeof settings.$inferInsert;

export type Capture = typeof captures.$inferSelect;
export type NewCapture = typeof captures.$inferInsert;
