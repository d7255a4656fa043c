/**
 * Admin Notifications Schema
 *
 * Stores internal errors and warnings that require admin attention:
 * lock contention, ledger rows violating the obligation-reference invariant.
 */

import { pgTable, serial, varchar, text, timestamp, index, boolean } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { FIELD_LIMITS } from '@finledger/shared/constants';

export const adminNotifications = pgTable('admin_notifications', {
  notificationId: serial('notification_id').primaryKey(),

  severity: varchar('severity', { length: 20 }).notNull(), // 'error' | 'warning' | 'info'
  category: varchar('category', { length: FIELD_LIMITS.NOTIFICATION_CATEGORY }).notNull(), // 'ledger' | 'lock_contention' | ...

  code: varchar('code', { length: FIELD_LIMITS.NOTIFICATION_CODE }).notNull(),
  message: text('message').notNull(),
  details: text('details'), // JSON-encoded details

  // Context, e.g. entity_type='credit_card_invoice', entity_id='42'
  entityType: varchar('entity_type', { length: FIELD_LIMITS.NOTIFICATION_CATEGORY }),
  entityId: varchar('entity_id', { length: FIELD_LIMITS.ENTITY_ID }),

  acknowledged: boolean('acknowledged').notNull().default(false),
  acknowledgedAt: timestamp('acknowledged_at', { withTimezone: true }),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  idxSeverity: index('idx_admin_notif_severity').on(table.severity),
  idxCategory: index('idx_admin_notif_category').on(table.category),
  idxAcknowledged: index('idx_admin_notif_acknowledged').on(table.acknowledged).where(sql`${table.acknowledged} = false`),
}));
