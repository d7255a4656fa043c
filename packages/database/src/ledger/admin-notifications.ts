/**
 * Admin Notification System
 *
 * Logs internal errors that require admin attention:
 * lock contention, ledger rows that break the reference invariant, etc.
 */

import type { DatabaseOrTransaction } from '../db';
import { adminNotifications } from '../schema/admin';

export type NotificationSeverity = 'error' | 'warning' | 'info';

export interface LogInternalErrorParams {
  severity: NotificationSeverity;
  category: string; // 'ledger', 'lock_contention', ...
  code: string;
  message: string;
  details?: Record<string, unknown>; // JSON-stringified when stored
  entityType?: string;
  entityId?: number | string;
}

/**
 * Log an internal error to admin_notifications table
 *
 * Errors are also logged to console.
 *
 * @returns Notification ID
 *
 * @example
 * ```typescript
 * await logInternalError(db, {
 *   severity: 'error',
 *   category: 'ledger',
 *   code: 'CORRUPT_OBLIGATION_REFERENCE',
 *   message: 'Obligation status has no reference set',
 *   entityType: 'obligation_status',
 *   entityId: 42,
 * });
 * ```
 */
export async function logInternalError(
  tx: DatabaseOrTransaction,
  params: LogInternalErrorParams
): Promise<number> {
  const logLevel = params.severity === 'error' ? console.error : console.warn;
  logLevel(`[ADMIN NOTIFICATION] ${params.severity.toUpperCase()}: ${params.code} - ${params.message}`, {
    category: params.category,
    entityType: params.entityType,
    entityId: params.entityId,
    details: params.details,
  });

  const [notification] = await tx
    .insert(adminNotifications)
    .values({
      severity: params.severity,
      category: params.category,
      code: params.code,
      message: params.message,
      details: params.details ? JSON.stringify(params.details, null, 2) : null,
      entityType: params.entityType ?? null,
      entityId: params.entityId != null ? String(params.entityId) : null,
    })
    .returning({ notificationId: adminNotifications.notificationId });

  return notification.notificationId;
}
