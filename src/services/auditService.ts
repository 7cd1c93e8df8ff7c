import { db } from '../config/database';
import { adminLogEntries } from '../models/user';

export const auditService = {
  async log(
    userId: number | undefined,
    actionType: string,
    targetType?: string,
    targetId?: number | string,
    details?: Record<string, unknown>
  ) {
    try {
      await db.insert(adminLogEntries).values({
        userId: userId ?? null,
        actionType,
        targetType,
        targetId: targetId === undefined ? undefined : String(targetId),
        details: details ?? null,
      });
    } catch (error) {
      console.error('Audit log failed:', error);
    }
  },
};
