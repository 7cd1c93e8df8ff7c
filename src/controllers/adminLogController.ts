import { Response } from 'express';
import { z } from 'zod';
import { desc, eq } from 'drizzle-orm';
import { db } from '../config/database';
import { adminLogEntries, users } from '../models/user';
import { handleControllerError } from '../utils/httpErrors';
import type { AuthRequest } from '../types';

const logQuerySchema = z.object({
  limit: z.string().optional().default('50').transform(val => Math.min(Math.max(parseInt(val) || 50, 1), 100)),
});

export const getAdminLog = async (req: AuthRequest, res: Response) => {
  try {
    const { limit } = logQuerySchema.parse(req.query);

    const data = await db.select({
      id: adminLogEntries.id,
      actionType: adminLogEntries.actionType,
      targetType: adminLogEntries.targetType,
      targetId: adminLogEntries.targetId,
      details: adminLogEntries.details,
      createdAt: adminLogEntries.createdAt,
      userId: adminLogEntries.userId,
      username: users.username,
    })
    .from(adminLogEntries)
    .leftJoin(users, eq(adminLogEntries.userId, users.id))
    .orderBy(desc(adminLogEntries.createdAt), desc(adminLogEntries.id))
    .limit(limit);

    res.json({ data });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch admin log');
  }
};
