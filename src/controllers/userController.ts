import { Response } from 'express';
import { z } from 'zod';
import bcrypt from 'bcrypt';
import { asc, count, eq } from 'drizzle-orm';
import { db } from '../config/database';
import { users } from '../models/user';
import { auditService } from '../services/auditService';
import { HttpError, handleControllerError } from '../utils/httpErrors';
import { listQuerySchema, pageOffset, parseId, searchCondition } from '../utils/validation';
import { serializeUser } from '../utils/serializers';
import type { AuthRequest } from '../types';

export const PASSWORD_SALT_ROUNDS = 10;

const userSchema = z.object({
  username: z.string().trim().min(1, 'Username is required').max(150).regex(/^[\w.@+-]+$/, 'Username may contain only letters, digits and @/./+/-/_'),
  password: z.string().min(8, 'Password must be at least 8 characters'),
  firstName: z.string().max(150).optional().default(''),
  lastName: z.string().max(150).optional().default(''),
  email: z.union([z.string().email('Invalid email address'), z.literal('')]).optional().default(''),
  isStaff: z.boolean().optional().default(false),
  isActive: z.boolean().optional().default(true),
});

const userUpdateSchema = z.object({
  username: userSchema.shape.username.optional(),
  password: userSchema.shape.password.optional(),
  firstName: z.string().max(150).optional(),
  lastName: z.string().max(150).optional(),
  email: z.union([z.string().email('Invalid email address'), z.literal('')]).optional(),
  isStaff: z.boolean().optional(),
  isActive: z.boolean().optional(),
});

export const getUsers = async (req: AuthRequest, res: Response) => {
  try {
    const { page, limit, q } = listQuerySchema.parse(req.query);
    const where = searchCondition(q, [users.username, users.firstName, users.lastName, users.email]);

    const [results, [{ total }]] = await Promise.all([
      db.select().from(users).where(where).orderBy(asc(users.username)).limit(limit).offset(pageOffset(page, limit)),
      db.select({ total: count() }).from(users).where(where),
    ]);

    res.json({
      data: results.map(serializeUser),
      page,
      limit,
      total,
      hasMore: page * limit < total,
    });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch users');
  }
};

export const createUser = async (req: AuthRequest, res: Response) => {
  try {
    const { password, ...data } = userSchema.parse(req.body);
    const passwordHash = await bcrypt.hash(password, PASSWORD_SALT_ROUNDS);

    const [user] = await db.insert(users).values({ ...data, passwordHash }).returning();

    await auditService.log(req.user?.userId, 'user_create', 'user', user.id, { username: user.username });

    res.status(201).json(serializeUser(user));
  } catch (error) {
    handleControllerError(res, error, 'Failed to create user');
  }
};

export const updateUser = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'user');
    const { password, ...data } = userUpdateSchema.parse(req.body);

    const changes: Partial<typeof users.$inferInsert> = { ...data };
    if (password !== undefined) {
      changes.passwordHash = await bcrypt.hash(password, PASSWORD_SALT_ROUNDS);
    }
    if (Object.keys(changes).length === 0) {
      throw new HttpError(400, 'No changes provided');
    }

    const [user] = await db.update(users).set(changes).where(eq(users.id, id)).returning();

    if (!user) {
      return res.status(404).json({ message: 'User not found' });
    }

    await auditService.log(req.user?.userId, 'user_update', 'user', id, { fields: Object.keys(changes) });

    res.json(serializeUser(user));
  } catch (error) {
    handleControllerError(res, error, 'Failed to update user');
  }
};

export const deleteUser = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'user');

    if (id === req.user?.userId) {
      return res.status(400).json({ message: 'You cannot delete your own account' });
    }

    const deleted = await db.delete(users).where(eq(users.id, id)).returning({ id: users.id });

    if (deleted.length === 0) {
      return res.status(404).json({ message: 'User not found' });
    }

    await auditService.log(req.user?.userId, 'user_delete', 'user', id);

    res.json({ success: true });
  } catch (error) {
    handleControllerError(res, error, 'Failed to delete user');
  }
};
