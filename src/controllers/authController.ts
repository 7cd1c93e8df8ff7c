import { Request, Response } from 'express';
import { z } from 'zod';
import bcrypt from 'bcrypt';
import { eq } from 'drizzle-orm';
import { db } from '../config/database';
import { users } from '../models/user';
import { signToken } from '../middleware/auth';
import { handleControllerError } from '../utils/httpErrors';
import { serializeUser } from '../utils/serializers';
import type { AuthRequest } from '../types';

const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export const login = async (req: Request, res: Response) => {
  try {
    const { username, password } = loginSchema.parse(req.body);

    const [user] = await db.select().from(users).where(eq(users.username, username)).limit(1);

    const isValidPassword = user ? await bcrypt.compare(password, user.passwordHash) : false;
    if (!user || !isValidPassword || !user.isActive) {
      console.log(`❌ Failed login for ${username}`);
      return res.status(401).json({ message: 'Invalid username or password' });
    }

    const [updated] = await db
      .update(users)
      .set({ lastLogin: new Date() })
      .where(eq(users.id, user.id))
      .returning();

    const token = signToken({ userId: updated.id, username: updated.username, isStaff: updated.isStaff });
    console.log(`✅ ${updated.username} logged in`);

    res.json({ token, user: serializeUser(updated) });
  } catch (error) {
    handleControllerError(res, error, 'Failed to log in');
  }
};

export const getMe = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) {
      return res.status(401).json({ message: 'Authentication required' });
    }

    const [user] = await db.select().from(users).where(eq(users.id, req.user.userId)).limit(1);

    if (!user) {
      return res.status(404).json({ message: 'User not found' });
    }

    res.json({ user: serializeUser(user) });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch user data');
  }
};
