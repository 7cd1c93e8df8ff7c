import { Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { eq } from 'drizzle-orm';
import { db } from '../config/database';
import { config } from '../config/env';
import { users } from '../models/user';
import type { AuthRequest, AuthUser } from '../types';

const TOKEN_TTL = '12h';

const tokenPayloadSchema = z.object({
  userId: z.number().int(),
  username: z.string(),
  isStaff: z.boolean(),
});

export const signToken = (user: AuthUser) =>
  jwt.sign(user, config.secretKey, { expiresIn: TOKEN_TTL });

export const authenticateToken = async (req: AuthRequest, res: Response, next: NextFunction) => {
  const authHeader = req.headers['authorization'];
  const token = authHeader && authHeader.split(' ')[1];

  if (!token) {
    return res.status(401).json({ message: 'Access token required' });
  }

  let payload: AuthUser;
  try {
    payload = tokenPayloadSchema.parse(jwt.verify(token, config.secretKey));
  } catch (error) {
    console.log('❌ Token verification failed:', error instanceof Error ? error.message : error);
    return res.status(401).json({ message: 'Invalid or expired token' });
  }

  try {
    const [user] = await db.select().from(users).where(eq(users.id, payload.userId)).limit(1);

    if (!user || !user.isActive) {
      return res.status(401).json({ message: 'User not found' });
    }

    req.user = { userId: user.id, username: user.username, isStaff: user.isStaff };
    next();
  } catch (error) {
    console.error('❌ Authentication lookup failed:', error);
    res.status(500).json({ message: 'Failed to authenticate' });
  }
};

export const ensureStaff = (req: AuthRequest, res: Response, next: NextFunction) => {
  if (!req.user) {
    return res.status(401).json({ message: 'Authentication required' });
  }

  if (!req.user.isStaff) {
    console.log(`❌ User ${req.user.username} is not staff`);
    return res.status(403).json({ message: 'Staff access required' });
  }

  next();
};
